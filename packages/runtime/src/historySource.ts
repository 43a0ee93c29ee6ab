import { Candle, createLogger, timeframeToMs } from "@quantscripts/core";
import {
	MarketDataClient,
	MarketDataUnavailableError,
	fetchHistoricalCandles,
} from "@quantscripts/data";

const historyLogger = createLogger("runtime:history");

/** Smallest window, in bars, searched for the latest candle. */
const LATEST_WINDOW_BARS = 5;

export interface HistorySource {
	/**
	 * The last `bars` completed candles, oldest first. A candle is completed
	 * once its open time plus one timeframe is at or before `endTimestamp`.
	 */
	fetchHistory(
		symbol: string,
		timeframe: string,
		bars: number,
		endTimestamp: number
	): Promise<Candle[]>;
	/** The latest candle opened at or before `endTimestamp`, finished or not. */
	fetchLatest(symbol: string, timeframe: string, endTimestamp: number): Promise<Candle | null>;
}

const isCompleted = (candle: Candle, timeframeMs: number, endTimestamp: number): boolean =>
	candle.timestamp + timeframeMs <= endTimestamp;

const lastOf = <T>(items: T[], count: number): T[] =>
	items.slice(Math.max(0, items.length - count));

export interface MarketDataHistorySourceOptions {
	client: MarketDataClient;
	/**
	 * Multiplier on the calendar span of `bars` candles, so that closed
	 * sessions (nights, weekends, holidays) still leave enough bars.
	 */
	lookbackFactor?: number;
	batchSize?: number;
}

/**
 * Reads history through a market data client. A symbol the source has no
 * data for yields no candles and a warning rather than an error, so one gap
 * in a universe does not stop the others.
 */
export class MarketDataHistorySource implements HistorySource {
	private readonly client: MarketDataClient;
	private readonly lookbackFactor: number;
	private readonly batchSize?: number;

	constructor(options: MarketDataHistorySourceOptions) {
		this.client = options.client;
		this.lookbackFactor = Math.max(options.lookbackFactor ?? 3, 1);
		this.batchSize = options.batchSize;
	}

	async fetchHistory(
		symbol: string,
		timeframe: string,
		bars: number,
		endTimestamp: number
	): Promise<Candle[]> {
		if (bars <= 0) {
			return [];
		}
		const candles = await this.fetchWindow(symbol, timeframe, bars, endTimestamp, true);
		const result = lastOf(candles, bars);
		if (result.length < bars) {
			historyLogger.debug("history_short", {
				symbol,
				timeframe,
				requested: bars,
				received: result.length,
			});
		}
		return result;
	}

	async fetchLatest(
		symbol: string,
		timeframe: string,
		endTimestamp: number
	): Promise<Candle | null> {
		const candles = await this.fetchWindow(
			symbol,
			timeframe,
			LATEST_WINDOW_BARS,
			endTimestamp,
			false
		);
		return candles.length ? candles[candles.length - 1] : null;
	}

	private async fetchWindow(
		symbol: string,
		timeframe: string,
		bars: number,
		endTimestamp: number,
		completedOnly: boolean
	): Promise<Candle[]> {
		const span = bars * timeframeToMs(timeframe) * this.lookbackFactor;
		try {
			return await fetchHistoricalCandles({
				client: this.client,
				symbol,
				timeframe,
				startTimestamp: Math.max(0, endTimestamp - span),
				endTimestamp,
				completedOnly,
				batchSize: this.batchSize,
				logger: historyLogger,
			});
		} catch (error) {
			if (error instanceof MarketDataUnavailableError) {
				historyLogger.warn("history_unavailable", {
					symbol,
					timeframe,
					reason: error.message,
				});
				return [];
			}
			throw error;
		}
	}
}

/** Serves candles already in memory, keyed by symbol and timeframe. */
export class InMemoryHistorySource implements HistorySource {
	private readonly series = new Map<string, Candle[]>();

	constructor(candles: Candle[] = []) {
		for (const candle of candles) {
			this.add(candle);
		}
	}

	add(candle: Candle): void {
		const key = `${candle.symbol}|${candle.timeframe}`;
		const series = this.series.get(key) ?? [];
		series.push(candle);
		series.sort((a, b) => a.timestamp - b.timestamp);
		this.series.set(key, series);
	}

	async fetchHistory(
		symbol: string,
		timeframe: string,
		bars: number,
		endTimestamp: number
	): Promise<Candle[]> {
		if (bars <= 0) {
			return [];
		}
		const timeframeMs = timeframeToMs(timeframe);
		const completed = this.get(symbol, timeframe).filter((candle) =>
			isCompleted(candle, timeframeMs, endTimestamp)
		);
		return lastOf(completed, bars);
	}

	async fetchLatest(
		symbol: string,
		timeframe: string,
		endTimestamp: number
	): Promise<Candle | null> {
		const opened = this.get(symbol, timeframe).filter(
			(candle) => candle.timestamp <= endTimestamp
		);
		return opened.length ? opened[opened.length - 1] : null;
	}

	private get(symbol: string, timeframe: string): Candle[] {
		return this.series.get(`${symbol}|${timeframe}`) ?? [];
	}
}
