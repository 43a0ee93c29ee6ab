import ccxt, { BadSymbol, Exchange, OHLCV } from "ccxt";
import { Candle, createLogger } from "@quantscripts/core";
import { MarketDataUnavailableError } from "./errors";
import type { MarketDataClient } from "./types";
import { ccxtRowToCandle } from "./utils/ccxtMapper";

const ccxtLogger = createLogger("data:ccxt");

export const CCXT_EXCHANGE_IDS = ["binance", "kraken", "mexc", "bitstamp"] as const;

export type CcxtExchangeId = (typeof CCXT_EXCHANGE_IDS)[number];

export const isCcxtExchangeId = (value: unknown): value is CcxtExchangeId =>
	CCXT_EXCHANGE_IDS.some((id) => id === value);

const EXCHANGE_FACTORIES: Record<CcxtExchangeId, () => Exchange> = {
	binance: () => new ccxt.binance({ enableRateLimit: true }),
	kraken: () => new ccxt.kraken({ enableRateLimit: true }),
	mexc: () =>
		new ccxt.mexc({ enableRateLimit: true, options: { defaultType: "spot" } }),
	bitstamp: () => new ccxt.bitstamp({ enableRateLimit: true }),
};

export interface CcxtMarketDataClientOptions {
	exchangeId: CcxtExchangeId;
	/** Injected exchange instance; built from `exchangeId` when omitted. */
	exchange?: Pick<Exchange, "fetchOHLCV">;
	defaultLimit?: number;
}

/** Public OHLCV endpoints only; no credentials are read. */
export class CcxtMarketDataClient implements MarketDataClient {
	readonly exchangeId: CcxtExchangeId;
	private readonly exchange: Pick<Exchange, "fetchOHLCV">;
	private readonly defaultLimit: number;

	constructor(options: CcxtMarketDataClientOptions) {
		this.exchangeId = options.exchangeId;
		this.exchange = options.exchange ?? EXCHANGE_FACTORIES[options.exchangeId]();
		this.defaultLimit = options.defaultLimit ?? 500;
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = this.defaultLimit,
		since?: number
	): Promise<Candle[]> {
		const rows = await this.fetchRows(symbol, timeframe, limit, since);
		const candles: Candle[] = [];
		for (const row of rows) {
			const candle = ccxtRowToCandle(row, symbol, timeframe);
			if (candle) {
				candles.push(candle);
			}
		}
		ccxtLogger.debug("ohlcv_fetched", {
			exchange: this.exchangeId,
			symbol,
			timeframe,
			since: since ?? null,
			limit,
			rows: rows.length,
			dropped: rows.length - candles.length,
		});
		return candles.sort((a, b) => a.timestamp - b.timestamp);
	}

	private async fetchRows(
		symbol: string,
		timeframe: string,
		limit: number,
		since?: number
	): Promise<OHLCV[]> {
		try {
			return await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		} catch (error) {
			if (error instanceof BadSymbol) {
				throw new MarketDataUnavailableError(
					`${this.exchangeId} does not list ${symbol}: ${error.message}`,
					symbol,
					timeframe
				);
			}
			throw error;
		}
	}
}
