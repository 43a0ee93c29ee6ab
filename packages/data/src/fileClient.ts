import fs from "node:fs";
import path from "node:path";
import { Candle, createLogger } from "@quantscripts/core";
import { MarketDataUnavailableError } from "./errors";
import type { MarketDataClient } from "./types";

const fileLogger = createLogger("data:file");

/** Symbols may contain "/" ("BTC/USDT"); file names use "-" instead. */
export const symbolToFileStem = (symbol: string): string =>
	symbol.trim().replace(/\//g, "-");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readRowNumber = (
	row: Record<string, unknown>,
	key: string,
	location: string,
	fallback?: number
): number => {
	const value = row[key] ?? fallback;
	const parsed = typeof value === "string" && value.trim() ? Number(value) : value;
	if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
		throw new Error(`Invalid ${key} in ${location}: ${String(row[key])}`);
	}
	return parsed;
};

const readRowTimestamp = (row: Record<string, unknown>, location: string): number => {
	if (row.timestamp !== undefined) {
		return readRowNumber(row, "timestamp", location);
	}
	if (typeof row.date === "string") {
		const parsed = Date.parse(row.date);
		if (Number.isFinite(parsed)) {
			return parsed;
		}
	}
	throw new Error(`${location} needs a numeric timestamp or an ISO date`);
};

export const parseCandleRows = (
	raw: unknown,
	symbol: string,
	timeframe: string,
	filePath: string
): Candle[] => {
	if (!Array.isArray(raw)) {
		throw new Error(`Candle file ${filePath} must contain a JSON array`);
	}
	const candles = raw.map((row: unknown, index): Candle => {
		const location = `${filePath} row ${index}`;
		if (!isRecord(row)) {
			throw new Error(`${location} must be an object`);
		}
		return {
			symbol,
			timeframe,
			timestamp: readRowTimestamp(row, location),
			open: readRowNumber(row, "open", location),
			high: readRowNumber(row, "high", location),
			low: readRowNumber(row, "low", location),
			close: readRowNumber(row, "close", location),
			volume: readRowNumber(row, "volume", location, 0),
		};
	});
	return candles.sort((a, b) => a.timestamp - b.timestamp);
};

export interface JsonFileMarketDataClientOptions {
	dataDir: string;
	defaultLimit?: number;
}

/**
 * Reads candles from `<dataDir>/<SYMBOL>.<timeframe>.json`, falling back to
 * `<dataDir>/<SYMBOL>.json`. Files are parsed once and kept in memory.
 */
export class JsonFileMarketDataClient implements MarketDataClient {
	private readonly dataDir: string;
	private readonly defaultLimit: number;
	private readonly cache = new Map<string, Candle[]>();

	constructor(options: JsonFileMarketDataClientOptions) {
		this.dataDir = path.resolve(options.dataDir);
		this.defaultLimit = options.defaultLimit ?? 500;
	}

	resolveFile(symbol: string, timeframe: string): string {
		const stem = symbolToFileStem(symbol);
		const candidates = [
			path.join(this.dataDir, `${stem}.${timeframe}.json`),
			path.join(this.dataDir, `${stem}.json`),
		];
		const found = candidates.find((candidate) => fs.existsSync(candidate));
		if (!found) {
			throw new MarketDataUnavailableError(
				`No candle file for ${symbol} ${timeframe}. Looked for ${candidates.join(", ")}`,
				symbol,
				timeframe
			);
		}
		return found;
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = this.defaultLimit,
		since?: number
	): Promise<Candle[]> {
		const series = await this.load(symbol, timeframe);
		if (since === undefined) {
			return series.slice(Math.max(0, series.length - limit));
		}
		return series.filter((candle) => candle.timestamp >= since).slice(0, limit);
	}

	private async load(symbol: string, timeframe: string): Promise<Candle[]> {
		const filePath = this.resolveFile(symbol, timeframe);
		const key = `${filePath}|${symbol}|${timeframe}`;
		const cached = this.cache.get(key);
		if (cached) {
			return cached;
		}
		const contents = await fs.promises.readFile(filePath, "utf-8");
		let raw: unknown;
		try {
			raw = JSON.parse(contents);
		} catch (error) {
			throw new Error(
				`Invalid JSON in ${filePath}: ${
					error instanceof Error ? error.message : String(error)
				}`
			);
		}
		const candles = parseCandleRows(raw, symbol, timeframe, filePath);
		this.cache.set(key, candles);
		fileLogger.debug("candle_file_loaded", {
			symbol,
			timeframe,
			filePath,
			candles: candles.length,
		});
		return candles;
	}
}
