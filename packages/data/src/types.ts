import type { MarketDataClient } from "@quantscripts/core";

export type { MarketDataClient };

export interface DataProviderLogger {
	debug?: (event: string, payload?: Record<string, unknown>) => void;
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface HistoricalFetchOptions {
	client: MarketDataClient;
	symbol: string;
	timeframe: string;
	startTimestamp: number;
	endTimestamp: number;
	/** Maximum candles at or after `startTimestamp`. */
	limit?: number;
	/**
	 * Keep only candles that have closed by `endTimestamp` (open time plus one
	 * timeframe). Defaults to keeping every candle opened by then.
	 */
	completedOnly?: boolean;
	/** Extra candles fetched before `startTimestamp`. */
	warmup?: number;
	batchSize?: number;
	maxIterations?: number;
	logger?: DataProviderLogger;
}
