import type { Candle } from "../types";

/**
 * Read-only source of OHLCV candles: an exchange API, or files on disk.
 */
export interface MarketDataClient {
	/**
	 * @param symbol - Market symbol as the source names it ("NFLX", "BTC/USDT")
	 * @param timeframe - "1m", "1h", "1d", ...
	 * @param limit - Maximum number of candles to return
	 * @param since - Earliest candle open time (UTC ms) to include
	 * @returns Candles oldest first
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Candle[]>;
}
