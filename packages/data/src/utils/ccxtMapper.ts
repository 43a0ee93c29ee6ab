import type { OHLCV } from "ccxt";
import type { Candle } from "@quantscripts/core";

const finiteOrNull = (value: number | undefined): number | null =>
	typeof value === "number" && Number.isFinite(value) ? value : null;

/**
 * Converts a ccxt `[timestamp, open, high, low, close, volume]` row. Rows
 * missing a timestamp or any price come back null; missing volume reads as 0.
 */
export const ccxtRowToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle | null => {
	const [timestamp, open, high, low, close, volume] = row.map(finiteOrNull);
	if (timestamp === null || open === null || high === null || low === null || close === null) {
		return null;
	}
	return { symbol, timeframe, timestamp, open, high, low, close, volume: volume ?? 0 };
};
