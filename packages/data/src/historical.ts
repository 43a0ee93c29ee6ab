import { Candle, timeframeToMs } from "@quantscripts/core";
import type { HistoricalFetchOptions } from "./types";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

interface FetchWindow {
	/** First timestamp requested, warm-up included. */
	from: number;
	startTimestamp: number;
	/** Latest open time a kept candle may have. */
	lastOpen: number;
	limit: number;
}

const resolveWindow = (options: HistoricalFetchOptions, timeframeMs: number): FetchWindow => {
	const warmupMs = Math.max(options.warmup ?? 0, 0) * timeframeMs;
	return {
		from: Math.max(0, options.startTimestamp - warmupMs),
		startTimestamp: options.startTimestamp,
		lastOpen: options.completedOnly
			? options.endTimestamp - timeframeMs
			: options.endTimestamp,
		limit:
			typeof options.limit === "number" && options.limit > 0
				? options.limit
				: Number.POSITIVE_INFINITY,
	};
};

/**
 * Pages forward from `startTimestamp` (less any warm-up) until
 * `endTimestamp`, dropping repeated timestamps. With `completedOnly`, a
 * candle still open at `endTimestamp` ends the fetch. Stops early once
 * `limit` candles inside the range have been collected.
 */
export const fetchHistoricalCandles = async (
	options: HistoricalFetchOptions
): Promise<Candle[]> => {
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(options.maxIterations ?? DEFAULT_MAX_ITERATIONS, 1);
	const timeframeMs = timeframeToMs(options.timeframe);
	const window = resolveWindow(options, timeframeMs);

	const collected = new Map<number, Candle>();
	let inRange = 0;
	let cursor = window.from;
	let iterations = 0;

	const accept = (candle: Candle): "continue" | "done" => {
		if (candle.timestamp > window.lastOpen) {
			return "done";
		}
		if (collected.has(candle.timestamp)) {
			return "continue";
		}
		collected.set(candle.timestamp, candle);
		if (candle.timestamp >= window.startTimestamp) {
			inRange += 1;
		}
		return inRange >= window.limit ? "done" : "continue";
	};

	fetching: while (cursor <= window.lastOpen) {
		if (iterations >= maxIterations) {
			options.logger?.warn?.("historical_fetch_iterations_exceeded", {
				symbol: options.symbol,
				timeframe: options.timeframe,
				startTimestamp: options.startTimestamp,
				endTimestamp: options.endTimestamp,
				iterations,
				maxIterations,
			});
			break;
		}
		const batch = await options.client.fetchOHLCV(
			options.symbol,
			options.timeframe,
			Math.min(batchSize, window.limit - inRange),
			cursor
		);
		iterations += 1;
		if (!batch.length) {
			break;
		}
		for (const candle of batch) {
			if (accept(candle) === "done") {
				break fetching;
			}
		}
		cursor = Math.max(batch[batch.length - 1].timestamp, cursor) + timeframeMs;
	}

	return [...collected.values()];
};
