import { ema, emaSeries } from "./ema";

export interface MacdResult {
	macd: number | null;
	signal: number | null;
	histogram: number | null;
}

const EMPTY: MacdResult = { macd: null, signal: null, histogram: null };

export function macd(
	closes: number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdResult {
	if (closes.length === 0 || slow <= 0 || fast <= 0 || signalLength <= 0) {
		return EMPTY;
	}

	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);

	const macdValues: number[] = [];
	fastSeries.forEach((fastValue, index) => {
		const slowValue = slowSeries[index];
		if (fastValue !== null && slowValue !== null) {
			macdValues.push(fastValue - slowValue);
		}
	});

	if (!macdValues.length) {
		return EMPTY;
	}

	const latestMacd = macdValues[macdValues.length - 1];
	const signalValue = ema(macdValues, signalLength);
	return {
		macd: latestMacd,
		signal: signalValue,
		histogram: signalValue !== null ? latestMacd - signalValue : null,
	};
}
