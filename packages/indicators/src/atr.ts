export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

export type AtrSmoothing = "wilder" | "simple";

export function calculateATR(
	candles: AtrInput[],
	period = 14,
	smoothing: AtrSmoothing = "wilder"
): number | null {
	const series = calculateATRSeries(candles, period, smoothing);
	return series.length ? series[series.length - 1] : null;
}

/**
 * Average true range. The first bar only seeds the previous close, so
 * `period + 1` candles are needed for the first value. `simple` averages the
 * last `period` true ranges; `wilder` smooths recursively.
 */
export function calculateATRSeries(
	candles: AtrInput[],
	period = 14,
	smoothing: AtrSmoothing = "wilder"
): number[] {
	if (period <= 0 || candles.length < period + 1) {
		return [];
	}

	const trueRanges = computeTrueRanges(candles);
	let atr =
		trueRanges.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	const series: number[] = [atr];

	for (let i = period; i < trueRanges.length; i += 1) {
		if (smoothing === "wilder") {
			atr = (atr * (period - 1) + trueRanges[i]) / period;
		} else {
			atr += (trueRanges[i] - trueRanges[i - period]) / period;
		}
		series.push(atr);
	}

	return series;
}

const computeTrueRanges = (candles: AtrInput[]): number[] => {
	const trueRanges: number[] = [];
	for (let i = 1; i < candles.length; i += 1) {
		const current = candles[i];
		const previousClose = candles[i - 1].close;
		const highLow = current.high - current.low;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		trueRanges.push(Math.max(highLow, highClose, lowClose));
	}
	return trueRanges;
};
