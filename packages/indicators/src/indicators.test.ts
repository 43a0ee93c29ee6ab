import { describe, expect, it } from "vitest";
import {
	calculateATR,
	calculateATRSeries,
	ema,
	emaSeries,
	macd,
	momentum,
	rsi,
	rsiSeries,
	sma,
} from "./index";

const bars = [
	{ high: 10, low: 8, close: 9 },
	{ high: 11, low: 9, close: 10 },
	{ high: 12, low: 9, close: 11 },
	{ high: 15, low: 11, close: 14 },
	{ high: 14, low: 12, close: 13 },
];

describe("sma", () => {
	it("averages the trailing window", () => {
		expect(sma([1, 2, 3, 4, 5], 3)).toBe(4);
	});

	it("returns null without enough values", () => {
		expect(sma([1, 2], 3)).toBeNull();
		expect(sma([1, 2], 0)).toBeNull();
	});
});

describe("ema", () => {
	it("seeds with the simple average and smooths forward", () => {
		expect(emaSeries([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
		expect(ema([1, 2, 3, 4, 5], 3)).toBe(4);
	});

	it("returns null for short or empty input", () => {
		expect(ema([1, 2], 3)).toBeNull();
		expect(ema([], 3)).toBeNull();
	});
});

describe("macd", () => {
	const linear = Array.from({ length: 40 }, (_, i) => i + 1);

	it("tracks the constant lag between fast and slow EMAs on a linear series", () => {
		const result = macd(linear, 3, 6, 3);
		expect(result.macd).toBeCloseTo(1.5, 9);
		expect(result.signal).toBeCloseTo(1.5, 9);
		expect(result.histogram).toBeCloseTo(0, 9);
	});

	it("reports macd without a signal until enough macd values exist", () => {
		const result = macd(linear.slice(0, 6), 3, 6, 3);
		expect(result.macd).toBeCloseTo(1.5, 9);
		expect(result.signal).toBeNull();
		expect(result.histogram).toBeNull();
	});

	it("returns nulls when the slow EMA is not ready", () => {
		expect(macd(linear.slice(0, 5), 3, 6, 3)).toEqual({
			macd: null,
			signal: null,
			histogram: null,
		});
	});
});

describe("atr", () => {
	it("smooths true ranges with Wilder's method", () => {
		expect(calculateATRSeries(bars, 2)).toEqual([2.5, 3.25, 2.625]);
		expect(calculateATR(bars, 2)).toBe(2.625);
	});

	it("averages the trailing true ranges in simple mode", () => {
		expect(calculateATRSeries(bars, 2, "simple")).toEqual([2.5, 3.5, 3]);
	});

	it("needs period + 1 candles", () => {
		expect(calculateATRSeries(bars.slice(0, 2), 2)).toEqual([]);
		expect(calculateATR(bars.slice(0, 2), 2)).toBeNull();
	});
});

describe("rsi", () => {
	it("applies Wilder smoothing after the first window", () => {
		expect(rsiSeries([1, 2, 3, 2, 3], 2)).toEqual([100, 50, 75]);
		expect(rsi([1, 2, 3, 2, 3], 2)).toBe(75);
	});

	it("is neutral on a flat series", () => {
		expect(rsi([5, 5, 5, 5], 2)).toBe(50);
	});

	it("returns nothing until period + 1 values exist", () => {
		expect(rsiSeries([1, 2], 2)).toEqual([]);
		expect(rsi([1, 2], 2)).toBeNull();
	});

	it("rejects non-positive periods", () => {
		expect(() => rsiSeries([1, 2, 3], 0)).toThrow("RSI period must be positive");
	});
});

describe("momentum", () => {
	it("measures absolute change over the period", () => {
		expect(momentum([10, 11, 12, 15], 3)).toBe(5);
	});

	it("measures rate of change in percent mode", () => {
		expect(momentum([10, 11, 12, 15], 3, "percent")).toBe(0.5);
	});

	it("returns null without period + 1 values or with a zero base", () => {
		expect(momentum([10, 11], 3)).toBeNull();
		expect(momentum([0, 1], 1, "percent")).toBeNull();
	});
});
