import { calculateATR, rsi, sma } from "@quantscripts/indicators";
import type { Candle } from "../../types";
import type { ZonedClock } from "../../time";
import type { PriceCrossesMasConfig, WallClockTime } from "./config";

export interface CrossIndicators {
	fast: number;
	slow: number;
	atr: number;
	rsi: number;
}

export type CrossDecision =
	| { kind: "flatten"; reason: "after_flatten_time" }
	| { kind: "enter"; quantity: number; stopPrice: number; reason: "fast_above_slow_rsi_oversold" }
	| { kind: "exit"; reason: "fast_at_or_below_slow" }
	| { kind: "hold"; reason: string };

export interface CrossInputs {
	clock: ZonedClock;
	close: number;
	quantity: number;
	cash: number;
	indicators: CrossIndicators;
}

/** Null until every indicator has enough bars. ATR uses simple averaging. */
export const computeCrossIndicators = (
	bars: readonly Candle[],
	config: Pick<PriceCrossesMasConfig, "fastPeriod" | "slowPeriod" | "atrPeriod" | "rsiPeriod">
): CrossIndicators | null => {
	const closes = bars.map((bar) => bar.close);
	const fast = sma(closes, config.fastPeriod);
	const slow = sma(closes, config.slowPeriod);
	const atr = calculateATR([...bars], config.atrPeriod, "simple");
	const strength = rsi(closes, config.rsiPeriod);
	if (fast === null || slow === null || atr === null || strength === null) {
		return null;
	}
	return { fast, slow, atr, rsi: strength };
};

export const isAfterWallClock = (clock: ZonedClock, limit: WallClockTime): boolean =>
	clock.hour * 60 + clock.minute > limit.hour * 60 + limit.minute;

export const entryQuantity = (cash: number, cashFraction: number, close: number): number => {
	if (!(close > 0) || !(cash > 0)) {
		return 0;
	}
	return Math.floor((cashFraction * cash) / close);
};

export const decidePriceCross = (
	inputs: CrossInputs,
	config: Pick<
		PriceCrossesMasConfig,
		"flattenAfter" | "rsiEntryBelow" | "cashFraction" | "stopAtrMultiple"
	>
): CrossDecision => {
	const { clock, close, quantity, cash, indicators } = inputs;

	if (isAfterWallClock(clock, config.flattenAfter)) {
		return quantity > 0
			? { kind: "flatten", reason: "after_flatten_time" }
			: { kind: "hold", reason: "after_flatten_time_flat" };
	}

	if (indicators.fast > indicators.slow) {
		if (indicators.rsi >= config.rsiEntryBelow) {
			return { kind: "hold", reason: "rsi_not_oversold" };
		}
		if (quantity > 0) {
			return { kind: "hold", reason: "already_long" };
		}
		const size = entryQuantity(cash, config.cashFraction, close);
		if (size <= 0) {
			return { kind: "hold", reason: "insufficient_cash" };
		}
		return {
			kind: "enter",
			quantity: size,
			stopPrice: close - indicators.atr * config.stopAtrMultiple,
			reason: "fast_above_slow_rsi_oversold",
		};
	}

	return quantity > 0
		? { kind: "exit", reason: "fast_at_or_below_slow" }
		: { kind: "hold", reason: "fast_at_or_below_slow_flat" };
};
