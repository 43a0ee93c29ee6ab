import { RESOLUTIONS, Resolution } from "../../types";
import { expectRecord, readEnum, readNumber, readString } from "../configFields";
import type { StrategyManifest } from "../registry";

export const MACD_TREND_STATE_ID = "macd_trend_state" as const;

export interface MacdTrendStateConfig {
	id: typeof MACD_TREND_STATE_ID;
	name: string;
	symbol: string;
	resolution: Resolution;
	fastPeriod: number;
	slowPeriod: number;
	signalPeriod: number;
	historyBars: number;
	exchangeTimeZone: string;
	warmupBars: number;
}

export const macdTrendStateManifest: StrategyManifest = {
	strategyId: MACD_TREND_STATE_ID,
	name: "MACD Trend State",
	description:
		"Once per trading day, walks a nine-state trend machine over the MACD histogram and its two-day average; long on a recovering downtrend, flat when momentum fades.",
};

export const parseMacdTrendStateConfig = (
	raw: unknown,
	source: string
): MacdTrendStateConfig => {
	const record = expectRecord(raw, source);
	const period = (key: string, fallback: number): number =>
		readNumber(record, key, source, { fallback, min: 1, integer: true });

	const fastPeriod = period("fastPeriod", 12);
	const slowPeriod = period("slowPeriod", 26);
	const signalPeriod = period("signalPeriod", 9);
	const historyBars = period("historyBars", 200);

	if (fastPeriod >= slowPeriod) {
		throw new Error(
			`Field fastPeriod in ${source} must be below slowPeriod (${slowPeriod}), got ${fastPeriod}`
		);
	}
	const needed = slowPeriod + signalPeriod - 1;
	if (historyBars < needed) {
		throw new Error(
			`Field historyBars in ${source} must be >= ${needed}, got ${historyBars}`
		);
	}

	return {
		id: MACD_TREND_STATE_ID,
		name: readString(record, "name", source, macdTrendStateManifest.name),
		symbol: readString(record, "symbol", source),
		resolution: readEnum(record, "resolution", source, RESOLUTIONS, "minute"),
		fastPeriod,
		slowPeriod,
		signalPeriod,
		historyBars,
		exchangeTimeZone: readString(record, "exchangeTimeZone", source, "America/New_York"),
		warmupBars: readNumber(record, "warmupBars", source, {
			fallback: 51,
			min: 0,
			integer: true,
		}),
	};
};
