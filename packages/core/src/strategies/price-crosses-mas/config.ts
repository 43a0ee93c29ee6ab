import { RESOLUTIONS, Resolution } from "../../types";
import { expectRecord, isRecord, readEnum, readNumber, readString } from "../configFields";
import type { StrategyManifest } from "../registry";

export const PRICE_CROSSES_MAS_ID = "price_crosses_mas" as const;

export interface WallClockTime {
	hour: number;
	minute: number;
}

export interface PriceCrossesMasConfig {
	id: typeof PRICE_CROSSES_MAS_ID;
	name: string;
	symbol: string;
	resolution: Resolution;
	fastPeriod: number;
	slowPeriod: number;
	atrPeriod: number;
	rsiPeriod: number;
	rsiEntryBelow: number;
	cashFraction: number;
	stopAtrMultiple: number;
	/** Exchange-local time after which positions are flattened and entries stop. */
	flattenAfter: WallClockTime;
	exchangeTimeZone: string;
	warmupBars: number;
	historyBars: number;
}

export const priceCrossesMasManifest: StrategyManifest = {
	strategyId: PRICE_CROSSES_MAS_ID,
	name: "Price Crosses MAs",
	description:
		"Long-only intraday entry on a fast/slow SMA cross with oversold RSI, an ATR stop and an end-of-day flatten.",
};

const readWallClock = (
	raw: Record<string, unknown>,
	key: string,
	source: string,
	fallback: WallClockTime
): WallClockTime => {
	const value = raw[key];
	if (value === undefined) {
		return { ...fallback };
	}
	if (!isRecord(value)) {
		throw new Error(`Field ${key} in ${source} must be an object with hour and minute`);
	}
	return {
		hour: readNumber(value, "hour", `${source} ${key}`, {
			min: 0,
			max: 23,
			integer: true,
		}),
		minute: readNumber(value, "minute", `${source} ${key}`, {
			fallback: 0,
			min: 0,
			max: 59,
			integer: true,
		}),
	};
};

export const parsePriceCrossesMasConfig = (
	raw: unknown,
	source: string
): PriceCrossesMasConfig => {
	const record = expectRecord(raw, source);
	const period = (key: string, fallback: number): number =>
		readNumber(record, key, source, { fallback, min: 1, integer: true });

	const fastPeriod = period("fastPeriod", 3);
	const slowPeriod = period("slowPeriod", 12);
	const atrPeriod = period("atrPeriod", 12);
	const rsiPeriod = period("rsiPeriod", 26);
	const historyBars = period("historyBars", 120);

	if (fastPeriod >= slowPeriod) {
		throw new Error(
			`Field fastPeriod in ${source} must be below slowPeriod (${slowPeriod}), got ${fastPeriod}`
		);
	}
	const needed = Math.max(slowPeriod, atrPeriod + 1, rsiPeriod + 1);
	if (historyBars < needed) {
		throw new Error(
			`Field historyBars in ${source} must be >= ${needed}, got ${historyBars}`
		);
	}

	return {
		id: PRICE_CROSSES_MAS_ID,
		name: readString(record, "name", source, priceCrossesMasManifest.name),
		symbol: readString(record, "symbol", source),
		resolution: readEnum(record, "resolution", source, RESOLUTIONS, "minute"),
		fastPeriod,
		slowPeriod,
		atrPeriod,
		rsiPeriod,
		rsiEntryBelow: readNumber(record, "rsiEntryBelow", source, {
			fallback: 30,
			min: 0,
			max: 100,
		}),
		cashFraction: readNumber(record, "cashFraction", source, {
			fallback: 0.98,
			min: 0,
			max: 1,
		}),
		stopAtrMultiple: readNumber(record, "stopAtrMultiple", source, {
			fallback: 0.5,
			min: 0,
		}),
		flattenAfter: readWallClock(record, "flattenAfter", source, { hour: 15, minute: 50 }),
		exchangeTimeZone: readString(record, "exchangeTimeZone", source, "America/New_York"),
		warmupBars: readNumber(record, "warmupBars", source, {
			fallback: 51,
			min: 0,
			integer: true,
		}),
		historyBars,
	};
};
