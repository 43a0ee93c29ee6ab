/**
 * Time helpers shared by strategies and data clients.
 * Timestamps are UTC epoch milliseconds unless a time zone is named.
 */

import type { Resolution } from "../types";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const RESOLUTION_TIMEFRAMES: Record<Resolution, string> = {
	minute: "1m",
	hour: "1h",
	daily: "1d",
};

/**
 * Parse timeframe string to milliseconds
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const timeframeToMs = (timeframe: string): number => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(/^(\d+)([mhd])$/);

	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (unit) {
		case "m":
			return n * MINUTE_MS;
		case "h":
			return n * HOUR_MS;
		default:
			return n * DAY_MS;
	}
};

export const resolutionToTimeframe = (resolution: Resolution): string =>
	RESOLUTION_TIMEFRAMES[resolution];

export interface ZonedClock {
	/** Calendar date in the zone, formatted YYYY-MM-DD */
	dateKey: string;
	hour: number;
	minute: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
	const cached = formatterCache.get(timeZone);
	if (cached) {
		return cached;
	}
	const formatter = new Intl.DateTimeFormat("en-US", {
		timeZone,
		hourCycle: "h23",
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
		hour: "2-digit",
		minute: "2-digit",
	});
	formatterCache.set(timeZone, formatter);
	return formatter;
};

/**
 * Wall-clock reading of a timestamp in an IANA time zone, e.g. the exchange's
 * local session time for "America/New_York".
 */
export const getZonedClock = (timestamp: number, timeZone: string): ZonedClock => {
	if (!Number.isFinite(timestamp)) {
		throw new Error(`Invalid timestamp: ${timestamp}`);
	}
	const parts = getFormatter(timeZone).formatToParts(new Date(timestamp));
	const read = (type: Intl.DateTimeFormatPartTypes): string =>
		parts.find((part) => part.type === type)?.value ?? "00";
	return {
		dateKey: `${read("year")}-${read("month")}-${read("day")}`,
		hour: Number(read("hour")),
		minute: Number(read("minute")),
	};
};
