export * from "./time";

export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type Resolution = "minute" | "hour" | "daily";

export const RESOLUTIONS: readonly Resolution[] = ["minute", "hour", "daily"];

export const isResolution = (value: unknown): value is Resolution =>
	RESOLUTIONS.some((resolution) => resolution === value);

export type PositionSide = "LONG" | "SHORT" | "FLAT";
