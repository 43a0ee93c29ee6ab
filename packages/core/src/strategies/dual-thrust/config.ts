import { RESOLUTIONS, Resolution } from "../../types";
import {
	expectRecord,
	readEnum,
	readNumber,
	readString,
} from "../configFields";
import type { StrategyManifest } from "../registry";

export const DUAL_THRUST_ID = "dual_thrust" as const;

export const DUAL_THRUST_ENTRY_MODES = ["sell_trigger_pivot", "breakout"] as const;

/**
 * `sell_trigger_pivot` goes long at or above the lower (sell) trigger and
 * short below it. `breakout` goes long at or above the upper (buy) trigger and
 * short below the lower one.
 */
export type DualThrustEntryMode = (typeof DUAL_THRUST_ENTRY_MODES)[number];

export interface DualThrustConfig {
	id: typeof DUAL_THRUST_ID;
	name: string;
	symbol: string;
	resolution: Resolution;
	lookbackDays: number;
	k1: number;
	k2: number;
	targetWeight: number;
	entryMode: DualThrustEntryMode;
}

export const dualThrustManifest: StrategyManifest = {
	strategyId: DUAL_THRUST_ID,
	name: "Dual Thrust",
	description:
		"Daily open +/- k * max(HH - LC, HC - LL) range over a short window; flips between long and short around the trigger.",
};

export const parseDualThrustConfig = (
	raw: unknown,
	source: string
): DualThrustConfig => {
	const record = expectRecord(raw, source);
	return {
		id: DUAL_THRUST_ID,
		name: readString(record, "name", source, dualThrustManifest.name),
		symbol: readString(record, "symbol", source),
		resolution: readEnum(record, "resolution", source, RESOLUTIONS, "hour"),
		lookbackDays: readNumber(record, "lookbackDays", source, {
			fallback: 4,
			min: 1,
			integer: true,
		}),
		k1: readNumber(record, "k1", source, { fallback: 0.5, min: 0 }),
		k2: readNumber(record, "k2", source, { fallback: 0.5, min: 0 }),
		targetWeight: readNumber(record, "targetWeight", source, {
			fallback: 0.8,
			min: 0,
			max: 1,
		}),
		entryMode: readEnum(
			record,
			"entryMode",
			source,
			DUAL_THRUST_ENTRY_MODES,
			"sell_trigger_pivot"
		),
	};
};
