import {
	expectRecord,
	readEnum,
	readNumber,
	readString,
	readStringArray,
} from "../configFields";
import type { StrategyManifest } from "../registry";

export const MOMENTUM_ROTATION_ID = "momentum_rotation" as const;

export const MOMENTUM_MODES = ["absolute", "percent"] as const;
export const REBALANCE_FREQUENCIES = ["monthly", "daily"] as const;

/**
 * `equal_new` gives each newcomer 1 / newcomers. `cash_split` spreads cash
 * plus the value of the positions being sold across newcomers, as a fraction
 * of total value.
 */
export const ROTATION_SIZINGS = ["equal_new", "cash_split"] as const;

export type MomentumScoreMode = (typeof MOMENTUM_MODES)[number];
export type RebalanceFrequency = (typeof REBALANCE_FREQUENCIES)[number];
export type RotationSizing = (typeof ROTATION_SIZINGS)[number];

export interface MomentumRotationConfig {
	id: typeof MOMENTUM_ROTATION_ID;
	name: string;
	universe: string[];
	scheduleSymbol: string;
	momentumPeriod: number;
	topCount: number;
	momentumMode: MomentumScoreMode;
	rebalance: RebalanceFrequency;
	sizing: RotationSizing;
}

export const momentumRotationManifest: StrategyManifest = {
	strategyId: MOMENTUM_ROTATION_ID,
	name: "Momentum Rotation",
	description:
		"Ranks a fixed equity universe by trailing momentum and rotates into the top names on a schedule.",
};

export const parseMomentumRotationConfig = (
	raw: unknown,
	source: string
): MomentumRotationConfig => {
	const record = expectRecord(raw, source);
	const universe = readStringArray(record, "universe", source);
	const scheduleSymbol = readString(record, "scheduleSymbol", source, universe[0]);
	const topCount = readNumber(record, "topCount", source, {
		fallback: 9,
		min: 1,
		integer: true,
	});
	if (topCount > universe.length) {
		throw new Error(
			`Field topCount in ${source} must not exceed the universe size (${universe.length}), got ${topCount}`
		);
	}
	return {
		id: MOMENTUM_ROTATION_ID,
		name: readString(record, "name", source, momentumRotationManifest.name),
		universe,
		scheduleSymbol,
		momentumPeriod: readNumber(record, "momentumPeriod", source, {
			fallback: 126,
			min: 1,
			integer: true,
		}),
		topCount,
		momentumMode: readEnum(record, "momentumMode", source, MOMENTUM_MODES, "absolute"),
		rebalance: readEnum(record, "rebalance", source, REBALANCE_FREQUENCIES, "monthly"),
		sizing: readEnum(record, "sizing", source, ROTATION_SIZINGS, "equal_new"),
	};
};
