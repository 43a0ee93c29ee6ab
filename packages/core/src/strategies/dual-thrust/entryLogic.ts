import type { Candle } from "../../types";
import type { OrderAction } from "../../host/types";
import type { DualThrustEntryMode } from "./config";

export interface ThrustRange {
	highestHigh: number;
	highestClose: number;
	lowestClose: number;
	lowestLow: number;
	range: number;
}

export interface DualThrustTriggers {
	currentOpen: number;
	range: number;
	sellTrigger: number;
	buyTrigger: number;
}

export interface DualThrustDecision {
	side: "LONG" | "SHORT" | "NONE";
	reason: string;
	actions: OrderAction[];
}

export const computeThrustRange = (bars: readonly Candle[]): ThrustRange | null => {
	if (!bars.length) {
		return null;
	}
	let highestHigh = Number.NEGATIVE_INFINITY;
	let highestClose = Number.NEGATIVE_INFINITY;
	let lowestClose = Number.POSITIVE_INFINITY;
	let lowestLow = Number.POSITIVE_INFINITY;
	for (const bar of bars) {
		highestHigh = Math.max(highestHigh, bar.high);
		highestClose = Math.max(highestClose, bar.close);
		lowestClose = Math.min(lowestClose, bar.close);
		lowestLow = Math.min(lowestLow, bar.low);
	}
	const upperSpan = highestHigh - lowestClose;
	const lowerSpan = highestClose - lowestLow;
	return {
		highestHigh,
		highestClose,
		lowestClose,
		lowestLow,
		range: upperSpan >= lowerSpan ? upperSpan : lowerSpan,
	};
};

export const computeTriggers = (
	currentOpen: number,
	range: number,
	k1: number,
	k2: number
): DualThrustTriggers | null => {
	if (!(currentOpen > 0) || !Number.isFinite(range)) {
		return null;
	}
	return {
		currentOpen,
		range,
		sellTrigger: currentOpen - k1 * range,
		buyTrigger: currentOpen + k2 * range,
	};
};

const goLong = (holdings: number, weight: number, reason: string): DualThrustDecision => ({
	side: "LONG",
	reason,
	actions:
		holdings >= 0
			? [{ kind: "set_holdings", weight }]
			: [{ kind: "liquidate" }, { kind: "set_holdings", weight }],
});

const goShort = (
	actions: DualThrustDecision["actions"],
	reason: string
): DualThrustDecision => ({ side: "SHORT", reason, actions });

export const decideDualThrust = (
	price: number,
	holdings: number,
	triggers: DualThrustTriggers,
	mode: DualThrustEntryMode,
	targetWeight: number
): DualThrustDecision => {
	if (mode === "sell_trigger_pivot") {
		if (price >= triggers.sellTrigger) {
			return goLong(holdings, targetWeight, "price_at_or_above_sell_trigger");
		}
		return goShort(
			holdings >= 0
				? [{ kind: "liquidate" }, { kind: "set_holdings", weight: -targetWeight }]
				: [{ kind: "set_holdings", weight: -targetWeight }],
			"price_below_sell_trigger"
		);
	}

	if (price >= triggers.buyTrigger) {
		return goLong(holdings, targetWeight, "price_at_or_above_buy_trigger");
	}
	if (price < triggers.sellTrigger && holdings >= 0) {
		return goShort(
			[{ kind: "liquidate" }, { kind: "set_holdings", weight: -targetWeight }],
			"price_below_sell_trigger"
		);
	}
	return { side: "NONE", reason: "inside_trigger_band", actions: [] };
};
