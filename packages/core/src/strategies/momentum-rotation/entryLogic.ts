import { momentum } from "@quantscripts/indicators";
import type { Candle } from "../../types";
import type { MomentumScoreMode, RotationSizing } from "./config";

export interface MomentumScore {
	symbol: string;
	score: number;
}

export interface RotationPlan {
	liquidate: string[];
	acquire: string[];
}

export const momentumScore = (
	bars: readonly Candle[],
	period: number,
	mode: MomentumScoreMode
): number | null =>
	momentum(
		bars.map((bar) => bar.close),
		period,
		mode
	);

/** Highest score first; equal scores fall back to symbol order. */
export const rankByMomentum = (
	scores: ReadonlyMap<string, number | null>,
	topCount: number
): MomentumScore[] => {
	const ranked: MomentumScore[] = [];
	for (const [symbol, score] of scores) {
		if (score !== null && Number.isFinite(score)) {
			ranked.push({ symbol, score });
		}
	}
	ranked.sort((a, b) => b.score - a.score || a.symbol.localeCompare(b.symbol));
	return ranked.slice(0, Math.max(0, topCount));
};

export const planRotation = (
	top: readonly string[],
	invested: readonly string[]
): RotationPlan => {
	const topSet = new Set(top);
	const investedSet = new Set(invested);
	return {
		liquidate: invested.filter((symbol) => !topSet.has(symbol)),
		acquire: top.filter((symbol) => !investedSet.has(symbol)),
	};
};

/**
 * Target weight for each newly acquired symbol. `deployableCash` is cash on
 * hand plus the proceeds of this rotation's liquidations. Zero when nothing
 * is bought or the portfolio has no value to split.
 */
export const newcomerWeight = (
	sizing: RotationSizing,
	newcomers: number,
	deployableCash: number,
	totalValue: number
): number => {
	if (newcomers <= 0) {
		return 0;
	}
	if (sizing === "equal_new") {
		return 1 / newcomers;
	}
	if (!(totalValue > 0)) {
		return 0;
	}
	return Math.max(deployableCash, 0) / totalValue / newcomers;
};
