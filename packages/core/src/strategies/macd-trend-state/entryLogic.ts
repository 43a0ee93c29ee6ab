import type { OrderAction } from "../../host/types";

/**
 * 0: undecided. 1-4: histogram positive (1 fresh, 2 rising, 3 flat, 4 fading).
 * 5-8: histogram at or below zero (5 fresh, 6 falling, 7 flat, 8 recovering).
 */
export type TrendState = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export interface TrendInputs {
	histogram: number;
	/** Histogram at the previous evaluation. */
	previous: number;
	/** Histogram two evaluations back. */
	beforePrevious: number;
}

const compare = (value: number, reference: number): -1 | 0 | 1 =>
	value > reference ? 1 : value < reference ? -1 : 0;

export const nextTrendState = (state: TrendState, inputs: TrendInputs): TrendState => {
	const { histogram, previous } = inputs;
	const average = (previous + inputs.beforePrevious) / 2;
	const vsAverage = compare(histogram, average);

	if (state >= 5 && histogram > 0) {
		return 1;
	}
	if (state >= 1 && state <= 4 && histogram <= 0) {
		return 5;
	}

	switch (state) {
		case 1:
		case 2:
			return vsAverage > 0 ? 2 : vsAverage === 0 ? 3 : 4;
		case 3:
			return vsAverage < 0 ? 4 : 3;
		case 4:
			return 4;
		case 5:
		case 6:
			return vsAverage < 0 ? 6 : vsAverage === 0 ? 7 : 8;
		case 7:
			return vsAverage > 0 ? 8 : 7;
		case 8:
			return 8;
		case 0:
			return histogram > 0 && previous < 0 ? 1 : 0;
	}
};

const EXIT_STATES: ReadonlySet<TrendState> = new Set<TrendState>([3, 4, 5, 6]);

export const trendStateActions = (state: TrendState, quantity: number): OrderAction[] => {
	if (quantity <= 0 && state === 8) {
		return [{ kind: "set_holdings", weight: 1 }];
	}
	if (quantity >= 0 && EXIT_STATES.has(state)) {
		return [{ kind: "set_holdings", weight: 0 }];
	}
	return [];
};
