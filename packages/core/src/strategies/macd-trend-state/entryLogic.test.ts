import { describe, expect, it } from "vitest";
import { TrendState, nextTrendState, trendStateActions } from "./entryLogic";

const step = (state: TrendState, histogram: number, previous: number, beforePrevious: number) =>
	nextTrendState(state, { histogram, previous, beforePrevious });

describe("macd trend state machine", () => {
	it("leaves the undecided state only on a histogram turning positive", () => {
		expect(step(0, 1, -0.5, 0)).toBe(1);
		expect(step(0, 1, 0.5, 0)).toBe(0);
		expect(step(0, -1, 0.5, 0)).toBe(0);
	});

	it("flips between the positive and negative halves on the histogram sign", () => {
		expect(step(7, 0.1, -1, -1)).toBe(1);
		expect(step(2, 0, 1, 1)).toBe(5);
		expect(step(4, -0.1, 1, 1)).toBe(5);
	});

	it("grades a positive histogram against the two-bar average", () => {
		expect(step(1, 3, 2, 1)).toBe(2);
		expect(step(2, 1.5, 2, 1)).toBe(3);
		expect(step(2, 1, 2, 1)).toBe(4);
		expect(step(3, 3, 2, 1)).toBe(3);
		expect(step(3, 1, 2, 1)).toBe(4);
		expect(step(4, 3, 2, 1)).toBe(4);
	});

	it("grades a non-positive histogram against the two-bar average", () => {
		expect(step(5, -3, -2, -1)).toBe(6);
		expect(step(6, -1.5, -2, -1)).toBe(7);
		expect(step(5, -1, -2, -1)).toBe(8);
		expect(step(7, -3, -2, -1)).toBe(7);
		expect(step(7, -1, -2, -1)).toBe(8);
		expect(step(8, -3, -2, -1)).toBe(8);
	});
});

describe("macd trend state actions", () => {
	it("goes fully long from a flat book in the recovering state", () => {
		expect(trendStateActions(8, 0)).toEqual([{ kind: "set_holdings", weight: 1 }]);
		expect(trendStateActions(8, 10)).toEqual([]);
	});

	it("goes flat in fading or falling states", () => {
		for (const state of [3, 4, 5, 6] as const) {
			expect(trendStateActions(state, 10)).toEqual([{ kind: "set_holdings", weight: 0 }]);
		}
		expect(trendStateActions(5, -10)).toEqual([]);
		expect(trendStateActions(2, 10)).toEqual([]);
	});
});
