import { beforeEach, describe, expect, it, vi } from "vitest";
import { FakeHost, makeBar } from "../__tests__/fakeHost";
import {
	MACD_TREND_STATE_ID,
	MacdTrendStateConfig,
	parseMacdTrendStateConfig,
} from "./config";
import { MacdTrendStateStrategy } from "./MacdTrendStateStrategy";

const macdMock = vi.hoisted(() => vi.fn());

vi.mock("@quantscripts/indicators", () => ({ macd: macdMock }));

const createConfig = (): MacdTrendStateConfig => ({
	id: MACD_TREND_STATE_ID,
	name: "Test MACD Trend State",
	symbol: "GE",
	resolution: "minute",
	fastPeriod: 12,
	slowPeriod: 26,
	signalPeriod: 9,
	historyBars: 200,
	exchangeTimeZone: "America/New_York",
	warmupBars: 51,
});

// New York is UTC-4 in September 2018.
const nyTime = (day: number, hour: number, minute: number): number =>
	Date.UTC(2018, 8, day, hour + 4, minute);

const sliceAt = (timestamp: number) => ({
	time: timestamp,
	bars: new Map([["GE", makeBar("GE", timestamp, 12)]]),
});

const histogram = (value: number | null) => ({
	macd: value,
	signal: value === null ? null : 0,
	histogram: value,
});

const setup = async () => {
	const host = new FakeHost({
		positions: { GE: { quantity: 0, price: 12 } },
		history: { GE: [makeBar("GE", nyTime(5, 15, 59), 12)] },
	});
	const strategy = new MacdTrendStateStrategy(createConfig());
	await strategy.initialize(host);
	return { host, strategy };
};

describe("MacdTrendStateStrategy", () => {
	beforeEach(() => {
		macdMock.mockReset();
	});

	it("evaluates once per exchange day", async () => {
		macdMock.mockReturnValue(histogram(-1));
		const { host, strategy } = await setup();

		await strategy.onData(sliceAt(nyTime(6, 9, 31)));
		await strategy.onData(sliceAt(nyTime(6, 9, 32)));
		await strategy.onData(sliceAt(nyTime(6, 15, 59)));

		expect(macdMock).toHaveBeenCalledTimes(1);
		expect(macdMock).toHaveBeenCalledWith([12], 12, 26, 9);
		expect(host.logs).toEqual(["trend state 0 -> 0"]);
	});

	it("walks the trend states day by day and trades on them", async () => {
		const { host, strategy } = await setup();
		const days = [-1, 2, 3, 1];
		for (const [index, value] of days.entries()) {
			macdMock.mockReturnValueOnce(histogram(value));
			await strategy.onData(sliceAt(nyTime(3 + index, 9, 31)));
		}

		expect(host.logs).toEqual([
			"trend state 0 -> 0",
			"trend state 0 -> 1",
			"trend state 1 -> 2",
			"trend state 2 -> 4",
		]);
		expect(strategy.getTrendState()).toBe(4);
		expect(host.requests).toEqual([{ kind: "set_holdings", symbol: "GE", weight: 0 }]);
	});

	it("goes long from a flat book on the recovering state", async () => {
		const { host, strategy } = await setup();
		const days = [-1, 2, -1, -2, -1];
		for (const [index, value] of days.entries()) {
			macdMock.mockReturnValueOnce(histogram(value));
			await strategy.onData(sliceAt(nyTime(3 + index, 9, 31)));
		}

		expect(strategy.getTrendState()).toBe(8);
		expect(host.requests.at(-1)).toEqual({ kind: "set_holdings", symbol: "GE", weight: 1 });
	});

	it("retries the same day while the MACD is not ready", async () => {
		const { host, strategy } = await setup();
		macdMock.mockReturnValueOnce(histogram(null)).mockReturnValueOnce(histogram(-1));

		await strategy.onData(sliceAt(nyTime(6, 9, 31)));
		await strategy.onData(sliceAt(nyTime(6, 9, 32)));

		expect(macdMock).toHaveBeenCalledTimes(2);
		expect(host.logs).toEqual(["trend state 0 -> 0"]);
	});
});

describe("macd trend state config", () => {
	it("needs enough bars for the slow EMA and the signal line", () => {
		expect(() =>
			parseMacdTrendStateConfig({ symbol: "GE", historyBars: 30 }, "m.json")
		).toThrow("Field historyBars in m.json must be >= 34, got 30");
	});
});
