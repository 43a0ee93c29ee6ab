import { describe, expect, it } from "vitest";
import type { Candle } from "../../types";
import { FakeHost, makeBar } from "../__tests__/fakeHost";
import {
	DUAL_THRUST_ID,
	DualThrustConfig,
	DualThrustStrategy,
	computeThrustRange,
	computeTriggers,
	decideDualThrust,
	loadDualThrustConfig,
	parseDualThrustConfig,
} from "./index";

const DAY_MS = 86_400_000;
const start = Date.UTC(2018, 8, 3, 13, 30);

const dailyBar = (index: number, high: number, low: number, close: number): Candle =>
	makeBar("NFLX", start + index * DAY_MS, close, {
		timeframe: "1d",
		open: close,
		high,
		low,
	});

const dailyBars: Candle[] = [
	dailyBar(0, 105, 95, 100),
	dailyBar(1, 110, 98, 108),
	dailyBar(2, 107, 99, 102),
	dailyBar(3, 104, 96, 101),
];

const createConfig = (overrides: Partial<DualThrustConfig> = {}): DualThrustConfig => ({
	id: DUAL_THRUST_ID,
	name: "Test Dual Thrust",
	symbol: "NFLX",
	resolution: "hour",
	lookbackDays: 4,
	k1: 0.5,
	k2: 0.5,
	targetWeight: 0.8,
	entryMode: "sell_trigger_pivot",
	...overrides,
});

const sliceAt = (close: number) => ({
	time: start + 4 * DAY_MS,
	bars: new Map([["NFLX", makeBar("NFLX", start + 4 * DAY_MS, close)]]),
});

const setup = async (
	config: DualThrustConfig,
	options: { quantity?: number; warmingUp?: boolean } = {}
) => {
	const host = new FakeHost({
		warmingUp: options.warmingUp,
		positions: { NFLX: { quantity: options.quantity ?? 0, price: 100 } },
		history: { NFLX: dailyBars },
	});
	const strategy = new DualThrustStrategy(config);
	await strategy.initialize(host);
	return { host, strategy };
};

describe("dual thrust range and triggers", () => {
	it("picks the wider of HH - LC and HC - LL", () => {
		expect(computeThrustRange(dailyBars)).toEqual({
			highestHigh: 110,
			highestClose: 108,
			lowestClose: 100,
			lowestLow: 95,
			range: 13,
		});
	});

	it("returns null without bars or a positive open", () => {
		expect(computeThrustRange([])).toBeNull();
		expect(computeTriggers(0, 13, 0.5, 0.5)).toBeNull();
	});

	it("places triggers k * range around the open", () => {
		expect(computeTriggers(100, 13, 0.5, 0.5)).toEqual({
			currentOpen: 100,
			range: 13,
			sellTrigger: 93.5,
			buyTrigger: 106.5,
		});
	});
});

describe("dual thrust decisions", () => {
	const triggers = { currentOpen: 100, range: 13, sellTrigger: 93.5, buyTrigger: 106.5 };

	it("goes long at or above the sell trigger in pivot mode", () => {
		expect(decideDualThrust(93.5, 0, triggers, "sell_trigger_pivot", 0.8)).toEqual({
			side: "LONG",
			reason: "price_at_or_above_sell_trigger",
			actions: [{ kind: "set_holdings", weight: 0.8 }],
		});
		expect(decideDualThrust(95, -10, triggers, "sell_trigger_pivot", 0.8).actions).toEqual([
			{ kind: "liquidate" },
			{ kind: "set_holdings", weight: 0.8 },
		]);
	});

	it("goes short below the sell trigger in pivot mode", () => {
		expect(decideDualThrust(90, 10, triggers, "sell_trigger_pivot", 0.8).actions).toEqual([
			{ kind: "liquidate" },
			{ kind: "set_holdings", weight: -0.8 },
		]);
		expect(decideDualThrust(90, -10, triggers, "sell_trigger_pivot", 0.8).actions).toEqual([
			{ kind: "set_holdings", weight: -0.8 },
		]);
	});

	it("waits inside the band in breakout mode", () => {
		expect(decideDualThrust(100, 0, triggers, "breakout", 0.8)).toEqual({
			side: "NONE",
			reason: "inside_trigger_band",
			actions: [],
		});
		expect(decideDualThrust(90, -10, triggers, "breakout", 0.8).side).toBe("NONE");
	});

	it("trades the breakouts in breakout mode", () => {
		expect(decideDualThrust(107, -10, triggers, "breakout", 0.8).actions).toEqual([
			{ kind: "liquidate" },
			{ kind: "set_holdings", weight: 0.8 },
		]);
		expect(decideDualThrust(90, 0, triggers, "breakout", 0.8)).toEqual({
			side: "SHORT",
			reason: "price_below_sell_trigger",
			actions: [
				{ kind: "liquidate" },
				{ kind: "set_holdings", weight: -0.8 },
			],
		});
	});
});

describe("DualThrustStrategy", () => {
	it("subscribes and schedules the daily signal", async () => {
		const { host } = await setup(createConfig());
		expect(host.subscriptions).toEqual([{ symbol: "NFLX", resolution: "hour" }]);
		expect(host.scheduled).toHaveLength(1);
		expect(host.scheduled[0].name).toBe("dual_thrust_signal");
		expect(host.scheduled[0].dateRule).toEqual({ kind: "every_day", symbol: "NFLX" });
		expect(host.scheduled[0].timeRule).toEqual({
			kind: "after_market_open",
			symbol: "NFLX",
			minutes: 0,
		});
	});

	it("computes triggers from daily history when the schedule fires", async () => {
		const { host, strategy } = await setup(createConfig());
		await host.scheduled[0].callback();
		expect(host.historyCalls).toEqual([{ symbol: "NFLX", bars: 4, resolution: "daily" }]);
		expect(strategy.getTriggers()).toEqual({
			currentOpen: 100,
			range: 13,
			sellTrigger: 93.5,
			buyTrigger: 106.5,
		});
	});

	it("does nothing before triggers exist", async () => {
		const { host, strategy } = await setup(createConfig());
		await strategy.onData(sliceAt(95));
		expect(host.requests).toEqual([]);
		expect(host.logs).toEqual([]);
	});

	it("orders and logs the triggers on each bar", async () => {
		const { host, strategy } = await setup(createConfig());
		await strategy.setSignal();
		await strategy.onData(sliceAt(95));
		expect(host.requests).toEqual([{ kind: "set_holdings", symbol: "NFLX", weight: 0.8 }]);
		expect(host.logs).toEqual(["open: 100 buy: 106.5 sell: 93.5"]);
	});

	it("liquidates before shorting from a flat book", async () => {
		const { host, strategy } = await setup(createConfig());
		await strategy.setSignal();
		await strategy.onData(sliceAt(90));
		expect(host.requests).toEqual([
			{ kind: "liquidate", symbol: "NFLX" },
			{ kind: "set_holdings", symbol: "NFLX", weight: -0.8 },
		]);
	});

	it("skips bars while warming up", async () => {
		const { host, strategy } = await setup(createConfig(), { warmingUp: true });
		await strategy.setSignal();
		await strategy.onData(sliceAt(95));
		expect(host.requests).toEqual([]);
	});

	it("refuses to run before initialize", async () => {
		const strategy = new DualThrustStrategy(createConfig());
		await expect(strategy.onData(sliceAt(95))).rejects.toThrow(
			"Strategy dual_thrust used before initialize() attached a host"
		);
	});
});

describe("dual thrust config", () => {
	it("fills defaults for omitted fields", () => {
		expect(parseDualThrustConfig({ symbol: "NFLX" }, "dt.json")).toEqual({
			id: "dual_thrust",
			name: "Dual Thrust",
			symbol: "NFLX",
			resolution: "hour",
			lookbackDays: 4,
			k1: 0.5,
			k2: 0.5,
			targetWeight: 0.8,
			entryMode: "sell_trigger_pivot",
		});
	});

	it("rejects unknown entry modes", () => {
		expect(() =>
			parseDualThrustConfig({ symbol: "NFLX", entryMode: "fade" }, "dt.json")
		).toThrow("Field entryMode in dt.json must be one of sell_trigger_pivot, breakout, got fade");
	});

	it("loads the default profile", () => {
		const config = loadDualThrustConfig();
		expect(config.symbol).toBe("NFLX");
		expect(config.entryMode).toBe("sell_trigger_pivot");
	});
});
