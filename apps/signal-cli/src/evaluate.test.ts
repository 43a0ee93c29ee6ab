import type { Candle } from "@quantscripts/core";
import {
	CcxtMarketDataClient,
	JsonFileMarketDataClient,
	MarketDataClient,
} from "@quantscripts/data";
import { describe, expect, it } from "vitest";
import { buildEvaluateRequest, resolveStrategyId, runEvaluation } from "./evaluate";

const DAY_MS = 86_400_000;
const firstDay = Date.UTC(2018, 8, 3);

const bar = (
	timeframe: string,
	timestamp: number,
	high: number,
	low: number,
	close: number
): Candle => ({
	symbol: "NFLX",
	timeframe,
	timestamp,
	open: close,
	high,
	low,
	close,
	volume: 1_000,
});

class StaticClient implements MarketDataClient {
	constructor(private readonly candles: Candle[]) {}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<Candle[]> {
		return this.candles
			.filter(
				(candle) =>
					candle.symbol === symbol &&
					candle.timeframe === timeframe &&
					(since === undefined || candle.timestamp >= since)
			)
			.slice(0, limit);
	}
}

describe("runEvaluation", () => {
	it("evaluates the default dual thrust profile against a client", async () => {
		const client = new StaticClient([
			bar("1d", firstDay, 105, 95, 100),
			bar("1d", firstDay + DAY_MS, 110, 98, 108),
			bar("1d", firstDay + 2 * DAY_MS, 107, 99, 102),
			bar("1d", firstDay + 3 * DAY_MS, 104, 96, 101),
			bar("1h", Date.UTC(2018, 8, 7, 13, 30), 100, 100, 100),
		]);

		const evaluation = await runEvaluation({
			strategyId: "dual_thrust",
			client,
			asOf: Date.UTC(2018, 8, 7, 14, 30),
			portfolio: { cash: 10_000, positions: [] },
			fireScheduled: true,
		});

		expect(evaluation.orders).toEqual([{ kind: "set_holdings", symbol: "NFLX", weight: 0.8 }]);
		expect(evaluation.logs.map((entry) => entry.message)).toEqual([
			"open: 100 buy: 106.5 sell: 93.5",
		]);
	});
});

describe("buildEvaluateRequest", () => {
	it("reads every evaluate flag", () => {
		const request = buildEvaluateRequest(
			{
				strategy: "macd_trend_state",
				profile: "macd-trend-state",
				dataDir: "/tmp/candles",
				asOf: "2024-03-01T15:00:00Z",
				cash: "5000",
				skipScheduled: true,
			},
			{}
		);
		expect(request.strategyId).toBe("macd_trend_state");
		expect(request.profile).toBe("macd-trend-state");
		expect(request.configPath).toBeUndefined();
		expect(request.client).toBeInstanceOf(JsonFileMarketDataClient);
		expect(request.asOf).toBe(Date.UTC(2024, 2, 1, 15));
		expect(request.portfolio).toEqual({ cash: 5000, positions: [] });
		expect(request.fireScheduled).toBe(false);
	});

	it("falls back to the environment and the current time", () => {
		const request = buildEvaluateRequest(
			{},
			{ defaultStrategy: "momentum_rotation", dataExchange: "kraken" },
			1_700_000_000_000
		);
		expect(request.strategyId).toBe("momentum_rotation");
		expect(request.client).toBeInstanceOf(CcxtMarketDataClient);
		expect(request.asOf).toBe(1_700_000_000_000);
		expect(request.portfolio).toEqual({ cash: 100_000, positions: [] });
		expect(request.fireScheduled).toBe(true);
	});

	it("needs a data source", () => {
		expect(() => buildEvaluateRequest({ strategy: "dual_thrust" }, {})).toThrow(
			"No market data source configured: set a data directory or an exchange id"
		);
	});
});

describe("resolveStrategyId", () => {
	it("skips invalid values", () => {
		expect(resolveStrategyId("turtle", { defaultStrategy: "price_crosses_mas" })).toBe(
			"price_crosses_mas"
		);
		expect(resolveStrategyId(undefined, { defaultStrategy: "nope" })).toBe("dual_thrust");
		expect(resolveStrategyId(" MOMENTUM_ROTATION ", {})).toBe("momentum_rotation");
	});
});
