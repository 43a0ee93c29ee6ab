import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { getConfigMetadata, loadEnvConfig, loadStrategyConfig } from "./config";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");
const ENV_KEYS = ["DEFAULT_STRATEGY", "DATA_DIR", "DATA_EXCHANGE", "STRATEGY_CONFIG_DIR"];

describe("loadStrategyConfig", () => {
	it("throws when the config file omits an id", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "missing-id")).toThrowError(
			/must include an "id"/i
		);
	});

	it("throws when the config file references an unknown strategy id", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "unknown-id")).toThrowError(
			"Unknown strategy id: turtle_breakout"
		);
	});

	it("names every path it tried for a missing profile", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "absent")).toThrowError(
			`Strategy config not found. Looked for ${path.join(
				FIXTURE_DIR,
				"strategies",
				"absent.json"
			)}, ${path.join(FIXTURE_DIR, "absent.json")}`
		);
	});

	it("loads a registered profile with its source attached", () => {
		const config = loadStrategyConfig(undefined, "momentum-rotation");
		expect(config.id).toBe("momentum_rotation");
		expect(getConfigMetadata(config)).toMatchObject({
			source: "file",
			profile: "momentum-rotation",
		});
		expect(Object.keys(config)).not.toContain("source");
	});
});

describe("loadEnvConfig", () => {
	const saved = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

	afterEach(() => {
		for (const [key, value] of saved) {
			if (value === undefined) {
				delete process.env[key];
			} else {
				process.env[key] = value;
			}
		}
	});

	it("reads trimmed values and drops blanks", () => {
		process.env.DEFAULT_STRATEGY = " momentum_rotation ";
		process.env.DATA_DIR = "";
		process.env.DATA_EXCHANGE = "kraken";
		delete process.env.STRATEGY_CONFIG_DIR;

		expect(loadEnvConfig(path.join(FIXTURE_DIR, "no-such.env"))).toEqual({
			defaultStrategy: "momentum_rotation",
			dataDir: undefined,
			dataExchange: "kraken",
			strategyConfigDir: undefined,
		});
	});
});
