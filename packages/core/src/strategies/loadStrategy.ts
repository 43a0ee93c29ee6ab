import type { TradingAlgorithm } from "../host/types";
import { withConfigMetadata } from "../configMetadata";
import { getDefaultStrategyDir, resolveStrategyConfigPath } from "../configPaths";
import type { StrategyId } from "./ids";
import { resolveStrategyProfileName } from "./selection";
import {
	StrategyManifest,
	StrategyRegistryEntry,
	getStrategyDefinition,
} from "./registry";

export interface LoadStrategyOptions {
	strategyId: StrategyId;
	/** Raw profile object; parsed and validated by the strategy. */
	config?: unknown;
	configPath?: string;
	/** Profile name looked up under `strategyDir`; ignored when `configPath` is set. */
	profile?: string;
	strategyDir?: string;
}

export interface LoadedStrategyResult {
	id: StrategyId;
	manifest: StrategyManifest;
	config: unknown;
	strategy: TradingAlgorithm;
}

export const loadStrategy = (options: LoadStrategyOptions): LoadedStrategyResult => {
	const entry = getStrategyDefinition(options.strategyId);
	const config = resolveConfig(entry, options);
	return {
		id: entry.id,
		manifest: entry.manifest,
		config,
		strategy: entry.createStrategy(config),
	};
};

const resolveConfig = (
	entry: StrategyRegistryEntry,
	options: LoadStrategyOptions
): unknown => {
	if (options.config !== undefined) {
		const parsed = entry.parseConfig(options.config, `inline ${entry.id} config`);
		return typeof parsed === "object" && parsed !== null
			? withConfigMetadata(parsed, { source: "embedded" })
			: parsed;
	}
	if (options.configPath) {
		return entry.loadConfig(options.configPath);
	}
	const profile = resolveStrategyProfileName(options.strategyId, options.profile);
	const configPath = resolveStrategyConfigPath(
		options.strategyDir ?? getDefaultStrategyDir(),
		profile
	);
	const config = entry.loadConfig(configPath);
	return typeof config === "object" && config !== null
		? withConfigMetadata(config, { source: "file", path: configPath, profile })
		: config;
};
