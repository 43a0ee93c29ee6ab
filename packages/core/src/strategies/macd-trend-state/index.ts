import { getDefaultStrategyDir, readJsonFile, resolveStrategyConfigPath } from "../../configPaths";
import { withConfigMetadata } from "../../configMetadata";
import type { StrategyRegistryEntry } from "../registry";
import {
	MACD_TREND_STATE_ID,
	MacdTrendStateConfig,
	macdTrendStateManifest,
	parseMacdTrendStateConfig,
} from "./config";
import { MacdTrendStateStrategy } from "./MacdTrendStateStrategy";

export { MacdTrendStateStrategy } from "./MacdTrendStateStrategy";
export * from "./config";
export * from "./entryLogic";

const DEFAULT_PROFILE = "macd-trend-state";

export const loadMacdTrendStateConfig = (
	configPath = resolveStrategyConfigPath(getDefaultStrategyDir(), DEFAULT_PROFILE)
): MacdTrendStateConfig =>
	withConfigMetadata(parseMacdTrendStateConfig(readJsonFile(configPath), configPath), {
		source: "file",
		path: configPath,
	});

export const macdTrendStateModule: StrategyRegistryEntry<MacdTrendStateConfig> = {
	id: MACD_TREND_STATE_ID,
	manifest: macdTrendStateManifest,
	defaultProfile: DEFAULT_PROFILE,
	loadConfig: loadMacdTrendStateConfig,
	parseConfig: parseMacdTrendStateConfig,
	createStrategy: (config) => new MacdTrendStateStrategy(config),
};

export default macdTrendStateModule;
