import { getDefaultStrategyDir, readJsonFile, resolveStrategyConfigPath } from "../../configPaths";
import { withConfigMetadata } from "../../configMetadata";
import type { StrategyRegistryEntry } from "../registry";
import {
	DUAL_THRUST_ID,
	DualThrustConfig,
	dualThrustManifest,
	parseDualThrustConfig,
} from "./config";
import { DualThrustStrategy } from "./DualThrustStrategy";

export { DualThrustStrategy, DUAL_THRUST_SIGNAL_EVENT } from "./DualThrustStrategy";
export * from "./config";
export * from "./entryLogic";

const DEFAULT_PROFILE = "dual-thrust";

export const loadDualThrustConfig = (
	configPath = resolveStrategyConfigPath(getDefaultStrategyDir(), DEFAULT_PROFILE)
): DualThrustConfig =>
	withConfigMetadata(parseDualThrustConfig(readJsonFile(configPath), configPath), {
		source: "file",
		path: configPath,
	});

export const dualThrustModule: StrategyRegistryEntry<DualThrustConfig> = {
	id: DUAL_THRUST_ID,
	manifest: dualThrustManifest,
	defaultProfile: DEFAULT_PROFILE,
	loadConfig: loadDualThrustConfig,
	parseConfig: parseDualThrustConfig,
	createStrategy: (config) => new DualThrustStrategy(config),
};

export default dualThrustModule;
