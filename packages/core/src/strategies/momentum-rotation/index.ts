import { getDefaultStrategyDir, readJsonFile, resolveStrategyConfigPath } from "../../configPaths";
import { withConfigMetadata } from "../../configMetadata";
import type { StrategyRegistryEntry } from "../registry";
import {
	MOMENTUM_ROTATION_ID,
	MomentumRotationConfig,
	momentumRotationManifest,
	parseMomentumRotationConfig,
} from "./config";
import { MomentumRotationStrategy } from "./MomentumRotationStrategy";

export {
	MomentumRotationStrategy,
	MOMENTUM_REBALANCE_EVENT,
} from "./MomentumRotationStrategy";
export * from "./config";
export * from "./entryLogic";

const DEFAULT_PROFILE = "momentum-rotation";

export const loadMomentumRotationConfig = (
	configPath = resolveStrategyConfigPath(getDefaultStrategyDir(), DEFAULT_PROFILE)
): MomentumRotationConfig =>
	withConfigMetadata(
		parseMomentumRotationConfig(readJsonFile(configPath), configPath),
		{ source: "file", path: configPath }
	);

export const momentumRotationModule: StrategyRegistryEntry<MomentumRotationConfig> = {
	id: MOMENTUM_ROTATION_ID,
	manifest: momentumRotationManifest,
	defaultProfile: DEFAULT_PROFILE,
	loadConfig: loadMomentumRotationConfig,
	parseConfig: parseMomentumRotationConfig,
	createStrategy: (config) => new MomentumRotationStrategy(config),
};

export default momentumRotationModule;
