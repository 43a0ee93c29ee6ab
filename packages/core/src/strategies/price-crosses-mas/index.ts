import { getDefaultStrategyDir, readJsonFile, resolveStrategyConfigPath } from "../../configPaths";
import { withConfigMetadata } from "../../configMetadata";
import type { StrategyRegistryEntry } from "../registry";
import {
	PRICE_CROSSES_MAS_ID,
	PriceCrossesMasConfig,
	parsePriceCrossesMasConfig,
	priceCrossesMasManifest,
} from "./config";
import { PriceCrossesMasStrategy } from "./PriceCrossesMasStrategy";

export { PriceCrossesMasStrategy } from "./PriceCrossesMasStrategy";
export * from "./config";
export * from "./entryLogic";

const DEFAULT_PROFILE = "price-crosses-mas";

export const loadPriceCrossesMasConfig = (
	configPath = resolveStrategyConfigPath(getDefaultStrategyDir(), DEFAULT_PROFILE)
): PriceCrossesMasConfig =>
	withConfigMetadata(parsePriceCrossesMasConfig(readJsonFile(configPath), configPath), {
		source: "file",
		path: configPath,
	});

export const priceCrossesMasModule: StrategyRegistryEntry<PriceCrossesMasConfig> = {
	id: PRICE_CROSSES_MAS_ID,
	manifest: priceCrossesMasManifest,
	defaultProfile: DEFAULT_PROFILE,
	loadConfig: loadPriceCrossesMasConfig,
	parseConfig: parsePriceCrossesMasConfig,
	createStrategy: (config) => new PriceCrossesMasStrategy(config),
};

export default priceCrossesMasModule;
