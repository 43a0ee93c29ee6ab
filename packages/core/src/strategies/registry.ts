import type { TradingAlgorithm } from "../host/types";
import { isStrategyId, type StrategyId } from "./ids";
import { dualThrustModule } from "./dual-thrust";
import { momentumRotationModule } from "./momentum-rotation";
import { priceCrossesMasModule } from "./price-crosses-mas";
import { macdTrendStateModule } from "./macd-trend-state";

export interface StrategyManifest {
	strategyId: StrategyId;
	name: string;
	description: string;
}

export interface StrategyRegistryEntry<TConfig = unknown> {
	id: StrategyId;
	manifest: StrategyManifest;
	defaultProfile: string;
	loadConfig(configPath?: string): TConfig;
	parseConfig(raw: unknown, source: string): TConfig;
	createStrategy(config: TConfig): TradingAlgorithm;
}

const STRATEGY_MODULES: StrategyRegistryEntry[] = [
	dualThrustModule,
	momentumRotationModule,
	priceCrossesMasModule,
	macdTrendStateModule,
];

let registryMapCache: Map<StrategyId, StrategyRegistryEntry> | null = null;

export function validateUniqueStrategyIds(
	entries: readonly StrategyRegistryEntry[]
): void {
	const seen = new Set<StrategyId>();
	for (const entry of entries) {
		if (seen.has(entry.id)) {
			throw new Error(
				`Duplicate strategy id detected: ${entry.id}. Strategy ids must be unique.`
			);
		}
		seen.add(entry.id);
	}
}

function getRegistryMap(): Map<StrategyId, StrategyRegistryEntry> {
	if (registryMapCache) {
		return registryMapCache;
	}
	validateUniqueStrategyIds(STRATEGY_MODULES);
	const entries = [...STRATEGY_MODULES].sort((a, b) => a.id.localeCompare(b.id));
	registryMapCache = new Map(entries.map((entry) => [entry.id, entry]));
	return registryMapCache;
}

export const getStrategyDefinition = (id: string): StrategyRegistryEntry => {
	const definition = isStrategyId(id) ? getRegistryMap().get(id) : undefined;
	if (!definition) {
		throw new Error(`Unknown strategy id: ${id}`);
	}
	return definition;
};

export const listStrategyDefinitions = (): StrategyRegistryEntry[] => [
	...getRegistryMap().values(),
];

export const getRegisteredStrategyIds = (): StrategyId[] =>
	listStrategyDefinitions().map((entry) => entry.id);

export const isRegisteredStrategyId = (value: unknown): value is StrategyId =>
	isStrategyId(value) && getRegistryMap().has(value);
