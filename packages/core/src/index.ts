/**
 * Shared contracts for quantscripts: candles and time helpers, the host
 * contract strategies run against, configuration, logging and the strategy
 * registry.
 */
export * from "./types";
export * from "./host";
export * from "./exchange";
export * from "./config";
export {
	getWorkspaceRoot,
	getDefaultEnvPath,
	getDefaultStrategyDir,
	resolveStrategyConfigPath,
	readJsonFile,
} from "./configPaths";
export { createLogger, log, normalizeLevel, sanitize } from "./utils/logger";
export type { BaseLogPayload, LogLevel, ModuleLogger } from "./utils/logger";

export { STRATEGY_IDS, isStrategyId } from "./strategies/ids";
export {
	getStrategyDefinition,
	listStrategyDefinitions,
	getRegisteredStrategyIds,
	isRegisteredStrategyId,
	validateUniqueStrategyIds,
} from "./strategies/registry";
export type { StrategyManifest, StrategyRegistryEntry } from "./strategies/registry";
export { loadStrategy } from "./strategies/loadStrategy";
export type { LoadStrategyOptions, LoadedStrategyResult } from "./strategies/loadStrategy";
export {
	expectRecord,
	isRecord,
	readEnum,
	readNumber,
	readString,
	readStringArray,
} from "./strategies/configFields";
export type { NumberFieldOptions } from "./strategies/configFields";
export {
	normalizeStrategyInput,
	resolveStrategyProfileName,
	resolveStrategySelection,
} from "./strategies/selection";
export type {
	StrategySelectionInput,
	StrategySelectionResult,
	StrategySelectionSource,
} from "./strategies/selection";
export { validateStrategyStructure } from "./strategies/validateStrategyStructure";
export type {
	StrategyStructureCheck,
	StrategyStructureOptions,
	StrategyStructureSummary,
} from "./strategies/validateStrategyStructure";

export * from "./strategies/dual-thrust";
export * from "./strategies/momentum-rotation";
export * from "./strategies/price-crosses-mas";
export * from "./strategies/macd-trend-state";
