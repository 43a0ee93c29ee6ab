import fs from "node:fs";
import dotenv from "dotenv";

import type { StrategyId } from "./strategies/ids";
import { getStrategyDefinition } from "./strategies/registry";
import { isRecord } from "./strategies/configFields";
import { withConfigMetadata } from "./configMetadata";
import {
	getDefaultEnvPath,
	getDefaultStrategyDir,
	readJsonFile,
	resolveStrategyConfigPath,
} from "./configPaths";

export type { StrategyId } from "./strategies/ids";
export {
	withConfigMetadata,
	getConfigMetadata,
} from "./configMetadata";
export type { ConfigMetadata, ConfigSourceType } from "./configMetadata";

export interface StrategyConfig {
	id: StrategyId;
	[key: string]: unknown;
}

export interface EnvConfig {
	defaultStrategy?: string;
	dataDir?: string;
	dataExchange?: string;
	strategyConfigDir?: string;
}

let loadedEnvPath: string | undefined;

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (loadedEnvPath !== envPath && fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}

	return {
		defaultStrategy: readOptionalEnvVar("DEFAULT_STRATEGY"),
		dataDir: readOptionalEnvVar("DATA_DIR"),
		dataExchange: readOptionalEnvVar("DATA_EXCHANGE"),
		strategyConfigDir: readOptionalEnvVar("STRATEGY_CONFIG_DIR"),
	};
};

/**
 * Reads a strategy profile and checks that it names a registered strategy.
 * Field-level validation belongs to the strategy's own config parser.
 */
export const loadStrategyConfig = (
	strategyDir = getDefaultStrategyDir(),
	strategyProfile = "dual-thrust"
): StrategyConfig => {
	const strategyPath = resolveStrategyConfigPath(strategyDir, strategyProfile);
	const file = readJsonFile(strategyPath);
	if (!isRecord(file) || typeof file.id !== "string" || !file.id) {
		throw new Error(
			`Strategy config at ${strategyPath} must include an "id" property.`
		);
	}
	const definition = getStrategyDefinition(file.id);
	return withConfigMetadata(
		{
			...file,
			id: definition.id,
		},
		{
			source: "file",
			path: strategyPath,
			profile: strategyProfile,
		}
	);
};
