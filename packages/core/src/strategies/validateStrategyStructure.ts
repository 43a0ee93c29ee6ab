import fs from "node:fs";
import path from "node:path";
import { getDefaultStrategyDir, resolveStrategyConfigPath } from "../configPaths";
import { createLogger } from "../utils/logger";
import { StrategyId } from "./ids";
import { StrategyRegistryEntry, listStrategyDefinitions } from "./registry";

const REQUIRED_FILES = ["config.ts", "entryLogic.ts", "index.ts"];

export interface StrategyStructureCheck {
	id: StrategyId;
	folderName: string;
	directoryExists: boolean;
	missingFiles: string[];
	manifestMatchesId: boolean;
	/** Null when the default profile resolves to a file. */
	profileError: string | null;
	ok: boolean;
}

export interface StrategyStructureSummary {
	ok: boolean;
	results: StrategyStructureCheck[];
}

export interface StrategyStructureOptions {
	strategiesDir?: string;
	configDir?: string;
}

/**
 * Every registered strategy lives in a kebab-case folder beside this file
 * with its config, entry logic and registry entry, and ships a default
 * profile that resolves under the config directory.
 */
export const validateStrategyStructure = (
	options: StrategyStructureOptions = {}
): StrategyStructureSummary => {
	const strategiesDir = options.strategiesDir ?? __dirname;
	const configDir = options.configDir ?? getDefaultStrategyDir();
	const results = listStrategyDefinitions().map((entry) =>
		checkEntry(entry, strategiesDir, configDir)
	);
	return {
		ok: results.every((result) => result.ok),
		results,
	};
};

const checkProfile = (configDir: string, profile: string): string | null => {
	try {
		resolveStrategyConfigPath(configDir, profile);
		return null;
	} catch (error) {
		return error instanceof Error ? error.message : String(error);
	}
};

const checkEntry = (
	entry: StrategyRegistryEntry,
	strategiesDir: string,
	configDir: string
): StrategyStructureCheck => {
	const folderName = entry.id.replace(/_/g, "-");
	const strategyDir = path.join(strategiesDir, folderName);
	const directoryExists = fs.existsSync(strategyDir);
	const missingFiles = REQUIRED_FILES.filter(
		(file) => !directoryExists || !fs.existsSync(path.join(strategyDir, file))
	);
	const manifestMatchesId = entry.manifest.strategyId === entry.id;
	const profileError = checkProfile(configDir, entry.defaultProfile);
	return {
		id: entry.id,
		folderName,
		directoryExists,
		missingFiles,
		manifestMatchesId,
		profileError,
		ok: directoryExists && !missingFiles.length && manifestMatchesId && profileError === null,
	};
};

if (require.main === module) {
	const logger = createLogger("strategy-structure");
	const summary = validateStrategyStructure();
	for (const result of summary.results) {
		if (!result.ok) {
			logger.error("strategy_structure_invalid", { ...result });
		}
	}
	if (!summary.ok) {
		process.exit(1);
	}
	logger.info("strategy_structure_valid", { strategies: summary.results.length });
}
