import fs from "node:fs";
import path from "node:path";

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["configs", ".git"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultEnvPath = (): string =>
	path.join(findWorkspaceRoot(), ".env");

export const getDefaultStrategyDir = (): string => {
	const override = process.env.STRATEGY_CONFIG_DIR?.trim();
	if (override) {
		return path.resolve(findWorkspaceRoot(), override);
	}
	return path.join(findWorkspaceRoot(), "configs");
};

export const resolveStrategyConfigPath = (
	strategyDir: string,
	strategyProfile: string
): string => {
	const profileName = strategyProfile.endsWith(".json")
		? strategyProfile
		: `${strategyProfile}.json`;
	const candidates = [
		path.join(strategyDir, "strategies", profileName),
		path.join(strategyDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new Error(
		`Strategy config not found. Looked for ${candidates.join(", ")}`
	);
};

export const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new Error(
			`Invalid JSON in ${filePath}: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};
