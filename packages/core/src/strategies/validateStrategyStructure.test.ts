import os from "node:os";
import path from "node:path";
import fs from "node:fs";
import { afterEach, describe, expect, it } from "vitest";
import { validateStrategyStructure } from "./validateStrategyStructure";

const tempDirs: string[] = [];

const makeTempDir = (): string => {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "strategy-structure-"));
	tempDirs.push(dir);
	return dir;
};

afterEach(() => {
	for (const dir of tempDirs.splice(0)) {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

describe("validateStrategyStructure", () => {
	it("accepts the registered strategy folders and profiles", () => {
		const summary = validateStrategyStructure();
		expect(summary.ok).toBe(true);
		expect(summary.results.map((result) => result.folderName)).toEqual([
			"dual-thrust",
			"macd-trend-state",
			"momentum-rotation",
			"price-crosses-mas",
		]);
		expect(summary.results.every((result) => result.profileError === null)).toBe(true);
	});

	it("reports missing folders and files", () => {
		const dir = makeTempDir();
		fs.mkdirSync(path.join(dir, "dual-thrust"));
		fs.writeFileSync(path.join(dir, "dual-thrust", "index.ts"), "");

		const summary = validateStrategyStructure({ strategiesDir: dir });
		const dualThrust = summary.results.find((result) => result.id === "dual_thrust");
		const momentum = summary.results.find((result) => result.id === "momentum_rotation");

		expect(summary.ok).toBe(false);
		expect(dualThrust?.missingFiles).toEqual(["config.ts", "entryLogic.ts"]);
		expect(momentum?.directoryExists).toBe(false);
		expect(momentum?.missingFiles).toEqual(["config.ts", "entryLogic.ts", "index.ts"]);
	});

	it("reports a default profile that does not resolve", () => {
		const configDir = makeTempDir();
		const summary = validateStrategyStructure({ configDir });
		const dualThrust = summary.results.find((result) => result.id === "dual_thrust");

		expect(summary.ok).toBe(false);
		expect(dualThrust?.profileError).toBe(
			`Strategy config not found. Looked for ${path.join(
				configDir,
				"strategies",
				"dual-thrust.json"
			)}, ${path.join(configDir, "dual-thrust.json")}`
		);
	});
});
