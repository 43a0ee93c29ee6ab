import { StrategyId, isStrategyId } from "./ids";
import { getStrategyDefinition } from "./registry";

export type StrategySelectionSource = "cli" | "env";

export interface StrategySelectionInput {
	requestedValue?: string;
	envValue?: string;
	defaultStrategyId: StrategyId;
}

export interface StrategySelectionResult {
	resolvedStrategyId: StrategyId;
	source: StrategySelectionSource | "default";
	invalidSources: { source: StrategySelectionSource; value: string }[];
}

/** Trimmed and lower-cased; blank input counts as absent. */
export const normalizeStrategyInput = (value?: string): string | undefined => {
	const normalized = value?.trim().toLowerCase();
	return normalized ? normalized : undefined;
};

/**
 * Command line first, then environment, then the default. Values that name
 * no registered strategy are reported and skipped.
 */
export const resolveStrategySelection = (
	input: StrategySelectionInput
): StrategySelectionResult => {
	const candidates: [StrategySelectionSource, string | undefined][] = [
		["cli", input.requestedValue],
		["env", input.envValue],
	];
	const invalidSources: StrategySelectionResult["invalidSources"] = [];
	let selected: { id: StrategyId; source: StrategySelectionSource } | undefined;

	for (const [source, raw] of candidates) {
		const value = normalizeStrategyInput(raw);
		if (!value) {
			continue;
		}
		if (!isStrategyId(value)) {
			invalidSources.push({ source, value });
			continue;
		}
		if (!selected) {
			selected = { id: value, source };
		}
	}

	return {
		resolvedStrategyId: selected ? selected.id : input.defaultStrategyId,
		source: selected ? selected.source : "default",
		invalidSources,
	};
};

/** The explicit profile when given, else the strategy's registered default. */
export const resolveStrategyProfileName = (
	strategyId: StrategyId,
	overrideProfile?: string
): string => overrideProfile?.trim() || getStrategyDefinition(strategyId).defaultProfile;
