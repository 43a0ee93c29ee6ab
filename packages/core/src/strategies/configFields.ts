/**
 * Field readers for strategy profiles. Every failure names the profile source
 * and the offending field so a bad JSON file is easy to locate.
 */

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const expectRecord = (
	raw: unknown,
	source: string
): Record<string, unknown> => {
	if (!isRecord(raw)) {
		throw new Error(`Strategy config ${source} must be a JSON object`);
	}
	return raw;
};

export interface NumberFieldOptions {
	fallback?: number;
	min?: number;
	max?: number;
	integer?: boolean;
}

export const readNumber = (
	raw: Record<string, unknown>,
	key: string,
	source: string,
	options: NumberFieldOptions = {}
): number => {
	const value = raw[key] ?? options.fallback;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`Required numeric field missing in ${source}: ${key}`);
	}
	if (options.integer && !Number.isInteger(value)) {
		throw new Error(`Field ${key} in ${source} must be an integer, got ${value}`);
	}
	if (options.min !== undefined && value < options.min) {
		throw new Error(
			`Field ${key} in ${source} must be >= ${options.min}, got ${value}`
		);
	}
	if (options.max !== undefined && value > options.max) {
		throw new Error(
			`Field ${key} in ${source} must be <= ${options.max}, got ${value}`
		);
	}
	return value;
};

export const readString = (
	raw: Record<string, unknown>,
	key: string,
	source: string,
	fallback?: string
): string => {
	const value = raw[key] ?? fallback;
	if (typeof value !== "string" || !value.trim()) {
		throw new Error(`Required string field missing in ${source}: ${key}`);
	}
	return value.trim();
};

export const readEnum = <T extends string>(
	raw: Record<string, unknown>,
	key: string,
	source: string,
	allowed: readonly T[],
	fallback: T
): T => {
	const value = raw[key] ?? fallback;
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) {
		throw new Error(
			`Field ${key} in ${source} must be one of ${allowed.join(", ")}, got ${String(
				value
			)}`
		);
	}
	return match;
};

export const readStringArray = (
	raw: Record<string, unknown>,
	key: string,
	source: string
): string[] => {
	const value = raw[key];
	if (!Array.isArray(value) || value.length === 0) {
		throw new Error(`Field ${key} in ${source} must be a non-empty array`);
	}
	const items = value.map((item, index) => {
		if (typeof item !== "string" || !item.trim()) {
			throw new Error(`Field ${key}[${index}] in ${source} must be a string`);
		}
		return item.trim();
	});
	const duplicate = items.find((item, index) => items.indexOf(item) !== index);
	if (duplicate) {
		throw new Error(`Field ${key} in ${source} lists ${duplicate} twice`);
	}
	return items;
};
