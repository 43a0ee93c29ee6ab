export type ArgValue = string | boolean;

export interface ParsedCliArgs {
	positionals: string[];
	flags: Record<string, ArgValue>;
}

export const parseCliArgs = (argv: string[]): ParsedCliArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			flags[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	return { positionals, flags };
};

export const readFlag = (flags: Record<string, ArgValue>, key: string): boolean => {
	const value = flags[key];
	return value === true || value === "true";
};

export const readStringFlag = (
	flags: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = flags[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`Missing value for --${key}`);
	}
	return value;
};

export const readNumberFlag = (
	flags: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const value = readStringFlag(flags, key);
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new Error(`Invalid numeric value for --${key}: ${value}`);
	}
	return num;
};

export const readTimestampFlag = (
	flags: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const value = readStringFlag(flags, key);
	if (value === undefined) {
		return undefined;
	}
	const ts = Date.parse(value);
	if (Number.isNaN(ts)) {
		throw new Error(`Invalid ${key} timestamp: ${value}`);
	}
	return ts;
};
