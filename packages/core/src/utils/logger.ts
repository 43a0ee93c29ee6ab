export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

interface LoggerSettings {
	minLevel: LogLevel;
	pretty: boolean;
	json: boolean;
	moduleFilter: Set<string> | null;
}

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

/** Environment is read lazily so a `.env` loaded at startup still applies. */
const readSettings = (): LoggerSettings => {
	const pretty =
		process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		pretty,
		json: process.env.LOG_JSON === "true" || !pretty,
		moduleFilter: parseModuleFilter(process.env.LOG_MODULE),
	};
};

const shouldLog = (
	settings: LoggerSettings,
	level: LogLevel,
	moduleName: string
): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.moduleFilter && !settings.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const settings = readSettings();
	if (!shouldLog(settings, payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

export const sanitize = (payload: BaseLogPayload): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const cleaned = sanitizeValue(payload, seen);
	return isPlainRecord(cleaned) ? cleaned : { value: cleaned };
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Map) {
		return sanitizeValue(Object.fromEntries(value), seen);
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (isPlainRecord(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "order_request": {
			printOrderRequest(rest);
			break;
		}
		case "evaluation_summary": {
			printEvaluationSummary(rest);
			break;
		}
		case "strategy_log": {
			if (typeof rest.message === "string") {
				console.log(`  ${rest.message}`);
			}
			break;
		}
		default:
			break;
	}
}

const pickColumns = (
	rest: Record<string, unknown>,
	columns: readonly string[]
): Record<string, unknown> =>
	Object.fromEntries(columns.map((column) => [column, rest[column]]));

const ORDER_REQUEST_COLUMNS = [
	"label",
	"kind",
	"symbol",
	"weight",
	"quantity",
	"stopPrice",
	"orderId",
] as const;

const EVALUATION_SUMMARY_COLUMNS = [
	"strategyId",
	"asOf",
	"subscriptions",
	"scheduled",
	"orders",
] as const;

const printOrderRequest = (rest: Record<string, unknown>): void => {
	console.table([pickColumns(rest, ORDER_REQUEST_COLUMNS)]);
};

const printEvaluationSummary = (rest: Record<string, unknown>): void => {
	console.table([pickColumns(rest, EVALUATION_SUMMARY_COLUMNS)]);
};
