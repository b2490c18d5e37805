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

const normalizeLevel = (value?: string): LogLevel => {
	const normalized = value?.toLowerCase() ?? "info";
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): ReadonlySet<string> | null => {
	const entries = (raw ?? "")
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

const minLevel = normalizeLevel(process.env.LOG_LEVEL);
const moduleFilter = parseModuleFilter(process.env.LOG_MODULE);
const prettyEnabled = process.env.LOG_PRETTY === "true";

const shouldLog = (level: LogLevel, moduleName: string): boolean =>
	LEVELS[level] >= LEVELS[minLevel] && (!moduleFilter || moduleFilter.has(moduleName));

/** Errors and dates become plain data; repeated references print as [circular]. */
const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (!value || typeof value !== "object") {
		return value;
	}
	if (seen.has(value)) {
		return "[circular]";
	}
	seen.add(value);
	const clean = Array.isArray(value)
		? value.map((item) => sanitizeValue(item, seen))
		: Object.fromEntries(
				Object.entries(value).map(([key, nested]) => [key, sanitizeValue(nested, seen)])
			);
	seen.delete(value);
	return clean;
};

const renderField = (value: unknown): string =>
	typeof value === "string" ? value : JSON.stringify(value);

/**
 * One output line: JSON by default, `[ts] LEVEL module:event key=value ...`
 * when pretty.
 */
export const formatLogLine = (payload: BaseLogPayload, pretty: boolean): string => {
	const { level, event, module, ts, ...fields } = payload;
	const stamp = ts ?? new Date().toISOString();
	const clean = sanitizeValue(fields, new WeakSet());
	const data: Array<[string, unknown]> =
		clean && typeof clean === "object" ? Object.entries(clean) : [];
	if (!pretty) {
		return JSON.stringify({ ts: stamp, level, event, module, ...Object.fromEntries(data) });
	}
	const rendered = data.map(([key, value]) => `${key}=${renderField(value)}`);
	return [`[${stamp}]`, level.toUpperCase(), `${module}:${event}`, ...rendered].join(" ");
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	try {
		console.log(formatLogLine(payload, prettyEnabled));
	} catch (error) {
		console.log(
			JSON.stringify({
				level: "error",
				event: "logging_error",
				module: "logger",
				error: error instanceof Error ? error.message : "serialization_failed",
			})
		);
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => {
	const write = (level: LogLevel, event: string, data?: Record<string, unknown>) =>
		log({ ...(data ?? {}), level, event, module: moduleName });
	return {
		log: write,
		debug: (event, data) => write("debug", event, data),
		info: (event, data) => write("info", event, data),
		warn: (event, data) => write("warn", event, data),
		error: (event, data) => write("error", event, data),
	};
};
