export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

export interface LoggerSettings {
	minLevel: LogLevel;
	pretty: boolean;
	json: boolean;
	/** Only these modules log when set. */
	modules: ReadonlySet<string> | null;
	/** Receives each rendered line. Defaults to stderr so stdout stays free for reports. */
	write: (line: string) => void;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): ReadonlySet<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

const writeStderr = (line: string): void => {
	process.stderr.write(`${line}\n`);
};

/** Settings as LOG_LEVEL, LOG_PRETTY, LOG_JSON and LOG_MODULE describe them. */
export const readLoggerSettings = (
	env: NodeJS.ProcessEnv = process.env
): LoggerSettings => {
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(env.LOG_LEVEL),
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
		modules: parseModuleFilter(env.LOG_MODULE),
		write: writeStderr,
	};
};

let settings: LoggerSettings | null = null;

const currentSettings = (): LoggerSettings => {
	settings ??= readLoggerSettings();
	return settings;
};

/**
 * Replace the active settings. Call with no argument after a .env file has
 * been loaded to pick up its LOG_* values.
 */
export const configureLogging = (overrides: Partial<LoggerSettings> = {}): void => {
	settings = { ...readLoggerSettings(), ...overrides };
};

const shouldLog = (
	active: LoggerSettings,
	level: LogLevel,
	moduleName: string
): boolean => {
	if (LEVELS[level] < LEVELS[active.minLevel]) {
		return false;
	}
	return !active.modules || active.modules.has(moduleName);
};

export function log(payload: BaseLogPayload): void {
	const active = currentSettings();
	if (!shouldLog(active, payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (active.pretty) {
		active.write(formatPretty(base));
	}

	if (active.json) {
		try {
			active.write(JSON.stringify(sanitize(base)));
		} catch (err) {
			active.write(
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

export const createLogger = (moduleName: string): ModuleLogger => {
	const emit = (
		level: LogLevel,
		event: string,
		data: Record<string, unknown> = {}
	): void => log({ ...data, level, event, module: moduleName });
	return {
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
	};
};

export const sanitize = (payload: BaseLogPayload): Record<string, unknown> => {
	const clean = sanitizeValue(payload, new WeakSet<object>());
	return isPlainRecord(clean) ? clean : {};
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
	// JSON would turn NaN into null; returns and ratios are often NaN here.
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value) || isPlainRecord(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone = Array.isArray(value)
			? value.map((item) => sanitizeValue(item, seen))
			: Object.fromEntries(
					Object.entries(value).map(([key, nested]) => [
						key,
						sanitizeValue(nested, seen),
					])
				);
		seen.delete(value);
		return clone;
	}
	return value;
};

const formatPretty = (base: BaseLogPayload): string => {
	const { level, event, module, ts, ...rest } = base;
	const clean = sanitizeValue(rest, new WeakSet());
	const fields = Object.entries(isPlainRecord(clean) ? clean : {})
		.map(([key, value]) =>
			`${key}=${typeof value === "string" ? value : JSON.stringify(value)}`
		)
		.join(" ");
	return `[${ts}] [${level.toUpperCase()}] ${module}:${event}${
		fields ? ` ${fields}` : ""
	}`;
};
