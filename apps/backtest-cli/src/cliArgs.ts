import type { EnvConfig, RotationConfig } from "@gold-rotation/core";
import { ConfigError } from "@gold-rotation/core";
import type { InstrumentType } from "@gold-rotation/data";

export type ArgValue = string | boolean;
export type ArgMap = Record<string, ArgValue>;

export const DEFAULT_START_DATE = "2015-01-01";

export const USAGE = `Usage:
  npm run backtest -- [start] [end] [options]

Options (all optional):
  --start <YYYY-MM-DD>     First day of the backtest (default ${DEFAULT_START_DATE})
  --end <YYYY-MM-DD>       Last day of the backtest (default today)
  --equity <code>          A-share ETF or index code, e.g. 510300 or 000300.SH
  --etf | --index          Override ETF/index detection for --equity
  --lookback <days>        Momentum lookback in observations
  --rebalance <mode>       daily | weekly | monthly
  --fee <bps>              One-way cost per position change, in basis points
  --alignment <mode>       ffill | inner
  --profile <name>         Rotation profile under config/rotation (default "default")
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --no-cache               Skip the cached gold series and refetch
  --json                   Print the full report as JSON
  --help                   Show this message
`;

/** Switches that never take the following token as their value. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
	"cache",
	"etf",
	"help",
	"index",
	"json",
]);

/**
 * `--key value`, `--key=value` and bare `--flag` (true). `--no-flag` sets
 * `flag` to false. The first two positionals stand in for --start and --end.
 */
export const parseCliArgs = (argv: string[]): ArgMap => {
	const args: ArgMap = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		if (key.startsWith("no-")) {
			args[key.slice(3)] = false;
			continue;
		}
		const next = argv[i + 1];
		if (!BOOLEAN_FLAGS.has(key) && next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.start === undefined) {
		args.start = positionals[0];
	}
	if (positionals[1] && args.end === undefined) {
		args.end = positionals[1];
	}
	return args;
};

export const readString = (args: ArgMap, key: string): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || !value.trim()) {
		throw new ConfigError(key, `--${key} requires a value`);
	}
	return value.trim();
};

const readFlag = (args: ArgMap, key: string, fallback: boolean): boolean => {
	const value = args[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value === "boolean") {
		return value;
	}
	const normalized = value.trim().toLowerCase();
	if (normalized === "true") {
		return true;
	}
	if (normalized === "false") {
		return false;
	}
	throw new ConfigError(key, `--${key} is a switch, got "${value}"`);
};

const readNumber = (args: ArgMap, key: string): number | undefined => {
	const raw = readString(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(key, `expected a number, got "${raw}"`);
	}
	return value;
};

export interface ConfigLocation {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

export const readConfigLocation = (args: ArgMap): ConfigLocation => ({
	envPath: readString(args, "envPath") ?? readString(args, "env"),
	configDir: readString(args, "configDir"),
	profile: readString(args, "profile"),
});

/** Raw CLI overrides; createRotationConfig validates them against the profile. */
export type RotationOverrides = Partial<Record<keyof RotationConfig, unknown>>;

export interface BacktestArgs {
	goldSymbol: string;
	equitySymbol: string;
	start: string;
	end?: string;
	instrumentType?: InstrumentType;
	useCache: boolean;
	json: boolean;
	rotationOverrides: RotationOverrides;
}

const resolveInstrumentType = (args: ArgMap): InstrumentType | undefined => {
	const etf = readFlag(args, "etf", false);
	const index = readFlag(args, "index", false);
	if (etf && index) {
		throw new ConfigError("instrumentType", "--etf and --index are exclusive");
	}
	if (etf) {
		return "etf";
	}
	return index ? "index" : undefined;
};

export const resolveBacktestArgs = (args: ArgMap, env: EnvConfig): BacktestArgs => {
	const rotationOverrides: RotationOverrides = {};
	const lookbackDays = readNumber(args, "lookback");
	if (lookbackDays !== undefined) {
		rotationOverrides.lookbackDays = lookbackDays;
	}
	const feeBps = readNumber(args, "fee");
	if (feeBps !== undefined) {
		rotationOverrides.feeBps = feeBps;
	}
	const rebalance = readString(args, "rebalance");
	if (rebalance !== undefined) {
		rotationOverrides.rebalance = rebalance;
	}
	const alignment = readString(args, "alignment");
	if (alignment !== undefined) {
		rotationOverrides.alignment = alignment;
	}

	return {
		goldSymbol: env.goldSymbol,
		equitySymbol: readString(args, "equity") ?? env.equitySymbol,
		start: readString(args, "start") ?? DEFAULT_START_DATE,
		end: readString(args, "end"),
		instrumentType: resolveInstrumentType(args),
		useCache: env.cacheEnabled && readFlag(args, "cache", true),
		json: readFlag(args, "json", false),
		rotationOverrides,
	};
};
