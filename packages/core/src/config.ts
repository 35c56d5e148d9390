import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError, toError } from "./errors";
import type { AlignmentMode, RebalanceMode, RotationConfig } from "./types";
import { TIE_BREAK_ORDER } from "./types";

const REBALANCE_MODES: readonly RebalanceMode[] = ["daily", "weekly", "monthly"];
const ALIGNMENT_MODES: readonly AlignmentMode[] = ["ffill", "inner"];

export const DEFAULT_ROTATION_CONFIG: RotationConfig = Object.freeze({
	lookbackDays: 60,
	rebalance: "weekly",
	feeBps: 5,
	cashSymbol: "CASH",
	alignment: "ffill",
});

export interface EnvConfig {
	dataDir: string;
	outputDir: string;
	cacheEnabled: boolean;
	fetchRetries: number;
	fetchBackoffSeconds: number;
	goldSymbol: string;
	equitySymbol: string;
}

export interface BacktestConfig {
	env: EnvConfig;
	rotation: RotationConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	rotationProfile?: string;
}

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", "config"];

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

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");
export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readBooleanEnvVar = (key: string, fallback: boolean): boolean => {
	const value = readOptionalEnvVar(key);
	if (value === undefined) {
		return fallback;
	}
	return !["false", "0", "no", "off"].includes(value.toLowerCase());
};

const readNumberEnvVar = (
	key: string,
	fallback: number,
	validate: (value: number) => boolean
): number => {
	const raw = readOptionalEnvVar(key);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || !validate(value)) {
		throw new ConfigError(key, `unsupported value "${raw}"`);
	}
	return value;
};

const resolveDir = (value: string | undefined, fallback: string): string =>
	path.resolve(findWorkspaceRoot(), value ?? fallback);

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		dataDir: resolveDir(readOptionalEnvVar("DATA_DIR"), "data"),
		outputDir: resolveDir(readOptionalEnvVar("OUTPUT_DIR"), "output"),
		cacheEnabled: readBooleanEnvVar("CACHE_ENABLED", true),
		fetchRetries: readNumberEnvVar(
			"FETCH_RETRIES",
			3,
			(value) => Number.isInteger(value) && value >= 1
		),
		fetchBackoffSeconds: readNumberEnvVar(
			"FETCH_BACKOFF_SECONDS",
			2,
			(value) => value >= 0
		),
		goldSymbol: readOptionalEnvVar("GOLD_SYMBOL") ?? "GC=F",
		equitySymbol: readOptionalEnvVar("EQUITY_SYMBOL") ?? "510300",
	};
};

const isRebalanceMode = (value: unknown): value is RebalanceMode =>
	REBALANCE_MODES.some((mode) => mode === value);

const isAlignmentMode = (value: unknown): value is AlignmentMode =>
	ALIGNMENT_MODES.some((mode) => mode === value);

/**
 * Validate and freeze a rotation config. Missing fields take the defaults;
 * anything present but unusable throws ConfigError here so the signal engine
 * never sees a bad config mid-run.
 */
export const createRotationConfig = (
	input: Partial<Record<keyof RotationConfig, unknown>> = {}
): RotationConfig => {
	const lookbackDays = input.lookbackDays ?? DEFAULT_ROTATION_CONFIG.lookbackDays;
	if (
		typeof lookbackDays !== "number" ||
		!Number.isInteger(lookbackDays) ||
		lookbackDays <= 0
	) {
		throw new ConfigError(
			"lookbackDays",
			`expected a positive integer, got ${String(lookbackDays)}`
		);
	}

	const rebalance = input.rebalance ?? DEFAULT_ROTATION_CONFIG.rebalance;
	if (!isRebalanceMode(rebalance)) {
		throw new ConfigError(
			"rebalance",
			`unsupported rebalance mode: ${String(rebalance)}`
		);
	}

	const feeBps = input.feeBps ?? DEFAULT_ROTATION_CONFIG.feeBps;
	if (typeof feeBps !== "number" || !Number.isFinite(feeBps) || feeBps < 0) {
		throw new ConfigError(
			"feeBps",
			`expected a non-negative number, got ${String(feeBps)}`
		);
	}

	const cashSymbol = input.cashSymbol ?? DEFAULT_ROTATION_CONFIG.cashSymbol;
	if (
		typeof cashSymbol !== "string" ||
		!cashSymbol.trim() ||
		TIE_BREAK_ORDER.some((asset) => asset === cashSymbol)
	) {
		throw new ConfigError(
			"cashSymbol",
			`must be a non-empty symbol distinct from the assets, got ${String(cashSymbol)}`
		);
	}

	const alignment = input.alignment ?? DEFAULT_ROTATION_CONFIG.alignment;
	if (!isAlignmentMode(alignment)) {
		throw new ConfigError(
			"alignment",
			`unsupported alignment mode: ${String(alignment)}`
		);
	}

	return Object.freeze({
		lookbackDays,
		rebalance,
		feeBps,
		cashSymbol,
		alignment,
	});
};

const readProfileJson = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(
			"profile",
			`rotation config at ${filePath} is not valid JSON (${toError(error).message})`,
			{ cause: error }
		);
	}
};

export const resolveRotationConfigPath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "rotation", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigError(
		"profile",
		`rotation config not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadRotationConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): RotationConfig => {
	const configPath = resolveRotationConfigPath(configDir, profile);
	const file = readProfileJson(configPath);
	if (!file || typeof file !== "object" || Array.isArray(file)) {
		throw new ConfigError(
			"profile",
			`rotation config at ${configPath} must be a JSON object`
		);
	}
	const record: Record<string, unknown> = { ...file };
	return createRotationConfig({
		lookbackDays: record.lookbackDays,
		rebalance: record.rebalance,
		feeBps: record.feeBps,
		cashSymbol: record.cashSymbol,
		alignment: record.alignment,
	});
};

export const loadBacktestConfig = (
	options: ConfigLoadOptions = {}
): BacktestConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const envPath = options.envPath ?? path.join(workspaceRoot, ".env");
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	return {
		env: loadEnvConfig(envPath),
		rotation: loadRotationConfig(configDir, options.rotationProfile),
	};
};
