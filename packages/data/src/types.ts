import type { RawRow } from "@gold-rotation/core";

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type PriceAdjustment = "forward" | "none";

export interface PriceRequest {
	/** Provider-native instrument identifier. */
	symbol: string;
	start: string;
	end: string;
	adjust?: PriceAdjustment;
}

/**
 * One upstream feed. Implementations return rows in the provider's own
 * schema; mapping to PriceBar is the normalizer's job.
 */
export interface PriceSource {
	readonly name: string;
	fetchDaily(request: PriceRequest): Promise<RawRow[]>;
}

export interface FetchOptions {
	/** Attempts against the retrying provider, at least 1. */
	retries?: number;
	/** Linear backoff base: attempt n waits backoffSeconds * n before n + 1. */
	backoffSeconds?: number;
	useCache?: boolean;
}

export type InstrumentType = "etf" | "index";
export type ExchangeCode = "SH" | "SZ";

export interface EquityFetchOptions {
	/** Overrides the prefix-based ETF/index detection. */
	instrumentType?: InstrumentType;
}

export interface InstrumentClassification {
	code: string;
	exchange: ExchangeCode;
	type: InstrumentType;
}

export interface GoldSourcePlan {
	/** Provider A, tried once per candidate identifier in order. */
	primary: { source: PriceSource; candidates: readonly string[] };
	/** Provider B, a different instrument tracking the same underlying. */
	proxy: { source: PriceSource; symbol: string; adjust?: PriceAdjustment };
	/** Provider C, retried with linear backoff. */
	fallback: { source: PriceSource; symbol: string };
}

export type Sleep = (ms: number) => Promise<void>;
