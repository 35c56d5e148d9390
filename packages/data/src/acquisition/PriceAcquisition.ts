import type { DateRange, PriceSeries, ProviderAttempt } from "@gold-rotation/core";
import {
	ConfigError,
	DataUnavailableError,
	EmptyDataError,
	SchemaError,
	isCalendarDate,
	todayCalendarDate,
	toError,
} from "@gold-rotation/core";
import type { PriceCache } from "../cache/PriceCache";
import { filterRange, normalizePrices } from "../normalize/normalizePrices";
import { toSecid } from "../providers/EastmoneyKlineClient";
import type {
	DataProviderLogger,
	EquityFetchOptions,
	FetchOptions,
	GoldSourcePlan,
	PriceAdjustment,
	PriceSource,
	Sleep,
} from "../types";
import { classifyInstrument } from "./instrumentClassifier";
import { retryWithLinearBackoff } from "./retry";

export const CACHE_PROVIDER = "cache";

export interface PriceAcquisitionOptions {
	cache: PriceCache;
	/** Canonical gold identifier; series are tagged and cached under it. */
	goldSymbol: string;
	gold: GoldSourcePlan;
	/** Regional feed for A-share listings, addressed by Eastmoney secid. */
	equitySource: PriceSource;
	defaults?: FetchOptions;
	logger?: DataProviderLogger;
	sleep?: Sleep;
	today?: () => string;
}

export type AssetFetchOptions = FetchOptions & EquityFetchOptions;

interface SourceStep {
	source: PriceSource;
	target: string;
	adjust?: PriceAdjustment;
}

interface LoadedSeries {
	full: PriceSeries;
	inRange: PriceSeries;
}

const DEFAULT_FETCH_OPTIONS: Required<FetchOptions> = {
	retries: 3,
	backoffSeconds: 2,
	useCache: true,
};

const mergeFetchOptions = (
	base: Required<FetchOptions>,
	override: FetchOptions = {}
): Required<FetchOptions> => ({
	retries: override.retries ?? base.retries,
	backoffSeconds: override.backoffSeconds ?? base.backoffSeconds,
	useCache: override.useCache ?? base.useCache,
});

// Malformed or empty payloads will not improve on a retry.
const isTransient = (error: Error): boolean =>
	!(error instanceof SchemaError || error instanceof EmptyDataError);

/**
 * Acquires daily bars for the two rotation assets. Gold walks an ordered
 * chain (cache, primary candidates, proxy, retrying fallback, stale cache)
 * and stops at the first source with bars inside the requested range.
 * Equity comes from a single regional feed.
 */
export class PriceAcquisition {
	private readonly defaults: Required<FetchOptions>;
	private readonly today: () => string;

	constructor(private readonly options: PriceAcquisitionOptions) {
		if (!options.goldSymbol) {
			throw new Error("PriceAcquisition goldSymbol is required");
		}
		if (!options.gold.primary.candidates.length) {
			throw new Error("PriceAcquisition needs at least one primary candidate");
		}
		this.defaults = mergeFetchOptions(DEFAULT_FETCH_OPTIONS, options.defaults);
		this.today = options.today ?? (() => todayCalendarDate());
	}

	get goldSymbol(): string {
		return this.options.goldSymbol;
	}

	async fetchAsset(
		symbol: string,
		start: string,
		end?: string,
		options: AssetFetchOptions = {}
	): Promise<PriceSeries> {
		if (symbol === this.options.goldSymbol) {
			return this.fetchGold(start, end, options);
		}
		return this.fetchEquity(symbol, start, end, options);
	}

	async fetchGold(
		start: string,
		end?: string,
		options: FetchOptions = {}
	): Promise<PriceSeries> {
		const range = this.resolveRange(start, end);
		const settings = mergeFetchOptions(this.defaults, options);
		const symbol = this.options.goldSymbol;
		const attempts: ProviderAttempt[] = [];

		let cached: PriceSeries | null = null;
		if (settings.useCache) {
			cached = await this.readCache(attempts);
			const hit = cached ? filterRange(cached, range.start, range.end) : [];
			if (hit.length) {
				this.options.logger?.info?.("cache_hit", {
					symbol,
					rows: hit.length,
					...range,
				});
				return hit;
			}
			this.options.logger?.info?.("cache_miss", {
				symbol,
				cachedRows: cached?.length ?? 0,
				...range,
			});
		}

		const { primary, proxy, fallback } = this.options.gold;
		for (const candidate of primary.candidates) {
			const series = await this.runStep(
				{ source: primary.source, target: candidate },
				range,
				1,
				settings.backoffSeconds,
				attempts
			);
			if (series) {
				return series;
			}
		}

		const fromProxy = await this.runStep(
			{
				source: proxy.source,
				target: proxy.symbol,
				adjust: proxy.adjust ?? "forward",
			},
			range,
			1,
			settings.backoffSeconds,
			attempts
		);
		if (fromProxy) {
			return fromProxy;
		}

		const fromFallback = await this.runStep(
			{ source: fallback.source, target: fallback.symbol },
			range,
			settings.retries,
			settings.backoffSeconds,
			attempts
		);
		if (fromFallback) {
			return fromFallback;
		}

		// A stale snapshot beats no data, even when the caller skipped the cache.
		const stale = settings.useCache ? cached : await this.readCache(attempts);
		const staleInRange = stale ? filterRange(stale, range.start, range.end) : [];
		if (staleInRange.length) {
			this.options.logger?.warn?.("stale_cache_fallback", {
				symbol,
				rows: staleInRange.length,
				lastDate: staleInRange[staleInRange.length - 1].date,
				...range,
			});
			return staleInRange;
		}

		throw this.unavailable(symbol, range, attempts);
	}

	async fetchEquity(
		symbol: string,
		start: string,
		end?: string,
		options: EquityFetchOptions = {}
	): Promise<PriceSeries> {
		const range = this.resolveRange(start, end);
		const instrument = classifyInstrument(symbol, options.instrumentType);
		const source = this.options.equitySource;
		const step: SourceStep = {
			source,
			target: toSecid(instrument.code, instrument.exchange),
			// Funds pay distributions, so their quotes need forward adjustment.
			adjust: instrument.type === "etf" ? "forward" : "none",
		};
		const attempts: ProviderAttempt[] = [];

		let loaded: LoadedSeries;
		try {
			loaded = await this.load(step, range, instrument.code);
		} catch (caught) {
			this.recordOutcome(attempts, step, 1, toError(caught));
			throw this.unavailable(instrument.code, range, attempts);
		}
		if (!loaded.inRange.length) {
			this.recordEmpty(attempts, step, 1);
			throw this.unavailable(instrument.code, range, attempts);
		}
		attempts.push({
			provider: source.name,
			target: step.target,
			attempt: 1,
			status: "ok",
			rows: loaded.inRange.length,
		});
		this.options.logger?.info?.("provider_accepted", {
			symbol: instrument.code,
			provider: source.name,
			target: step.target,
			type: instrument.type,
			rows: loaded.inRange.length,
		});
		return loaded.inRange;
	}

	private resolveRange(start: string, end?: string): DateRange {
		const resolvedEnd = end ?? this.today();
		if (!isCalendarDate(start)) {
			throw new ConfigError("start", `expected YYYY-MM-DD, got "${start}"`);
		}
		if (!isCalendarDate(resolvedEnd)) {
			throw new ConfigError("end", `expected YYYY-MM-DD, got "${resolvedEnd}"`);
		}
		if (start > resolvedEnd) {
			throw new ConfigError(
				"range",
				`start ${start} is after end ${resolvedEnd}`
			);
		}
		return { start, end: resolvedEnd };
	}

	private async load(
		step: SourceStep,
		range: DateRange,
		symbol: string
	): Promise<LoadedSeries> {
		const rows = await step.source.fetchDaily({
			symbol: step.target,
			start: range.start,
			end: range.end,
			adjust: step.adjust,
		});
		const full = normalizePrices(rows, symbol);
		return { full, inRange: filterRange(full, range.start, range.end) };
	}

	/**
	 * One provider in the gold chain. Failures and empty results are recorded
	 * in `attempts` and yield null so the caller moves on.
	 */
	private async runStep(
		step: SourceStep,
		range: DateRange,
		retries: number,
		backoffSeconds: number,
		attempts: ProviderAttempt[]
	): Promise<PriceSeries | null> {
		const logger = this.options.logger;
		let attemptNo = 0;
		let loaded: LoadedSeries;
		try {
			loaded = await retryWithLinearBackoff(
				(attempt) => {
					attemptNo = attempt;
					return this.load(step, range, this.options.goldSymbol);
				},
				{
					retries,
					backoffSeconds,
					sleep: this.options.sleep,
					shouldRetry: isTransient,
					onAttemptFailed: (error, attempt, delayMs) => {
						if (delayMs === null) {
							return;
						}
						this.recordFailure(attempts, step, attempt, error);
						logger?.info?.("retry_scheduled", {
							provider: step.source.name,
							target: step.target,
							attempt,
							delayMs,
						});
					},
				}
			);
		} catch (caught) {
			this.recordOutcome(attempts, step, attemptNo, toError(caught));
			return null;
		}

		if (!loaded.inRange.length) {
			this.recordEmpty(attempts, step, attemptNo);
			return null;
		}

		attempts.push({
			provider: step.source.name,
			target: step.target,
			attempt: attemptNo,
			status: "ok",
			rows: loaded.inRange.length,
		});
		logger?.info?.("provider_accepted", {
			symbol: this.options.goldSymbol,
			provider: step.source.name,
			target: step.target,
			attempt: attemptNo,
			rows: loaded.inRange.length,
		});
		await this.writeCache(loaded.full);
		return loaded.inRange;
	}

	private async readCache(
		attempts: ProviderAttempt[]
	): Promise<PriceSeries | null> {
		const symbol = this.options.goldSymbol;
		try {
			return await this.options.cache.read(symbol);
		} catch (caught) {
			const error = toError(caught);
			attempts.push({
				provider: CACHE_PROVIDER,
				target: this.options.cache.pathFor(symbol),
				attempt: 1,
				status: "failed",
				error,
			});
			this.options.logger?.warn?.("cache_unreadable", {
				symbol,
				error: error.message,
			});
			return null;
		}
	}

	private async writeCache(series: PriceSeries): Promise<void> {
		const symbol = this.options.goldSymbol;
		try {
			const file = await this.options.cache.write(symbol, series);
			this.options.logger?.info?.("cache_written", {
				symbol,
				file,
				rows: series.length,
			});
		} catch (caught) {
			this.options.logger?.warn?.("cache_write_failed", {
				symbol,
				error: toError(caught).message,
			});
		}
	}

	/** A provider that answered with no rows at all is empty, not failed. */
	private recordOutcome(
		attempts: ProviderAttempt[],
		step: SourceStep,
		attempt: number,
		error: Error
	): void {
		if (error instanceof EmptyDataError) {
			this.recordEmpty(attempts, step, attempt);
		} else {
			this.recordFailure(attempts, step, attempt, error);
		}
	}

	private recordFailure(
		attempts: ProviderAttempt[],
		step: SourceStep,
		attempt: number,
		error: Error
	): void {
		attempts.push({
			provider: step.source.name,
			target: step.target,
			attempt,
			status: "failed",
			error,
		});
		this.options.logger?.warn?.("provider_attempt_failed", {
			provider: step.source.name,
			target: step.target,
			attempt,
			error: error.message,
		});
	}

	private recordEmpty(
		attempts: ProviderAttempt[],
		step: SourceStep,
		attempt: number
	): void {
		attempts.push({
			provider: step.source.name,
			target: step.target,
			attempt,
			status: "empty",
		});
		this.options.logger?.warn?.("provider_attempt_empty", {
			provider: step.source.name,
			target: step.target,
			attempt,
		});
	}

	private unavailable(
		symbol: string,
		range: DateRange,
		attempts: readonly ProviderAttempt[]
	): DataUnavailableError {
		const error = new DataUnavailableError(symbol, range, attempts);
		this.options.logger?.error?.("data_unavailable", {
			symbol,
			attempts: attempts.length,
			error: error.message,
			...range,
		});
		return error;
	}
}
