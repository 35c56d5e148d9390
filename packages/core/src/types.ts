export type AssetKey = "GOLD" | "EQUITY";

/** Selection precedence when both assets show exactly the same momentum. */
export const TIE_BREAK_ORDER: readonly AssetKey[] = ["GOLD", "EQUITY"];

/**
 * One daily OHLCV bar. `date` is an ISO calendar day (YYYY-MM-DD) with no
 * time or timezone component.
 */
export type PriceBar = {
	readonly date: string;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
	readonly symbol: string;
};

/** Ascending, date-unique bars for a single symbol. */
export type PriceSeries = ReadonlyArray<PriceBar>;

export type RawRow = Record<string, unknown>;

export type RebalanceMode = "daily" | "weekly" | "monthly";

/**
 * `ffill` keeps the union of both calendars and carries the laggard's last
 * close forward; `inner` keeps only days both venues traded.
 */
export type AlignmentMode = "ffill" | "inner";

export interface RotationConfig {
	readonly lookbackDays: number;
	readonly rebalance: RebalanceMode;
	/** One-way cost in basis points charged on every position change. */
	readonly feeBps: number;
	readonly cashSymbol: string;
	readonly alignment: AlignmentMode;
}

export type Position = AssetKey | string;

export interface SignalRecord {
	date: string;
	/** Selection decided with this day's close. */
	rawSignal: Position;
	/** Position actually held during this day (previous day's decision). */
	executedPosition: Position;
	goldRet: number;
	equityRet: number;
	fee: number;
	portfolioRet: number;
}

export interface DailyReturn {
	date: string;
	value: number;
}

export interface PerformanceSummary {
	readonly cagr: number;
	readonly annualizedVol: number;
	readonly sharpe: number;
	readonly maxDrawdown: number;
	readonly terminalValue: number;
	readonly observations: number;
	readonly startDate: string;
	readonly endDate: string;
}

export interface DateRange {
	start: string;
	end: string;
}

interface ProviderAttemptBase {
	provider: string;
	/** Instrument identifier the provider was asked for. */
	target: string;
	attempt: number;
}

export type ProviderAttempt =
	| (ProviderAttemptBase & { status: "ok"; rows: number })
	| (ProviderAttemptBase & { status: "empty" })
	| (ProviderAttemptBase & { status: "failed"; error: Error });
