import type { PerformanceSummary } from "@gold-rotation/core";

export interface RotationActivity {
	/** Days on which the executed position changed. */
	switches: number;
	/** Sum of daily fee charges, in return units. */
	totalFees: number;
	/** Share of days spent in each executed position. */
	exposure: Record<string, number>;
}

/** Strategy statistics beside the two buy-and-hold legs over the same days. */
export interface BacktestReport {
	strategy: PerformanceSummary | null;
	goldBuyHold: PerformanceSummary | null;
	equityBuyHold: PerformanceSummary | null;
	activity: RotationActivity;
}
