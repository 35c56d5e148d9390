import type {
	DailyReturn,
	PerformanceSummary,
	SignalRecord,
} from "@gold-rotation/core";
import {
	DAYS_PER_YEAR,
	TRADING_DAYS_PER_YEAR,
	daysBetween,
} from "@gold-rotation/core";
import { cumulativeProduct } from "@gold-rotation/indicators";
import type { BacktestReport, RotationActivity } from "./metricsSchema";

/** Growth of one unit: running product of (1 + return). */
export const cumulativeCurve = (returns: readonly number[]): number[] =>
	cumulativeProduct(returns);

/** Deepest peak-to-trough loss of `curve`, as a non-positive fraction. */
export const maxDrawdown = (curve: readonly number[]): number => {
	let peak = Number.NEGATIVE_INFINITY;
	let worst = 0;
	for (const level of curve) {
		peak = Math.max(peak, level);
		const drawdown = level / peak - 1;
		if (drawdown < worst) {
			worst = drawdown;
		}
	}
	return worst;
};

/** Sample standard deviation; NaN below two observations. */
export const standardDeviation = (values: readonly number[]): number => {
	if (values.length < 2) {
		return Number.NaN;
	}
	const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
	const variance =
		values.reduce((sum, value) => sum + (value - mean) ** 2, 0) /
		(values.length - 1);
	return Math.sqrt(variance);
};

/**
 * Annualized statistics for a daily return stream. Calendar time drives CAGR
 * (days / 365.25); volatility and Sharpe scale by sqrt(252). Undefined ratios
 * are NaN rather than errors. Returns null for an empty stream.
 */
export const summarize = (
	returns: readonly DailyReturn[]
): PerformanceSummary | null => {
	if (!returns.length) {
		return null;
	}
	const values = returns.map((entry) => entry.value);
	const curve = cumulativeCurve(values);
	const terminalValue = curve[curve.length - 1];
	const startDate = returns[0].date;
	const endDate = returns[returns.length - 1].date;
	const years = daysBetween(startDate, endDate) / DAYS_PER_YEAR;

	const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
	const std = standardDeviation(values);
	const annualizer = Math.sqrt(TRADING_DAYS_PER_YEAR);

	return {
		cagr: years > 0 ? Math.pow(terminalValue, 1 / years) - 1 : Number.NaN,
		annualizedVol: std * annualizer,
		sharpe: std > 0 ? (mean / std) * annualizer : Number.NaN,
		maxDrawdown: maxDrawdown(curve),
		terminalValue,
		observations: values.length,
		startDate,
		endDate,
	};
};

const pick = (
	records: readonly SignalRecord[],
	field: "portfolioRet" | "goldRet" | "equityRet"
): DailyReturn[] =>
	records.map((record) => ({ date: record.date, value: record[field] }));

export const rotationActivity = (
	records: readonly SignalRecord[]
): RotationActivity => {
	let switches = 0;
	let totalFees = 0;
	const counts: Record<string, number> = {};
	records.forEach((record, idx) => {
		if (idx > 0 && record.executedPosition !== records[idx - 1].executedPosition) {
			switches += 1;
		}
		totalFees += record.fee;
		counts[record.executedPosition] = (counts[record.executedPosition] ?? 0) + 1;
	});
	const exposure: Record<string, number> = {};
	for (const [position, count] of Object.entries(counts)) {
		exposure[position] = count / records.length;
	}
	return { switches, totalFees, exposure };
};

/** Strategy summary plus buy-and-hold benchmarks from the same rows. */
export const buildBacktestReport = (
	records: readonly SignalRecord[]
): BacktestReport => ({
	strategy: summarize(pick(records, "portfolioRet")),
	goldBuyHold: summarize(pick(records, "goldRet")),
	equityBuyHold: summarize(pick(records, "equityRet")),
	activity: rotationActivity(records),
});
