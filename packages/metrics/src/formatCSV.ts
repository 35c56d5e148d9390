import type { SignalRecord } from "@gold-rotation/core";
import { cumulativeCurve } from "./calcPerformance";

export const SIGNAL_TABLE_COLUMNS = [
	"date",
	"signal",
	"position",
	"gold_ret",
	"equity_ret",
	"fee",
	"portfolio_ret",
	"portfolio_curve",
] as const;

type SignalTableColumn = (typeof SIGNAL_TABLE_COLUMNS)[number];

/** One row per day; `signal` is the day's decision, `position` what was held. */
export const formatSignalTable = (records: readonly SignalRecord[]): string => {
	const curve = cumulativeCurve(records.map((record) => record.portfolioRet));
	const rows = records.map(
		(record, idx): Record<SignalTableColumn, unknown> => ({
			date: record.date,
			signal: record.rawSignal,
			position: record.executedPosition,
			gold_ret: record.goldRet,
			equity_ret: record.equityRet,
			fee: record.fee,
			portfolio_ret: record.portfolioRet,
			portfolio_curve: curve[idx],
		})
	);
	return toCsv(SIGNAL_TABLE_COLUMNS, rows);
};

const toCsv = <K extends string>(
	headers: readonly K[],
	rows: Record<K, unknown>[]
): string => {
	const lines = [headers.join(",")];
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return `${lines.join("\n")}\n`;
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (/[",\n]/.test(value)) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
