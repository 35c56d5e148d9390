import {
	EmptyDataError,
	SchemaError,
	parseCalendarDate,
	type PriceBar,
	type PriceSeries,
	type RawRow,
} from "@gold-rotation/core";
import { REQUIRED_COLUMNS, resolveColumns } from "./columnAliases";

/**
 * Coerce a provider cell to a number. Strings may carry thousands
 * separators; blanks, "-", "NaN" and anything else non-numeric become null.
 */
export const coerceNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value !== "string") {
		return null;
	}
	const cleaned = value.trim().replace(/,/g, "");
	if (!cleaned) {
		return null;
	}
	const parsed = Number(cleaned);
	return Number.isFinite(parsed) ? parsed : null;
};

const toPrice = (value: unknown): number | null => {
	const parsed = coerceNumber(value);
	return parsed !== null && parsed >= 0 ? parsed : null;
};

const collectHeaders = (rows: readonly RawRow[]): string[] => {
	const headers = new Set<string>();
	for (const row of rows) {
		for (const key of Object.keys(row)) {
			headers.add(key);
		}
	}
	return Array.from(headers);
};

/**
 * Map a provider table onto canonical daily bars for `symbol`.
 *
 * Rows without a parseable date or with any of open/high/low/close missing
 * are dropped; a missing volume becomes 0. Output is sorted by date with one
 * bar per day (the last row for a day wins). Feeding the output back in
 * returns an identical series.
 *
 * @throws EmptyDataError when `rows` is empty
 * @throws SchemaError when a required column cannot be resolved
 */
export const normalizePrices = (
	rows: readonly RawRow[],
	symbol: string
): PriceSeries => {
	if (!rows.length) {
		throw new EmptyDataError(symbol);
	}

	const mapping = resolveColumns(collectHeaders(rows));
	const missing = REQUIRED_COLUMNS.filter((column) => !mapping[column]);
	const { date, open, high, low, close, volume } = mapping;
	if (!date || !open || !high || !low || !close) {
		throw new SchemaError(symbol, missing);
	}

	const byDate = new Map<string, PriceBar>();
	for (const row of rows) {
		const day = parseCalendarDate(row[date]);
		const o = toPrice(row[open]);
		const h = toPrice(row[high]);
		const l = toPrice(row[low]);
		const c = toPrice(row[close]);
		if (day === null || o === null || h === null || l === null || c === null) {
			continue;
		}
		const v = volume ? coerceNumber(row[volume]) : null;
		byDate.set(
			day,
			Object.freeze({
				date: day,
				open: o,
				high: h,
				low: l,
				close: c,
				volume: v !== null && v >= 0 ? v : 0,
				symbol,
			})
		);
	}

	const bars = Array.from(byDate.values()).sort((a, b) =>
		a.date < b.date ? -1 : a.date > b.date ? 1 : 0
	);
	return Object.freeze(bars);
};

/** Bars whose date falls inside [start, end], both inclusive. */
export const filterRange = (
	series: PriceSeries,
	start: string,
	end: string
): PriceSeries =>
	Object.freeze(series.filter((bar) => bar.date >= start && bar.date <= end));
