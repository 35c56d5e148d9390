export type CanonicalColumn = "date" | "open" | "high" | "low" | "close" | "volume";

export const CANONICAL_COLUMNS: readonly CanonicalColumn[] = [
	"date",
	"open",
	"high",
	"low",
	"close",
	"volume",
];

export const REQUIRED_COLUMNS: readonly CanonicalColumn[] = [
	"date",
	"open",
	"high",
	"low",
	"close",
];

/**
 * Header aliases per canonical column, in priority order. When a table
 * carries several candidates (e.g. both "Close" and "Adj Close") the first
 * listed alias that is present wins. Keys are compared after
 * {@link normalizeHeader}.
 */
export const COLUMN_ALIASES: Record<CanonicalColumn, readonly string[]> = {
	date: ["date", "日期", "交易日期", "tradedate", "datetime", "time"],
	open: ["open", "开盘", "开盘价", "openprice"],
	high: ["high", "最高", "最高价", "highprice"],
	low: ["low", "最低", "最低价", "lowprice"],
	close: [
		"close",
		"收盘",
		"收盘价",
		"closeprice",
		"adjclose",
		"settle",
		"settlement",
		"settlementprice",
		"结算价",
	],
	volume: ["volume", "vol", "成交量", "成交量(手)", "volume(lots)"],
};

export const normalizeHeader = (header: string): string =>
	header.trim().toLowerCase().replace(/[\s_-]+/g, "");

export type ColumnMapping = Partial<Record<CanonicalColumn, string>>;

/** Map each canonical column to the source header that supplies it. */
export const resolveColumns = (headers: Iterable<string>): ColumnMapping => {
	const byNormalized = new Map<string, string>();
	for (const header of headers) {
		const key = normalizeHeader(header);
		if (!byNormalized.has(key)) {
			byNormalized.set(key, header);
		}
	}

	const mapping: ColumnMapping = {};
	for (const canonical of CANONICAL_COLUMNS) {
		for (const alias of COLUMN_ALIASES[canonical]) {
			const source = byNormalized.get(normalizeHeader(alias));
			if (source !== undefined) {
				mapping[canonical] = source;
				break;
			}
		}
	}
	return mapping;
};
