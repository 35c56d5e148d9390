import type { AlignmentMode, PriceSeries } from "@gold-rotation/core";

export interface AlignedRow {
	readonly date: string;
	readonly gold: number;
	readonly equity: number;
}

/** One close per asset for every retained day; no gaps remain. */
export type AlignedPriceTable = ReadonlyArray<AlignedRow>;

const closesByDate = (series: PriceSeries): Map<string, number> =>
	new Map(series.map((bar) => [bar.date, bar.close]));

/**
 * Join the two close series on calendar date.
 *
 * `inner` keeps only days present in both series. `ffill` walks the union of
 * both calendars and carries each asset's last known close into days it did
 * not trade; leading days before an asset's first bar are dropped.
 */
export function alignPrices(
	gold: PriceSeries,
	equity: PriceSeries,
	mode: AlignmentMode
): AlignedPriceTable {
	const goldCloses = closesByDate(gold);
	const equityCloses = closesByDate(equity);

	if (mode === "inner") {
		const rows: AlignedRow[] = [];
		for (const [date, goldClose] of goldCloses) {
			const equityClose = equityCloses.get(date);
			if (equityClose !== undefined) {
				rows.push({ date, gold: goldClose, equity: equityClose });
			}
		}
		rows.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
		return Object.freeze(rows);
	}

	const dates = Array.from(
		new Set([...goldCloses.keys(), ...equityCloses.keys()])
	).sort();
	const rows: AlignedRow[] = [];
	let lastGold: number | undefined;
	let lastEquity: number | undefined;
	for (const date of dates) {
		lastGold = goldCloses.get(date) ?? lastGold;
		lastEquity = equityCloses.get(date) ?? lastEquity;
		if (lastGold !== undefined && lastEquity !== undefined) {
			rows.push({ date, gold: lastGold, equity: lastEquity });
		}
	}
	return Object.freeze(rows);
}
