import { describe, expect, it } from "vitest";
import { alignPrices } from "./alignPrices";
import { toSeries } from "./testing/fixtures";

const gold = toSeries("GC=F", ["2024-01-02", "2024-01-03", "2024-01-04"], [2060, 2040, 2045]);
const equity = toSeries("510300", ["2024-01-03", "2024-01-04", "2024-01-05"], [3.4, 3.41, 3.38]);

describe("alignPrices", () => {
	it("keeps only shared days in inner mode", () => {
		expect(alignPrices(gold, equity, "inner")).toEqual([
			{ date: "2024-01-03", gold: 2040, equity: 3.4 },
			{ date: "2024-01-04", gold: 2045, equity: 3.41 },
		]);
	});

	it("forward-fills the laggard over the union of days", () => {
		expect(alignPrices(gold, equity, "ffill")).toEqual([
			{ date: "2024-01-03", gold: 2040, equity: 3.4 },
			{ date: "2024-01-04", gold: 2045, equity: 3.41 },
			{ date: "2024-01-05", gold: 2045, equity: 3.38 },
		]);
	});

	it("fills holes inside the overlap", () => {
		const sparse = toSeries("510300", ["2024-01-02", "2024-01-04"], [3.5, 3.6]);
		expect(alignPrices(gold, sparse, "ffill").map((row) => row.equity)).toEqual([
			3.5, 3.5, 3.6,
		]);
		expect(alignPrices(gold, sparse, "inner").map((row) => row.date)).toEqual([
			"2024-01-02",
			"2024-01-04",
		]);
	});

	it("returns an empty table when either side is empty", () => {
		expect(alignPrices(gold, [], "ffill")).toEqual([]);
		expect(alignPrices([], equity, "inner")).toEqual([]);
	});
});
