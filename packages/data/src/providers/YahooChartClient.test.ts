import { describe, expect, it } from "vitest";
import { normalizePrices } from "../normalize/normalizePrices";
import { createFakeFetch } from "../testing/fakeFetch";
import { YahooChartClient, parseChart } from "./YahooChartClient";

// 2024-01-02 05:00 UTC and 2024-01-03 05:00 UTC: midnight in New York
const TS_1 = 1704171600;
const TS_2 = 1704258000;

const chartBody = (overrides: Record<string, unknown> = {}) =>
	JSON.stringify({
		chart: {
			result: [
				{
					meta: { symbol: "GC=F", gmtoffset: -18000 },
					timestamp: [TS_1, TS_2],
					indicators: {
						quote: [
							{
								open: [2062.4, 2073.0],
								high: [2077.8, 2075.1],
								low: [2055.2, null],
								close: [2073.4, 2042.2],
								volume: [168212, 194006],
							},
						],
						adjclose: [{ adjclose: [2073.4, 2042.2] }],
					},
					...overrides,
				},
			],
			error: null,
		},
	});

describe("YahooChartClient", () => {
	it("requests daily bars with an exclusive upper bound", async () => {
		const fake = createFakeFetch(chartBody());
		const client = new YahooChartClient({ fetchImpl: fake.impl });
		await client.fetchDaily({ symbol: "GC=F", start: "2024-01-02", end: "2024-01-03" });
		const url = new URL(fake.calls[0]);
		expect(url.pathname).toBe("/v8/finance/chart/GC%3DF");
		expect(url.searchParams.get("period1")).toBe("1704153600");
		expect(url.searchParams.get("period2")).toBe("1704326400");
		expect(url.searchParams.get("interval")).toBe("1d");
	});

	it("shifts timestamps to the exchange's calendar day", () => {
		const rows = parseChart(JSON.parse(chartBody()));
		expect(rows.map((row) => row.Date)).toEqual(["2024-01-02", "2024-01-03"]);
		expect(rows[0]).toEqual({
			Date: "2024-01-02",
			Open: 2062.4,
			High: 2077.8,
			Low: 2055.2,
			Close: 2073.4,
			"Adj Close": 2073.4,
			Volume: 168212,
		});
	});

	it("leaves gaps for the normalizer to drop", () => {
		const series = normalizePrices(parseChart(JSON.parse(chartBody())), "GC=F");
		expect(series.map((bar) => bar.date)).toEqual(["2024-01-02"]);
	});

	it("returns no rows when the range holds no timestamps", () => {
		const payload = JSON.parse(chartBody({ timestamp: undefined }));
		expect(parseChart(payload)).toEqual([]);
	});

	it("surfaces chart errors", () => {
		expect(() =>
			parseChart({
				chart: { result: null, error: { code: "Not Found", description: "No data found, symbol may be delisted" } },
			})
		).toThrow("No data found, symbol may be delisted");
	});
});
