import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ProviderAttempt, RawRow } from "@gold-rotation/core";
import { ConfigError, DataUnavailableError } from "@gold-rotation/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PriceCache } from "../cache/PriceCache";
import { normalizePrices } from "../normalize/normalizePrices";
import type {
	DataProviderLogger,
	FetchOptions,
	PriceRequest,
	PriceSource,
	Sleep,
} from "../types";
import { PriceAcquisition } from "./PriceAcquisition";

interface StubSource extends PriceSource {
	requests: PriceRequest[];
}

/** Answers with `responses` in order, repeating the last one. */
const stubSource = (
	name: string,
	responses: Array<RawRow[] | Error>
): StubSource => {
	const requests: PriceRequest[] = [];
	return {
		name,
		requests,
		fetchDaily: async (request) => {
			const next = responses[Math.min(requests.length, responses.length - 1)];
			requests.push(request);
			if (next instanceof Error) {
				throw next;
			}
			return next ?? [];
		},
	};
};

const bars = (dates: string[], close = 2050): RawRow[] =>
	dates.map((date, idx) => ({
		date,
		open: close + idx,
		high: (close + idx) * 1.01,
		low: (close + idx) * 0.99,
		close: close + idx,
	}));

const WEEK = ["2024-01-02", "2024-01-03", "2024-01-04", "2024-01-05"];

const describeAttempt = (attempt: ProviderAttempt) =>
	`${attempt.provider}:${attempt.target}:${attempt.attempt}:${attempt.status}`;

const rejectionOf = async (promise: Promise<unknown>): Promise<unknown> =>
	promise.then(
		() => undefined,
		(caught: unknown) => caught
	);

describe("PriceAcquisition", () => {
	let dir: string;
	let events: string[];
	let sleeps: number[];
	const logger: DataProviderLogger = {
		info: (event) => events.push(event),
		warn: (event) => events.push(event),
		error: (event) => events.push(event),
	};
	const sleep: Sleep = async (ms) => {
		sleeps.push(ms);
	};

	const build = (
		sources: {
			sina: PriceSource;
			eastmoney: PriceSource;
			yahoo: PriceSource;
		},
		options: { cacheDir?: string; defaults?: FetchOptions } = {}
	) =>
		new PriceAcquisition({
			cache: new PriceCache({ directory: options.cacheDir ?? dir }),
			goldSymbol: "GC=F",
			gold: {
				primary: { source: sources.sina, candidates: ["GC", "XAU"] },
				proxy: { source: sources.eastmoney, symbol: "1.518880" },
				fallback: { source: sources.yahoo, symbol: "GC=F" },
			},
			equitySource: sources.eastmoney,
			defaults: { retries: 3, backoffSeconds: 2, ...options.defaults },
			logger,
			sleep,
			today: () => "2024-01-31",
		});

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "price-acquisition-"));
		events = [];
		sleeps = [];
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("serves a cached range without touching any provider", async () => {
		await new PriceCache({ directory: dir }).write(
			"GC=F",
			normalizePrices(bars(WEEK), "GC=F")
		);
		const sina = stubSource("sina", [new Error("unexpected")]);
		const eastmoney = stubSource("eastmoney", [new Error("unexpected")]);
		const yahoo = stubSource("yahoo", [new Error("unexpected")]);

		const series = await build({ sina, eastmoney, yahoo }).fetchGold(
			"2024-01-03",
			"2024-01-04"
		);

		expect(series.map((bar) => bar.date)).toEqual(["2024-01-03", "2024-01-04"]);
		expect(sina.requests).toHaveLength(0);
		expect(eastmoney.requests).toHaveLength(0);
		expect(yahoo.requests).toHaveLength(0);
		expect(events).toEqual(["cache_hit"]);
	});

	it("stops at the first primary candidate with data", async () => {
		const sina = stubSource("sina", [bars(WEEK)]);
		const eastmoney = stubSource("eastmoney", [new Error("unexpected")]);
		const yahoo = stubSource("yahoo", [new Error("unexpected")]);

		const series = await build({ sina, eastmoney, yahoo }).fetchGold(
			"2024-01-02",
			"2024-01-05"
		);

		expect(series).toHaveLength(4);
		expect(series[0].symbol).toBe("GC=F");
		expect(sina.requests.map((request) => request.symbol)).toEqual(["GC"]);
		expect(eastmoney.requests).toHaveLength(0);
	});

	it("falls through to the retrying provider and refreshes the cache", async () => {
		const sina = stubSource("sina", [new Error("sina down")]);
		const eastmoney = stubSource("eastmoney", [[]]);
		const yahoo = stubSource("yahoo", [new Error("timeout"), bars(WEEK)]);

		const series = await build({ sina, eastmoney, yahoo }).fetchGold(
			"2024-01-03",
			"2024-01-04"
		);

		expect(series.map((bar) => bar.date)).toEqual(["2024-01-03", "2024-01-04"]);
		expect(sina.requests.map((request) => request.symbol)).toEqual(["GC", "XAU"]);
		expect(eastmoney.requests[0]).toEqual({
			symbol: "1.518880",
			start: "2024-01-03",
			end: "2024-01-04",
			adjust: "forward",
		});
		expect(yahoo.requests).toHaveLength(2);
		expect(sleeps).toEqual([2_000]);
		expect(events).toEqual([
			"cache_miss",
			"provider_attempt_failed",
			"provider_attempt_failed",
			"provider_attempt_empty",
			"provider_attempt_failed",
			"retry_scheduled",
			"provider_accepted",
			"cache_written",
		]);

		const cached = await new PriceCache({ directory: dir }).read("GC=F");
		expect(cached?.map((bar) => bar.date)).toEqual(WEEK);
	});

	it("does not retry a payload that cannot be mapped", async () => {
		const sina = stubSource("sina", [new Error("sina down")]);
		const eastmoney = stubSource("eastmoney", [new Error("proxy down")]);
		const yahoo = stubSource("yahoo", [[{ date: "2024-01-02", open: 1 }]]);

		const error = await rejectionOf(
			build({ sina, eastmoney, yahoo }).fetchGold("2024-01-02", "2024-01-05")
		);

		expect(error).toBeInstanceOf(DataUnavailableError);
		expect(yahoo.requests).toHaveLength(1);
		expect(sleeps).toEqual([]);
	});

	it("treats bars outside the range as an empty answer", async () => {
		const sina = stubSource("sina", [bars(["2023-06-01", "2023-06-02"])]);
		const eastmoney = stubSource("eastmoney", [bars(WEEK)]);
		const yahoo = stubSource("yahoo", [new Error("unexpected")]);

		const series = await build({ sina, eastmoney, yahoo }).fetchGold(
			"2024-01-02",
			"2024-01-05"
		);

		expect(series).toHaveLength(4);
		expect(sina.requests).toHaveLength(2);
		expect(yahoo.requests).toHaveLength(0);
	});

	it("falls back to a stale snapshot when every provider fails", async () => {
		await new PriceCache({ directory: dir }).write(
			"GC=F",
			normalizePrices(bars(WEEK), "GC=F")
		);
		const sina = stubSource("sina", [new Error("sina down")]);
		const eastmoney = stubSource("eastmoney", [new Error("proxy down")]);
		const yahoo = stubSource("yahoo", [new Error("yahoo down")]);

		const series = await build({ sina, eastmoney, yahoo }).fetchGold(
			"2024-01-04",
			"2024-01-31",
			{ useCache: false }
		);

		expect(series.map((bar) => bar.date)).toEqual(["2024-01-04", "2024-01-05"]);
		expect(sina.requests).toHaveLength(2);
		expect(yahoo.requests).toHaveLength(3);
		expect(events.at(-1)).toBe("stale_cache_fallback");
	});

	it("raises DataUnavailableError listing every attempt", async () => {
		const sina = stubSource("sina", [new Error("sina down")]);
		const eastmoney = stubSource("eastmoney", [new Error("proxy down")]);
		const yahoo = stubSource("yahoo", [new Error("yahoo down")]);

		const error = await rejectionOf(
			build({ sina, eastmoney, yahoo }).fetchGold("2024-01-02", "2024-01-05")
		);

		if (!(error instanceof DataUnavailableError)) {
			throw new Error("expected DataUnavailableError");
		}
		expect(error.symbol).toBe("GC=F");
		expect(error.range).toEqual({ start: "2024-01-02", end: "2024-01-05" });
		expect(error.attempts.map(describeAttempt)).toEqual([
			"sina:GC:1:failed",
			"sina:XAU:1:failed",
			"eastmoney:1.518880:1:failed",
			"yahoo:GC=F:1:failed",
			"yahoo:GC=F:2:failed",
			"yahoo:GC=F:3:failed",
		]);
		expect(error.message).toBe(
			"No data available for GC=F between 2024-01-02 and 2024-01-05 (last error: yahoo down)"
		);
		expect(sleeps).toEqual([2_000, 4_000]);
		expect(events.at(-1)).toBe("data_unavailable");
	});

	it("returns fetched data when the cache cannot be written", async () => {
		const blocker = path.join(dir, "not-a-directory");
		fs.writeFileSync(blocker, "");
		const sina = stubSource("sina", [bars(WEEK)]);
		const eastmoney = stubSource("eastmoney", [[]]);
		const yahoo = stubSource("yahoo", [[]]);

		const series = await build(
			{ sina, eastmoney, yahoo },
			{ cacheDir: blocker }
		).fetchGold("2024-01-02", "2024-01-05");

		expect(series).toHaveLength(4);
		expect(events).toContain("cache_unreadable");
		expect(events.at(-1)).toBe("cache_write_failed");
	});

	it("rejects malformed and inverted ranges before any request", async () => {
		const sina = stubSource("sina", [bars(WEEK)]);
		const acquisition = build({
			sina,
			eastmoney: stubSource("eastmoney", [[]]),
			yahoo: stubSource("yahoo", [[]]),
		});

		await expect(
			acquisition.fetchGold("2024-02-01", "2024-01-01")
		).rejects.toBeInstanceOf(ConfigError);
		await expect(acquisition.fetchGold("2024/01/01")).rejects.toThrow(
			'Invalid start: expected YYYY-MM-DD, got "2024/01/01"'
		);
		expect(sina.requests).toHaveLength(0);
	});

	describe("equity", () => {
		it("requests forward-adjusted bars for ETFs by secid", async () => {
			const eastmoney = stubSource("eastmoney", [bars(WEEK, 3.5)]);
			const acquisition = build({
				sina: stubSource("sina", [[]]),
				eastmoney,
				yahoo: stubSource("yahoo", [[]]),
			});

			const series = await acquisition.fetchEquity("510300", "2024-01-02");

			expect(eastmoney.requests[0]).toEqual({
				symbol: "1.510300",
				start: "2024-01-02",
				end: "2024-01-31",
				adjust: "forward",
			});
			expect(series).toHaveLength(4);
			expect(series[0].symbol).toBe("510300");
		});

		it("requests unadjusted bars for indices", async () => {
			const eastmoney = stubSource("eastmoney", [bars(WEEK, 3500)]);
			const acquisition = build({
				sina: stubSource("sina", [[]]),
				eastmoney,
				yahoo: stubSource("yahoo", [[]]),
			});

			await acquisition.fetchEquity("399001", "2024-01-02", "2024-01-05");

			expect(eastmoney.requests[0].symbol).toBe("0.399001");
			expect(eastmoney.requests[0].adjust).toBe("none");
		});

		it("wraps provider failures in DataUnavailableError", async () => {
			const acquisition = build({
				sina: stubSource("sina", [[]]),
				eastmoney: stubSource("eastmoney", [new Error("eastmoney request failed 502: bad gateway")]),
				yahoo: stubSource("yahoo", [[]]),
			});

			const error = await rejectionOf(
				acquisition.fetchEquity("510300", "2024-01-02", "2024-01-05")
			);

			if (!(error instanceof DataUnavailableError)) {
				throw new Error("expected DataUnavailableError");
			}
			expect(error.symbol).toBe("510300");
			expect(error.lastError?.message).toBe(
				"eastmoney request failed 502: bad gateway"
			);
		});

		it("routes fetchAsset by symbol", async () => {
			const sina = stubSource("sina", [bars(WEEK)]);
			const eastmoney = stubSource("eastmoney", [bars(WEEK, 3.5)]);
			const acquisition = build({
				sina,
				eastmoney,
				yahoo: stubSource("yahoo", [[]]),
			});

			const gold = await acquisition.fetchAsset("GC=F", "2024-01-02", "2024-01-05");
			const equity = await acquisition.fetchAsset("510300", "2024-01-02", "2024-01-05");

			expect(gold[0].symbol).toBe("GC=F");
			expect(equity[0].symbol).toBe("510300");
			expect(sina.requests).toHaveLength(1);
			expect(eastmoney.requests).toHaveLength(1);
		});
	});
});
