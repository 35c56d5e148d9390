import type { RawRow } from "@gold-rotation/core";
import { DAY_MS, SECOND_MS, addDays, toEpochDay } from "@gold-rotation/core";
import type { FetchLike, PriceRequest, PriceSource } from "../types";
import { defaultFetch, isRecord, parseJson, requestText } from "./http";

export interface YahooChartClientOptions {
	fetchImpl?: FetchLike;
	baseUrl?: string;
}

const PROVIDER = "yahoo";

const firstRecord = (value: unknown): Record<string, unknown> | undefined => {
	if (!Array.isArray(value)) {
		return undefined;
	}
	const [first] = value;
	return isRecord(first) ? first : undefined;
};

const cell = (series: unknown, idx: number): unknown =>
	Array.isArray(series) ? series[idx] : undefined;

/**
 * Flatten a v8 chart response into one row per timestamp. Timestamps are
 * shifted by the exchange's `gmtoffset` so each bar lands on the trading day
 * the venue reports, not the UTC day.
 */
export const parseChart = (payload: unknown): RawRow[] => {
	const chart = isRecord(payload) ? payload.chart : undefined;
	if (!isRecord(chart)) {
		throw new Error(`${PROVIDER} payload has no chart`);
	}
	if (isRecord(chart.error)) {
		const description = chart.error.description;
		throw new Error(
			typeof description === "string" ? description : `${PROVIDER} chart error`
		);
	}
	const result = firstRecord(chart.result);
	if (!result || !Array.isArray(result.timestamp)) {
		return [];
	}

	const meta = isRecord(result.meta) ? result.meta : {};
	const gmtoffset = typeof meta.gmtoffset === "number" ? meta.gmtoffset : 0;
	const indicators = isRecord(result.indicators) ? result.indicators : {};
	const quote = firstRecord(indicators.quote) ?? {};
	const adjclose = firstRecord(indicators.adjclose) ?? {};

	const rows: RawRow[] = [];
	result.timestamp.forEach((ts: unknown, idx: number) => {
		if (typeof ts !== "number") {
			return;
		}
		rows.push({
			Date: new Date((ts + gmtoffset) * SECOND_MS).toISOString().slice(0, 10),
			Open: cell(quote.open, idx),
			High: cell(quote.high, idx),
			Low: cell(quote.low, idx),
			Close: cell(quote.close, idx),
			"Adj Close": cell(adjclose.adjclose, idx),
			Volume: cell(quote.volume, idx),
		});
	});
	return rows;
};

export class YahooChartClient implements PriceSource {
	readonly name = PROVIDER;
	private readonly fetchImpl: FetchLike;
	private readonly baseUrl: string;

	constructor(options: YahooChartClientOptions = {}) {
		this.fetchImpl = options.fetchImpl ?? defaultFetch;
		this.baseUrl = options.baseUrl ?? "https://query1.finance.yahoo.com";
	}

	buildUrl(request: PriceRequest): string {
		const toSeconds = (date: string): number =>
			(toEpochDay(date) * DAY_MS) / SECOND_MS;
		const params = new URLSearchParams({
			period1: String(toSeconds(request.start)),
			// period2 is exclusive
			period2: String(toSeconds(addDays(request.end, 1))),
			interval: "1d",
			includePrePost: "false",
			events: "div,splits",
		});
		return `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(
			request.symbol
		)}?${params.toString()}`;
	}

	async fetchDaily(request: PriceRequest): Promise<RawRow[]> {
		const body = await requestText(
			this.fetchImpl,
			PROVIDER,
			this.buildUrl(request)
		);
		return parseChart(parseJson(PROVIDER, body));
	}
}
