import type { RawRow } from "@gold-rotation/core";
import { toCompactDate } from "@gold-rotation/core";
import type { FetchLike, PriceRequest, PriceSource } from "../types";
import { defaultFetch, isRecord, parseJson, requestText } from "./http";

export interface SinaFuturesClientOptions {
	fetchImpl?: FetchLike;
	baseUrl?: string;
}

const PROVIDER = "sina";

/**
 * Extract the JSON payload from Sina's `var _X=(...);` JSONP wrapper.
 * Returns [] when the endpoint answers with `null` for an unknown contract.
 */
export const parseSinaJsonp = (body: string): RawRow[] => {
	const open = body.indexOf("(");
	const close = body.lastIndexOf(")");
	if (open === -1 || close <= open) {
		throw new Error(`${PROVIDER} returned an unrecognized payload`);
	}
	const inner = body.slice(open + 1, close).trim();
	if (!inner || inner === "null") {
		return [];
	}
	const parsed = parseJson(PROVIDER, inner);
	if (!Array.isArray(parsed)) {
		throw new Error(`${PROVIDER} payload is not a list of bars`);
	}
	return parsed.filter(isRecord);
};

/**
 * Daily K-lines for global futures contracts (GC, XAU, ...). The endpoint
 * returns the full history; callers cut it to the requested range.
 */
export class SinaFuturesClient implements PriceSource {
	readonly name = PROVIDER;
	private readonly fetchImpl: FetchLike;
	private readonly baseUrl: string;

	constructor(options: SinaFuturesClientOptions = {}) {
		this.fetchImpl = options.fetchImpl ?? defaultFetch;
		this.baseUrl = options.baseUrl ?? "https://stock2.finance.sina.com.cn";
	}

	buildUrl(request: PriceRequest): string {
		const symbol = encodeURIComponent(request.symbol);
		const stamp = toCompactDate(request.end);
		return (
			`${this.baseUrl}/futures/api/jsonp.php/var%20_${symbol}${stamp}=/` +
			`GlobalFuturesService.getGlobalFuturesDailyKLine?symbol=${symbol}` +
			`&_=${stamp}&source=web`
		);
	}

	async fetchDaily(request: PriceRequest): Promise<RawRow[]> {
		const body = await requestText(
			this.fetchImpl,
			PROVIDER,
			this.buildUrl(request),
			{ Referer: "https://finance.sina.com.cn/" }
		);
		return parseSinaJsonp(body);
	}
}
