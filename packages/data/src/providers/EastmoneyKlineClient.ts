import type { RawRow } from "@gold-rotation/core";
import { toCompactDate } from "@gold-rotation/core";
import type {
	ExchangeCode,
	FetchLike,
	PriceRequest,
	PriceSource,
} from "../types";
import { defaultFetch, isRecord, parseJson, requestText } from "./http";

export interface EastmoneyKlineClientOptions {
	fetchImpl?: FetchLike;
	baseUrl?: string;
}

const PROVIDER = "eastmoney";

// Column order of fields2=f51..f57
const KLINE_COLUMNS = [
	"日期",
	"开盘",
	"收盘",
	"最高",
	"最低",
	"成交量",
	"成交额",
] as const;

const MARKET_PREFIX: Record<ExchangeCode, string> = {
	SH: "1",
	SZ: "0",
};

/** `secid` addressing used by the kline endpoint, e.g. 1.510300. */
export const toSecid = (code: string, exchange: ExchangeCode): string =>
	`${MARKET_PREFIX[exchange]}.${code}`;

export const parseKlines = (payload: unknown): RawRow[] => {
	if (!isRecord(payload)) {
		throw new Error(`${PROVIDER} payload is not an object`);
	}
	const data = payload.data;
	if (data === null || data === undefined) {
		return [];
	}
	if (!isRecord(data) || !Array.isArray(data.klines)) {
		throw new Error(`${PROVIDER} payload has no klines`);
	}
	const rows: RawRow[] = [];
	for (const line of data.klines) {
		if (typeof line !== "string") {
			continue;
		}
		const cells = line.split(",");
		const row: RawRow = {};
		KLINE_COLUMNS.forEach((column, idx) => {
			row[column] = cells[idx];
		});
		rows.push(row);
	}
	return rows;
};

/**
 * Daily bars for Shanghai/Shenzhen listed ETFs and indices. Rows keep the
 * endpoint's Chinese column names.
 */
export class EastmoneyKlineClient implements PriceSource {
	readonly name = PROVIDER;
	private readonly fetchImpl: FetchLike;
	private readonly baseUrl: string;

	constructor(options: EastmoneyKlineClientOptions = {}) {
		this.fetchImpl = options.fetchImpl ?? defaultFetch;
		this.baseUrl = options.baseUrl ?? "https://push2his.eastmoney.com";
	}

	buildUrl(request: PriceRequest): string {
		const params = new URLSearchParams({
			secid: request.symbol,
			fields1: "f1,f2,f3,f4,f5,f6",
			fields2: "f51,f52,f53,f54,f55,f56,f57",
			klt: "101",
			fqt: request.adjust === "forward" ? "1" : "0",
			beg: toCompactDate(request.start),
			end: toCompactDate(request.end),
		});
		return `${this.baseUrl}/api/qt/stock/kline/get?${params.toString()}`;
	}

	async fetchDaily(request: PriceRequest): Promise<RawRow[]> {
		const body = await requestText(
			this.fetchImpl,
			PROVIDER,
			this.buildUrl(request)
		);
		return parseKlines(parseJson(PROVIDER, body));
	}
}
