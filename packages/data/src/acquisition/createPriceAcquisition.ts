import { PriceCache } from "../cache/PriceCache";
import { EastmoneyKlineClient, toSecid } from "../providers/EastmoneyKlineClient";
import { SinaFuturesClient } from "../providers/SinaFuturesClient";
import { YahooChartClient } from "../providers/YahooChartClient";
import type { DataProviderLogger, FetchLike, FetchOptions, Sleep } from "../types";
import { PriceAcquisition } from "./PriceAcquisition";

export const DEFAULT_GOLD_SYMBOL = "GC=F";
export const DEFAULT_SINA_CANDIDATES: readonly string[] = ["GC", "XAU"];
/** Shanghai-listed gold ETF used when the futures feeds are down. */
export const DEFAULT_GOLD_PROXY_CODE = "518880";

export interface CreatePriceAcquisitionOptions extends FetchOptions {
	cacheDir: string;
	goldSymbol?: string;
	sinaCandidates?: readonly string[];
	goldProxyCode?: string;
	fetchImpl?: FetchLike;
	logger?: DataProviderLogger;
	sleep?: Sleep;
}

export const createPriceAcquisition = (
	options: CreatePriceAcquisitionOptions
): PriceAcquisition => {
	const goldSymbol = options.goldSymbol ?? DEFAULT_GOLD_SYMBOL;
	const eastmoney = new EastmoneyKlineClient({ fetchImpl: options.fetchImpl });
	return new PriceAcquisition({
		cache: new PriceCache({ directory: options.cacheDir }),
		goldSymbol,
		gold: {
			primary: {
				source: new SinaFuturesClient({ fetchImpl: options.fetchImpl }),
				candidates: options.sinaCandidates ?? DEFAULT_SINA_CANDIDATES,
			},
			proxy: {
				source: eastmoney,
				symbol: toSecid(options.goldProxyCode ?? DEFAULT_GOLD_PROXY_CODE, "SH"),
				adjust: "forward",
			},
			fallback: {
				source: new YahooChartClient({ fetchImpl: options.fetchImpl }),
				symbol: goldSymbol,
			},
		},
		equitySource: eastmoney,
		defaults: {
			retries: options.retries,
			backoffSeconds: options.backoffSeconds,
			useCache: options.useCache,
		},
		logger: options.logger,
		sleep: options.sleep,
	});
};
