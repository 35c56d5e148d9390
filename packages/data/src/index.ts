export * from "./types";
export { PriceAcquisition, CACHE_PROVIDER } from "./acquisition/PriceAcquisition";
export type {
	AssetFetchOptions,
	PriceAcquisitionOptions,
} from "./acquisition/PriceAcquisition";
export {
	createPriceAcquisition,
	DEFAULT_GOLD_PROXY_CODE,
	DEFAULT_GOLD_SYMBOL,
	DEFAULT_SINA_CANDIDATES,
} from "./acquisition/createPriceAcquisition";
export type { CreatePriceAcquisitionOptions } from "./acquisition/createPriceAcquisition";
export { classifyInstrument, INSTRUMENT_RULES } from "./acquisition/instrumentClassifier";
export type { InstrumentRule } from "./acquisition/instrumentClassifier";
export {
	defaultSleep,
	linearBackoffDelayMs,
	retryWithLinearBackoff,
} from "./acquisition/retry";
export type { LinearBackoffOptions } from "./acquisition/retry";
export { PriceCache, CACHE_HEADER, formatCacheCsv } from "./cache/PriceCache";
export type { PriceCacheOptions } from "./cache/PriceCache";
export {
	COLUMN_ALIASES,
	REQUIRED_COLUMNS,
	normalizeHeader,
	resolveColumns,
} from "./normalize/columnAliases";
export type { CanonicalColumn, ColumnMapping } from "./normalize/columnAliases";
export { coerceNumber, filterRange, normalizePrices } from "./normalize/normalizePrices";
export { SinaFuturesClient } from "./providers/SinaFuturesClient";
export { EastmoneyKlineClient, toSecid } from "./providers/EastmoneyKlineClient";
export { YahooChartClient } from "./providers/YahooChartClient";
