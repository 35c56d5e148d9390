import { ConfigError } from "@gold-rotation/core";
import type {
	ExchangeCode,
	InstrumentClassification,
	InstrumentType,
} from "../types";

export interface InstrumentRule {
	prefix: string;
	type: InstrumentType;
	exchange: ExchangeCode;
}

/**
 * Checked in order; the first matching code prefix wins. Codes matching
 * nothing are treated as Shanghai indices (000001, 000300, ...).
 */
export const INSTRUMENT_RULES: readonly InstrumentRule[] = [
	{ prefix: "399", type: "index", exchange: "SZ" },
	{ prefix: "5", type: "etf", exchange: "SH" },
	{ prefix: "1", type: "etf", exchange: "SZ" },
];

const FALLBACK_RULE: Omit<InstrumentRule, "prefix"> = {
	type: "index",
	exchange: "SH",
};

const SUFFIX_PATTERN = /\.(SH|SZ)$/i;

const parseExchangeSuffix = (value: string): ExchangeCode | undefined => {
	const upper = value.toUpperCase();
	return upper === "SH" || upper === "SZ" ? upper : undefined;
};

/**
 * Classify an A-share listing such as "510300", "510300.SH" or "399001.sz".
 * An explicit exchange suffix fixes the venue and `override` fixes the type;
 * otherwise both come from {@link INSTRUMENT_RULES}.
 */
export const classifyInstrument = (
	symbol: string,
	override?: InstrumentType
): InstrumentClassification => {
	const trimmed = symbol.trim();
	const suffixMatch = SUFFIX_PATTERN.exec(trimmed);
	const code = suffixMatch ? trimmed.slice(0, suffixMatch.index) : trimmed;
	if (!/^\d{6}$/.test(code)) {
		throw new ConfigError("symbol", `unrecognized A-share code ${symbol}`);
	}

	const rule =
		INSTRUMENT_RULES.find((candidate) => code.startsWith(candidate.prefix)) ??
		FALLBACK_RULE;
	const suffixExchange = suffixMatch
		? parseExchangeSuffix(suffixMatch[1])
		: undefined;

	return {
		code,
		exchange: suffixExchange ?? rule.exchange,
		type: override ?? rule.type,
	};
};
