/**
 * Fractional change over `periods` observations:
 * `values[i] / values[i - periods] - 1`. The first `periods` entries have no
 * reference and are null, as is any entry whose reference is zero.
 */
export function pctChange(
	values: readonly number[],
	periods: number
): Array<number | null> {
	if (!Number.isInteger(periods) || periods <= 0) {
		throw new Error("pctChange periods must be a positive integer");
	}

	return values.map((value, idx) => {
		if (idx < periods) {
			return null;
		}
		const base = values[idx - periods];
		return base === 0 ? null : value / base - 1;
	});
}

/** Trailing return over `lookback` observations; null until enough history exists. */
export function momentum(
	closes: readonly number[],
	lookback: number
): Array<number | null> {
	return pctChange(closes, lookback);
}

/** Close-to-close returns. Day 0 has no prior close and is defined as 0. */
export function simpleReturns(closes: readonly number[]): number[] {
	return pctChange(closes, 1).map((value) => value ?? 0);
}

export function cumulativeProduct(returns: readonly number[]): number[] {
	let level = 1;
	return returns.map((value) => {
		level *= 1 + value;
		return level;
	});
}
