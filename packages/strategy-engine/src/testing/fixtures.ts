import type { PriceBar, PriceSeries } from "@gold-rotation/core";
import { addDays, dayOfWeek } from "@gold-rotation/core";

/** `count` weekdays starting at `start` (inclusive when it is a weekday). */
export const weekdays = (start: string, count: number): string[] => {
	const days: string[] = [];
	for (let date = start; days.length < count; date = addDays(date, 1)) {
		const dow = dayOfWeek(date);
		if (dow !== 0 && dow !== 6) {
			days.push(date);
		}
	}
	return days;
};

export const toSeries = (
	symbol: string,
	dates: readonly string[],
	closes: readonly number[]
): PriceSeries =>
	dates.map(
		(date, idx): PriceBar => ({
			date,
			open: closes[idx],
			high: closes[idx],
			low: closes[idx],
			close: closes[idx],
			volume: 0,
			symbol,
		})
	);
