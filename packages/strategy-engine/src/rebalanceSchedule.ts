import type { RebalanceMode } from "@gold-rotation/core";
import { monthKey, weekEndingFriday } from "@gold-rotation/core";

const periodKey: Record<RebalanceMode, (date: string) => string> = {
	daily: (date) => date,
	// Saturday..Friday buckets, so a Friday close or the last day before it wins.
	weekly: weekEndingFriday,
	monthly: monthKey,
};

/**
 * Mark the decision dates in an ascending date list: every date for daily,
 * the last observation of each week or calendar month otherwise. The final
 * observation always closes its (possibly partial) period.
 */
export function decisionFlags(
	dates: readonly string[],
	mode: RebalanceMode
): boolean[] {
	const keyOf = periodKey[mode];
	return dates.map(
		(date, idx) => idx === dates.length - 1 || keyOf(date) !== keyOf(dates[idx + 1])
	);
}

export function decisionDates(
	dates: readonly string[],
	mode: RebalanceMode
): string[] {
	const flags = decisionFlags(dates, mode);
	return dates.filter((_, idx) => flags[idx]);
}
