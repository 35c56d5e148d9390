/**
 * Calendar-day helpers. Dates travel through the system as ISO strings
 * (YYYY-MM-DD) with no time-of-day or timezone, so lexical order is
 * chronological order.
 */

import { DAY_MS } from "./constants";

const SEPARATED_DATE = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?=$|[T\s])/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})(?=$|[T\s])/;

const pad = (value: number, width = 2): string =>
	String(value).padStart(width, "0");

const buildDate = (year: number, month: number, day: number): string | null => {
	const ms = Date.UTC(year, month - 1, day);
	const check = new Date(ms);
	if (
		check.getUTCFullYear() !== year ||
		check.getUTCMonth() !== month - 1 ||
		check.getUTCDate() !== day
	) {
		return null;
	}
	return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
};

/**
 * Reduce a provider date value to a calendar day.
 *
 * Strings keep the wall-clock date as written: anything after the date
 * (time of day, offset) is discarded rather than converted. Date objects and
 * epoch-millisecond numbers are read in UTC. Eight-digit numbers are treated
 * as YYYYMMDD.
 */
export const parseCalendarDate = (value: unknown): string | null => {
	if (value instanceof Date) {
		return Number.isNaN(value.getTime())
			? null
			: value.toISOString().slice(0, 10);
	}
	if (typeof value === "number") {
		if (!Number.isFinite(value)) {
			return null;
		}
		if (Number.isInteger(value) && value >= 10_000_000 && value <= 99_999_999) {
			return parseCalendarDate(String(value));
		}
		return parseCalendarDate(new Date(value));
	}
	if (typeof value !== "string") {
		return null;
	}
	const trimmed = value.trim();
	const match = SEPARATED_DATE.exec(trimmed) ?? COMPACT_DATE.exec(trimmed);
	if (!match) {
		return null;
	}
	return buildDate(Number(match[1]), Number(match[2]), Number(match[3]));
};

export const isCalendarDate = (value: string): boolean =>
	/^\d{4}-\d{2}-\d{2}$/.test(value) && parseCalendarDate(value) === value;

export const toEpochDay = (date: string): number => {
	const [year, month, day] = date.split("-").map(Number);
	return Math.round(Date.UTC(year, month - 1, day) / DAY_MS);
};

export const fromEpochDay = (epochDay: number): string =>
	new Date(epochDay * DAY_MS).toISOString().slice(0, 10);

export const daysBetween = (from: string, to: string): number =>
	toEpochDay(to) - toEpochDay(from);

export const addDays = (date: string, days: number): string =>
	fromEpochDay(toEpochDay(date) + days);

/** 0 = Sunday ... 6 = Saturday */
export const dayOfWeek = (date: string): number =>
	new Date(toEpochDay(date) * DAY_MS).getUTCDay();

/** The Friday that closes the Saturday..Friday week containing `date`. */
export const weekEndingFriday = (date: string): string =>
	addDays(date, (5 - dayOfWeek(date) + 7) % 7);

export const monthKey = (date: string): string => date.slice(0, 7);

export const todayCalendarDate = (now: Date = new Date()): string =>
	now.toISOString().slice(0, 10);

/** YYYYMMDD, the form several Chinese market endpoints take. */
export const toCompactDate = (date: string): string => date.replace(/-/g, "");
