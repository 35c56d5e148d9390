import { describe, expect, it } from "vitest";
import {
	addDays,
	dayOfWeek,
	daysBetween,
	isCalendarDate,
	monthKey,
	parseCalendarDate,
	toCompactDate,
	weekEndingFriday,
} from "./calendar";

describe("calendar utilities", () => {
	describe("parseCalendarDate", () => {
		it("accepts ISO dates unchanged", () => {
			expect(parseCalendarDate("2024-03-15")).toBe("2024-03-15");
		});

		it("truncates time of day and offsets without converting", () => {
			expect(parseCalendarDate("2024-03-15 15:00:00")).toBe("2024-03-15");
			expect(parseCalendarDate("2024-03-15T23:30:00-05:00")).toBe(
				"2024-03-15"
			);
		});

		it("pads single-digit month and day", () => {
			expect(parseCalendarDate("2024/3/5")).toBe("2024-03-05");
		});

		it("reads compact YYYYMMDD strings and numbers", () => {
			expect(parseCalendarDate("20240315")).toBe("2024-03-15");
			expect(parseCalendarDate(20240315)).toBe("2024-03-15");
		});

		it("reads Date objects and epoch milliseconds in UTC", () => {
			expect(parseCalendarDate(new Date(Date.UTC(2024, 2, 15, 22)))).toBe(
				"2024-03-15"
			);
			expect(parseCalendarDate(Date.UTC(2024, 2, 15))).toBe("2024-03-15");
		});

		it("rejects impossible or unparseable values", () => {
			expect(parseCalendarDate("2024-02-30")).toBeNull();
			expect(parseCalendarDate("not a date")).toBeNull();
			expect(parseCalendarDate("")).toBeNull();
			expect(parseCalendarDate(null)).toBeNull();
			expect(parseCalendarDate(new Date("garbage"))).toBeNull();
		});
	});

	it("validates canonical calendar dates", () => {
		expect(isCalendarDate("2024-03-15")).toBe(true);
		expect(isCalendarDate("2024-3-15")).toBe(false);
		expect(isCalendarDate("2023-02-29")).toBe(false);
	});

	it("counts days across month and leap boundaries", () => {
		expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
		expect(daysBetween("2023-01-01", "2024-01-01")).toBe(365);
		expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
		expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
	});

	it("maps each day to the Friday closing its week", () => {
		// 2024-03-15 is a Friday
		expect(dayOfWeek("2024-03-15")).toBe(5);
		expect(weekEndingFriday("2024-03-15")).toBe("2024-03-15");
		expect(weekEndingFriday("2024-03-11")).toBe("2024-03-15");
		expect(weekEndingFriday("2024-03-10")).toBe("2024-03-15");
		expect(weekEndingFriday("2024-03-16")).toBe("2024-03-22");
	});

	it("derives month keys and compact forms", () => {
		expect(monthKey("2024-03-15")).toBe("2024-03");
		expect(toCompactDate("2024-03-15")).toBe("20240315");
	});
});
