import { describe, expect, it } from "vitest";
import { cumulativeProduct, momentum, pctChange, simpleReturns } from "./returns";

describe("pctChange", () => {
	it("leaves the first periods without a reference", () => {
		const result = pctChange([100, 110, 121, 99], 2);
		expect(result.slice(0, 2)).toEqual([null, null]);
		expect(result[2]).toBeCloseTo(0.21, 12);
		expect(result[3]).toBeCloseTo(-0.1, 12);
	});

	it("returns null when the reference price is zero", () => {
		expect(pctChange([0, 5, 10], 1)).toEqual([null, null, 1]);
	});

	it("rejects non-positive or fractional periods", () => {
		expect(() => pctChange([1, 2], 0)).toThrow(
			"pctChange periods must be a positive integer"
		);
		expect(() => pctChange([1, 2], 1.5)).toThrow(
			"pctChange periods must be a positive integer"
		);
	});
});

describe("momentum", () => {
	it("measures the trailing lookback return", () => {
		const result = momentum([100, 101, 102, 105], 3);
		expect(result.slice(0, 3)).toEqual([null, null, null]);
		expect(result[3]).toBeCloseTo(0.05, 12);
	});
});

describe("simpleReturns", () => {
	it("defines the first return as zero", () => {
		const result = simpleReturns([50, 55, 44]);
		expect(result[0]).toBe(0);
		expect(result[1]).toBeCloseTo(0.1, 12);
		expect(result[2]).toBeCloseTo(-0.2, 12);
	});

	it("handles an empty series", () => {
		expect(simpleReturns([])).toEqual([]);
	});
});

describe("cumulativeProduct", () => {
	it("compounds returns from a unit start", () => {
		const curve = cumulativeProduct([0.1, -0.5, 0]);
		expect(curve[0]).toBeCloseTo(1.1, 12);
		expect(curve[1]).toBeCloseTo(0.55, 12);
		expect(curve[2]).toBeCloseTo(0.55, 12);
	});
});
