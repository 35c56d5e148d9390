import { describe, expect, it } from "vitest";
import {
	ConfigError,
	DataUnavailableError,
	EmptyDataError,
	SchemaError,
	isRotationError,
} from "./errors";

describe("error taxonomy", () => {
	it("tags each error with its kind and class name", () => {
		const empty = new EmptyDataError("GC=F");
		const schema = new SchemaError("GC=F", ["close", "date"]);
		const config = new ConfigError("rebalance", "bad");

		expect(empty.kind).toBe("empty_data");
		expect(empty.name).toBe("EmptyDataError");
		expect(schema.kind).toBe("schema");
		expect(schema.message).toBe("Unresolvable columns for GC=F: close, date");
		expect(config.message).toBe("Invalid rebalance: bad");
		expect(isRotationError(config)).toBe(true);
		expect(isRotationError(new Error("plain"))).toBe(false);
	});

	it("carries every attempt and exposes the last failure as cause", () => {
		const first = new Error("timeout");
		const second = new Error("HTTP 503");
		const error = new DataUnavailableError(
			"GC=F",
			{ start: "2024-01-01", end: "2024-06-30" },
			[
				{ provider: "sina", target: "GC", attempt: 1, status: "failed", error: first },
				{ provider: "eastmoney", target: "1.518880", attempt: 1, status: "empty" },
				{ provider: "yahoo", target: "GC=F", attempt: 1, status: "failed", error: second },
				{ provider: "yahoo", target: "GC=F", attempt: 2, status: "empty" },
			]
		);

		expect(error.kind).toBe("data_unavailable");
		expect(error.attempts).toHaveLength(4);
		expect(error.lastError).toBe(second);
		expect(error.cause).toBe(second);
		expect(error.message).toBe(
			"No data available for GC=F between 2024-01-01 and 2024-06-30 (last error: HTTP 503)"
		);
	});

	it("omits the cause when no attempt failed outright", () => {
		const error = new DataUnavailableError(
			"510300",
			{ start: "2024-01-01", end: "2024-01-31" },
			[]
		);
		expect(error.lastError).toBeUndefined();
		expect(error.cause).toBeUndefined();
	});
});
