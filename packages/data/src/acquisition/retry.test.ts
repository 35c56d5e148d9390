import { describe, expect, it, vi } from "vitest";
import { linearBackoffDelayMs, retryWithLinearBackoff } from "./retry";

describe("retryWithLinearBackoff", () => {
	it("returns the first success without sleeping", async () => {
		const sleep = vi.fn(async () => {});
		const result = await retryWithLinearBackoff(async () => "ok", {
			retries: 3,
			backoffSeconds: 2,
			sleep,
		});
		expect(result).toBe("ok");
		expect(sleep).not.toHaveBeenCalled();
	});

	it("waits backoffSeconds * attempt between attempts", async () => {
		const sleep = vi.fn(async (_ms: number) => {});
		let calls = 0;
		const result = await retryWithLinearBackoff(
			async (attempt) => {
				calls += 1;
				if (attempt < 3) {
					throw new Error(`fail ${attempt}`);
				}
				return attempt;
			},
			{ retries: 3, backoffSeconds: 2, sleep }
		);
		expect(result).toBe(3);
		expect(calls).toBe(3);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2_000, 4_000]);
	});

	it("rethrows the last error once attempts run out", async () => {
		const sleep = vi.fn(async () => {});
		const failures: Array<[string, number, number | null]> = [];
		await expect(
			retryWithLinearBackoff(
				async (attempt) => {
					throw new Error(`fail ${attempt}`);
				},
				{
					retries: 2,
					backoffSeconds: 1,
					sleep,
					onAttemptFailed: (error, attempt, delayMs) =>
						failures.push([error.message, attempt, delayMs]),
				}
			)
		).rejects.toThrow("fail 2");
		expect(failures).toEqual([
			["fail 1", 1, 1_000],
			["fail 2", 2, null],
		]);
		expect(sleep).toHaveBeenCalledTimes(1);
	});

	it("stops immediately when shouldRetry declines", async () => {
		const sleep = vi.fn(async () => {});
		let calls = 0;
		await expect(
			retryWithLinearBackoff(
				async () => {
					calls += 1;
					throw new Error("malformed");
				},
				{ retries: 5, backoffSeconds: 1, sleep, shouldRetry: () => false }
			)
		).rejects.toThrow("malformed");
		expect(calls).toBe(1);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("computes linear delays", () => {
		expect(linearBackoffDelayMs(1.5, 1)).toBe(1_500);
		expect(linearBackoffDelayMs(1.5, 3)).toBe(4_500);
		expect(linearBackoffDelayMs(0, 4)).toBe(0);
	});
});
