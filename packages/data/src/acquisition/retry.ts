import { SECOND_MS, toError } from "@gold-rotation/core";
import type { Sleep } from "../types";

export const defaultSleep: Sleep = (ms) =>
	new Promise((resolve) => setTimeout(resolve, ms));

export interface LinearBackoffOptions {
	retries: number;
	backoffSeconds: number;
	sleep?: Sleep;
	/** Return false to stop retrying after this failure. */
	shouldRetry?: (error: Error) => boolean;
	onAttemptFailed?: (error: Error, attempt: number, delayMs: number | null) => void;
}

/** Wait before the attempt that follows `attempt` (1-based). */
export const linearBackoffDelayMs = (
	backoffSeconds: number,
	attempt: number
): number => backoffSeconds * attempt * SECOND_MS;

/**
 * Run `task` up to `retries` times. After failed attempt n the next one starts
 * `backoffSeconds * n` seconds later. The last error is rethrown once
 * attempts run out or `shouldRetry` declines.
 */
export const retryWithLinearBackoff = async <T>(
	task: (attempt: number) => Promise<T>,
	options: LinearBackoffOptions
): Promise<T> => {
	const retries = Math.max(Math.floor(options.retries), 1);
	const sleep = options.sleep ?? defaultSleep;
	for (let attempt = 1; ; attempt += 1) {
		try {
			return await task(attempt);
		} catch (caught) {
			const error = toError(caught);
			const canRetry =
				attempt < retries && (options.shouldRetry?.(error) ?? true);
			const delayMs = canRetry
				? linearBackoffDelayMs(options.backoffSeconds, attempt)
				: null;
			options.onAttemptFailed?.(error, attempt, delayMs);
			if (delayMs === null) {
				throw error;
			}
			await sleep(delayMs);
		}
	}
};
