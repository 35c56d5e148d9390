import {
	ConfigError,
	DataUnavailableError,
	isRotationError,
	toError,
} from "@gold-rotation/core";

export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;
export const EXIT_DATA_UNAVAILABLE = 3;

export interface FailureReport {
	exitCode: number;
	lines: string[];
}

/** Turn a failed run into console lines and a process exit code. */
export const describeFailure = (caught: unknown): FailureReport => {
	if (caught instanceof ConfigError) {
		return {
			exitCode: EXIT_CONFIG,
			lines: [`Configuration error: ${caught.message}`],
		};
	}
	if (caught instanceof DataUnavailableError) {
		const { symbol, range } = caught;
		return {
			exitCode: EXIT_DATA_UNAVAILABLE,
			lines: [
				`Data unavailable for ${symbol} between ${range.start} and ${range.end}; every source was tried.`,
				...caught.attempts.map((attempt) => {
					const detail =
						attempt.status === "failed"
							? `failed: ${attempt.error.message}`
							: attempt.status === "ok"
								? `ok (${attempt.rows} rows)`
								: "no rows in range";
					return `  ${attempt.provider} ${attempt.target} #${attempt.attempt}: ${detail}`;
				}),
			],
		};
	}
	const error = toError(caught);
	const label = isRotationError(error) ? `${error.kind} error` : "Backtest failed";
	return { exitCode: EXIT_FAILURE, lines: [`${label}: ${error.message}`] };
};
