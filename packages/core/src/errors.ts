import type { DateRange, ProviderAttempt } from "./types";

export type RotationErrorKind =
	| "empty_data"
	| "schema"
	| "data_unavailable"
	| "config";

export abstract class RotationError extends Error {
	abstract readonly kind: RotationErrorKind;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class EmptyDataError extends RotationError {
	readonly kind = "empty_data";

	constructor(readonly symbol: string) {
		super(`No data returned for symbol ${symbol}`);
	}
}

export class SchemaError extends RotationError {
	readonly kind = "schema";

	constructor(
		readonly symbol: string,
		readonly missingColumns: readonly string[]
	) {
		super(
			`Unresolvable columns for ${symbol}: ${missingColumns.join(", ")}`
		);
	}
}

export class DataUnavailableError extends RotationError {
	readonly kind = "data_unavailable";

	constructor(
		readonly symbol: string,
		readonly range: DateRange,
		readonly attempts: readonly ProviderAttempt[]
	) {
		const lastError = findLastError(attempts);
		super(
			`No data available for ${symbol} between ${range.start} and ${range.end}` +
				(lastError ? ` (last error: ${lastError.message})` : ""),
			lastError ? { cause: lastError } : undefined
		);
	}

	get lastError(): Error | undefined {
		return findLastError(this.attempts);
	}
}

export class ConfigError extends RotationError {
	readonly kind = "config";

	constructor(
		readonly field: string,
		message: string,
		options?: ErrorOptions
	) {
		super(`Invalid ${field}: ${message}`, options);
	}
}

export const isRotationError = (value: unknown): value is RotationError =>
	value instanceof RotationError;

export const toError = (value: unknown): Error =>
	value instanceof Error ? value : new Error(String(value));

const findLastError = (
	attempts: readonly ProviderAttempt[]
): Error | undefined => {
	for (let i = attempts.length - 1; i >= 0; i -= 1) {
		const attempt = attempts[i];
		if (attempt.status === "failed") {
			return attempt.error;
		}
	}
	return undefined;
};
