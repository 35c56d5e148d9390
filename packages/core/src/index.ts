/**
 * Shared contracts, errors, calendar helpers, logging and configuration.
 * Every other package in the workspace builds on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./time/calendar";
export * from "./time/constants";
export {
	configureLogging,
	createLogger,
	log,
	readLoggerSettings,
	sanitize,
} from "./utils/logger";
export type {
	BaseLogPayload,
	LoggerSettings,
	LogLevel,
	ModuleLogger,
} from "./utils/logger";
