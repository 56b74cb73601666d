/**
 * Observability — logging for pomsync.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	getLoggingConfig,
	resetLoggingConfig,
	parseLogLevel,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
} from "./logger.js";
