/**
 * Observability — structured logging for Registrar.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	FileTransport,
	createLogger,
	configureLogging,
	parseLogLevel,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
} from "./logger.js";
