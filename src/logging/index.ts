/**
 * Logging utilities.
 */

export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  newRunId,
  silentLogger,
  LOG_LEVELS,
  type LogEntry,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
