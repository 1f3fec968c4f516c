/**
 * Logging and observability utilities.
 */

export {
  generateRunId,
  generateRequestId,
  initRunId,
  getRunId,
} from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
