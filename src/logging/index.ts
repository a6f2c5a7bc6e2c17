/**
 * Logging and observability utilities.
 */

export { generateRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
