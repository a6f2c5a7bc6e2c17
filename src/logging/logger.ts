/**
 * Lightweight logging utility.
 *
 * Lines go to stderr (stdout is reserved for the notification text and
 * --json output) and, when a file path is configured, are appended to a
 * log file as well.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Run ID stamped on every line */
  runId?: string;
  /** Append lines to this file (no file output when unset) */
  filePath?: string;
  /** Enable stderr output */
  console?: boolean;
  /** Receives every formatted line; used by tests to capture output */
  sink?: (line: string, level: LogLevel) => void;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  runId: string | undefined,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId ?? "no-run-id"}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const toConsole = options.console ?? true;
  const { filePath, runId, sink } = options;

  if (filePath) {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  function log(
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
      return;
    }

    const entry = formatLogEntry(entryLevel, message, runId, context);

    if (toConsole) {
      process.stderr.write(entry + "\n");
    }

    if (filePath) {
      try {
        appendFileSync(filePath, entry + "\n");
      } catch (err) {
        // Fall back to stderr if the file cannot be written
        process.stderr.write(`Failed to write to log file ${filePath}: ${String(err)}\n`);
      }
    }

    sink?.(entry, entryLevel);
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

/**
 * Logger that discards everything. Default for library calls that are not
 * given a logger.
 */
export const silentLogger: Logger = createLogger({ console: false });
