/**
 * Lightweight logging utility.
 * Writes timestamped, run-scoped entries to stderr and optionally a log file.
 *
 * Console output goes to stderr so that the CLI can stream the generated
 * article on stdout. Every logger carries the id of the article run it
 * belongs to; children inherit it, so one run's entries can be grepped out
 * of a shared log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console (stderr) output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Component name prefixed to every message, e.g. "sources" */
  scope?: string;
  /** Run id stamped on every entry; a fresh one by default */
  runId?: string;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "runId">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "app.log",
  console: true,
  file: false,
  scope: "",
};

export interface Logger {
  readonly runId: string;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Derive a logger that shares this one's sinks under a nested scope. */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Run id for one article: UTC day plus six hex digits, e.g. "20241019-3fa2c1".
 */
export function newRunId(now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).split("-").join("");
  return `${day}-${randomBytes(3).toString("hex")}`;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  runId: string;
  scope?: string;
  context?: Record<string, unknown>;
  time?: Date;
}

/**
 * One line: timestamp, level, run id, optional scope, message and context JSON.
 */
export function formatLogEntry({
  level,
  message,
  runId,
  scope = "",
  context,
  time = new Date(),
}: LogEntry): string {
  const timestamp = time.toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let entry = `[${timestamp}] [${levelStr}] [${runId}]${scopeStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { runId = newRunId(), ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function build(scope: string): Logger {
    function log(
      level: LogLevel,
      message: string,
      context?: Record<string, unknown>
    ): void {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
        return;
      }

      const entry = formatLogEntry({ level, message, runId, scope, context });

      if (opts.console) {
        process.stderr.write(entry + "\n");
      }

      if (opts.file) {
        try {
          appendFileSync(logFilePath, entry + "\n");
        } catch (err) {
          process.stderr.write(`Failed to write to log file: ${String(err)}\n`);
        }
      }
    }

    return {
      runId,
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (childScope) => build(scope ? `${scope}:${childScope}` : childScope),
    };
  }

  return build(opts.scope);
}

/**
 * Logger that discards everything. Used as the default collaborator in
 * library code so callers opt in to output.
 */
export const silentLogger: Logger = createLogger({ console: false, file: false, runId: "silent" });
