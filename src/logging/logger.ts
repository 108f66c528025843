/**
 * Lightweight logging utility.
 * Outputs to console and, optionally, a log file with timestamps and run ID.
 *
 * Inside a pipeline every instance writes its own file so logs can be
 * collected per job; lines also carry the job's short id as a prefix
 * because the platform interleaves stdout from all instances.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { getRunId } from "./run-id.js";

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
  /** Log file path; no file output when omitted */
  filePath?: string;
  /** Enable console output */
  console?: boolean;
  /** Text placed before every message (e.g. "a1b2c3d4.capsule ") */
  prefix?: string;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Change the minimum level after creation */
  setLevel(level: LogLevel): void;
  /** Create a logger sharing outputs and level with an extra prefix */
  child(name: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/** Numeric levels as used by Python-style logging configuration. */
const NUMERIC_LEVELS: ReadonlyArray<readonly [number, LogLevel]> = [
  [10, "debug"],
  [20, "info"],
  [30, "warn"],
  [40, "error"],
  [50, "error"],
];

/**
 * Normalize a level spelling: case and surrounding blanks are ignored,
 * "warning" means "warn", and 10/20/30/40/50 (number or numeric string)
 * map to debug/info/warn/error/error.
 * Returns undefined for anything else.
 */
export function parseLogLevel(value: unknown): LogLevel | undefined {
  if (typeof value === "number") {
    return NUMERIC_LEVELS.find(([n]) => n === value)?.[1];
  }
  if (typeof value !== "string") return undefined;
  const normalized = value.trim().toLowerCase();
  if (/^\d+$/.test(normalized)) return parseLogLevel(Number(normalized));
  if (normalized === "warning") return "warn";
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  prefix = "",
  timestamp: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp.toISOString()}] [${levelStr}] [${runId}] ${prefix}${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

interface LoggerState {
  level: LogLevel;
  readonly filePath?: string;
  readonly console: boolean;
}

function buildLogger(state: LoggerState, prefix: string): Logger {
  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[state.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context, prefix);

    if (state.console) {
      getConsoleMethod(level)(entry);
    }

    if (state.filePath !== undefined) {
      try {
        appendFileSync(state.filePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    setLevel: (level) => {
      state.level = level;
    },
    child: (name) => buildLogger(state, `${prefix}${name} | `),
  };
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const state: LoggerState = {
    level: options.level ?? "info",
    filePath: options.filePath,
    console: options.console ?? true,
  };

  if (state.filePath !== undefined) {
    const logDir = dirname(state.filePath);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
  }

  return buildLogger(state, options.prefix ?? "");
}

/**
 * Logger that drops everything. Used where a caller passes none.
 */
export const silentLogger: Logger = createLogger({ console: false });
