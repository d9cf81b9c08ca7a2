/**
 * Structured Logger
 *
 * Writes to stderr; stdout carries MCP protocol frames and CLI reports.
 *
 * - Levels: debug, info, warn, error, silent
 * - `LOG_LEVEL` filters, `LOG_FORMAT=json` switches to one JSON object per line
 * - `child()` loggers carry a fixed context such as `{ component: "engine" }`
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type EmitLevel = Exclude<LogLevel, "silent">;

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: EmitLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(baseContext: LogContext): Logger;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_PREFIXES: Record<EmitLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// ============================================================================
// Configuration
// ============================================================================

function getLogLevel(): LogLevel {
  const envLevel = process.env["LOG_LEVEL"]?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldOutputJson(): boolean {
  return process.env["LOG_FORMAT"] === "json";
}

// ============================================================================
// Core Logger
// ============================================================================

export function log(level: EmitLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[getLogLevel()]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const hasContext = context !== undefined && Object.keys(context).length > 0;

  if (shouldOutputJson()) {
    const entry: LogEntry = {
      level,
      message,
      timestamp,
      ...(hasContext ? { context } : {}),
    };
    console.error(JSON.stringify(entry));
    return;
  }

  const prefix = `[${timestamp}] [${LEVEL_PREFIXES[level]}]`;
  if (hasContext) {
    console.error(`${prefix} ${message}`, context);
  } else {
    console.error(`${prefix} ${message}`);
  }
}

function createLogger(baseContext?: LogContext): Logger {
  const merge = (context?: LogContext): LogContext | undefined =>
    baseContext ? { ...baseContext, ...context } : context;

  return {
    debug: (message, context) => log("debug", message, merge(context)),
    info: (message, context) => log("info", message, merge(context)),
    warn: (message, context) => log("warn", message, merge(context)),
    error: (message, context) => log("error", message, merge(context)),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Process-wide logger.
 *
 * @example
 * ```ts
 * import { logger } from "./utils/logger.js";
 *
 * const scanLogger = logger.child({ component: "engine" });
 * scanLogger.info("Scan complete", { files: 12, findings: 3 });
 * ```
 */
export const logger: Logger = createLogger();

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format duration in human-readable form.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}
