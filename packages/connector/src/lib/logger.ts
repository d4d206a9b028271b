/**
 * Logger utility
 *
 * Console-based logging with timestamp, log level and module name.
 *
 * Log levels:
 * - debug: Request URLs, pagination cursors, record matching decisions
 * - info: Sync progress (job start/end, record counts)
 * - warn: Recoverable issues (rate limits, skipped records, partial failures)
 * - error: Failures that abort a job
 *
 * Usage:
 * - CLI: --log-level debug|info|warn|error
 * - Library: setLogLevel("warn") before calling sync functions
 * - Env: LOG_LEVEL, applied by getConfig()
 */

import { AsyncLocalStorage } from "node:async_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogFields = Record<string, string | number | boolean | null | undefined>;

let currentLevel: LogLevel = "info";
let levelHasBeenSet = false;

// Capture buffer of the running job, if any (see captureLogs)
const captureStorage = new AsyncLocalStorage<string[]>();

function formatTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

function formatValue(value: string | number | boolean | null | undefined): string {
  if (typeof value === "string" && /\s/.test(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  const parts = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${formatValue(v)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

function log(level: LogLevel, name: string, message: string, fields?: LogFields): void {
  const line = `${level.toUpperCase().padEnd(5)} [${name}] ${message}${formatFields(fields)}`;

  captureStorage.getStore()?.push(line);

  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return;
  }

  console.log(`[${formatTimestamp()}] ${line}`);
}

export interface Logger {
  readonly name: string;
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (name: string) => Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Set global log level.
 * Call this early in your application (e.g., in CLI before sync).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  levelHasBeenSet = true;
}

/**
 * Level from configuration; ignored once setLogLevel has been called.
 */
export function setDefaultLogLevel(level: LogLevel): void {
  if (!levelHasBeenSet) {
    currentLevel = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Check if log level has been explicitly set.
 */
export function isLogLevelSet(): boolean {
  return levelHasBeenSet;
}

/**
 * Back to "info" with no explicit level (for testing)
 */
export function resetLogLevel(): void {
  currentLevel = "info";
  levelHasBeenSet = false;
}

/**
 * Create a logger instance for a specific module.
 */
export function setupLogger(name: string): Logger {
  return {
    name,
    debug: (message, fields) => log("debug", name, message, fields),
    info: (message, fields) => log("info", name, message, fields),
    warn: (message, fields) => log("warn", name, message, fields),
    error: (message, fields) => log("error", name, message, fields),
    child: (childName) => setupLogger(`${name}:${childName}`),
  };
}

export type CaptureResult<T> =
  | { ok: true; result: T; logs: string[] }
  | { ok: false; error: unknown; logs: string[] };

/**
 * Run fn while recording every log line it emits (at any level), including
 * lines from async work it awaits. Lines are still printed according to the
 * global level.
 */
export async function captureLogs<T>(fn: () => Promise<T>): Promise<CaptureResult<T>> {
  const buffer: string[] = [];
  try {
    const result = await captureStorage.run(buffer, fn);
    return { ok: true, result, logs: buffer };
  } catch (error) {
    return { ok: false, error, logs: buffer };
  }
}
