/**
 * Micro-logger wrapper: minimal logging with level filtering
 * No external dependencies, wraps console.*
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants";

/**
 * Check whether a raw string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

// Read from environment, default to 'info'
let currentLevelValue = LOG_LEVELS[resolveLevel(process.env.LOG_LEVEL)];

/**
 * Override the level read from LOG_LEVEL at startup
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelValue = LOG_LEVELS[level];
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 *
 * Wraps any Logger sink, defaulting to this module.
 */
export function withContext(
  context: LogMeta,
  sink: Logger = { debug, info, warn, error },
): Logger {
  return {
    debug: (message, meta) => sink.debug(message, { ...context, ...meta }),
    info: (message, meta) => sink.info(message, { ...context, ...meta }),
    warn: (message, meta) => sink.warn(message, { ...context, ...meta }),
    error: (message, meta) => sink.error(message, { ...context, ...meta }),
  };
}
