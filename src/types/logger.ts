/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured context attached to a log line (serialized as JSON)
 */
export type LogMeta = Record<string, unknown>;

/**
 * Logger sink accepted by adapters and the orchestrator
 *
 * The project logger module (@/logger) satisfies this shape, so it is the
 * default everywhere; tests inject a recording sink instead.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
