/**
 * Run configuration: resolves CLI settings from environment variables
 *
 * Blank variables fall back to their defaults; present but invalid values
 * are rejected.
 */

import type { LogLevel, RunConfig, SeenStoreKind } from "@/types";
import {
  DEFAULT_DB_PATH,
  DEFAULT_HTTP_TIMEOUT_SECONDS,
  DEFAULT_INPUT_PATH,
  DEFAULT_LOG_LEVEL,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_SEEN_PATH,
  DEFAULT_SEEN_STORE,
  DEFAULT_USER_AGENT,
  SEEN_STORE_KINDS,
} from "@/constants";
import { isLogLevel } from "@/logger";

export class RunConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(`Invalid ${variable}: ${message}`);
    this.name = "RunConfigError";
  }
}

function readVar(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function isSeenStoreKind(value: string): value is SeenStoreKind {
  return SEEN_STORE_KINDS.some((kind) => kind === value);
}

function parseSeenStore(raw: string): SeenStoreKind {
  const value = raw.toLowerCase();
  if (!isSeenStoreKind(value)) {
    throw new RunConfigError("SEEN_STORE", `"${raw}" (expected ${SEEN_STORE_KINDS.join(" or ")})`);
  }
  return value;
}

function parseTimeoutSeconds(raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new RunConfigError("HTTP_TIMEOUT", `"${raw}" (expected a positive number of seconds)`);
  }
  return Number(raw);
}

function parseLogLevel(raw: string): LogLevel {
  const value = raw.toLowerCase();
  if (!isLogLevel(value)) {
    throw new RunConfigError("LOG_LEVEL", `"${raw}"`);
  }
  return value;
}

/**
 * Resolve the run configuration
 *
 * @throws {RunConfigError} On an invalid SEEN_STORE, HTTP_TIMEOUT or LOG_LEVEL
 */
export function loadRunConfig(env: NodeJS.ProcessEnv = process.env): RunConfig {
  const timeoutSeconds = parseTimeoutSeconds(
    readVar(env, "HTTP_TIMEOUT", String(DEFAULT_HTTP_TIMEOUT_SECONDS)),
  );

  return {
    inputPath: readVar(env, "INPUT_PATH", DEFAULT_INPUT_PATH),
    outputDir: readVar(env, "OUTPUT_DIR", DEFAULT_OUTPUT_DIR),
    seenStore: parseSeenStore(readVar(env, "SEEN_STORE", DEFAULT_SEEN_STORE)),
    seenPath: readVar(env, "SEEN_PATH", DEFAULT_SEEN_PATH),
    dbPath: readVar(env, "DB_PATH", DEFAULT_DB_PATH),
    httpTimeoutMs: timeoutSeconds * 1000,
    userAgent: readVar(env, "HTTP_UA", DEFAULT_USER_AGENT),
    logLevel: parseLogLevel(readVar(env, "LOG_LEVEL", DEFAULT_LOG_LEVEL)),
  };
}
