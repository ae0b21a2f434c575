/**
 * Feed runner type definitions
 */

import type { ResolvedProvider } from "./atsDetection";
import type { SeenKey } from "./dedup";
import type { LogLevel } from "./logger";
import type { NormalizedPosting } from "./postings";

/**
 * Per-company outcome
 *
 * - DONE: adapter returned postings (possibly none)
 * - SKIPPED: provider or identifier could not be resolved
 * - ERROR: adapter reported a transport/HTTP/shape failure
 */
export type CompanyRunStatus = "DONE" | "SKIPPED" | "ERROR";

export type CompanyRunResult = {
  company: string;
  provider: ResolvedProvider;
  identifier: string;
  status: CompanyRunStatus;
  /** Postings returned by the adapter */
  fetched: number;
  /** Postings left after the keyword filter */
  kept: number;
  note?: string;
};

export type FeedRunCounters = {
  companies: number;
  companiesSkipped: number;
  companiesFailed: number;
  postingsFetched: number;
  postingsKept: number;
  postingsFresh: number;
  postingsAlreadySeen: number;
};

export type FeedRunResult = {
  fresh: NormalizedPosting[];
  freshKeys: Set<SeenKey>;
  companies: CompanyRunResult[];
  counters: FeedRunCounters;
};

export type SeenStoreKind = "file" | "sqlite";

/**
 * CLI run configuration (resolved from environment variables)
 */
export type RunConfig = {
  inputPath: string;
  outputDir: string;
  seenStore: SeenStoreKind;
  seenPath: string;
  dbPath: string;
  httpTimeoutMs: number;
  userAgent: string;
  logLevel: LogLevel;
};
