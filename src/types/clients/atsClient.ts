/**
 * ATS client type definitions: adapter input and uniform result
 */

import type { NormalizedPosting } from "../postings";

/**
 * What an adapter needs to locate one company's job board
 */
export type AtsTarget = {
  /** Provider-specific slug (empty for Workday, which reads careerUrl) */
  identifier: string;
  /** Company display label; blank falls back to identifier/tenant */
  displayName: string;
  careerUrl: string;
};

/**
 * Uniform adapter result: adapters never reject
 */
export type AtsFetchResult =
  | {
      status: "ok";
      postings: NormalizedPosting[];
    }
  | {
      status: "error";
      /** Short failure description for logging */
      reason: string;
    };
