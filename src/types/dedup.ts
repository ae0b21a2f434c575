/**
 * Dedup type definitions
 */

import type { NormalizedPosting } from "./postings";

/**
 * Fingerprint of a posting URL (SHA-1 hex digest)
 */
export type SeenKey = string;

/**
 * Result of splitting a batch against the persisted seen set
 */
export type PartitionResult = {
  /** Postings whose key was not in the seen set, in input order */
  fresh: NormalizedPosting[];
  /** Distinct keys of the fresh postings */
  freshKeys: Set<SeenKey>;
};
