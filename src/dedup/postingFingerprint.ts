/**
 * Posting fingerprinting for cross-run duplicate suppression
 *
 * The fingerprint is the SHA-1 hex digest of the posting URL alone, so it is
 * stable across runs and processes. An empty URL hashes to the empty-string
 * digest, which makes all URL-less postings collide.
 */

import { createHash } from "crypto";
import type { SeenKey } from "@/types";

/**
 * Compute the dedup key of a posting URL
 *
 * @returns 40-char lower-case hex string
 *
 * @example
 * computePostingFingerprint("") // "da39a3ee5e6b4b0d3255bfef95601890afd80709"
 */
export function computePostingFingerprint(url: string): SeenKey {
  return createHash("sha1").update(url, "utf8").digest("hex");
}
