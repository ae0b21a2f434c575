/**
 * Fresh/seen partitioning of an accumulated posting batch
 */

import type { NormalizedPosting, PartitionResult, SeenKey } from "@/types";
import { computePostingFingerprint } from "./postingFingerprint";

/**
 * Split postings into those not present in the persisted seen set
 *
 * Single ordered pass; `seen` is read, never modified. Only the persisted set
 * suppresses postings: two postings sharing a URL within the same batch are
 * both kept, while their key appears once in freshKeys.
 */
export function partitionFreshPostings(
  postings: NormalizedPosting[],
  seen: ReadonlySet<SeenKey>,
): PartitionResult {
  const fresh: NormalizedPosting[] = [];
  const freshKeys = new Set<SeenKey>();

  for (const posting of postings) {
    const key = computePostingFingerprint(posting.url);
    if (seen.has(key)) {
      continue;
    }
    fresh.push(posting);
    freshKeys.add(key);
  }

  return { fresh, freshKeys };
}
