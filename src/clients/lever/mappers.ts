/**
 * Lever payload mappers: convert Lever postings to NormalizedPosting
 */

import type { NormalizedPosting } from "@/types";
import type { LeverPosting } from "@/types/clients/lever";
import { ATS_PROVIDER_LABELS, LEVER_PUBLISHED_STATE } from "@/constants";
import { firstText, textOrEmpty, toSnippet } from "@/utils";

/**
 * Whether a posting is live on the public board
 *
 * A missing state counts as published; comparison is case-insensitive.
 */
export function isLeverPostingPublished(posting: LeverPosting): boolean {
  const state = firstText(posting.state, LEVER_PUBLISHED_STATE);
  return state.toLowerCase() === LEVER_PUBLISHED_STATE;
}

/**
 * Convert Lever's millisecond createdAt to an ISO-8601 UTC timestamp
 *
 * @returns "" when absent, zero or not a valid time
 */
export function leverCreatedAtToIso(createdAt: unknown): string {
  if (typeof createdAt !== "number" || !Number.isFinite(createdAt) || createdAt === 0) {
    return "";
  }
  const date = new Date(createdAt);
  return Number.isNaN(date.getTime()) ? "" : date.toISOString();
}

/**
 * Map a Lever posting to the common posting schema
 *
 * Location falls back to the team when Lever has no location category.
 *
 * @param company - Company label (display name or Lever slug)
 */
export function mapLeverPostingToPosting(
  posting: LeverPosting,
  company: string,
): NormalizedPosting {
  return {
    company,
    title: textOrEmpty(posting.text),
    location: firstText(posting.categories?.location, posting.categories?.team),
    url: textOrEmpty(posting.hostedUrl),
    source: ATS_PROVIDER_LABELS.lever,
    postedAt: leverCreatedAtToIso(posting.createdAt),
    snippet: toSnippet(textOrEmpty(posting.descriptionPlain)),
  };
}
