/**
 * Keyword filter: soft relevance filter over normalized postings
 *
 * Case-insensitive substring match of any configured keyword against the
 * posting's title, snippet and location. Not a ranking function.
 */

import type { NormalizedPosting } from "@/types";
import { KEYWORD_SEPARATOR } from "@/constants";

/**
 * Parse a semicolon-separated keyword list
 *
 * Tokens are trimmed and lower-cased; empty tokens are dropped.
 *
 * @example
 * parseKeywords(" Remote; engineer ;;") // ["remote", "engineer"]
 */
export function parseKeywords(keywordString: string): string[] {
  return keywordString
    .split(KEYWORD_SEPARATOR)
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token !== "");
}

/**
 * Lower-cased text searched for keywords: "<title> <snippet> <location>"
 */
export function postingHaystack(posting: NormalizedPosting): string {
  return `${posting.title} ${posting.snippet} ${posting.location}`.toLowerCase();
}

/**
 * Keep postings matching at least one keyword, preserving order
 *
 * An empty keyword list (after parsing) keeps every posting.
 */
export function filterByKeywords(
  postings: NormalizedPosting[],
  keywordString: string,
): NormalizedPosting[] {
  const keywords = parseKeywords(keywordString);
  if (keywords.length === 0) {
    return postings;
  }

  return postings.filter((posting) => {
    const haystack = postingHaystack(posting);
    return keywords.some((keyword) => haystack.includes(keyword));
  });
}
