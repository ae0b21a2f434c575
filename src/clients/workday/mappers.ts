/**
 * Workday payload mappers: convert CXS job postings to NormalizedPosting
 */

import type { NormalizedPosting, WorkdayBoard } from "@/types";
import type { WorkdayJobPosting } from "@/types/clients/workday";
import { ATS_PROVIDER_LABELS } from "@/constants";
import { firstText, textOrEmpty, toSnippet } from "@/utils";

/**
 * Map a Workday posting to the common posting schema
 *
 * externalPath is relative to the career-site host, so the URL is the board
 * origin followed by that path. postedOn is Workday's own label
 * ("Posted Today"), kept verbatim.
 */
export function mapWorkdayPostingToPosting(
  posting: WorkdayJobPosting,
  company: string,
  board: WorkdayBoard,
): NormalizedPosting {
  const locations = Array.isArray(posting.locations) ? posting.locations : [];

  return {
    company,
    title: textOrEmpty(posting.title),
    location: textOrEmpty(locations[0]),
    url: `${board.origin}${textOrEmpty(posting.externalPath)}`,
    source: ATS_PROVIDER_LABELS.workday,
    postedAt: firstText(posting.postedOn, posting.startDate),
    snippet: toSnippet(textOrEmpty(posting.shortDescription)),
  };
}
