/**
 * Greenhouse payload mappers: convert Greenhouse jobs to NormalizedPosting
 */

import type { NormalizedPosting } from "@/types";
import type { GreenhouseJob } from "@/types/clients/greenhouse";
import { ATS_PROVIDER_LABELS } from "@/constants";
import { textOrEmpty, toSnippet } from "@/utils";

/**
 * Map a Greenhouse job to the common posting schema
 *
 * Greenhouse has no publish date on the board API; updated_at is the closest.
 *
 * @param company - Company label (display name or board token)
 */
export function mapGreenhouseJobToPosting(
  job: GreenhouseJob,
  company: string,
): NormalizedPosting {
  return {
    company,
    title: textOrEmpty(job.title),
    location: textOrEmpty(job.location?.name),
    url: textOrEmpty(job.absolute_url),
    source: ATS_PROVIDER_LABELS.greenhouse,
    postedAt: textOrEmpty(job.updated_at),
    snippet: toSnippet(textOrEmpty(job.content)),
  };
}
