/**
 * Workable payload mappers: convert Workable jobs to NormalizedPosting
 */

import type { NormalizedPosting } from "@/types";
import type { WorkableJob } from "@/types/clients/workable";
import { ATS_PROVIDER_LABELS } from "@/constants";
import { firstText, textOrEmpty, toSnippet } from "@/utils";

/**
 * Map a Workable job to the common posting schema
 *
 * The list endpoint rarely carries a description; when it is missing the
 * snippet falls back to the job shortcode.
 *
 * @param company - Company label (display name or account slug)
 */
export function mapWorkableJobToPosting(job: WorkableJob, company: string): NormalizedPosting {
  return {
    company,
    title: textOrEmpty(job.title),
    location: textOrEmpty(job.location?.city),
    url: firstText(job.application_url, job.url),
    source: ATS_PROVIDER_LABELS.workable,
    postedAt: firstText(job.published_on, job.updated_at),
    snippet: toSnippet(firstText(job.description, job.shortcode)),
  };
}
