/**
 * SmartRecruiters payload mappers: convert postings to NormalizedPosting
 */

import type { NormalizedPosting } from "@/types";
import type {
  SmartRecruitersPosting,
  SmartRecruitersSection,
} from "@/types/clients/smartrecruiters";
import { ATS_PROVIDER_LABELS, SMARTRECRUITERS_JOBS_BASE_URL } from "@/constants";
import { firstText, isRecord, textOrEmpty, toSnippet } from "@/utils";

/**
 * Text of a job ad section, which is either a string or { title, text }
 */
export function sectionText(section: SmartRecruitersSection | undefined): string {
  if (typeof section === "string") {
    return section;
  }
  return textOrEmpty(section?.text);
}

/**
 * Resolve the public posting URL
 *
 * Order: ref.jobAdUrl, applyUrl, postingUrl, then the jobs.smartrecruiters.com
 * page built from the company identifier and posting id. A string `ref` is the
 * API resource URL, not a page, and is ignored.
 *
 * @returns "" when nothing applies (no URL fields and no id)
 */
export function resolveSmartRecruitersUrl(
  posting: SmartRecruitersPosting,
  companyIdentifier: string,
): string {
  const jobAdUrl = isRecord(posting.ref) ? posting.ref.jobAdUrl : undefined;
  const explicit = firstText(jobAdUrl, posting.applyUrl, posting.postingUrl);
  if (explicit !== "") {
    return explicit;
  }

  const id = textOrEmpty(posting.id);
  return id !== "" ? `${SMARTRECRUITERS_JOBS_BASE_URL}/${companyIdentifier}/${id}` : "";
}

/**
 * Map a SmartRecruiters posting to the common posting schema
 *
 * @param company - Company label (display name or company identifier)
 * @param companyIdentifier - SmartRecruiters company id used for URL synthesis
 */
export function mapSmartRecruitersPostingToPosting(
  posting: SmartRecruitersPosting,
  company: string,
  companyIdentifier: string,
): NormalizedPosting {
  return {
    company,
    title: textOrEmpty(posting.name),
    location: textOrEmpty(posting.location?.city),
    url: resolveSmartRecruitersUrl(posting, companyIdentifier),
    source: ATS_PROVIDER_LABELS.smartrecruiters,
    postedAt: firstText(posting.releasedDate, posting.createdOn),
    snippet: toSnippet(sectionText(posting.jobAd?.sections?.companyDescription)),
  };
}
