/**
 * ATS detection constants
 */

/**
 * List of supported ATS providers
 * Source of truth for provider tags throughout the system
 */
export const ATS_PROVIDERS = [
  "greenhouse",
  "lever",
  "workable",
  "smartrecruiters",
  "ashby",
  "workday",
] as const;

/**
 * Literal labels written to NormalizedPosting.source
 */
export const ATS_PROVIDER_LABELS = {
  greenhouse: "Greenhouse",
  lever: "Lever",
  workable: "Workable",
  smartrecruiters: "SmartRecruiters",
  ashby: "Ashby",
  workday: "Workday",
} as const;

/**
 * Hostname substrings identifying each provider's career pages
 * Checked in order; first match wins
 */
export const ATS_HOST_MARKERS = [
  { marker: "greenhouse.io", provider: "greenhouse" },
  { marker: "lever.co", provider: "lever" },
  { marker: "workable.com", provider: "workable" },
  { marker: "ashbyhq.com", provider: "ashby" },
  { marker: "smartrecruiters.com", provider: "smartrecruiters" },
  { marker: "myworkdayjobs.com", provider: "workday" },
] as const;
