/**
 * Posting type definitions: company inputs and the normalized posting schema
 */

/**
 * One configured target company (one input CSV row)
 *
 * All fields are plain strings and may be empty.
 */
export type CompanyInput = {
  /** Display label */
  name: string;
  /** Optional provider tag ("greenhouse", "lever", ...) */
  providerHint: string;
  /** Provider-specific slug / board token / account id */
  identifier: string;
  /** Public career page, used for detection and slug derivation */
  careerUrl: string;
  /** Semicolon-separated keyword filter */
  keywords: string;
};

/**
 * Common posting schema produced by every ATS adapter
 */
export type NormalizedPosting = {
  company: string;
  title: string;
  location: string;
  /** Canonical link to the posting; sole input of the dedup fingerprint */
  url: string;
  /** Provider label, e.g. "Greenhouse" */
  source: string;
  /** ISO-8601 when derivable, else the provider's own date string, else "" */
  postedAt: string;
  /** Markup-stripped description preview (bounded length) */
  snippet: string;
};
