/**
 * Input/output file constants
 */

/**
 * Input CSV header → CompanyInput field
 */
export const COMPANY_INPUT_COLUMNS = {
  company_name: "name",
  provider: "providerHint",
  slug: "identifier",
  career_url: "careerUrl",
  keywords: "keywords",
} as const;

/**
 * Output CSV column order (NormalizedPosting fields)
 */
export const POSTING_OUTPUT_COLUMNS = [
  "company",
  "title",
  "location",
  "url",
  "source",
  "postedAt",
  "snippet",
] as const;

export const OUTPUT_FILE_PREFIX = "new_openings_";
