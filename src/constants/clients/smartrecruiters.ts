/**
 * SmartRecruiters client constants
 */

export const SMARTRECRUITERS_API_BASE_URL = "https://api.smartrecruiters.com/v1";

/**
 * Single page only; 100 is the API maximum
 */
export const SMARTRECRUITERS_POSTINGS_QUERY = { limit: "100" } as const;

/**
 * Public posting page, used when the payload carries no URL of its own
 */
export const SMARTRECRUITERS_JOBS_BASE_URL = "https://jobs.smartrecruiters.com";
