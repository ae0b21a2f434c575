/**
 * Workday CXS payload types
 *
 * Raw shapes from POST /wday/cxs/{tenant}/{site}/jobs.
 * Internal to the Workday client.
 */

export type WorkdayJobPosting = {
  title?: string;
  /** Path relative to the career site host, e.g. "/External/job/Remote/Engineer_R-1" */
  externalPath?: string;
  locationsText?: string;
  locations?: string[];
  /** Human label such as "Posted 3 Days Ago" */
  postedOn?: string;
  startDate?: string;
  shortDescription?: string;
  bulletFields?: string[];
};

export type WorkdayJobsRequestBody = {
  appliedFacets: Record<string, string[]>;
  limit: number;
  offset: number;
  searchText: string;
};

export type WorkdayJobsResponse = {
  total?: number;
  jobPostings?: WorkdayJobPosting[] | null;
};
