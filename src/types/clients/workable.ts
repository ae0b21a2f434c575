/**
 * Workable public accounts API payload types
 *
 * Raw shapes from GET /api/v3/accounts/{slug}/jobs?active=true.
 * Internal to the Workable client.
 */

export type WorkableJob = {
  id?: string;
  shortcode?: string;
  title?: string;
  description?: string;
  /** Direct application link, preferred over url */
  application_url?: string;
  url?: string;
  shortlink?: string;
  published_on?: string;
  updated_at?: string;
  location?: {
    city?: string;
    country?: string;
  } | null;
};

export type WorkableJobsResponse = {
  results?: WorkableJob[];
};
