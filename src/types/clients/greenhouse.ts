/**
 * Greenhouse Job Board API payload types
 *
 * Raw shapes from GET /v1/boards/{token}/jobs?content=true.
 * Internal to the Greenhouse client; not re-exported from the types barrel.
 * Every field is optional: the payload is mapped with explicit fallbacks.
 */

export type GreenhouseJob = {
  id?: number;
  title?: string;
  /** Public URL to the posting */
  absolute_url?: string;
  /** ISO 8601 with offset */
  updated_at?: string;
  location?: {
    name?: string;
  } | null;
  /** HTML-escaped description (present with content=true) */
  content?: string;
};

export type GreenhouseJobsResponse = {
  jobs?: GreenhouseJob[];
};
