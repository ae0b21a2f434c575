/**
 * Lever postings API payload types
 *
 * Raw shapes from GET /v0/postings/{slug}?mode=json (top-level array).
 * Internal to the Lever client; not re-exported from the types barrel.
 */

export type LeverPosting = {
  id?: string;
  /** Posting title */
  text?: string;
  hostedUrl?: string;
  applyUrl?: string;
  /** Milliseconds since epoch */
  createdAt?: number;
  /** Absent on public boards means "published" */
  state?: string;
  categories?: {
    team?: string;
    location?: string;
    commitment?: string;
    department?: string;
  } | null;
  description?: string;
  descriptionPlain?: string;
};

export type LeverPostingsResponse = LeverPosting[];
