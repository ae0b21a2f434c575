/**
 * SmartRecruiters Posting API payload types
 *
 * Raw shapes from GET /v1/companies/{id}/postings?limit=100.
 * Internal to the SmartRecruiters client.
 */

/**
 * Job ad sections are objects ({ title, text }) on current responses and
 * plain strings on some older tenants
 */
export type SmartRecruitersSection = string | { title?: string; text?: string } | null;

export type SmartRecruitersPosting = {
  id?: string;
  name?: string;
  ref?: {
    jobAdUrl?: string;
  } | string | null;
  applyUrl?: string;
  postingUrl?: string;
  releasedDate?: string;
  createdOn?: string;
  location?: {
    city?: string;
    country?: string;
  } | null;
  jobAd?: {
    sections?: {
      companyDescription?: SmartRecruitersSection;
      jobDescription?: SmartRecruitersSection;
    } | null;
  } | null;
};

export type SmartRecruitersPostingsResponse = {
  content?: SmartRecruitersPosting[];
  totalFound?: number;
};
