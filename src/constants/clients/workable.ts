/**
 * Workable client constants
 */

export const WORKABLE_API_BASE_URL = "https://apply.workable.com/api/v3";

export const WORKABLE_JOBS_QUERY = { active: "true" } as const;
