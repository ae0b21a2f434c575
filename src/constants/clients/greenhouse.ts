/**
 * Greenhouse client constants
 * API documentation: https://developers.greenhouse.io/job-board.html
 */

export const GREENHOUSE_API_BASE_URL = "https://boards-api.greenhouse.io/v1";

/**
 * content=true includes the HTML description in the list response
 */
export const GREENHOUSE_JOBS_QUERY = { content: "true" } as const;
