/**
 * Ashby client constants
 */

export const ASHBY_GRAPHQL_URL = "https://jobs.ashbyhq.com/api/non-user-graphql";

export const ASHBY_OPERATION_NAME = "JobBoardAllPositions";

/**
 * Public job board query; does not expose description text
 */
export const ASHBY_JOB_BOARD_QUERY =
  "query JobBoardAllPositions($organizationSlug: String!) { jobBoard: jobBoardWithEmail(organizationSlug: $organizationSlug) { teams { name jobs { id title locationSlug locationName applyUrl publishedAt } } } }";
