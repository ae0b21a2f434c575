/**
 * Workday client constants
 */

/**
 * Hostname marker for public Workday career sites (<tenant>.wdN.myworkdayjobs.com)
 */
export const WORKDAY_HOST_MARKER = ".myworkdayjobs.com";

/**
 * Results requested per board (single page)
 */
export const WORKDAY_PAGE_LIMIT = 50;
