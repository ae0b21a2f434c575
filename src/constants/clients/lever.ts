/**
 * Lever client constants
 * API documentation: https://github.com/lever/postings-api
 */

export const LEVER_API_BASE_URL = "https://api.lever.co/v0";

export const LEVER_POSTINGS_QUERY = { mode: "json" } as const;

/**
 * Postings without a state field are treated as published
 */
export const LEVER_PUBLISHED_STATE = "published";
