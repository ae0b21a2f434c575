/**
 * HTTP client constants: defaults shared by every ATS client
 */

/**
 * Default request timeout in milliseconds (20 seconds)
 * Overridden at runtime by HTTP_TIMEOUT (seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 20_000;

/**
 * Default User-Agent sent to providers
 */
export const DEFAULT_USER_AGENT = "ats-job-feed/1.0";

/**
 * Headers added when a request carries a JSON body
 */
export const JSON_BODY_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;
