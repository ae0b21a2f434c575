/**
 * Posting normalization constants
 */

/**
 * Maximum snippet length in characters, identical for every provider
 */
export const SNIPPET_MAX_CHARS = 280;

/**
 * Any markup tag; replaced with a single space
 */
export const MARKUP_TAG_PATTERN = /<[^>]+>/g;

/**
 * Keyword list separator in CompanyInput.keywords
 */
export const KEYWORD_SEPARATOR = ";";
