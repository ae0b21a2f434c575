/**
 * Markup stripping and snippet truncation
 *
 * Shared by every ATS mapper so all providers emit the same preview shape.
 */

import { MARKUP_TAG_PATTERN, SNIPPET_MAX_CHARS } from "@/constants";

/**
 * Replace every <...> tag with a single space, then trim
 *
 * Entities are left as-is.
 *
 * @example
 * stripMarkup("<p>Build <b>APIs</b></p>") // "Build  APIs"
 */
export function stripMarkup(text: string): string {
  return text.replace(MARKUP_TAG_PATTERN, " ").trim();
}

/**
 * Markup-stripped preview of a description, at most SNIPPET_MAX_CHARS code points long
 */
export function toSnippet(text: string): string {
  return Array.from(stripMarkup(text)).slice(0, SNIPPET_MAX_CHARS).join("");
}
