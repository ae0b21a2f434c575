/**
 * URL utilities for ATS detection
 *
 * Pure functions; never throw on bad input
 */

/**
 * Parse a career-page URL, reading scheme-less input as https
 *
 * Accepts:
 * - https://boards.greenhouse.io/acme
 * - boards.greenhouse.io/acme
 *
 * @returns Parsed URL, or null for blank/unparsable input
 */
export function parseCareerUrl(careerUrl: string): URL | null {
  const trimmed = careerUrl.trim();
  if (trimmed === "") {
    return null;
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;

  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

/**
 * Lower-cased hostname of a career-page URL ("" when unparsable)
 */
export function careerUrlHost(careerUrl: string): string {
  return parseCareerUrl(careerUrl)?.hostname.toLowerCase() ?? "";
}

/**
 * Non-empty path segments of a career-page URL, in order
 *
 * @example
 * careerUrlPathSegments("https://boards.greenhouse.io/acme/jobs") // ["acme", "jobs"]
 */
export function careerUrlPathSegments(careerUrl: string): string[] {
  const parsed = parseCareerUrl(careerUrl);
  if (!parsed) {
    return [];
  }
  return parsed.pathname.split("/").filter((segment) => segment !== "");
}
