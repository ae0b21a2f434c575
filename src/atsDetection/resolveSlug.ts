/**
 * Slug resolution from career-page URLs
 */

import type { ResolvedProvider } from "@/types";
import { careerUrlPathSegments } from "./urlUtils";

/**
 * Derive a provider identifier from the career URL path
 *
 * Every slug-based provider publishes boards at <host>/<slug>/..., so the
 * identifier is the first non-empty path segment. Workday boards are located
 * by the Workday client itself and unknown providers have no convention;
 * both resolve to "".
 *
 * @example
 * resolveSlug("greenhouse", "https://boards.greenhouse.io/acme/jobs") // "acme"
 */
export function resolveSlug(provider: ResolvedProvider, careerUrl: string): string {
  if (provider === "workday" || provider === "unknown") {
    return "";
  }
  return careerUrlPathSegments(careerUrl)[0] ?? "";
}
