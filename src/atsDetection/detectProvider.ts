/**
 * Provider detection
 *
 * Resolves which ATS adapter serves a company from its configuration alone.
 * Pure string inspection: no network access.
 */

import type { AtsProvider, ResolvedProvider } from "@/types";
import { ATS_HOST_MARKERS, ATS_PROVIDERS } from "@/constants";
import { careerUrlHost } from "./urlUtils";

/**
 * Check whether a tag names a supported provider
 */
export function isAtsProvider(value: string): value is AtsProvider {
  return ATS_PROVIDERS.some((provider) => provider === value);
}

/**
 * Detect the ATS provider for a company
 *
 * Priority:
 * 1. An explicit provider hint that names a supported provider (case-insensitive)
 * 2. The career URL hostname, matched against ATS_HOST_MARKERS in order
 * 3. "unknown"
 *
 * The identifier does not take part in detection; it is accepted so callers
 * pass the full company configuration.
 *
 * @example
 * detectProvider("lever", "", "https://boards.greenhouse.io/acme") // "lever"
 * detectProvider("", "", "https://jobs.lever.co/acme") // "lever"
 */
export function detectProvider(
  providerHint: string,
  _identifier: string,
  careerUrl: string,
): ResolvedProvider {
  const hint = providerHint.trim().toLowerCase();
  if (isAtsProvider(hint)) {
    return hint;
  }

  const host = careerUrlHost(careerUrl);
  if (host === "") {
    return "unknown";
  }

  const match = ATS_HOST_MARKERS.find(({ marker }) => host.includes(marker));
  return match ? match.provider : "unknown";
}
