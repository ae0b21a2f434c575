/**
 * ATS detection type definitions
 *
 * Types for resolving which provider adapter serves a configured company
 */

import type { ATS_PROVIDERS } from "@/constants";

/**
 * Supported ATS providers
 * Derived from the ATS_PROVIDERS constant
 */
export type AtsProvider = (typeof ATS_PROVIDERS)[number];

/**
 * Outcome of provider detection: a supported provider, or "unknown"
 */
export type ResolvedProvider = AtsProvider | "unknown";

/**
 * Workday board coordinates derived from a career-site URL
 */
export type WorkdayBoard = {
  /** Scheme + host, e.g. "https://acme.wd5.myworkdayjobs.com" */
  origin: string;
  /** Full host, e.g. "acme.wd5.myworkdayjobs.com" */
  host: string;
  /** First hostname label, e.g. "acme" */
  tenant: string;
  /** First path segment, e.g. "External" */
  site: string;
};
