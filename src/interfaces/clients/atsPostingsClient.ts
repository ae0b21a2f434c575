/**
 * AtsPostingsClient interface: provider-agnostic contract for ATS job boards
 *
 * Each supported ATS exposes a different public endpoint and payload shape.
 * Implementations hide those differences behind one call that returns
 * NormalizedPosting values, so the orchestrator only ever deals with this
 * contract and a registry keyed by provider.
 */

import type { AtsFetchResult, AtsProvider, AtsTarget } from "@/types";

export interface AtsPostingsClient {
  /**
   * Provider tag (e.g., "lever", "workday")
   */
  readonly provider: AtsProvider;

  /**
   * Whether the client needs AtsTarget.identifier
   *
   * False for providers that locate the board from the career URL alone.
   */
  readonly requiresIdentifier: boolean;

  /**
   * Fetch and normalize one company's open postings (single page)
   *
   * Never rejects. Transport errors, non-2xx responses and malformed payloads
   * are logged as warnings and reported as `{ status: "error" }`.
   */
  fetchPostings(target: AtsTarget): Promise<AtsFetchResult>;
}
