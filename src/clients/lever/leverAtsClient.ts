/**
 * LeverAtsClient: Lever public postings API
 *
 * The list endpoint returns a bare array; unpublished postings are dropped.
 */

import type { AtsTarget, NormalizedPosting } from "@/types";
import type { LeverPostingsResponse } from "@/types/clients/lever";
import { BaseAtsClient } from "@/clients/ats/baseAtsClient";
import { LEVER_API_BASE_URL, LEVER_POSTINGS_QUERY } from "@/constants";
import { MalformedPayloadError } from "@/utils";
import { isLeverPostingPublished, mapLeverPostingToPosting } from "./mappers";

export class LeverAtsClient extends BaseAtsClient {
  readonly provider = "lever" as const;

  /**
   * @param target.identifier - Lever company slug (e.g., "acme")
   */
  protected async listPostings(target: AtsTarget): Promise<NormalizedPosting[]> {
    const slug = target.identifier;
    const url = `${LEVER_API_BASE_URL}/postings/${encodeURIComponent(slug)}`;

    const response = await this.getJson<LeverPostingsResponse>(url, LEVER_POSTINGS_QUERY);
    if (!Array.isArray(response)) {
      throw new MalformedPayloadError("lever postings response: expected an array");
    }

    const company = this.companyName(target, slug);
    const published = response.filter(isLeverPostingPublished);

    if (published.length < response.length) {
      this.logger.debug("Skipped unpublished Lever postings", {
        identifier: slug,
        skipped: response.length - published.length,
      });
    }

    return published.map((posting) => mapLeverPostingToPosting(posting, company));
  }
}
