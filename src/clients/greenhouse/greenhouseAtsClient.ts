/**
 * GreenhouseAtsClient: Greenhouse Job Board API
 *
 * Fetches every open job on a board token in one call (content=true includes
 * descriptions).
 */

import type { AtsTarget, NormalizedPosting } from "@/types";
import type { GreenhouseJobsResponse } from "@/types/clients/greenhouse";
import { BaseAtsClient } from "@/clients/ats/baseAtsClient";
import { GREENHOUSE_API_BASE_URL, GREENHOUSE_JOBS_QUERY } from "@/constants";
import { expectObject, listField } from "@/utils";
import { mapGreenhouseJobToPosting } from "./mappers";

export class GreenhouseAtsClient extends BaseAtsClient {
  readonly provider = "greenhouse" as const;

  /**
   * @param target.identifier - Greenhouse board token (e.g., "acme")
   */
  protected async listPostings(target: AtsTarget): Promise<NormalizedPosting[]> {
    const boardToken = target.identifier;
    const url = `${GREENHOUSE_API_BASE_URL}/boards/${encodeURIComponent(boardToken)}/jobs`;

    const response = expectObject(
      await this.getJson<GreenhouseJobsResponse>(url, GREENHOUSE_JOBS_QUERY),
      "greenhouse jobs response",
    );

    const company = this.companyName(target, boardToken);
    return listField(response.jobs, "greenhouse jobs").map((job) =>
      mapGreenhouseJobToPosting(job, company),
    );
  }
}
