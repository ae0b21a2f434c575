/**
 * WorkdayAtsClient: Workday career sites (CXS JSON endpoint)
 *
 * Unlike the other providers Workday has no standalone identifier: tenant and
 * site both come from the career URL.
 */

import type { AtsTarget, NormalizedPosting } from "@/types";
import type { WorkdayJobsRequestBody, WorkdayJobsResponse } from "@/types/clients/workday";
import { BaseAtsClient } from "@/clients/ats/baseAtsClient";
import { WORKDAY_PAGE_LIMIT } from "@/constants";
import { expectObject, listField } from "@/utils";
import { parseWorkdayBoard, workdayJobsUrl } from "./workdayBoard";
import { mapWorkdayPostingToPosting } from "./mappers";

/**
 * First page, no facets, no search text
 */
export const WORKDAY_JOBS_REQUEST_BODY: WorkdayJobsRequestBody = {
  appliedFacets: {},
  limit: WORKDAY_PAGE_LIMIT,
  offset: 0,
  searchText: "",
};

export class WorkdayAtsClient extends BaseAtsClient {
  readonly provider = "workday" as const;
  readonly requiresIdentifier = false;

  protected describeTarget(target: AtsTarget): string {
    return target.careerUrl;
  }

  protected async listPostings(target: AtsTarget): Promise<NormalizedPosting[]> {
    const board = parseWorkdayBoard(target.careerUrl);
    if (!board) {
      // Not a Workday career URL: nothing to request
      this.logger.debug("Career URL is not a Workday board; skipping request", {
        careerUrl: target.careerUrl,
      });
      return [];
    }

    const response = expectObject(
      await this.postJson<WorkdayJobsResponse>(workdayJobsUrl(board), WORKDAY_JOBS_REQUEST_BODY),
      "workday jobs response",
    );

    const company = this.companyName(target, board.tenant);
    return listField(response.jobPostings, "workday jobPostings").map((posting) =>
      mapWorkdayPostingToPosting(posting, company, board),
    );
  }
}
