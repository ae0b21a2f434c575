/**
 * WorkableAtsClient: Workable public accounts API
 */

import type { AtsTarget, NormalizedPosting } from "@/types";
import type { WorkableJobsResponse } from "@/types/clients/workable";
import { BaseAtsClient } from "@/clients/ats/baseAtsClient";
import { WORKABLE_API_BASE_URL, WORKABLE_JOBS_QUERY } from "@/constants";
import { expectObject, listField } from "@/utils";
import { mapWorkableJobToPosting } from "./mappers";

export class WorkableAtsClient extends BaseAtsClient {
  readonly provider = "workable" as const;

  /**
   * @param target.identifier - Workable account slug (apply.workable.com/<slug>)
   */
  protected async listPostings(target: AtsTarget): Promise<NormalizedPosting[]> {
    const account = target.identifier;
    const url = `${WORKABLE_API_BASE_URL}/accounts/${encodeURIComponent(account)}/jobs`;

    const response = expectObject(
      await this.getJson<WorkableJobsResponse>(url, WORKABLE_JOBS_QUERY),
      "workable jobs response",
    );

    const company = this.companyName(target, account);
    return listField(response.results, "workable results").map((job) =>
      mapWorkableJobToPosting(job, company),
    );
  }
}
