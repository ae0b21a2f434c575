/**
 * SmartRecruitersAtsClient: SmartRecruiters public Posting API
 */

import type { AtsTarget, NormalizedPosting } from "@/types";
import type { SmartRecruitersPostingsResponse } from "@/types/clients/smartrecruiters";
import { BaseAtsClient } from "@/clients/ats/baseAtsClient";
import {
  SMARTRECRUITERS_API_BASE_URL,
  SMARTRECRUITERS_POSTINGS_QUERY,
} from "@/constants";
import { expectObject, listField } from "@/utils";
import { mapSmartRecruitersPostingToPosting } from "./mappers";

export class SmartRecruitersAtsClient extends BaseAtsClient {
  readonly provider = "smartrecruiters" as const;

  /**
   * @param target.identifier - SmartRecruiters company identifier (often the
   *   first path segment on jobs.smartrecruiters.com)
   */
  protected async listPostings(target: AtsTarget): Promise<NormalizedPosting[]> {
    const companyIdentifier = target.identifier;
    const url = `${SMARTRECRUITERS_API_BASE_URL}/companies/${encodeURIComponent(companyIdentifier)}/postings`;

    const response = expectObject(
      await this.getJson<SmartRecruitersPostingsResponse>(url, SMARTRECRUITERS_POSTINGS_QUERY),
      "smartrecruiters postings response",
    );

    const company = this.companyName(target, companyIdentifier);
    return listField(response.content, "smartrecruiters content").map((posting) =>
      mapSmartRecruitersPostingToPosting(posting, company, companyIdentifier),
    );
  }
}
