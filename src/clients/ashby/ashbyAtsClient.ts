/**
 * AshbyAtsClient: Ashby hosted job board (non-user GraphQL endpoint)
 */

import type { AtsTarget, NormalizedPosting } from "@/types";
import type { AshbyJobBoardResponse } from "@/types/clients/ashby";
import { BaseAtsClient } from "@/clients/ats/baseAtsClient";
import { ASHBY_GRAPHQL_URL, ASHBY_JOB_BOARD_QUERY, ASHBY_OPERATION_NAME } from "@/constants";
import { expectObject } from "@/utils";
import { mapAshbyJobBoardToPostings } from "./mappers";

/**
 * GraphQL request body for one organization's job board
 */
export function buildAshbyJobBoardRequest(organizationSlug: string) {
  return {
    operationName: ASHBY_OPERATION_NAME,
    variables: { organizationSlug },
    query: ASHBY_JOB_BOARD_QUERY,
  };
}

export class AshbyAtsClient extends BaseAtsClient {
  readonly provider = "ashby" as const;

  /**
   * @param target.identifier - Ashby organization slug (jobs.ashbyhq.com/<slug>)
   */
  protected async listPostings(target: AtsTarget): Promise<NormalizedPosting[]> {
    const organizationSlug = target.identifier;

    const response = expectObject(
      await this.postJson<AshbyJobBoardResponse>(
        ASHBY_GRAPHQL_URL,
        buildAshbyJobBoardRequest(organizationSlug),
      ),
      "ashby job board response",
    );

    if (!response.data?.jobBoard) {
      this.logger.debug("Ashby job board not found", {
        identifier: organizationSlug,
        errors: (response.errors ?? []).map((e) => e.message ?? "").filter(Boolean),
      });
    }

    return mapAshbyJobBoardToPostings(response, this.companyName(target, organizationSlug));
  }
}
