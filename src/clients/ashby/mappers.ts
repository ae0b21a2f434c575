/**
 * Ashby payload mappers: convert job board teams to NormalizedPosting
 */

import type { NormalizedPosting } from "@/types";
import type { AshbyJob, AshbyJobBoardResponse } from "@/types/clients/ashby";
import { ATS_PROVIDER_LABELS } from "@/constants";
import { firstText, listField, textOrEmpty } from "@/utils";

/**
 * Map an Ashby job to the common posting schema
 *
 * The public board query exposes no description, so snippet is always "".
 */
export function mapAshbyJobToPosting(job: AshbyJob, company: string): NormalizedPosting {
  return {
    company,
    title: textOrEmpty(job.title),
    location: firstText(job.locationName, job.locationSlug),
    url: textOrEmpty(job.applyUrl),
    source: ATS_PROVIDER_LABELS.ashby,
    postedAt: textOrEmpty(job.publishedAt),
    snippet: "",
  };
}

/**
 * Flatten every team's jobs into postings, in team order
 *
 * A missing or null job board yields no postings.
 */
export function mapAshbyJobBoardToPostings(
  response: AshbyJobBoardResponse,
  company: string,
): NormalizedPosting[] {
  const board = response.data?.jobBoard;
  if (!board) {
    return [];
  }

  return listField(board.teams, "ashby teams").flatMap((team) =>
    listField(team?.jobs, "ashby team jobs").map((job) => mapAshbyJobToPosting(job, company)),
  );
}
