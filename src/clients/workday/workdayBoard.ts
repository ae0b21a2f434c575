/**
 * Workday board location: derive CXS coordinates from a career-site URL
 *
 * Public Workday sites live at https://<tenant>.wdN.myworkdayjobs.com/<site>/...
 * and serve their listings from /wday/cxs/<tenant>/<site>/jobs on the same host.
 */

import type { WorkdayBoard } from "@/types";
import { WORKDAY_HOST_MARKER } from "@/constants";
import { parseCareerUrl } from "@/atsDetection/urlUtils";

/**
 * Parse a Workday career URL into tenant/site coordinates
 *
 * @returns null when the host is not a Workday career host or there is no site segment
 *
 * @example
 * parseWorkdayBoard("https://acme.wd5.myworkdayjobs.com/External/details/x")
 * // { origin: "https://acme.wd5.myworkdayjobs.com", host: "acme.wd5.myworkdayjobs.com", tenant: "acme", site: "External" }
 */
export function parseWorkdayBoard(careerUrl: string): WorkdayBoard | null {
  const parsed = parseCareerUrl(careerUrl);
  if (!parsed) {
    return null;
  }

  const host = parsed.host.toLowerCase();
  if (!host.includes(WORKDAY_HOST_MARKER)) {
    return null;
  }

  const site = parsed.pathname.split("/").find((segment) => segment !== "");
  if (!site) {
    return null;
  }

  return {
    origin: `${parsed.protocol}//${host}`,
    host,
    tenant: host.split(".")[0],
    site,
  };
}

/**
 * CXS jobs endpoint for a board
 */
export function workdayJobsUrl(board: WorkdayBoard): string {
  return `${board.origin}/wday/cxs/${board.tenant}/${board.site}/jobs`;
}
