/**
 * Workday client against a CXS jobs fixture (mock HTTP)
 */

import { beforeEach, describe, expect, it } from "vitest";
import {
  WORKDAY_JOBS_REQUEST_BODY,
  WorkdayAtsClient,
  parseWorkdayBoard,
  workdayJobsUrl,
} from "@/clients/workday";
import { createMockHttp, loadFixtureJson } from "../../helpers/mockHttp";
import { createRecordingLogger } from "../../helpers/recordingLogger";
import { LONG_DESCRIPTION_HTML, LONG_DESCRIPTION_SNIPPET } from "../../helpers/longDescription";

const CAREER_URL = "https://acme.wd5.myworkdayjobs.com/External/job/Austin-TX";
const JOBS_URL = "https://acme.wd5.myworkdayjobs.com/wday/cxs/acme/External/jobs";

describe("WorkdayAtsClient (offline)", () => {
  const mockHttp = createMockHttp();
  let client: WorkdayAtsClient;

  beforeEach(() => {
    mockHttp.reset();
    client = new WorkdayAtsClient({
      httpRequest: mockHttp.request,
      logger: createRecordingLogger(),
    });
  });

  it("should not need an identifier", () => {
    expect(client.requiresIdentifier).toBe(false);
  });

  it("should POST the first page and build absolute posting URLs", async () => {
    mockHttp.on("POST", JOBS_URL, loadFixtureJson("ats/workday.json"));

    const result = await client.fetchPostings({ identifier: "", displayName: "", careerUrl: CAREER_URL });

    expect(result).toEqual({
      status: "ok",
      postings: [
        {
          company: "acme",
          title: "Warehouse Associate",
          location: "Austin, TX",
          url: "https://acme.wd5.myworkdayjobs.com/job/Austin-TX/Warehouse-Associate_R123",
          source: "Workday",
          postedAt: "Posted Today",
          snippet: "Pick and pack.",
        },
        {
          company: "acme",
          title: "Forklift Operator",
          location: "",
          url: "https://acme.wd5.myworkdayjobs.com/job/Reno-NV/Forklift-Operator_R124",
          source: "Workday",
          postedAt: "Posted 3 Days Ago",
          snippet: "",
        },
      ],
    });
    expect(mockHttp.getRecordedRequests()[0].json).toEqual({
      appliedFacets: {},
      limit: 50,
      offset: 0,
      searchText: "",
    });
  });

  it("should make no request for a career URL outside the Workday domain", async () => {
    const result = await client.fetchPostings({
      identifier: "",
      displayName: "Acme",
      careerUrl: "https://careers.example.com/External",
    });

    expect(result).toEqual({ status: "ok", postings: [] });
    expect(mockHttp.getRecordedRequests()).toEqual([]);
  });

  it("should make no request when the URL has no site segment", async () => {
    const result = await client.fetchPostings({
      identifier: "",
      displayName: "Acme",
      careerUrl: "https://acme.wd5.myworkdayjobs.com/",
    });

    expect(result).toEqual({ status: "ok", postings: [] });
    expect(mockHttp.getRecordedRequests()).toEqual([]);
  });

  it("should cap long descriptions at 280 characters", async () => {
    mockHttp.on("POST", JOBS_URL, { jobPostings: [{ title: "Staff Engineer", externalPath: "/job/9", shortDescription: LONG_DESCRIPTION_HTML }] });

    const result = await client.fetchPostings({ identifier: "", displayName: "Acme", careerUrl: CAREER_URL });

    expect(result.status === "ok" && result.postings.map((p) => p.snippet)).toEqual([
      LONG_DESCRIPTION_SNIPPET,
    ]);
  });

  it("should label every fixture posting with its source and a bounded snippet", async () => {
    mockHttp.on("POST", JOBS_URL, loadFixtureJson("ats/workday.json"));

    const result = await client.fetchPostings({ identifier: "", displayName: "Acme", careerUrl: CAREER_URL });

    const postings = result.status === "ok" ? result.postings : [];
    expect(postings.length).toBeGreaterThan(0);
    for (const posting of postings) {
      expect(posting.source).toBe("Workday");
      expect(posting.snippet.length).toBeLessThanOrEqual(280);
    }
  });
});

describe("parseWorkdayBoard", () => {
  it("should take the tenant from the first host label and the site from the path", () => {
    const board = parseWorkdayBoard("https://Acme.wd1.myworkdayjobs.com/en-US/Careers");

    expect(board).toEqual({
      origin: "https://acme.wd1.myworkdayjobs.com",
      host: "acme.wd1.myworkdayjobs.com",
      tenant: "acme",
      site: "en-US",
    });
    expect(board && workdayJobsUrl(board)).toBe(
      "https://acme.wd1.myworkdayjobs.com/wday/cxs/acme/en-US/jobs",
    );
  });

  it("should return null for non-Workday hosts", () => {
    expect(parseWorkdayBoard("https://myworkdayjobs.com.evil.example/site")).toBeNull();
  });

  it("should expose the fixed request body", () => {
    expect(WORKDAY_JOBS_REQUEST_BODY.limit).toBe(50);
  });
});
