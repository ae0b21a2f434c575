/**
 * Workable client against an accounts fixture (mock HTTP)
 */

import { beforeEach, describe, expect, it } from "vitest";
import { WorkableAtsClient, mapWorkableJobToPosting } from "@/clients/workable";
import { createMockHttp, loadFixtureJson } from "../../helpers/mockHttp";
import { createRecordingLogger } from "../../helpers/recordingLogger";
import { LONG_DESCRIPTION_HTML, LONG_DESCRIPTION_SNIPPET } from "../../helpers/longDescription";

const JOBS_URL = "https://apply.workable.com/api/v3/accounts/acme/jobs";

describe("WorkableAtsClient (offline)", () => {
  const mockHttp = createMockHttp();
  let client: WorkableAtsClient;

  beforeEach(() => {
    mockHttp.reset();
    client = new WorkableAtsClient({
      httpRequest: mockHttp.request,
      logger: createRecordingLogger(),
    });
  });

  it("should request active jobs and map URL and date fallbacks", async () => {
    mockHttp.on("GET", JOBS_URL, loadFixtureJson("ats/workable.json"));

    const result = await client.fetchPostings({ identifier: "acme", displayName: "Acme", careerUrl: "" });

    expect(result).toEqual({
      status: "ok",
      postings: [
        {
          company: "Acme",
          title: "QA Engineer",
          location: "Lisbon",
          url: "https://apply.workable.com/acme/j/AB12CD34/apply",
          source: "Workable",
          postedAt: "2024-04-20",
          snippet: "AB12CD34",
        },
        {
          company: "Acme",
          title: "Office Manager",
          location: "Porto",
          url: "https://apply.workable.com/acme/j/EF56GH78/",
          source: "Workable",
          postedAt: "2024-04-25",
          snippet: "Keep the office running.",
        },
      ],
    });
    expect(mockHttp.getRecordedRequests()[0].query).toEqual({ active: "true" });
  });

  it("should report a non-array results field as malformed", async () => {
    mockHttp.on("GET", JOBS_URL, { results: { id: 1 } });

    const result = await client.fetchPostings({ identifier: "acme", displayName: "", careerUrl: "" });

    expect(result).toEqual({
      status: "error",
      reason: "Malformed payload: workable results: expected an array",
    });
  });

  it("should cap long descriptions at 280 characters", async () => {
    mockHttp.on("GET", JOBS_URL, { results: [{ title: "Staff Engineer", url: "https://apply.workable.com/acme/j/9/", description: LONG_DESCRIPTION_HTML }] });

    const result = await client.fetchPostings({ identifier: "acme", displayName: "Acme", careerUrl: "" });

    expect(result.status === "ok" && result.postings.map((p) => p.snippet)).toEqual([
      LONG_DESCRIPTION_SNIPPET,
    ]);
  });

  it("should label every fixture posting with its source and a bounded snippet", async () => {
    mockHttp.on("GET", JOBS_URL, loadFixtureJson("ats/workable.json"));

    const result = await client.fetchPostings({ identifier: "acme", displayName: "Acme", careerUrl: "" });

    const postings = result.status === "ok" ? result.postings : [];
    expect(postings.length).toBeGreaterThan(0);
    for (const posting of postings) {
      expect(posting.source).toBe("Workable");
      expect(posting.snippet.length).toBeLessThanOrEqual(280);
    }
  });
});

describe("mapWorkableJobToPosting", () => {
  it("should leave every field empty for a bare job", () => {
    expect(mapWorkableJobToPosting({}, "Acme")).toEqual({
      company: "Acme",
      title: "",
      location: "",
      url: "",
      source: "Workable",
      postedAt: "",
      snippet: "",
    });
  });
});
