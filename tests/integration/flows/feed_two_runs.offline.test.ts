/**
 * End-to-end feed run over every real ATS client (mock HTTP, file seen store)
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import type { CompanyInput } from "@/types";
import { createAtsClientRegistry } from "@/clients/atsClientRegistry";
import { FileSeenStore, computePostingFingerprint } from "@/dedup";
import { runFeedOnce } from "@/orchestration";
import { createMockHttp, loadFixtureJson } from "../../helpers/mockHttp";
import { createRecordingLogger } from "../../helpers/recordingLogger";

const COMPANIES: CompanyInput[] = [
  {
    name: "Acme",
    providerHint: "",
    identifier: "",
    careerUrl: "https://boards.greenhouse.io/acme/jobs",
    keywords: "engineer",
  },
  { name: "Beta", providerHint: "lever", identifier: "acme", careerUrl: "", keywords: "" },
  {
    name: "Mystery",
    providerHint: "",
    identifier: "",
    careerUrl: "https://careers.example.com",
    keywords: "",
  },
  { name: "NoSlug", providerHint: "ashby", identifier: "", careerUrl: "", keywords: "" },
  {
    name: "Gamma",
    providerHint: "workday",
    identifier: "",
    careerUrl: "https://careers.example.com/External",
    keywords: "",
  },
  { name: "Delta", providerHint: "workable", identifier: "broken", careerUrl: "", keywords: "" },
];

describe("Feed run across providers (offline)", () => {
  const mockHttp = createMockHttp();
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ats-job-feed-flow-"));
    mockHttp.reset();
    mockHttp.on(
      "GET",
      "https://boards-api.greenhouse.io/v1/boards/acme/jobs",
      loadFixtureJson("ats/greenhouse.json"),
    );
    mockHttp.on("GET", "https://api.lever.co/v0/postings/acme", loadFixtureJson("ats/lever.json"));
    mockHttp.onResponse("GET", "https://apply.workable.com/api/v3/accounts/broken/jobs", {
      status: 500,
      body: { error: "down" },
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should collect fresh postings once and suppress them on the second run", async () => {
    const seenPath = join(dir, "seen.csv");
    const logger = createRecordingLogger();
    const deps = {
      registry: createAtsClientRegistry({ httpRequest: mockHttp.request, logger }),
      seenStore: new FileSeenStore(seenPath),
      logger,
    };

    const first = await runFeedOnce(COMPANIES, deps);

    expect(first.companies.map((c) => [c.company, c.provider, c.identifier, c.status])).toEqual([
      ["Acme", "greenhouse", "acme", "DONE"],
      ["Beta", "lever", "acme", "DONE"],
      ["Mystery", "unknown", "", "SKIPPED"],
      ["NoSlug", "ashby", "", "SKIPPED"],
      ["Gamma", "workday", "", "DONE"],
      ["Delta", "workable", "broken", "ERROR"],
    ]);
    expect(first.fresh.map((p) => p.url)).toEqual([
      "https://boards.greenhouse.io/acme/jobs/1001",
      "https://jobs.lever.co/acme/a1b2c3",
      "https://jobs.lever.co/acme/g7h8i9",
    ]);
    expect(first.counters).toEqual({
      companies: 6,
      companiesSkipped: 2,
      companiesFailed: 1,
      postingsFetched: 4,
      postingsKept: 3,
      postingsFresh: 3,
      postingsAlreadySeen: 0,
    });
    expect(readFileSync(seenPath, "utf-8")).toBe(
      first.fresh.map((p) => `${computePostingFingerprint(p.url)}\n`).join(""),
    );
    expect(logger.at("warn")).toHaveLength(1);
    expect(
      mockHttp.getRecordedRequests().some((req) => req.url.includes("careers.example.com")),
    ).toBe(false);

    const second = await runFeedOnce(COMPANIES, deps);

    expect(second.fresh).toEqual([]);
    expect(second.counters.postingsAlreadySeen).toBe(3);
    expect(readFileSync(seenPath, "utf-8").split("\n").filter(Boolean)).toHaveLength(3);
  });
});
