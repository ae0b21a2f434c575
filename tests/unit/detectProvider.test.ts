/**
 * Unit tests for provider detection and slug resolution
 */

import { describe, it, expect } from "vitest";
import {
  careerUrlHost,
  careerUrlPathSegments,
  detectProvider,
  isAtsProvider,
  parseCareerUrl,
  resolveSlug,
} from "@/atsDetection";

describe("detectProvider", () => {
  it("should prefer an explicit provider hint over the career URL host", () => {
    expect(detectProvider("lever", "", "https://boards.greenhouse.io/acme")).toBe("lever");
  });

  it("should normalize hint casing and whitespace", () => {
    expect(detectProvider("  Ashby ", "", "")).toBe("ashby");
  });

  it("should ignore an unsupported hint and fall back to the URL", () => {
    expect(detectProvider("taleo", "", "https://jobs.lever.co/acme")).toBe("lever");
  });

  it.each([
    ["https://boards.greenhouse.io/acme", "greenhouse"],
    ["https://job-boards.eu.greenhouse.io/acme", "greenhouse"],
    ["https://jobs.lever.co/acme", "lever"],
    ["https://apply.workable.com/acme/", "workable"],
    ["https://jobs.ashbyhq.com/acme", "ashby"],
    ["https://careers.smartrecruiters.com/AcmeCorp", "smartrecruiters"],
    ["https://acme.wd5.myworkdayjobs.com/External", "workday"],
  ])("should detect %s as %s", (url, provider) => {
    expect(detectProvider("", "", url)).toBe(provider);
  });

  it("should read a scheme-less career URL as https", () => {
    expect(detectProvider("", "", "jobs.lever.co/acme")).toBe("lever");
  });

  it("should return unknown for unrecognized hosts and blank input", () => {
    expect(detectProvider("", "", "https://careers.example.com/jobs")).toBe("unknown");
    expect(detectProvider("", "acme", "")).toBe("unknown");
    expect(detectProvider("", "", "http://")).toBe("unknown");
  });

  it("should not use the identifier for detection", () => {
    expect(detectProvider("", "greenhouse", "")).toBe("unknown");
  });
});

describe("isAtsProvider", () => {
  it("should accept only supported provider tags", () => {
    expect(isAtsProvider("workday")).toBe(true);
    expect(isAtsProvider("Workday")).toBe(false);
    expect(isAtsProvider("unknown")).toBe(false);
  });
});

describe("career URL helpers", () => {
  it("should return null for blank or unparsable URLs", () => {
    expect(parseCareerUrl("   ")).toBeNull();
    expect(parseCareerUrl("http://")).toBeNull();
  });

  it("should lower-case the host", () => {
    expect(careerUrlHost("https://Jobs.Lever.CO/Acme")).toBe("jobs.lever.co");
  });

  it("should drop empty path segments", () => {
    expect(careerUrlPathSegments("https://boards.greenhouse.io//acme/jobs/")).toEqual([
      "acme",
      "jobs",
    ]);
  });
});

describe("resolveSlug", () => {
  it("should take the first path segment for slug-based providers", () => {
    expect(resolveSlug("greenhouse", "https://boards.greenhouse.io/acme/jobs")).toBe("acme");
    expect(resolveSlug("lever", "https://jobs.lever.co/acme-labs/")).toBe("acme-labs");
    expect(resolveSlug("smartrecruiters", "careers.smartrecruiters.com/AcmeCorp")).toBe(
      "AcmeCorp",
    );
  });

  it("should return empty when the URL has no path", () => {
    expect(resolveSlug("ashby", "https://jobs.ashbyhq.com")).toBe("");
    expect(resolveSlug("workable", "")).toBe("");
  });

  it("should never derive a slug for workday or unknown providers", () => {
    expect(resolveSlug("workday", "https://acme.wd5.myworkdayjobs.com/External")).toBe("");
    expect(resolveSlug("unknown", "https://careers.example.com/acme")).toBe("");
  });
});
