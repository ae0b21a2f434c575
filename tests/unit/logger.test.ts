/**
 * Unit tests for the micro-logger
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import * as logger from "@/logger";
import { createRecordingLogger } from "../helpers/recordingLogger";

describe("logger", () => {
  afterEach(() => {
    logger.setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("should recognize log level names", () => {
    expect(logger.isLogLevel("warn")).toBe(true);
    expect(logger.isLogLevel("trace")).toBe(false);
  });

  it("should format level, message and meta on one line", () => {
    const log = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.warn("Provider failed", { provider: "lever" });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] Provider failed \{"provider":"lever"\}$/,
    );
  });

  it("should drop messages below the current level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    logger.setLogLevel("warn");

    logger.info("hidden");

    expect(log).not.toHaveBeenCalled();
  });

  it("should merge bound context into every call", () => {
    const sink = createRecordingLogger();
    const scoped = logger.withContext({ company: "Acme" }, sink);

    scoped.info("Fetched", { count: 2 });

    expect(sink.entries).toEqual([
      { level: "info", message: "Fetched", meta: { company: "Acme", count: 2 } },
    ]);
  });
});
