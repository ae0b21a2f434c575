/**
 * File-backed seen store: one fingerprint per line, append only
 *
 * Lines are read as CSV rows and only the first cell is used, so files
 * written by other tools with extra columns still load.
 */

import { appendFile, mkdir, readFile } from "fs/promises";
import { dirname } from "path";
import type { SeenStore } from "@/interfaces";
import type { SeenKey } from "@/types";
import { parseCsv } from "@/utils";

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileSeenStore implements SeenStore {
  constructor(private readonly path: string) {}

  async load(): Promise<Set<SeenKey>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return new Set();
      }
      throw error;
    }

    const keys = new Set<SeenKey>();
    for (const row of parseCsv(text)) {
      const key = row[0]?.trim() ?? "";
      if (key !== "") {
        keys.add(key);
      }
    }
    return keys;
  }

  async persist(keys: Iterable<SeenKey>): Promise<void> {
    const lines = Array.from(keys);
    if (lines.length === 0) {
      return;
    }

    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, lines.map((key) => `${key}\n`).join(""), "utf-8");
  }
}
