/**
 * Output writer for fresh postings
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { NormalizedPosting } from "@/types";
import { OUTPUT_FILE_PREFIX, POSTING_OUTPUT_COLUMNS } from "@/constants";
import { formatCsvRow } from "@/utils";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * UTC timestamp used in output file names
 *
 * @example
 * formatRunTimestamp(new Date("2024-03-05T07:08:09Z")) // "20240305_070809"
 */
export function formatRunTimestamp(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}_${time}`;
}

export function formatPostingsCsv(postings: NormalizedPosting[]): string {
  const lines = [formatCsvRow(POSTING_OUTPUT_COLUMNS)];
  for (const posting of postings) {
    lines.push(formatCsvRow(POSTING_OUTPUT_COLUMNS.map((column) => posting[column])));
  }
  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Write postings to `<dir>/new_openings_YYYYMMDD_HHMMSS.csv`
 *
 * The header row is written even when there are no postings.
 *
 * @returns Path of the written file
 */
export async function writePostingsCsv(
  dir: string,
  postings: NormalizedPosting[],
  now: Date = new Date(),
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${OUTPUT_FILE_PREFIX}${formatRunTimestamp(now)}.csv`);
  await writeFile(path, formatPostingsCsv(postings), "utf-8");
  return path;
}
