/**
 * Company input CSV reader
 *
 * Header-mapped: columns may appear in any order and unknown columns are
 * ignored. Missing known columns read as "".
 */

import { readFile } from "fs/promises";
import type { CompanyInput } from "@/types";
import { COMPANY_INPUT_COLUMNS } from "@/constants";
import { parseCsv } from "@/utils";

/**
 * Raised when the input file has no recognizable header
 */
export class CsvFormatError extends Error {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(`Invalid company input file ${path}: ${message}`);
    this.name = "CsvFormatError";
  }
}

type CompanyInputField = (typeof COMPANY_INPUT_COLUMNS)[keyof typeof COMPANY_INPUT_COLUMNS];

function isKnownColumn(header: string): header is keyof typeof COMPANY_INPUT_COLUMNS {
  return Object.prototype.hasOwnProperty.call(COMPANY_INPUT_COLUMNS, header);
}

function emptyCompanyInput(): CompanyInput {
  return { name: "", providerHint: "", identifier: "", careerUrl: "", keywords: "" };
}

/**
 * Parse company rows from CSV text
 *
 * @throws {CsvFormatError} If none of the known columns are in the header
 */
export function parseCompanyInputs(text: string, source = "<inline>"): CompanyInput[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) {
    return [];
  }

  const fieldByIndex = new Map<number, CompanyInputField>();
  header.forEach((cell, index) => {
    const column = cell.trim().toLowerCase();
    if (isKnownColumn(column)) {
      fieldByIndex.set(index, COMPANY_INPUT_COLUMNS[column]);
    }
  });

  if (fieldByIndex.size === 0) {
    throw new CsvFormatError(
      source,
      `expected columns ${Object.keys(COMPANY_INPUT_COLUMNS).join(", ")}`,
    );
  }

  const companies: CompanyInput[] = [];
  for (const row of rows) {
    const company = emptyCompanyInput();
    for (const [index, field] of fieldByIndex) {
      company[field] = (row[index] ?? "").trim();
    }

    if (Object.values(company).every((value) => value === "")) {
      continue;
    }
    companies.push(company);
  }

  return companies;
}

/**
 * Read the configured company list
 */
export async function readCompanyInputs(path: string): Promise<CompanyInput[]> {
  const text = await readFile(path, "utf-8");
  return parseCompanyInputs(text, path);
}
