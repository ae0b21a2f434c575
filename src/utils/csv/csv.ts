/**
 * Minimal RFC 4180 CSV parsing and formatting
 *
 * Handles quoted fields with embedded commas, quotes ("") and line breaks,
 * CRLF/LF line endings and a leading UTF-8 BOM.
 */

const QUOTE = '"';

/**
 * Parse CSV text into rows of raw cell strings
 *
 * Fully blank lines are dropped. Cells are not trimmed.
 *
 * @example
 * parseCsv('a,"b, c"\n1,2') // [["a", "b, c"], ["1", "2"]]
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(cell);
    cell = "";
    if (row.some((value) => value !== "")) {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === QUOTE) {
        if (input[i + 1] === QUOTE) {
          cell += QUOTE;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === QUOTE) {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\n") {
      endRow();
    } else if (ch === "\r") {
      if (input[i + 1] === "\n") {
        i++;
      }
      endRow();
    } else {
      cell += ch;
    }
  }

  if (cell !== "" || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Quote a cell when it contains a separator, quote or line break
 */
export function formatCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return QUOTE + value.replace(/"/g, '""') + QUOTE;
  }
  return value;
}

/**
 * Format one CSV line (no trailing newline)
 */
export function formatCsvRow(cells: readonly string[]): string {
  return cells.map(formatCsvCell).join(",");
}
