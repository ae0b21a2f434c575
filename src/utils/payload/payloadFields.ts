/**
 * Safe field extraction for loosely-typed provider payloads
 *
 * Provider JSON is optional-field-heavy and occasionally carries numbers or
 * nulls where strings are expected. Leaf helpers turn any value into a string
 * without throwing, so mappers can express their fallback order as a plain
 * list. Container helpers reject shapes that cannot be a job list.
 */

/**
 * Raised when a provider response does not have the expected container shape
 */
export class MalformedPayloadError extends Error {
  constructor(message: string) {
    super(`Malformed payload: ${message}`);
    this.name = "MalformedPayloadError";
  }
}

/**
 * Coerce a payload leaf to text: strings pass through, finite numbers and
 * booleans are stringified, everything else becomes ""
 */
export function textOrEmpty(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "";
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  return "";
}

/**
 * First candidate with non-empty text, or ""
 *
 * @example
 * firstText(job.application_url, job.url) // application_url unless blank
 */
export function firstText(...candidates: unknown[]): string {
  for (const candidate of candidates) {
    const text = textOrEmpty(candidate);
    if (text !== "") {
      return text;
    }
  }
  return "";
}

/**
 * Plain JSON object check (arrays excluded)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Assert the response body is a JSON object
 *
 * @throws {MalformedPayloadError} For arrays, strings, null, etc.
 */
export function expectObject<T extends object>(
  response: T | null | undefined,
  context: string,
): T {
  if (!isRecord(response)) {
    throw new MalformedPayloadError(`${context}: expected a JSON object`);
  }
  return response;
}

/**
 * Read a list field: absent/null means no items, anything but an array is malformed
 *
 * @throws {MalformedPayloadError} When the field holds a non-array value
 */
export function listField<T>(value: T[] | null | undefined, context: string): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedPayloadError(`${context}: expected an array`);
  }
  return value;
}
