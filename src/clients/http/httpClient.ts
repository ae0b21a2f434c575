/**
 * HTTP client wrapper: JSON client using native fetch
 * Supports timeouts, query params and JSON bodies. One attempt per call:
 * every failure surfaces as a single thrown error.
 */

import type { HttpQueryValue, HttpRequest } from "@/types";
import { HttpError, ResponseParseError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  JSON_BODY_HEADERS,
} from "@/constants";

/**
 * Build URL with query parameters
 */
export function buildUrl(
  baseUrl: string,
  query?: Record<string, HttpQueryValue>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    url.searchParams.append(key, String(value));
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    // The status is what matters; an unreadable error body adds nothing
    return undefined;
  }
}

/**
 * Perform an HTTP request with timeout and error handling
 *
 * @template T - Expected response type (not validated)
 * @returns Parsed JSON response, or undefined for 204 / empty bodies
 * @throws {HttpError} On non-2xx status codes
 * @throws {ResponseParseError} When the body is not JSON
 * @throws {Error} On network errors or timeouts (AbortError)
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Build headers - body defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, JSON_BODY_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    // Check for HTTP errors (non-2xx)
    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
      });
    }

    const text = await response.text();
    if (response.status === 204 || text.trim() === "") {
      return undefined as T;
    }

    try {
      return JSON.parse(text) as T;
    } catch (parseError) {
      throw new ResponseParseError(url, parseError);
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
