/**
 * HTTP error classes: structured errors for transport and payload failures
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Structured error class for non-2xx responses
 * Contains status, URL, and optional response body snippet for debugging
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
  }
}

/**
 * Raised when a 2xx response body is not valid JSON
 */
export class ResponseParseError extends Error {
  public readonly url: string;

  constructor(url: string, cause: unknown) {
    super(
      `Invalid JSON response - ${url}: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = "ResponseParseError";
    this.url = url;
  }
}
