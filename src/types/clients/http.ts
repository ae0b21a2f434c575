/**
 * HTTP client type definitions
 */

/**
 * Methods used by the ATS endpoints (list endpoints are GET, Ashby and Workday are POST)
 */
export type HttpMethod = "GET" | "POST";

export type HttpQueryValue = string | number | boolean;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, HttpQueryValue>;
  /** JSON-serializable request body (sent with Content-Type: application/json) */
  json?: unknown;
  timeoutMs?: number;
}

/**
 * HTTP request function type, injected into ATS clients for testing
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}
