/**
 * HTTP client public API
 */

export { httpRequest, buildUrl } from "./httpClient";
export { HttpError, ResponseParseError } from "./httpError";
export type { HttpRequest, HttpMethod, HttpRequestFn, HttpErrorDetails } from "@/types";
