/**
 * Mock HTTP harness for offline ATS client tests
 *
 * - Returns fixture JSON for registered routes
 * - Throws loudly on unmocked requests (no accidental network calls)
 * - Matches on method + URL without query string
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("GET", "https://boards-api.greenhouse.io/v1/boards/acme/jobs", fixture);
 *   const client = new GreenhouseAtsClient({ httpRequest: mock.request });
 */

import type { HttpRequest } from "@/types";
import { HttpError } from "@/clients/http";
import { readFileSync } from "fs";
import { join } from "path";

type RouteKey = string; // "METHOD URL"
type RouteHandler = (req: HttpRequest) => Promise<unknown>;

type MockHttpReply = {
  __mockHttpReply: true;
  status: number;
  body: unknown;
};

function asReply(input: { status: number; body: unknown }): MockHttpReply {
  return { __mockHttpReply: true, status: input.status, body: input.body };
}

function isReply(value: unknown): value is MockHttpReply {
  return (
    typeof value === "object" &&
    value !== null &&
    "__mockHttpReply" in value &&
    value.__mockHttpReply === true
  );
}

export interface MockHttp {
  /**
   * Register a 200 response for method+url
   */
  on(method: string, url: string, response: unknown): void;

  /**
   * Register a response with an explicit status; non-2xx rejects with HttpError
   */
  onResponse(method: string, url: string, response: { status: number; body: unknown }): void;

  /**
   * Register a custom handler (e.g. one that rejects with a transport error)
   */
  onCustom(method: string, url: string, handler: RouteHandler): void;

  /**
   * Mock httpRequest function (inject into clients)
   */
  request: <T>(req: HttpRequest) => Promise<T>;

  getRecordedRequests(): HttpRequest[];

  /**
   * Clear all mocks and recorded requests
   */
  reset(): void;
}

/**
 * Load fixture content from tests/fixtures as UTF-8 text
 *
 * @param relativePath - Path relative to tests/fixtures (e.g. "ats/lever.json")
 */
export function loadFixtureText(relativePath: string): string {
  const fullPath = join(process.cwd(), "tests", "fixtures", relativePath);
  return readFileSync(fullPath, "utf-8");
}

/**
 * Parsed JSON fixture
 */
export function loadFixtureJson(relativePath: string): unknown {
  return JSON.parse(loadFixtureText(relativePath));
}

/**
 * Build route key from method and URL (ignores query params)
 */
function buildRouteKey(method: string, url: string): RouteKey {
  const urlWithoutQuery = url.split("?")[0];
  return `${method.toUpperCase()} ${urlWithoutQuery}`;
}

export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: HttpRequest[] = [];

  const on = (method: string, url: string, response: unknown): void => {
    routes.set(buildRouteKey(method, url), async () => asReply({ status: 200, body: response }));
  };

  const onResponse = (
    method: string,
    url: string,
    response: { status: number; body: unknown },
  ): void => {
    routes.set(buildRouteKey(method, url), async () => asReply(response));
  };

  const onCustom = (method: string, url: string, handler: RouteHandler): void => {
    routes.set(buildRouteKey(method, url), handler);
  };

  const request = async <T>(req: HttpRequest): Promise<T> => {
    recordedRequests.push({ ...req });

    const key = buildRouteKey(req.method, req.url);
    const handler = routes.get(key);

    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `All HTTP requests must be explicitly mocked to prevent accidental network calls.\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    const response = await handler(req);

    if (!isReply(response)) {
      return response as T;
    }

    if (response.status >= 200 && response.status < 300) {
      return response.body as T;
    }

    throw new HttpError({
      status: response.status,
      statusText: "Mock Response",
      url: req.url,
      bodySnippet: typeof response.body === "string" ? response.body : JSON.stringify(response.body),
    });
  };

  const getRecordedRequests = (): HttpRequest[] => {
    return [...recordedRequests];
  };

  const reset = (): void => {
    routes.clear();
    recordedRequests.length = 0;
  };

  return { on, onResponse, onCustom, request, getRecordedRequests, reset };
}
