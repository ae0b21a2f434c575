/**
 * BaseAtsClient: shared request plumbing and fail-soft boundary for ATS clients
 *
 * Subclasses implement listPostings(); fetchPostings() wraps it and turns any
 * failure into an error result.
 */

import type { AtsPostingsClient } from "@/interfaces";
import type {
  AtsFetchResult,
  AtsProvider,
  AtsTarget,
  HttpQueryValue,
  HttpRequestFn,
  Logger,
  NormalizedPosting,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  ATS_PROVIDER_LABELS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from "@/constants";
import * as logger from "@/logger";

export interface AtsClientConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
  /** Warning/debug sink; defaults to the project logger */
  logger?: Logger;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Identifying User-Agent header */
  userAgent?: string;
}

export abstract class BaseAtsClient implements AtsPostingsClient {
  abstract readonly provider: AtsProvider;
  readonly requiresIdentifier: boolean = true;

  protected readonly httpRequest: HttpRequestFn;
  protected readonly logger: Logger;
  protected readonly timeoutMs: number;
  protected readonly headers: Record<string, string>;

  constructor(config?: AtsClientConfig) {
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
    this.logger = config?.logger ?? logger;
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.headers = {
      "User-Agent": config?.userAgent ?? DEFAULT_USER_AGENT,
      Accept: "application/json",
    };
  }

  /**
   * Literal provider label written to NormalizedPosting.source
   */
  get label(): string {
    return ATS_PROVIDER_LABELS[this.provider];
  }

  async fetchPostings(target: AtsTarget): Promise<AtsFetchResult> {
    const identifier = this.describeTarget(target);

    try {
      const postings = await this.listPostings(target);

      this.logger.debug(`${this.label} postings fetched and mapped`, {
        provider: this.provider,
        identifier,
        count: postings.length,
      });

      return { status: "ok", postings };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);

      // Log error and return an error result (do not throw)
      this.logger.warn(`Failed to fetch ${this.label} postings`, {
        provider: this.provider,
        identifier,
        error: reason,
      });

      return { status: "error", reason };
    }
  }

  /**
   * Fetch one page of postings and map them to the common schema
   *
   * May throw; fetchPostings() turns failures into error results.
   */
  protected abstract listPostings(target: AtsTarget): Promise<NormalizedPosting[]>;

  /**
   * Identifier used in log context
   */
  protected describeTarget(target: AtsTarget): string {
    return target.identifier;
  }

  /**
   * Company label for postings: display name, or the given fallback when blank
   */
  protected companyName(target: AtsTarget, fallback: string): string {
    const name = target.displayName.trim();
    return name !== "" ? name : fallback;
  }

  protected getJson<T>(url: string, query: Record<string, HttpQueryValue>): Promise<T> {
    return this.httpRequest<T>({
      method: "GET",
      url,
      query,
      headers: this.headers,
      timeoutMs: this.timeoutMs,
    });
  }

  protected postJson<T>(url: string, body: unknown): Promise<T> {
    return this.httpRequest<T>({
      method: "POST",
      url,
      json: body,
      headers: this.headers,
      timeoutMs: this.timeoutMs,
    });
  }
}
