import type { ZodType, ZodTypeDef } from "zod";
import { errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

export type HeaderMap = Record<string, string>;

/** Any zod schema producing `T`, whatever its input type. */
export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface RawResponse {
  status: number;
  headers: HeaderMap;
  body: unknown;
}

export interface FetchError {
  url: string;
  /** HTTP status of the last attempt, null for network errors */
  status: number | null;
  message: string;
  attempts: number;
}

export type FetchResult<T> =
  | { ok: true; data: T; headers: HeaderMap }
  | { ok: false; error: FetchError };

export type QueryParams = Record<string, string | number | undefined>;

/** Same shape as the global `fetch`, so it can be handed to Octokit too. */
export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type Sleep = (ms: number) => Promise<void>;

export interface WaitContext {
  status: number | null;
  headers: HeaderMap;
  /** Zero-based index of the attempt that just failed */
  attempt: number;
  backoffFactor: number;
  now: () => number;
}

/** Milliseconds to wait before the next attempt. */
export type WaitStrategy = (context: WaitContext) => number;

export interface ResilientClientOptions {
  logger: Logger;
  maxAttempts?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const MAX_PAGES = 8;

const CLIENT_DEFAULTS = {
  MAX_ATTEMPTS: 3,
  BACKOFF_FACTOR: 2,
  MAX_DELAY_MS: 120_000,
  TIMEOUT_MS: 10_000,
} as const;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Seconds from a `retry-after` header, given as delta-seconds or HTTP date.
 */
export function parseRetryAfter(value: string | undefined, now: number): number | null {
  if (!value) {
    return null;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && value.trim() !== "") {
    return Math.max(0, seconds);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, (date - now) / 1000);
}

export function exponentialBackoff(context: WaitContext): number {
  return Math.pow(context.backoffFactor, context.attempt) * 1000;
}

/** `retry-after` first, exponential backoff otherwise. */
export const retryAfterOrBackoff: WaitStrategy = (context) => {
  const retryAfter = parseRetryAfter(context.headers["retry-after"], context.now());
  if (retryAfter !== null) {
    return retryAfter * 1000;
  }
  return exponentialBackoff(context);
};

/**
 * `retry-after` first, then for 403 the time left until `x-ratelimit-reset`
 * (epoch seconds), exponential backoff otherwise.
 */
export const rateLimitAware: WaitStrategy = (context) => {
  const retryAfter = parseRetryAfter(context.headers["retry-after"], context.now());
  if (retryAfter !== null) {
    return retryAfter * 1000;
  }

  const reset = Number(context.headers["x-ratelimit-reset"]);
  if (context.status === 403 && context.headers["x-ratelimit-reset"] && Number.isFinite(reset)) {
    return Math.max(0, reset * 1000 - context.now());
  }

  return exponentialBackoff(context);
};

/**
 * URL of the `rel="next"` entry of a `Link` header.
 */
export function parseNextLink(link: string | undefined): string | null {
  if (!link) {
    return null;
  }
  for (const part of link.split(",")) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?([^";]+)"?/);
    if (match && match[2].split(/\s+/).includes("next")) {
      return match[1];
    }
  }
  return null;
}

export function headersToMap(headers: Headers): HeaderMap {
  const map: HeaderMap = {};
  headers.forEach((value, key) => {
    map[key.toLowerCase()] = value;
  });
  return map;
}

export function buildUrl(base: string, endpoint: string, params: QueryParams = {}): string {
  const url = /^https?:\/\//.test(endpoint)
    ? new URL(endpoint)
    : new URL(`${base.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

/**
 * Bounded-retry JSON client for one hosting platform.
 *
 * Subclasses provide the transport and the platform's set of retryable
 * statuses and wait strategy. Failures come back as a `FetchResult` and are
 * logged here; nothing is thrown to callers.
 */
export abstract class ResilientClient {
  protected readonly logger: Logger;
  protected readonly maxAttempts: number;
  protected readonly backoffFactor: number;
  protected readonly maxDelayMs: number;
  protected readonly timeoutMs: number;
  protected readonly sleep: Sleep;
  private readonly now: () => number;

  protected abstract readonly platform: string;
  protected abstract readonly baseUrl: string;
  protected readonly retryStatuses: ReadonlySet<number> = RETRYABLE_STATUSES;
  protected readonly waitStrategy: WaitStrategy = retryAfterOrBackoff;

  constructor(options: ResilientClientOptions) {
    this.logger = options.logger;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? CLIENT_DEFAULTS.MAX_ATTEMPTS);
    this.backoffFactor = options.backoffFactor ?? CLIENT_DEFAULTS.BACKOFF_FACTOR;
    this.maxDelayMs = options.maxDelayMs ?? CLIENT_DEFAULTS.MAX_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? CLIENT_DEFAULTS.TIMEOUT_MS;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /** Perform one HTTP GET. Network failures reject; HTTP errors resolve. */
  protected abstract send(url: string): Promise<RawResponse>;

  async fetchJson<T>(
    endpoint: string,
    schema: Schema<T>,
    params: QueryParams = {},
  ): Promise<FetchResult<T>> {
    const result = await this.fetchRaw(buildUrl(this.baseUrl, endpoint, params));
    if (!result.ok) {
      return result;
    }
    return this.validate(result.data.body, schema, result.data.headers, result.url);
  }

  /**
   * Fetch every page of a list endpoint, following `rel="next"` links up to
   * {@link MAX_PAGES} pages. Without a Link header, paging stops at the first
   * page shorter than `perPage`.
   */
  async fetchAllPages<T>(
    endpoint: string,
    schema: Schema<T[]>,
    params: QueryParams = {},
    perPage = 100,
  ): Promise<FetchResult<T[]>> {
    const items: T[] = [];
    let url: string | null = buildUrl(this.baseUrl, endpoint, { ...params, per_page: perPage });
    let page = 1;
    let lastHeaders: HeaderMap = {};

    while (url && page <= MAX_PAGES) {
      const response = await this.fetchRaw(url);
      if (!response.ok) {
        return response;
      }

      const validated = this.validate(response.data.body, schema, response.data.headers, url);
      if (!validated.ok) {
        return validated;
      }

      items.push(...validated.data);
      lastHeaders = validated.headers;

      const link = validated.headers["link"];
      if (link !== undefined) {
        url = parseNextLink(link);
      } else if (validated.data.length < perPage) {
        url = null;
      } else {
        url = buildUrl(this.baseUrl, endpoint, { ...params, per_page: perPage, page: page + 1 });
      }
      page++;
    }

    if (url) {
      this.logger.debug(`${this.platform}: stopped paging after ${MAX_PAGES} pages`, { url });
    }

    return { ok: true, data: items, headers: lastHeaders };
  }

  private validate<T>(
    body: unknown,
    schema: Schema<T>,
    headers: HeaderMap,
    url: string,
  ): FetchResult<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const error: FetchError = {
        url,
        status: null,
        message: `Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
        attempts: 1,
      };
      this.logger.error(`${this.platform}: ${error.message}`, { url });
      return { ok: false, error };
    }
    return { ok: true, data: parsed.data, headers };
  }

  /**
   * Send a request, retrying transient failures. The response body is returned
   * unparsed.
   */
  async fetchRaw(
    url: string,
    options: { expectedStatuses?: ReadonlySet<number> } = {},
  ): Promise<{ ok: true; data: RawResponse; url: string } | { ok: false; error: FetchError }> {
    let last: { status: number | null; headers: HeaderMap; message: string } = {
      status: null,
      headers: {},
      message: "no attempt made",
    };
    let attempts = 0;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      attempts++;
      this.logger.debug(`${this.platform} API URL: ${url}`);

      let retryable: boolean;
      try {
        const response = await this.send(url);
        if (response.status >= 200 && response.status < 300) {
          return { ok: true, data: response, url };
        }

        last = {
          status: response.status,
          headers: response.headers,
          message: describeBody(response.body) ?? `HTTP ${response.status}`,
        };
        retryable = this.retryStatuses.has(response.status);
      } catch (error) {
        last = { status: null, headers: {}, message: errorMessage(error) };
        retryable = true;
      }

      const isLastAttempt = attempt === this.maxAttempts - 1;
      if (!retryable || isLastAttempt) {
        break;
      }

      const wait = Math.min(
        Math.max(
          0,
          this.waitStrategy({
            status: last.status,
            headers: last.headers,
            attempt,
            backoffFactor: this.backoffFactor,
            now: this.now,
          }),
        ),
        this.maxDelayMs,
      );

      this.logger.debug(
        `${this.platform}: [Retry ${attempt + 1}/${this.maxAttempts}] ${
          last.status === null ? "network error" : `HTTP ${last.status}`
        } - retrying in ${Math.round(wait)}ms`,
      );
      await this.sleep(wait);
    }

    const error: FetchError = { url, status: last.status, message: last.message, attempts };
    if (last.status !== null && options.expectedStatuses?.has(last.status)) {
      this.logger.debug(`${this.platform} API HTTP ${last.status} for ${url}`);
      return { ok: false, error };
    }
    this.logger.error(
      `${this.platform} API ${last.status === null ? "request error" : `HTTP error ${last.status}`}: ${last.message}`,
      { url, attempts },
    );
    return { ok: false, error };
  }
}

function describeBody(body: unknown): string | null {
  if (typeof body === "string") {
    return body.length > 0 ? body.slice(0, 200) : null;
  }
  if (typeof body === "object" && body !== null && "message" in body) {
    const message = body.message;
    return typeof message === "string" ? message : JSON.stringify(message);
  }
  return null;
}

/**
 * Transport over the Fetch API, shared by the clients that talk plain HTTP.
 */
export async function sendWithFetch(
  fetchImpl: FetchLike,
  url: string,
  timeoutMs: number,
  headers: Record<string, string>,
  as: "json" | "text",
): Promise<RawResponse> {
  const response = await fetchImpl(url, {
    method: "GET",
    headers,
    redirect: "follow",
    signal: AbortSignal.timeout(timeoutMs),
  });

  const text = await response.text();
  let body: unknown = text;
  if (as === "json" && text.length > 0) {
    try {
      body = JSON.parse(text);
    } catch {
      body = text;
    }
  }

  return { status: response.status, headers: headersToMap(response.headers), body };
}
