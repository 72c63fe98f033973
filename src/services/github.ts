import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import { z } from "zod";
import type { CommitInfo, TagIndex } from "../types/index.js";
import {
  RETRYABLE_STATUSES,
  ResilientClient,
  rateLimitAware,
  type FetchLike,
  type FetchResult,
  type HeaderMap,
  type RawResponse,
  type ResilientClientOptions,
  type WaitStrategy,
} from "./http-client.js";

const tagSchema = z.object({ name: z.string() });

const compareSchema = z.object({
  html_url: z.string().nullish(),
  commits: z
    .array(
      z.object({
        html_url: z.string().default(""),
        commit: z.object({
          message: z.string().default(""),
          author: z.object({ date: z.string().nullish() }).nullish(),
        }),
      }),
    )
    .default([]),
});

export interface GitHubClientOptions extends ResilientClientOptions {
  /** Increases the rate limit from 60/hr to 5000/hr */
  token?: string | null;
  fetch?: FetchLike;
}

type HeaderValues = Record<string, string | number | string[] | undefined>;

interface HttpErrorLike {
  status: number;
  response?: { headers: HeaderValues; data: unknown };
}

function isHttpError(error: unknown): error is HttpErrorLike {
  if (error instanceof RequestError) {
    return true;
  }
  return (
    error instanceof Error &&
    error.name === "HttpError" &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function normalizeHeaders(headers: HeaderValues): HeaderMap {
  const map: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      map[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : String(value);
    }
  }
  return map;
}

function firstLine(message: string): string {
  return message.split("\n")[0].trim();
}

/**
 * GitHub REST access through Octokit. 403 responses are retried because
 * GitHub reports exhausted primary rate limits with 403 and `x-ratelimit-reset`.
 * Documentation: https://docs.github.com/en/rest
 */
export class GitHubClient extends ResilientClient {
  protected readonly platform = "GitHub";
  protected readonly baseUrl = "https://api.github.com";
  protected override readonly retryStatuses: ReadonlySet<number> = new Set([
    ...RETRYABLE_STATUSES,
    403,
  ]);
  protected override readonly waitStrategy: WaitStrategy = rateLimitAware;
  private readonly octokit: Octokit;

  constructor(options: GitHubClientOptions) {
    super(options);
    this.octokit = new Octokit({
      auth: options.token ?? undefined,
      log: options.logger,
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  protected async send(url: string): Promise<RawResponse> {
    try {
      const response = await this.octokit.request(`GET ${url}`, {
        request: { signal: AbortSignal.timeout(this.timeoutMs) },
      });
      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: response.data,
      };
    } catch (error) {
      if (isHttpError(error)) {
        return {
          status: error.status,
          headers: normalizeHeaders(error.response?.headers ?? {}),
          body: error.response?.data,
        };
      }
      throw error;
    }
  }

  /** Tag names, newest first. GitHub reports no tag dates. */
  async getTags(owner: string, repo: string): Promise<FetchResult<TagIndex>> {
    const result = await this.fetchAllPages(`repos/${owner}/${repo}/tags`, z.array(tagSchema));
    if (!result.ok) {
      return result;
    }
    return {
      ok: true,
      headers: result.headers,
      data: result.data.map((tag) => ({ tag: tag.name, createdAt: "" })),
    };
  }

  /**
   * Commits between two tags, oldest first.
   * Example: repos/torvalds/linux/compare/v6.8...v6.9
   */
  async compare(
    owner: string,
    repo: string,
    from: string,
    to: string,
  ): Promise<FetchResult<CommitInfo[]>> {
    const result = await this.fetchJson(
      `repos/${owner}/${repo}/compare/${encodeURIComponent(from)}...${encodeURIComponent(to)}`,
      compareSchema,
    );
    if (!result.ok) {
      return result;
    }
    return {
      ok: true,
      headers: result.headers,
      data: result.data.commits.map((entry) => ({
        title: firstLine(entry.commit.message),
        createdAt: entry.commit.author?.date ?? "",
        url: entry.html_url,
      })),
    };
  }
}
