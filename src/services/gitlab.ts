import { z } from "zod";
import type { CommitInfo, TagIndex } from "../types/index.js";
import {
  ResilientClient,
  sendWithFetch,
  type FetchLike,
  type FetchResult,
  type RawResponse,
  type ResilientClientOptions,
} from "./http-client.js";

export const GITLAB_DEFAULTS = {
  ARCH_HOST: "gitlab.archlinux.org",
  ARCH_PACKAGES_GROUP: "archlinux/packaging/packages",
  DEFAULT_BRANCH: "main",
} as const;

const tagSchema = z.object({
  name: z.string(),
  created_at: z.string().nullish(),
  commit: z.object({ created_at: z.string().nullish() }).nullish(),
});

const commitSchema = z.object({
  title: z.string().default(""),
  created_at: z.string().default(""),
  web_url: z.string().default(""),
});

const diffSchema = z.object({
  old_path: z.string(),
  new_path: z.string(),
  diff: z.string().default(""),
});

const compareSchema = z.object({
  commits: z.array(commitSchema).default([]),
  diffs: z.array(diffSchema).default([]),
  web_url: z.string().nullish(),
});

export type GitLabDiff = z.infer<typeof diffSchema>;

export interface GitLabCompare {
  commits: CommitInfo[];
  diffs: GitLabDiff[];
}

const projectNotFound: ReadonlySet<number> = new Set([404]);

export interface GitLabClientOptions extends ResilientClientOptions {
  /** Host name, e.g. gitlab.archlinux.org or invent.kde.org */
  host: string;
  fetch?: FetchLike;
}

/**
 * Anonymous access to one GitLab instance's REST API.
 * Documentation: https://docs.gitlab.com/api/rest/
 */
export class GitLabClient extends ResilientClient {
  protected readonly platform: string;
  protected readonly baseUrl: string;
  readonly host: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: GitLabClientOptions) {
    super(options);
    this.host = options.host;
    this.platform = `GitLab (${options.host})`;
    this.baseUrl = `https://${options.host}/api/v4`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  protected send(url: string): Promise<RawResponse> {
    return sendWithFetch(this.fetchImpl, url, this.timeoutMs, { Accept: "application/json" }, "json");
  }

  private projectEndpoint(projectPath: string): string {
    return `projects/${encodeURIComponent(projectPath)}`;
  }

  /**
   * Tags of a project, newest first, e.g. for `archlinux/packaging/packages/mesa`.
   */
  async getTags(projectPath: string): Promise<FetchResult<TagIndex>> {
    const result = await this.fetchAllPages(
      `${this.projectEndpoint(projectPath)}/repository/tags`,
      z.array(tagSchema),
      { order_by: "updated", sort: "desc" },
    );
    if (!result.ok) {
      return result;
    }

    return {
      ok: true,
      headers: result.headers,
      data: result.data.map((tag) => ({
        tag: tag.name,
        createdAt: tag.created_at ?? tag.commit?.created_at ?? "",
      })),
    };
  }

  /**
   * Commits (oldest first) and file diffs between two refs.
   * Example: projects/archlinux%2Fpackaging%2Fpackages%2Fmesa/repository/compare?from=1-25.0.4-1&to=1-25.0.5-1
   */
  async compare(projectPath: string, from: string, to: string): Promise<FetchResult<GitLabCompare>> {
    const result = await this.fetchJson(
      `${this.projectEndpoint(projectPath)}/repository/compare`,
      compareSchema,
      { from, to },
    );
    if (!result.ok) {
      return result;
    }

    return {
      ok: true,
      headers: result.headers,
      data: {
        commits: result.data.commits.map((commit) => ({
          title: commit.title,
          createdAt: commit.created_at,
          url: commit.web_url,
        })),
        diffs: result.data.diffs,
      },
    };
  }

  async getFileContent(
    projectPath: string,
    filePath: string,
    ref: string = GITLAB_DEFAULTS.DEFAULT_BRANCH,
  ): Promise<string | null> {
    const result = await this.fetchRaw(
      `${this.baseUrl}/${this.projectEndpoint(projectPath)}/repository/files/${encodeURIComponent(filePath)}/raw?ref=${encodeURIComponent(ref)}`,
      { expectedStatuses: projectNotFound },
    );
    if (!result.ok) {
      return null;
    }

    const body = result.data.body;
    return typeof body === "string" ? body : JSON.stringify(body);
  }

  /** Whether `projectPath` names an existing, visible project. */
  async projectExists(projectPath: string): Promise<boolean> {
    const result = await this.fetchRaw(`${this.baseUrl}/${this.projectEndpoint(projectPath)}`, {
      expectedStatuses: projectNotFound,
    });
    return result.ok;
  }

  webUrl(projectPath: string): string {
    return `https://${this.host}/${projectPath}`;
  }
}

/**
 * One client per GitLab host for the whole run.
 */
export class GitLabClientPool {
  private readonly clients = new Map<string, GitLabClient>();

  constructor(private readonly options: Omit<GitLabClientOptions, "host">) {}

  forHost(host: string): GitLabClient {
    const key = host.toLowerCase();
    let client = this.clients.get(key);
    if (!client) {
      client = new GitLabClient({ ...this.options, host: key });
      this.clients.set(key, client);
    }
    return client;
  }

  arch(): GitLabClient {
    return this.forHost(GITLAB_DEFAULTS.ARCH_HOST);
  }
}

export function archPackageProjectPath(packageBase: string): string {
  return `${GITLAB_DEFAULTS.ARCH_PACKAGES_GROUP}/${packageBase}`;
}

export function archPackageWebUrl(packageBase: string): string {
  return `https://${GITLAB_DEFAULTS.ARCH_HOST}/${archPackageProjectPath(packageBase)}`;
}
