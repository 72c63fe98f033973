import { tagCacheKey, type TagCache } from "../cache/tag-cache.js";
import type { GitHubClient } from "../services/github.js";
import {
  archPackageProjectPath,
  GITLAB_DEFAULTS,
  type GitLabClientPool,
} from "../services/gitlab.js";
import type { FetchResult } from "../services/http-client.js";
import type { TagIndex, UpstreamTarget } from "../types/index.js";
import type { Logger } from "../utils/logger.js";
import { gitLabHost, KDE_INVENT_HOST } from "../utils/upstream-url.js";
import { normalizeEpoch } from "../utils/version.js";

/** A project whose tags can be listed: the packaging recipe or an upstream repository. */
export type TagSource =
  | { kind: "arch"; packageBase: string }
  | Exclude<UpstreamTarget, { kind: "generic-diff" }>;

export interface TagIndexBuilderDeps {
  gitlab: GitLabClientPool;
  github: GitHubClient;
  cache: TagCache;
  logger: Logger;
}

function describe(source: TagSource): { host: string; project: string } {
  switch (source.kind) {
    case "arch":
      return { host: GITLAB_DEFAULTS.ARCH_HOST, project: archPackageProjectPath(source.packageBase) };
    case "gitlab":
      return { host: gitLabHost(source), project: `${source.projectPath}/${source.repo}` };
    case "kde":
      return { host: KDE_INVENT_HOST, project: `${source.category}/${source.repo}` };
    case "github":
      return { host: "github.com", project: `${source.owner}/${source.repo}` };
  }
}

export interface GetTagsOptions {
  /**
   * Whether a cached index is still current, e.g. because it lists the
   * versions being compared. A cached index failing the check is fetched again.
   */
  isCurrent?: (tags: TagIndex) => boolean;
}

/** Accepts an index listing every one of `tags`. */
export function listsTags(...tags: string[]): (index: TagIndex) => boolean {
  return (index) => tags.every((tag) => index.some((info) => info.tag === tag));
}

export class TagIndexBuilder {
  constructor(private readonly deps: TagIndexBuilderDeps) {}

  /**
   * All tags of a project, newest first, with epoch colons rewritten to dashes.
   * Returns null when the platform reports no tags or the request fails.
   */
  async getTags(source: TagSource, options: GetTagsOptions = {}): Promise<TagIndex | null> {
    const { host, project } = describe(source);
    const key = tagCacheKey(host, project);

    const cached = await this.deps.cache.get(key);
    if (cached && cached.length > 0) {
      if (!options.isCurrent || options.isCurrent(cached)) {
        return cached;
      }
      this.deps.logger.debug(`Cached tags of ${host}/${project} are outdated, fetching again`);
    }

    const result = await this.fetch(source, host, project);
    if (!result.ok) {
      this.deps.logger.error(`No tags fetched for ${host}/${project}: ${result.error.message}`);
      return null;
    }

    if (result.data.length === 0) {
      this.deps.logger.warn(`No tags found for ${host}/${project}`);
      return null;
    }

    const tags = result.data.map((info) => ({ ...info, tag: normalizeEpoch(info.tag) }));
    for (const info of tags) {
      this.deps.logger.debug(`Tag ${info.tag} created ${info.createdAt || "-"}`);
    }

    await this.deps.cache.set(key, tags);
    return tags;
  }

  private fetch(source: TagSource, host: string, project: string): Promise<FetchResult<TagIndex>> {
    if (source.kind === "github") {
      return this.deps.github.getTags(source.owner, source.repo);
    }
    return this.deps.gitlab.forHost(host).getTags(project);
  }
}
