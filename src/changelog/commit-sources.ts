import type { GitHubClient } from "../services/github.js";
import {
  archPackageProjectPath,
  archPackageWebUrl,
  type GitLabClientPool,
  type GitLabCompare,
} from "../services/gitlab.js";
import type { FetchResult } from "../services/http-client.js";
import { WebScraper } from "../services/web-scraper.js";
import type {
  ChangelogEntry,
  CommitInfo,
  PackageVersionInfo,
  ReleaseType,
  TagIndex,
  UpstreamTarget,
} from "../types/index.js";
import { closestTag, normalizeTagForMatching } from "../utils/fuzzy-tag.js";
import type { Logger } from "../utils/logger.js";
import { gitLabHost, KDE_INVENT_HOST, targetWebUrl } from "../utils/upstream-url.js";
import { splitVersionTag } from "../utils/version.js";
import type { TagIndexBuilder } from "./tag-index.js";
import type { Hop, HopComparer } from "./tag-walker.js";
import type { UpstreamRepository, UpstreamResolver } from "./upstream-resolver.js";

export interface ChangelogSourcesDeps {
  gitlab: GitLabClientPool;
  github: GitHubClient;
  scraper: WebScraper;
  tagIndex: TagIndexBuilder;
  resolver: UpstreamResolver;
  logger: Logger;
  fuzzyThreshold: number;
}

/**
 * Web page comparing two tags of a repository.
 *
 * @example
 * compareUrl({ kind: "github", owner: "torvalds", repo: "linux" }, "v6.8", "v6.9")
 * // "https://github.com/torvalds/linux/compare/v6.8...v6.9"
 */
export function compareUrl(repository: UpstreamRepository, from: string, to: string): string {
  switch (repository.kind) {
    case "github":
      return `${targetWebUrl(repository)}/compare/${from}...${to}`;
    case "gitlab":
    case "kde":
      return `${targetWebUrl(repository)}/-/compare/${from}...${to}`;
    case "cgit":
      return `${repository.url}/log/?id=${to}&id2=${from}`;
  }
}

export function packagingCompareUrl(packageBase: string, from: string, to: string): string {
  return `${archPackageWebUrl(packageBase)}/-/compare/${from}...${to}`;
}

/** KDE tags carry the upstream version with a `v` prefix and no epoch. */
export function kdeTag(packagingTag: string): string {
  return `v${splitVersionTag(packagingTag).main}`;
}

/** Whether upstream lists `tag` under some spelling, e.g. `v1.3.0` for `1.3.0-1`. */
function hasEquivalentTag(tag: string, index: TagIndex): boolean {
  const normalized = normalizeTagForMatching(tag);
  return index.some((info) => normalizeTagForMatching(info.tag) === normalized);
}

/**
 * Fetches the packaging and upstream commits of each hop of one package.
 */
export class ChangelogSources implements HopComparer {
  private readonly packagingCompares = new Map<string, Promise<FetchResult<GitLabCompare>>>();
  private readonly packageBase: string;

  constructor(
    private readonly deps: ChangelogSourcesDeps,
    private readonly pkg: PackageVersionInfo,
    /** Null when the upstream project could not be located */
    private readonly target: UpstreamTarget | null,
  ) {
    this.packageBase = pkg.base ?? pkg.name;
  }

  async packaging(hop: Hop, releaseType: "minor" | "arch"): Promise<ChangelogEntry[]> {
    const result = await this.comparePackaging(hop);
    if (!result.ok) {
      return [];
    }

    return this.toEntries(
      result.data.commits,
      hop.to,
      releaseType,
      packagingCompareUrl(this.packageBase, hop.from, hop.to),
    );
  }

  async upstream(hop: Hop): Promise<ChangelogEntry[]> {
    const { logger, resolver } = this.deps;
    const target = this.target;

    if (!target) {
      logger.info(`${this.pkg.name}: upstream project unknown, packaging changelog only`);
      return [];
    }

    if (target.kind === "generic-diff") {
      const packaging = await this.comparePackaging(hop);
      if (!packaging.ok) {
        return [];
      }

      const source = await resolver.resolveFromRecipeDiff(
        this.packageBase,
        hop,
        packaging.data.diffs,
      );
      if (!source) {
        logger.info(
          `${this.pkg.name}: no upstream source found in the recipe between ${hop.from} and ${hop.to}`,
        );
        return [];
      }
      return this.compareUpstream(source.repository, source.oldTag, source.newTag, hop.to);
    }

    if (target.kind === "kde") {
      return this.compareUpstream(target, kdeTag(hop.from), kdeTag(hop.to), hop.to);
    }

    return this.compareUpstream(target, hop.from, hop.to, hop.to);
  }

  private comparePackaging(hop: Hop): Promise<FetchResult<GitLabCompare>> {
    const key = `${hop.from}...${hop.to}`;
    let pending = this.packagingCompares.get(key);
    if (!pending) {
      pending = this.deps.gitlab
        .arch()
        .compare(archPackageProjectPath(this.packageBase), hop.from, hop.to);
      this.packagingCompares.set(key, pending);
    }
    return pending;
  }

  private async compareUpstream(
    repository: UpstreamRepository,
    from: string,
    to: string,
    versionTag: string,
  ): Promise<ChangelogEntry[]> {
    if (repository.kind === "cgit") {
      return this.compareCgit(repository.url, from, to, versionTag);
    }

    const { logger } = this.deps;
    const tags = await this.deps.tagIndex.getTags(repository, {
      isCurrent: (index) => [from, to].every((tag) => hasEquivalentTag(tag, index)),
    });
    const names = tags?.map((info) => info.tag) ?? [];

    const upstreamFrom = this.alignTag(from, names);
    const upstreamTo = this.alignTag(to, names);
    if (!upstreamFrom || !upstreamTo) {
      return [];
    }
    if (upstreamFrom === upstreamTo) {
      logger.debug(`${this.pkg.name}: ${from} and ${to} map to the same upstream tag ${upstreamTo}`);
      return [];
    }

    const url = compareUrl(repository, upstreamFrom, upstreamTo);
    logger.debug(`${this.pkg.name}: compare tags URL ${url}`);

    const result =
      repository.kind === "github"
        ? await this.deps.github.compare(repository.owner, repository.repo, upstreamFrom, upstreamTo)
        : await this.compareGitLab(repository, upstreamFrom, upstreamTo);

    if (!result.ok) {
      return [];
    }
    return this.toEntries(result.data, versionTag, "major", url);
  }

  private async compareGitLab(
    repository: Extract<UpstreamTarget, { kind: "gitlab" | "kde" }>,
    from: string,
    to: string,
  ): Promise<FetchResult<CommitInfo[]>> {
    const { host, project } =
      repository.kind === "kde"
        ? { host: KDE_INVENT_HOST, project: `${repository.category}/${repository.repo}` }
        : { host: gitLabHost(repository), project: `${repository.projectPath}/${repository.repo}` };

    const result = await this.deps.gitlab.forHost(host).compare(project, from, to);
    return result.ok ? { ok: true, data: result.data.commits, headers: result.headers } : result;
  }

  private async compareCgit(
    url: string,
    from: string,
    to: string,
    versionTag: string,
  ): Promise<ChangelogEntry[]> {
    const pageUrl = compareUrl({ kind: "cgit", url }, from, to);
    const html = await this.deps.scraper.fetchPage(pageUrl);
    if (!html) {
      this.deps.logger.debug(`${this.pkg.name}: no response from ${pageUrl}`);
      return [];
    }

    const commits = WebScraper.extractCgitCommits(html, pageUrl, to, from);
    if (commits.length === 0) {
      this.deps.logger.debug(`${this.pkg.name}: no commits found on ${pageUrl}`);
    }
    return this.toEntries(commits, versionTag, "major", pageUrl);
  }

  /**
   * Upstream spelling of a tag: the tag itself when upstream has it, the
   * closest upstream tag otherwise. Without an upstream tag list the tag is
   * used as is.
   */
  private alignTag(tag: string, upstreamTags: readonly string[]): string | null {
    if (upstreamTags.length === 0 || upstreamTags.includes(tag)) {
      return tag;
    }

    const closest = closestTag(tag, upstreamTags, this.deps.fuzzyThreshold);
    if (closest) {
      this.deps.logger.debug(`${this.pkg.name}: similar upstream tag for ${tag}: ${closest}`);
    } else {
      this.deps.logger.warn(`${this.pkg.name}: no upstream tag matches ${tag}`);
    }
    return closest;
  }

  private toEntries(
    commits: readonly CommitInfo[],
    versionTag: string,
    releaseType: ReleaseType,
    url: string,
  ): ChangelogEntry[] {
    return commits.map((commit) => ({
      message: commit.title,
      url: commit.url,
      versionTag,
      packageName: this.pkg.name,
      releaseType,
      compareUrl: url,
    }));
  }
}
