import {
  archPackageProjectPath,
  type GitLabClientPool,
  type GitLabDiff,
} from "../services/gitlab.js";
import { WebScraper } from "../services/web-scraper.js";
import type { UpstreamTarget } from "../types/index.js";
import { similarityRatio } from "../utils/fuzzy-tag.js";
import type { Logger } from "../utils/logger.js";
import {
  extractBaseGitUrl,
  extractSourceTag,
  isGitLabUrl,
  KDE_INVENT_HOST,
  parseGitHubUrl,
  parseGitLabUrl,
} from "../utils/upstream-url.js";
import type { Hop } from "./tag-walker.js";

type KdeTarget = Extract<UpstreamTarget, { kind: "kde" }>;

/** Repository whose commits can be listed: an API target or a cgit web UI. */
export type UpstreamRepository =
  | Exclude<UpstreamTarget, { kind: "generic-diff" }>
  | { kind: "cgit"; url: string };

/** Upstream repository and exact tags declared by the recipe at both ends of a hop. */
export interface RecipeSource {
  repository: UpstreamRepository;
  oldTag: string;
  newTag: string;
}

export interface UpstreamResolverOptions {
  gitlab: GitLabClientPool;
  scraper: WebScraper;
  logger: Logger;
  kdeCategories: readonly string[];
  /** Minimum similarity of the old and new recipe source URLs, in [0, 1] */
  sourceSimilarityThreshold: number;
}

const RECIPE_FILES = [".SRCINFO", "PKGBUILD"];
const SOURCE_LINE_PATTERN = /^([-+])\s*source(?:_[\w]+)?\s*=.*https:\/\//;
const KDE_APPS_URL = "https://apps.kde.org";

/**
 * Source URL lines removed (`-`) and added (`+`) by a unified diff.
 */
export function extractSourceLines(diff: string): { removed: string[]; added: string[] } {
  const removed: string[] = [];
  const added: string[] = [];

  for (const line of diff.split("\n")) {
    if (line.startsWith("---") || line.startsWith("+++")) {
      continue;
    }
    const match = line.match(SOURCE_LINE_PATTERN);
    if (match) {
      (match[1] === "-" ? removed : added).push(line);
    }
  }

  return { removed, added };
}

function repositoryFromBaseUrl(baseUrl: string, rawLine: string): UpstreamRepository {
  const github = parseGitHubUrl(baseUrl);
  if (github) {
    return github;
  }
  if (isGitLabUrl(baseUrl)) {
    const gitlab = parseGitLabUrl(baseUrl);
    if (gitlab) {
      return gitlab;
    }
  }
  // cgit serves the repository under the name the recipe uses, usually with `.git`
  return { kind: "cgit", url: rawLine.includes(`${baseUrl}.git`) ? `${baseUrl}.git` : baseUrl };
}

export class UpstreamResolver {
  constructor(private readonly options: UpstreamResolverOptions) {}

  /**
   * Map an upstream URL to the platform holding the project. `generic-diff`
   * means the repository can only be learned from the recipe, per hop.
   * Returns null when a KDE project cannot be located.
   */
  async resolve(upstreamUrl: string, repoName: string): Promise<UpstreamTarget | null> {
    const { logger } = this.options;

    if (isGitLabUrl(upstreamUrl)) {
      const target = parseGitLabUrl(upstreamUrl);
      if (!target) {
        logger.error(`No GitLab project information found in ${upstreamUrl}`);
      }
      return target;
    }

    if (upstreamUrl.includes("github.com")) {
      const target = parseGitHubUrl(upstreamUrl);
      if (target) {
        return target;
      }
    }

    if (upstreamUrl.includes("kde.org")) {
      return this.resolveKdeProject(upstreamUrl, repoName);
    }

    return { kind: "generic-diff" };
  }

  /**
   * Locate a KDE project on invent.kde.org: a category named in the URL, then
   * probing every category, then the category listed on apps.kde.org.
   */
  async resolveKdeProject(upstreamUrl: string, repo: string): Promise<KdeTarget | null> {
    const { gitlab, logger, kdeCategories } = this.options;
    const lowerUrl = upstreamUrl.toLowerCase();

    const named = kdeCategories.find((category) => lowerUrl.includes(category.toLowerCase()));
    if (named) {
      logger.debug(`KDE category from URL: ${named}`);
      return { kind: "kde", category: named, repo };
    }

    const invent = gitlab.forHost(KDE_INVENT_HOST);
    for (const category of kdeCategories) {
      if (await invent.projectExists(`${category}/${repo}`)) {
        logger.debug(`KDE project found: ${invent.webUrl(`${category}/${repo}`)}`);
        return { kind: "kde", category, repo };
      }
    }

    const pageUrl = `${KDE_APPS_URL}/${repo}/`;
    const html = await this.options.scraper.fetchPage(pageUrl);
    if (html) {
      const link = WebScraper.findLink(html, pageUrl, /\/categories\/.+/);
      if (link) {
        const label = `${link.text} ${link.href}`.toLowerCase();
        const category = kdeCategories.find((name) => label.includes(name.toLowerCase()));
        if (category) {
          logger.debug(`KDE category from ${pageUrl}: ${category}`);
          return { kind: "kde", category, repo };
        }
        logger.error(`Unknown KDE category "${link.text}" on ${pageUrl}`);
      }
    }

    logger.error(`Couldn't locate the KDE project for ${repo} (${upstreamUrl})`);
    return null;
  }

  /**
   * Upstream repository and tags from the source lines the recipe changed
   * between the two packaging tags of a hop. `diffs` skips the compare request
   * when the caller already holds the packaging diff.
   */
  async resolveFromRecipeDiff(
    packageBase: string,
    hop: Hop,
    diffs?: readonly GitLabDiff[],
  ): Promise<RecipeSource | null> {
    const { logger, sourceSimilarityThreshold } = this.options;

    const changes = diffs ?? (await this.fetchRecipeDiffs(packageBase, hop));
    if (!changes) {
      return null;
    }

    const recipeDiff = RECIPE_FILES.map((file) =>
      changes.find((diff) => diff.new_path === file),
    ).find((diff) => diff !== undefined);
    if (!recipeDiff) {
      logger.debug(`${packageBase}: recipe unchanged between ${hop.from} and ${hop.to}`);
      return null;
    }

    const { removed, added } = extractSourceLines(recipeDiff.diff);
    if (removed.length === 0 || added.length === 0) {
      logger.debug(`${packageBase}: no changed source URL between ${hop.from} and ${hop.to}`);
      return null;
    }

    const [oldLine] = removed;
    const [newLine] = added;
    const oldUrl = extractBaseGitUrl(oldLine);
    const newUrl = extractBaseGitUrl(newLine);
    const oldTag = extractSourceTag(oldLine);
    const newTag = extractSourceTag(newLine);

    logger.debug(`${packageBase}: source URL old ${oldUrl ?? "-"} tag ${oldTag ?? "-"}`);
    logger.debug(`${packageBase}: source URL new ${newUrl ?? "-"} tag ${newTag ?? "-"}`);

    if (!oldUrl || !newUrl || !oldTag || !newTag) {
      return null;
    }

    const similarity = similarityRatio(oldUrl, newUrl);
    if (similarity < sourceSimilarityThreshold) {
      logger.warn(
        `${packageBase}: source moved from ${oldUrl} to ${newUrl} (similarity ${similarity.toFixed(2)}); skipping upstream changelog`,
      );
      return null;
    }

    return { repository: repositoryFromBaseUrl(newUrl, newLine), oldTag, newTag };
  }

  private async fetchRecipeDiffs(packageBase: string, hop: Hop): Promise<GitLabDiff[] | null> {
    const result = await this.options.gitlab
      .arch()
      .compare(archPackageProjectPath(packageBase), hop.from, hop.to);
    return result.ok ? result.data.diffs : null;
  }
}
