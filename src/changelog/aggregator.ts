import type { ArchLinuxClient } from "../services/archlinux.js";
import { archPackageProjectPath, archPackageWebUrl } from "../services/gitlab.js";
import type { PacmanService } from "../services/pacman.js";
import type { ChangelogEntry, PackageVersionInfo, UpgradeCandidate } from "../types/index.js";
import { errorMessage, PackageSkipError, ToolUnavailableError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { extractUpstreamUrlFromNvchecker, parseNvchecker } from "../utils/upstream-url.js";
import { createPackageVersionInfo, withRegistryInfo } from "../utils/version.js";
import { ChangelogSources, type ChangelogSourcesDeps } from "./commit-sources.js";
import { listsTags } from "./tag-index.js";
import { findIntermediateTags, walk } from "./tag-walker.js";

export type AggregatorState =
  | "ResolveRepository"
  | "ResolveUpstream"
  | "BuildTagIndex"
  | "NoIntermediate"
  | "WalkIntermediate"
  | "Done"
  | "Failed";

export interface PackageResult {
  name: string;
  /** Null when the candidate's versions could not be parsed */
  package: PackageVersionInfo | null;
  /** Whatever was collected before a failure */
  entries: ChangelogEntry[];
  state: "Done" | "Failed";
  /** State in which processing stopped, for failed packages */
  failedAt?: AggregatorState;
  error?: string;
}

export interface AggregatorDeps extends ChangelogSourcesDeps {
  pacman: Pick<PacmanService, "getArchitecture">;
  registry: Pick<ArchLinuxClient, "lookup">;
  enabledRepositories: readonly string[];
}

const NVCHECKER_FILE = ".nvchecker.toml";

/**
 * Builds the changelog of each package: packaging repository, upstream
 * project, packaging tags, then one comparison per hop between the installed
 * and the new version.
 */
export class ChangelogAggregator {
  constructor(private readonly deps: AggregatorDeps) {}

  /** Packages are processed one after another. */
  async run(candidates: readonly UpgradeCandidate[]): Promise<PackageResult[]> {
    const results: PackageResult[] = [];
    for (const candidate of candidates) {
      results.push(await this.processCandidate(candidate));
    }
    return results;
  }

  /**
   * @throws ToolUnavailableError when pacman cannot be run
   */
  async processCandidate(candidate: UpgradeCandidate): Promise<PackageResult> {
    let pkg: PackageVersionInfo;
    try {
      pkg = createPackageVersionInfo(candidate);
    } catch (error) {
      const message = errorMessage(error);
      this.deps.logger.error(`${candidate.name}: skipped: ${message}`);
      return {
        name: candidate.name,
        package: null,
        entries: [],
        state: "Failed",
        failedAt: "ResolveRepository",
        error: message,
      };
    }
    return this.processPackage(pkg);
  }

  /**
   * @throws ToolUnavailableError when pacman cannot be run
   */
  async processPackage(initial: PackageVersionInfo): Promise<PackageResult> {
    const { logger } = this.deps;
    let state: AggregatorState = "ResolveRepository";
    let pkg = initial;
    const entries: ChangelogEntry[] = [];

    const fail = (message: string): PackageResult => {
      logger.error(`${pkg.name}: skipped: ${message}`);
      return {
        name: pkg.name,
        package: pkg,
        entries,
        state: "Failed",
        failedAt: state,
        error: message,
      };
    };

    try {
      const architecture = await this.deps.pacman.getArchitecture(pkg.name);
      if (!architecture) {
        throw new PackageSkipError(pkg.name, "couldn't determine the package architecture");
      }

      const lookup = await this.deps.registry.lookup(
        pkg.name,
        architecture,
        this.deps.enabledRepositories,
      );
      if (!lookup.found) {
        throw new PackageSkipError(pkg.name, lookup.reason);
      }

      pkg = withRegistryInfo(pkg, lookup.package);
      const packageBase = pkg.base ?? pkg.name;
      logger.info(`${pkg.name}: packaging repository ${archPackageWebUrl(packageBase)}`);

      state = "ResolveUpstream";
      const upstreamUrl = (await this.nvcheckerUpstreamUrl(packageBase)) ?? pkg.upstreamUrl;
      logger.debug(`${pkg.name}: upstream URL ${upstreamUrl || "-"}`);
      const target = await this.deps.resolver.resolve(upstreamUrl, packageBase);

      state = "BuildTagIndex";
      const tags = await this.deps.tagIndex.getTags(
        { kind: "arch", packageBase },
        { isCurrent: listsTags(pkg.currentVersionNormalized, pkg.newVersionNormalized) },
      );
      if (!tags) {
        throw new PackageSkipError(pkg.name, "couldn't find any packaging tags");
      }

      const intermediate =
        findIntermediateTags(tags, pkg.currentVersion, pkg.newVersion, logger) ?? [];

      if (intermediate.length > 0) {
        state = "WalkIntermediate";
        logger.info(
          `${pkg.name}: intermediate tags ${intermediate.map((info) => info.tag).join(", ")}`,
        );
      } else {
        state = "NoIntermediate";
        logger.info(`${pkg.name}: no intermediate tags found`);
      }

      const sources = new ChangelogSources(this.deps, pkg, target);
      entries.push(...(await walk(intermediate, pkg, sources, logger)));

      return { name: pkg.name, package: pkg, entries, state: "Done" };
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        throw error;
      }
      return fail(error instanceof PackageSkipError ? error.reason : errorMessage(error));
    }
  }

  /**
   * Upstream URL from the recipe's nvchecker configuration, which points at
   * the code host more often than the registry's project homepage.
   */
  private async nvcheckerUpstreamUrl(packageBase: string): Promise<string | null> {
    const { gitlab, logger } = this.deps;

    const content = await gitlab
      .arch()
      .getFileContent(archPackageProjectPath(packageBase), NVCHECKER_FILE);
    if (!content) {
      logger.debug(`${packageBase}: no ${NVCHECKER_FILE} in the packaging repository`);
      return null;
    }

    let parsed: Record<string, unknown>;
    try {
      parsed = parseNvchecker(content);
    } catch (error) {
      logger.warn(`${packageBase}: invalid ${NVCHECKER_FILE}: ${errorMessage(error)}`);
      return null;
    }

    const url = extractUpstreamUrlFromNvchecker(parsed, packageBase);
    if (!url) {
      logger.debug(`${packageBase}: no URL in ${NVCHECKER_FILE}`);
    }
    return url;
  }
}
