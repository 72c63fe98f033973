#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { MemoryTagCache, RedisTagCache } from "./cache/tag-cache.js";
import { ChangelogAggregator, type PackageResult } from "./changelog/aggregator.js";
import { TagIndexBuilder } from "./changelog/tag-index.js";
import { UpstreamResolver } from "./changelog/upstream-resolver.js";
import { changelogFilePath, writeChangelog } from "./changelog/writer.js";
import { enabledRepositories, loadConfig, type AppConfig } from "./config/index.js";
import { recordRunMetrics } from "./db/metrics.js";
import { getRedis } from "./db/redis.js";
import { ArchLinuxClient } from "./services/archlinux.js";
import { GitHubClient } from "./services/github.js";
import { GitLabClientPool } from "./services/gitlab.js";
import { PacmanService } from "./services/pacman.js";
import { WebScraper } from "./services/web-scraper.js";
import type { UpgradeCandidate } from "./types/index.js";
import { createLogger, logger } from "./utils/logger.js";
import { formatCandidates, parseSelection } from "./utils/selection.js";

const SEPARATOR = "--------------------";

async function promptSelection(candidates: UpgradeCandidate[]): Promise<UpgradeCandidate[]> {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const answer = await prompt.question(
        "Enter package indices (comma separated), or 0 to select all: ",
      );
      const indices = parseSelection(answer, candidates.length);
      if (indices) {
        return indices.map((index) => candidates[index]);
      }
      logger.info("Invalid input. Please enter valid package indices.");
    }
  } finally {
    prompt.close();
  }
}

function createAggregator(config: AppConfig, pacman: PacmanService): ChangelogAggregator {
  const clientOptions = {
    maxAttempts: config.maxAttempts,
    backoffFactor: config.backoffFactor,
    timeoutMs: config.requestTimeoutMs,
  };

  const gitlab = new GitLabClientPool({ ...clientOptions, logger: createLogger("gitlab") });
  const github = new GitHubClient({
    ...clientOptions,
    logger: createLogger("github"),
    token: config.githubToken,
  });
  const scraper = new WebScraper({
    ...clientOptions,
    logger: createLogger("web"),
    requestDelayMs: config.webscraperDelayMs,
  });

  const redis = getRedis(config);
  const cacheLogger = createLogger("cache");
  const cache = redis ? new RedisTagCache(redis, cacheLogger) : new MemoryTagCache();

  const engineLogger = createLogger("changelog");

  return new ChangelogAggregator({
    pacman,
    registry: new ArchLinuxClient({ ...clientOptions, logger: createLogger("archlinux") }),
    gitlab,
    github,
    scraper,
    tagIndex: new TagIndexBuilder({ gitlab, github, cache, logger: engineLogger }),
    resolver: new UpstreamResolver({
      gitlab,
      scraper,
      logger: engineLogger,
      kdeCategories: config.kdeCategories,
      sourceSimilarityThreshold: config.sourceSimilarityThreshold,
    }),
    logger: engineLogger,
    enabledRepositories: enabledRepositories(config.archRepositories),
    fuzzyThreshold: config.fuzzyThreshold,
  });
}

function printResult(result: PackageResult): void {
  if (result.entries.length === 0) {
    logger.info(`No changelog for package ${result.name} found.`);
  } else {
    logger.info(`Changelog ${result.name}:`);
    for (const entry of result.entries) {
      logger.info(`- ${entry.message}`);
      logger.info(`\t${entry.url}`);
    }
  }
  logger.info(SEPARATOR);
}

async function main(): Promise<void> {
  // Validate environment variables and settings at startup
  const config = loadConfig();
  const selectAll = process.argv.slice(2).includes("--all");

  logger.info("Arch package changelog");
  logger.info(SEPARATOR);

  const pacman = new PacmanService(createLogger("pacman"), config.architectureWording);
  const candidates = await pacman.getUpgradablePackages();
  if (candidates.length === 0) {
    logger.info("No packages to upgrade");
    return;
  }

  logger.info(`Upgradable packages (${candidates.length}):`);
  for (const line of formatCandidates(candidates)) {
    logger.info(line);
  }
  logger.info(SEPARATOR);

  const selected = selectAll ? candidates : await promptSelection(candidates);

  const aggregator = createAggregator(config, pacman);
  const outputPath = changelogFilePath(config.changelogDir);
  logger.info(`Changelog file: ${outputPath}`);

  let skipped = 0;
  let entries = 0;

  for (const candidate of selected) {
    const result = await aggregator.processCandidate(candidate);
    if (result.state === "Failed") {
      skipped++;
    }
    entries += result.entries.length;

    if (result.package) {
      await writeChangelog(outputPath, result.package, result.entries);
    }
    printResult(result);
  }

  const redis = getRedis(config);
  if (redis) {
    await recordRunMetrics(redis, { processed: selected.length, skipped, entries }, logger);
  }

  logger.info(`Done: ${selected.length} package(s), ${skipped} skipped, ${entries} changelog entries`);
}

main().catch((error) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
