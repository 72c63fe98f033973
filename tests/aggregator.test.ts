import { describe, it, expect } from "vitest";
import { MemoryTagCache } from "../src/cache/tag-cache.js";
import { ChangelogAggregator } from "../src/changelog/aggregator.js";
import { TagIndexBuilder } from "../src/changelog/tag-index.js";
import { UpstreamResolver } from "../src/changelog/upstream-resolver.js";
import { ArchLinuxClient } from "../src/services/archlinux.js";
import { GitHubClient } from "../src/services/github.js";
import { GitLabClientPool } from "../src/services/gitlab.js";
import { WebScraper } from "../src/services/web-scraper.js";
import { ToolUnavailableError } from "../src/utils/errors.js";
import {
  createFakeFetch,
  createSilentLogger,
  recordingSleep,
  type FakeReply,
  type FakeRoute,
} from "./helpers.js";

const PACKAGING = "https://gitlab.archlinux.org/archlinux/packaging/packages";

interface World {
  registryUrl?: string;
  pkgbase?: string;
  packagingTags?: string[];
  nvchecker?: string;
  packagingDiff?: string;
  extra?: FakeRoute;
}

function registryReply(name: string, world: World): FakeReply {
  return {
    body: {
      results: [
        {
          pkgname: name,
          pkgbase: world.pkgbase ?? name,
          repo: "extra",
          arch: "x86_64",
          pkgdesc: `${name} description`,
          url: world.registryUrl ?? "https://github.com/owner/foo",
        },
      ],
    },
  };
}

function packagingReply(url: URL, world: World): FakeReply | undefined {
  if (url.pathname.endsWith("/repository/files/.nvchecker.toml/raw")) {
    return world.nvchecker ? { body: world.nvchecker } : undefined;
  }
  if (url.pathname.endsWith("/repository/tags")) {
    return { body: (world.packagingTags ?? ["1.3.0-1", "1.2.0-1"]).map((name) => ({ name })) };
  }
  if (url.pathname.endsWith("/repository/compare")) {
    const from = url.searchParams.get("from");
    const to = url.searchParams.get("to");
    const project = decodeURIComponent(url.pathname.split("/")[4]);
    return {
      body: {
        commits: [{ title: `upgpkg: ${to}`, web_url: `https://gitlab.archlinux.org/${project}/-/commit/${from}` }],
        diffs: world.packagingDiff ? [{ old_path: ".SRCINFO", new_path: ".SRCINFO", diff: world.packagingDiff }] : [],
      },
    };
  }
  return undefined;
}

function githubReply(url: URL): FakeReply | undefined {
  if (url.pathname === "/repos/owner/foo/tags") {
    return { body: [{ name: "v1.3.0" }, { name: "v1.2.0" }] };
  }
  if (url.pathname === "/repos/owner/foo/compare/v1.2.0...v1.3.0") {
    return {
      body: {
        commits: [
          {
            html_url: "https://github.com/owner/foo/commit/aaa",
            commit: { message: "Add feature", author: { date: "2025-02-01T00:00:00Z" } },
          },
        ],
      },
    };
  }
  return undefined;
}

function createAggregator(
  world: World = {},
  getArchitecture: (name: string) => Promise<string | null> = async () => "x86_64",
) {
  const { fetch, calls } = createFakeFetch((url) => {
    const extra = world.extra?.(url);
    if (extra) {
      return extra;
    }
    switch (url.hostname) {
      case "archlinux.org":
        return registryReply(url.searchParams.get("name") ?? "", world);
      case "gitlab.archlinux.org":
        return packagingReply(url, world);
      case "api.github.com":
        return githubReply(url);
      default:
        return undefined;
    }
  });

  const logger = createSilentLogger();
  const options = { logger, fetch, sleep: recordingSleep().sleep };
  const gitlab = new GitLabClientPool(options);
  const github = new GitHubClient(options);
  const scraper = new WebScraper(options);

  const aggregator = new ChangelogAggregator({
    pacman: { getArchitecture },
    registry: new ArchLinuxClient(options),
    gitlab,
    github,
    scraper,
    tagIndex: new TagIndexBuilder({ gitlab, github, cache: new MemoryTagCache(), logger }),
    resolver: new UpstreamResolver({
      gitlab,
      scraper,
      logger,
      kdeCategories: ["plasma", "utilities"],
      sourceSimilarityThreshold: 0.8,
    }),
    logger,
    enabledRepositories: ["core", "extra"],
    fuzzyThreshold: 70,
  });

  return { aggregator, calls, logger };
}

const FOO = { name: "foo", currentVersion: "1.2.0-1", newVersion: "1.3.0-1" };

const PACKAGING_ENTRY = {
  message: "upgpkg: 1.3.0-1",
  url: `${PACKAGING}/foo/-/commit/1.2.0-1`,
  versionTag: "1.3.0-1",
  packageName: "foo",
  releaseType: "arch",
  compareUrl: `${PACKAGING}/foo/-/compare/1.2.0-1...1.3.0-1`,
};

describe("ChangelogAggregator", () => {
  it("merges the packaging and upstream changelog of a major release", async () => {
    const { aggregator } = createAggregator();

    const result = await aggregator.processCandidate(FOO);

    expect(result.state).toBe("Done");
    expect(result.package?.description).toBe("foo description");
    expect(result.entries).toEqual([
      PACKAGING_ENTRY,
      {
        message: "Add feature",
        url: "https://github.com/owner/foo/commit/aaa",
        versionTag: "1.3.0-1",
        packageName: "foo",
        releaseType: "major",
        compareUrl: "https://github.com/owner/foo/compare/v1.2.0...v1.3.0",
      },
    ]);
  });

  it("keeps the packaging changelog when the upstream project cannot be located", async () => {
    const { aggregator } = createAggregator({ registryUrl: "https://kde.org/foo" });

    const result = await aggregator.processCandidate(FOO);

    expect(result.state).toBe("Done");
    expect(result.entries).toEqual([PACKAGING_ENTRY]);
  });

  it("prefers the upstream URL from the nvchecker configuration", async () => {
    const { aggregator } = createAggregator({
      registryUrl: "https://foo.example.org/",
      nvchecker: '[foo]\nsource = "github"\ngithub = "owner/foo"\n',
    });

    const result = await aggregator.processCandidate(FOO);

    expect(result.entries.map((entry) => entry.releaseType)).toEqual(["arch", "major"]);
  });

  it("reads the upstream repository from the recipe for other hosts", async () => {
    const kmodLog =
      '<table><tr><td><span title="2025-03-02">1 day</span></td>' +
      '<td><a href="/pub/scm/utils/kernel/kmod/kmod.git/commit/?id=bbb">kmod 35</a>' +
      ' <a class="tag-deco" href="/t">v35</a></td></tr>' +
      '<tr><td><span title="2025-03-01">2 days</span></td>' +
      '<td><a href="/pub/scm/utils/kernel/kmod/kmod.git/commit/?id=aaa">kmod 34.1</a>' +
      ' <a class="tag-deco" href="/t">v34.1</a></td></tr></table>';

    const { aggregator, calls } = createAggregator({
      registryUrl: "https://www.kernel.org/",
      packagingTags: ["35-1", "34.1-1"],
      packagingDiff: [
        "@@ -1,4 +1,4 @@",
        "-\tpkgver = 34.1",
        "+\tpkgver = 35",
        "-\tsource = git+https://git.kernel.org/pub/scm/utils/kernel/kmod/kmod.git#tag=v34.1?signed",
        "+\tsource = git+https://git.kernel.org/pub/scm/utils/kernel/kmod/kmod.git#tag=v35?signed",
      ].join("\n"),
      extra: (url) => (url.hostname === "git.kernel.org" ? { body: kmodLog } : undefined),
    });

    const result = await aggregator.processCandidate({
      name: "kmod",
      currentVersion: "34.1-1",
      newVersion: "35-1",
    });

    const logUrl = "https://git.kernel.org/pub/scm/utils/kernel/kmod/kmod.git/log/?id=v35&id2=v34.1";
    expect(calls).toContain(logUrl);
    expect(result.entries.at(-1)).toEqual({
      message: "kmod 35",
      url: "https://git.kernel.org/pub/scm/utils/kernel/kmod/kmod.git/commit/?id=bbb",
      versionTag: "35-1",
      packageName: "kmod",
      releaseType: "major",
      compareUrl: logUrl,
    });
    expect(result.entries).toHaveLength(2);
  });

  it("walks intermediate packaging releases", async () => {
    const { aggregator } = createAggregator({
      registryUrl: "https://foo.example.org/",
      packagingTags: ["1.3.0-1", "1.2.0-2", "1.2.0-1"],
    });

    const result = await aggregator.processCandidate(FOO);

    expect(result.entries.map((entry) => [entry.releaseType, entry.versionTag, entry.message])).toEqual([
      ["minor", "1.2.0-2", "upgpkg: 1.2.0-2"],
      ["arch", "1.3.0-1", "upgpkg: 1.3.0-1"],
    ]);
  });

  it("fails packages the registry does not know", async () => {
    const { aggregator } = createAggregator({
      extra: (url) => (url.hostname === "archlinux.org" ? { body: { results: [] } } : undefined),
    });

    const result = await aggregator.processCandidate(FOO);

    expect(result).toMatchObject({
      state: "Failed",
      failedAt: "ResolveRepository",
      error: "not found in the enabled repositories (core, extra)",
      entries: [],
    });
  });

  it("fails packages without an architecture", async () => {
    const { aggregator } = createAggregator({}, async () => null);

    const result = await aggregator.processCandidate(FOO);

    expect(result.error).toBe("couldn't determine the package architecture");
  });

  it("fails packages without packaging tags", async () => {
    const { aggregator } = createAggregator({ packagingTags: [] });

    const result = await aggregator.processCandidate(FOO);

    expect(result).toMatchObject({ state: "Failed", failedAt: "BuildTagIndex" });
  });

  it("fails candidates with malformed versions without a request", async () => {
    const { aggregator, calls } = createAggregator();

    const result = await aggregator.processCandidate({ name: "foo", currentVersion: "1.2", newVersion: "1.3" });

    expect(result).toMatchObject({ state: "Failed", package: null });
    expect(calls).toEqual([]);
  });

  it("processes every candidate in order", async () => {
    const { aggregator } = createAggregator();

    const results = await aggregator.run([FOO, { name: "bar", currentVersion: "1.0", newVersion: "1.1" }]);

    expect(results.map((result) => [result.name, result.state])).toEqual([
      ["foo", "Done"],
      ["bar", "Failed"],
    ]);
  });

  it("aborts when pacman is missing", async () => {
    const { aggregator } = createAggregator({}, async () => {
      throw new ToolUnavailableError("pacman", "Command 'pacman' is not available.");
    });

    await expect(aggregator.processCandidate(FOO)).rejects.toBeInstanceOf(ToolUnavailableError);
  });
});
