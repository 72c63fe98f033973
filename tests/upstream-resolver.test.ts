import { describe, it, expect } from "vitest";
import { UpstreamResolver, extractSourceLines } from "../src/changelog/upstream-resolver.js";
import { GitLabClientPool, type GitLabDiff } from "../src/services/gitlab.js";
import { WebScraper } from "../src/services/web-scraper.js";
import { createFakeFetch, createSilentLogger, recordingSleep, type FakeRoute } from "./helpers.js";

const HOP = { from: "34.1-1", to: "35-1" };

function createResolver(route: FakeRoute = () => undefined) {
  const { fetch, calls } = createFakeFetch(route);
  const logger = createSilentLogger();
  const options = { logger, fetch, sleep: recordingSleep().sleep };
  const resolver = new UpstreamResolver({
    gitlab: new GitLabClientPool(options),
    scraper: new WebScraper(options),
    logger,
    kdeCategories: ["plasma", "frameworks", "utilities"],
    sourceSimilarityThreshold: 0.8,
  });
  return { resolver, calls, logger };
}

function srcinfo(diff: string[]): GitLabDiff[] {
  return [
    { old_path: "PKGBUILD", new_path: "PKGBUILD", diff: "-pkgver=34.1\n+pkgver=35\n" },
    { old_path: ".SRCINFO", new_path: ".SRCINFO", diff: diff.join("\n") },
  ];
}

describe("UpstreamResolver.resolve", () => {
  it("recognizes GitHub and GitLab projects", async () => {
    const { resolver } = createResolver();

    expect(await resolver.resolve("https://github.com/owner/foo", "foo")).toEqual({
      kind: "github",
      owner: "owner",
      repo: "foo",
    });
    expect(await resolver.resolve("https://gitlab.gnome.org/GNOME/mutter", "mutter")).toEqual({
      kind: "gitlab",
      subdomain: "gnome",
      tld: "org",
      projectPath: "GNOME",
      repo: "mutter",
    });
    expect(await resolver.resolve("https://invent.kde.org/plasma/kwin", "kwin")).toEqual({
      kind: "kde",
      category: "plasma",
      repo: "kwin",
    });
  });

  it("falls back to the recipe diff for other hosts", async () => {
    const { resolver, calls } = createResolver();

    expect(await resolver.resolve("https://www.kernel.org/", "kmod")).toEqual({ kind: "generic-diff" });
    expect(calls).toEqual([]);
  });

  it("takes the KDE category from the URL", async () => {
    const { resolver, calls } = createResolver();

    expect(await resolver.resolve("https://kde.org/plasma-desktop/", "plasma-desktop")).toEqual({
      kind: "kde",
      category: "plasma",
      repo: "plasma-desktop",
    });
    expect(calls).toEqual([]);
  });

  it("probes invent.kde.org categories in order", async () => {
    const { resolver, calls } = createResolver((url) =>
      url.pathname === "/api/v4/projects/utilities%2Fkate" ? { body: { id: 7 } } : undefined,
    );

    expect(await resolver.resolve("https://apps.kde.org/kate/", "kate")).toEqual({
      kind: "kde",
      category: "utilities",
      repo: "kate",
    });
    expect(calls).toEqual([
      "https://invent.kde.org/api/v4/projects/plasma%2Fkate",
      "https://invent.kde.org/api/v4/projects/frameworks%2Fkate",
      "https://invent.kde.org/api/v4/projects/utilities%2Fkate",
    ]);
  });

  it("reads the category from apps.kde.org as a last resort", async () => {
    const { resolver } = createResolver((url) =>
      url.hostname === "apps.kde.org"
        ? { body: '<a href="/">Home</a><a href="/categories/utilities/">Utilities</a>' }
        : undefined,
    );

    expect(await resolver.resolve("https://apps.kde.org/kcalc", "kcalc")).toEqual({
      kind: "kde",
      category: "utilities",
      repo: "kcalc",
    });
  });

  it("returns null when no KDE project is found", async () => {
    const { resolver, logger } = createResolver();

    expect(await resolver.resolve("https://kde.org/unknown", "unknown")).toBeNull();
    expect(logger.error).toHaveBeenCalledWith("Couldn't locate the KDE project for unknown (https://kde.org/unknown)");
  });
});

describe("extractSourceLines", () => {
  it("collects removed and added source lines with https URLs", () => {
    const diff = [
      "--- a/.SRCINFO",
      "+++ b/.SRCINFO",
      "-\tsource = https://example.org/foo-1.0.tar.gz",
      "+\tsource = https://example.org/foo-1.1.tar.gz",
      "+\tsource_x86_64 = https://example.org/foo-bin-1.1.tar.gz",
      "+\tsource = local.patch",
      " \tsource = https://example.org/unchanged.patch",
    ].join("\n");

    expect(extractSourceLines(diff)).toEqual({
      removed: ["-\tsource = https://example.org/foo-1.0.tar.gz"],
      added: [
        "+\tsource = https://example.org/foo-1.1.tar.gz",
        "+\tsource_x86_64 = https://example.org/foo-bin-1.1.tar.gz",
      ],
    });
  });
});

describe("UpstreamResolver.resolveFromRecipeDiff", () => {
  it("resolves a cgit repository and its tags from .SRCINFO", async () => {
    const { resolver } = createResolver();

    const source = await resolver.resolveFromRecipeDiff(
      "kmod",
      HOP,
      srcinfo([
        "-\tsource = git+https://git.kernel.org/pub/scm/utils/kernel/kmod/kmod.git#tag=v34.1?signed",
        "+\tsource = git+https://git.kernel.org/pub/scm/utils/kernel/kmod/kmod.git#tag=v35?signed",
      ]),
    );

    expect(source).toEqual({
      repository: { kind: "cgit", url: "https://git.kernel.org/pub/scm/utils/kernel/kmod/kmod.git" },
      oldTag: "v34.1",
      newTag: "v35",
    });
  });

  it("resolves GitHub archives", async () => {
    const { resolver } = createResolver();

    const source = await resolver.resolveFromRecipeDiff(
      "abseil-cpp",
      { from: "20240722.0-1", to: "20250127.0-1" },
      srcinfo([
        "-\tsource = https://github.com/abseil/abseil-cpp/archive/20240722.0/abseil-cpp-20240722.0.tar.gz",
        "+\tsource = https://github.com/abseil/abseil-cpp/archive/20250127.0/abseil-cpp-20250127.0.tar.gz",
      ]),
    );

    expect(source).toEqual({
      repository: { kind: "github", owner: "abseil", repo: "abseil-cpp" },
      oldTag: "20240722.0",
      newTag: "20250127.0",
    });
  });

  it("refuses sources that moved to another project", async () => {
    const { resolver, logger } = createResolver();

    const source = await resolver.resolveFromRecipeDiff(
      "foo",
      { from: "1.0-1", to: "2.0-1" },
      srcinfo([
        "-\tsource = git+https://github.com/owner/foo.git#tag=v1.0",
        "+\tsource = git+https://codeberg.org/someone-else/completely-renamed-project.git#tag=v2.0",
      ]),
    );

    expect(source).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("returns null when the recipe did not change its sources", async () => {
    const { resolver } = createResolver();

    expect(await resolver.resolveFromRecipeDiff("foo", HOP, srcinfo(["-\tpkgrel = 1", "+\tpkgrel = 2"]))).toBeNull();
    expect(await resolver.resolveFromRecipeDiff("foo", HOP, [])).toBeNull();
  });

  it("fetches the packaging diff when none is given", async () => {
    const { resolver, calls } = createResolver((url) =>
      url.hostname === "gitlab.archlinux.org"
        ? {
            body: {
              commits: [],
              diffs: srcinfo([
                "-\tsource = git+https://github.com/owner/foo.git#tag=v1.0",
                "+\tsource = git+https://github.com/owner/foo.git#tag=v1.1",
              ]),
            },
          }
        : undefined,
    );

    const source = await resolver.resolveFromRecipeDiff("foo", { from: "1.0-1", to: "1.1-1" });

    expect(source).toEqual({
      repository: { kind: "github", owner: "owner", repo: "foo" },
      oldTag: "v1.0",
      newTag: "v1.1",
    });
    expect(calls).toEqual([
      "https://gitlab.archlinux.org/api/v4/projects/archlinux%2Fpackaging%2Fpackages%2Ffoo/repository/compare?from=1.0-1&to=1.1-1",
    ]);
  });
});
