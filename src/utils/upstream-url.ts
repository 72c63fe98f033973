import { parse as parseToml } from "smol-toml";
import type { UpstreamTarget } from "../types/index.js";

type GitLabTarget = Extract<UpstreamTarget, { kind: "gitlab" }>;
type GitHubTarget = Extract<UpstreamTarget, { kind: "github" }>;
type KdeTarget = Extract<UpstreamTarget, { kind: "kde" }>;

export const KDE_INVENT_HOST = "invent.kde.org";

const GITHUB_REPO_PATTERN = /https:\/\/github\.com\/([^/?#\s]+)\/([^/?#\s]+)/;
const GITLAB_HOST_PATTERN = /^gitlab\.(?:([^./]+)\.)?([a-z]+)$/i;

function stripGitSuffix(value: string): string {
  return value.replace(/\.git$/, "");
}

/**
 * Drop GitLab UI segments (`/-/tags`, `/-/releases`...), query, fragment and
 * trailing slashes from a project URL.
 */
export function stripGitLabUiSuffix(url: string): string {
  const withoutQuery = url.replace(/[?#].*$/, "");
  const uiIndex = withoutQuery.indexOf("/-/");
  const base = uiIndex === -1 ? withoutQuery : withoutQuery.slice(0, uiIndex);
  return stripGitSuffix(base.replace(/\/+$/, ""));
}

function splitHostAndPath(url: string): { host: string; segments: string[] } | null {
  let parsed: URL;
  try {
    parsed = new URL(stripGitLabUiSuffix(url));
  } catch {
    return null;
  }
  return {
    host: parsed.hostname.toLowerCase(),
    segments: parsed.pathname.split("/").filter((segment) => segment.length > 0),
  };
}

/**
 * Project coordinates of a GitLab URL.
 *
 * @example
 * parseGitLabUrl("https://gitlab.freedesktop.org/xorg/lib/libXScrnSaver")
 * // { kind: "gitlab", subdomain: "freedesktop", tld: "org", projectPath: "xorg/lib", repo: "libXScrnSaver" }
 */
export function parseGitLabUrl(url: string): GitLabTarget | KdeTarget | null {
  const parts = splitHostAndPath(url);
  if (!parts || parts.segments.length < 2) {
    return null;
  }

  const { host, segments } = parts;
  const repo = segments[segments.length - 1];
  const projectPath = segments.slice(0, -1).join("/");

  if (host === KDE_INVENT_HOST) {
    return { kind: "kde", category: projectPath, repo };
  }

  const hostMatch = host.match(GITLAB_HOST_PATTERN);
  if (!hostMatch) {
    return null;
  }

  return {
    kind: "gitlab",
    subdomain: hostMatch[1] ?? null,
    tld: hostMatch[2],
    projectPath,
    repo,
  };
}

export function parseGitHubUrl(url: string): GitHubTarget | null {
  const match = url.match(GITHUB_REPO_PATTERN);
  if (!match) {
    return null;
  }
  return { kind: "github", owner: match[1], repo: stripGitSuffix(match[2]) };
}

export function isGitLabUrl(url: string): boolean {
  const parts = splitHostAndPath(url);
  return parts !== null && (parts.host === KDE_INVENT_HOST || GITLAB_HOST_PATTERN.test(parts.host));
}

export function gitLabHost(target: GitLabTarget): string {
  return target.subdomain ? `gitlab.${target.subdomain}.${target.tld}` : `gitlab.${target.tld}`;
}

/** Web URL of the project a target points at. */
export function targetWebUrl(target: Exclude<UpstreamTarget, { kind: "generic-diff" }>): string {
  switch (target.kind) {
    case "github":
      return `https://github.com/${target.owner}/${target.repo}`;
    case "gitlab":
      return `https://${gitLabHost(target)}/${target.projectPath}/${target.repo}`;
    case "kde":
      return `https://${KDE_INVENT_HOST}/${target.category}/${target.repo}`;
  }
}

/**
 * Reduce a raw source line from a recipe to the repository it points at.
 *
 * @example
 * extractBaseGitUrl("+\tsource = git+https://gitlab.winehq.org/wine/wine.git?signed#tag=wine-10.13")
 * // "https://gitlab.winehq.org/wine/wine"
 */
export function extractBaseGitUrl(raw: string): string | null {
  const urlMatch = raw.match(/https:\/\/[^\s"')]+/);
  if (!urlMatch) {
    return null;
  }
  const url = urlMatch[0];

  const github = parseGitHubUrl(url);
  if (github) {
    return `https://github.com/${github.owner}/${github.repo}`;
  }

  return stripGitSuffix(url.replace(/[?#].*$/, "").replace(/\/+$/, ""));
}

/**
 * Upstream tag named by a source line: `#tag=v1.2`, `/archive/refs/tags/v1.2.tar.gz`,
 * `/download/v1.2/...` or `/archive/1.2/...`.
 */
export function extractSourceTag(raw: string): string | null {
  const fragment = raw.match(/#tag=([^?\s"')]+)/);
  if (fragment) {
    return fragment[1];
  }

  const refsTag = raw.match(
    /\/archive\/refs\/tags\/([^/?#\s"')]+?)(?:\.tar\.\w+|\.zip)?(?=[?#\s"')]|$)/,
  );
  if (refsTag) {
    return refsTag[1];
  }

  const pathTag = raw.match(/\/(?:download|archive)\/([^/?#\s]+)\//);
  return pathTag ? pathTag[1] : null;
}

function readString(section: Record<string, unknown>, key: string): string | null {
  const value = section[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Upstream URL declared in a parsed `.nvchecker.toml` for one package.
 */
export function extractUpstreamUrlFromNvchecker(
  parsed: Record<string, unknown>,
  packageName: string,
): string | null {
  const section = parsed[packageName];
  if (!isRecord(section)) {
    return null;
  }

  const source = readString(section, "source");

  if (source === "gitlab") {
    const project = readString(section, "gitlab");
    if (project) {
      const host = readString(section, "host") ?? "gitlab.com";
      return `https://${host}/${project}`;
    }
  }

  if (source === "github") {
    const project = readString(section, "github");
    if (project) {
      return `https://github.com/${project}`;
    }
  }

  const git = readString(section, "git");
  if (git) {
    return stripGitSuffix(git);
  }

  return readString(section, "url");
}

/**
 * @throws the TOML parser's error for invalid documents
 */
export function parseNvchecker(content: string): Record<string, unknown> {
  return parseToml(content);
}
