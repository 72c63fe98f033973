import type {
  PackageVersionInfo,
  ReleaseType,
  UpgradeCandidate,
  VersionParts,
  VersionTag,
} from "../types/index.js";
import { MalformedVersionError } from "./errors.js";

const EPOCH_PATTERN = /(\d+):/g;

/**
 * Rewrite epoch markers (`1:`) to the dash form hosting platforms use in tag
 * names (`1-`).
 */
export function normalizeEpoch(version: string): string {
  return version.replace(EPOCH_PATTERN, "$1-");
}

/**
 * Split a packaging tag into its upstream (main) and release counter (suffix).
 *
 * @example
 * splitVersionTag("1-15.2.3-2") // { main: "15.2.3", suffix: "1" }
 * splitVersionTag("24.12.2-1")  // { main: "24.12.2", suffix: "1" }
 *
 * @throws MalformedVersionError when the tag has no `-` separator
 */
export function splitVersionTag(tag: string): VersionParts {
  const parts = tag.split("-");

  if (parts.length < 2) {
    throw new MalformedVersionError(tag);
  }

  // epoch-main-suffix
  if (parts.length >= 3) {
    return { main: parts[1], suffix: parts[0] };
  }

  const [first, second] = parts;
  if (first.length < second.length) {
    return { main: second, suffix: first };
  }
  return { main: first, suffix: second };
}

export function parseVersionTag(raw: string): VersionTag {
  return { raw, ...splitVersionTag(raw) };
}

export function classifyRelease(a: VersionParts, b: VersionParts): ReleaseType {
  if (a.main !== b.main) {
    return "major";
  }
  if (a.suffix !== b.suffix) {
    return "minor";
  }
  return "unknown";
}

/**
 * Split a version exactly as the package manager reports it: `main` is
 * everything before the last dash (epoch included), `suffix` the release
 * counter.
 */
function splitPackageVersion(version: string): VersionParts {
  const dash = version.lastIndexOf("-");
  if (dash <= 0 || dash === version.length - 1) {
    throw new MalformedVersionError(version);
  }
  return {
    main: normalizeEpoch(version.slice(0, dash)),
    suffix: version.slice(dash + 1),
  };
}

export interface PackageVersionInput extends UpgradeCandidate {
  base?: string | null;
  description?: string;
  upstreamUrl?: string;
}

/**
 * @throws MalformedVersionError for versions without a release counter
 * @throws Error when current and new version are equal
 */
export function createPackageVersionInfo(input: PackageVersionInput): PackageVersionInfo {
  if (input.currentVersion === input.newVersion) {
    throw new Error(
      `${input.name}: current and new version are both ${input.currentVersion}`,
    );
  }

  return Object.freeze({
    name: input.name,
    base: input.base ?? null,
    description: input.description ?? "",
    upstreamUrl: input.upstreamUrl ?? "",
    currentVersion: input.currentVersion,
    newVersion: input.newVersion,
    currentVersionNormalized: normalizeEpoch(input.currentVersion),
    newVersionNormalized: normalizeEpoch(input.newVersion),
    current: Object.freeze(splitPackageVersion(input.currentVersion)),
    new: Object.freeze(splitPackageVersion(input.newVersion)),
  });
}

export function withRegistryInfo(
  pkg: PackageVersionInfo,
  info: { base: string | null; description: string; upstreamUrl: string },
): PackageVersionInfo {
  return createPackageVersionInfo({
    name: pkg.name,
    currentVersion: pkg.currentVersion,
    newVersion: pkg.newVersion,
    base: info.base,
    description: info.description,
    upstreamUrl: info.upstreamUrl,
  });
}
