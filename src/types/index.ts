export type ReleaseType = "minor" | "major" | "arch" | "unknown";

export interface VersionParts {
  main: string;
  suffix: string;
}

export interface VersionTag extends VersionParts {
  raw: string;
}

export interface TagInfo {
  tag: string;
  createdAt: string;
}

/** Tags as returned by a hosting platform, newest first. */
export type TagIndex = TagInfo[];

export interface CommitInfo {
  title: string;
  createdAt: string;
  url: string;
}

export interface PackageVersionInfo {
  readonly name: string;
  /** Source package name when several binary packages share one recipe */
  readonly base: string | null;
  readonly description: string;
  readonly upstreamUrl: string;
  readonly currentVersion: string;
  readonly newVersion: string;
  /** Versions with the epoch colon rewritten to a dash (`1:2.0-1` -> `1-2.0-1`) */
  readonly currentVersionNormalized: string;
  readonly newVersionNormalized: string;
  readonly current: Readonly<VersionParts>;
  readonly new: Readonly<VersionParts>;
}

export type UpstreamTarget =
  | { kind: "github"; owner: string; repo: string }
  | {
      kind: "gitlab";
      /** e.g. "freedesktop" in gitlab.freedesktop.org, null for gitlab.com */
      subdomain: string | null;
      tld: string;
      /** Groups and subgroups without the repository name */
      projectPath: string;
      repo: string;
    }
  | { kind: "kde"; category: string; repo: string }
  | { kind: "generic-diff" };

export interface ChangelogEntry {
  message: string;
  url: string;
  versionTag: string;
  packageName: string;
  releaseType: ReleaseType;
  compareUrl: string;
}

export interface UpgradeCandidate {
  name: string;
  currentVersion: string;
  newVersion: string;
}

export interface RegistryPackage {
  name: string;
  base: string | null;
  description: string;
  upstreamUrl: string;
  repository: string;
  architecture: string;
}

export interface ArchRepositorySetting {
  name: string;
  enabled: boolean;
}
