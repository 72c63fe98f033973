import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { ChangelogEntry, PackageVersionInfo } from "../types/index.js";

export const NOT_APPLICABLE_MINOR = "- Not applicable, minor release -";
export const MISSING_ORIGIN =
  "- ERROR: Couldn't find origin changelog. Check the logs for further information -";

const commitRecordSchema = z.object({
  "commit message": z.string(),
  "commit URL": z.string(),
});

const versionRecordSchema = z.object({
  "version-tag": z.string(),
  "release-type": z.enum(["minor", "major", "unknown"]),
  "compare-url-tags-arch": z.string(),
  "compare-url-tags-origin": z.string(),
  changelog: z.object({
    "changelog Arch package": z.array(commitRecordSchema),
    "changelog origin package": z.array(z.union([commitRecordSchema, z.string()])),
  }),
});

const packageRecordSchema = z.object({
  description: z.string(),
  "base package": z.string(),
  "current version": z.string(),
  "new version": z.string(),
  versions: z.array(versionRecordSchema),
});

const changelogDocumentSchema = z.object({
  packages: z.array(z.string()),
  changelog: z.record(packageRecordSchema),
});

export type CommitRecord = z.infer<typeof commitRecordSchema>;
export type VersionRecord = z.infer<typeof versionRecordSchema>;
export type PackageRecord = z.infer<typeof packageRecordSchema>;
export type ChangelogDocument = z.infer<typeof changelogDocumentSchema>;

export function emptyDocument(): ChangelogDocument {
  return { packages: [], changelog: {} };
}

/** `<YYYYMMDD-HHMM>-changelog.json` in local time. */
export function changelogFileName(date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}-changelog.json`
  );
}

export function changelogFilePath(changelogDir: string, date?: Date): string {
  return join(changelogDir, changelogFileName(date));
}

function isPackagingEntry(entry: ChangelogEntry): boolean {
  return entry.releaseType === "arch" || entry.releaseType === "minor";
}

function createVersionRecord(
  first: ChangelogEntry,
  entries: readonly ChangelogEntry[],
  hasOriginEntries: boolean,
): VersionRecord {
  const sameTag = entries.filter((entry) => entry.versionTag === first.versionTag);
  const record: VersionRecord = {
    "version-tag": first.versionTag,
    "release-type": first.releaseType === "arch" ? "major" : first.releaseType,
    "compare-url-tags-arch": sameTag.find(isPackagingEntry)?.compareUrl ?? "",
    "compare-url-tags-origin": sameTag.find((entry) => entry.releaseType === "major")?.compareUrl ?? "",
    changelog: {
      "changelog Arch package": [],
      "changelog origin package": [],
    },
  };

  if (first.releaseType === "minor") {
    record.changelog["changelog origin package"].push(NOT_APPLICABLE_MINOR);
    record["compare-url-tags-origin"] = NOT_APPLICABLE_MINOR;
  } else if (!hasOriginEntries) {
    record.changelog["changelog origin package"].push(MISSING_ORIGIN);
  }

  return record;
}

/**
 * Group entries by version tag, in order of first appearance. Packaging
 * commits (`arch`, `minor`) and upstream commits (`major`) go to separate lists.
 */
export function groupVersions(
  pkg: PackageVersionInfo,
  entries: readonly ChangelogEntry[],
): VersionRecord[] {
  if (entries.length === 0) {
    return [
      {
        "version-tag": pkg.currentVersion,
        "release-type": "unknown",
        "compare-url-tags-arch": "",
        "compare-url-tags-origin": "",
        changelog: { "changelog Arch package": [], "changelog origin package": [] },
      },
    ];
  }

  const hasOriginEntries = entries.some((entry) => entry.releaseType === "major");
  const groups = new Map<string, VersionRecord>();

  for (const entry of entries) {
    let group = groups.get(entry.versionTag);
    if (!group) {
      group = createVersionRecord(entry, entries, hasOriginEntries);
      groups.set(entry.versionTag, group);
    }

    const commit: CommitRecord = { "commit message": entry.message, "commit URL": entry.url };
    if (entry.releaseType === "major") {
      group.changelog["changelog origin package"].push(commit);
    } else {
      group.changelog["changelog Arch package"].push(commit);
    }
  }

  return [...groups.values()];
}

/**
 * Add or replace one package in a changelog document.
 */
export function buildChangelogDocument(
  existing: ChangelogDocument,
  pkg: PackageVersionInfo,
  entries: readonly ChangelogEntry[],
): ChangelogDocument {
  const packages = existing.packages.includes(pkg.name)
    ? [...existing.packages]
    : [...existing.packages, pkg.name];

  return {
    packages,
    changelog: {
      ...existing.changelog,
      [pkg.name]: {
        description: pkg.description,
        "base package": pkg.base ?? "-",
        "current version": pkg.currentVersion,
        "new version": pkg.newVersion,
        versions: groupVersions(pkg, entries),
      },
    },
  };
}

async function readDocument(path: string): Promise<ChangelogDocument> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return emptyDocument();
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return emptyDocument();
  }

  const parsed = changelogDocumentSchema.safeParse(json);
  return parsed.success ? parsed.data : emptyDocument();
}

/**
 * Merge one package's changelog into the document at `path`.
 */
export async function writeChangelog(
  path: string,
  pkg: PackageVersionInfo,
  entries: readonly ChangelogEntry[],
): Promise<ChangelogDocument> {
  const document = buildChangelogDocument(await readDocument(path), pkg, entries);

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(document, null, 4)}\n`, "utf8");

  return document;
}
