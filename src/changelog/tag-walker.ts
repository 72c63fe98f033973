import type {
  ChangelogEntry,
  PackageVersionInfo,
  ReleaseType,
  TagIndex,
  VersionParts,
} from "../types/index.js";
import { errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { classifyRelease, normalizeEpoch, parseVersionTag } from "../utils/version.js";

/** Two consecutive packaging tags, both epoch-normalized. */
export interface Hop {
  from: string;
  to: string;
}

/**
 * Fetches the commits of one hop. Implementations return an empty list when
 * nothing could be fetched.
 */
export interface HopComparer {
  /** Commits of the packaging recipe, tagged `minor` or `arch`. */
  packaging(hop: Hop, releaseType: "minor" | "arch"): Promise<ChangelogEntry[]>;
  /** Commits of the upstream project, tagged `major`. */
  upstream(hop: Hop): Promise<ChangelogEntry[]>;
}

/**
 * Tags strictly between `current` and `next`, oldest first. Null when either
 * version is missing from the index.
 */
export function findIntermediateTags(
  tags: TagIndex,
  current: string,
  next: string,
  logger?: Logger,
): TagIndex | null {
  const currentTag = normalizeEpoch(current);
  const nextTag = normalizeEpoch(next);

  const currentIndex = tags.findIndex((info) => info.tag === currentTag);
  const nextIndex = tags.findIndex((info) => info.tag === nextTag);

  if (currentIndex === -1 || nextIndex === -1) {
    logger?.error(
      `Intermediate tags: ${[
        currentIndex === -1 ? currentTag : null,
        nextIndex === -1 ? nextTag : null,
      ]
        .filter((tag) => tag !== null)
        .join(" and ")} not found in the packaging tags`,
    );
    return null;
  }

  // Index order is newest first
  return tags.slice(nextIndex + 1, currentIndex).reverse();
}

function splitAtLastDash(tag: string): VersionParts {
  const dash = tag.lastIndexOf("-");
  return { main: tag.slice(0, dash), suffix: tag.slice(dash + 1) };
}

/**
 * Release type of one hop between packaging tags.
 *
 * @throws MalformedVersionError for tags without a `-`
 */
export function classifyHop(hop: Hop): ReleaseType {
  const from = parseVersionTag(hop.from);
  const to = parseVersionTag(hop.to);
  const releaseType = classifyRelease(from, to);

  // `1-2.0-1` -> `1-2.0-2` splits into equal parts; only the counter at the end differs
  if (releaseType === "unknown" && from.raw !== to.raw) {
    return classifyRelease(splitAtLastDash(from.raw), splitAtLastDash(to.raw));
  }
  return releaseType;
}

/**
 * Run one comparison of a hop. A failure is logged and the hop contributes
 * nothing from that side.
 */
async function compareSafely(
  pkg: PackageVersionInfo,
  hop: Hop,
  side: "packaging" | "upstream",
  compare: () => Promise<ChangelogEntry[]>,
  logger: Logger,
): Promise<ChangelogEntry[]> {
  try {
    return await compare();
  } catch (error) {
    logger.error(
      `${pkg.name}: ${side} changelog of ${hop.from} -> ${hop.to} failed: ${errorMessage(error)}`,
    );
    return [];
  }
}

/**
 * Walk from the installed version through every intermediate tag to the new
 * version and collect the changelog of each hop. A comparison that fails is
 * left out and the walk goes on.
 */
export async function walk(
  intermediate: TagIndex,
  pkg: PackageVersionInfo,
  comparer: HopComparer,
  logger: Logger,
): Promise<ChangelogEntry[]> {
  const stops = [...intermediate.map((info) => info.tag), pkg.newVersionNormalized];
  const entries: ChangelogEntry[] = [];
  let previous = pkg.currentVersionNormalized;

  for (const tag of stops) {
    const hop = { from: previous, to: tag };
    previous = tag;

    let releaseType: ReleaseType;
    try {
      releaseType = classifyHop(hop);
    } catch (error) {
      logger.error(`${pkg.name}: skipping ${hop.from} -> ${hop.to}: ${errorMessage(error)}`);
      continue;
    }

    const label = tag === pkg.newVersionNormalized ? "release" : "intermediate release";

    switch (releaseType) {
      case "minor":
        logger.info(`${pkg.name}: ${tag} is a minor ${label}`);
        entries.push(
          ...(await compareSafely(pkg, hop, "packaging", () => comparer.packaging(hop, "minor"), logger)),
        );
        break;
      case "major": {
        logger.info(`${pkg.name}: ${tag} is a major ${label}`);
        const packaging = await compareSafely(
          pkg,
          hop,
          "packaging",
          () => comparer.packaging(hop, "arch"),
          logger,
        );
        const upstream = await compareSafely(pkg, hop, "upstream", () => comparer.upstream(hop), logger);
        entries.push(...packaging, ...upstream);
        break;
      }
      default:
        logger.debug(`${pkg.name}: no change between ${hop.from} and ${hop.to}`);
    }
  }

  return entries;
}
