import { distance } from "fastest-levenshtein";

export const DEFAULT_FUZZY_THRESHOLD = 70;

/**
 * Reduce a tag to the part packaging and upstream usually agree on:
 * `1-6.3.90-1` -> `6.3.90`, `v2_7_0` -> `2.7.0`, `v6.15.0-rc1` -> `6.15.0-rc1`.
 */
export function normalizeTagForMatching(tag: string): string {
  return tag
    .trim()
    .replace(/^\d{1,2}-(?=.*\d)/, "")
    .replace(/^v/i, "")
    .replace(/_/g, ".")
    .replace(/-\d+$/, "");
}

/** Similarity of two strings in [0, 100], derived from their edit distance. */
export function similarityScore(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 100;
  }
  return (1 - distance(a, b) / longest) * 100;
}

/** Same as {@link similarityScore}, scaled to [0, 1]. */
export function similarityRatio(a: string, b: string): number {
  return similarityScore(a, b) / 100;
}

/**
 * Find the upstream tag that best matches a packaging tag.
 *
 * Returns the candidate as spelled upstream, or null when no candidate scores
 * at least `threshold`.
 */
export function closestTag(
  tag: string,
  candidates: readonly string[],
  threshold: number = DEFAULT_FUZZY_THRESHOLD,
): string | null {
  const needle = normalizeTagForMatching(tag);

  let best: string | null = null;
  let bestScore = -1;

  for (const candidate of candidates) {
    const score = similarityScore(needle, normalizeTagForMatching(candidate));
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best !== null && bestScore >= threshold ? best : null;
}
