import type { UpgradeCandidate } from "../types/index.js";

/**
 * Zero-based indices chosen by a comma separated list of one-based numbers;
 * `0` selects everything. Null when the input is not a valid selection.
 */
export function parseSelection(input: string, count: number): number[] | null {
  const trimmed = input.trim();
  if (trimmed === "0") {
    return Array.from({ length: count }, (_, index) => index);
  }

  const indices: number[] = [];
  for (const part of trimmed.split(",")) {
    const value = part.trim();
    if (!/^\d+$/.test(value)) {
      return null;
    }
    const index = Number(value) - 1;
    if (index >= 0 && index < count && !indices.includes(index)) {
      indices.push(index);
    }
  }

  return indices.length > 0 ? indices : null;
}

/** One aligned line per candidate: `[ 1] name current -> new`. */
export function formatCandidates(candidates: readonly UpgradeCandidate[]): string[] {
  const width = (values: string[]): number => Math.max(0, ...values.map((value) => value.length));
  const indexWidth = String(candidates.length).length;
  const nameWidth = width(candidates.map((candidate) => candidate.name));
  const currentWidth = width(candidates.map((candidate) => candidate.currentVersion));

  return candidates.map(
    (candidate, index) =>
      `[${String(index + 1).padStart(indexWidth)}] ${candidate.name.padEnd(nameWidth)} ` +
      `${candidate.currentVersion.padEnd(currentWidth)} -> ${candidate.newVersion}`,
  );
}
