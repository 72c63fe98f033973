import { buildKey, KeyPrefix, type KeyValueStore } from "./redis.js";
import type { Logger } from "../utils/logger.js";

export interface RunSummary {
  processed: number;
  skipped: number;
  entries: number;
}

function metricsKey(name: string): string {
  return buildKey(KeyPrefix.METRICS, name);
}

/**
 * Record a changelog run's results
 */
export async function recordRunMetrics(
  store: KeyValueStore,
  summary: RunSummary,
  logger: Logger,
  now: Date = new Date(),
): Promise<void> {
  const key = metricsKey("runs");

  try {
    await Promise.all([
      store.hincrby(key, "total_runs", 1),
      store.hincrby(key, "packages_processed", summary.processed),
      store.hincrby(key, "packages_skipped", summary.skipped),
      store.hincrby(key, "entries", summary.entries),
      store.hset(key, { last_run_at: now.toISOString() }),
    ]);

    logger.debug("Run metrics recorded");
  } catch (error) {
    // Don't fail the run for metrics errors
    logger.warn("Failed to record run metrics", error);
  }
}
