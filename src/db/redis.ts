import { Redis } from "@upstash/redis";
import type { AppConfig } from "../config/index.js";

/** The subset of Redis commands the cache and metrics use. */
export interface KeyValueStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: string, options: { ex: number }): Promise<unknown>;
  hincrby(key: string, field: string, increment: number): Promise<unknown>;
  hset(key: string, values: Record<string, string>): Promise<unknown>;
}

let redisClient: Redis | null = null;

/**
 * Shared Upstash client, or null when no credentials are configured.
 */
export function getRedis(
  config: Pick<AppConfig, "upstashRedisRestUrl" | "upstashRedisRestToken">,
): Redis | null {
  const url = config.upstashRedisRestUrl;
  const token = config.upstashRedisRestToken;

  if (!url || !token) {
    return null;
  }

  if (!redisClient) {
    redisClient = new Redis({ url, token });
  }
  return redisClient;
}

// Key prefixes for different data types
export const KeyPrefix = {
  TAGS: "tags",
  METRICS: "metrics",
} as const;

// Helper to build keys
export function buildKey(...parts: string[]): string {
  return parts.join(":");
}
