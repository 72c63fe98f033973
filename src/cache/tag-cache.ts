import { z } from "zod";
import { buildKey, KeyPrefix, type KeyValueStore } from "../db/redis.js";
import type { TagIndex } from "../types/index.js";
import type { Logger } from "../utils/logger.js";

// Tags rarely change within a few hours
export const DEFAULT_TAG_TTL_SECONDS = 6 * 60 * 60;

const tagIndexSchema = z.array(z.object({ tag: z.string(), createdAt: z.string() }));

export interface TagCache {
  get(key: string): Promise<TagIndex | null>;
  set(key: string, tags: TagIndex): Promise<void>;
}

/** Cache key for the tags of one project on one host. */
export function tagCacheKey(host: string, project: string): string {
  return buildKey(KeyPrefix.TAGS, host.toLowerCase(), project);
}

/**
 * Tag indexes shared across runs through Redis. Failures are logged and read
 * as misses.
 */
export class RedisTagCache implements TagCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly logger: Logger,
    private readonly ttlSeconds: number = DEFAULT_TAG_TTL_SECONDS,
  ) {}

  async get(key: string): Promise<TagIndex | null> {
    try {
      const raw = await this.store.get(key);
      if (raw === null || raw === undefined) {
        return null;
      }

      // Upstash deserializes JSON values unless told otherwise
      const value: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
      const parsed = tagIndexSchema.safeParse(value);
      if (!parsed.success) {
        this.logger.warn(`Ignoring malformed cached tags for ${key}`);
        return null;
      }

      this.logger.debug(`Tag cache hit: ${key}`);
      return parsed.data;
    } catch (error) {
      this.logger.warn(`Failed to read cached tags for ${key}`, error);
      return null;
    }
  }

  async set(key: string, tags: TagIndex): Promise<void> {
    try {
      await this.store.set(key, JSON.stringify(tags), { ex: this.ttlSeconds });
    } catch (error) {
      this.logger.warn(`Failed to cache tags for ${key}`, error);
    }
  }
}

/** Per-run cache used when Redis is not configured. */
export class MemoryTagCache implements TagCache {
  private readonly entries = new Map<string, TagIndex>();

  async get(key: string): Promise<TagIndex | null> {
    const tags = this.entries.get(key);
    return tags ? [...tags] : null;
  }

  async set(key: string, tags: TagIndex): Promise<void> {
    this.entries.set(key, [...tags]);
  }
}
