import { vi } from "vitest";
import type { KeyValueStore } from "../src/db/redis.js";
import type { FetchLike } from "../src/services/http-client.js";
import type { Logger } from "../src/utils/logger.js";

export interface FakeReply {
  status?: number;
  /** Strings are sent as HTML, everything else as JSON */
  body?: unknown;
  headers?: Record<string, string>;
}

export type FakeRoute = (url: URL) => FakeReply | Error | undefined;

export function createSilentLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") {
    return input;
  }
  return input instanceof URL ? input.toString() : input.url;
}

/**
 * In-process stand-in for `fetch`. Unrouted URLs answer 404; a route
 * returning an Error makes the request reject like a network failure.
 */
export function createFakeFetch(route: FakeRoute): { fetch: FetchLike; calls: string[] } {
  const calls: string[] = [];

  const fetch: FetchLike = async (input) => {
    const url = requestUrl(input);
    calls.push(url);

    const reply = route(new URL(url)) ?? { status: 404, body: { message: "404 Not Found" } };
    if (reply instanceof Error) {
      throw reply;
    }

    const isHtml = typeof reply.body === "string";
    return new Response(isHtml ? String(reply.body) : JSON.stringify(reply.body ?? null), {
      status: reply.status ?? 200,
      headers: {
        "content-type": isHtml ? "text/html; charset=utf-8" : "application/json; charset=utf-8",
        ...reply.headers,
      },
    });
  };

  return { fetch, calls };
}

/** Replies in order, repeating the last one. */
export function sequence(...replies: Array<FakeReply | Error>): FakeRoute {
  let index = 0;
  return () => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index++;
    return reply;
  };
}

export function recordingSleep(): { sleep: (ms: number) => Promise<void>; waits: number[] } {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
}

/** In-process stand-in for the Redis commands the app uses. */
export class MemoryStore implements KeyValueStore {
  readonly values = new Map<string, unknown>();
  readonly expiries = new Map<string, number>();
  readonly hashes = new Map<string, Record<string, string | number>>();

  async get(key: string): Promise<unknown> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, options: { ex: number }): Promise<unknown> {
    this.values.set(key, value);
    this.expiries.set(key, options.ex);
    return "OK";
  }

  async hincrby(key: string, field: string, increment: number): Promise<unknown> {
    const hash = this.hashes.get(key) ?? {};
    const next = Number(hash[field] ?? 0) + increment;
    this.hashes.set(key, { ...hash, [field]: next });
    return next;
  }

  async hset(key: string, values: Record<string, string>): Promise<unknown> {
    this.hashes.set(key, { ...(this.hashes.get(key) ?? {}), ...values });
    return Object.keys(values).length;
  }
}
