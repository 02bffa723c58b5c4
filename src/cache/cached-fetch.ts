/**
 * Read-through caching for upstream calls.
 */

import type { FetchOptions } from "../types.js";
import type { CacheOptions, CacheStore } from "./types.js";
import { MemoryCache } from "./memory.js";
import { NoCache } from "./no-cache.js";

export type CachedFetchOptions = FetchOptions & {
  ttlSeconds?: number;
};

/**
 * Join the non-empty parts of a key with ":".
 */
export function buildCacheKey(...parts: Array<string | number | null | undefined>): string {
  return parts
    .filter((part): part is string | number => part !== null && part !== undefined && part !== "")
    .map(String)
    .join(":");
}

export function createCacheStore<V>(options: CacheOptions = {}): CacheStore<V> {
  if (options.backend === "none") return new NoCache<V>();
  return new MemoryCache<V>({ ttlSeconds: options.ttlSeconds, maxEntries: options.maxEntries });
}

/**
 * Wraps a store with read-through semantics. Concurrent misses on the same
 * key share one loader call, so a slower duplicate fetch can never overwrite
 * the value written by a faster one.
 */
export class CachedFetcher<V> {
  readonly store: CacheStore<V>;
  private inflight = new Map<string, Promise<V>>();

  constructor(store: CacheStore<V>) {
    this.store = store;
  }

  async fetch(key: string, loader: () => Promise<V>, options: CachedFetchOptions = {}): Promise<V> {
    if (!options.refresh) {
      const cached = await this.store.get(key);
      if (cached !== undefined) return cached;
    }

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const load = async (): Promise<V> => {
      try {
        const value = await loader();
        await this.store.set(key, value, options.ttlSeconds);
        return value;
      } finally {
        this.inflight.delete(key);
      }
    };

    const promise = load();
    this.inflight.set(key, promise);
    return promise;
  }
}
