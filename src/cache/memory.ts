/**
 * In-process LRU cache with per-entry expiry.
 */

import type { CacheStats, CacheStore } from "./types.js";

type CacheEntry<V> = {
  value: V;
  /** Epoch ms; Infinity for entries without expiry. */
  expiresAt: number;
  hitCount: number;
};

export class MemoryCache<V> implements CacheStore<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private maxEntries: number;
  private defaultTtlSeconds: number;
  private hits = 0;
  private misses = 0;

  constructor(options?: { ttlSeconds?: number; maxEntries?: number }) {
    this.defaultTtlSeconds = options?.ttlSeconds ?? 3600;
    this.maxEntries = options?.maxEntries ?? 5000;
  }

  async get(key: string): Promise<V | undefined> {
    const entry = this.entries.get(key);
    if (!entry || Date.now() >= entry.expiresAt) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    entry.hitCount++;
    this.hits++;

    // Map preserves insertion order: re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);

    return entry.value;
  }

  async set(key: string, value: V, ttlSeconds?: number): Promise<void> {
    if (this.entries.size >= this.maxEntries && !this.entries.has(key)) {
      this.evictLeastRecentlyUsed();
    }

    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    this.entries.delete(key);
    this.entries.set(key, {
      value,
      expiresAt: ttl > 0 ? Date.now() + ttl * 1000 : Infinity,
      hitCount: 0,
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async invalidatePrefix(prefix: string): Promise<number> {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): CacheStats {
    return { backend: "memory", size: this.entries.size, hits: this.hits, misses: this.misses };
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) this.entries.delete(oldest.value);
  }
}
