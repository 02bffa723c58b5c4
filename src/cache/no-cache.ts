import type { CacheStats, CacheStore } from "./types.js";

/**
 * Store that keeps nothing. Every read is a miss.
 */
export class NoCache<V> implements CacheStore<V> {
  private misses = 0;

  async get(_key: string): Promise<V | undefined> {
    this.misses++;
    return undefined;
  }

  async set(_key: string, _value: V, _ttlSeconds?: number): Promise<void> {}

  async delete(_key: string): Promise<boolean> {
    return false;
  }

  async invalidatePrefix(_prefix: string): Promise<number> {
    return 0;
  }

  async clear(): Promise<void> {
    this.misses = 0;
  }

  getStats(): CacheStats {
    return { backend: "none", size: 0, hits: 0, misses: this.misses };
  }
}
