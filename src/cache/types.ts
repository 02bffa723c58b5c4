/**
 * Cache store contract.
 *
 * Stores are asynchronous so that a remote backend can stand in for the
 * in-process one without changing callers.
 */

export type CacheBackend = "memory" | "none";

export type CacheStats = {
  backend: CacheBackend;
  size: number;
  hits: number;
  misses: number;
};

export interface CacheStore<V> {
  get(key: string): Promise<V | undefined>;
  /**
   * Store a value. `ttlSeconds` overrides the store default; 0 keeps the
   * entry until it is evicted or deleted.
   */
  set(key: string, value: V, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Drop every key starting with `prefix`; returns the number removed. */
  invalidatePrefix(prefix: string): Promise<number>;
  clear(): Promise<void>;
  getStats(): CacheStats;
}

export type CacheOptions = {
  backend?: CacheBackend;
  /** Default entry lifetime; 0 disables expiry. */
  ttlSeconds?: number;
  maxEntries?: number;
};
