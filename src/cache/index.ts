export { MemoryCache } from "./memory.js";
export { NoCache } from "./no-cache.js";
export { CachedFetcher, buildCacheKey, createCacheStore } from "./cached-fetch.js";
export type { CachedFetchOptions } from "./cached-fetch.js";
export type { CacheStore, CacheStats, CacheBackend, CacheOptions } from "./types.js";
