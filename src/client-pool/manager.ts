/**
 * Per-scope reuse of ARM SDK clients.
 *
 * A pool holds one client type. Clients are keyed by scope (a subscription
 * ID, or "tenant" for tenant-level clients) and rebuilt when they age out or
 * when the credentials manager hands out a different credential.
 */

import type { TokenCredential } from "@azure/identity";

export const TENANT_SCOPE = "tenant";

export type ArmClientPoolOptions = {
  /** Clients kept before the least recently used one is dropped. */
  capacity?: number;
  maxAgeMs?: number;
};

export type ArmClientPoolStats = {
  clients: number;
  capacity: number;
  reused: number;
  built: number;
  evicted: number;
};

export type ClientBuilder<T> = (credential: TokenCredential, scope: string) => T;

type PooledClient<T> = {
  client: T;
  credential: TokenCredential;
  builtAt: number;
};

export class ArmClientPool<T> {
  // Map iteration order doubles as recency order: a reused client is re-inserted.
  private clients = new Map<string, PooledClient<T>>();
  private readonly capacity: number;
  private readonly maxAgeMs: number;
  private reused = 0;
  private built = 0;
  private evicted = 0;

  constructor(options: ArmClientPoolOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 32);
    this.maxAgeMs = options.maxAgeMs ?? 30 * 60_000;
  }

  acquire(scope: string, credential: TokenCredential, build: ClientBuilder<T>): T {
    const pooled = this.clients.get(scope);
    this.clients.delete(scope);

    if (pooled && pooled.credential === credential && Date.now() - pooled.builtAt < this.maxAgeMs) {
      this.clients.set(scope, pooled);
      this.reused++;
      return pooled.client;
    }

    while (this.clients.size >= this.capacity) {
      const oldest = this.clients.keys().next();
      if (oldest.done) break;
      this.clients.delete(oldest.value);
      this.evicted++;
    }

    const client = build(credential, scope);
    this.clients.set(scope, { client, credential, builtAt: Date.now() });
    this.built++;
    return client;
  }

  release(scope: string): boolean {
    return this.clients.delete(scope);
  }

  reset(): void {
    this.clients.clear();
    this.reused = 0;
    this.built = 0;
    this.evicted = 0;
  }

  getStats(): ArmClientPoolStats {
    return {
      clients: this.clients.size,
      capacity: this.capacity,
      reused: this.reused,
      built: this.built,
      evicted: this.evicted,
    };
  }
}
