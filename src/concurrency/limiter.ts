/**
 * Concurrency Limiter
 *
 * Counting admission gate shared by every component that talks to Azure.
 * Waiters are admitted in FIFO order; a permit is always returned, whether
 * the guarded call resolves or throws.
 */

export type LimiterStats = {
  maxConcurrent: number;
  active: number;
  waiting: number;
};

export class ConcurrencyLimiter {
  readonly maxConcurrent: number;
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(maxConcurrent = 5) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Run `fn` once a permit is available.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): LimiterStats {
    return { maxConcurrent: this.maxConcurrent, active: this.active, waiting: this.waiters.length };
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      // The permit is handed over directly, so `active` is not decremented
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}

export function createConcurrencyLimiter(maxConcurrent?: number): ConcurrencyLimiter {
  return new ConcurrencyLimiter(maxConcurrent);
}
