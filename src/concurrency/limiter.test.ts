import { describe, it, expect } from "vitest";
import { ConcurrencyLimiter } from "./limiter.js";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

async function flush(): Promise<void> {
  for (let i = 0; i < 5; i++) await Promise.resolve();
}

describe("ConcurrencyLimiter", () => {
  it("rejects a non-positive bound", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });

  it("never runs more than maxConcurrent calls at once", async () => {
    const limiter = new ConcurrencyLimiter(2);
    let inFlight = 0;
    let peak = 0;

    const result = await Promise.all(
      [1, 2, 3, 4, 5, 6].map((n) =>
        limiter.run(async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => setTimeout(resolve, 1));
          inFlight--;
          return n;
        }),
      ),
    );

    expect(result).toEqual([1, 2, 3, 4, 5, 6]);
    expect(peak).toBe(2);
  });

  it("admits waiters in FIFO order", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred<void>();
    const order: string[] = [];

    const first = limiter.run(async () => {
      await gate.promise;
      order.push("first");
    });
    const second = limiter.run(async () => { order.push("second"); });
    const third = limiter.run(async () => { order.push("third"); });

    await flush();
    expect(limiter.getStats()).toEqual({ maxConcurrent: 1, active: 1, waiting: 2 });

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(order).toEqual(["first", "second", "third"]);
  });

  it("releases the permit when the call throws", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => { throw new Error("boom"); })).rejects.toThrow("boom");
    expect(limiter.getStats().active).toBe(0);
    await expect(limiter.run(async () => "ok")).resolves.toBe("ok");
  });
});
