import { describe, it, expect } from "vitest";
import { deferred } from "./testing/helpers";
import { mapPool } from "./worker-pool";

describe("mapPool", () => {
  it("keeps input order and bounds concurrency", async () => {
    let running = 0;
    let peak = 0;
    const out = await mapPool([30, 10, 20, 0], 2, async (ms, i) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, ms));
      running--;
      return i * 10;
    });
    expect(out).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });

  it("stops taking work after a failure", async () => {
    const started: number[] = [];
    const gate = deferred<void>();
    const run = mapPool([1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new Error("item 2 failed");
      if (n === 1) await gate.promise;
      return n;
    });
    gate.resolve();
    await expect(run).rejects.toThrow("item 2 failed");
    expect(started).toEqual([1, 2]);
  });

  it("handles an empty list", async () => {
    await expect(mapPool([], 4, async () => 1)).resolves.toEqual([]);
  });
});
