import { describe, it, expect, vi } from "vitest";
import { concurrentMap, sleep } from "../../../src/utils/async.js";

describe("concurrentMap", () => {
  it("keeps input order in the results", async () => {
    const results = await concurrentMap({
      items: [30, 10, 20],
      fn: async (ms) => {
        await sleep(ms);
        return ms * 2;
      },
      concurrency: 3,
    });

    expect(results).toEqual([
      { item: 30, value: 60 },
      { item: 10, value: 20 },
      { item: 20, value: 40 },
    ]);
  });

  it("never runs more than the concurrency limit at once", async () => {
    let active = 0;
    let peak = 0;
    await concurrentMap({
      items: [1, 2, 3, 4, 5, 6, 7],
      fn: async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(1);
        active--;
      },
      concurrency: 2,
    });

    expect(peak).toBe(2);
  });

  it("leaves failed items out and reports them", async () => {
    const onError = vi.fn();
    const results = await concurrentMap({
      items: ["a", "b", "c"],
      fn: async (item) => {
        if (item === "b") throw new Error("nope");
        return item.toUpperCase();
      },
      onError,
    });

    expect(results).toEqual([
      { item: "a", value: "A" },
      { item: "c", value: "C" },
    ]);
    expect(onError).toHaveBeenCalledWith("b", expect.any(Error));
  });

  it("reports progress for every settled item", async () => {
    const onProgress = vi.fn();
    await concurrentMap({ items: [1, 2, 3], fn: async (n) => n, onProgress, concurrency: 2 });

    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress).toHaveBeenLastCalledWith(3, 3);
  });

  it("rejects a concurrency below 1", async () => {
    await expect(concurrentMap({ items: [1], fn: async (n) => n, concurrency: 0 })).rejects.toThrow(
      "concurrency must be >= 1"
    );
  });
});
