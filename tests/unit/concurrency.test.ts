import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "../../src/utils/concurrency.js";

describe("mapWithConcurrency", () => {
  it("should keep input order", async () => {
    const delays = [30, 5, 20, 0];
    const results = await mapWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
  });

  it("should never run more than the limit at once", async () => {
    let running = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    });

    expect(peak).toBe(3);
  });

  it("should handle an empty list", async () => {
    expect(await mapWithConcurrency([], 4, async (x: number) => x)).toEqual([]);
  });
});
