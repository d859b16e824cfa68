import { describe, expect, it } from "vitest";
import { createLimiter } from "./limiter";

const tick = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

describe("createLimiter", () => {
  it("never runs more tasks than the concurrency bound", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((value) =>
        limit(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await tick(5);
          active -= 1;
          return value * 10;
        }),
      ),
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it("releases the slot when a task rejects", async () => {
    const limit = createLimiter(1);

    await expect(
      limit(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(limit(async () => "after")).resolves.toBe("after");
  });

  it("rejects invalid bounds", () => {
    expect(() => createLimiter(0)).toThrow(
      "concurrency must be an integer >= 1",
    );
  });
});
