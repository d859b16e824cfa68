import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import { BatchProcessor, type BatchOptions } from "./batchProcessor";

const tick = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

const options = (overrides: Partial<BatchOptions<string>> = {}) => ({
  batchSize: 10,
  maxConcurrent: 2,
  interBatchDelayMs: 0,
  continueOnError: true,
  ...overrides,
});

describe("BatchProcessor", () => {
  it("collects successes and failures when continuing on error", async () => {
    const processor = new BatchProcessor();

    const result = await processor.run(
      ["a", "b", "c", "d", "e"],
      async (item, index): Promise<Result<string, string>> =>
        index % 2 === 1 ? err(`failed ${item}`) : ok(item.toUpperCase()),
      options(),
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error("expected outcome");
    }
    expect(result.value.successes.map((entry) => entry.value)).toEqual([
      "A",
      "C",
      "E",
    ]);
    expect(result.value.failures).toEqual([
      { index: 1, item: "b", error: "failed b" },
      { index: 3, item: "d", error: "failed d" },
    ]);
    expect(result.value.totalProcessed).toBe(5);
    expect(result.value.successRate).toBeCloseTo(0.6);
  });

  it("stops dispatching after the first failure when fail-fast", async () => {
    const processor = new BatchProcessor();
    const seen: number[] = [];

    const result = await processor.run(
      [0, 1, 2, 3, 4, 5],
      async (item): Promise<Result<number, string>> => {
        seen.push(item);
        return item === 2 ? err("item 2 broke") : ok(item);
      },
      options({ maxConcurrent: 1, continueOnError: false }),
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected abort");
    }
    expect(result.error).toEqual({
      index: 2,
      item: 2,
      error: "item 2 broke",
      completed: 2,
    });
    expect(seen).toEqual([0, 1, 2]);
  });

  it("reports the first failure to complete, not the first dispatched", async () => {
    const processor = new BatchProcessor();

    const result = await processor.run(
      [{ name: "slow", delay: 40 }, { name: "fast", delay: 5 }],
      async (item): Promise<Result<never, string>> => {
        await tick(item.delay);
        return err(item.name);
      },
      options({ continueOnError: false }),
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected abort");
    }
    expect(result.error.error).toBe("fast");
  });

  it("aborts on fatal errors even when continuing on error", async () => {
    const processor = new BatchProcessor();

    const result = await processor.run(
      ["ok", "auth", "ok"],
      async (item): Promise<Result<string, string>> =>
        item === "auth" ? err("auth") : ok(item),
      options({
        maxConcurrent: 1,
        isFatal: (error) => error === "auth",
      }),
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected abort");
    }
    expect(result.error.index).toBe(1);
  });

  it("never exceeds the concurrency ceiling", async () => {
    const processor = new BatchProcessor();
    let active = 0;
    let peak = 0;

    await processor.run(
      Array.from({ length: 8 }, (_, index) => index),
      async (item): Promise<Result<number, string>> => {
        active += 1;
        peak = Math.max(peak, active);
        await tick(5);
        active -= 1;
        return ok(item);
      },
      options({ maxConcurrent: 3 }),
    );

    expect(peak).toBe(3);
  });

  it("sleeps between chunks but not after the last one", async () => {
    const processor = new BatchProcessor();
    const pauses: number[] = [];

    const result = await processor.run(
      [1, 2, 3, 4, 5],
      async (item): Promise<Result<number, string>> => ok(item),
      options({
        batchSize: 2,
        interBatchDelayMs: 50,
        sleep: async (ms) => {
          pauses.push(ms);
        },
      }),
    );

    expect(result.isOk()).toBe(true);
    expect(pauses).toEqual([50, 50]);
  });

  it("returns an empty outcome for no items", async () => {
    const processor = new BatchProcessor();

    const result = await processor.run(
      [],
      async (): Promise<Result<number, string>> => ok(1),
      options(),
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error("expected outcome");
    }
    expect(result.value).toEqual({
      successes: [],
      failures: [],
      totalProcessed: 0,
      successRate: 0,
    });
  });

  it("rejects invalid chunk sizes", async () => {
    const processor = new BatchProcessor();

    await expect(
      processor.run(
        [1],
        async (): Promise<Result<number, string>> => ok(1),
        options({ batchSize: 0 }),
      ),
    ).rejects.toThrow("batchSize must be an integer >= 1");
  });
});
