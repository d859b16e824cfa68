import { describe, expect, it } from "vitest";
import { encodeEntityId } from "../../core/entities/entityId";
import type { QuotePayload } from "../../core/entities/quote";
import {
  InMemoryCacheRepository,
  InMemoryProcessTracker,
  InMemoryQuoteRepository,
  InMemorySourceMappingRepository,
} from "../../infra/db/inMemoryRepositories";
import { MockQuoteSource } from "../../infra/providers/mocks/mockQuoteSource";
import { BatchProcessor } from "./batchProcessor";
import { CacheStore } from "./cacheStore";
import { LoaderPipeline } from "./loaderPipeline";
import {
  quotePayloadSchema,
  QuoteLoaderService,
  toQuoteEntity,
  validateQuoteTask,
} from "./quoteLoaderService";
import { SourceFallbackCoordinator } from "./sourceFallbackCoordinator";

const clock = { now: () => new Date("2026-05-04T09:30:00.000Z") };

const createService = () => {
  const cache = new CacheStore(new InMemoryCacheRepository(), clock, {
    enabled: true,
    forceRefresh: false,
    defaultTtlMs: 60_000,
  });
  const mappings = new InMemorySourceMappingRepository();
  const runIds = { next: () => "run-1" };
  const quotes = new InMemoryQuoteRepository();
  const pipeline = new LoaderPipeline<QuotePayload>(
    new SourceFallbackCoordinator(
      [new MockQuoteSource(clock)],
      mappings,
      cache,
      clock,
      "quotes",
    ),
    cache,
    new BatchProcessor(),
    new InMemoryProcessTracker(clock, runIds),
    clock,
    runIds,
    {
      maxConcurrent: 2,
      batchSize: 10,
      batchDelayMs: 0,
      maxRetries: 0,
      retryBaseDelayMs: 10,
      retryMaxDelayMs: 100,
      continueOnError: true,
    },
  );
  return {
    mappings,
    service: new QuoteLoaderService(pipeline, quotes, clock, 3_600_000),
  };
};

const sources = ["mock"];
const stock = { sid: encodeEntityId("equity", 1), symbol: "AB", sources };
const bond = { sid: encodeEntityId("bond", 1), symbol: "T-2030", sources };

describe("QuoteLoaderService", () => {
  it("loads and stores latest quotes from the first working source", async () => {
    const { mappings, service } = createService();

    const report = await service.load({ tasks: [stock] });

    expect(report).toMatchObject({
      processName: "quotes_latest",
      state: "success",
      succeeded: 1,
    });
    expect(await service.latest(1n)).toEqual({
      sid: 1n,
      source: "mock",
      symbol: "AB",
      price: 206.5,
      open: 207,
      high: 207,
      low: 206.5,
      previousClose: 207,
      change: -0.5,
      changePercent: -0.2415,
      volume: 197000,
      asOf: new Date("2026-05-04T09:30:00.000Z"),
      createdAt: new Date("2026-05-04T09:30:00.000Z"),
    });
    expect(await mappings.find(1n, "mock")).toMatchObject({
      sourceIdentifier: "AB",
      verified: true,
    });
  });

  it("serves repeat loads from the cache", async () => {
    const { service } = createService();

    await service.load({ tasks: [stock] });
    const second = await service.load({ tasks: [stock] });

    expect(second.cacheHits).toBe(1);
    expect(second.outcomes[0]).toMatchObject({
      fromCache: true,
      source: "mock",
    });
  });

  it("skips entity types without quotes", async () => {
    const { service } = createService();

    const report = await service.load({ tasks: [stock, bond] });

    expect(report.skipped).toBe(1);
    expect(report.outcomes[1]).toMatchObject({
      state: "skipped",
      symbol: "T-2030",
      error: { code: "unsupported" },
    });
  });
});

describe("validateQuoteTask", () => {
  it("accepts equity-like types and rejects the rest", () => {
    expect(
      validateQuoteTask({
        sid: encodeEntityId("etf", 3),
        symbol: "SPY",
        sources,
      }),
    ).toBeNull();
    expect(validateQuoteTask(bond)?.message).toBe(
      "Latest quotes are not loaded for Bond T-2030.",
    );
  });
});

describe("quotePayloadSchema", () => {
  it("rejects payloads without a timestamp", () => {
    const parsed = quotePayloadSchema.safeParse({ symbol: "AB", price: 1 });

    expect(parsed.success).toBe(false);
  });
});

describe("toQuoteEntity", () => {
  it("stores absent fields as null", () => {
    const entity = toQuoteEntity(
      stock,
      { symbol: "AB", price: 12.5, asOf: "2026-05-01T00:00:00.000Z" },
      "finnhub",
      clock.now(),
    );

    expect(entity).toMatchObject({
      price: 12.5,
      open: null,
      volume: null,
      source: "finnhub",
      asOf: new Date("2026-05-01T00:00:00.000Z"),
    });
  });
});
