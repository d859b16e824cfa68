import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import {
  boundaryError,
  type AppBoundaryError,
  type AppBoundaryErrorCode,
} from "../../core/entities/appError";
import type { FetchTask } from "../../core/entities/loader";
import type {
  DataSourcePort,
  SourceFetchRequest,
  SourceFetchResult,
} from "../../core/ports/inboundPorts";
import type { SourceMappingRepositoryPort } from "../../core/ports/outboundPorts";
import {
  InMemoryCacheRepository,
  InMemorySourceMappingRepository,
} from "../../infra/db/inMemoryRepositories";
import { CacheStore } from "./cacheStore";
import { SourceFallbackCoordinator } from "./sourceFallbackCoordinator";

type Price = { price: number };

const fixedNow = new Date("2026-04-01T12:00:00.000Z");
const clock = { now: () => new Date(fixedNow) };

class StubSource implements DataSourcePort<Price> {
  readonly requests: SourceFetchRequest[] = [];

  constructor(
    readonly name: string,
    private readonly respond: (
      request: SourceFetchRequest,
    ) => Result<SourceFetchResult<Price>, AppBoundaryError>,
  ) {}

  async fetch(
    request: SourceFetchRequest,
  ): Promise<Result<SourceFetchResult<Price>, AppBoundaryError>> {
    this.requests.push(request);
    return this.respond(request);
  }
}

const failing = (name: string, code: AppBoundaryErrorCode) =>
  new StubSource(name, () =>
    err(
      boundaryError({
        source: "quotes",
        code,
        provider: name,
        message: `${name} ${code}`,
      }),
    ),
  );

const succeeding = (name: string, price: number, sourceIdentifier?: string) =>
  new StubSource(name, (request) =>
    ok({
      payload: { price },
      endpointUrl: `https://${name}.test/quote?symbol=${request.sourceIdentifier}`,
      statusCode: 200,
      sourceIdentifier,
    }),
  );

const setup = (
  sources: StubSource[],
  mappings: SourceMappingRepositoryPort = new InMemorySourceMappingRepository(),
) => {
  const cache = new CacheStore(new InMemoryCacheRepository(), clock, {
    enabled: true,
    forceRefresh: false,
    defaultTtlMs: 60_000,
  });
  const coordinator = new SourceFallbackCoordinator(
    sources,
    mappings,
    cache,
    clock,
    "quotes",
  );
  return { cache, coordinator, mappings };
};

const task = (...sources: string[]): FetchTask => ({
  sid: 42n,
  symbol: "AAPL",
  sources,
});

describe("SourceFallbackCoordinator.resolve", () => {
  it("falls through to the next source and records only the winning mapping", async () => {
    const mappings = new InMemorySourceMappingRepository();
    const x = failing("x", "not_found");
    const y = succeeding("y", 101.25, "AAPL.Y");
    const { coordinator } = setup([x, y], mappings);

    const result = await coordinator.resolve(task("x", "y"));

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.source).toBe("y");
    expect(result.value.payload).toEqual({ price: 101.25 });
    expect(result.value.mappingCreated).toBe(true);
    expect(result.value.priorFailures.map((failure) => failure.code)).toEqual([
      "not_found",
    ]);
    expect(await mappings.listBySid(42n)).toEqual([
      {
        sid: 42n,
        sourceName: "y",
        sourceIdentifier: "AAPL.Y",
        verified: true,
        lastVerifiedAt: fixedNow,
        createdAt: fixedNow,
        updatedAt: fixedNow,
      },
    ]);
  });

  it("stops at the first success", async () => {
    const x = succeeding("x", 10);
    const y = succeeding("y", 20);
    const { coordinator } = setup([x, y]);

    const result = await coordinator.resolve(task("x", "y"));

    expect(result.isOk() ? result.value.source : null).toBe("x");
    expect(y.requests).toHaveLength(0);
  });

  it("uses a known mapping instead of the canonical symbol", async () => {
    const mappings = new InMemorySourceMappingRepository();
    await mappings.upsertVerified(
      42n,
      "x",
      "AAPL.US",
      new Date("2026-01-01T00:00:00.000Z"),
    );
    const x = succeeding("x", 10);
    const { coordinator } = setup([x], mappings);

    const result = await coordinator.resolve(task("x"));

    expect(x.requests).toEqual([
      { sid: 42n, canonicalSymbol: "AAPL", sourceIdentifier: "AAPL.US" },
    ]);
    expect(result.isOk() ? result.value.mappingCreated : null).toBe(false);
    const [mapping] = await mappings.listBySid(42n);
    expect(mapping?.lastVerifiedAt).toEqual(fixedNow);
    expect(mapping?.createdAt).toEqual(new Date("2026-01-01T00:00:00.000Z"));
  });

  it("returns the last error when every source fails", async () => {
    const { coordinator } = setup([
      failing("x", "rate_limited"),
      failing("y", "not_found"),
    ]);

    const result = await coordinator.resolve(task("x", "y"));

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected failure");
    }
    expect(result.error.provider).toBe("y");
    expect(result.error.code).toBe("not_found");
  });

  it("ends the walk on an auth failure", async () => {
    const y = succeeding("y", 20);
    const { coordinator } = setup([failing("x", "auth_invalid"), y]);

    const result = await coordinator.resolve(task("x", "y"));

    expect(result.isErr() ? result.error.kind : null).toBe(
      "permanent_auth_failure",
    );
    expect(y.requests).toHaveLength(0);
  });

  it("skips sources without an adapter", async () => {
    const { coordinator } = setup([succeeding("y", 20)]);

    const result = await coordinator.resolve(task("missing", "y"));

    expect(result.isOk() ? result.value.priorFailures[0]?.code : null).toBe(
      "unsupported",
    );
  });

  it("treats a throwing adapter as that source failing", async () => {
    const broken = new StubSource("x", () => {
      throw new TypeError("Invalid URL");
    });
    const { coordinator } = setup([broken, succeeding("y", 20)]);

    const result = await coordinator.resolve(task("x", "y"));

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.source).toBe("y");
    expect(result.value.priorFailures).toMatchObject([
      {
        source: "quotes",
        code: "transport_error",
        provider: "x",
        message: "Invalid URL",
        retryable: true,
      },
    ]);
  });

  it("tags its own errors with the configured boundary source", async () => {
    const coordinator = new SourceFallbackCoordinator<Price>(
      [],
      new InMemorySourceMappingRepository(),
      new CacheStore(new InMemoryCacheRepository(), clock, {
        enabled: true,
        forceRefresh: false,
        defaultTtlMs: 60_000,
      }),
      clock,
      "symbols",
    );

    const result = await coordinator.resolve(task("missing"));

    if (result.isOk()) {
      throw new Error("expected failure");
    }
    expect(result.error).toMatchObject({
      source: "symbols",
      code: "unsupported",
      provider: "missing",
    });
  });

  it("rejects an empty priority list", async () => {
    const { coordinator } = setup([succeeding("y", 20)]);

    const result = await coordinator.resolve(task());

    expect(result.isErr() ? result.error.code : null).toBe("config_invalid");
  });

  it("keeps the payload when the mapping store fails", async () => {
    const brokenMappings: SourceMappingRepositoryPort = {
      find: async () => {
        throw new Error("mapping table offline");
      },
      listBySid: async () => [],
      upsertVerified: async () => {
        throw new Error("mapping table offline");
      },
    };
    const { coordinator } = setup([succeeding("x", 10)], brokenMappings);

    const result = await coordinator.resolve(task("x"));

    expect(result.isOk() ? result.value.payload : null).toEqual({ price: 10 });
  });
});

describe("SourceFallbackCoordinator.findCached", () => {
  it("returns the first cached source in priority order", async () => {
    const { cache, coordinator } = setup([]);
    await cache.set({
      cacheKey: "quotes_1",
      apiSource: "y",
      endpointUrl: "https://y.test",
      payload: { price: 5 },
    });

    expect(await coordinator.findCached("quotes_1", ["x", "y"])).toEqual({
      source: "y",
      payload: { price: 5 },
      cachedAt: fixedNow,
    });
    expect(await coordinator.findCached("quotes_2", ["x", "y"])).toBeNull();
  });
});
