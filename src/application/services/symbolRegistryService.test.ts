import { describe, expect, it } from "vitest";
import {
  decodeEntityId,
  encodeEntityId,
} from "../../core/entities/entityId";
import type { SymbolEntity } from "../../core/entities/security";
import { InMemorySymbolRepository } from "../../infra/db/inMemoryRepositories";
import { SymbolRegistryService } from "./symbolRegistryService";

const clock = { now: () => new Date("2026-05-04T09:30:00.000Z") };
const sources = ["finnhub", "mock"];

const seeded = async (entities: SymbolEntity[]) => {
  const repository = new InMemorySymbolRepository();
  for (const entity of entities) {
    await repository.insert(entity);
  }
  return repository;
};

describe("SymbolRegistryService", () => {
  it("assigns typed ids after the highest persisted sequence", async () => {
    const repository = await seeded([
      {
        sid: encodeEntityId("equity", 41),
        symbol: "MSFT",
        name: "Microsoft",
        entityType: "equity",
        createdAt: clock.now(),
      },
    ]);
    const registry = new SymbolRegistryService(repository, clock, sources);

    const stock = await registry.register({
      symbol: " aapl ",
      name: "Apple",
      assetType: "Common Stock",
    });
    const coin = await registry.register({
      symbol: "BTC",
      assetType: "Digital Currency",
    });

    if (stock.isErr() || coin.isErr()) {
      throw new Error("expected registrations to succeed");
    }
    expect(stock.value.entity).toMatchObject({
      sid: 42n,
      symbol: "AAPL",
      name: "Apple",
      entityType: "equity",
    });
    expect(decodeEntityId(coin.value.entity.sid)).toEqual({
      type: "cryptocurrency",
      seq: 1n,
    });
    expect(coin.value.entity.name).toBe("BTC");
  });

  it("returns the existing symbol instead of registering twice", async () => {
    const registry = new SymbolRegistryService(
      new InMemorySymbolRepository(),
      clock,
      sources,
    );

    const first = await registry.register({ symbol: "SPY", assetType: "ETF" });
    const second = await registry.register({ symbol: "spy", assetType: "ETF" });

    if (first.isErr() || second.isErr()) {
      throw new Error("expected registrations to succeed");
    }
    expect(second.value.created).toBe(false);
    expect(second.value.entity.sid).toBe(first.value.entity.sid);
    expect(await registry.list()).toHaveLength(1);
  });

  it("settles concurrent registrations of one symbol on a single row", async () => {
    const registry = new SymbolRegistryService(
      new InMemorySymbolRepository(),
      clock,
      sources,
    );

    const [left, right] = await Promise.all([
      registry.register({ symbol: "NVDA", assetType: "Equity" }),
      registry.register({ symbol: "nvda", assetType: "Equity" }),
    ]);

    if (left.isErr() || right.isErr()) {
      throw new Error("expected both registrations to succeed");
    }
    expect(left.value.entity.sid).toBe(right.value.entity.sid);
    expect(
      [left.value.created, right.value.created].sort(),
    ).toEqual([false, true]);
    expect(await registry.list()).toHaveLength(1);
  });

  it("rejects empty symbols", async () => {
    const registry = new SymbolRegistryService(
      new InMemorySymbolRepository(),
      clock,
      sources,
    );

    const result = await registry.register({ symbol: "  ", assetType: "ETF" });

    if (result.isOk()) {
      throw new Error("expected validation failure");
    }
    expect(result.error.code).toBe("validation_error");
  });

  it("reports repository failures as persistence errors", async () => {
    const repository = new InMemorySymbolRepository();
    repository.findBySymbol = async () => {
      throw new Error("connection refused");
    };
    const registry = new SymbolRegistryService(repository, clock, sources);

    const result = await registry.register({ symbol: "IBM", assetType: "Equity" });

    if (result.isOk()) {
      throw new Error("expected persistence failure");
    }
    expect(result.error).toMatchObject({
      code: "persistence_error",
      kind: "persistence",
      message: "connection refused",
    });
  });

  it("builds tasks for requested or all symbols", async () => {
    const registry = new SymbolRegistryService(
      new InMemorySymbolRepository(),
      clock,
      sources,
    );
    await registry.register({ symbol: "AAPL", assetType: "Equity" });
    await registry.register({ symbol: "IBM", assetType: "Equity" });

    const all = await registry.tasksFor();
    const some = await registry.tasksFor(["ibm"]);
    const missing = await registry.tasksFor(["NOPE"]);

    if (all.isErr() || some.isErr()) {
      throw new Error("expected tasks");
    }
    expect(all.value).toEqual([
      { sid: 1n, symbol: "AAPL", sources: ["finnhub", "mock"] },
      { sid: 2n, symbol: "IBM", sources: ["finnhub", "mock"] },
    ]);
    expect(some.value).toEqual([
      { sid: 2n, symbol: "IBM", sources: ["finnhub", "mock"] },
    ]);
    if (missing.isOk()) {
      throw new Error("expected missing symbol");
    }
    expect(missing.error.message).toBe("Symbol NOPE is not registered.");
  });
});
