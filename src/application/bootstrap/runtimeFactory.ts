import type { QuotePayload } from "../../core/entities/quote";
import type { DataSourcePort } from "../../core/ports/inboundPorts";
import type {
  CacheRepositoryPort,
  ClockPort,
  ProcessTrackerPort,
  QuoteRepositoryPort,
  RunIdGeneratorPort,
  SourceMappingRepositoryPort,
  SymbolRepositoryPort,
} from "../../core/ports/outboundPorts";
import { createDb } from "../../infra/db/client";
import {
  InMemoryCacheRepository,
  InMemoryProcessTracker,
  InMemoryQuoteRepository,
  InMemorySourceMappingRepository,
  InMemorySymbolRepository,
} from "../../infra/db/inMemoryRepositories";
import {
  PostgresCacheRepositoryService,
  PostgresProcessTrackerService,
  PostgresQuoteRepositoryService,
  PostgresSourceMappingRepositoryService,
  PostgresSymbolRepositoryService,
} from "../../infra/db/repositories";
import { AlphaVantageQuoteSource } from "../../infra/providers/alphavantage/alphaVantageQuoteSource";
import { FinnhubQuoteSource } from "../../infra/providers/finnhub/finnhubQuoteSource";
import { MockQuoteSource } from "../../infra/providers/mocks/mockQuoteSource";
import {
  SystemClock,
  UuidRunIdGenerator,
} from "../../infra/system/systemPorts";
import type { AppConfig } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { BatchProcessor } from "../services/batchProcessor";
import { CacheStore } from "../services/cacheStore";
import { LoaderPipeline } from "../services/loaderPipeline";
import { QuoteLoaderService } from "../services/quoteLoaderService";
import { SourceFallbackCoordinator } from "../services/sourceFallbackCoordinator";
import { SymbolRegistryService } from "../services/symbolRegistryService";

type Storage = {
  symbols: SymbolRepositoryPort;
  mappings: SourceMappingRepositoryPort;
  cacheEntries: CacheRepositoryPort;
  quotes: QuoteRepositoryPort;
  tracker: ProcessTrackerPort;
  close: () => Promise<void>;
};

export type RuntimeOverrides = {
  clock?: ClockPort;
  runIds?: RunIdGeneratorPort;
  sleep?: (ms: number) => Promise<void>;
};

const createStorage = (
  config: AppConfig,
  clock: ClockPort,
  runIds: RunIdGeneratorPort,
): Storage => {
  if (config.storageDriver === "memory") {
    return {
      symbols: new InMemorySymbolRepository(),
      mappings: new InMemorySourceMappingRepository(),
      cacheEntries: new InMemoryCacheRepository(),
      quotes: new InMemoryQuoteRepository(),
      tracker: new InMemoryProcessTracker(clock, runIds),
      close: async () => undefined,
    };
  }

  const { db, sql } = createDb(config.postgres.url, config.postgres.poolMax);
  return {
    symbols: new PostgresSymbolRepositoryService(db),
    mappings: new PostgresSourceMappingRepositoryService(db),
    cacheEntries: new PostgresCacheRepositoryService(db),
    quotes: new PostgresQuoteRepositoryService(db),
    tracker: new PostgresProcessTrackerService(db, clock, runIds),
    close: async () => {
      await sql.end({ timeout: 5 });
    },
  };
};

/**
 * Builds one adapter per configured source name, in priority order.
 */
const createQuoteSources = (
  config: AppConfig,
  clock: ClockPort,
): DataSourcePort<QuotePayload>[] =>
  config.quoteSources.map((name) => {
    if (name === "alphavantage") {
      return new AlphaVantageQuoteSource(
        config.alphaVantage.baseUrl,
        config.alphaVantage.apiKey,
        config.alphaVantage.timeoutMs,
      );
    }
    if (name === "finnhub") {
      return new FinnhubQuoteSource(
        config.finnhub.baseUrl,
        config.finnhub.apiKey,
        config.finnhub.timeoutMs,
      );
    }
    return new MockQuoteSource(clock);
  });

/**
 * Composition root shared by every CLI command.
 */
export const createRuntime = (
  config: AppConfig,
  overrides: RuntimeOverrides = {},
) => {
  const clock = overrides.clock ?? new SystemClock();
  const runIds = overrides.runIds ?? new UuidRunIdGenerator();
  const storage = createStorage(config, clock, runIds);

  const cache = new CacheStore(storage.cacheEntries, clock, {
    enabled: config.cache.enabled,
    forceRefresh: config.cache.forceRefresh,
    defaultTtlMs: config.cache.quotesTtlMs,
  });
  const coordinator = new SourceFallbackCoordinator(
    createQuoteSources(config, clock),
    storage.mappings,
    cache,
    clock,
    "quotes",
  );
  const pipeline = new LoaderPipeline<QuotePayload>(
    coordinator,
    cache,
    new BatchProcessor(),
    storage.tracker,
    clock,
    runIds,
    config.loader,
    { sleep: overrides.sleep },
  );

  logger.debug(
    {
      storage: config.storageDriver,
      sources: config.quoteSources,
      cacheEnabled: config.cache.enabled,
    },
    "Runtime created",
  );

  return {
    config,
    clock,
    cache,
    processTracker: storage.tracker,
    sourceMappings: storage.mappings,
    symbolRegistry: new SymbolRegistryService(
      storage.symbols,
      clock,
      config.quoteSources,
    ),
    quoteLoader: new QuoteLoaderService(
      pipeline,
      storage.quotes,
      clock,
      config.cache.quotesTtlMs,
    ),
    close: storage.close,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
