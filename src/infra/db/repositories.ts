import { and, asc, count, desc, eq, gt, gte, lt, lte, sql, type SQL } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { CachedResponseEntity } from "../../core/entities/cache";
import { decodeEntityId, isEntityType } from "../../core/entities/entityId";
import type {
  BatchRunState,
  ProcessRunEntity,
} from "../../core/entities/loader";
import type { QuoteEntity } from "../../core/entities/quote";
import type {
  SourceMappingEntity,
  SymbolEntity,
} from "../../core/entities/security";
import type {
  CacheRepositoryPort,
  CacheSourceSummary,
  ClockPort,
  EntityIdRange,
  ProcessCompletion,
  ProcessRunHandle,
  ProcessTrackerPort,
  QuoteRepositoryPort,
  RunIdGeneratorPort,
  SourceMappingRepositoryPort,
  SymbolRepositoryPort,
} from "../../core/ports/outboundPorts";
import {
  apiResponseCacheTable,
  processRunsTable,
  quotesTable,
  symbolMappingsTable,
  symbolsTable,
} from "./schema";

type Db = PostgresJsDatabase<Record<string, never>>;

const SCAN_PAGE_SIZE = 1_000;

const toSymbolEntity = (
  row: typeof symbolsTable.$inferSelect,
): SymbolEntity => ({
  sid: row.sid,
  symbol: row.symbol,
  name: row.name,
  entityType: isEntityType(row.entityType)
    ? row.entityType
    : decodeEntityId(row.sid).type,
  createdAt: row.createdAt,
});

/**
 * Symbol master table; ids are assigned by the caller and never reused.
 */
export class PostgresSymbolRepositoryService implements SymbolRepositoryPort {
  constructor(private readonly db: Db) {}

  async findBySymbol(symbol: string): Promise<SymbolEntity | null> {
    const rows = await this.db
      .select()
      .from(symbolsTable)
      .where(eq(symbolsTable.symbol, symbol.trim().toUpperCase()))
      .limit(1);
    const [row] = rows;
    return row ? toSymbolEntity(row) : null;
  }

  async listAll(): Promise<SymbolEntity[]> {
    const rows = await this.db
      .select()
      .from(symbolsTable)
      .orderBy(asc(symbolsTable.symbol));
    return rows.map(toSymbolEntity);
  }

  async insert(symbol: SymbolEntity): Promise<void> {
    await this.db.insert(symbolsTable).values(symbol);
  }

  /**
   * Walks one type's id range in keyset pages so large universes never load at once.
   */
  async *scanIds(range: EntityIdRange): AsyncIterable<bigint> {
    let after: bigint | null = null;

    while (true) {
      const lowerBound: SQL =
        after === null
          ? gte(symbolsTable.sid, range.min)
          : gt(symbolsTable.sid, after);
      const rows = await this.db
        .select({ sid: symbolsTable.sid })
        .from(symbolsTable)
        .where(and(lowerBound, lte(symbolsTable.sid, range.max)))
        .orderBy(asc(symbolsTable.sid))
        .limit(SCAN_PAGE_SIZE);

      for (const row of rows) {
        yield row.sid;
      }

      const last = rows.at(-1);
      if (!last || rows.length < SCAN_PAGE_SIZE) {
        return;
      }
      after = last.sid;
    }
  }
}

/**
 * Per-source symbol identifiers, verified whenever a source answers for them.
 */
export class PostgresSourceMappingRepositoryService
  implements SourceMappingRepositoryPort
{
  constructor(private readonly db: Db) {}

  async find(
    sid: bigint,
    sourceName: string,
  ): Promise<SourceMappingEntity | null> {
    const rows = await this.db
      .select()
      .from(symbolMappingsTable)
      .where(
        and(
          eq(symbolMappingsTable.sid, sid),
          eq(symbolMappingsTable.sourceName, sourceName),
        ),
      )
      .limit(1);
    return rows.at(0) ?? null;
  }

  async listBySid(sid: bigint): Promise<SourceMappingEntity[]> {
    return this.db
      .select()
      .from(symbolMappingsTable)
      .where(eq(symbolMappingsTable.sid, sid))
      .orderBy(asc(symbolMappingsTable.sourceName));
  }

  async upsertVerified(
    sid: bigint,
    sourceName: string,
    sourceIdentifier: string,
    verifiedAt: Date,
  ): Promise<void> {
    await this.db
      .insert(symbolMappingsTable)
      .values({
        sid,
        sourceName,
        sourceIdentifier,
        verified: true,
        lastVerifiedAt: verifiedAt,
        createdAt: verifiedAt,
        updatedAt: verifiedAt,
      })
      .onConflictDoUpdate({
        target: [symbolMappingsTable.sid, symbolMappingsTable.sourceName],
        set: {
          sourceIdentifier: sql`excluded.source_identifier`,
          verified: true,
          lastVerifiedAt: sql`excluded.last_verified_at`,
          updatedAt: sql`excluded.updated_at`,
        },
      });
  }
}

/**
 * Shared API response cache; one row per cache key, overwritten on refresh.
 */
export class PostgresCacheRepositoryService implements CacheRepositoryPort {
  constructor(private readonly db: Db) {}

  async find(
    cacheKey: string,
    apiSource: string,
  ): Promise<CachedResponseEntity | null> {
    const rows = await this.db
      .select()
      .from(apiResponseCacheTable)
      .where(
        and(
          eq(apiResponseCacheTable.cacheKey, cacheKey),
          eq(apiResponseCacheTable.apiSource, apiSource),
        ),
      )
      .limit(1);
    return rows.at(0) ?? null;
  }

  async upsert(entry: CachedResponseEntity): Promise<void> {
    await this.db
      .insert(apiResponseCacheTable)
      .values(entry)
      .onConflictDoUpdate({
        target: apiResponseCacheTable.cacheKey,
        set: {
          apiSource: sql`excluded.api_source`,
          endpointUrl: sql`excluded.endpoint_url`,
          responseData: sql`excluded.response_data`,
          statusCode: sql`excluded.status_code`,
          cachedAt: sql`excluded.cached_at`,
          expiresAt: sql`excluded.expires_at`,
        },
      });
  }

  async deleteExpired(apiSource: string, now: Date): Promise<number> {
    const removed = await this.db
      .delete(apiResponseCacheTable)
      .where(
        and(
          eq(apiResponseCacheTable.apiSource, apiSource),
          lt(apiResponseCacheTable.expiresAt, now),
        ),
      )
      .returning({ cacheKey: apiResponseCacheTable.cacheKey });
    return removed.length;
  }

  async summarize(now: Date): Promise<CacheSourceSummary[]> {
    const rows = await this.db
      .select({
        apiSource: apiResponseCacheTable.apiSource,
        total: count(),
        live: sql<number>`count(*) filter (where ${apiResponseCacheTable.expiresAt} > ${now})`.mapWith(
          Number,
        ),
      })
      .from(apiResponseCacheTable)
      .groupBy(apiResponseCacheTable.apiSource)
      .orderBy(asc(apiResponseCacheTable.apiSource));

    return rows.map((row) => ({
      apiSource: row.apiSource,
      live: row.live,
      expired: row.total - row.live,
    }));
  }
}

/**
 * Latest quotes, unique per symbol and observation time.
 */
export class PostgresQuoteRepositoryService implements QuoteRepositoryPort {
  constructor(private readonly db: Db) {}

  async upsert(quote: QuoteEntity): Promise<void> {
    await this.db
      .insert(quotesTable)
      .values(quote)
      .onConflictDoUpdate({
        target: [quotesTable.sid, quotesTable.asOf],
        set: {
          source: sql`excluded.source`,
          price: sql`excluded.price`,
          open: sql`excluded.open`,
          high: sql`excluded.high`,
          low: sql`excluded.low`,
          previousClose: sql`excluded.previous_close`,
          change: sql`excluded.change`,
          changePercent: sql`excluded.change_percent`,
          volume: sql`excluded.volume`,
        },
      });
  }

  async latestBySid(sid: bigint): Promise<QuoteEntity | null> {
    const rows = await this.db
      .select()
      .from(quotesTable)
      .where(eq(quotesTable.sid, sid))
      .orderBy(desc(quotesTable.asOf))
      .limit(1);
    return rows.at(0) ?? null;
  }
}

const runStates: ReadonlyArray<ProcessRunEntity["endState"]> = [
  "running",
  "success",
  "completed_with_errors",
  "failed",
];

const toRunState = (value: string): ProcessRunEntity["endState"] =>
  runStates.find((state) => state === value) ?? "failed";

/**
 * Records loader run lifecycles in `process_runs` for the status command.
 */
export class PostgresProcessTrackerService implements ProcessTrackerPort {
  constructor(
    private readonly db: Db,
    private readonly clock: ClockPort,
    private readonly ids: RunIdGeneratorPort,
  ) {}

  async start(processName: string): Promise<ProcessRunHandle> {
    const handle = {
      id: this.ids.next(),
      processName,
      startedAt: this.clock.now(),
    };
    await this.db.insert(processRunsTable).values({
      ...handle,
      endState: "running",
      recordsProcessed: 0,
    });
    return handle;
  }

  async complete(
    handle: ProcessRunHandle,
    state: BatchRunState,
    completion: ProcessCompletion,
  ): Promise<void> {
    await this.db
      .update(processRunsTable)
      .set({
        endedAt: this.clock.now(),
        endState: state,
        errorMessage: completion.errorMessage ?? null,
        recordsProcessed: completion.recordsProcessed,
      })
      .where(eq(processRunsTable.id, handle.id));
  }

  async recent(limit: number): Promise<ProcessRunEntity[]> {
    const rows = await this.db
      .select()
      .from(processRunsTable)
      .orderBy(desc(processRunsTable.startedAt))
      .limit(limit);
    return rows.map((row) => ({ ...row, endState: toRunState(row.endState) }));
  }
}
