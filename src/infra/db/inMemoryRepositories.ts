import type { CachedResponseEntity } from "../../core/entities/cache";
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

/**
 * Keeps symbols in process memory for tests and `STORAGE_DRIVER=memory` runs.
 */
export class InMemorySymbolRepository implements SymbolRepositoryPort {
  private readonly bySid = new Map<bigint, SymbolEntity>();

  async findBySymbol(symbol: string): Promise<SymbolEntity | null> {
    return this.lookup(symbol) ?? null;
  }

  async listAll(): Promise<SymbolEntity[]> {
    return [...this.bySid.values()].sort((left, right) =>
      left.symbol.localeCompare(right.symbol),
    );
  }

  async insert(symbol: SymbolEntity): Promise<void> {
    if (this.bySid.has(symbol.sid)) {
      throw new Error(`Symbol id ${symbol.sid} already exists.`);
    }
    if (this.lookup(symbol.symbol)) {
      throw new Error(`Symbol ${symbol.symbol} already exists.`);
    }
    this.bySid.set(symbol.sid, { ...symbol });
  }

  async *scanIds(range: EntityIdRange): AsyncIterable<bigint> {
    for (const sid of this.bySid.keys()) {
      if (sid >= range.min && sid <= range.max) {
        yield sid;
      }
    }
  }
  private lookup(symbol: string): SymbolEntity | undefined {
    const wanted = symbol.trim().toUpperCase();
    return [...this.bySid.values()].find((entry) => entry.symbol === wanted);
  }
}

const mappingKey = (sid: bigint, sourceName: string): string =>
  `${sid}:${sourceName}`;

/**
 * In-process source-mapping table unique on (sid, source).
 */
export class InMemorySourceMappingRepository
  implements SourceMappingRepositoryPort
{
  private readonly rows = new Map<string, SourceMappingEntity>();

  async find(
    sid: bigint,
    sourceName: string,
  ): Promise<SourceMappingEntity | null> {
    const row = this.rows.get(mappingKey(sid, sourceName));
    return row ? { ...row } : null;
  }

  async listBySid(sid: bigint): Promise<SourceMappingEntity[]> {
    return [...this.rows.values()]
      .filter((row) => row.sid === sid)
      .map((row) => ({ ...row }));
  }

  async upsertVerified(
    sid: bigint,
    sourceName: string,
    sourceIdentifier: string,
    verifiedAt: Date,
  ): Promise<void> {
    const key = mappingKey(sid, sourceName);
    const existing = this.rows.get(key);
    this.rows.set(key, {
      sid,
      sourceName,
      sourceIdentifier,
      verified: true,
      lastVerifiedAt: verifiedAt,
      createdAt: existing?.createdAt ?? verifiedAt,
      updatedAt: verifiedAt,
    });
  }
}

/**
 * In-process response cache keyed by cache key; rows never expire on their own.
 */
export class InMemoryCacheRepository implements CacheRepositoryPort {
  private readonly rows = new Map<string, CachedResponseEntity>();

  async find(
    cacheKey: string,
    apiSource: string,
  ): Promise<CachedResponseEntity | null> {
    const row = this.rows.get(cacheKey);
    return row && row.apiSource === apiSource ? { ...row } : null;
  }

  async upsert(entry: CachedResponseEntity): Promise<void> {
    this.rows.set(entry.cacheKey, { ...entry });
  }

  async deleteExpired(apiSource: string, now: Date): Promise<number> {
    let removed = 0;
    for (const [key, row] of this.rows) {
      if (
        row.apiSource === apiSource &&
        row.expiresAt.getTime() < now.getTime()
      ) {
        this.rows.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async summarize(now: Date): Promise<CacheSourceSummary[]> {
    const bySource = new Map<string, CacheSourceSummary>();
    for (const row of this.rows.values()) {
      const summary = bySource.get(row.apiSource) ?? {
        apiSource: row.apiSource,
        live: 0,
        expired: 0,
      };
      if (row.expiresAt.getTime() > now.getTime()) {
        summary.live += 1;
      } else {
        summary.expired += 1;
      }
      bySource.set(row.apiSource, summary);
    }
    return [...bySource.values()].sort((left, right) =>
      left.apiSource.localeCompare(right.apiSource),
    );
  }
}

/**
 * In-process quote store unique on (sid, asOf).
 */
export class InMemoryQuoteRepository implements QuoteRepositoryPort {
  private readonly rows = new Map<string, QuoteEntity>();

  async upsert(quote: QuoteEntity): Promise<void> {
    this.rows.set(`${quote.sid}:${quote.asOf.toISOString()}`, { ...quote });
  }

  async latestBySid(sid: bigint): Promise<QuoteEntity | null> {
    const matches = [...this.rows.values()]
      .filter((row) => row.sid === sid)
      .sort((left, right) => right.asOf.getTime() - left.asOf.getTime());
    return matches.at(0) ?? null;
  }
}

/**
 * Records process runs in memory with the same lifecycle as the Postgres tracker.
 */
export class InMemoryProcessTracker implements ProcessTrackerPort {
  private readonly runs = new Map<string, ProcessRunEntity>();

  constructor(
    private readonly clock: ClockPort,
    private readonly ids: RunIdGeneratorPort,
  ) {}

  async start(processName: string): Promise<ProcessRunHandle> {
    const handle = {
      id: this.ids.next(),
      processName,
      startedAt: this.clock.now(),
    };
    this.runs.set(handle.id, {
      ...handle,
      endedAt: null,
      endState: "running",
      errorMessage: null,
      recordsProcessed: 0,
    });
    return handle;
  }

  async complete(
    handle: ProcessRunHandle,
    state: BatchRunState,
    completion: ProcessCompletion,
  ): Promise<void> {
    const run = this.runs.get(handle.id);
    if (!run) {
      throw new Error(`Process run ${handle.id} was never started.`);
    }
    this.runs.set(handle.id, {
      ...run,
      endedAt: this.clock.now(),
      endState: state,
      errorMessage: completion.errorMessage ?? null,
      recordsProcessed: completion.recordsProcessed,
    });
  }

  async recent(limit: number): Promise<ProcessRunEntity[]> {
    return [...this.runs.values()]
      .sort((left, right) => right.startedAt.getTime() - left.startedAt.getTime())
      .slice(0, limit);
  }
}
