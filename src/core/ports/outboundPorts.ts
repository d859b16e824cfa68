import type { CachedResponseEntity } from "../entities/cache";
import type {
  BatchRunState,
  ProcessRunEntity,
} from "../entities/loader";
import type { QuoteEntity } from "../entities/quote";
import type {
  SourceMappingEntity,
  SymbolEntity,
} from "../entities/security";

export type EntityIdRange = {
  min: bigint;
  max: bigint;
};

export interface SymbolRepositoryPort {
  findBySymbol(symbol: string): Promise<SymbolEntity | null>;
  listAll(): Promise<SymbolEntity[]>;
  insert(symbol: SymbolEntity): Promise<void>;
  scanIds(range: EntityIdRange): AsyncIterable<bigint>;
}

export interface SourceMappingRepositoryPort {
  find(sid: bigint, sourceName: string): Promise<SourceMappingEntity | null>;
  listBySid(sid: bigint): Promise<SourceMappingEntity[]>;
  upsertVerified(
    sid: bigint,
    sourceName: string,
    sourceIdentifier: string,
    verifiedAt: Date,
  ): Promise<void>;
}

export type CacheSourceSummary = {
  apiSource: string;
  live: number;
  expired: number;
};

export interface CacheRepositoryPort {
  find(
    cacheKey: string,
    apiSource: string,
  ): Promise<CachedResponseEntity | null>;
  upsert(entry: CachedResponseEntity): Promise<void>;
  deleteExpired(apiSource: string, now: Date): Promise<number>;
  summarize(now: Date): Promise<CacheSourceSummary[]>;
}

export interface QuoteRepositoryPort {
  upsert(quote: QuoteEntity): Promise<void>;
  latestBySid(sid: bigint): Promise<QuoteEntity | null>;
}

export type ProcessRunHandle = {
  id: string;
  processName: string;
  startedAt: Date;
};

export type ProcessCompletion = {
  recordsProcessed: number;
  errorMessage?: string;
};

export interface ProcessTrackerPort {
  start(processName: string): Promise<ProcessRunHandle>;
  complete(
    handle: ProcessRunHandle,
    state: BatchRunState,
    completion: ProcessCompletion,
  ): Promise<void>;
  recent(limit: number): Promise<ProcessRunEntity[]>;
}

export interface ClockPort {
  now(): Date;
}

export interface RunIdGeneratorPort {
  next(): string;
}
