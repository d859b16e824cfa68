import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  isAbortingError,
  toErrorMessage,
  type AppBoundaryError,
  type AppBoundarySource,
} from "../../core/entities/appError";
import type { FetchTask } from "../../core/entities/loader";
import type { SourceMappingEntity } from "../../core/entities/security";
import type {
  DataSourcePort,
  SourceFetchRequest,
  SourceFetchResult,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  SourceMappingRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CacheStore } from "./cacheStore";

export type ResolvedPayload<P> = {
  source: string;
  payload: P;
  endpointUrl: string;
  statusCode: number;
  sourceIdentifier: string;
  mappingCreated: boolean;
  priorFailures: AppBoundaryError[];
};

export type CachedPayload = {
  source: string;
  payload: unknown;
  cachedAt: Date;
};

/**
 * Resolves one payload per entity by walking sources in priority order, first success wins.
 * Successful lookups persist the identifier that worked so later runs go straight to it.
 */
export class SourceFallbackCoordinator<P> {
  private readonly sources: Map<string, DataSourcePort<P>>;

  constructor(
    sources: DataSourcePort<P>[],
    private readonly mappings: SourceMappingRepositoryPort,
    private readonly cache: CacheStore,
    private readonly clock: ClockPort,
    private readonly boundarySource: AppBoundarySource,
  ) {
    this.sources = new Map(sources.map((source) => [source.name, source]));
  }

  /**
   * Tries the task's sources strictly in order. Returns the last error when all fail; an auth failure ends the walk at once.
   */
  async resolve(
    task: FetchTask,
  ): Promise<Result<ResolvedPayload<P>, AppBoundaryError>> {
    const failures: AppBoundaryError[] = [];

    for (const sourceName of task.sources) {
      const source = this.sources.get(sourceName);
      if (!source) {
        failures.push(
          boundaryError({
            source: this.boundarySource,
            code: "unsupported",
            provider: sourceName,
            message: `No adapter is registered for source '${sourceName}'.`,
          }),
        );
        continue;
      }

      const mapping = await this.findMapping(task.sid, sourceName);
      const sourceIdentifier = mapping?.sourceIdentifier ?? task.symbol;

      const fetched = await this.fetchFrom(source, {
        sid: task.sid,
        canonicalSymbol: task.symbol,
        sourceIdentifier,
      });

      if (fetched.isErr()) {
        const failure = fetched.error;
        failures.push(failure);
        logger.debug(
          {
            sid: task.sid.toString(),
            symbol: task.symbol,
            source: sourceName,
            code: failure.code,
            kind: failure.kind,
          },
          "Source failed; trying next in priority order",
        );

        if (isAbortingError(failure)) {
          return err(failure);
        }
        continue;
      }

      const resolvedIdentifier =
        fetched.value.sourceIdentifier ?? sourceIdentifier;
      await this.recordMapping(task, sourceName, resolvedIdentifier, mapping);

      return ok({
        source: sourceName,
        payload: fetched.value.payload,
        endpointUrl: fetched.value.endpointUrl,
        statusCode: fetched.value.statusCode,
        sourceIdentifier: resolvedIdentifier,
        mappingCreated: mapping === null,
        priorFailures: failures,
      });
    }

    const last = failures.at(-1);
    if (last) {
      return err(last);
    }

    return err(
      boundaryError({
        source: this.boundarySource,
        code: "config_invalid",
        provider: "none",
        message: "Source priority list is empty.",
      }),
    );
  }

  /**
   * Returns the first live cached response along the priority list, or null.
   */
  async findCached(
    cacheKey: string,
    priority: readonly string[],
  ): Promise<CachedPayload | null> {
    for (const sourceName of priority) {
      const lookup = await this.cache.get(cacheKey, sourceName);
      if (lookup.status === "hit") {
        return {
          source: sourceName,
          payload: lookup.payload,
          cachedAt: lookup.cachedAt,
        };
      }
      if (lookup.reason === "disabled") {
        return null;
      }
    }
    return null;
  }

  // A throwing adapter counts as that source failing.
  private async fetchFrom(
    source: DataSourcePort<P>,
    request: SourceFetchRequest,
  ): Promise<Result<SourceFetchResult<P>, AppBoundaryError>> {
    try {
      return await source.fetch(request);
    } catch (error) {
      return err(
        boundaryError({
          source: this.boundarySource,
          code: "transport_error",
          provider: source.name,
          message: toErrorMessage(error),
          cause: error,
        }),
      );
    }
  }

  private async findMapping(
    sid: bigint,
    sourceName: string,
  ): Promise<SourceMappingEntity | null> {
    try {
      return await this.mappings.find(sid, sourceName);
    } catch (error) {
      logger.warn(
        { sid: sid.toString(), source: sourceName, error: toErrorMessage(error) },
        "Source mapping lookup failed; using canonical symbol",
      );
      return null;
    }
  }

  private async recordMapping(
    task: FetchTask,
    sourceName: string,
    sourceIdentifier: string,
    existing: SourceMappingEntity | null,
  ): Promise<void> {
    try {
      await this.mappings.upsertVerified(
        task.sid,
        sourceName,
        sourceIdentifier,
        this.clock.now(),
      );
      if (!existing) {
        logger.info(
          {
            sid: task.sid.toString(),
            symbol: task.symbol,
            source: sourceName,
            sourceIdentifier,
          },
          "Discovered source mapping",
        );
      }
    } catch (error) {
      logger.warn(
        {
          sid: task.sid.toString(),
          source: sourceName,
          error: toErrorMessage(error),
        },
        "Source mapping write failed; keeping fetched payload",
      );
    }
  }
}
