import { err, ok, type Result } from "neverthrow";
import type { z } from "zod";
import {
  boundaryError,
  isAbortingError,
  toErrorMessage,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type {
  BatchRunState,
  FetchTask,
  LoaderRunReport,
  TaskOutcome,
} from "../../core/entities/loader";
import type {
  ClockPort,
  ProcessRunHandle,
  ProcessTrackerPort,
  RunIdGeneratorPort,
} from "../../core/ports/outboundPorts";
import type { LoaderConfig } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { retryResult, sleep as defaultSleep } from "../../shared/retry/retry";
import type { BatchProcessor } from "./batchProcessor";
import { buildCacheKey, type CacheStore } from "./cacheStore";
import type {
  CachedPayload,
  SourceFallbackCoordinator,
} from "./sourceFallbackCoordinator";

/**
 * Everything a concrete loader contributes: identity, cache policy, payload shape, validation, and persistence.
 */
export type LoaderDefinition<P> = {
  processName: string;
  cachePrefix: string;
  ttlMs: number;
  payloadSchema: z.ZodType<P, z.ZodTypeDef, unknown>;
  requestShape?: Record<string, unknown>;
  // Returning an error skips the task before any network call.
  validate?: (task: FetchTask) => AppBoundaryError | null;
  persist: (task: FetchTask, payload: P, source: string) => Promise<void>;
};

export type PipelineTiming = {
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
};

type PendingTask = {
  index: number;
  task: FetchTask;
  cacheKey: string;
  cached: CachedPayload | null;
};

type TaskFailure = {
  error: AppBoundaryError;
  attempts: number;
  source?: string;
};

type TrackedRun = {
  handle: ProcessRunHandle;
  tracked: boolean;
};

/**
 * Raised when fail-fast mode or an auth failure stops a run; the tracker has already recorded it as failed.
 */
export class LoaderRunAbortedError extends Error {
  constructor(
    readonly report: LoaderRunReport,
    readonly failure: AppBoundaryError,
  ) {
    super(
      `Loader run ${report.processName} aborted: ${failure.provider} ${failure.code}: ${failure.message}`,
    );
    this.name = "LoaderRunAbortedError";
  }
}

export const deriveRunState = (
  succeeded: number,
  failed: number,
): BatchRunState => {
  if (failed === 0) {
    return "success";
  }
  return succeeded > 0 ? "completed_with_errors" : "failed";
};

/**
 * Runs a batch of fetch tasks: validate, cache lookup, gate-bounded fetch with retries, cache write, persist, track.
 */
export class LoaderPipeline<P> {
  constructor(
    private readonly coordinator: SourceFallbackCoordinator<P>,
    private readonly cache: CacheStore,
    private readonly batches: BatchProcessor,
    private readonly tracker: ProcessTrackerPort,
    private readonly clock: ClockPort,
    private readonly runIds: RunIdGeneratorPort,
    private readonly settings: LoaderConfig,
    private readonly timing: PipelineTiming = {},
  ) {}

  /**
   * Returns the run report, or throws LoaderRunAbortedError after recording a failed run.
   * Any other error also leaves the run recorded as failed before it propagates.
   */
  async run(
    definition: LoaderDefinition<P>,
    tasks: readonly FetchTask[],
  ): Promise<LoaderRunReport> {
    const run = await this.startTracking(definition.processName);
    const outcomes = new Map<number, TaskOutcome>();

    logger.info(
      {
        runId: run.handle.id,
        process: definition.processName,
        tasks: tasks.length,
      },
      "Loader run started",
    );

    try {
      return await this.execute(definition, tasks, run, outcomes);
    } catch (error) {
      if (error instanceof LoaderRunAbortedError) {
        throw error;
      }

      const report = this.buildReport(run.handle, "failed", outcomes);
      await this.completeTracking(
        run,
        "failed",
        report,
        `unexpected: ${toErrorMessage(error)}`,
      );
      logger.error(
        {
          runId: run.handle.id,
          process: definition.processName,
          error: toErrorMessage(error),
        },
        "Loader run crashed",
      );
      throw error;
    }
  }

  private async execute(
    definition: LoaderDefinition<P>,
    tasks: readonly FetchTask[],
    run: TrackedRun,
    outcomes: Map<number, TaskOutcome>,
  ): Promise<LoaderRunReport> {
    const pending = await this.prepare(definition, tasks, outcomes);

    const batch = await this.batches.run(
      pending,
      (item) => this.process(definition, item),
      {
        batchSize: this.settings.batchSize,
        maxConcurrent: this.settings.maxConcurrent,
        interBatchDelayMs: this.settings.batchDelayMs,
        continueOnError: this.settings.continueOnError,
        isFatal: (failure) => isAbortingError(failure.error),
        sleep: this.timing.sleep,
      },
    );

    if (batch.isErr()) {
      const abort = batch.error;
      outcomes.set(
        abort.item.index,
        this.failedOutcome(abort.item.task, abort.error),
      );
      const report = this.buildReport(run.handle, "failed", outcomes);
      const failure = abort.error.error;
      await this.completeTracking(
        run,
        "failed",
        report,
        `${failure.provider} ${failure.code}: ${failure.message}`,
      );

      logger.error(
        {
          runId: run.handle.id,
          process: definition.processName,
          sid: abort.item.task.sid.toString(),
          symbol: abort.item.task.symbol,
          code: abort.error.error.code,
          provider: abort.error.error.provider,
        },
        "Loader run aborted",
      );
      throw new LoaderRunAbortedError(report, abort.error.error);
    }

    batch.value.successes.forEach((success) => {
      outcomes.set(success.item.index, success.value);
    });
    batch.value.failures.forEach((failure) => {
      outcomes.set(
        failure.item.index,
        this.failedOutcome(failure.item.task, failure.error),
      );
      logger.warn(
        {
          runId: run.handle.id,
          sid: failure.item.task.sid.toString(),
          symbol: failure.item.task.symbol,
          code: failure.error.error.code,
          provider: failure.error.error.provider,
          attempts: failure.error.attempts,
        },
        "Task failed",
      );
    });

    const counts = this.count(outcomes);
    const state = deriveRunState(counts.succeeded, counts.failed);
    const report = this.buildReport(run.handle, state, outcomes);
    await this.completeTracking(run, state, report);

    logger.info(
      {
        runId: run.handle.id,
        process: definition.processName,
        state,
        succeeded: report.succeeded,
        failed: report.failed,
        skipped: report.skipped,
        cacheHits: report.cacheHits,
      },
      "Loader run completed",
    );

    return report;
  }

  private async prepare(
    definition: LoaderDefinition<P>,
    tasks: readonly FetchTask[],
    outcomes: Map<number, TaskOutcome>,
  ): Promise<PendingTask[]> {
    const prepared = await Promise.all(
      tasks.map(async (task, index): Promise<PendingTask | null> => {
        const rejection = definition.validate?.(task) ?? null;
        if (rejection) {
          outcomes.set(index, {
            sid: task.sid,
            symbol: task.symbol,
            state: "skipped",
            fromCache: false,
            attempts: 0,
            error: rejection,
          });
          return null;
        }

        const cacheKey = buildCacheKey(definition.cachePrefix, {
          sid: task.sid,
          symbol: task.symbol,
          shape: definition.requestShape,
        });
        const cached = await this.coordinator.findCached(
          cacheKey,
          task.sources,
        );
        return { index, task, cacheKey, cached };
      }),
    );

    return prepared.filter((item): item is PendingTask => item !== null);
  }

  private async process(
    definition: LoaderDefinition<P>,
    item: PendingTask,
  ): Promise<Result<TaskOutcome, TaskFailure>> {
    const { task } = item;

    if (item.cached) {
      const parsed = definition.payloadSchema.safeParse(item.cached.payload);
      if (parsed.success) {
        const persisted = await this.persist(
          definition,
          task,
          parsed.data,
          item.cached.source,
        );
        if (persisted.isErr()) {
          return err({ error: persisted.error, attempts: 0 });
        }
        return ok({
          sid: task.sid,
          symbol: task.symbol,
          state: "succeeded",
          fromCache: true,
          source: item.cached.source,
          attempts: 0,
        });
      }

      logger.warn(
        { cacheKey: item.cacheKey, source: item.cached.source },
        "Cached payload failed validation; refetching",
      );
    }

    const fetched = await retryResult(() => this.coordinator.resolve(task), {
      retries: this.settings.maxRetries,
      minDelayMs: this.settings.retryBaseDelayMs,
      maxDelayMs: this.settings.retryMaxDelayMs,
      shouldRetry: (error) => ({
        retry: error.retryable,
        delayMs: error.retryAfterMs,
      }),
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        logger.warn(
          {
            sid: task.sid.toString(),
            symbol: task.symbol,
            provider: error.provider,
            code: error.code,
            attempt,
            maxAttempts,
            delayMs,
          },
          "Retrying fetch after transient failure",
        );
      },
      sleep: this.timing.sleep ?? defaultSleep,
      randomFn: this.timing.randomFn,
    });

    if (fetched.isErr()) {
      const { error, attempts } = fetched.error;
      if (error.kind === "permanent_unsupported") {
        return ok({
          sid: task.sid,
          symbol: task.symbol,
          state: "skipped",
          fromCache: false,
          attempts,
          error,
        });
      }
      return err({ error, attempts });
    }

    const { value: resolved, attempts } = fetched.value;
    await this.cache.set({
      cacheKey: item.cacheKey,
      apiSource: resolved.source,
      endpointUrl: resolved.endpointUrl,
      payload: resolved.payload,
      ttlMs: definition.ttlMs,
      statusCode: resolved.statusCode,
    });

    const persisted = await this.persist(
      definition,
      task,
      resolved.payload,
      resolved.source,
    );
    if (persisted.isErr()) {
      return err({ error: persisted.error, attempts, source: resolved.source });
    }

    return ok({
      sid: task.sid,
      symbol: task.symbol,
      state: "succeeded",
      fromCache: false,
      source: resolved.source,
      attempts,
    });
  }

  private async persist(
    definition: LoaderDefinition<P>,
    task: FetchTask,
    payload: P,
    source: string,
  ): Promise<Result<void, AppBoundaryError>> {
    try {
      await definition.persist(task, payload, source);
      return ok(undefined);
    } catch (error) {
      return err(
        boundaryError({
          source: "persistence",
          code: "persistence_error",
          provider: source,
          message: toErrorMessage(error),
          cause: error,
        }),
      );
    }
  }

  private failedOutcome(task: FetchTask, failure: TaskFailure): TaskOutcome {
    return {
      sid: task.sid,
      symbol: task.symbol,
      state: "failed",
      fromCache: false,
      source: failure.source,
      attempts: failure.attempts,
      error: failure.error,
    };
  }

  private count(outcomes: Map<number, TaskOutcome>) {
    const values = [...outcomes.values()];
    return {
      succeeded: values.filter((outcome) => outcome.state === "succeeded")
        .length,
      failed: values.filter((outcome) => outcome.state === "failed").length,
      skipped: values.filter((outcome) => outcome.state === "skipped").length,
      cacheHits: values.filter((outcome) => outcome.fromCache).length,
    };
  }

  private buildReport(
    handle: ProcessRunHandle,
    state: BatchRunState,
    outcomes: Map<number, TaskOutcome>,
  ): LoaderRunReport {
    const ordered = [...outcomes.entries()]
      .sort(([left], [right]) => left - right)
      .map(([, outcome]) => outcome);

    return {
      runId: handle.id,
      processName: handle.processName,
      state,
      startedAt: handle.startedAt,
      endedAt: this.clock.now(),
      ...this.count(outcomes),
      outcomes: ordered,
    };
  }

  private async startTracking(processName: string): Promise<TrackedRun> {
    try {
      return { handle: await this.tracker.start(processName), tracked: true };
    } catch (error) {
      logger.warn(
        { process: processName, error: toErrorMessage(error) },
        "Process tracker start failed; continuing untracked",
      );
      return {
        handle: {
          id: this.runIds.next(),
          processName,
          startedAt: this.clock.now(),
        },
        tracked: false,
      };
    }
  }

  private async completeTracking(
    run: TrackedRun,
    state: BatchRunState,
    report: LoaderRunReport,
    errorMessage?: string,
  ): Promise<void> {
    if (!run.tracked) {
      return;
    }

    try {
      await this.tracker.complete(run.handle, state, {
        recordsProcessed: report.succeeded,
        errorMessage:
          errorMessage ??
          (report.failed > 0 ? `${report.failed} task(s) failed` : undefined),
      });
    } catch (error) {
      logger.warn(
        { runId: run.handle.id, error: toErrorMessage(error) },
        "Process tracker completion failed",
      );
    }
  }
}
