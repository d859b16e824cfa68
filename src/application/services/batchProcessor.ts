import { err, ok, type Result } from "neverthrow";
import { createLimiter } from "../../shared/concurrency/limiter";
import { sleep as defaultSleep } from "../../shared/retry/retry";

export type BatchOptions<E> = {
  batchSize: number;
  maxConcurrent: number;
  interBatchDelayMs: number;
  continueOnError: boolean;
  // Errors that abort the run even when continueOnError is set.
  isFatal?: (error: E) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

export type BatchSuccess<T, R> = {
  index: number;
  item: T;
  value: R;
};

export type BatchFailure<T, E> = {
  index: number;
  item: T;
  error: E;
};

export type BatchOutcome<T, R, E> = {
  successes: BatchSuccess<T, R>[];
  failures: BatchFailure<T, E>[];
  totalProcessed: number;
  successRate: number;
};

export type BatchAbort<T, E> = BatchFailure<T, E> & {
  completed: number;
};

const assertPositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be an integer >= 1`);
  }
};

/**
 * Runs items through a transform in fixed-size chunks with a concurrency ceiling and a pause between chunks.
 */
export class BatchProcessor {
  /**
   * Collects every success and failure, or stops dispatching at the first failure (in completion order)
   * when continueOnError is off or the error is fatal.
   */
  async run<T, R, E>(
    items: readonly T[],
    transform: (item: T, index: number) => Promise<Result<R, E>>,
    options: BatchOptions<E>,
  ): Promise<Result<BatchOutcome<T, R, E>, BatchAbort<T, E>>> {
    assertPositiveInteger("batchSize", options.batchSize);
    const limit = createLimiter(options.maxConcurrent);
    const wait = options.sleep ?? defaultSleep;

    const successes: BatchSuccess<T, R>[] = [];
    const failures: BatchFailure<T, E>[] = [];
    const state: { abort: BatchAbort<T, E> | null } = { abort: null };

    for (let start = 0; start < items.length; start += options.batchSize) {
      const chunk = items.slice(start, start + options.batchSize);

      await Promise.all(
        chunk.map((item, offset) =>
          limit(async () => {
            if (state.abort) {
              return;
            }

            const index = start + offset;
            const result = await transform(item, index);
            if (state.abort) {
              return;
            }

            if (result.isOk()) {
              successes.push({ index, item, value: result.value });
              return;
            }

            const fatal =
              !options.continueOnError ||
              (options.isFatal?.(result.error) ?? false);
            if (fatal) {
              state.abort = {
                index,
                item,
                error: result.error,
                completed: successes.length + failures.length,
              };
              return;
            }

            failures.push({ index, item, error: result.error });
          }),
        ),
      );

      if (state.abort) {
        return err(state.abort);
      }

      const hasMore = start + options.batchSize < items.length;
      if (hasMore && options.interBatchDelayMs > 0) {
        await wait(options.interBatchDelayMs);
      }
    }

    const totalProcessed = successes.length + failures.length;
    const byIndex = <V extends { index: number }>(left: V, right: V) =>
      left.index - right.index;

    return ok({
      successes: successes.sort(byIndex),
      failures: failures.sort(byIndex),
      totalProcessed,
      successRate: totalProcessed === 0 ? 0 : successes.length / totalProcessed,
    });
  }
}
