import { err, ok, type Result } from "neverthrow";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext<E> = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: E;
};

export type RetryOptions<E> = {
  // Attempts after the first one: 3 means up to 4 calls.
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (error: E) => RetryDecision;
  onRetry?: (context: RetryContext<E>) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: (ms: number) => Promise<void>;
};

export type RetrySuccess<T> = {
  value: T;
  attempts: number;
};

export type RetryFailure<E> = {
  error: E;
  attempts: number;
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Exponential backoff capped at `maxDelayMs`; a caller-supplied delay (vendor Retry-After) replaces the exponent.
 */
export const computeBackoffMs = (
  attempt: number,
  options: Pick<
    RetryOptions<unknown>,
    "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio"
  >,
  customDelayMs?: number,
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random } = options;
  const jitterRatio = Math.min(1, Math.max(0, options.jitterRatio ?? 0.2));

  const hasCustomDelay =
    typeof customDelayMs === "number" &&
    Number.isFinite(customDelayMs) &&
    customDelayMs >= 0;
  const backoff = hasCustomDelay
    ? Math.min(maxDelayMs, customDelayMs)
    : Math.min(maxDelayMs, minDelayMs * 2 ** attempt);

  const random = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * jitterRatio * random);
};

/**
 * Re-invokes `fn` while it returns a retryable error, up to `retries` extra attempts.
 */
export const retryResult = async <T, E>(
  fn: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions<E>,
): Promise<Result<RetrySuccess<T>, RetryFailure<E>>> => {
  const maxAttempts = options.retries + 1;
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt += 1) {
    const result = await fn(attempt + 1);
    if (result.isOk()) {
      return ok({ value: result.value, attempts: attempt + 1 });
    }

    const decision = options.shouldRetry(result.error);
    const normalized =
      typeof decision === "boolean" ? { retry: decision } : decision;

    if (attempt >= options.retries || !normalized.retry) {
      return err({ error: result.error, attempts: attempt + 1 });
    }

    const delayMs = computeBackoffMs(
      attempt,
      options,
      "delayMs" in normalized ? normalized.delayMs : undefined,
    );
    options.onRetry?.({
      attempt: attempt + 1,
      maxAttempts,
      delayMs,
      error: result.error,
    });
    await wait(delayMs);
  }
};
