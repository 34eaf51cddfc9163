import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../types/logger.js';
import { LLMError, TimeoutError, errorMessage, isAbortError } from './errors.js';

/**
 * Retry policy for calls that may fail transiently (model streams, store writes).
 */
export interface RetryPolicy {
  /** Additional attempts after the first failure */
  maxRetries: number;
  /** Delay before the first retry; doubles on every further retry */
  baseDelayMs: number;
  /** Upper bound on a single backoff delay */
  maxDelayMs: number;
  /** Per-attempt time budget (0 = none). Exceeding it counts as a failed attempt. */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  timeoutMs: 120_000,
};

/**
 * Exponential backoff: base, 2×base, 4×base ... capped at maxDelayMs.
 */
export function backoffDelay(policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>, retry: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, retry), policy.maxDelayMs);
}

/**
 * Sleep that ends early (with an AbortError) when `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : undefined);
}

/**
 * Run `fn` with a time budget. The signal handed to `fn` aborts on timeout
 * or when `parent` aborts, so streams can stop reading.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
  operation?: string
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const work = fn(controller.signal);
  // Once the timeout wins the race, the aborted work settles late; the race already reported it
  void work.catch(() => undefined);
  const guarded: Promise<T>[] = [work];
  if (timeoutMs > 0 && Number.isFinite(timeoutMs)) {
    guarded.push(
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new TimeoutError(timeoutMs, operation);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      })
    );
  }

  try {
    return await Promise.race(guarded);
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export interface RetryOptions {
  logger?: Logger | undefined;
  /** Name used in log lines */
  label?: string | undefined;
  /** Abort retries (and the current attempt) */
  signal?: AbortSignal | undefined;
  /** Consulted after a failed attempt; false rethrows the error at once */
  shouldRetry?: ((error: unknown) => boolean) | undefined;
}

/**
 * Execute `operation` under `policy`.
 *
 * Non-retryable LLM errors, aborts from `options.signal` and errors that
 * `options.shouldRetry` rejects are rethrown at once; anything else is retried until the budget is spent, then the last
 * error is thrown.
 */
export async function retryWithBackoff<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const { logger, label = 'operation', signal, shouldRetry } = options;
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    try {
      return await withTimeout(operation, policy.timeoutMs, signal, label);
    } catch (error) {
      lastError = error;

      if (signal?.aborted || (isAbortError(error) && !(error instanceof TimeoutError))) {
        throw error;
      }
      if (error instanceof LLMError && !error.retryable) {
        logger?.error({ label, error: error.message }, 'Non-retryable failure');
        throw error;
      }
      if (shouldRetry && !shouldRetry(error)) {
        throw error;
      }

      if (attempt < policy.maxRetries) {
        const backoffMs = backoffDelay(policy, attempt);
        logger?.warn(
          { label, attempt: attempt + 1, maxRetries: policy.maxRetries, backoffMs, error: errorMessage(error) },
          'Retrying after transient error'
        );
        await sleep(backoffMs, signal);
      } else {
        logger?.error(
          { label, attempts: policy.maxRetries + 1, error: errorMessage(error) },
          'All retry attempts exhausted'
        );
      }
    }
  }

  throw lastError instanceof Error ? lastError : new Error(errorMessage(lastError));
}
