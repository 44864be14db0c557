/**
 * Retry/Backoff Policy
 *
 * Wraps one remote call that reports a typed CallOutcome. Retryable outcomes
 * are retried with capped exponential backoff and jitter; fatal outcomes
 * and exhausted retries become an Embedding PipelineFailure carrying the
 * last cause.
 *
 *   delay(attempt) = min(maxDelayMs, baseDelayMs * 2^(attempt - 1)) ± jitter
 *
 * A Retry-After hint from the server raises the delay to at least that value.
 */

import {
  createFailure,
  type PipelineFailure,
} from '../../errors/index.js';
import type { CallOutcome, RetryOptions, RetryReason, RetryRuntime } from './types.js';

/** Defaults, same as the [retry] section of the default config */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: 0.2,
};

/**
 * Sleep that resolves early when the signal aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before the retry that follows failed attempt number `attempt` (1-based).
 *
 * @param random - Uniform [0, 1) source; 0.5 means "no jitter"
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random
): number {
  const exponential = options.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(options.maxDelayMs, exponential);
  const spread = capped * options.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + spread));
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

const REASON_LABEL: Record<RetryReason, string> = {
  rate_limited: 'rate limited',
  transient: 'transient error',
};

/**
 * Run `call` until it succeeds, fails fatally, or attempts run out.
 *
 * `call` receives the 1-based attempt number. It should not throw; if it
 * does, the error is treated as fatal.
 *
 * @returns The success value, or an Embedding failure with `attempts` set
 *
 * @example
 * const vectors = await withRetry(
 *   () => provider.embedBatch(texts, model),
 *   { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitter: 0.2 },
 *   { logger }
 * );
 * if (isPipelineFailure(vectors)) { ... }
 */
export async function withRetry<T>(
  call: (attempt: number) => Promise<CallOutcome<T>>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
  runtime: RetryRuntime = {}
): Promise<T | PipelineFailure> {
  const { sleep = abortableSleep, random = Math.random, logger, signal } = runtime;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  let attempt = 0;
  for (;;) {
    attempt++;

    let outcome: CallOutcome<T>;
    try {
      outcome = await call(attempt);
    } catch (error) {
      outcome = { status: 'fatal', error };
    }

    if (outcome.status === 'success') {
      return outcome.value;
    }

    if (outcome.status === 'fatal') {
      return createFailure('Embedding', errorMessage(outcome.error), outcome.error, {
        retryable: false,
        attempts: attempt,
      });
    }

    const label = REASON_LABEL[outcome.reason];
    if (attempt >= maxAttempts || signal?.aborted) {
      return createFailure(
        'Embedding',
        `${label}: ${errorMessage(outcome.error)}`,
        outcome.error,
        { retryable: true, attempts: attempt }
      );
    }

    const backoff = computeBackoffDelay(attempt, options, random);
    const delayMs = Math.max(backoff, outcome.retryAfterMs ?? 0);
    logger?.debug?.(
      `Attempt ${attempt}/${maxAttempts} ${label} (${errorMessage(outcome.error)}); retrying in ${delayMs}ms`
    );

    await sleep(delayMs, signal);

    if (signal?.aborted) {
      return createFailure(
        'Embedding',
        `${label}: ${errorMessage(outcome.error)}`,
        outcome.error,
        { retryable: true, attempts: attempt }
      );
    }
  }
}
