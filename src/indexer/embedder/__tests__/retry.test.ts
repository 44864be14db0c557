/**
 * Retry/Backoff Policy Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { isPipelineFailure } from '../../../errors/index.js';
import { abortableSleep, computeBackoffDelay, withRetry } from '../retry.js';
import type { CallOutcome, RetryOptions } from '../types.js';

const OPTIONS: RetryOptions = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitter: 0.2 };

/** random() = 0.5 cancels jitter */
const noJitter = (): number => 0.5;

function scripted<T>(outcomes: Array<CallOutcome<T>>) {
  let i = 0;
  return vi.fn(async (_attempt: number): Promise<CallOutcome<T>> => {
    const outcome = outcomes[Math.min(i, outcomes.length - 1)];
    i++;
    if (!outcome) throw new Error('no outcome scripted');
    return outcome;
  });
}

describe('computeBackoffDelay', () => {
  const noJitterOptions = { baseDelayMs: 1000, maxDelayMs: 60000, jitter: 0 };

  it('doubles per attempt', () => {
    expect(computeBackoffDelay(1, noJitterOptions)).toBe(1000);
    expect(computeBackoffDelay(2, noJitterOptions)).toBe(2000);
    expect(computeBackoffDelay(3, noJitterOptions)).toBe(4000);
  });

  it('caps at maxDelayMs', () => {
    expect(computeBackoffDelay(10, noJitterOptions)).toBe(60000);
  });

  it('spreads by the jitter fraction', () => {
    expect(computeBackoffDelay(1, OPTIONS, () => 0)).toBe(800);
    expect(computeBackoffDelay(1, OPTIONS, () => 0.5)).toBe(1000);
    expect(computeBackoffDelay(1, OPTIONS, () => 0.75)).toBe(1100);
  });

  it('is never negative', () => {
    expect(computeBackoffDelay(1, { baseDelayMs: 1000, maxDelayMs: 60000, jitter: 1 }, () => 0)).toBe(0);
  });
});

describe('withRetry', () => {
  it('returns the value of a first-try success without sleeping', async () => {
    const sleep = vi.fn(async () => {});
    const call = scripted([{ status: 'success', value: 'ok' }]);

    const result = await withRetry(call, OPTIONS, { sleep, random: noJitter });

    expect(result).toBe('ok');
    expect(call).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable outcomes with increasing delays', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const call = scripted<string>([
      { status: 'retryable', reason: 'rate_limited', error: new Error('429') },
      { status: 'retryable', reason: 'transient', error: new Error('503') },
      { status: 'success', value: 'done' },
    ]);

    const result = await withRetry(call, OPTIONS, { sleep, random: noJitter });

    expect(result).toBe('done');
    expect(call.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('fails with the last cause once attempts are exhausted', async () => {
    const sleep = vi.fn(async () => {});
    const lastError = new Error('Too Many Requests');
    const call = scripted<string>([
      { status: 'retryable', reason: 'rate_limited', error: new Error('first') },
      { status: 'retryable', reason: 'rate_limited', error: new Error('second') },
      { status: 'retryable', reason: 'rate_limited', error: lastError },
    ]);

    const result = await withRetry(call, OPTIONS, { sleep, random: noJitter });

    expect(isPipelineFailure(result)).toBe(true);
    expect(result).toMatchObject({
      kind: 'Embedding',
      message: 'rate limited: Too Many Requests',
      cause: lastError,
      retryable: true,
      attempts: 3,
    });
    expect(call).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('surfaces fatal outcomes immediately', async () => {
    const sleep = vi.fn(async () => {});
    const error = new Error('Invalid API key');
    const call = scripted<string>([{ status: 'fatal', error }]);

    const result = await withRetry(call, OPTIONS, { sleep });

    expect(result).toMatchObject({
      kind: 'Embedding',
      message: 'Invalid API key',
      cause: error,
      retryable: false,
      attempts: 1,
    });
    expect(call).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('treats a thrown error as fatal', async () => {
    const call = vi.fn(async (): Promise<CallOutcome<string>> => {
      throw new TypeError('bad body');
    });

    const result = await withRetry(call, OPTIONS, { sleep: async () => {} });

    expect(result).toMatchObject({ message: 'bad body', retryable: false, attempts: 1 });
  });

  it('waits at least the Retry-After hint', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const call = scripted<string>([
      { status: 'retryable', reason: 'rate_limited', error: new Error('429'), retryAfterMs: 5000 },
      { status: 'success', value: 'ok' },
    ]);

    await withRetry(call, OPTIONS, { sleep, random: noJitter });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000]);
  });

  it('keeps the backoff when it exceeds the Retry-After hint', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const call = scripted<string>([
      { status: 'retryable', reason: 'rate_limited', error: new Error('429'), retryAfterMs: 10 },
      { status: 'success', value: 'ok' },
    ]);

    await withRetry(call, OPTIONS, { sleep, random: noJitter });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it('makes exactly one attempt when maxAttempts is 1', async () => {
    const call = scripted<string>([
      { status: 'retryable', reason: 'transient', error: new Error('502') },
    ]);

    const result = await withRetry(call, { ...OPTIONS, maxAttempts: 1 }, { sleep: async () => {} });

    expect(result).toMatchObject({ message: 'transient error: 502', attempts: 1 });
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async () => {
      controller.abort();
    });
    const call = scripted<string>([
      { status: 'retryable', reason: 'transient', error: new Error('503') },
    ]);

    const result = await withRetry(
      call,
      { ...OPTIONS, maxAttempts: 5 },
      { sleep, signal: controller.signal }
    );

    expect(result).toMatchObject({ kind: 'Embedding', message: 'transient error: 503', attempts: 1 });
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('logs each retry at debug level', async () => {
    const logger = { warn: vi.fn(), debug: vi.fn() };
    const call = scripted<string>([
      { status: 'retryable', reason: 'rate_limited', error: new Error('429') },
      { status: 'success', value: 'ok' },
    ]);

    await withRetry(call, OPTIONS, { sleep: async () => {}, random: noJitter, logger });

    expect(logger.debug).toHaveBeenCalledWith('Attempt 1/3 rate limited (429); retrying in 1000ms');
  });
});

describe('abortableSleep', () => {
  it('resolves immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();

    await abortableSleep(60000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('resolves early when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(60000, controller.signal);
    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
  });
});
