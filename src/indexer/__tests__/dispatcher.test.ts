/**
 * Tests for the parallel work dispatcher
 */

import { describe, it, expect, vi } from 'vitest';
import {
  runParallel,
  defaultWorkerCount,
  resolveWorkerCount,
  CANCELLED_BEFORE_DISPATCH,
} from '../dispatcher.js';
import { PipelineError, isPipelineFailure } from '../../errors/index.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('defaultWorkerCount', () => {
  it('is cpu count + 4 on an 8-core host', () => {
    expect(defaultWorkerCount(8)).toBe(12);
  });

  it('is capped at 32', () => {
    expect(defaultWorkerCount(64)).toBe(32);
  });

  it('treats a non-positive cpu count as one core', () => {
    expect(defaultWorkerCount(0)).toBe(5);
  });
});

describe('resolveWorkerCount', () => {
  it('uses the default when nothing is configured', () => {
    expect(resolveWorkerCount(undefined, 8)).toBe(12);
  });

  it('uses the configured value, at least 1', () => {
    expect(resolveWorkerCount(3, 8)).toBe(3);
    expect(resolveWorkerCount(0, 8)).toBe(1);
  });
});

describe('runParallel', () => {
  it('returns results in input order regardless of completion order', async () => {
    const results = await runParallel(
      async (ms: number) => {
        await delay(ms);
        return ms * 2;
      },
      [30, 5, 15, 1],
      { maxWorkers: 4, failureKind: 'Extraction' }
    );

    expect(results).toEqual([60, 10, 30, 2]);
  });

  it('never runs more than maxWorkers tasks at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await runParallel(
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
      },
      Array.from({ length: 10 }, (_, i) => i),
      { maxWorkers: 3, failureKind: 'Embedding' }
    );

    expect(peak).toBe(3);
  });

  it('turns a thrown error into a failure for that item only', async () => {
    const results = await runParallel(
      (name: string) => {
        if (name === 'broken.pdf') {
          throw new Error('Invalid PDF structure');
        }
        return name.toUpperCase();
      },
      ['a.pdf', 'broken.pdf', 'c.pdf'],
      { maxWorkers: 2, failureKind: 'Extraction' }
    );

    expect(results[0]).toBe('A.PDF');
    expect(results[2]).toBe('C.PDF');
    expect(isPipelineFailure(results[1])).toBe(true);
    expect(results[1]).toMatchObject({ kind: 'Extraction', message: 'Invalid PDF structure' });
  });

  it('keeps the kind of a thrown PipelineError', async () => {
    const [result] = await runParallel(
      () => {
        throw new PipelineError('Chunking', 'no text');
      },
      ['a.pdf'],
      { failureKind: 'Extraction' }
    );

    expect(result).toMatchObject({ type: 'failure', kind: 'Chunking', message: 'no text' });
  });

  it('runs a single item directly', async () => {
    const task = vi.fn((value: number) => value + 1);

    const results = await runParallel(task, [41], { maxWorkers: 8, failureKind: 'Extraction' });

    expect(results).toEqual([42]);
    expect(task).toHaveBeenCalledTimes(1);
    expect(task).toHaveBeenCalledWith(41, 0);
  });

  it('returns an empty array for no items', async () => {
    const task = vi.fn();

    expect(await runParallel(task, [], { failureKind: 'Extraction' })).toEqual([]);
    expect(task).not.toHaveBeenCalled();
  });

  it('reports each settled item', async () => {
    const onSettled = vi.fn();

    await runParallel((n: number) => n * 10, [1, 2], {
      maxWorkers: 1,
      failureKind: 'Extraction',
      onSettled,
    });

    expect(onSettled.mock.calls).toEqual([
      [10, 0, 1],
      [20, 1, 2],
    ]);
  });

  it('stops starting new items after an abort and marks the rest cancelled', async () => {
    const controller = new AbortController();
    const task = vi.fn(async (n: number) => {
      if (n === 1) {
        controller.abort();
      }
      await delay(1);
      return n;
    });

    const results = await runParallel(task, [1, 2, 3], {
      maxWorkers: 1,
      failureKind: 'Embedding',
      signal: controller.signal,
    });

    expect(results[0]).toBe(1);
    expect(results[1]).toMatchObject({ kind: 'Embedding', message: CANCELLED_BEFORE_DISPATCH });
    expect(results[2]).toMatchObject({ kind: 'Embedding', message: CANCELLED_BEFORE_DISPATCH });
    expect(task).toHaveBeenCalledTimes(1);
  });
});
