/**
 * Parallel Work Dispatcher
 *
 * Runs an async task over a list of items with a bounded worker pool and
 * returns one result per item, in input order. A task that throws yields a
 * PipelineFailure for its item; the other items are unaffected.
 *
 * Used for PDF extraction (per document) and for the embedding batch
 * executor (per batch), each with its own pool size.
 */

import { availableParallelism } from 'node:os';
import {
  createFailure,
  toPipelineFailure,
  type PipelineFailure,
  type PipelineFailureKind,
} from '../errors/index.js';

/** Upper bound for automatically sized pools */
export const MAX_AUTO_WORKERS = 32;

/** Hard limit on concurrent embedding API calls */
export const EMBEDDING_WORKER_CEILING = 4;

/** Failure message for items never started because of an abort */
export const CANCELLED_BEFORE_DISPATCH = 'Cancelled before dispatch';

/**
 * Default pool size: min(32, cpu count + 4).
 *
 * @example
 * defaultWorkerCount(8) // => 12
 */
export function defaultWorkerCount(cpuCount: number = availableParallelism()): number {
  return Math.min(MAX_AUTO_WORKERS, Math.max(1, cpuCount) + 4);
}

/**
 * Resolve a configured worker count, falling back to the default.
 */
export function resolveWorkerCount(requested: number | undefined, cpuCount?: number): number {
  if (requested === undefined) {
    return defaultWorkerCount(cpuCount);
  }
  return Math.max(1, Math.floor(requested));
}

export interface DispatchOptions<T, R> {
  /** Pool size (default: min(32, cpu + 4)) */
  maxWorkers?: number;
  /** Kind given to failures thrown by the task (a thrown PipelineError keeps its own) */
  failureKind: PipelineFailureKind;
  /** Stop starting new items; running items finish */
  signal?: AbortSignal;
  /** Called as each item settles, in completion order */
  onSettled?: (result: R | PipelineFailure, index: number, item: T) => void;
}

/**
 * Run `task` over `items` with at most `maxWorkers` in flight.
 *
 * @returns One entry per item, aligned with `items`
 *
 * @example
 * const docs = await runParallel(extractPdf, paths, { failureKind: 'Extraction' });
 * const failed = docs.filter(isPipelineFailure);
 */
export async function runParallel<T, R>(
  task: (item: T, index: number) => Promise<R> | R,
  items: readonly T[],
  options: DispatchOptions<T, R>
): Promise<Array<R | PipelineFailure>> {
  const { failureKind, signal, onSettled } = options;
  const results: Array<R | PipelineFailure> = new Array(items.length);

  const runOne = async (item: T, index: number): Promise<void> => {
    let result: R | PipelineFailure;
    if (signal?.aborted) {
      result = createFailure(failureKind, CANCELLED_BEFORE_DISPATCH, signal.reason);
    } else {
      try {
        result = await task(item, index);
      } catch (error) {
        result = toPipelineFailure(failureKind, error);
      }
    }
    results[index] = result;
    onSettled?.(result, index, item);
  };

  // Workers share one iterator; each next() hands out the next unstarted item
  const queue = items.entries();
  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      await runOne(item, index);
    }
  };

  // A single item runs on the caller without a pool
  const workerCount = Math.min(resolveWorkerCount(options.maxWorkers), items.length);
  if (workerCount <= 1) {
    await worker();
    return results;
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
