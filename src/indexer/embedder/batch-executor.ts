/**
 * Rate-Limited Batch Executor
 *
 * Sends ordered batches of texts to the embedding provider with at most
 * min(maxWorkers, 4) calls in flight, each wrapped by the retry policy.
 *
 * Bulkhead: a failing batch yields a PipelineFailure for that batch only;
 * sibling batches keep running and their results are returned.
 */

import type { PipelineFailure } from '../../errors/index.js';
import { scopedLogger, silentLogger, type Logger } from '../../utils/index.js';
import { EMBEDDING_WORKER_CEILING, runParallel } from '../dispatcher.js';
import { DEFAULT_RETRY_OPTIONS, withRetry } from './retry.js';
import type {
  EmbedCallOutcome,
  EmbeddingProvider,
  RetryOptions,
  RetryRuntime,
} from './types.js';

export interface BatchExecutorOptions {
  /** Requested concurrency; clamped to [1, 4] */
  maxWorkers?: number;
  retry?: RetryOptions;
  logger?: Logger;
  /** Time/randomness hooks for the retry policy (tests) */
  sleep?: RetryRuntime['sleep'];
  random?: RetryRuntime['random'];
}

export interface ExecuteOptions {
  /** Stops new batches and retries; calls already sent run to completion */
  signal?: AbortSignal;
  /** Called as each batch settles, in completion order */
  onBatchSettled?: (result: number[][] | PipelineFailure, batchIndex: number) => void;
}

/**
 * Effective concurrency for a requested worker count.
 */
export function embeddingConcurrency(maxWorkers: number | undefined): number {
  const requested = maxWorkers ?? EMBEDDING_WORKER_CEILING;
  return Math.max(1, Math.min(Math.floor(requested), EMBEDDING_WORKER_CEILING));
}

export class RateLimitedBatchExecutor {
  readonly concurrency: number;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;
  private readonly sleep: RetryRuntime['sleep'];
  private readonly random: RetryRuntime['random'];

  constructor(
    private readonly provider: EmbeddingProvider,
    options: BatchExecutorOptions = {}
  ) {
    this.concurrency = embeddingConcurrency(options.maxWorkers);
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
    this.logger = scopedLogger(options.logger ?? silentLogger, 'embed');
    this.sleep = options.sleep;
    this.random = options.random;
  }

  /**
   * Embed every batch.
   *
   * @returns One entry per batch, aligned with `batches`: vectors in the
   *   batch's text order, or the batch's failure
   */
  async execute(
    batches: ReadonlyArray<readonly string[]>,
    model: string,
    options: ExecuteOptions = {}
  ): Promise<Array<number[][] | PipelineFailure>> {
    const { signal, onBatchSettled } = options;

    return runParallel(
      (texts: readonly string[], batchIndex: number) =>
        withRetry(
          async (attempt) => {
            if (attempt > 1) {
              this.logger.debug?.(`Batch ${batchIndex}: attempt ${attempt}`);
            }
            const outcome = await this.provider.embedBatch(texts, model);
            return checkVectorCount(outcome, texts.length);
          },
          this.retry,
          { signal, logger: this.logger, sleep: this.sleep, random: this.random }
        ),
      batches,
      {
        maxWorkers: this.concurrency,
        failureKind: 'Embedding',
        signal,
        onSettled: onBatchSettled ? (result, index) => onBatchSettled(result, index) : undefined,
      }
    );
  }
}

/**
 * A success whose vector count differs from the input count is fatal:
 * the vectors cannot be matched to texts, and a retry would not help.
 */
function checkVectorCount(outcome: EmbedCallOutcome, expected: number): EmbedCallOutcome {
  if (outcome.status !== 'success' || outcome.value.length === expected) {
    return outcome;
  }
  return {
    status: 'fatal',
    error: new Error(
      `Embedding API returned ${outcome.value.length} vectors for ${expected} inputs`
    ),
  };
}
