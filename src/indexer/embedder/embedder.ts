/**
 * Embedding Orchestrator
 *
 * Turns an ordered chunk sequence into one EnrichedChunk or PipelineFailure
 * per chunk, in input order:
 *
 * 1. Fingerprint every chunk and look the fingerprints up in the cache
 * 2. Hits resolve immediately (fromCache = true)
 * 3. Misses are deduplicated by fingerprint (first occurrence order),
 *    batched, and sent through the rate-limited executor
 * 4. Each returned vector is written to the cache, then fanned out to every
 *    chunk sharing its fingerprint
 * 5. A failed batch fails every chunk of every fingerprint in it
 *
 * No fingerprint is sent to the embedding API twice within one embed() call.
 */

import type { EmbeddingCache } from '../../cache/index.js';
import { computeFingerprint, normalizeText } from '../../cache/index.js';
import {
  createFailure,
  isPipelineFailure,
  type PipelineFailure,
} from '../../errors/index.js';
import { scopedLogger, silentLogger, type Logger } from '../../utils/index.js';
import type { Chunk } from '../types.js';
import { RateLimitedBatchExecutor } from './batch-executor.js';
import type {
  EmbeddingProvider,
  EmbedProgress,
  EmbedResult,
  EmbedSummary,
  EnrichedChunk,
  RetryOptions,
  RetryRuntime,
} from './types.js';

/** Maximum texts per embedding request */
export const DEFAULT_BATCH_SIZE = 100;

export interface EmbeddingOrchestratorOptions {
  provider: EmbeddingProvider;
  cache: EmbeddingCache;
  /** Model used when embed() is not given one */
  model: string;
  batchSize?: number;
  /** Concurrent API calls (clamped to 4) */
  maxWorkers?: number;
  retry?: RetryOptions;
  logger?: Logger;
  sleep?: RetryRuntime['sleep'];
  random?: RetryRuntime['random'];
}

export interface EmbedOptions {
  model?: string;
  /** No new batch starts after abort; undispatched chunks fail */
  signal?: AbortSignal;
  onProgress?: (progress: EmbedProgress) => void;
}

/** A fingerprint awaiting an API call, with every chunk that shares it */
interface PendingFingerprint {
  fingerprint: string;
  text: string;
  indices: number[];
}

export class EmbeddingOrchestrator {
  private readonly cache: EmbeddingCache;
  private readonly executor: RateLimitedBatchExecutor;
  /** Model used when embed() is not given one */
  readonly model: string;
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(options: EmbeddingOrchestratorOptions) {
    this.cache = options.cache;
    this.model = options.model;
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
    this.logger = scopedLogger(options.logger ?? silentLogger, 'embed');
    this.executor = new RateLimitedBatchExecutor(options.provider, {
      maxWorkers: options.maxWorkers,
      retry: options.retry,
      logger: options.logger,
      sleep: options.sleep,
      random: options.random,
    });
  }

  /**
   * Embed chunks, reusing cached vectors.
   *
   * @returns Exactly one result per chunk, aligned with `chunks`
   */
  async embed(chunks: readonly Chunk[], options: EmbedOptions = {}): Promise<EmbedResult[]> {
    const model = options.model ?? this.model;
    const results: Array<EmbedResult | undefined> = new Array(chunks.length);

    // Fingerprint; chunks with nothing to embed fail without an API call
    const fingerprints: Array<string | undefined> = chunks.map((chunk, i) => {
      if (normalizeText(chunk.text) === '') {
        results[i] = createFailure('Embedding', `Chunk ${chunk.id} has no text to embed`);
        return undefined;
      }
      return computeFingerprint(chunk.text, model);
    });

    const hits = this.lookup(
      [...new Set(fingerprints.filter((fp): fp is string => fp !== undefined))],
      model
    );

    // Resolve hits, group misses by fingerprint in first-occurrence order
    const pending = new Map<string, PendingFingerprint>();
    let cachedChunks = 0;
    chunks.forEach((chunk, i) => {
      const fingerprint = fingerprints[i];
      if (fingerprint === undefined) return;

      const entry = hits.get(fingerprint);
      if (entry) {
        results[i] = { chunk, vector: [...entry.vector], model, fromCache: true };
        cachedChunks++;
        return;
      }

      const group = pending.get(fingerprint);
      if (group) {
        group.indices.push(i);
      } else {
        pending.set(fingerprint, { fingerprint, text: chunk.text, indices: [i] });
      }
    });

    const batches = toBatches([...pending.values()], this.batchSize);
    const progress: EmbedProgress = {
      completedBatches: 0,
      totalBatches: batches.length,
      cachedChunks,
      embeddedChunks: 0,
      failedChunks: 0,
      totalChunks: chunks.length,
    };

    this.logger.debug?.(
      `${chunks.length} chunks: ${cachedChunks} cached, ${pending.size} distinct to embed in ${batches.length} batch(es)`
    );

    if (batches.length === 0) {
      options.onProgress?.({ ...progress });
    } else {
      await this.executor.execute(
        batches.map((batch) => batch.map((item) => item.text)),
        model,
        {
          signal: options.signal,
          onBatchSettled: (result, batchIndex) => {
            const batch = batches[batchIndex] ?? [];
            const settled = isPipelineFailure(result)
              ? this.failBatch(batch, result, results)
              : this.storeBatch(batch, result, model, chunks, results);

            progress.completedBatches++;
            if (isPipelineFailure(result)) {
              progress.failedChunks += settled;
            } else {
              progress.embeddedChunks += settled;
            }
            options.onProgress?.({ ...progress });
          },
        }
      );
    }

    return results.map(
      (result, i) =>
        result ?? createFailure('Embedding', `No result produced for chunk ${chunks[i]?.id ?? i}`)
    );
  }

  /** Cache lookup; a read error degrades to "everything missed" */
  private lookup(fingerprints: readonly string[], model: string): ReturnType<EmbeddingCache['getMany']> {
    try {
      return this.cache.getMany(fingerprints, model);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Cache lookup failed, embedding all chunks: ${message}`);
      return new Map();
    }
  }

  /** @returns number of chunks resolved */
  private storeBatch(
    batch: readonly PendingFingerprint[],
    vectors: number[][],
    model: string,
    chunks: readonly Chunk[],
    results: Array<EmbedResult | undefined>
  ): number {
    let resolved = 0;
    batch.forEach((item, j) => {
      const vector = this.cachePut(item.fingerprint, vectors[j] ?? [], model);
      for (const index of item.indices) {
        const chunk = chunks[index];
        if (!chunk) continue;
        const enriched: EnrichedChunk = { chunk, vector: [...vector], model, fromCache: false };
        results[index] = enriched;
        resolved++;
      }
    });
    return resolved;
  }

  /**
   * Write through to the cache. The stored entry wins over the fresh vector
   * so every run agrees on one vector per fingerprint.
   */
  private cachePut(fingerprint: string, vector: number[], model: string): number[] {
    try {
      return this.cache.put(fingerprint, vector, model).vector;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not cache embedding ${fingerprint.slice(0, 12)}: ${message}`);
      return vector;
    }
  }

  /** @returns number of chunks failed */
  private failBatch(
    batch: readonly PendingFingerprint[],
    failure: PipelineFailure,
    results: Array<EmbedResult | undefined>
  ): number {
    let failed = 0;
    for (const item of batch) {
      for (const index of item.indices) {
        results[index] = failure;
        failed++;
      }
    }
    return failed;
  }
}

function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Count cached, embedded and failed chunks.
 *
 * @example
 * const { cached, embedded, failed } = summarize(await orchestrator.embed(chunks));
 */
export function summarize(results: readonly EmbedResult[]): EmbedSummary {
  const summary: EmbedSummary = { cached: 0, embedded: 0, failed: 0 };
  for (const result of results) {
    if (isPipelineFailure(result)) {
      summary.failed++;
    } else if (result.fromCache) {
      summary.cached++;
    } else {
      summary.embedded++;
    }
  }
  return summary;
}
