/**
 * Embedder Types
 *
 * Type definitions for the cached, concurrent embedding stage: the
 * provider contract (one API call per batch), the typed call outcome the
 * retry policy works on, and the per-chunk results of the orchestrator.
 */

import type { PipelineFailure } from '../../errors/index.js';
import type { Logger } from '../../utils/index.js';
import type { Chunk } from '../types.js';

/**
 * Why a failed call may be retried.
 * - rate_limited: HTTP 429
 * - transient: 408, 409, 5xx, connection errors and timeouts
 */
export type RetryReason = 'rate_limited' | 'transient';

/**
 * Typed outcome of one remote call. The retry policy never inspects raw
 * errors; the provider classifies them into this union.
 */
export type CallOutcome<T> =
  | { status: 'success'; value: T }
  | {
      status: 'retryable';
      reason: RetryReason;
      error: unknown;
      /** Server hint (Retry-After), in milliseconds */
      retryAfterMs?: number;
    }
  | { status: 'fatal'; error: unknown };

/** Outcome of one embedding API call: vectors aligned with the input texts */
export type EmbedCallOutcome = CallOutcome<number[][]>;

/**
 * An embedding API.
 *
 * embedBatch never throws for API errors; it classifies them. It takes no
 * abort signal: cancellation stops new batches, never one in flight.
 */
export interface EmbeddingProvider {
  /** Display name, e.g. "openai" */
  readonly name: string;
  embedBatch(texts: readonly string[], model: string): Promise<EmbedCallOutcome>;
}

/**
 * A chunk with its vector. Ephemeral: passed on to the vector store writer.
 */
export interface EnrichedChunk {
  chunk: Chunk;
  vector: number[];
  model: string;
  /** True when the vector came from the fingerprint cache */
  fromCache: boolean;
}

/** One result per input chunk */
export type EmbedResult = EnrichedChunk | PipelineFailure;

/**
 * Retry/backoff settings. Matches the [retry] section of config.toml.
 */
export interface RetryOptions {
  /** Total attempts including the first (default 3) */
  maxAttempts: number;
  /** Delay before the first retry (default 1000) */
  baseDelayMs: number;
  /** Upper bound for the exponential delay (default 60000) */
  maxDelayMs: number;
  /** Random spread as a fraction of the delay (default 0.2) */
  jitter: number;
}

/**
 * Hooks the retry policy uses for time and randomness.
 * Tests replace them to make backoff deterministic.
 */
export interface RetryRuntime {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Progress of one embed() invocation, reported after each batch settles.
 */
export interface EmbedProgress {
  completedBatches: number;
  totalBatches: number;
  /** Chunks resolved from the cache (known before the first batch) */
  cachedChunks: number;
  embeddedChunks: number;
  failedChunks: number;
  totalChunks: number;
}

/**
 * Counts over an embed() result list.
 */
export interface EmbedSummary {
  cached: number;
  embedded: number;
  failed: number;
}
