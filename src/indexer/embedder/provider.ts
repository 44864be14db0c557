/**
 * Embedding Provider
 *
 * OpenAI embeddings API client that reports typed call outcomes.
 *
 * The SDK's own retry loop is disabled (`maxRetries: 0`): the Retry/Backoff
 * Policy is the only retry layer, and it needs to see each failure.
 */

import OpenAI from 'openai';
import type { Config } from '../../config/index.js';
import { APIKeyError } from '../../errors/index.js';
import type { EmbedCallOutcome, EmbeddingProvider, RetryReason } from './types.js';

/**
 * The part of the OpenAI client this module uses.
 * Tests pass an in-process fake with the same shape.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string[]; encoding_format?: 'float' },
      options?: { signal?: AbortSignal; timeout?: number }
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIProviderOptions {
  apiKey?: string;
  /** OpenAI-compatible endpoint */
  baseURL?: string;
  /** Per-request deadline, enforced by the SDK */
  timeoutMs?: number;
  /** Pre-built client (tests) */
  client?: EmbeddingsClient;
}

// ============================================================================
// Error classification
// ============================================================================

/** Node/undici error codes for dropped or refused connections */
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Classify an HTTP status.
 *
 * - 429 → rate_limited
 * - 408, 409, 5xx → transient
 * - anything else → fatal (400, 401, 403, 404, 422, ...)
 */
export function classifyStatus(status: number): RetryReason | 'fatal' {
  if (status === 429) return 'rate_limited';
  if (status === 408 || status === 409 || status >= 500) return 'transient';
  return 'fatal';
}

/**
 * Parse a Retry-After (seconds or HTTP date) or retry-after-ms header.
 *
 * @returns Delay in milliseconds, or undefined when absent or unparseable
 */
export function parseRetryAfter(
  headers: Record<string, string | null | undefined> | undefined,
  now: number = Date.now()
): number | undefined {
  if (!headers) return undefined;

  const ms = headers['retry-after-ms'];
  if (ms) {
    const value = Number(ms);
    if (Number.isFinite(value) && value >= 0) return value;
  }

  const retryAfter = headers['retry-after'];
  if (!retryAfter) return undefined;

  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }

  const date = Date.parse(retryAfter);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return typeof value === 'object' && value !== null && key in value;
}

/**
 * Map anything the client throws to an EmbedCallOutcome.
 */
export function classifyEmbeddingError(error: unknown): EmbedCallOutcome {
  // User abort (our signal) is not retried
  if (error instanceof OpenAI.APIUserAbortError) {
    return { status: 'fatal', error };
  }

  // Includes APIConnectionTimeoutError
  if (error instanceof OpenAI.APIConnectionError) {
    return { status: 'retryable', reason: 'transient', error };
  }

  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    const classification = classifyStatus(error.status);
    if (classification === 'fatal') {
      return { status: 'fatal', error };
    }
    return {
      status: 'retryable',
      reason: classification,
      error,
      retryAfterMs: parseRetryAfter(error.headers),
    };
  }

  // Non-SDK errors that carry a status (proxies, custom fetch)
  if (hasProperty(error, 'status') && typeof error.status === 'number') {
    const classification = classifyStatus(error.status);
    return classification === 'fatal'
      ? { status: 'fatal', error }
      : { status: 'retryable', reason: classification, error };
  }

  if (hasProperty(error, 'code') && typeof error.code === 'string' && TRANSIENT_ERROR_CODES.has(error.code)) {
    return { status: 'retryable', reason: 'transient', error };
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return { status: 'retryable', reason: 'transient', error };
  }

  return { status: 'fatal', error };
}

// ============================================================================
// Provider
// ============================================================================

/**
 * OpenAI (or OpenAI-compatible) embeddings.
 *
 * @example
 * ```ts
 * const provider = new OpenAIEmbeddingProvider({ apiKey: process.env.OPENAI_API_KEY });
 * const outcome = await provider.embedBatch(['hello'], 'text-embedding-3-small');
 * ```
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  private readonly client: EmbeddingsClient;
  private readonly timeoutMs: number | undefined;

  constructor(options: OpenAIProviderOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    if (options.client) {
      this.client = options.client;
      return;
    }
    if (!options.apiKey?.trim()) {
      throw new APIKeyError('OpenAI');
    }
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  /**
   * One embeddings request. Cancellation is not passed through: a request
   * that has started runs until it answers or hits the timeout.
   */
  async embedBatch(texts: readonly string[], model: string): Promise<EmbedCallOutcome> {
    try {
      const response = await this.client.embeddings.create(
        { model, input: [...texts], encoding_format: 'float' },
        // The SDK rejects an explicit `timeout: undefined`
        this.timeoutMs === undefined ? undefined : { timeout: this.timeoutMs }
      );

      // The API documents `index`; order by it instead of trusting array order
      const vectors = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      return { status: 'success', value: vectors };
    } catch (error) {
      return classifyEmbeddingError(error);
    }
  }
}

/**
 * Create the provider named by `[embedding] provider` in config.toml.
 *
 * @throws APIKeyError when the key is missing
 */
export function createEmbeddingProvider(
  config: Config['embedding'],
  env: { OPENAI_API_KEY?: string; OPENAI_BASE_URL?: string }
): EmbeddingProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAIEmbeddingProvider({
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL,
        timeoutMs: config.timeout_ms,
      });
  }
}

/**
 * Known output dimensions, used for status output before any vector exists.
 */
export function getModelDimensions(model: string): number | undefined {
  const normalizedModel = model.toLowerCase();

  if (normalizedModel.includes('text-embedding-3-large')) return 3072;
  if (normalizedModel.includes('text-embedding-3-small')) return 1536;
  if (normalizedModel.includes('text-embedding-ada')) return 1536;

  return undefined;
}
