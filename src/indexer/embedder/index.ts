/**
 * Embedder Module
 *
 * Cached, rate-limited embedding of chunks.
 *
 * @example
 * ```ts
 * import { EmbeddingOrchestrator, createEmbeddingProvider, summarize } from './embedder/index.js';
 *
 * const orchestrator = new EmbeddingOrchestrator({
 *   provider: createEmbeddingProvider(config.embedding, getEnv()),
 *   cache,
 *   model: config.embedding.model,
 * });
 * const results = await orchestrator.embed(chunks);
 * console.log(summarize(results));
 * ```
 */

export {
  EmbeddingOrchestrator,
  summarize,
  DEFAULT_BATCH_SIZE,
  type EmbeddingOrchestratorOptions,
  type EmbedOptions,
} from './embedder.js';
export {
  RateLimitedBatchExecutor,
  embeddingConcurrency,
  type BatchExecutorOptions,
  type ExecuteOptions,
} from './batch-executor.js';
export {
  withRetry,
  computeBackoffDelay,
  abortableSleep,
  DEFAULT_RETRY_OPTIONS,
} from './retry.js';
export {
  OpenAIEmbeddingProvider,
  createEmbeddingProvider,
  classifyEmbeddingError,
  classifyStatus,
  parseRetryAfter,
  getModelDimensions,
  type EmbeddingsClient,
  type OpenAIProviderOptions,
} from './provider.js';
export { estimateTokens, estimateCost, estimateUsage, type UsageEstimate } from './cost.js';
export type {
  CallOutcome,
  EmbedCallOutcome,
  EmbeddingProvider,
  EmbedProgress,
  EmbedResult,
  EmbedSummary,
  EnrichedChunk,
  RetryOptions,
  RetryReason,
  RetryRuntime,
} from './types.js';
