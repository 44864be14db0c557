/**
 * Pipeline Services
 *
 * Builds the cache, vector store, embedding provider and orchestrator a
 * command needs from config.toml and the environment. `search` takes only
 * the store and the provider.
 */

import { MemoryEmbeddingCache, SqliteEmbeddingCache, type EmbeddingCache } from '../../cache/index.js';
import { getCacheDbPath, getEnv, getVectorDbPath, type Config } from '../../config/index.js';
import {
  EmbeddingOrchestrator,
  createEmbeddingProvider,
  type EmbeddingProvider,
  type RetryOptions,
} from '../../indexer/embedder/index.js';
import { SqliteVectorStore, VectorStoreWriter } from '../../store/index.js';
import type { Logger } from '../../utils/index.js';

export interface PipelineServices {
  cache: EmbeddingCache;
  store: SqliteVectorStore;
  provider: EmbeddingProvider;
  orchestrator: EmbeddingOrchestrator;
  writer: VectorStoreWriter;
}

export interface ServiceOverrides {
  /** Replaces the provider built from [embedding] (tests) */
  provider?: EmbeddingProvider;
}

/**
 * Map the [retry] table onto the retry policy's options.
 */
export function retryOptionsFromConfig(retry: Config['retry']): RetryOptions {
  return {
    maxAttempts: retry.max_attempts,
    baseDelayMs: retry.base_delay_ms,
    maxDelayMs: retry.max_delay_ms,
    jitter: retry.jitter,
  };
}

/**
 * The embedding cache: cache.db when [cache] enabled, otherwise a
 * per-process in-memory cache.
 */
export function openEmbeddingCache(config: Config): EmbeddingCache {
  return config.cache.enabled ? SqliteEmbeddingCache.open(getCacheDbPath()) : new MemoryEmbeddingCache();
}

/**
 * The configured embedding provider, unless a test supplies one.
 *
 * @throws APIKeyError when OPENAI_API_KEY is missing
 */
export function resolveEmbeddingProvider(config: Config, overrides: ServiceOverrides = {}): EmbeddingProvider {
  return (
    overrides.provider ??
    createEmbeddingProvider(config.embedding, {
      OPENAI_API_KEY: getEnv('OPENAI_API_KEY'),
      OPENAI_BASE_URL: getEnv('OPENAI_BASE_URL'),
    })
  );
}

export function openVectorStore(logger: Logger): SqliteVectorStore {
  return SqliteVectorStore.open(getVectorDbPath(), { logger });
}

/**
 * Build everything an index run needs.
 *
 * @throws APIKeyError when OPENAI_API_KEY is missing and no provider is given
 */
export function createPipelineServices(
  config: Config,
  logger: Logger,
  overrides: ServiceOverrides = {}
): PipelineServices {
  const provider = resolveEmbeddingProvider(config, overrides);
  const cache = openEmbeddingCache(config);
  const store = openVectorStore(logger);

  const orchestrator = new EmbeddingOrchestrator({
    provider,
    cache,
    model: config.embedding.model,
    batchSize: config.embedding.batch_size,
    maxWorkers: config.embedding.max_workers,
    retry: retryOptionsFromConfig(config.retry),
    logger,
  });
  const writer = new VectorStoreWriter(store, { batchSize: config.store.batch_size, logger });

  return { cache, store, provider, orchestrator, writer };
}
