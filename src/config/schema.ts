/**
 * Configuration Schema
 *
 * Defines the shape of ~/.pdfvec/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';
import { EMBEDDING_WORKER_CEILING, MAX_AUTO_WORKERS } from '../indexer/dispatcher.js';

/**
 * Embedding API configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['openai']).describe('Embedding API provider'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(100)
    .describe('Number of texts per embedding request (1-100, default 100)'),
  max_workers: z
    .number()
    .int()
    .min(1)
    .max(EMBEDDING_WORKER_CEILING)
    .default(EMBEDDING_WORKER_CEILING)
    .describe(`Concurrent embedding requests (1-${EMBEDDING_WORKER_CEILING})`),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(60000)
    .describe('Per-request timeout in milliseconds (1000-600000, default 60000)'),
});

/**
 * Retry/backoff policy for embedding requests
 */
export const RetryConfigSchema = z.object({
  max_attempts: z
    .number()
    .int()
    .min(1)
    .max(10)
    .default(3)
    .describe('Total attempts per batch, including the first (1-10)'),
  base_delay_ms: z.number().int().min(0).max(60000).default(1000),
  max_delay_ms: z.number().int().min(0).max(600000).default(60000),
  jitter: z
    .number()
    .min(0)
    .max(1)
    .default(0.2)
    .describe('Random spread applied to each delay, as a fraction (0-1)'),
});

/**
 * PDF extraction configuration
 */
export const ExtractionConfigSchema = z.object({
  max_workers: z
    .number()
    .int()
    .min(1)
    .max(MAX_AUTO_WORKERS)
    .optional()
    .describe('Concurrent PDF extractions (omit for min(32, cpu + 4))'),
});

/**
 * Chunking configuration
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(100).max(20000).default(1000),
  chunk_overlap: z.number().int().min(0).max(10000).default(200),
});

/**
 * Embedding cache configuration
 */
export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true).describe('Persist embeddings in cache.db'),
});

/**
 * Vector store configuration
 */
export const StoreConfigSchema = z.object({
  namespace: z.string().default('').describe('Default namespace ("" is the default namespace)'),
  batch_size: z.number().int().min(1).max(1000).default(100),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  embedding: EmbeddingConfigSchema,
  retry: RetryConfigSchema,
  extraction: ExtractionConfigSchema,
  chunking: ChunkingConfigSchema,
  cache: CacheConfigSchema,
  store: StoreConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

/**
 * Rules that span more than one field.
 *
 * @returns One message per violated rule (empty when the config is consistent)
 */
export function checkConfigConsistency(config: Config): string[] {
  const issues: string[] = [];
  if (config.chunking.chunk_overlap >= config.chunking.chunk_size) {
    issues.push(
      `chunking.chunk_overlap (${config.chunking.chunk_overlap}) must be smaller than chunking.chunk_size (${config.chunking.chunk_size})`
    );
  }
  if (config.retry.base_delay_ms > config.retry.max_delay_ms) {
    issues.push(
      `retry.base_delay_ms (${config.retry.base_delay_ms}) must not exceed retry.max_delay_ms (${config.retry.max_delay_ms})`
    );
  }
  return issues;
}
