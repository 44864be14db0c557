/**
 * Embedding Cache Module
 *
 * Content-addressed storage of computed embeddings.
 *
 * @example
 * ```ts
 * import { SqliteEmbeddingCache, computeFingerprint } from './cache/index.js';
 *
 * const cache = SqliteEmbeddingCache.open(getCacheDbPath());
 * const fp = computeFingerprint(chunk.text, 'text-embedding-3-small');
 * const hit = cache.get(fp, 'text-embedding-3-small');
 * ```
 */

export { computeFingerprint, normalizeText, isFingerprint, FINGERPRINT_PATTERN } from './fingerprint.js';
export { SqliteEmbeddingCache, type SqliteEmbeddingCacheOptions } from './sqlite-cache.js';
export { MemoryEmbeddingCache } from './memory-cache.js';
export type { CacheEntry, CacheStats, ClearOptions, EmbeddingCache } from './types.js';
