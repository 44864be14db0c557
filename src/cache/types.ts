/**
 * Embedding Cache Types
 */

/**
 * A cached embedding.
 *
 * Created on the first successful embedding of a fingerprint and never
 * mutated; removed only by clear().
 */
export interface CacheEntry {
  fingerprint: string;
  vector: number[];
  model: string;
  dimensions: number;
  /** ISO timestamp of the first write */
  createdAt: string;
}

/**
 * Aggregate numbers for `pdfvec cache stats`.
 */
export interface CacheStats {
  entries: number;
  /** Entry count per model */
  models: Record<string, number>;
  /** Bytes of vector data (4 per dimension) */
  sizeBytes: number;
}

export interface ClearOptions {
  /** Only remove entries produced by this model */
  model?: string;
}

/**
 * Content-addressed embedding cache.
 *
 * Lookups take an optional model: an entry stored for another model is a
 * miss. put() is first-writer-wins and returns the entry that is stored,
 * so concurrent writers of the same fingerprint all see the same vector.
 */
export interface EmbeddingCache {
  get(fingerprint: string, model?: string): CacheEntry | undefined;
  /** Hits only; missing fingerprints are absent from the map */
  getMany(fingerprints: readonly string[], model?: string): Map<string, CacheEntry>;
  put(fingerprint: string, vector: readonly number[], model: string): CacheEntry;
  /** @returns number of entries removed */
  clear(options?: ClearOptions): number;
  stats(): CacheStats;
}
