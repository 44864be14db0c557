/**
 * Database Schema Types
 *
 * TypeScript interfaces matching the SQLite table schemas, plus the
 * vector <-> BLOB conversions shared by the cache and the vector store.
 */

// ============================================================================
// embedding_cache (cache.db)
// ============================================================================

/**
 * A cached embedding, keyed by content fingerprint.
 */
export interface EmbeddingCacheRow {
  /** SHA-256 hex digest of (model, normalized text) */
  fingerprint: string;
  /** Model that produced the vector */
  model: string;
  /** Vector length */
  dimensions: number;
  /** Float32 little-endian BLOB */
  vector: Buffer;
  /** ISO timestamp of first write */
  created_at: string;
}

// ============================================================================
// vectors (vectors.db)
// ============================================================================

/**
 * A stored vector record.
 */
export interface VectorRow {
  /** Namespace partition ('' is the default namespace) */
  namespace: string;
  /** Vector id (the chunk id) */
  id: string;
  dimensions: number;
  /** Float32 little-endian BLOB */
  vector: Buffer;
  /** JSON object */
  metadata: string;
  /** ISO timestamp of the last upsert */
  updated_at: string;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Convert a vector to a Buffer for SQLite BLOB storage.
 *
 * Vectors are stored as Float32, so values round-trip at float32 precision.
 *
 * @example
 * ```ts
 * db.prepare('INSERT INTO vectors (vector) VALUES (?)').run(vectorToBlob([0.5, -1]));
 * ```
 */
export function vectorToBlob(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert a BLOB back to a plain number array.
 *
 * Copies the bytes first: a Buffer's byteOffset is not guaranteed to be
 * 4-byte aligned, which a Float32Array view would require.
 */
export function blobToVector(blob: Buffer): number[] {
  const floats = new Float32Array(Math.floor(blob.byteLength / 4));
  new Uint8Array(floats.buffer).set(blob.subarray(0, floats.byteLength));
  return Array.from(floats);
}
