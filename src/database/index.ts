/**
 * Database Module
 *
 * SQLite plumbing shared by the embedding cache (cache.db) and the
 * vector store (vectors.db).
 *
 * @example
 * ```ts
 * import { getDb, runMigrations, CACHE_MIGRATIONS } from './database/index.js';
 *
 * const db = getDb(getCacheDbPath());
 * runMigrations(db, CACHE_MIGRATIONS);
 * ```
 */

// Connection management
export { openDatabase, getDb, closeDb, closeAllDbs, BUSY_TIMEOUT_MS } from './connection.js';

// Migration utilities
export {
  runMigrations,
  getAppliedMigrations,
  hasPendingMigrations,
  CACHE_MIGRATIONS,
  VECTOR_MIGRATIONS,
  type Migration,
  type MigrationResult,
} from './migrate.js';

// Schema types
export type { EmbeddingCacheRow, VectorRow } from './schema.js';

// Utility functions
export { vectorToBlob, blobToVector } from './schema.js';

// Validation schemas and utilities
export {
  EmbeddingCacheRowSchema,
  VectorRowSchema,
  VectorMetadataSchema,
  CountRowSchema,
  type EmbeddingCacheRowData,
  type VectorRowData,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
