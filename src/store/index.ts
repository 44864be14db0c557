/**
 * Vector Store Module
 *
 * @example
 * ```ts
 * import { SqliteVectorStore, VectorStoreWriter, toVectorRecords } from './store/index.js';
 *
 * const writer = new VectorStoreWriter(SqliteVectorStore.open(getVectorDbPath()));
 * const report = await writer.upsert(toVectorRecords(enriched, 'manuals'), 'manuals');
 * ```
 */

export { SqliteVectorStore, cosineSimilarity, type SqliteVectorStoreOptions } from './sqlite-vector-store.js';
export {
  VectorStoreWriter,
  toVectorRecords,
  DEFAULT_UPSERT_BATCH_SIZE,
  METADATA_TEXT_LIMIT,
  type VectorStoreWriterOptions,
} from './writer.js';
export type {
  FailedBatch,
  NamespaceInfo,
  QueryMatch,
  UpsertReport,
  VectorMetadata,
  VectorRecord,
  VectorStore,
} from './types.js';
