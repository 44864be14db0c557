/**
 * Vector Store Types
 */

import type { PipelineFailure } from '../errors/index.js';

/** Flat scalar metadata stored next to a vector */
export type VectorMetadata = Record<string, string | number | boolean | null>;

/**
 * One vector to persist. `vectorId` is the chunk id.
 */
export interface VectorRecord {
  vectorId: string;
  vector: number[];
  namespace: string;
  metadata: VectorMetadata;
}

export interface QueryMatch {
  vectorId: string;
  /** Cosine similarity, higher is closer */
  score: number;
  metadata: VectorMetadata;
}

export interface NamespaceInfo {
  namespace: string;
  count: number;
  dimensions: number;
}

/**
 * A namespaced vector store.
 *
 * Every operation names its namespace; there is no implicit default.
 */
export interface VectorStore {
  /**
   * Insert or replace records by (namespace, vectorId), atomically.
   *
   * @returns number of records written
   */
  upsertBatch(records: readonly VectorRecord[], namespace: string): Promise<number>;
  query(vector: readonly number[], topK: number, namespace: string): Promise<QueryMatch[]>;
  fetch(vectorId: string, namespace: string): Promise<VectorRecord | undefined>;
  count(namespace: string): Promise<number>;
  listNamespaces(): Promise<NamespaceInfo[]>;
  /** @returns number of records removed */
  deleteNamespace(namespace: string): Promise<number>;
}

export interface FailedBatch {
  batchIndex: number;
  size: number;
  failure: PipelineFailure;
}

/**
 * Outcome of VectorStoreWriter.upsert(). Partial success is reported, not masked.
 */
export interface UpsertReport {
  namespace: string;
  /** Records persisted */
  written: number;
  totalBatches: number;
  failedBatches: FailedBatch[];
}
