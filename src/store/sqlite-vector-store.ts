/**
 * SQLite Vector Store
 *
 * VectorStore backed by the `vectors` table in vectors.db, keyed by
 * (namespace, id). Similarity queries are a brute-force cosine scan over
 * one namespace.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  CountRowSchema,
  VECTOR_MIGRATIONS,
  VectorMetadataSchema,
  VectorRowSchema,
  blobToVector,
  getDb,
  openDatabase,
  runMigrations,
  validateRow,
  validateRows,
  vectorToBlob,
  type VectorRowData,
} from '../database/index.js';
import { DatabaseError, PipelineError } from '../errors/index.js';
import { safeJsonParse, silentLogger, type Logger } from '../utils/index.js';
import type { NamespaceInfo, QueryMatch, VectorMetadata, VectorRecord, VectorStore } from './types.js';

const NamespaceRowSchema = z.object({
  namespace: z.string(),
  count: z.number().int().nonnegative(),
  dimensions: z.number().int().positive(),
});

const DimensionsRowSchema = z.object({ dimensions: z.number().int().positive() });

export interface SqliteVectorStoreOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly upsertStmt: Database.Statement;
  private readonly dimensionsStmt: Database.Statement;

  constructor(db: Database.Database, options: SqliteVectorStoreOptions = {}) {
    this.db = db;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());

    const migration = runMigrations(db, VECTOR_MIGRATIONS);
    const [firstFailure] = migration.failed;
    if (firstFailure) {
      throw new DatabaseError(
        `Vector store migration ${firstFailure.name} failed: ${firstFailure.error}`
      );
    }

    this.upsertStmt = db.prepare(`
      INSERT INTO vectors (namespace, id, dimensions, vector, metadata, updated_at)
      VALUES (@namespace, @id, @dimensions, @vector, @metadata, @updated_at)
      ON CONFLICT(namespace, id) DO UPDATE SET
        dimensions = excluded.dimensions,
        vector = excluded.vector,
        metadata = excluded.metadata,
        updated_at = excluded.updated_at
    `);
    this.dimensionsStmt = db.prepare('SELECT dimensions FROM vectors WHERE namespace = ? LIMIT 1');
  }

  /**
   * Open (or create) a vector database file.
   *
   * `shared` reuses the process-wide connection for that path.
   */
  static open(
    dbPath: string,
    options: SqliteVectorStoreOptions & { shared?: boolean } = {}
  ): SqliteVectorStore {
    const db = options.shared === false ? openDatabase(dbPath) : getDb(dbPath);
    return new SqliteVectorStore(db, options);
  }

  async upsertBatch(records: readonly VectorRecord[], namespace: string): Promise<number> {
    if (records.length === 0) return 0;

    const dimensions = this.namespaceDimensions(namespace) ?? records[0]?.vector.length ?? 0;
    for (const record of records) {
      if (record.vector.length === 0 || !record.vector.every(Number.isFinite)) {
        throw new PipelineError('Storage', `Vector ${record.vectorId} is empty or not finite`);
      }
      if (record.vector.length !== dimensions) {
        throw new PipelineError(
          'Storage',
          `Vector ${record.vectorId} has ${record.vector.length} dimensions; namespace "${namespace}" holds ${dimensions}`
        );
      }
    }

    const updatedAt = this.now().toISOString();
    const writeAll = this.db.transaction((batch: readonly VectorRecord[]) => {
      for (const record of batch) {
        this.upsertStmt.run({
          namespace,
          id: record.vectorId,
          dimensions: record.vector.length,
          vector: vectorToBlob(record.vector),
          metadata: JSON.stringify(record.metadata),
          updated_at: updatedAt,
        });
      }
    });
    writeAll(records);
    return records.length;
  }

  async query(vector: readonly number[], topK: number, namespace: string): Promise<QueryMatch[]> {
    if (topK <= 0) return [];

    const rows = this.loadRows('SELECT * FROM vectors WHERE namespace = ?', namespace);
    const matches: QueryMatch[] = [];
    for (const row of rows) {
      if (row.dimensions !== vector.length) continue;
      matches.push({
        vectorId: row.id,
        score: cosineSimilarity(vector, blobToVector(row.vector)),
        metadata: this.parseMetadata(row),
      });
    }

    // Ties keep id order so results are stable across runs
    matches.sort((a, b) => b.score - a.score || a.vectorId.localeCompare(b.vectorId));
    return matches.slice(0, topK);
  }

  async fetch(vectorId: string, namespace: string): Promise<VectorRecord | undefined> {
    const [row] = this.loadRows('SELECT * FROM vectors WHERE namespace = ? AND id = ?', namespace, vectorId);
    if (!row) return undefined;
    return {
      vectorId: row.id,
      vector: blobToVector(row.vector),
      namespace: row.namespace,
      metadata: this.parseMetadata(row),
    };
  }

  async count(namespace: string): Promise<number> {
    const { count } = validateRow(
      CountRowSchema,
      this.db.prepare('SELECT COUNT(*) AS count FROM vectors WHERE namespace = ?').get(namespace),
      `vectors.count(${namespace})`
    );
    return count;
  }

  async listNamespaces(): Promise<NamespaceInfo[]> {
    return validateRows(
      NamespaceRowSchema,
      this.db
        .prepare(
          'SELECT namespace, COUNT(*) AS count, MAX(dimensions) AS dimensions FROM vectors GROUP BY namespace ORDER BY namespace'
        )
        .all(),
      'vectors.namespaces'
    );
  }

  async deleteNamespace(namespace: string): Promise<number> {
    return this.db.prepare('DELETE FROM vectors WHERE namespace = ?').run(namespace).changes;
  }

  private namespaceDimensions(namespace: string): number | undefined {
    const row = this.dimensionsStmt.get(namespace);
    if (!row) return undefined;
    return validateRow(DimensionsRowSchema, row, `vectors.dimensions(${namespace})`).dimensions;
  }

  private loadRows(sql: string, ...params: string[]): VectorRowData[] {
    return validateRows(VectorRowSchema, this.db.prepare(sql).all(...params), 'vectors');
  }

  private parseMetadata(row: VectorRowData): VectorMetadata {
    return safeJsonParse(row.metadata, VectorMetadataSchema, {}, (err) => {
      this.logger.warn(`[store] Skipping corrupted metadata for vector ${row.id}: ${err.message}`);
    });
  }
}
