/**
 * SQLite Embedding Cache
 *
 * Durable EmbeddingCache backed by the `embedding_cache` table in cache.db.
 * Fingerprint is the primary key, so each lookup is a single index seek.
 *
 * better-sqlite3 is synchronous and every statement runs to completion
 * before the next starts; concurrent put() calls for one fingerprint are
 * serialized by SQLite and `ON CONFLICT DO NOTHING` keeps the first row.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  CACHE_MIGRATIONS,
  CountRowSchema,
  EmbeddingCacheRowSchema,
  blobToVector,
  getDb,
  openDatabase,
  runMigrations,
  validateRow,
  validateRows,
  vectorToBlob,
  type EmbeddingCacheRowData,
} from '../database/index.js';
import { DatabaseError } from '../errors/index.js';
import type { CacheEntry, CacheStats, ClearOptions, EmbeddingCache } from './types.js';
import { assertCacheable } from './validate.js';

/** Stay well below SQLite's bound-parameter limit */
const LOOKUP_CHUNK_SIZE = 500;

const ModelCountRowSchema = z.object({
  model: z.string(),
  count: z.number().int().nonnegative(),
});

const SizeRowSchema = z.object({ size: z.number().int().nonnegative().nullable() });

export interface SqliteEmbeddingCacheOptions {
  /** Clock for created_at (tests) */
  now?: () => Date;
}

export class SqliteEmbeddingCache implements EmbeddingCache {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  private readonly selectStmt: Database.Statement;
  private readonly insertStmt: Database.Statement;

  constructor(db: Database.Database, options: SqliteEmbeddingCacheOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());

    const migration = runMigrations(db, CACHE_MIGRATIONS);
    const [firstFailure] = migration.failed;
    if (firstFailure) {
      throw new DatabaseError(
        `Embedding cache migration ${firstFailure.name} failed: ${firstFailure.error}`
      );
    }

    this.selectStmt = db.prepare('SELECT * FROM embedding_cache WHERE fingerprint = ?');
    this.insertStmt = db.prepare(`
      INSERT INTO embedding_cache (fingerprint, model, dimensions, vector, created_at)
      VALUES (@fingerprint, @model, @dimensions, @vector, @created_at)
      ON CONFLICT(fingerprint) DO NOTHING
    `);
  }

  /**
   * Open (or create) a cache database file.
   *
   * `shared` reuses the process-wide connection for that path.
   */
  static open(dbPath: string, options: SqliteEmbeddingCacheOptions & { shared?: boolean } = {}): SqliteEmbeddingCache {
    const db = options.shared === false ? openDatabase(dbPath) : getDb(dbPath);
    return new SqliteEmbeddingCache(db, options);
  }

  get(fingerprint: string, model?: string): CacheEntry | undefined {
    const row = this.selectStmt.get(fingerprint);
    if (!row) {
      return undefined;
    }
    const entry = toEntry(validateRow(EmbeddingCacheRowSchema, row, `embedding_cache.fingerprint=${fingerprint}`));
    return model === undefined || entry.model === model ? entry : undefined;
  }

  getMany(fingerprints: readonly string[], model?: string): Map<string, CacheEntry> {
    const hits = new Map<string, CacheEntry>();
    const unique = [...new Set(fingerprints)];

    for (let start = 0; start < unique.length; start += LOOKUP_CHUNK_SIZE) {
      const slice = unique.slice(start, start + LOOKUP_CHUNK_SIZE);
      const placeholders = slice.map(() => '?').join(', ');
      const rows = this.db
        .prepare(`SELECT * FROM embedding_cache WHERE fingerprint IN (${placeholders})`)
        .all(...slice);

      for (const row of validateRows(EmbeddingCacheRowSchema, rows, 'embedding_cache')) {
        const entry = toEntry(row);
        if (model === undefined || entry.model === model) {
          hits.set(entry.fingerprint, entry);
        }
      }
    }

    return hits;
  }

  put(fingerprint: string, vector: readonly number[], model: string): CacheEntry {
    assertCacheable(fingerprint, vector, model);

    this.insertStmt.run({
      fingerprint,
      model,
      dimensions: vector.length,
      vector: vectorToBlob(vector),
      created_at: this.now().toISOString(),
    });

    // Read back: if another writer won, its row is the one that counts
    const stored = this.get(fingerprint);
    if (!stored) {
      throw new DatabaseError(`Embedding cache write for ${fingerprint} was not persisted`);
    }
    return stored;
  }

  clear(options: ClearOptions = {}): number {
    const result =
      options.model === undefined
        ? this.db.prepare('DELETE FROM embedding_cache').run()
        : this.db.prepare('DELETE FROM embedding_cache WHERE model = ?').run(options.model);
    return result.changes;
  }

  stats(): CacheStats {
    const { count } = validateRow(
      CountRowSchema,
      this.db.prepare('SELECT COUNT(*) AS count FROM embedding_cache').get(),
      'embedding_cache.count'
    );
    const { size } = validateRow(
      SizeRowSchema,
      this.db.prepare('SELECT SUM(LENGTH(vector)) AS size FROM embedding_cache').get(),
      'embedding_cache.size'
    );
    const perModel = validateRows(
      ModelCountRowSchema,
      this.db
        .prepare('SELECT model, COUNT(*) AS count FROM embedding_cache GROUP BY model ORDER BY model')
        .all(),
      'embedding_cache.models'
    );

    const models: Record<string, number> = {};
    for (const row of perModel) {
      models[row.model] = row.count;
    }

    return { entries: count, models, sizeBytes: size ?? 0 };
  }
}

function toEntry(row: EmbeddingCacheRowData): CacheEntry {
  return {
    fingerprint: row.fingerprint,
    vector: blobToVector(row.vector),
    model: row.model,
    dimensions: row.dimensions,
    createdAt: row.created_at,
  };
}
