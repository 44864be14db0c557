/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied in a
 * `_migrations` table. Migrations are idempotent - safe to run multiple times.
 *
 * The cache and the vector store live in separate files, each with its own
 * migration list.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

/**
 * One embedded migration.
 */
export interface Migration {
  name: string;
  sql: string;
}

/**
 * Result of running migrations.
 *
 * Provides explicit success/failure information instead of throwing.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

/**
 * Migrations for cache.db
 */
export const CACHE_MIGRATIONS: readonly Migration[] = [
  {
    name: '001-embedding-cache.sql',
    sql: `
-- Content-addressed embedding cache.
-- fingerprint = sha256(model, normalized chunk text); rows are never updated.
CREATE TABLE IF NOT EXISTS embedding_cache (
  fingerprint TEXT PRIMARY KEY,
  model TEXT NOT NULL,
  dimensions INTEGER NOT NULL,
  vector BLOB NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_embedding_cache_model ON embedding_cache(model);
    `.trim(),
  },
];

/**
 * Migrations for vectors.db
 */
export const VECTOR_MIGRATIONS: readonly Migration[] = [
  {
    name: '001-vectors.sql',
    sql: `
-- Namespaced vector records; upserts are keyed by (namespace, id).
CREATE TABLE IF NOT EXISTS vectors (
  namespace TEXT NOT NULL,
  id TEXT NOT NULL,
  dimensions INTEGER NOT NULL,
  vector BLOB NOT NULL,
  metadata TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (namespace, id)
);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });
const AppliedMigrationRowSchema = z.object({ name: z.string(), applied_at: z.string() });

/** Connections whose migrations already ran this process */
const initialized = new WeakSet<Database.Database>();

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

/**
 * Run all pending migrations on a connection.
 *
 * Failed migrations do not stop subsequent migrations from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(db, CACHE_MIGRATIONS);
 * for (const { name, error } of result.failed) {
 *   console.error(`  - ${name}: ${error}`);
 * }
 * ```
 */
export function runMigrations(
  db: Database.Database,
  migrations: readonly Migration[]
): MigrationResult {
  if (initialized.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  ensureMigrationsTable(db);

  const appliedMigrations = new Set(
    validateRows(
      MigrationNameRowSchema,
      db.prepare('SELECT name FROM _migrations').all(),
      '_migrations'
    ).map((row) => row.name)
  );

  for (const migration of migrations) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only remember success, so a failed migration is retried next time
  if (failed.length === 0) {
    initialized.add(db);
  }

  return { applied, failed };
}

/**
 * Get list of applied migrations.
 */
export function getAppliedMigrations(
  db: Database.Database
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  return validateRows(
    AppliedMigrationRowSchema,
    db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all(),
    '_migrations'
  );
}

/**
 * Check if a connection has migrations left to apply.
 */
export function hasPendingMigrations(
  db: Database.Database,
  migrations: readonly Migration[]
): boolean {
  const applied = new Set(getAppliedMigrations(db).map((row) => row.name));
  return migrations.some((migration) => !applied.has(migration.name));
}
