/**
 * Database Connection Module
 *
 * SQLite connections via better-sqlite3. pdfvec keeps two database files
 * (cache.db and vectors.db, see config/paths.ts), so connections are cached
 * per path instead of as a single module-level instance.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

/** How long a writer waits on a locked database before SQLITE_BUSY */
export const BUSY_TIMEOUT_MS = 5000;

/** Path-keyed connection cache */
const connections = new Map<string, Database.Database>();

let exitHandlerRegistered = false;

/**
 * Open a new connection with pdfvec's pragmas.
 *
 * Creates the parent directory for file databases. Pass ':memory:' for an
 * in-memory database (tests).
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  // WAL lets readers (pdfvec status) run while an index run is writing
  db.pragma('journal_mode = WAL');
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  db.pragma('foreign_keys = ON');

  return db;
}

/**
 * Get the shared connection for a database file.
 *
 * Opens it on first call; subsequent calls return the same instance.
 *
 * @example
 * ```ts
 * const db = getDb(getCacheDbPath());
 * const row = db.prepare('SELECT COUNT(*) AS count FROM embedding_cache').get();
 * ```
 */
export function getDb(dbPath: string): Database.Database {
  const existing = connections.get(dbPath);
  if (existing) {
    return existing;
  }

  const db = openDatabase(dbPath);
  connections.set(dbPath, db);

  if (!exitHandlerRegistered) {
    exitHandlerRegistered = true;
    process.on('exit', () => closeAllDbs());
  }

  return db;
}

/**
 * Close the shared connection for a path.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(dbPath: string): void {
  const db = connections.get(dbPath);
  if (db) {
    db.close();
    connections.delete(dbPath);
  }
}

/**
 * Close every shared connection.
 */
export function closeAllDbs(): void {
  for (const dbPath of [...connections.keys()]) {
    closeDb(dbPath);
  }
}
