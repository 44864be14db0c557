/**
 * Database Module Tests
 *
 * Tests for connection, schema helpers, and migrations.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDatabase, getDb, closeDb, BUSY_TIMEOUT_MS } from '../connection.js';
import {
  runMigrations,
  getAppliedMigrations,
  hasPendingMigrations,
  CACHE_MIGRATIONS,
  VECTOR_MIGRATIONS,
} from '../migrate.js';
import { vectorToBlob, blobToVector } from '../schema.js';

describe('vectorToBlob / blobToVector', () => {
  it('round-trips values representable in float32', () => {
    const vector = [0.5, -1, 0.25, 3];

    expect(blobToVector(vectorToBlob(vector))).toEqual(vector);
  });

  it('stores 4 bytes per dimension', () => {
    expect(vectorToBlob([1, 2, 3]).byteLength).toBe(12);
  });

  it('reads from an unaligned buffer slice', () => {
    const blob = vectorToBlob([1.5, -2]);
    const padded = Buffer.concat([Buffer.from([0xff]), blob]);

    expect(blobToVector(padded.subarray(1))).toEqual([1.5, -2]);
  });

  it('rounds to float32 precision', () => {
    const [value] = blobToVector(vectorToBlob([0.1]));

    expect(value).toBeCloseTo(0.1, 6);
    expect(value).not.toBe(0.1);
  });
});

describe('Connections', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'pdfvec-db-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('creates missing parent directories and enables WAL', () => {
    const dbPath = join(testDir, 'nested', 'cache.db');
    const db = openDatabase(dbPath);

    expect(existsSync(dbPath)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(db.pragma('busy_timeout', { simple: true })).toBe(BUSY_TIMEOUT_MS);
    db.close();
  });

  it('getDb caches one connection per path', () => {
    const dbPath = join(testDir, 'vectors.db');
    const first = getDb(dbPath);

    expect(getDb(dbPath)).toBe(first);

    closeDb(dbPath);
    expect(first.open).toBe(false);

    const reopened = getDb(dbPath);
    expect(reopened).not.toBe(first);
    closeDb(dbPath);
  });
});

describe('Migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  function tableNames(): string[] {
    return db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string');
  }

  it('creates the cache table', () => {
    const result = runMigrations(db, CACHE_MIGRATIONS);

    expect(result).toEqual({ applied: ['001-embedding-cache.sql'], failed: [] });
    expect(tableNames()).toContain('embedding_cache');
    expect(hasPendingMigrations(db, CACHE_MIGRATIONS)).toBe(false);
  });

  it('creates the vectors table', () => {
    runMigrations(db, VECTOR_MIGRATIONS);

    expect(tableNames()).toContain('vectors');
    expect(getAppliedMigrations(db).map((row) => row.name)).toEqual(['001-vectors.sql']);
  });

  it('is a no-op the second time on the same connection', () => {
    runMigrations(db, CACHE_MIGRATIONS);

    expect(runMigrations(db, CACHE_MIGRATIONS)).toEqual({ applied: [], failed: [] });
  });

  it('reports failures and keeps going', () => {
    const result = runMigrations(db, [
      { name: 'bad.sql', sql: 'CREATE TABLE (' },
      { name: 'good.sql', sql: 'CREATE TABLE ok (id INTEGER)' },
    ]);

    expect(result.applied).toEqual(['good.sql']);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0]?.name).toBe('bad.sql');
  });

  it('reports pending migrations on a fresh database', () => {
    expect(getAppliedMigrations(db)).toEqual([]);
    expect(hasPendingMigrations(db, VECTOR_MIGRATIONS)).toBe(true);
  });
});
