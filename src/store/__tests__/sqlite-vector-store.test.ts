/**
 * SQLite Vector Store Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import { closeAllDbs, openDatabase } from '../../database/index.js';
import { PipelineError } from '../../errors/index.js';
import { SqliteVectorStore, cosineSimilarity } from '../sqlite-vector-store.js';
import type { VectorRecord } from '../types.js';

function record(vectorId: string, vector: number[], namespace = 'docs'): VectorRecord {
  return { vectorId, vector, namespace, metadata: { fileName: `${vectorId}.pdf` } };
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel and 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('is 0 against a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('SqliteVectorStore', () => {
  let db: Database.Database;
  let store: SqliteVectorStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteVectorStore(db, { now: () => new Date('2026-01-01T00:00:00.000Z') });
  });

  afterEach(() => {
    db.close();
  });

  it('upserts and fetches a record', async () => {
    await expect(store.upsertBatch([record('a:0', [0.5, 1])], 'docs')).resolves.toBe(1);

    await expect(store.fetch('a:0', 'docs')).resolves.toEqual(record('a:0', [0.5, 1]));
  });

  it('is idempotent by (namespace, id)', async () => {
    await store.upsertBatch([record('a:0', [1, 0])], 'docs');
    await store.upsertBatch([record('a:0', [0, 1])], 'docs');

    expect(await store.count('docs')).toBe(1);
    expect((await store.fetch('a:0', 'docs'))?.vector).toEqual([0, 1]);
  });

  it('keeps namespaces apart', async () => {
    await store.upsertBatch([record('a:0', [1, 0])], 'docs');
    await store.upsertBatch([record('a:0', [0, 1], 'other')], 'other');

    expect(await store.count('docs')).toBe(1);
    expect(await store.count('other')).toBe(1);
    expect((await store.fetch('a:0', 'other'))?.vector).toEqual([0, 1]);
    expect(await store.fetch('a:0', 'missing')).toBeUndefined();
  });

  it('rejects a dimension change within a namespace', async () => {
    await store.upsertBatch([record('a:0', [1, 0])], 'docs');

    await expect(store.upsertBatch([record('a:1', [1, 0, 0])], 'docs')).rejects.toThrow(PipelineError);
    expect(await store.count('docs')).toBe(1);
  });

  it('rejects non-finite vectors without writing any of the batch', async () => {
    const batch = [record('a:0', [1, 0]), record('a:1', [Number.NaN, 0])];

    await expect(store.upsertBatch(batch, 'docs')).rejects.toThrow('Vector a:1 is empty or not finite');
    expect(await store.count('docs')).toBe(0);
  });

  it('ranks query matches by cosine similarity', async () => {
    await store.upsertBatch(
      [record('far', [0, 1]), record('near', [1, 0.1]), record('exact', [2, 0])],
      'docs'
    );

    const matches = await store.query([1, 0], 2, 'docs');

    expect(matches.map((m) => m.vectorId)).toEqual(['exact', 'near']);
    expect(matches[0]?.score).toBeCloseTo(1);
    expect(matches[0]?.metadata).toEqual({ fileName: 'exact.pdf' });
  });

  it('returns nothing for topK 0 or an empty namespace', async () => {
    await store.upsertBatch([record('a:0', [1, 0])], 'docs');

    expect(await store.query([1, 0], 0, 'docs')).toEqual([]);
    expect(await store.query([1, 0], 5, 'empty')).toEqual([]);
  });

  it('falls back to empty metadata for corrupted JSON', async () => {
    const logger = { warn: vi.fn() };
    store = new SqliteVectorStore(db, { logger });
    await store.upsertBatch([record('a:0', [1, 0])], 'docs');
    db.prepare("UPDATE vectors SET metadata = '{broken'").run();

    const fetched = await store.fetch('a:0', 'docs');

    expect(fetched?.metadata).toEqual({});
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('lists and deletes namespaces', async () => {
    await store.upsertBatch([record('a:0', [1, 0]), record('a:1', [0, 1])], 'docs');
    await store.upsertBatch([record('b:0', [1, 0, 0], 'other')], 'other');

    expect(await store.listNamespaces()).toEqual([
      { namespace: 'docs', count: 2, dimensions: 2 },
      { namespace: 'other', count: 1, dimensions: 3 },
    ]);

    await expect(store.deleteNamespace('docs')).resolves.toBe(2);
    expect(await store.count('docs')).toBe(0);
    expect(await store.count('other')).toBe(1);
  });
});

describe('SqliteVectorStore.open', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pdfvec-store-'));
  });

  afterEach(() => {
    closeAllDbs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists records across connections', async () => {
    const path = join(dir, 'vectors.db');
    const writer = SqliteVectorStore.open(path, { shared: false });
    await writer.upsertBatch([record('a:0', [0.25, 0.75])], 'docs');

    const reader = SqliteVectorStore.open(path);

    expect((await reader.fetch('a:0', 'docs'))?.vector).toEqual([0.25, 0.75]);
  });
});
