/**
 * Vector Store Writer Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../database/index.js';
import { makeChunk } from '../../test-utils/index.js';
import { SqliteVectorStore } from '../sqlite-vector-store.js';
import type { VectorRecord } from '../types.js';
import { METADATA_TEXT_LIMIT, VectorStoreWriter, toVectorRecords } from '../writer.js';

function records(count: number, namespace = 'docs'): VectorRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    vectorId: `doc:${i}`,
    vector: [1, i],
    namespace,
    metadata: {},
  }));
}

describe('toVectorRecords', () => {
  it('maps chunk ids, vectors and metadata', () => {
    const chunk = makeChunk('hello', 3, 'manual');

    const [record] = toVectorRecords([{ chunk, vector: [0.1, 0.2], model: 'm1', fromCache: true }], 'ns');

    expect(record).toEqual({
      vectorId: 'manual:3',
      vector: [0.1, 0.2],
      namespace: 'ns',
      metadata: {
        source: '/pdfs/manual.pdf',
        fileName: 'manual.pdf',
        chunkIndex: 3,
        totalChunks: 4,
        chunkSize: 5,
        pageStart: 1,
        pageEnd: 1,
        sourceDocumentId: 'manual',
        model: 'm1',
        text: 'hello',
      },
    });
  });

  it('truncates the text kept in metadata', () => {
    const chunk = makeChunk('x'.repeat(METADATA_TEXT_LIMIT + 50), 0);

    const [record] = toVectorRecords([{ chunk, vector: [1], model: 'm1', fromCache: false }], 'ns');

    expect(record?.metadata.text).toBe('x'.repeat(METADATA_TEXT_LIMIT));
  });
});

describe('VectorStoreWriter', () => {
  let db: Database.Database;
  let store: SqliteVectorStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteVectorStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('writes in batches of batchSize', async () => {
    const upsertBatch = vi.spyOn(store, 'upsertBatch');
    const writer = new VectorStoreWriter(store, { batchSize: 2 });

    const report = await writer.upsert(records(5), 'docs');

    expect(report).toEqual({ namespace: 'docs', written: 5, totalBatches: 3, failedBatches: [] });
    expect(upsertBatch.mock.calls.map(([batch]) => batch.length)).toEqual([2, 2, 1]);
    expect(await store.count('docs')).toBe(5);
  });

  it('is idempotent across repeated upserts', async () => {
    const writer = new VectorStoreWriter(store);

    await writer.upsert(records(3), 'docs');
    const report = await writer.upsert(records(3), 'docs');

    expect(report.written).toBe(3);
    expect(await store.count('docs')).toBe(3);
  });

  it('fails only the batch holding a record of another namespace', async () => {
    const writer = new VectorStoreWriter(store, { batchSize: 2 });
    const input: VectorRecord[] = [
      ...records(2),
      { vectorId: 'stray:0', vector: [1, 0], namespace: 'other', metadata: {} },
    ];

    const report = await writer.upsert(input, 'docs');

    expect(report.written).toBe(2);
    expect(report.totalBatches).toBe(2);
    expect(report.failedBatches).toHaveLength(1);
    expect(report.failedBatches[0]).toMatchObject({
      batchIndex: 1,
      size: 1,
      failure: {
        kind: 'Storage',
        message: 'Record stray:0 belongs to namespace "other", not "docs"',
      },
    });
    expect(await store.count('other')).toBe(0);
  });

  it('reports a store error as a Storage failure and keeps going', async () => {
    const upsertBatch = vi.spyOn(store, 'upsertBatch');
    upsertBatch.mockRejectedValueOnce(new Error('SQLITE_FULL: database or disk is full'));
    const logger = { warn: vi.fn() };
    const writer = new VectorStoreWriter(store, { batchSize: 2, logger });

    const report = await writer.upsert(records(4), 'docs');

    expect(report.written).toBe(2);
    expect(report.failedBatches[0]).toMatchObject({
      batchIndex: 0,
      size: 2,
      failure: { kind: 'Storage', message: 'SQLITE_FULL: database or disk is full' },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      '[store] Batch 0 (2 records) failed: SQLITE_FULL: database or disk is full'
    );
  });

  it('reports nothing for an empty input', async () => {
    const report = await new VectorStoreWriter(store).upsert([], 'docs');

    expect(report).toEqual({ namespace: 'docs', written: 0, totalBatches: 0, failedBatches: [] });
  });

  it('resets a namespace', async () => {
    const writer = new VectorStoreWriter(store);
    await writer.upsert(records(3), 'docs');

    await expect(writer.resetNamespace('docs')).resolves.toBe(3);
    expect(await store.count('docs')).toBe(0);
  });
});
