/**
 * Index Pipeline Tests
 *
 * Real scanner over a temp directory, a scripted extractor in place of
 * unpdf, the fake embedding provider and an in-memory vector store.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { MemoryEmbeddingCache } from '../../cache/index.js';
import { openDatabase } from '../../database/index.js';
import { PipelineError } from '../../errors/index.js';
import { SqliteVectorStore, VectorStoreWriter } from '../../store/index.js';
import { FakeEmbeddingProvider } from '../../test-utils/index.js';
import { CANCELLED_BEFORE_DISPATCH } from '../dispatcher.js';
import { EmbeddingOrchestrator } from '../embedder/index.js';
import { documentId } from '../extractor.js';
import {
  runExtractPipeline,
  runIndexPipeline,
  uniqueDocumentIds,
  type IndexPipelineOptions,
  type IndexingStage,
} from '../pipeline.js';
import type { PdfFileInfo, SourceDocument } from '../types.js';

const FAST_RETRY = { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, jitter: 0 };

describe('uniqueDocumentIds', () => {
  it('suffixes later collisions in order', () => {
    const ids = uniqueDocumentIds([{ id: 'a' }, { id: 'b' }, { id: 'a' }, { id: 'a' }]).map((d) => d.id);

    expect(ids).toEqual(['a', 'b', 'a-2', 'a-3']);
  });

  it('skips suffixes already taken by another document', () => {
    const ids = uniqueDocumentIds([{ id: 'a-2' }, { id: 'a' }, { id: 'a' }]).map((d) => d.id);

    expect(ids).toEqual(['a-2', 'a', 'a-3']);
  });
});

describe('runIndexPipeline', () => {
  let tempDir: string;
  let db: Database.Database;
  let store: SqliteVectorStore;
  let cache: MemoryEmbeddingCache;
  let provider: FakeEmbeddingProvider;
  /** Page texts per relative path; an Error makes extraction throw it */
  let pdfs: Record<string, string[] | Error>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'pdfvec-pipeline-'));
    db = openDatabase(':memory:');
    store = new SqliteVectorStore(db);
    cache = new MemoryEmbeddingCache();
    provider = new FakeEmbeddingProvider();
    pdfs = {};
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  function addPdf(relativePath: string, content: string[] | Error): void {
    const fullPath = join(tempDir, relativePath);
    mkdirSync(resolve(fullPath, '..'), { recursive: true });
    writeFileSync(fullPath, '%PDF-1.4');
    pdfs[relativePath] = content;
  }

  async function fakeExtract(file: PdfFileInfo): Promise<SourceDocument> {
    const content = pdfs[file.relativePath];
    if (content === undefined) throw new Error(`unexpected file ${file.relativePath}`);
    if (content instanceof Error) throw content;
    return {
      id: documentId(file.relativePath),
      path: file.path,
      fileName: file.fileName,
      pages: content.map((text, i) => ({ pageNumber: i + 1, text })),
    };
  }

  function run(overrides: Partial<IndexPipelineOptions> = {}) {
    return runIndexPipeline({
      rootPath: tempDir,
      namespace: 'ns',
      orchestrator: new EmbeddingOrchestrator({ provider, cache, model: 'm1', retry: FAST_RETRY }),
      writer: new VectorStoreWriter(store),
      chunking: { chunkSize: 100, chunkOverlap: 10 },
      extract: fakeExtract,
      ...overrides,
    });
  }

  it('indexes every PDF into the namespace', async () => {
    addPdf('a.pdf', ['alpha text']);
    addPdf('b.pdf', ['beta text']);

    const result = await run();

    expect(result).toMatchObject({
      filesScanned: 2,
      documentsExtracted: 2,
      chunksCreated: 2,
      embedding: { cached: 0, embedded: 2, failed: 0 },
      chunksStored: 2,
      vectorsRemoved: 0,
      documentFailures: [],
      cancelled: false,
      errors: [],
    });
    expect(await store.count('ns')).toBe(2);
    expect((await store.fetch('a-pdf:0', 'ns'))?.metadata).toMatchObject({
      fileName: 'a.pdf',
      sourceDocumentId: 'a-pdf',
      model: 'm1',
      text: 'alpha text',
    });
  });

  it('serves a re-run from the cache and overwrites the same records', async () => {
    addPdf('a.pdf', ['alpha text']);
    addPdf('b.pdf', ['beta text']);
    await run();

    const second = await run();

    expect(provider.calls).toHaveLength(1);
    expect(second.embedding).toEqual({ cached: 2, embedded: 0, failed: 0 });
    expect(await store.count('ns')).toBe(2);
  });

  it('records a failed extraction and indexes the other documents', async () => {
    addPdf('a.pdf', ['alpha text']);
    addPdf('broken.pdf', new Error('corrupt xref table'));

    const result = await run();

    expect(result.documentFailures).toEqual([
      {
        file: 'broken.pdf',
        stage: 'extracting',
        failure: expect.objectContaining({ kind: 'Extraction', message: 'corrupt xref table' }),
      },
    ]);
    expect(result.errors).toEqual(['broken.pdf: corrupt xref table']);
    expect(result.chunksStored).toBe(1);
  });

  it('records a document that produces no chunks', async () => {
    addPdf('a.pdf', ['alpha text']);
    addPdf('blank.pdf', ['   ', '\n']);

    const result = await run();

    expect(result.documentFailures).toEqual([
      {
        file: 'blank.pdf',
        stage: 'chunking',
        failure: expect.objectContaining({ kind: 'Chunking', message: 'blank.pdf produced no chunks' }),
      },
    ]);
    expect(result.chunksCreated).toBe(1);
  });

  it('keeps colliding document ids apart', async () => {
    addPdf('a b.pdf', ['first']);
    addPdf('a-b.pdf', ['second']);

    await run();

    expect((await store.fetch('a-b-pdf:0', 'ns'))?.metadata).toMatchObject({ fileName: 'a b.pdf' });
    expect((await store.fetch('a-b-pdf-2:0', 'ns'))?.metadata).toMatchObject({ fileName: 'a-b.pdf' });
  });

  it('reports chunks whose batch failed and stores the rest', async () => {
    provider = new FakeEmbeddingProvider({
      script: (texts) =>
        texts.includes('beta text') ? { status: 'fatal', error: new Error('Invalid input') } : undefined,
    });
    addPdf('a.pdf', ['alpha text']);
    addPdf('b.pdf', ['beta text']);

    const result = await run({
      orchestrator: new EmbeddingOrchestrator({ provider, cache, model: 'm1', batchSize: 1, retry: FAST_RETRY }),
    });

    expect(result.embedding).toEqual({ cached: 0, embedded: 1, failed: 1 });
    expect(result.errors).toEqual(['1 chunk(s) not embedded: Invalid input']);
    expect(await store.count('ns')).toBe(1);
  });

  it('clears the namespace first when reset is set', async () => {
    await store.upsertBatch([{ vectorId: 'old:0', vector: [1, 2, 3], namespace: 'ns', metadata: {} }], 'ns');
    addPdf('a.pdf', ['alpha text']);

    const result = await run({ reset: true });

    expect(result.vectorsRemoved).toBe(1);
    expect(await store.fetch('old:0', 'ns')).toBeUndefined();
    expect(await store.count('ns')).toBe(1);
  });

  it('keeps indexing when the namespace reset fails', async () => {
    const writer = new VectorStoreWriter(store);
    vi.spyOn(writer, 'resetNamespace').mockRejectedValue(new Error('database is locked'));
    addPdf('a.pdf', ['alpha text']);

    const result = await run({ writer, reset: true });

    expect(result.resetFailure).toMatchObject({ kind: 'Storage', message: 'database is locked' });
    expect(result.vectorsRemoved).toBe(0);
    expect(result.errors).toEqual(['Namespace reset failed: database is locked']);
    expect(result.chunksStored).toBe(1);
    expect(await store.count('ns')).toBe(1);
  });

  it('estimates usage from the texts sent to the API', async () => {
    addPdf('a.pdf', ['alpha text']);
    addPdf('b.pdf', ['beta text']);

    const first = await run();
    const second = await run();

    expect(first.usage).toEqual({ model: 'm1', texts: 2, tokens: 6, costUsd: undefined });
    expect(second.usage).toEqual({ model: 'm1', texts: 0, tokens: 0, costUsd: undefined });
  });

  it('writes Markdown beside the index when markdownDir is set', async () => {
    addPdf('a.pdf', ['alpha text']);
    const markdownDir = join(tempDir, 'md');

    const result = await run({ markdownDir });

    expect(result.markdownFiles).toEqual([join(markdownDir, 'a-pdf.md')]);
    expect(result.chunksStored).toBe(1);
  });

  it('reports a batch the store rejects', async () => {
    await store.upsertBatch([{ vectorId: 'old:0', vector: [1, 2], namespace: 'ns', metadata: {} }], 'ns');
    addPdf('a.pdf', ['alpha text']);
    addPdf('b.pdf', ['beta text']);

    const result = await run();

    expect(result.chunksStored).toBe(0);
    expect(result.storage.failedBatches).toHaveLength(1);
    expect(result.errors).toEqual([
      'batch 0: 2 record(s) not stored: Vector a-pdf:0 has 3 dimensions; namespace "ns" holds 2',
    ]);
  });

  it('stops dispatching after abort and still stores what was embedded', async () => {
    addPdf('a.pdf', ['alpha text']);
    addPdf('b.pdf', ['beta text']);
    await run();
    const controller = new AbortController();

    const result = await run({
      namespace: 'partial',
      extractionWorkers: 1,
      signal: controller.signal,
      extract: async (file) => {
        const document = await fakeExtract(file);
        controller.abort();
        return document;
      },
    });

    expect(result.cancelled).toBe(true);
    expect(result.documentFailures).toEqual([
      {
        file: 'b.pdf',
        stage: 'extracting',
        failure: expect.objectContaining({ message: CANCELLED_BEFORE_DISPATCH }),
      },
    ]);
    expect(result.embedding).toEqual({ cached: 1, embedded: 0, failed: 0 });
    expect(await store.count('partial')).toBe(1);
  });

  it('runs the stages in order', async () => {
    addPdf('a.pdf', ['alpha text']);
    const started: IndexingStage[] = [];
    const completed: IndexingStage[] = [];

    await run({
      onStageStart: (stage) => started.push(stage),
      onStageComplete: (stage) => completed.push(stage),
    });

    const order: IndexingStage[] = ['scanning', 'extracting', 'chunking', 'embedding', 'storing'];
    expect(started).toEqual(order);
    expect(completed).toEqual(order);
  });

  it('rejects an overlap that is not below the chunk size before scanning', async () => {
    const onStageStart = () => {
      throw new Error('should not start');
    };

    await expect(run({ chunking: { chunkSize: 100, chunkOverlap: 100 }, onStageStart })).rejects.toBeInstanceOf(
      PipelineError
    );
  });
});

describe('runExtractPipeline', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'pdfvec-extract-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function addPdf(relativePath: string): void {
    writeFileSync(join(tempDir, relativePath), '%PDF-1.4');
  }

  async function fakeExtract(file: PdfFileInfo): Promise<SourceDocument> {
    if (file.fileName === 'broken.pdf') throw new Error('corrupt xref table');
    return {
      id: documentId(file.relativePath),
      path: file.path,
      fileName: file.fileName,
      pages: [{ pageNumber: 1, text: `${file.fileName} text` }],
    };
  }

  it('extracts documents and exports them as Markdown without embedding', async () => {
    addPdf('a.pdf');
    addPdf('broken.pdf');
    const markdownDir = join(tempDir, 'md');

    const result = await runExtractPipeline({ rootPath: tempDir, extract: fakeExtract, markdownDir });

    expect(result.filesScanned).toBe(2);
    expect(result.documents.map((d) => d.id)).toEqual(['a-pdf']);
    expect(result.documentFailures).toMatchObject([{ file: 'broken.pdf', stage: 'extracting' }]);
    expect(result.errors).toEqual(['broken.pdf: corrupt xref table']);
    expect(result.markdownFiles).toEqual([join(markdownDir, 'a-pdf.md')]);
    const path = result.documents[0]?.path ?? '';
    expect(readFileSync(join(markdownDir, 'a-pdf.md'), 'utf-8')).toBe(
      `# a.pdf\n\n_Source: ${path}_\n\n## Page 1\n\na.pdf text\n`
    );
  });

  it('reports a Markdown directory that cannot be created', async () => {
    addPdf('a.pdf');
    const markdownDir = join(tempDir, 'taken');
    writeFileSync(markdownDir, 'not a directory');

    const result = await runExtractPipeline({ rootPath: tempDir, extract: fakeExtract, markdownDir });

    expect(result.documents).toHaveLength(1);
    expect(result.markdownFiles).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toContain(': Markdown export failed: ');
    expect(result.errors[0]?.startsWith(`${markdownDir}: `)).toBe(true);
  });
});
