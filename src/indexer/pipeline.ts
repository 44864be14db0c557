/**
 * Index Pipeline
 *
 * Orchestrates the complete indexing workflow:
 * Scan → Extract → Chunk → Embed → Store
 *
 * The first two stages also run on their own (runExtractPipeline), e.g. to
 * export extracted text as Markdown without embedding anything.
 *
 * The pipeline does not know how progress is displayed; it fires callbacks
 * at the right moments and returns aggregated statistics.
 *
 * Design principles:
 * - Each stage has start/progress/complete callbacks
 * - Per-document and per-batch failures are collected, not thrown
 * - Cancellation stops new work; everything already embedded is stored
 * - Usable programmatically (without the CLI)
 */

import {
  isPipelineFailure,
  toPipelineFailure,
  type PipelineFailure,
} from '../errors/index.js';
import type { UpsertReport } from '../store/types.js';
import { toVectorRecords, type VectorStoreWriter } from '../store/writer.js';
import { assertChunkingOptions, chunkDocument, type ChunkingOptions } from './chunker.js';
import { runParallel } from './dispatcher.js';
import { estimateUsage, type UsageEstimate } from './embedder/cost.js';
import { summarize, type EmbeddingOrchestrator } from './embedder/embedder.js';
import type { EmbedSummary, EnrichedChunk } from './embedder/types.js';
import { extractPdf } from './extractor.js';
import { writeMarkdownFiles } from './markdown.js';
import { scanDirectory } from './scanner.js';
import type { Chunk, PdfFileInfo, SourceDocument } from './types.js';

/**
 * Stages in the indexing pipeline.
 * Order matters - this is the sequence they occur in.
 */
export type IndexingStage = 'scanning' | 'extracting' | 'chunking' | 'embedding' | 'storing';

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: IndexingStage;
  /** Number of items processed */
  processed: number;
  /** Total items in this stage */
  total: number;
  durationMs: number;
  /** Additional stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * A PDF that did not make it to the embedding stage.
 */
export interface DocumentFailure {
  /** Path relative to the scanned root */
  file: string;
  stage: 'extracting' | 'chunking';
  failure: PipelineFailure;
}

/** An extracted PDF with its (deduplicated) document id */
export type ExtractedDocument = SourceDocument & { file: PdfFileInfo };

/**
 * Result of scanning and extracting.
 */
export interface ExtractPipelineResult {
  rootPath: string;
  filesScanned: number;
  documents: ExtractedDocument[];
  documentFailures: DocumentFailure[];

  /** Markdown files written (empty without markdownDir) */
  markdownFiles: string[];

  /** True when the run was aborted before every item was dispatched */
  cancelled: boolean;

  totalDurationMs: number;
  stageDurations: Partial<Record<IndexingStage, number>>;

  warnings: string[];
  errors: string[];
}

/**
 * Final result of the indexing pipeline.
 */
export interface IndexPipelineResult {
  rootPath: string;
  namespace: string;

  filesScanned: number;
  documentsExtracted: number;
  chunksCreated: number;

  /** Cached, freshly embedded and failed chunk counts */
  embedding: EmbedSummary;

  /** Estimated tokens and cost of the texts sent to the embedding API */
  usage: UsageEstimate;

  /** Records written to the vector store */
  chunksStored: number;
  storage: UpsertReport;

  /** Records removed by a namespace reset (0 without reset) */
  vectorsRemoved: number;

  /** Set when --reset could not clear the namespace; new records are still written */
  resetFailure?: PipelineFailure;

  markdownFiles: string[];

  documentFailures: DocumentFailure[];

  /** True when the run was aborted before every item was dispatched */
  cancelled: boolean;

  totalDurationMs: number;
  stageDurations: Partial<Record<IndexingStage, number>>;

  warnings: string[];
  errors: string[];
}

/**
 * Options for scanning and extracting.
 */
export interface ExtractPipelineOptions {
  /** File or directory to index */
  rootPath: string;

  /** Concurrent PDF extractions (default: min(32, cpu + 4)) */
  extractionWorkers?: number;

  /** Extra gitignore-style patterns for the scanner */
  ignorePatterns?: string[];
  maxDepth?: number;

  /** Write one `<document id>.md` per extracted document here */
  markdownDir?: string;

  /** Replaces the unpdf extractor (tests) */
  extract?: (file: PdfFileInfo) => Promise<SourceDocument>;

  /**
   * AbortSignal for cancellation support.
   *
   * When aborted, no new document or embedding batch is started. Work in
   * flight finishes, and every chunk embedded so far is still written.
   */
  signal?: AbortSignal;

  // Progress callbacks
  onStageStart?: (stage: IndexingStage, total: number) => void;
  onProgress?: (stage: IndexingStage, processed: number, total: number, currentFile?: string) => void;
  onStageComplete?: (stage: IndexingStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (message: string, context?: string) => void;
}

/**
 * Options for running the index pipeline.
 */
export interface IndexPipelineOptions extends ExtractPipelineOptions {
  /** Vector store namespace ("" is the default namespace) */
  namespace: string;

  orchestrator: EmbeddingOrchestrator;
  writer: VectorStoreWriter;
  chunking: ChunkingOptions;

  /** Clear the namespace before writing */
  reset?: boolean;
}

/**
 * Make document ids unique in input order: the first keeps its slug, later
 * collisions get `-2`, `-3`, ...
 *
 * @example
 * uniqueDocumentIds([{ id: 'a' }, { id: 'a' }]) // ids: 'a', 'a-2'
 */
export function uniqueDocumentIds<T extends { id: string }>(documents: readonly T[]): T[] {
  const used = new Set<string>();
  return documents.map((document) => {
    let id = document.id;
    for (let suffix = 2; used.has(id); suffix++) {
      id = `${document.id}-${suffix}`;
    }
    used.add(id);
    return id === document.id ? document : { ...document, id };
  });
}

/**
 * Scan and extract: stages 1 and 2 of the index pipeline.
 *
 * @throws FileNotFoundError when rootPath does not exist
 *
 * @example
 * ```typescript
 * const { documents, markdownFiles } = await runExtractPipeline({
 *   rootPath: './manuals',
 *   markdownDir: './manuals-md',
 * });
 * ```
 */
export async function runExtractPipeline(options: ExtractPipelineOptions): Promise<ExtractPipelineResult> {
  const { signal, onStageStart, onProgress, onStageComplete, onWarning, onError } = options;
  const extract = options.extract ?? extractPdf;

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<IndexingStage, number>> = {};
  const warnings: string[] = [];
  const errors: string[] = [];
  const documentFailures: DocumentFailure[] = [];

  const reportError = (message: string, context?: string): void => {
    errors.push(context ? `${context}: ${message}` : message);
    onError?.(message, context);
  };

  // =========================================================================
  // STAGE 1: SCANNING
  // =========================================================================
  const scanStartTime = performance.now();
  onStageStart?.('scanning', 0);

  let filesFound = 0;
  const scanResult = await scanDirectory(options.rootPath, {
    maxDepth: options.maxDepth,
    additionalIgnorePatterns: options.ignorePatterns,
    onFile: (file) => {
      filesFound++;
      onProgress?.('scanning', filesFound, 0, file.relativePath);
    },
    onError: (path, error) => {
      const msg = `Failed to read: ${error.message}`;
      warnings.push(`${path}: ${msg}`);
      onWarning?.(msg, path);
    },
  });
  const files = scanResult.files;

  stageDurations.scanning = Math.round(performance.now() - scanStartTime);
  onStageComplete?.('scanning', {
    stage: 'scanning',
    processed: files.length,
    total: files.length,
    durationMs: stageDurations.scanning,
    details: { totalSize: scanResult.stats.totalSize },
  });

  // =========================================================================
  // STAGE 2: EXTRACTING
  // =========================================================================
  const extractStartTime = performance.now();
  onStageStart?.('extracting', files.length);

  let extracted = 0;
  const extractionResults = await runParallel(extract, files, {
    maxWorkers: options.extractionWorkers,
    failureKind: 'Extraction',
    signal,
    onSettled: (_result, _index, file) => {
      extracted++;
      onProgress?.('extracting', extracted, files.length, file.relativePath);
    },
  });

  const extractedDocuments: Array<{ file: PdfFileInfo; document: SourceDocument }> = [];
  extractionResults.forEach((result, index) => {
    const file = files[index];
    if (file === undefined) return;
    if (isPipelineFailure(result)) {
      documentFailures.push({ file: file.relativePath, stage: 'extracting', failure: result });
      reportError(result.message, file.relativePath);
      return;
    }
    extractedDocuments.push({ file, document: result });
  });

  // Ids are assigned in sorted path order, so collisions resolve the same way on every run
  const documents = uniqueDocumentIds(
    extractedDocuments.map(({ file, document }) => ({ ...document, file }))
  );

  let markdownFiles: string[] = [];
  if (options.markdownDir !== undefined && documents.length > 0) {
    try {
      markdownFiles = await writeMarkdownFiles(documents, options.markdownDir);
    } catch (error) {
      reportError(`Markdown export failed: ${error instanceof Error ? error.message : String(error)}`, options.markdownDir);
    }
  }

  stageDurations.extracting = Math.round(performance.now() - extractStartTime);
  onStageComplete?.('extracting', {
    stage: 'extracting',
    processed: documents.length,
    total: files.length,
    durationMs: stageDurations.extracting,
    details: { failed: files.length - documents.length, markdownFiles: markdownFiles.length },
  });

  return {
    rootPath: scanResult.rootPath,
    filesScanned: files.length,
    documents,
    documentFailures,
    markdownFiles,
    cancelled: signal?.aborted ?? false,
    totalDurationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
    warnings,
    errors,
  };
}

/**
 * Texts actually sent to the API: fresh embeddings, each distinct text once.
 */
function billedTexts(enriched: readonly EnrichedChunk[]): Set<string> {
  return new Set(enriched.filter((item) => !item.fromCache).map((item) => item.chunk.text));
}

/**
 * Run the complete indexing pipeline.
 *
 * @throws FileNotFoundError when rootPath does not exist
 * @throws PipelineError('Configuration') for invalid chunking options
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter({ json: false, verbose: true, ... });
 *
 * const result = await runIndexPipeline({
 *   rootPath: './manuals',
 *   namespace: 'manuals',
 *   orchestrator,
 *   writer,
 *   chunking: { chunkSize: 1000, chunkOverlap: 200 },
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, file) => reporter.updateProgress(processed, file),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 *   onWarning: (msg, ctx) => reporter.warn(msg, ctx),
 *   onError: (msg, ctx) => reporter.error(msg, ctx),
 * });
 *
 * reporter.showSummary(result);
 * ```
 */
export async function runIndexPipeline(
  options: IndexPipelineOptions
): Promise<IndexPipelineResult> {
  const { namespace, orchestrator, writer, chunking, signal, onStageStart, onProgress, onStageComplete, onError } =
    options;

  const pipelineStartTime = performance.now();

  assertChunkingOptions(chunking);

  const extraction = await runExtractPipeline(options);
  const { documents, documentFailures, stageDurations, warnings, errors } = extraction;

  const reportError = (message: string, context?: string): void => {
    errors.push(context ? `${context}: ${message}` : message);
    onError?.(message, context);
  };

  // =========================================================================
  // STAGE 3: CHUNKING
  // =========================================================================
  const chunkStartTime = performance.now();
  onStageStart?.('chunking', documents.length);

  const chunks: Chunk[] = [];
  let chunkedDocuments = 0;
  for (const { file, ...document } of documents) {
    try {
      chunks.push(...chunkDocument(document, chunking));
    } catch (error) {
      const failure = toPipelineFailure('Chunking', error);
      documentFailures.push({ file: file.relativePath, stage: 'chunking', failure });
      reportError(failure.message, file.relativePath);
    }
    chunkedDocuments++;
    onProgress?.('chunking', chunkedDocuments, documents.length, file.relativePath);
  }

  stageDurations.chunking = Math.round(performance.now() - chunkStartTime);
  onStageComplete?.('chunking', {
    stage: 'chunking',
    processed: chunks.length,
    total: chunks.length,
    durationMs: stageDurations.chunking,
    details: { documents: documents.length },
  });

  // =========================================================================
  // STAGE 4: EMBEDDING
  // =========================================================================
  const embedStartTime = performance.now();
  onStageStart?.('embedding', chunks.length);

  const embedResults = await orchestrator.embed(chunks, {
    signal,
    onProgress: (progress) => {
      onProgress?.(
        'embedding',
        progress.cachedChunks + progress.embeddedChunks + progress.failedChunks,
        progress.totalChunks
      );
    },
  });
  const embedding = summarize(embedResults);

  // A batch failure is shared by every chunk of the batch; report each failure once
  const failureCounts = new Map<string, number>();
  const enriched: EnrichedChunk[] = [];
  for (const result of embedResults) {
    if (isPipelineFailure(result)) {
      failureCounts.set(result.message, (failureCounts.get(result.message) ?? 0) + 1);
    } else {
      enriched.push(result);
    }
  }
  for (const [message, count] of failureCounts) {
    reportError(`${count} chunk(s) not embedded: ${message}`);
  }

  const usage = estimateUsage(billedTexts(enriched), orchestrator.model);

  stageDurations.embedding = Math.round(performance.now() - embedStartTime);
  onStageComplete?.('embedding', {
    stage: 'embedding',
    processed: enriched.length,
    total: chunks.length,
    durationMs: stageDurations.embedding,
    details: { ...embedding, estimatedTokens: usage.tokens },
  });

  // =========================================================================
  // STAGE 5: STORING
  // =========================================================================
  const storeStartTime = performance.now();
  onStageStart?.('storing', enriched.length);

  let vectorsRemoved = 0;
  let resetFailure: PipelineFailure | undefined;
  if (options.reset) {
    try {
      vectorsRemoved = await writer.resetNamespace(namespace);
    } catch (error) {
      resetFailure = toPipelineFailure('Storage', error);
      reportError(`Namespace reset failed: ${resetFailure.message}`);
    }
  }

  const storage = await writer.upsert(toVectorRecords(enriched, namespace), namespace);
  for (const failed of storage.failedBatches) {
    reportError(`${failed.size} record(s) not stored: ${failed.failure.message}`, `batch ${failed.batchIndex}`);
  }
  onProgress?.('storing', storage.written, enriched.length);

  stageDurations.storing = Math.round(performance.now() - storeStartTime);
  onStageComplete?.('storing', {
    stage: 'storing',
    processed: storage.written,
    total: enriched.length,
    durationMs: stageDurations.storing,
    details: { batches: storage.totalBatches, failedBatches: storage.failedBatches.length },
  });

  return {
    rootPath: extraction.rootPath,
    namespace,
    filesScanned: extraction.filesScanned,
    documentsExtracted: documents.length,
    chunksCreated: chunks.length,
    embedding,
    usage,
    chunksStored: storage.written,
    storage,
    vectorsRemoved,
    resetFailure,
    markdownFiles: extraction.markdownFiles,
    documentFailures,
    cancelled: signal?.aborted ?? false,
    totalDurationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
    warnings,
    errors,
  };
}
