/**
 * Indexer Module
 *
 * Discovers PDFs, extracts their text, chunks it, embeds the chunks and
 * hands them to the vector store writer.
 *
 * @example
 * ```ts
 * import { runIndexPipeline } from './indexer/index.js';
 *
 * const result = await runIndexPipeline({ rootPath: './manuals', namespace: 'manuals', ... });
 * console.log(`Stored ${result.chunksStored} of ${result.chunksCreated} chunks`);
 * ```
 */

// Scanning
export { scanDirectory } from './scanner.js';
export {
  createIgnoreFilter,
  loadIgnoreFile,
  parseIgnoreContent,
  PDFVEC_IGNORE_FILE,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';

// Extraction and chunking
export { extractPdf, documentId, pageText } from './extractor.js';
export { documentToMarkdown, writeMarkdownFiles } from './markdown.js';
export {
  chunkDocument,
  splitText,
  assertChunkingOptions,
  DEFAULT_SEPARATORS,
  type ChunkingOptions,
} from './chunker.js';

// Parallel work
export {
  runParallel,
  resolveWorkerCount,
  defaultWorkerCount,
  CANCELLED_BEFORE_DISPATCH,
  EMBEDDING_WORKER_CEILING,
  MAX_AUTO_WORKERS,
  type DispatchOptions,
} from './dispatcher.js';

// Types and constants
export {
  chunkId,
  DEFAULT_IGNORE_PATTERNS,
  type Chunk,
  type ChunkMetadata,
  type PageText,
  type PdfFileInfo,
  type ScanOptions,
  type ScanResult,
  type ScanStats,
  type SourceDocument,
} from './types.js';

// Embedder module
export * from './embedder/index.js';

// Pipeline orchestration
export {
  runIndexPipeline,
  runExtractPipeline,
  uniqueDocumentIds,
  type DocumentFailure,
  type ExtractedDocument,
  type ExtractPipelineOptions,
  type ExtractPipelineResult,
  type IndexingStage,
  type IndexPipelineOptions,
  type IndexPipelineResult,
  type StageStats,
} from './pipeline.js';
