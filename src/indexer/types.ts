/**
 * Indexer Types
 *
 * Type definitions shared by the scanner, extractor, chunker, embedder and
 * pipeline: discovered PDF files, extracted source documents and chunks.
 */

// ============================================================================
// Scanning
// ============================================================================

/**
 * Metadata about a discovered PDF file.
 */
export interface PdfFileInfo {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root directory (forward slashes) */
  relativePath: string;

  /** File name with extension */
  fileName: string;

  /** File size in bytes */
  size: number;

  /** Last modification time */
  modifiedAt: Date;
}

/**
 * Options for configuring the PDF scanner.
 */
export interface ScanOptions {
  /**
   * Maximum directory depth to traverse.
   * - 0: Only scan files in the root directory
   * - Infinity (default): No limit
   */
  maxDepth?: number;

  /**
   * Additional patterns to ignore (merged with .gitignore and .pdfvecignore).
   * Uses gitignore pattern syntax.
   * @example ['drafts/', 'scan-*.pdf']
   */
  additionalIgnorePatterns?: string[];

  /**
   * Whether to follow symlinks.
   * @default false
   */
  followSymlinks?: boolean;

  /** Callback invoked for each discovered file */
  onFile?: (file: PdfFileInfo) => void;

  /** Callback invoked when a file is skipped because stat() failed */
  onError?: (path: string, error: Error) => void;
}

/**
 * Statistics about a completed scan.
 */
export interface ScanStats {
  /** Total number of PDFs discovered */
  totalFiles: number;

  /** Total size of all PDFs in bytes */
  totalSize: number;

  /** Number of files skipped due to errors */
  errorsEncountered: number;

  /** Time taken to scan in milliseconds */
  scanDurationMs: number;
}

/**
 * Result of a directory scan.
 */
export interface ScanResult {
  /** Root directory that was scanned */
  rootPath: string;

  /** Discovered PDFs, sorted by relative path */
  files: PdfFileInfo[];

  /** Scan statistics */
  stats: ScanStats;
}

/**
 * Default patterns to ignore during scanning.
 * These are always applied in addition to .gitignore and .pdfvecignore.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Version control
  '.git',
  '.svn',
  '.hg',

  // Dependencies and build outputs
  'node_modules',
  'venv',
  '.venv',
  '__pycache__',
  'dist',
  'build',
  '.cache',

  // OS files
  '.DS_Store',
  'Thumbs.db',

  // pdfvec's own data directory
  '.pdfvec',
];

// ============================================================================
// Extraction
// ============================================================================

/**
 * Native text of one PDF page.
 */
export interface PageText {
  /** 1-based page number */
  pageNumber: number;
  text: string;
}

/**
 * A PDF after text extraction.
 */
export interface SourceDocument {
  /** Stable id: slug of the path relative to the scanned root */
  id: string;

  /** Absolute path */
  path: string;

  fileName: string;

  pages: PageText[];
}

// ============================================================================
// Chunking
// ============================================================================

/**
 * Positional metadata carried by every chunk.
 */
export interface ChunkMetadata {
  /** Absolute path of the source PDF */
  source: string;
  fileName: string;
  /** Same as Chunk.sequenceIndex */
  chunkIndex: number;
  /** Number of chunks the document produced */
  totalChunks: number;
  /** Chunk length in characters */
  chunkSize: number;
  /** First page the chunk's text comes from (1-based) */
  pageStart: number;
  /** Last page the chunk's text comes from (1-based) */
  pageEnd: number;
}

/**
 * A contiguous, overlapping segment of a document's text.
 *
 * `id` is `<sourceDocumentId>:<sequenceIndex>`, so re-running extraction
 * and chunking on unchanged input reproduces identical ids.
 */
export interface Chunk {
  readonly id: string;
  readonly text: string;
  readonly sourceDocumentId: string;
  readonly sequenceIndex: number;
  readonly metadata: Readonly<ChunkMetadata>;
}

/**
 * Build a chunk id from its document id and position.
 */
export function chunkId(sourceDocumentId: string, sequenceIndex: number): string {
  return `${sourceDocumentId}:${sequenceIndex}`;
}
