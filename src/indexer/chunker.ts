/**
 * Chunker
 *
 * Recursive character splitting with overlap. Text is split on the first
 * separator that occurs in it (headings, then paragraphs, lines, sentences,
 * words, characters); pieces still longer than chunkSize are split again
 * with the remaining separators, and small pieces are merged back up to
 * chunkSize with `chunkOverlap` characters carried into the next chunk.
 *
 * Separators are kept at the start of the piece that follows them.
 */

import { PipelineError } from '../errors/index.js';
import { chunkId, type Chunk, type SourceDocument } from './types.js';

/** Split points, strongest first */
export const DEFAULT_SEPARATORS: readonly string[] = [
  '\n### ',
  '\n## ',
  '\n# ',
  '\n\n',
  '\n',
  '. ',
  ' ',
  '',
];

/** Text placed between pages when a document is chunked as one text */
const PAGE_SEPARATOR = '\n\n';

export interface ChunkingOptions {
  /** Maximum chunk length in characters */
  chunkSize: number;
  /** Characters shared by consecutive chunks; must be < chunkSize */
  chunkOverlap: number;
  separators?: readonly string[];
}

function splitOn(text: string, separator: string): string[] {
  if (separator === '') {
    return [...text];
  }
  return text
    .split(separator)
    .map((part, i) => (i === 0 ? part : separator + part))
    .filter((part) => part !== '');
}

/**
 * Merge small pieces into chunks of at most `chunkSize`, keeping up to
 * `chunkOverlap` trailing characters of each chunk at the head of the next.
 */
function mergePieces(pieces: readonly string[], chunkSize: number, chunkOverlap: number): string[] {
  const chunks: string[] = [];
  const current: string[] = [];
  let total = 0;

  const flush = (): void => {
    const chunk = current.join('').trim();
    if (chunk !== '') chunks.push(chunk);
  };

  for (const piece of pieces) {
    if (current.length > 0 && total + piece.length > chunkSize) {
      flush();
      while (total > chunkOverlap || (total > 0 && total + piece.length > chunkSize)) {
        const dropped = current.shift();
        if (dropped === undefined) break;
        total -= dropped.length;
      }
    }
    current.push(piece);
    total += piece.length;
  }
  flush();

  return chunks;
}

function recursiveSplit(text: string, separators: readonly string[], options: ChunkingOptions): string[] {
  const index = separators.findIndex((separator) => separator === '' || text.includes(separator));
  const separator = separators[index];
  if (separator === undefined) {
    const whole = text.trim();
    return whole === '' ? [] : [whole];
  }
  const remaining = separators.slice(index + 1);

  const chunks: string[] = [];
  let small: string[] = [];
  for (const piece of splitOn(text, separator)) {
    if (piece.length < options.chunkSize) {
      small.push(piece);
      continue;
    }
    if (small.length > 0) {
      chunks.push(...mergePieces(small, options.chunkSize, options.chunkOverlap));
      small = [];
    }
    if (remaining.length === 0) {
      const whole = piece.trim();
      if (whole !== '') chunks.push(whole);
    } else {
      chunks.push(...recursiveSplit(piece, remaining, options));
    }
  }
  if (small.length > 0) {
    chunks.push(...mergePieces(small, options.chunkSize, options.chunkOverlap));
  }

  return chunks;
}

/**
 * @throws PipelineError('Configuration') when overlap is not below size
 */
export function assertChunkingOptions(options: ChunkingOptions): void {
  if (options.chunkSize < 1 || options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
    throw new PipelineError(
      'Configuration',
      `chunk_overlap (${options.chunkOverlap}) must be >= 0 and smaller than chunk_size (${options.chunkSize})`
    );
  }
}

/**
 * Split text into overlapping chunks.
 *
 * @throws PipelineError('Configuration') when overlap is not below size
 *
 * @example
 * splitText('aaaa bbbb cccc dddd', { chunkSize: 10, chunkOverlap: 0 })
 * // => ['aaaa bbbb', 'cccc dddd']
 */
export function splitText(text: string, options: ChunkingOptions): string[] {
  assertChunkingOptions(options);
  return recursiveSplit(text, options.separators ?? DEFAULT_SEPARATORS, options);
}

interface PageSpan {
  pageNumber: number;
  start: number;
}

function pageAt(spans: readonly PageSpan[], offset: number): number {
  let pageNumber = spans[0]?.pageNumber ?? 1;
  for (const span of spans) {
    if (span.start > offset) break;
    pageNumber = span.pageNumber;
  }
  return pageNumber;
}

/**
 * Chunk an extracted document.
 *
 * Pages are joined with a blank line and chunked as one text, so a chunk
 * may span pages; `pageStart`/`pageEnd` record the range.
 *
 * @throws PipelineError('Chunking') when the document yields no chunk
 */
export function chunkDocument(document: SourceDocument, options: ChunkingOptions): Chunk[] {
  const spans: PageSpan[] = [];
  let text = '';
  for (const page of document.pages) {
    if (page.text.trim() === '') continue;
    if (text !== '') text += PAGE_SEPARATOR;
    spans.push({ pageNumber: page.pageNumber, start: text.length });
    text += page.text;
  }

  const pieces = splitText(text, options);
  if (pieces.length === 0) {
    throw new PipelineError('Chunking', `${document.fileName} produced no chunks`);
  }

  // Locate each chunk in the joined text to find its pages
  let previousStart = 0;
  let previousLength = 0;
  return pieces.map((piece, sequenceIndex) => {
    const searchFrom = Math.max(0, previousStart + previousLength - options.chunkOverlap);
    let start = text.indexOf(piece, searchFrom);
    if (start === -1) start = text.indexOf(piece, previousStart);
    if (start === -1) start = previousStart;
    previousStart = start;
    previousLength = piece.length;

    return {
      id: chunkId(document.id, sequenceIndex),
      text: piece,
      sourceDocumentId: document.id,
      sequenceIndex,
      metadata: {
        source: document.path,
        fileName: document.fileName,
        chunkIndex: sequenceIndex,
        totalChunks: pieces.length,
        chunkSize: piece.length,
        pageStart: pageAt(spans, start),
        pageEnd: pageAt(spans, start + piece.length - 1),
      },
    };
  });
}
