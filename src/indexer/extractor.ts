/**
 * PDF Text Extraction
 *
 * Reads the native text layer of a PDF with unpdf, one entry per page.
 * There is no OCR: a PDF without any text layer is an Extraction failure.
 */

import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { getDocumentProxy } from 'unpdf';

import { PipelineError } from '../errors/index.js';
import type { PageText, PdfFileInfo, SourceDocument } from './types.js';

/**
 * Stable document id from a root-relative path.
 *
 * @example
 * documentId('Manuals/Setup Guide.pdf') // => 'manuals-setup-guide-pdf'
 */
export function documentId(relativePath: string): string {
  const slug = relativePath
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug === '' ? 'document' : slug;
}

/** Text of one content item; marked-content items carry none */
function itemText(item: unknown): string {
  if (typeof item !== 'object' || item === null || !('str' in item) || typeof item.str !== 'string') {
    return '';
  }
  const endOfLine = 'hasEOL' in item && item.hasEOL === true;
  return item.str + (endOfLine ? '\n' : ' ');
}

/**
 * Join text items, breaking lines where the PDF marks an end of line.
 */
export function pageText(items: readonly unknown[]): string {
  const text = items.map(itemText).join('');
  return text
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .trim();
}

/**
 * Extract a PDF's text, page by page.
 *
 * @throws PipelineError('Extraction') when no page has any text
 *
 * @example
 * ```ts
 * const doc = await extractPdf(file);
 * console.log(`${doc.fileName}: ${doc.pages.length} pages`);
 * ```
 */
export async function extractPdf(file: PdfFileInfo): Promise<SourceDocument> {
  const path = resolve(file.path);
  const buffer = await readFile(path);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));

  const pages: PageText[] = [];
  try {
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      pages.push({ pageNumber, text: pageText(content.items) });
    }
  } finally {
    await pdf.destroy();
  }

  if (pages.every((page) => page.text === '')) {
    throw new PipelineError(
      'Extraction',
      `${file.relativePath} has no text layer (scanned PDFs need OCR, which is not supported)`
    );
  }

  return {
    id: documentId(file.relativePath),
    path,
    fileName: basename(path),
    pages,
  };
}
