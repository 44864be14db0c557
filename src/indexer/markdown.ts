/**
 * Markdown export of extracted documents.
 *
 * One `<document id>.md` per PDF: a title, the source path, then a
 * `## Page N` section per page that has text. Lets the extracted text be
 * reviewed, or chunked by other tools, without re-reading the PDFs.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { SourceDocument } from './types.js';

export function documentToMarkdown(document: SourceDocument): string {
  const lines = [`# ${document.fileName}`, '', `_Source: ${document.path}_`, ''];
  for (const page of document.pages) {
    const text = page.text.trim();
    if (text === '') continue;
    lines.push(`## Page ${page.pageNumber}`, '', text, '');
  }
  return lines.join('\n');
}

/**
 * Write one Markdown file per document into `outputDir` (created if missing).
 *
 * @returns Written paths, in document order
 */
export async function writeMarkdownFiles(
  documents: readonly SourceDocument[],
  outputDir: string
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });
  const written: string[] = [];
  for (const document of documents) {
    const path = join(outputDir, `${document.id}.md`);
    await writeFile(path, documentToMarkdown(document), 'utf-8');
    written.push(path);
  }
  return written;
}
