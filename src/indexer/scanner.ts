/**
 * PDF Scanner
 *
 * Discovers PDF files under a directory with fast-glob, applying the
 * default, .gitignore and .pdfvecignore patterns.
 */

import { statSync } from 'node:fs';
import { basename, relative, resolve, sep } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError } from '../errors/index.js';
import { createIgnoreFilter } from './ignore.js';
import type { PdfFileInfo, ScanOptions, ScanResult, ScanStats } from './types.js';

export type { ScanResult, ScanStats };

/** Matches .pdf in any case (fast-glob runs with caseSensitiveMatch off) */
const PDF_PATTERN = '**/*.pdf';

/**
 * Scan a directory for PDFs.
 *
 * A path that names a single PDF file is scanned as a one-file result
 * rooted at its directory.
 *
 * @throws FileNotFoundError when the path does not exist
 *
 * @example
 * ```ts
 * const result = await scanDirectory('./manuals', {
 *   onFile: (file) => console.log(`Found: ${file.relativePath}`),
 * });
 * console.log(`Discovered ${result.stats.totalFiles} PDFs`);
 * ```
 */
export async function scanDirectory(
  rootPath: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const startTime = performance.now();
  const absolutePath = resolve(rootPath);

  let isFile: boolean;
  try {
    isFile = statSync(absolutePath).isFile();
  } catch {
    throw new FileNotFoundError(absolutePath);
  }

  const stats: ScanStats = {
    totalFiles: 0,
    totalSize: 0,
    errorsEncountered: 0,
    scanDurationMs: 0,
  };
  const files: PdfFileInfo[] = [];

  const collect = (path: string, root: string): void => {
    let info: PdfFileInfo;
    try {
      info = getFileInfo(path, root);
    } catch (error) {
      stats.errorsEncountered++;
      options.onError?.(path, error instanceof Error ? error : new Error(String(error)));
      return;
    }
    files.push(info);
    stats.totalFiles++;
    stats.totalSize += info.size;
    options.onFile?.(info);
  };

  if (isFile) {
    const root = resolve(absolutePath, '..');
    if (absolutePath.toLowerCase().endsWith('.pdf')) {
      collect(absolutePath, root);
    }
    stats.scanDurationMs = Math.round(performance.now() - startTime);
    return { rootPath: root, files, stats };
  }

  const shouldIgnore = createIgnoreFilter({
    rootPath: absolutePath,
    additionalPatterns: options.additionalIgnorePatterns,
  });

  const entries = await fg(PDF_PATTERN, {
    cwd: absolutePath,
    absolute: true,
    dot: false,
    onlyFiles: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: options.followSymlinks ?? false,
    deep: options.maxDepth ?? Infinity,
    suppressErrors: true,
  });

  // Sorted so document order (and chunk ids) do not depend on traversal order
  for (const entry of [...entries].sort()) {
    if (shouldIgnore(relative(absolutePath, entry))) {
      continue;
    }
    collect(entry, absolutePath);
  }

  stats.scanDurationMs = Math.round(performance.now() - startTime);
  return { rootPath: absolutePath, files, stats };
}

function getFileInfo(absolutePath: string, rootPath: string): PdfFileInfo {
  const stat = statSync(absolutePath);
  return {
    path: absolutePath,
    relativePath: relative(rootPath, absolutePath).split(sep).join('/'),
    fileName: basename(absolutePath),
    size: stat.size,
    modifiedAt: stat.mtime,
  };
}
