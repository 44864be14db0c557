/**
 * Ignore Pattern Handling
 *
 * Gitignore-style filtering for the PDF scanner. Patterns come from the
 * defaults, the root's .gitignore and .pdfvecignore, and the caller.
 * Uses the 'ignore' package, which implements the full gitignore spec.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import type { Logger } from '../utils/index.js';
import { DEFAULT_IGNORE_PATTERNS } from './types.js';

/** Project-specific ignore file, read after .gitignore */
export const PDFVEC_IGNORE_FILE = '.pdfvecignore';

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore / .pdfvecignore */
  rootPath: string;

  /** Additional patterns (highest priority) */
  additionalPatterns?: string[];

  /** Whether to use DEFAULT_IGNORE_PATTERNS (default true) */
  useDefaults?: boolean;

  /** Receives a warning when an ignore file exists but cannot be read */
  logger?: Logger;
}

/**
 * Returns true when a path should be IGNORED.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Parse ignore file content into patterns, dropping blanks and comments.
 * Negations (`!keep.pdf`) are kept.
 */
export function parseIgnoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Load patterns from an ignore file; a missing file yields none.
 */
export function loadIgnoreFile(path: string, logger?: Logger): string[] {
  if (!existsSync(path)) {
    return [];
  }

  try {
    return parseIgnoreContent(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.warn(`Could not read ${path}: ${message}`);
    return [];
  }
}

/**
 * Create an ignore filter for a root directory.
 *
 * Precedence, lowest first: defaults, .gitignore, .pdfvecignore,
 * additionalPatterns.
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({
 *   rootPath: '/data/manuals',
 *   additionalPatterns: ['drafts/'],
 * });
 *
 * shouldIgnore('drafts/v1.pdf'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true, logger } = options;

  const ig: Ignore = ignore();

  if (useDefaults) {
    ig.add(DEFAULT_IGNORE_PATTERNS);
  }
  ig.add(loadIgnoreFile(join(rootPath, '.gitignore'), logger));
  ig.add(loadIgnoreFile(join(rootPath, PDFVEC_IGNORE_FILE), logger));
  if (additionalPatterns.length > 0) {
    ig.add(additionalPatterns);
  }

  // The ignore library expects root-relative paths with forward slashes
  return (filePath: string): boolean => {
    let relativePath = isAbsolute(filePath) ? relative(rootPath, filePath) : filePath;

    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    // The root itself, and anything outside it, is never ignored
    if (relativePath === '' || relativePath.startsWith('..')) {
      return false;
    }

    return ig.ignores(relativePath);
  };
}
