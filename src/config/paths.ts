/**
 * Centralized Path Definitions
 *
 * Single source of truth for all pdfvec paths.
 * All modules should import from here instead of computing paths locally.
 *
 * Directory structure:
 * ~/.pdfvec/            (or $PDFVEC_HOME)
 * ├── config.toml       (User configuration)
 * ├── cache.db          (Embedding cache, SQLite)
 * └── vectors.db        (Vector store, SQLite)
 *
 * Paths are resolved on every call so PDFVEC_HOME can be changed by tests
 * (after _clearEnvCache()) or by a .env file.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export const CONFIG_FILE_NAME = 'config.toml';
export const CACHE_DB_FILE_NAME = 'cache.db';
export const VECTOR_DB_FILE_NAME = 'vectors.db';

/**
 * Get the pdfvec home directory (~/.pdfvec unless PDFVEC_HOME is set)
 */
export function getHomeDir(): string {
  const override = getEnv('PDFVEC_HOME')?.trim();
  return override ? override : join(homedir(), '.pdfvec');
}

/**
 * Get the config file path (<home>/config.toml)
 */
export function getConfigPath(): string {
  return join(getHomeDir(), CONFIG_FILE_NAME);
}

/**
 * Get the embedding cache database path (<home>/cache.db)
 */
export function getCacheDbPath(): string {
  return join(getHomeDir(), CACHE_DB_FILE_NAME);
}

/**
 * Get the vector store database path (<home>/vectors.db)
 */
export function getVectorDbPath(): string {
  return join(getHomeDir(), VECTOR_DB_FILE_NAME);
}
