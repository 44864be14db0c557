/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to the embedding API key.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema.
 * The key is not required at load time; commands that embed check for it
 * during startup validation, so `pdfvec cache stats` works without one.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  /** OpenAI-compatible endpoint (Azure proxy, local gateway, ...) */
  OPENAI_BASE_URL: z.string().url().optional(),
  /** Overrides ~/.pdfvec */
  PDFVEC_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * _clearEnvCache() resets it between tests.
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * An invalid OPENAI_BASE_URL is dropped rather than failing every command;
 * startup validation reports it for the commands that need it.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
    PDFVEC_HOME: process.env.PDFVEC_HOME,
  };
  const result = EnvSchema.safeParse(raw);

  _envCache = result.success
    ? result.data
    : { OPENAI_API_KEY: raw.OPENAI_API_KEY, PDFVEC_HOME: raw.PDFVEC_HOME };

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if the OpenAI API key is configured (non-empty).
 * Returns true/false WITHOUT exposing the key value.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().OPENAI_API_KEY?.trim());
}

/**
 * Whether OPENAI_BASE_URL is set in the environment but not a valid URL.
 */
export function hasInvalidBaseUrl(): boolean {
  const raw = process.env.OPENAI_BASE_URL;
  return Boolean(raw?.trim()) && loadEnv().OPENAI_BASE_URL === undefined;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when OPENAI_API_KEY is missing.
 */
export const SETUP_INSTRUCTIONS = `
To compute embeddings with OpenAI:

1. Get your API key from https://platform.openai.com/api-keys
2. Set the environment variable:

   # macOS/Linux (add to ~/.bashrc or ~/.zshrc)
   export OPENAI_API_KEY="sk-..."

   # Windows (PowerShell)
   $env:OPENAI_API_KEY="sk-..."

   # or put it in a .env file in the directory you run pdfvec from
   OPENAI_API_KEY=sk-...

3. Restart your terminal or run: source ~/.bashrc
`.trim();
