/**
 * Startup Configuration Validation
 *
 * Validates the API key and configuration before a command does any work.
 * Errors here are Configuration failures: the command aborts before the
 * first document is dispatched. Warnings never block.
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import { hasApiKey, hasInvalidBaseUrl, SETUP_INSTRUCTIONS } from './env.js';
import type { Config } from './schema.js';
import { ConfigError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether the command may run */
  valid: boolean;
  /** Warning messages (non-fatal issues) */
  warnings: string[];
  /** Error messages (abort the command) */
  errors: string[];
  /** Hint messages with setup instructions */
  hints: string[];
  /** Loaded config, when it could be loaded */
  config?: Config;
}

/**
 * Options for startup validation.
 */
export interface StartupValidationOptions {
  /** Skip API key validation (for commands that don't call the embedding API) */
  skipEmbedding?: boolean;
  /** Use this config instead of loading config.toml */
  config?: Config;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration at CLI startup.
 *
 * Checks:
 * 1. config.toml parses and passes the schema (unless a config is given)
 * 2. OPENAI_API_KEY is set (commands that embed)
 * 3. OPENAI_BASE_URL, when set, is a URL
 *
 * @example
 * const result = validateStartupConfig({ skipEmbedding: false });
 * if (!result.valid) {
 *   printStartupValidation(result);
 *   process.exit(2);
 * }
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipEmbedding = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  let config = options.config;
  if (!config) {
    try {
      config = loadConfig(false);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
      if (error instanceof ConfigError && error.hint) {
        hints.push(error.hint);
      }
    }
  }

  if (!skipEmbedding) {
    if (!hasApiKey()) {
      errors.push('OpenAI embedding provider configured but OPENAI_API_KEY is not set');
      hints.push(SETUP_INSTRUCTIONS);
    }
    if (hasInvalidBaseUrl()) {
      errors.push('OPENAI_BASE_URL is set but is not a valid URL');
      hints.push('Use a full URL such as https://api.openai.com/v1, or unset OPENAI_BASE_URL');
    }
  }

  if (config && !config.cache.enabled) {
    warnings.push('Embedding cache is disabled: every chunk will be sent to the embedding API');
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
    config,
  };
}

/**
 * Print startup validation warnings/errors to console.
 *
 * @param verbose - Whether to show warnings (errors are always shown)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that call the embedding API.
 * Other commands can run without an API key.
 */
export const COMMANDS_REQUIRING_EMBEDDING = ['index', 'search'];

/**
 * Validation options for a command name (e.g. 'index', 'status').
 */
export function getValidationOptionsForCommand(
  command: string
): StartupValidationOptions {
  return {
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command),
  };
}
