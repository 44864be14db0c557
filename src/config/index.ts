/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `pdfvec config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  RetryConfigSchema,
  ExtractionConfigSchema,
  ChunkingConfigSchema,
  CacheConfigSchema,
  StoreConfigSchema,
  checkConfigConsistency,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  listConfig,
  deepMerge,
  parseValue,
  ensureHomeDir,
} from './loader.js';

// Paths
export {
  getHomeDir,
  getConfigPath,
  getCacheDbPath,
  getVectorDbPath,
  CONFIG_FILE_NAME,
  CACHE_DB_FILE_NAME,
  VECTOR_DB_FILE_NAME,
} from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  hasInvalidBaseUrl,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_EMBEDDING,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
