/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.pdfvec or $PDFVEC_HOME)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Check cross-field rules (chunk overlap, retry delays)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import {
  ConfigSchema,
  PartialConfigSchema,
  checkConfigConsistency,
  type Config,
} from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getHomeDir } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function isJsonMap(value: unknown): value is TOML.JsonMap {
  return isPlainObject(value);
}

/**
 * Ensure the config directory exists
 */
export function ensureHomeDir(): void {
  const homeDir = getHomeDir();
  if (!fs.existsSync(homeDir)) {
    fs.mkdirSync(homeDir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Validate merged values against the full schema and the cross-field rules.
 *
 * @throws ConfigError listing every issue
 */
function finalizeConfig(merged: PlainObject, context: string, hint: string): Config {
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`${context}:\n${formatIssues(result.error.issues)}`, hint);
  }

  const inconsistencies = checkConfigConsistency(result.data);
  if (inconsistencies.length > 0) {
    throw new ConfigError(
      `${context}:\n${inconsistencies.map((issue) => `  - ${issue}`).join('\n')}`,
      hint
    );
  }

  return result.data;
}

/**
 * Read the raw TOML document, or an empty map when there is no file.
 */
function readConfigFile(configPath: string): TOML.JsonMap {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: pdfvec config reset`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureHomeDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);

  // Validate against the partial schema first so errors point at the user's file
  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: pdfvec config reset  to restore defaults'
    );
  }

  return finalizeConfig(
    deepMerge(structuredClone(DEFAULT_CONFIG), validationResult.data),
    'Invalid configuration',
    'Run: pdfvec config reset  to restore defaults'
  );
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('embedding.model') => 'text-embedding-3-small'
 */
export function getConfigValue(key: string, config: Config = loadConfig()): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file after validating the result
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: pdfvec config list  to see available keys'
    );
  }

  if (getConfigValue(key, DEFAULT_CONFIG) === undefined && !isOptionalKey(key)) {
    throw new ConfigError(
      `Unknown config key: ${key}`,
      'Run: pdfvec config list  to see available keys'
    );
  }

  const configPath = getConfigPath();
  ensureHomeDir();
  const config = readConfigFile(configPath);

  let current: TOML.JsonMap = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  finalizeConfig(
    deepMerge(structuredClone(DEFAULT_CONFIG), config),
    `Invalid value for '${key}'`,
    'Run: pdfvec config list  to see current values and types'
  );

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Keys that are valid but have no default value.
 */
const OPTIONAL_KEYS = new Set(['extraction.max_workers']);

function isOptionalKey(key: string): boolean {
  return OPTIONAL_KEYS.has(key);
}

/**
 * Overwrite the config file with the default template.
 */
export function resetConfig(): void {
  ensureHomeDir();
  fs.writeFileSync(getConfigPath(), CONFIG_TEMPLATE, 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
export function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['embedding.model', 'text-embedding-3-small']
 */
export function listConfig(config: Config = loadConfig()): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
