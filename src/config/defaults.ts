/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small', // 1536 dimensions
    batch_size: 100,    // API maximum per request
    max_workers: 4,
    timeout_ms: 60000,
  },

  retry: {
    max_attempts: 3,
    base_delay_ms: 1000,
    max_delay_ms: 60000,
    jitter: 0.2,
  },

  // max_workers omitted: min(32, cpu + 4)
  extraction: {},

  chunking: {
    chunk_size: 1000,   // characters
    chunk_overlap: 200,
  },

  cache: {
    enabled: true,
  },

  store: {
    namespace: '',
    batch_size: 100,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.pdfvec/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# pdfvec Configuration
# Location: ~/.pdfvec/config.toml (or $PDFVEC_HOME/config.toml)

# Embedding Settings
# The API key is read from OPENAI_API_KEY (environment or .env file)
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
max_workers = ${DEFAULT_CONFIG.embedding.max_workers}  # never more than 4 requests in flight
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Retry Settings
# delay = min(max_delay_ms, base_delay_ms * 2^(attempt - 1)) +/- jitter
[retry]
max_attempts = ${DEFAULT_CONFIG.retry.max_attempts}
base_delay_ms = ${DEFAULT_CONFIG.retry.base_delay_ms}
max_delay_ms = ${DEFAULT_CONFIG.retry.max_delay_ms}
jitter = ${DEFAULT_CONFIG.retry.jitter}

# Extraction Settings
[extraction]
# max_workers = 8   # default: min(32, cpu count + 4)

# Chunking Settings (characters)
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

# Embedding Cache
[cache]
enabled = ${DEFAULT_CONFIG.cache.enabled}

# Vector Store
[store]
namespace = "${DEFAULT_CONFIG.store.namespace}"
batch_size = ${DEFAULT_CONFIG.store.batch_size}
`;
