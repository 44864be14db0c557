/**
 * pdf-vectorizer - Library Entry Point
 *
 * The CLI (`pdfvec`) covers the common workflow:
 * ```bash
 * pdfvec index ./manuals -n manuals   # Extract, chunk, embed and store
 * pdfvec search "brake fluid" -n manuals
 * pdfvec cache stats
 * ```
 *
 * This module exports the pipeline pieces for programs that want to
 * drive them directly: the embedding cache, the orchestrator and its
 * providers, the vector store writer and the parallel dispatcher.
 *
 * @example Index a directory into an in-memory vector database
 * ```typescript
 * import {
 *   EmbeddingOrchestrator,
 *   MemoryEmbeddingCache,
 *   OpenAIEmbeddingProvider,
 *   SqliteVectorStore,
 *   VectorStoreWriter,
 *   openDatabase,
 *   runIndexPipeline,
 * } from 'pdf-vectorizer';
 *
 * const orchestrator = new EmbeddingOrchestrator({
 *   provider: new OpenAIEmbeddingProvider({ apiKey: process.env.OPENAI_API_KEY }),
 *   cache: new MemoryEmbeddingCache(),
 *   model: 'text-embedding-3-small',
 * });
 * const writer = new VectorStoreWriter(new SqliteVectorStore(openDatabase(':memory:')));
 *
 * const result = await runIndexPipeline({
 *   rootPath: './manuals',
 *   namespace: 'manuals',
 *   orchestrator,
 *   writer,
 *   chunking: { chunkSize: 1000, chunkOverlap: 200 },
 * });
 * console.log(`${result.chunksStored} chunks stored`);
 * ```
 *
 * @packageDocumentation
 */

// Fingerprint cache
export * from './cache/index.js';

// Scanning, extraction, chunking, dispatch, embedding and the pipeline
export * from './indexer/index.js';

// Vector store
export * from './store/index.js';

// Errors and failures
export * from './errors/index.js';

// Configuration
export {
  loadConfig,
  getHomeDir,
  getCacheDbPath,
  getVectorDbPath,
  ConfigSchema,
  DEFAULT_CONFIG,
  type Config,
} from './config/index.js';

// SQLite connections
export { openDatabase, getDb, closeDb, closeAllDbs } from './database/index.js';

// Logging
export { consoleLogger, silentLogger, scopedLogger, type Logger } from './utils/index.js';
