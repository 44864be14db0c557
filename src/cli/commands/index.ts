/**
 * Index Command
 *
 * Extracts, chunks and embeds the PDFs under a path into a namespace of
 * the vector store.
 *
 * Usage:
 *   pdfvec index <path>                  Index a directory (or one PDF)
 *   pdfvec index ./docs -n manuals       Write to the "manuals" namespace
 *   pdfvec index ./docs --reset          Clear the namespace first
 *   pdfvec index . --json                Output progress as NDJSON
 *   pdfvec index . --verbose             Show detailed per-file progress
 *   pdfvec index ./docs --markdown ./md  Also write each document as Markdown
 *
 * The indexing pipeline:
 * 1. Scanning - Discover PDFs, honouring .gitignore and .pdfvecignore
 * 2. Extracting - Read each PDF's text layer in parallel
 * 3. Chunking - Split text into overlapping chunks
 * 4. Embedding - Cached, rate-limited embedding of each chunk
 * 5. Storing - Upsert vectors in batches
 *
 * Ctrl+C stops dispatching new work; whatever was embedded is stored.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { createPipelineServices, type ServiceOverrides } from '../utils/services.js';
import { IndexOptionsSchema, validateInput } from '../validation.js';
import { runIndexPipeline, type IndexPipelineResult } from '../../indexer/index.js';
import { loadConfig } from '../../config/index.js';
import { ValidationError } from '../../errors/index.js';

/**
 * Command-specific options (as Commander parses them).
 */
interface IndexCommandOptions {
  namespace?: string;
  reset?: boolean;
  workers?: string;
  ignore?: string;
  markdown?: string;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 * @param overrides - Replaces services built from config (tests)
 */
export function createIndexCommand(
  getContext: () => CommandContext,
  overrides: ServiceOverrides = {}
): Command {
  return new Command('index')
    .argument('<path>', 'Directory (or single PDF) to index')
    .description('Extract, chunk and embed PDFs into the vector store')
    .option('-n, --namespace <name>', 'Vector store namespace (defaults to store.namespace)')
    .option('--reset', 'Remove every vector in the namespace before writing', false)
    .option('-w, --workers <count>', 'Concurrent PDF extractions (defaults to extraction.max_workers)')
    .option('-i, --ignore <patterns>', 'Comma-separated extra ignore patterns (gitignore syntax)')
    .option('--markdown <dir>', 'Also write each extracted document to <dir> as Markdown')
    .action(async (path: string, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();

      const validated = validateInput(IndexOptionsSchema, cmdOptions);
      if (!validated.success) {
        throw new ValidationError(validated.error);
      }
      const options = validated.data;

      const rootPath = resolve(path);
      const config = loadConfig();
      const namespace = options.namespace ?? config.store.namespace;

      ctx.debug(`Indexing path: ${rootPath}`);
      ctx.debug(`Namespace: ${namespace === '' ? '(default)' : namespace}`);
      ctx.debug(`Embedding model: ${config.embedding.model}`);

      const services = createPipelineServices(config, ctx, overrides);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
        noColor: !!process.env.NO_COLOR,
        isInteractive: process.stdout.isTTY ?? false,
      });

      // First Ctrl+C cancels gracefully; the default handler returns once we detach
      const controller = new AbortController();
      const onSigint = (): void => {
        ctx.warn('Cancelling: waiting for in-flight work to finish...');
        controller.abort();
        process.off('SIGINT', onSigint);
      };
      process.on('SIGINT', onSigint);

      let result: IndexPipelineResult;
      try {
        result = await runIndexPipeline({
          rootPath,
          namespace,
          orchestrator: services.orchestrator,
          writer: services.writer,
          chunking: {
            chunkSize: config.chunking.chunk_size,
            chunkOverlap: config.chunking.chunk_overlap,
          },
          extractionWorkers: options.workers ?? config.extraction.max_workers,
          reset: options.reset,
          ignorePatterns: options.ignore,
          markdownDir: options.markdown === undefined ? undefined : resolve(options.markdown),
          signal: controller.signal,

          onStageStart: (stage, total) => {
            reporter.startStage(stage, total);
          },
          onProgress: (_stage, processed, _total, currentFile) => {
            reporter.updateProgress(processed, currentFile);
          },
          onStageComplete: (_stage, stats) => {
            reporter.completeStage(stats);
          },
          onWarning: (message, context) => {
            reporter.warn(message, context);
          },
          onError: (message, context) => {
            reporter.error(message, context);
          },
        });
      } finally {
        process.off('SIGINT', onSigint);
      }

      reporter.showSummary(result);

      const incomplete = result.chunksStored < result.chunksCreated || result.documentFailures.length > 0;
      if (result.cancelled || incomplete || result.errors.length > 0) {
        process.exitCode = 1;
      }
    });
}
