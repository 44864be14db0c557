/**
 * Extract Command
 *
 * Writes the text of every PDF under a path as Markdown, one file per
 * document. Nothing is embedded, so no API key is needed.
 *
 * Usage:
 *   pdfvec extract <path> -o <dir>       Extract a directory (or one PDF)
 *   pdfvec extract ./docs -o ./md -w 4   Four concurrent extractions
 *   pdfvec extract . -o ./md --json      Output progress as NDJSON
 */

import { Command } from 'commander';
import { resolve } from 'node:path';

import type { CommandContext } from '../types.js';
import { createProgressReporter, toExtractSummary } from '../utils/progress.js';
import { ExtractOptionsSchema, validateInput } from '../validation.js';
import { runExtractPipeline, type ExtractPipelineResult } from '../../indexer/index.js';
import { loadConfig } from '../../config/index.js';
import { ValidationError } from '../../errors/index.js';

interface ExtractCommandOptions {
  output?: string;
  workers?: string;
  ignore?: string;
}

export function createExtractCommand(getContext: () => CommandContext): Command {
  return new Command('extract')
    .argument('<path>', 'Directory (or single PDF) to extract')
    .description('Write the text of each PDF as Markdown, without embedding')
    .requiredOption('-o, --output <dir>', 'Directory for the Markdown files')
    .option('-w, --workers <count>', 'Concurrent PDF extractions (defaults to extraction.max_workers)')
    .option('-i, --ignore <patterns>', 'Comma-separated extra ignore patterns (gitignore syntax)')
    .action(async (path: string, cmdOptions: ExtractCommandOptions) => {
      const ctx = getContext();

      const validated = validateInput(ExtractOptionsSchema, cmdOptions);
      if (!validated.success) {
        throw new ValidationError(validated.error);
      }
      const options = validated.data;

      const rootPath = resolve(path);
      const markdownDir = resolve(options.output);
      const config = loadConfig();

      ctx.debug(`Extracting path: ${rootPath}`);
      ctx.debug(`Markdown directory: ${markdownDir}`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
        noColor: !!process.env.NO_COLOR,
        isInteractive: process.stdout.isTTY ?? false,
      });

      const controller = new AbortController();
      const onSigint = (): void => {
        ctx.warn('Cancelling: waiting for in-flight extractions to finish...');
        controller.abort();
        process.off('SIGINT', onSigint);
      };
      process.on('SIGINT', onSigint);

      let result: ExtractPipelineResult;
      try {
        result = await runExtractPipeline({
          rootPath,
          markdownDir,
          extractionWorkers: options.workers ?? config.extraction.max_workers,
          ignorePatterns: options.ignore,
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

      reporter.showExtractSummary(toExtractSummary(result));

      if (result.cancelled || result.errors.length > 0) {
        process.exitCode = 1;
      }
    });
}
