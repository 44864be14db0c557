/**
 * Search Command
 *
 * Embeds a query with the configured model and returns the closest chunks
 * of one namespace.
 *
 *   pdfvec search "torque settings for the rear axle"
 *   pdfvec search "warranty period" -n manuals -k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import {
  openVectorStore,
  resolveEmbeddingProvider,
  retryOptionsFromConfig,
  type ServiceOverrides,
} from '../utils/services.js';
import { formatNamespace } from '../utils/format.js';
import { SearchArgsSchema, SearchOptionsSchema, validateInput } from '../validation.js';
import { loadConfig } from '../../config/index.js';
import { CLIError, PipelineError, ValidationError, isPipelineFailure } from '../../errors/index.js';
import { RateLimitedBatchExecutor } from '../../indexer/embedder/index.js';
import type { QueryMatch } from '../../store/index.js';

/**
 * Command-specific options parsed from CLI arguments.
 */
interface SearchCommandOptions {
  namespace?: string;
  topK: string;
}

/** Characters of chunk text shown per result */
const SNIPPET_LENGTH = 200;

function pageRange(match: QueryMatch): string {
  const { pageStart, pageEnd } = match.metadata;
  if (typeof pageStart !== 'number') return '';
  return typeof pageEnd === 'number' && pageEnd !== pageStart ? `pp. ${pageStart}-${pageEnd}` : `p. ${pageStart}`;
}

function snippet(match: QueryMatch): string {
  const text = typeof match.metadata.text === 'string' ? match.metadata.text : '';
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > SNIPPET_LENGTH ? `${flat.slice(0, SNIPPET_LENGTH)}...` : flat;
}

/**
 * Render matches for the terminal.
 */
export function formatMatches(matches: readonly QueryMatch[]): string {
  return matches
    .map((match, i) => {
      const fileName = typeof match.metadata.fileName === 'string' ? match.metadata.fileName : match.vectorId;
      const pages = pageRange(match);
      const header = `${chalk.bold(`${i + 1}.`)} ${chalk.cyan(fileName)}${pages ? chalk.dim(` (${pages})`) : ''} ${chalk.yellow(match.score.toFixed(3))}`;
      const body = snippet(match);
      return body ? `${header}\n   ${chalk.dim(body)}` : header;
    })
    .join('\n\n');
}

/**
 * Create the search command.
 *
 * @param overrides - Replaces services built from config (tests)
 */
export function createSearchCommand(
  getContext: () => CommandContext,
  overrides: ServiceOverrides = {}
): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Find the chunks closest to a query')
    .option('-n, --namespace <name>', 'Namespace to search (defaults to store.namespace)')
    .option('-k, --top-k <number>', 'Number of results to return', '5')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const args = validateInput(SearchArgsSchema, { query });
      if (!args.success) {
        throw new ValidationError(args.error);
      }
      const options = validateInput(SearchOptionsSchema, cmdOptions);
      if (!options.success) {
        throw new ValidationError(options.error);
      }

      const config = loadConfig();
      const namespace = options.data.namespace ?? config.store.namespace;
      const topK = options.data.topK;
      ctx.debug(`Query: "${args.data.query}" in ${formatNamespace(namespace)}, top ${topK}`);

      const provider = resolveEmbeddingProvider(config, overrides);
      const store = openVectorStore(ctx);

      if ((await store.count(namespace)) === 0) {
        throw new CLIError(
          `Namespace ${formatNamespace(namespace)} has no vectors`,
          'Run: pdfvec index <path>  to index PDFs first'
        );
      }

      const executor = new RateLimitedBatchExecutor(provider, {
        maxWorkers: 1,
        retry: retryOptionsFromConfig(config.retry),
        logger: ctx,
      });
      const [outcome] = await executor.execute([[args.data.query]], config.embedding.model);
      if (outcome === undefined || isPipelineFailure(outcome)) {
        throw new PipelineError('Embedding', `Could not embed the query: ${outcome?.message ?? 'no result'}`, outcome?.cause);
      }
      const [vector] = outcome;
      if (vector === undefined) {
        throw new PipelineError('Embedding', 'Could not embed the query: no vector returned');
      }

      const matches = await store.query(vector, topK, namespace);

      if (ctx.options.json) {
        console.log(JSON.stringify({ query: args.data.query, namespace, matches }, null, 2));
        return;
      }

      if (matches.length === 0) {
        ctx.log(chalk.yellow(`No results found for "${args.data.query}"`));
        ctx.log(chalk.dim(`Vectors in ${formatNamespace(namespace)} may come from a model with other dimensions.`));
        return;
      }

      ctx.log(formatMatches(matches));
    });
}
