/**
 * Cache Command
 *
 * Inspects and clears the embedding cache (cache.db):
 *   pdfvec cache stats                 - Entry counts per model
 *   pdfvec cache clear --force         - Remove every entry
 *   pdfvec cache clear -m <model> -f   - Remove one model's entries
 *
 * Clearing the cache never touches the vector store.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, statSync } from 'node:fs';
import type { CommandContext } from '../types.js';
import { SqliteEmbeddingCache } from '../../cache/index.js';
import { getCacheDbPath } from '../../config/index.js';
import { formatTable } from '../../utils/index.js';
import { formatBytes, formatNumber, formatPath } from '../utils/format.js';

/**
 * Create the cache command with its subcommands
 */
export function createCacheCommand(getContext: () => CommandContext): Command {
  const cacheCmd = new Command('cache').description('Inspect or clear the embedding cache');

  // pdfvec cache stats
  cacheCmd
    .command('stats')
    .description('Show cached embeddings per model')
    .action(() => {
      const ctx = getContext();
      const dbPath = getCacheDbPath();
      const stats = SqliteEmbeddingCache.open(dbPath).stats();
      const fileSize = existsSync(dbPath) ? statSync(dbPath).size : 0;

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: dbPath, fileSize, ...stats }, null, 2));
        return;
      }

      const lines: string[] = [];
      lines.push(chalk.bold('Embedding Cache'));
      lines.push(chalk.dim('─'.repeat(35)));
      lines.push(`${chalk.cyan('Entries:')}      ${formatNumber(stats.entries)}`);
      lines.push(`${chalk.cyan('Vector data:')}  ${formatBytes(stats.sizeBytes)}`);
      lines.push(`${chalk.cyan('Database:')}     ${formatBytes(fileSize)} (${formatPath(dbPath)})`);

      const models = Object.entries(stats.models);
      if (models.length > 0) {
        lines.push('');
        lines.push(
          formatTable(
            [
              { header: 'Model', key: 'model', maxWidth: 40 },
              { header: 'Entries', key: 'entries', align: 'right' },
            ],
            models.map(([model, entries]) => ({ model, entries: formatNumber(entries) }))
          )
        );
      }

      ctx.log(lines.join('\n'));
    });

  // pdfvec cache clear
  cacheCmd
    .command('clear')
    .description('Remove cached embeddings (the next index run re-embeds them)')
    .option('-m, --model <model>', 'Only remove entries produced by this model')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { model?: string; force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        const scope = options.model ? `cached embeddings for ${options.model}` : 'all cached embeddings';
        ctx.log(chalk.yellow(`This will remove ${scope}.`));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      const removed = SqliteEmbeddingCache.open(getCacheDbPath()).clear({ model: options.model });

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, removed, model: options.model ?? null }));
      } else {
        ctx.log(`${chalk.green('✓')} Removed ${formatNumber(removed)} cached embedding(s)`);
      }
    });

  return cacheCmd;
}
