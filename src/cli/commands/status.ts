/**
 * Status Command
 *
 * Displays storage statistics and system health:
 *   pdfvec status         - Show system status
 *   pdfvec status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { statSync, existsSync } from 'node:fs';
import type { CommandContext } from '../types.js';
import { SqliteEmbeddingCache } from '../../cache/index.js';
import {
  getCacheDbPath,
  getConfigPath,
  getVectorDbPath,
  hasApiKey,
  loadConfig,
} from '../../config/index.js';
import { getModelDimensions } from '../../indexer/embedder/index.js';
import { SqliteVectorStore, type NamespaceInfo } from '../../store/index.js';
import { formatTable } from '../../utils/index.js';
import { formatBytes, formatNamespace, formatNumber, formatPath } from '../utils/format.js';

function fileSize(path: string): number {
  return existsSync(path) ? statSync(path).size : 0;
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show storage statistics and system health')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Fetching system status...');

      const config = loadConfig();
      const vectorDbPath = getVectorDbPath();
      const cacheDbPath = getCacheDbPath();
      const configPath = getConfigPath();

      const namespaces: NamespaceInfo[] = await SqliteVectorStore.open(vectorDbPath, { logger: ctx }).listNamespaces();
      const cacheStats = SqliteEmbeddingCache.open(cacheDbPath).stats();
      const totalVectors = namespaces.reduce((sum, ns) => sum + ns.count, 0);
      const dimensions = getModelDimensions(config.embedding.model);

      ctx.debug(`Namespaces: ${namespaces.length}, Vectors: ${totalVectors}`);

      if (ctx.options.json) {
        const jsonOutput = {
          vectors: {
            path: vectorDbPath,
            size: fileSize(vectorDbPath),
            total: totalVectors,
            namespaces,
          },
          cache: {
            path: cacheDbPath,
            size: fileSize(cacheDbPath),
            enabled: config.cache.enabled,
            entries: cacheStats.entries,
          },
          embedding: {
            provider: config.embedding.provider,
            model: config.embedding.model,
            dimensions: dimensions ?? null,
            apiKeyConfigured: hasApiKey(),
          },
          config: {
            path: configPath,
          },
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      const lines: string[] = [];

      lines.push(chalk.bold('pdfvec Status'));
      lines.push(chalk.dim('─'.repeat(35)));

      lines.push(`${chalk.cyan('Vectors:')}      ${formatNumber(totalVectors)} in ${namespaces.length} namespace(s)`);
      lines.push(
        `${chalk.cyan('Vector DB:')}    ${formatBytes(fileSize(vectorDbPath))} (${formatPath(vectorDbPath)})`
      );
      lines.push(
        `${chalk.cyan('Cache:')}        ${formatNumber(cacheStats.entries)} entries${config.cache.enabled ? '' : chalk.yellow(' (disabled)')}`
      );
      lines.push(
        `${chalk.cyan('Cache DB:')}     ${formatBytes(fileSize(cacheDbPath))} (${formatPath(cacheDbPath)})`
      );

      lines.push('');
      const dimensionText = dimensions === undefined ? '' : `, ${dimensions}d`;
      lines.push(
        `${chalk.cyan('Embeddings:')}   ${config.embedding.model} (${config.embedding.provider}${dimensionText})`
      );
      lines.push(`${chalk.cyan('API key:')}      ${hasApiKey() ? chalk.green('set') : chalk.red('missing')}`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      if (namespaces.length > 0) {
        lines.push('');
        lines.push(
          formatTable(
            [
              { header: 'Namespace', key: 'namespace', maxWidth: 40 },
              { header: 'Vectors', key: 'count', align: 'right' },
              { header: 'Dims', key: 'dimensions', align: 'right' },
            ],
            namespaces.map((ns) => ({
              namespace: formatNamespace(ns.namespace),
              count: formatNumber(ns.count),
              dimensions: ns.dimensions,
            })),
            namespaces.length > 1 ? { footer: { namespace: 'Total', count: formatNumber(totalVectors) } } : {}
          )
        );
      } else {
        lines.push('');
        lines.push(chalk.yellow('No vectors stored.'));
        lines.push(`Run ${chalk.cyan('pdfvec index <path>')} to get started.`);
      }

      ctx.log(lines.join('\n'));
    });
}
