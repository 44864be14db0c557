/**
 * Config Command
 *
 * Reads and edits config.toml:
 *   pdfvec config get <key>          - One value, or a whole [table]
 *   pdfvec config set <key> <value>  - Validate and write a value
 *   pdfvec config list               - Every value, grouped by table
 *   pdfvec config path               - Config file location
 *   pdfvec config reset --force      - Restore the default template
 *
 * Errors (unknown key, invalid value) propagate as ConfigError, exit code 2.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getConfigPath, getConfigValue, listConfig, resetConfig, setConfigValue } from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';

const LIST_HINT = 'Run: pdfvec config list  to see available keys';

/**
 * Render a config value the way it is written on the command line.
 */
export function formatConfigValue(value: unknown): string {
  if (typeof value === 'string') return value === '' ? '""' : value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Group flattened entries by their table, in first-seen order.
 */
function groupByTable(entries: Array<[string, unknown]>): Map<string, Array<[string, unknown]>> {
  const tables = new Map<string, Array<[string, unknown]>>();
  for (const [key, value] of entries) {
    const dot = key.indexOf('.');
    const table = dot === -1 ? '' : key.slice(0, dot);
    const group = tables.get(table) ?? [];
    group.push([dot === -1 ? key : key.slice(dot + 1), value]);
    tables.set(table, group);
  }
  return tables;
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Read and edit config.toml');

  configCmd
    .command('get <key>')
    .description('Show a value or a table (e.g. embedding.model, retry)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);
      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`, LIST_HINT);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
        return;
      }

      const table = listConfig().filter(([entry]) => entry.startsWith(`${key}.`));
      if (table.length === 0) {
        ctx.log(formatConfigValue(value));
        return;
      }
      for (const [entry, entryValue] of table) {
        ctx.log(`${entry.slice(key.length + 1)} = ${formatConfigValue(entryValue)}`);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a value (e.g. chunking.chunk_size 1500)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      const previous = getConfigValue(key);

      setConfigValue(key, value);
      const stored = getConfigValue(key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: stored, previous: previous ?? null }));
        return;
      }
      const was = previous === undefined ? '' : chalk.dim(` (was ${formatConfigValue(previous)})`);
      ctx.log(`${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(formatConfigValue(stored))}${was}`);
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List every value')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      for (const [table, values] of groupByTable(entries)) {
        if (table !== '') ctx.log(chalk.bold(`[${table}]`));
        for (const [key, value] of values) {
          ctx.log(`${chalk.cyan(key)} = ${chalk.yellow(formatConfigValue(value))}`);
        }
        ctx.log('');
      }
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      if (ctx.options.json) {
        console.log(JSON.stringify({ path: getConfigPath() }));
      } else {
        ctx.log(getConfigPath());
      }
    });

  configCmd
    .command('reset')
    .description('Restore the default config.toml')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow(`This will overwrite ${getConfigPath()} with the defaults.`));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      resetConfig();
      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: getConfigPath() }));
      } else {
        ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
      }
    });

  return configCmd;
}
