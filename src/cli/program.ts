/**
 * The pdfvec command tree.
 *
 * Kept apart from the entry point so tests can build and parse it
 * without installing process handlers.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createCacheCommand } from './commands/cache.js';
import { createConfigCommand } from './commands/config.js';
import { createExtractCommand } from './commands/extract.js';
import { createIndexCommand } from './commands/index.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { CLIError, ConfigError } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

export const VERSION = process.env.PDFVEC_VERSION ?? '0.1.0';

/**
 * Console-backed context. In --json mode only errors are written, as JSON on stderr.
 */
export function createContext(options: GlobalOptions): CommandContext {
  const human = !options.json;
  return {
    options,
    log: (message) => {
      if (human) console.log(message);
    },
    debug: (message) => {
      if (human && options.verbose) console.log(chalk.dim(`[debug] ${message}`));
    },
    warn: (message) => {
      if (human) console.warn(chalk.yellow(`Warning: ${message}`));
    },
    error: (message) => {
      console.error(human ? chalk.red(`Error: ${message}`) : JSON.stringify({ error: message }));
    },
  };
}

export function readGlobalOptions(program: Command): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return { verbose: opts.verbose ?? false, json: opts.json ?? false };
}

/**
 * Startup checks before an action runs. `config` subcommands are exempt so
 * a broken config.toml can still be inspected and reset.
 */
function validateBeforeAction(program: Command, actionCommand: Command): void {
  if (actionCommand.parent?.name() === 'config') return;

  const result = validateStartupConfig(getValidationOptionsForCommand(actionCommand.name()));
  const { verbose } = readGlobalOptions(program);

  if (result.errors.length > 0 || (verbose && result.warnings.length > 0)) {
    printStartupValidation(result, verbose);
  }
  if (result.errors.length > 0) {
    throw new ConfigError('Configuration validation failed', 'Fix the issues above and try again');
  }
}

export function createProgram(): Command {
  const program = new Command();
  const getContext = (): CommandContext => createContext(readGlobalOptions(program));

  program
    .name('pdfvec')
    .description('Extract, chunk and embed PDFs into a namespaced vector store')
    .version(VERSION, '-v, --version', 'Display version number')
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)
    .addHelpText(
      'after',
      [
        '',
        chalk.dim('Examples:'),
        `  ${chalk.cyan('pdfvec index ./manuals -n manuals')}           Index every PDF under ./manuals`,
        `  ${chalk.cyan('pdfvec extract ./manuals -o ./manuals-md')}    Write each PDF as Markdown`,
        `  ${chalk.cyan('pdfvec search "brake fluid" -n manuals')}      Find the closest chunks`,
        `  ${chalk.cyan('pdfvec cache stats')}                          Show cached embeddings`,
        `  ${chalk.cyan('pdfvec status')}                               Show namespaces and storage`,
        `  ${chalk.cyan('pdfvec config set chunking.chunk_size 1500')}  Change a setting`,
      ].join('\n')
    );

  for (const create of [
    createIndexCommand,
    createExtractCommand,
    createSearchCommand,
    createCacheCommand,
    createStatusCommand,
    createConfigCommand,
  ]) {
    program.addCommand(create(getContext));
  }

  program.on('command:*', (operands: string[]) => {
    throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: pdfvec --help  to see available commands');
  });

  program.hook('preAction', (_thisCommand, actionCommand) => validateBeforeAction(program, actionCommand));

  return program;
}
