/**
 * Tests for the command tree and console context
 */

import { writeFileSync } from 'node:fs';
import chalk from 'chalk';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createContext, createProgram, readGlobalOptions } from '../program.js';
import { getConfigPath } from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';
import { setupTestEnvironment, type TestEnvironment } from './integration/setup.js';

describe('createProgram', () => {
  let env: TestEnvironment;

  beforeEach(() => {
    env = setupTestEnvironment();
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    env.cleanup();
  });

  it('registers the subcommands in help order', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual([
      'index',
      'extract',
      'search',
      'cache',
      'status',
      'config',
    ]);
  });

  it('reads global flags given before the subcommand', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const program = createProgram();

    await program.parseAsync(['--json', 'config', 'path'], { from: 'user' });

    expect(readGlobalOptions(program)).toEqual({ verbose: false, json: true });
  });

  it('rejects an unknown command', async () => {
    await expect(createProgram().parseAsync(['bogus'], { from: 'user' })).rejects.toThrow(
      'Unknown command: bogus'
    );
  });

  it('lets config commands run on an unparseable config file', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    writeFileSync(getConfigPath(), '[embedding\n');

    await createProgram().parseAsync(['config', 'path'], { from: 'user' });

    expect(log).toHaveBeenCalledWith(getConfigPath());
  });

  it('stops other commands on an unparseable config file', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(getConfigPath(), '[embedding\n');

    await expect(createProgram().parseAsync(['status'], { from: 'user' })).rejects.toThrow(ConfigError);
    expect(error).toHaveBeenCalled();
  });
});

describe('createContext', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes nothing but errors in json mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const ctx = createContext({ verbose: true, json: true });

    ctx.log('hello');
    ctx.debug('details');
    ctx.warn('careful');
    ctx.error('broken');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('{"error":"broken"}');
  });

  it('shows debug lines only when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createContext({ verbose: false, json: false }).debug('hidden');
    createContext({ verbose: true, json: false }).debug('shown');

    expect(log.mock.calls).toEqual([['[debug] shown']]);
  });

  it('prefixes warnings and errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const ctx = createContext({ verbose: false, json: false });

    ctx.warn('careful');
    ctx.error('broken');

    expect(warn).toHaveBeenCalledWith('Warning: careful');
    expect(error).toHaveBeenCalledWith('Error: broken');
  });
});
