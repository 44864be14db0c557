/**
 * Config Command Integration Tests
 */

import chalk from 'chalk';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createConfigCommand } from '../../commands/config.js';
import { loadConfig } from '../../../config/index.js';
import { ConfigError } from '../../../errors/index.js';
import { createTestContext, setupTestEnvironment, type CapturedContext, type TestEnvironment } from './setup.js';

describe('config command', () => {
  let env: TestEnvironment;

  beforeEach(() => {
    env = setupTestEnvironment();
    chalk.level = 0;
  });

  afterEach(() => {
    env.cleanup();
    process.exitCode = undefined;
  });

  async function run(args: string[]): Promise<CapturedContext> {
    const captured = createTestContext();
    await createConfigCommand(() => captured.ctx).parseAsync(args, { from: 'user' });
    return captured;
  }

  it('sets and reads back a value', async () => {
    await run(['set', 'chunking.chunk_size', '1500']);
    const { logs } = await run(['get', 'chunking.chunk_size']);

    expect(logs).toEqual(['1500']);
    expect(loadConfig().chunking.chunk_size).toBe(1500);
  });

  it('prints every key of a table', async () => {
    const { logs } = await run(['get', 'retry']);

    expect(logs).toEqual(['max_attempts = 3', 'base_delay_ms = 1000', 'max_delay_ms = 60000', 'jitter = 0.2']);
  });

  it('shows the previous value after set', async () => {
    const { logs } = await run(['set', 'store.namespace', 'manuals']);

    expect(logs).toEqual(['✓ store.namespace = manuals (was "")']);
  });

  it('rejects a value outside the allowed range', async () => {
    await expect(run(['set', 'chunking.chunk_size', '5'])).rejects.toThrow(ConfigError);
    expect(loadConfig().chunking.chunk_size).toBe(1000);
  });

  it('rejects an unknown key', async () => {
    await expect(run(['get', 'nope.key'])).rejects.toThrow('Unknown config key: nope.key');
  });

  it('groups list output by table', async () => {
    const { logs } = await run(['list']);

    expect(logs.slice(0, 3)).toEqual(['[embedding]', 'provider = openai', 'model = text-embedding-3-small']);
    expect(logs).toContain('[store]');
    expect(logs).toContain('namespace = ""');
  });

  it('restores defaults on reset --force', async () => {
    await run(['set', 'store.namespace', 'manuals']);
    await run(['reset', '--force']);

    expect(loadConfig().store.namespace).toBe('');
  });
});
