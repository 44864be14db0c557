/**
 * Tests for CLI formatting helpers
 */

import { describe, it, expect } from 'vitest';
import { formatBytes, formatDuration, formatNamespace, formatNumber, formatPath, formatUsage } from '../format.js';

describe('formatBytes', () => {
  it('picks the largest fitting unit', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
    expect(formatBytes(512)).toBe('512 Bytes');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(131072)).toBe('128 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
  });
});

describe('formatPath', () => {
  it('abbreviates the home directory', () => {
    expect(formatPath('/home/ana/.pdfvec/vectors.db', '/home/ana')).toBe('~/.pdfvec/vectors.db');
    expect(formatPath('/var/data/vectors.db', '/home/ana')).toBe('/var/data/vectors.db');
  });
});

describe('formatNumber', () => {
  it('adds thousand separators', () => {
    expect(formatNumber(1234567)).toBe('1,234,567');
  });
});

describe('formatNamespace', () => {
  it('names the default namespace', () => {
    expect(formatNamespace('')).toBe('(default)');
    expect(formatNamespace('manuals')).toBe('manuals');
  });
});

describe('formatDuration', () => {
  it('uses ms, seconds or minutes by size', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(2500)).toBe('2.5s');
    expect(formatDuration(192_000)).toBe('3m 12s');
  });
});

describe('formatUsage', () => {
  it('shows tokens and a four-decimal dollar cost', () => {
    expect(formatUsage({ model: 'text-embedding-3-large', texts: 3, tokens: 250_000, costUsd: 0.0325 })).toBe(
      '~250,000 tokens, $0.0325'
    );
  });

  it('names the model when it has no price', () => {
    expect(formatUsage({ model: 'local-model', texts: 1, tokens: 3 })).toBe('~3 tokens (no price for local-model)');
  });
});
