/**
 * Formatting helpers shared by the status and cache commands.
 */

import { homedir } from 'node:os';
import type { UsageEstimate } from '../../indexer/embedder/cost.js';

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? 'Bytes'}`;
}

/**
 * Format a path with ~ for the home directory
 */
export function formatPath(filePath: string, home: string = homedir()): string {
  if (home && filePath.startsWith(home)) {
    return '~' + filePath.slice(home.length);
  }
  return filePath;
}

/**
 * Format a number with thousand separators
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Display name of a namespace ("" is the default namespace)
 */
export function formatNamespace(namespace: string): string {
  return namespace === '' ? '(default)' : namespace;
}

/**
 * Format a duration: "850ms", "2.5s", "3m 12s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Estimated embedding usage: "~12,000 tokens, $0.0002"
 */
export function formatUsage(usage: UsageEstimate): string {
  const tokens = `~${formatNumber(usage.tokens)} tokens`;
  return usage.costUsd === undefined
    ? `${tokens} (no price for ${usage.model})`
    : `${tokens}, $${usage.costUsd.toFixed(4)}`;
}
