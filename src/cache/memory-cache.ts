/**
 * In-memory EmbeddingCache.
 *
 * Same contract as SqliteEmbeddingCache, lost on exit. Used when
 * `cache.enabled = false` (a run still never embeds one fingerprint twice)
 * and in tests.
 */

import type { CacheEntry, CacheStats, ClearOptions, EmbeddingCache } from './types.js';
import { assertCacheable } from './validate.js';

export class MemoryEmbeddingCache implements EmbeddingCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  get(fingerprint: string, model?: string): CacheEntry | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry || (model !== undefined && entry.model !== model)) {
      return undefined;
    }
    return copyEntry(entry);
  }

  getMany(fingerprints: readonly string[], model?: string): Map<string, CacheEntry> {
    const hits = new Map<string, CacheEntry>();
    for (const fingerprint of fingerprints) {
      const entry = this.get(fingerprint, model);
      if (entry) {
        hits.set(fingerprint, entry);
      }
    }
    return hits;
  }

  put(fingerprint: string, vector: readonly number[], model: string): CacheEntry {
    assertCacheable(fingerprint, vector, model);

    const existing = this.entries.get(fingerprint);
    if (existing) {
      return copyEntry(existing);
    }

    const entry: CacheEntry = {
      fingerprint,
      vector: [...vector],
      model,
      dimensions: vector.length,
      createdAt: this.now().toISOString(),
    };
    this.entries.set(fingerprint, entry);
    return copyEntry(entry);
  }

  clear(options: ClearOptions = {}): number {
    if (options.model === undefined) {
      const removed = this.entries.size;
      this.entries.clear();
      return removed;
    }

    let removed = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (entry.model === options.model) {
        this.entries.delete(fingerprint);
        removed++;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const models: Record<string, number> = {};
    let sizeBytes = 0;
    for (const entry of this.entries.values()) {
      models[entry.model] = (models[entry.model] ?? 0) + 1;
      sizeBytes += entry.dimensions * 4;
    }
    return { entries: this.entries.size, models, sizeBytes };
  }
}

function copyEntry(entry: CacheEntry): CacheEntry {
  return { ...entry, vector: [...entry.vector] };
}
