import { isFingerprint } from './fingerprint.js';

/**
 * Reject writes that would poison the cache.
 *
 * @throws Error describing the first problem found
 */
export function assertCacheable(fingerprint: string, vector: readonly number[], model: string): void {
  if (!isFingerprint(fingerprint)) {
    throw new Error(`Invalid fingerprint: ${fingerprint}`);
  }
  if (model.trim() === '') {
    throw new Error('Cache entries require a model name');
  }
  if (vector.length === 0) {
    throw new Error(`Refusing to cache an empty vector for ${fingerprint}`);
  }
  if (!vector.every((value) => Number.isFinite(value))) {
    throw new Error(`Refusing to cache a vector with non-finite values for ${fingerprint}`);
  }
}
