/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll, FakeEmbeddingProvider, makeChunk } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  FakeEmbeddingProvider,
  fakeVector,
  makeChunk,
  type FakeProviderOptions,
  type OutcomeScript,
} from './fakes.js';
