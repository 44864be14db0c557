/**
 * Test Utilities - Unified Reset
 *
 * Resets process-wide state between tests.
 *
 * ORDER MATTERS:
 * 1. Close cached database connections (they were opened under the old PDFVEC_HOME)
 * 2. Drop the cached env, so the next getEnv() re-reads process.env
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { closeAllDbs } from '../database/index.js';
import { _clearEnvCache } from '../config/index.js';

export function resetAll(): void {
  closeAllDbs();
  _clearEnvCache();
}
