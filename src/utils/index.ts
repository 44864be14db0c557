/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export {
  formatTable,
  type Column,
  type Alignment,
  type TableOptions,
  type Row,
} from './table.js';

// Safe JSON parsing
export { safeJsonParse } from './json.js';

// Injected logger for library code
export {
  consoleLogger,
  silentLogger,
  scopedLogger,
  type Logger,
} from './logger.js';
