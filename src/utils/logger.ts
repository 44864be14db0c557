/**
 * Logger Interface for Library Code
 *
 * Library code (cache, embedder, writer, pipeline) accepts a Logger via
 * dependency injection. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn()-backed mock.
 */

/**
 * Generic logger interface for library code
 *
 * Compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log an informational message (optional) */
  info?: (message: string) => void;
  /** Log a debug message (optional - only shown with --verbose in the CLI) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  info: (message: string) => console.log(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Prefix every line of a logger, e.g. `[cache] ...`.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const prefix = `[${scope}] `;
  return {
    warn: (message) => logger.warn(prefix + message),
    info: logger.info ? (message) => logger.info?.(prefix + message) : undefined,
    debug: logger.debug ? (message) => logger.debug?.(prefix + message) : undefined,
  };
}
