/**
 * Errors that end a pdfvec invocation.
 *
 * Each carries a hint telling the user how to recover and the process
 * exit code scripts can branch on. Per-chunk and per-batch failures are
 * not errors: see ./pipeline.ts.
 */

/**
 * Process exit codes.
 *
 * 0 is success; `index` exits with General after a partial run.
 */
export const ExitCode = {
  General: 1,
  Config: 2,
  FileNotFound: 3,
  APIKey: 4,
  Database: 5,
  Pipeline: 6,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class CLIError extends Error {
  /** Recovery suggestion shown under the message */
  public readonly hint?: string;

  /** Exit code (1-255) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = ExitCode.General) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * The path given to `index` does not exist.
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Pass a directory containing PDFs, or a single .pdf file',
      ExitCode.FileNotFound
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * config.toml cannot be parsed or fails validation, or a config
 * command was given an unknown key or a bad value.
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: pdfvec config list  to see valid options', ExitCode.Config);
    this.name = 'ConfigError';
  }
}

/**
 * The embedding provider has no API key.
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to a .env file)`,
      ExitCode.APIKey
    );
    this.name = 'APIKeyError';
  }
}

function isBusyError(cause: unknown): boolean {
  return (
    typeof cause === 'object' &&
    cause !== null &&
    'code' in cause &&
    (cause.code === 'SQLITE_BUSY' || cause.code === 'SQLITE_LOCKED')
  );
}

/**
 * cache.db or vectors.db failed: a migration, a lock, a lost write.
 */
export class DatabaseError extends CLIError {
  /** The SQLite error, when there is one */
  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(
      message,
      isBusyError(cause)
        ? 'Another pdfvec process is writing to the database; retry when it finishes'
        : 'Try running: pdfvec status  to check database health',
      ExitCode.Database
    );
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Command arguments or options failed their zod schema.
 */
export class ValidationError extends CLIError {
  /** One line per issue, `path: message` */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      message,
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again',
      ExitCode.General
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
