/**
 * Pipeline Failures
 *
 * Per-item failures of the indexing pipeline. Unlike CLIError, these are
 * not thrown out of a run: they are returned next to successful results so
 * a caller can count, report and retry exactly what failed.
 *
 * Only a 'Configuration' failure ends a run, and it does so before any
 * work is dispatched.
 */

/** Stage that produced a failure. */
export type PipelineFailureKind =
  | 'Extraction'
  | 'Chunking'
  | 'Embedding'
  | 'Storage'
  | 'Configuration';

/**
 * Plain failure record attached to a chunk, batch or document.
 */
export interface PipelineFailure {
  /** Discriminant used by isPipelineFailure() */
  readonly type: 'failure';
  kind: PipelineFailureKind;
  message: string;
  /** Underlying error, kept for diagnostics */
  cause?: unknown;
  /** Whether the last underlying error was classified as retryable */
  retryable?: boolean;
  /** Number of attempts made before giving up (embedding calls only) */
  attempts?: number;
}

/**
 * Throwable form of a PipelineFailure.
 *
 * Used where a failure must cross a throw boundary (e.g. a dispatcher task
 * that wants to pick its own kind instead of the dispatcher default).
 */
export class PipelineError extends Error {
  public readonly kind: PipelineFailureKind;
  public readonly cause?: unknown;

  constructor(kind: PipelineFailureKind, message: string, cause?: unknown) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'PipelineError';
    this.kind = kind;
    this.cause = cause;
  }

  toFailure(): PipelineFailure {
    return createFailure(this.kind, this.message, this.cause);
  }
}

/**
 * Build a failure record.
 */
export function createFailure(
  kind: PipelineFailureKind,
  message: string,
  cause?: unknown,
  extra: Pick<PipelineFailure, 'retryable' | 'attempts'> = {}
): PipelineFailure {
  return { type: 'failure', kind, message, cause, ...extra };
}

/**
 * Convert anything caught in a catch block into a failure record.
 *
 * A PipelineError keeps its own kind; everything else gets `kind`.
 */
export function toPipelineFailure(kind: PipelineFailureKind, error: unknown): PipelineFailure {
  if (error instanceof PipelineError) {
    return error.toFailure();
  }
  if (isPipelineFailure(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return createFailure(kind, message, error);
}

/**
 * Type guard for result unions such as `EnrichedChunk | PipelineFailure`.
 */
export function isPipelineFailure(value: unknown): value is PipelineFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'failure' &&
    'kind' in value
  );
}

/**
 * One-line rendering used in logs and run summaries.
 */
export function describeFailure(failure: PipelineFailure): string {
  const attempts = failure.attempts !== undefined ? ` after ${failure.attempts} attempt(s)` : '';
  return `[${failure.kind}] ${failure.message}${attempts}`;
}
