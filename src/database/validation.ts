/**
 * Database Row Validation
 *
 * better-sqlite3 returns `unknown` rows; every read goes through a zod
 * schema here rather than a cast.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM embedding_cache WHERE fingerprint = ?').get(fp);
 * return row ? validateRow(EmbeddingCacheRowSchema, row, `embedding_cache.fingerprint=${fp}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError, ExitCode } from '../errors/types.js';

/**
 * Matches the `EmbeddingCacheRow` interface in schema.ts.
 */
export const EmbeddingCacheRowSchema = z.object({
  fingerprint: z.string(),
  model: z.string(),
  dimensions: z.number().int().positive(),
  // SQLite returns BLOBs as Buffers via better-sqlite3
  vector: z.instanceof(Buffer),
  created_at: z.string(),
});

export type EmbeddingCacheRowData = z.infer<typeof EmbeddingCacheRowSchema>;

/**
 * Matches the `VectorRow` interface in schema.ts.
 */
export const VectorRowSchema = z.object({
  namespace: z.string(),
  id: z.string(),
  dimensions: z.number().int().positive(),
  vector: z.instanceof(Buffer),
  metadata: z.string(),
  updated_at: z.string(),
});

export type VectorRowData = z.infer<typeof VectorRowSchema>;

/**
 * Decoded `vectors.metadata` JSON: flat scalar values only.
 */
export const VectorMetadataSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.null()])
);

/** `SELECT COUNT(*) AS count ...` */
export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

const SHOWN_ISSUES = 3;

/**
 * A row read from cache.db or vectors.db does not have the expected shape,
 * usually a database written by a different pdfvec version.
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    const shown = issues.slice(0, SHOWN_ISSUES).map((issue) => `  - ${issue.path}: ${issue.message}`);
    if (issues.length > SHOWN_ISSUES) {
      shown.push(`  ... and ${issues.length - SHOWN_ISSUES} more`);
    }

    super(
      message,
      `Unexpected row shape:\n${shown.join('\n')}\n\nDelete the database file to rebuild it, or run: pdfvec status`,
      ExitCode.Database
    );
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/**
 * Parse one row.
 *
 * @param context - Where the row came from, e.g. `vectors.id=doc:0`
 */
export function validateRow<T extends z.ZodSchema>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
  }
  return result.data;
}

/**
 * Parse every row of a result set; the first bad row throws with its index.
 */
export function validateRows<T extends z.ZodSchema>(schema: T, rows: unknown[], context: string): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
