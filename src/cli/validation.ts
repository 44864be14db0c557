/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Default values
 * - Custom validation rules
 * - Helpful error messages
 */

import { z } from 'zod';
import { MAX_AUTO_WORKERS } from '../indexer/dispatcher.js';

// ============================================================================
// SHARED
// ============================================================================

/** "" is the default namespace */
export const NamespaceSchema = z
  .string()
  .max(64, 'Namespace too long (max 64 chars)')
  .regex(/^[a-zA-Z0-9_.-]*$/, 'Namespace can only contain letters, numbers, dots, hyphens, and underscores');

const WorkersSchema = z
  .string()
  .transform((val) => parseInt(val, 10))
  .refine((val) => !isNaN(val) && val >= 1 && val <= MAX_AUTO_WORKERS, {
    message: `workers must be a number between 1 and ${MAX_AUTO_WORKERS}`,
  });

const IgnoreSchema = z.string().transform((val) =>
  val
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean)
);

// ============================================================================
// INDEX COMMAND SCHEMA
// ============================================================================

export const IndexOptionsSchema = z.object({
  namespace: NamespaceSchema.optional(),
  reset: z.boolean().default(false),
  workers: WorkersSchema.optional(),
  ignore: IgnoreSchema.optional(),
  markdown: z.string().min(1, 'Markdown directory cannot be empty').optional(),
});

export const IndexArgsSchema = z.object({
  path: z.string().min(1, 'Path is required'),
});

// ============================================================================
// EXTRACT COMMAND SCHEMA
// ============================================================================

export const ExtractOptionsSchema = z.object({
  output: z.string().min(1, 'Output directory cannot be empty'),
  workers: WorkersSchema.optional(),
  ignore: IgnoreSchema.optional(),
});

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

export const SearchOptionsSchema = z.object({
  namespace: NamespaceSchema.optional(),
  topK: z
    .string()
    .default('5')
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val >= 1 && val <= 100, {
      message: 'top-k must be a number between 1 and 100',
    }),
});

export const SearchArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(2000, 'Search query too long (max 2000 chars)'),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(SearchOptionsSchema, options);
 * if (!result.success) {
 *   throw new ValidationError(result.error);
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}
