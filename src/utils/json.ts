/**
 * JSON Utilities
 *
 * Safe JSON parsing with schema validation and fallback for corrupted data.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it, falling back on any error.
 *
 * Use this when parsing JSON from external sources (database, files)
 * where corruption is possible and you want graceful degradation.
 *
 * @param fallback - Returned when the input is missing, malformed or invalid
 * @param onError - Called with the parse or validation error
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, VectorMetadataSchema, {}, (err) => {
 *   logger.warn(`Skipping corrupted metadata: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny>(
  json: string | null | undefined,
  schema: S,
  fallback: z.output<S>,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    onError?.(result.error, json);
    return fallback;
  }
  return result.data;
}
