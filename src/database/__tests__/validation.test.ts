/**
 * Validation Module Tests
 *
 * Row schemas and the validateRow/validateRows helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  EmbeddingCacheRowSchema,
  VectorRowSchema,
  VectorMetadataSchema,
  validateRow,
  validateRows,
  SchemaValidationError,
} from '../validation.js';

const cacheRow = {
  fingerprint: 'a'.repeat(64),
  model: 'text-embedding-3-small',
  dimensions: 2,
  vector: Buffer.alloc(8),
  created_at: '2026-01-01T00:00:00.000Z',
};

const vectorRow = {
  namespace: 'docs',
  id: 'manual-pdf:0',
  dimensions: 2,
  vector: Buffer.alloc(8),
  metadata: '{"fileName":"manual.pdf"}',
  updated_at: '2026-01-01T00:00:00.000Z',
};

describe('Validation Schemas', () => {
  it('accepts a valid cache row', () => {
    expect(EmbeddingCacheRowSchema.safeParse(cacheRow).success).toBe(true);
  });

  it('rejects a cache row whose vector is not a Buffer', () => {
    expect(EmbeddingCacheRowSchema.safeParse({ ...cacheRow, vector: [0, 0] }).success).toBe(false);
  });

  it('accepts a valid vector row', () => {
    expect(VectorRowSchema.safeParse(vectorRow).success).toBe(true);
  });

  it('rejects zero dimensions', () => {
    expect(VectorRowSchema.safeParse({ ...vectorRow, dimensions: 0 }).success).toBe(false);
  });

  it('accepts flat scalar metadata only', () => {
    expect(VectorMetadataSchema.safeParse({ a: 'x', b: 1, c: true, d: null }).success).toBe(true);
    expect(VectorMetadataSchema.safeParse({ nested: { a: 1 } }).success).toBe(false);
  });
});

describe('validateRow', () => {
  it('returns typed data for a valid row', () => {
    expect(validateRow(VectorRowSchema, vectorRow, 'vectors').id).toBe('manual-pdf:0');
  });

  it('throws SchemaValidationError with context and exit code 5', () => {
    try {
      validateRow(VectorRowSchema, { ...vectorRow, id: 7 }, 'vectors.id=7');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.message).toBe('Database schema mismatch in vectors.id=7');
        expect(error.code).toBe(5);
        expect(error.issues[0]?.path).toBe('id');
        expect(error.hint).toContain('pdfvec status');
      }
    }
  });
});

describe('validateRows', () => {
  it('throws on the first invalid row with its index', () => {
    expect(() => validateRows(VectorRowSchema, [vectorRow, {}], 'vectors')).toThrow(
      'Database schema mismatch in vectors[1]'
    );
  });

  it('returns every row when all are valid', () => {
    const rows = validateRows(EmbeddingCacheRowSchema, [cacheRow, { ...cacheRow, model: 'm2' }], 'embedding_cache');

    expect(rows.map((row) => row.model)).toEqual(['text-embedding-3-small', 'm2']);
  });
});

describe('SchemaValidationError', () => {
  it('lists at most three issues in the hint', () => {
    const error = (() => {
      try {
        validateRow(VectorRowSchema, {}, 'vectors');
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(SchemaValidationError);
    if (error instanceof SchemaValidationError) {
      expect(error.issues).toHaveLength(6);
      expect(error.hint).toContain('  ... and 3 more');
    }
  });
});
