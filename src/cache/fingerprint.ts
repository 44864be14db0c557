/**
 * Content Fingerprints
 *
 * A fingerprint is the SHA-256 hex digest of (model, normalized text).
 * Chunk ids and source documents are deliberately not part of it: the same
 * paragraph in two PDFs is embedded once.
 */

import { createHash } from 'node:crypto';

/**
 * Normalize chunk text before hashing.
 *
 * - Unicode NFC
 * - CRLF / CR -> LF
 * - trailing whitespace removed from every line
 * - leading/trailing whitespace of the whole text removed
 *
 * Interior whitespace and case are preserved; they can change the embedding.
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+$/u, ''))
    .join('\n')
    .trim();
}

/**
 * Compute the fingerprint of a text for a model.
 *
 * @example
 * computeFingerprint('Hello', 'text-embedding-3-small') // => '3f1c…' (64 hex chars)
 */
export function computeFingerprint(text: string, model: string): string {
  return createHash('sha256')
    .update(model, 'utf8')
    // NUL separator: ("ab", "c") and ("a", "bc") must not collide
    .update('\0')
    .update(normalizeText(text), 'utf8')
    .digest('hex');
}

/** 64 lowercase hex characters */
export const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

export function isFingerprint(value: string): boolean {
  return FINGERPRINT_PATTERN.test(value);
}
