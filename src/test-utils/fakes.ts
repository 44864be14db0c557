/**
 * In-process fakes for the embedding API.
 *
 * FakeEmbeddingProvider returns deterministic vectors derived from the
 * text, records every call, and can be scripted to fail specific calls.
 */

import type { EmbedCallOutcome, EmbeddingProvider } from '../indexer/embedder/index.js';
import { chunkId, type Chunk } from '../indexer/types.js';

/**
 * Deterministic vector for a text: [length, char code sum, first char code].
 */
export function fakeVector(text: string): number[] {
  let sum = 0;
  for (const char of text) sum += char.codePointAt(0) ?? 0;
  return [text.length, sum, text.codePointAt(0) ?? 0];
}

/** Decide the outcome of a call; return undefined for the default success */
export type OutcomeScript = (
  texts: readonly string[],
  callNumber: number
) => EmbedCallOutcome | undefined;

export interface FakeProviderOptions {
  script?: OutcomeScript;
  /** Milliseconds each call stays in flight (real timers) */
  latencyMs?: number;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fake';
  /** Texts of each call, in call order */
  readonly calls: string[][] = [];
  /** Model of each call */
  readonly models: string[] = [];
  inFlight = 0;
  peakInFlight = 0;

  constructor(private readonly options: FakeProviderOptions = {}) {}

  async embedBatch(texts: readonly string[], model: string): Promise<EmbedCallOutcome> {
    this.calls.push([...texts]);
    this.models.push(model);
    const callNumber = this.calls.length;

    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      if (this.options.latencyMs !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs));
      }
      const scripted = this.options.script?.(texts, callNumber);
      return scripted ?? { status: 'success', value: texts.map(fakeVector) };
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Build a chunk for tests.
 */
export function makeChunk(text: string, sequenceIndex: number, sourceDocumentId = 'doc'): Chunk {
  return {
    id: chunkId(sourceDocumentId, sequenceIndex),
    text,
    sourceDocumentId,
    sequenceIndex,
    metadata: {
      source: `/pdfs/${sourceDocumentId}.pdf`,
      fileName: `${sourceDocumentId}.pdf`,
      chunkIndex: sequenceIndex,
      totalChunks: sequenceIndex + 1,
      chunkSize: text.length,
      pageStart: 1,
      pageEnd: 1,
    },
  };
}
