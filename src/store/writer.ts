/**
 * Vector Store Writer
 *
 * Persists enriched chunks to a VectorStore in bounded batches. Each batch
 * is written atomically; a failing batch is recorded in the report and the
 * remaining batches still run.
 */

import {
  createFailure,
  toPipelineFailure,
  type PipelineFailure,
} from '../errors/index.js';
import type { EnrichedChunk } from '../indexer/embedder/index.js';
import { scopedLogger, silentLogger, type Logger } from '../utils/index.js';
import type { UpsertReport, VectorMetadata, VectorRecord, VectorStore } from './types.js';

/** Default records per upsert */
export const DEFAULT_UPSERT_BATCH_SIZE = 100;

/** Chunk text kept in vector metadata */
export const METADATA_TEXT_LIMIT = 1000;

export interface VectorStoreWriterOptions {
  batchSize?: number;
  logger?: Logger;
}

/**
 * Build store records from enriched chunks.
 *
 * @example
 * const records = toVectorRecords(results.filter(isEnriched), 'manuals');
 */
export function toVectorRecords(
  enriched: readonly EnrichedChunk[],
  namespace: string
): VectorRecord[] {
  return enriched.map(({ chunk, vector, model }) => {
    const metadata: VectorMetadata = {
      ...chunk.metadata,
      sourceDocumentId: chunk.sourceDocumentId,
      model,
      text: chunk.text.slice(0, METADATA_TEXT_LIMIT),
    };
    return { vectorId: chunk.id, vector: [...vector], namespace, metadata };
  });
}

export class VectorStoreWriter {
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: VectorStore,
    options: VectorStoreWriterOptions = {}
  ) {
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_UPSERT_BATCH_SIZE));
    this.logger = scopedLogger(options.logger ?? silentLogger, 'store');
  }

  /**
   * Upsert records into `namespace`.
   *
   * Idempotent by (namespace, vectorId). A record whose own namespace is not
   * `namespace` fails its whole batch as a Storage failure.
   */
  async upsert(records: readonly VectorRecord[], namespace: string): Promise<UpsertReport> {
    const report: UpsertReport = { namespace, written: 0, totalBatches: 0, failedBatches: [] };

    for (let start = 0; start < records.length; start += this.batchSize) {
      const batch = records.slice(start, start + this.batchSize);
      const batchIndex = report.totalBatches++;

      const failure = await this.writeBatch(batch, namespace);
      if (failure) {
        report.failedBatches.push({ batchIndex, size: batch.length, failure });
        this.logger.warn(`Batch ${batchIndex} (${batch.length} records) failed: ${failure.message}`);
      } else {
        report.written += batch.length;
      }
    }

    this.logger.debug?.(
      `Wrote ${report.written}/${records.length} records to namespace "${namespace}" in ${report.totalBatches} batch(es)`
    );
    return report;
  }

  /**
   * Remove every record of a namespace.
   *
   * @returns number of records removed
   */
  async resetNamespace(namespace: string): Promise<number> {
    const removed = await this.store.deleteNamespace(namespace);
    this.logger.info?.(`Removed ${removed} records from namespace "${namespace}"`);
    return removed;
  }

  private async writeBatch(
    batch: readonly VectorRecord[],
    namespace: string
  ): Promise<PipelineFailure | undefined> {
    const stray = batch.find((record) => record.namespace !== namespace);
    if (stray) {
      return createFailure(
        'Storage',
        `Record ${stray.vectorId} belongs to namespace "${stray.namespace}", not "${namespace}"`
      );
    }

    try {
      await this.store.upsertBatch(batch, namespace);
      return undefined;
    } catch (error) {
      return toPipelineFailure('Storage', error);
    }
  }
}
