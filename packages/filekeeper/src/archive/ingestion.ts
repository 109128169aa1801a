/**
 * Index Ingestion
 *
 * Hands committed archive records to the index. A failed ingestion never
 * undoes the archive: the record is queued and retried with exponential
 * backoff until it lands or a reindex picks it up.
 */

import type { IndexConfig } from '../config/types.js';
import { errorMessage, NotFoundError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { IMetadataStore } from '../storage/interface.js';
import type { ArchiveRecord } from '../types/index.js';
import { addSeconds, systemClock, type Clock } from '../utils/time.js';
import type { IArchiveIndex } from './interface.js';

export interface RetryRunResult {
  attempted: number;
  succeeded: number;
  failed: number;
  /** Records purged while queued */
  dropped: number;
  interrupted: boolean;
}

/**
 * Delay before attempt number `attempts + 1`
 */
export function retryDelaySeconds(attempts: number, config: Pick<IndexConfig, 'retryBaseSeconds' | 'retryMaxSeconds'>): number {
  return Math.min(config.retryMaxSeconds, config.retryBaseSeconds * 2 ** attempts);
}

export class IndexIngestion {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly store: IMetadataStore,
    private readonly index: IArchiveIndex,
    private readonly config: IndexConfig,
    options: { logger?: Logger; clock?: Clock } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Ingest a record. Returns the record with indexedAt set, or unchanged
   * when ingestion was deferred to the retry queue. Never rejects: the
   * archive is already committed, and a record that reached the index but
   * could not be marked is ingested again on retry.
   */
  async ingest(record: ArchiveRecord): Promise<ArchiveRecord> {
    const now = this.clock().toISOString();
    try {
      await this.index.ingest(record);
      await this.store.markIndexed(record.archiveId, now);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(
        `ingest: ${record.archiveId} (${record.originalPath}) deferred at ${now}: ${message}`
      );
      await this.enqueue(record, message, now);
      return record;
    }
    return { ...record, indexedAt: now };
  }

  /**
   * Retry every queued ingestion whose backoff has elapsed
   */
  async retryDue(signal?: AbortSignal): Promise<RetryRunResult> {
    const now = this.clock().toISOString();
    const due = await this.store.listDueRetries(now);
    const result: RetryRunResult = { attempted: 0, succeeded: 0, failed: 0, dropped: 0, interrupted: false };

    for (const entry of due) {
      if (signal?.aborted) {
        result.interrupted = true;
        break;
      }
      result.attempted++;
      const record = await this.store.getArchiveRecord(entry.archiveId).catch((error: unknown) => {
        if (error instanceof NotFoundError) {
          return null;
        }
        throw error;
      });
      if (!record) {
        await this.store.clearRetry(entry.archiveId);
        result.dropped++;
        continue;
      }
      try {
        await this.index.ingest(record);
        await this.store.markIndexed(entry.archiveId, now);
        await this.store.clearRetry(entry.archiveId);
      } catch (error) {
        const message = errorMessage(error);
        const next = addSeconds(now, retryDelaySeconds(entry.attempts + 1, this.config));
        await this.store.recordRetryFailure(entry.archiveId, message, next);
        this.logger.warn(
          `retry: ${entry.archiveId} attempt ${entry.attempts + 1} failed, next at ${next}: ${message}`
        );
        result.failed++;
        continue;
      }
      result.succeeded++;
    }

    return result;
  }

  private async enqueue(record: ArchiveRecord, message: string, now: string): Promise<void> {
    const next = addSeconds(now, retryDelaySeconds(0, this.config));
    try {
      await this.store.enqueueRetry(record.archiveId, message, next, now);
    } catch (error) {
      // The record is durable; a reindex still reaches it
      this.logger.error(`ingest: could not queue retry for ${record.archiveId}: ${errorMessage(error)}`);
    }
  }
}
