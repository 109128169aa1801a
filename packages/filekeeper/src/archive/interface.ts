/**
 * Archive Index Interface
 */

import type { ArchiveRecord, SearchFilters, SearchResult } from '../types/index.js';

/**
 * Where reindex reads archive records from and records its progress
 */
export interface ArchiveRecordSource {
  listArchiveRecords(options?: { limit?: number; offset?: number }): Promise<ArchiveRecord[]>;
  markIndexed(archiveId: string, at: string): Promise<void>;
  clearRetry(archiveId: string): Promise<void>;
}

export interface ReindexOptions {
  /** Checked between records */
  signal?: AbortSignal | undefined;
  /** Timestamp stamped on each record as indexedAt */
  at: string;
}

export interface ReindexResult {
  indexed: number;
  failed: number;
  interrupted: boolean;
}

export interface IArchiveIndex {
  initialize(): Promise<void>;
  close(): Promise<void>;
  /** Upsert by archive ID */
  ingest(record: ArchiveRecord): Promise<void>;
  remove(archiveId: string): Promise<void>;
  search(query: string, filters?: SearchFilters): Promise<SearchResult>;
  /** Rebuild every segment from the archive records */
  reindex(source: ArchiveRecordSource, options: ReindexOptions): Promise<ReindexResult>;
}
