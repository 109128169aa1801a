/**
 * Metadata Store Interface
 *
 * Durable bookkeeping for tracked files (keyed by path) and archive records
 * (keyed by archive ID). Every write is atomic per call: a method either
 * commits all of its rows or none of them.
 */

import type {
  ArchiveRecord,
  ConsolidationLogEntry,
  LifecycleEvent,
  PersistedState,
  PurgeEntry,
  RetentionMark,
  TrackedFile,
} from '../types/index.js';

/**
 * Range scan over tracked files
 */
export interface FileQuery {
  state?: PersistedState;
  /** Exclusive upper bound on lastAccessedAt */
  accessedBefore?: string;
  /** Inclusive lower bound on lastAccessedAt */
  accessedSince?: string;
  limit?: number;
}

export type RegisterOutcome = 'created' | 'unchanged' | 'updated';

export interface RegisterResult {
  file: TrackedFile;
  outcome: RegisterOutcome;
}

/**
 * Entry of the index-ingestion retry queue
 */
export interface RetryEntry {
  archiveId: string;
  attempts: number;
  nextAttemptAt: string;
  lastError: string;
  enqueuedAt: string;
}

/**
 * Everything committed by one consolidation, in a single transaction
 */
export interface ConsolidationCommit {
  destination: TrackedFile;
  /** Archive records for the sources, parallel to entry.sources */
  archived: ArchiveRecord[];
  entry: ConsolidationLogEntry;
}

export interface StoreStats {
  trackedByState: Record<PersistedState, number>;
  archived: number;
  archivedByCategory: Record<string, number>;
  archivedByReason: Record<string, number>;
  pendingIndexRetries: number;
}

export interface IMetadataStore {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;

  // Tracked files
  /**
   * Register a file. Identical content counts as an access; different
   * content requires `update` and otherwise fails with ConflictError.
   */
  register(file: TrackedFile, options?: { update?: boolean }): Promise<RegisterResult>;
  /** Fails with NotFoundError */
  getFile(path: string): Promise<TrackedFile>;
  findFile(path: string): Promise<TrackedFile | null>;
  listFiles(query?: FileQuery): Promise<TrackedFile[]>;
  /** Record an access: updates lastAccessedAt and resets the state to active */
  touch(path: string, at: string): Promise<TrackedFile>;
  updateScore(path: string, score: number): Promise<void>;
  /**
   * Set or clear the user's retention mark and return the file to active,
   * logging `reason` as a lifecycle event. Fails with NotFoundError.
   */
  setRetention(path: string, mark: RetentionMark | null, at: string, reason: string): Promise<TrackedFile>;
  /**
   * Compare-and-set the lifecycle state. Returns false when the stored state
   * was not `expected` (or the file is gone); nothing is written then.
   */
  transitionState(
    path: string,
    expected: PersistedState,
    next: PersistedState,
    at: string,
    reason: string
  ): Promise<boolean>;
  /**
   * Insert the archive record and remove the tracked file in one
   * transaction. Fails with NotFoundError when the path is not tracked.
   */
  archiveFile(path: string, record: ArchiveRecord): Promise<void>;

  // Archive records
  getArchiveRecord(archiveId: string): Promise<ArchiveRecord>;
  listArchiveRecords(options?: { limit?: number; offset?: number }): Promise<ArchiveRecord[]>;
  listArchiveRecordsByPath(originalPath: string): Promise<ArchiveRecord[]>;
  countArchiveRecords(): Promise<number>;
  markIndexed(archiveId: string, at: string): Promise<void>;
  /** Explicit, logged removal of an archive record */
  purgeArchiveRecord(archiveId: string, reason: string, at: string): Promise<PurgeEntry>;
  listPurges(): Promise<PurgeEntry[]>;

  // Audit
  listEvents(path?: string): Promise<LifecycleEvent[]>;
  commitConsolidation(commit: ConsolidationCommit): Promise<void>;
  listConsolidations(): Promise<ConsolidationLogEntry[]>;

  // Index retry queue
  enqueueRetry(archiveId: string, error: string, nextAttemptAt: string, at: string): Promise<void>;
  listDueRetries(at: string): Promise<RetryEntry[]>;
  listRetries(): Promise<RetryEntry[]>;
  recordRetryFailure(archiveId: string, error: string, nextAttemptAt: string): Promise<void>;
  clearRetry(archiveId: string): Promise<void>;

  // Aggregation
  getStats(): Promise<StoreStats>;
}
