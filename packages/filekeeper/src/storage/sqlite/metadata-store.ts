/**
 * SQLite Metadata Store
 *
 * IMetadataStore over better-sqlite3. Multi-row writes run inside a single
 * transaction, so a crash or a thrown error never leaves partial metadata.
 * Driver errors surface as StorageFailureError.
 */

import type Database from 'better-sqlite3';

import type {
  ConsolidationCommit,
  FileQuery,
  IMetadataStore,
  RegisterResult,
  RetryEntry,
  StoreStats,
} from '../interface.js';
import type {
  ArchiveReason,
  ArchiveRecord,
  ConsolidationLogEntry,
  LifecycleEvent,
  LifecycleState,
  OpportunityKind,
  PersistedState,
  PurgeEntry,
  RetentionMark,
  TrackedFile,
} from '../../types/index.js';
import { isGenerationMode, isPersistedState } from '../../types/index.js';
import {
  ConflictError,
  NotFoundError,
  StorageFailureError,
  ValidationFailureError,
  toStorageFailure,
} from '../../errors.js';
import { parseStringArray } from '../../utils/json.js';
import { SQLiteClient } from './client.js';
import { runMigrations } from './migrations.js';
import * as Q from './queries.js';

// ============================================================================
// Row Types
// ============================================================================

interface FileRow {
  path: string;
  content_hash: string;
  created_at: string;
  last_accessed_at: string;
  last_modified_at: string;
  retention_score: number;
  state: string;
  generation_mode: string;
  tags: string;
  session_id: string | null;
  category: string | null;
  retention_days: number | null;
  stakeholders: string;
  frameworks: string;
  retained_reason: string | null;
  retained_at: string | null;
}

interface ArchiveRow {
  archive_id: string;
  original_path: string;
  content: string;
  content_hash: string;
  tags: string;
  category: string;
  archived_at: string;
  source_retention_score: number;
  reason: string;
  session_id: string | null;
  indexed_at: string | null;
}

interface EventRow {
  id: number;
  path: string;
  from_state: string;
  to_state: string;
  at: string;
  reason: string;
  archive_id: string | null;
}

interface ConsolidationRow {
  id: string;
  applied_at: string;
  destination_path: string;
  destination_hash: string;
  sources: string;
  kind: string;
  confidence: number;
}

interface PurgeRow {
  archive_id: string;
  original_path: string;
  content_hash: string;
  purged_at: string;
  reason: string;
}

interface RetryRow {
  archive_id: string;
  attempts: number;
  next_attempt_at: string;
  last_error: string;
  enqueued_at: string;
}

// ============================================================================
// Row Mapping
// ============================================================================

function isLifecycleState(value: string): value is LifecycleState {
  return value === 'created' || value === 'archived' || isPersistedState(value);
}

function isArchiveReason(value: string): value is ArchiveReason {
  return value === 'sweep' || value === 'manual' || value === 'consolidated';
}

function isOpportunityKind(value: string): value is OpportunityKind {
  return value === 'topic' || value === 'temporal' || value === 'outcome' || value === 'reference';
}

function corrupt(table: string, key: string, column: string, value: string): StorageFailureError {
  return new StorageFailureError(
    `read ${table}`,
    new Error(`unexpected ${column} '${value}' for ${key}`)
  );
}

function rowToFile(row: FileRow): TrackedFile {
  if (!isPersistedState(row.state)) throw corrupt('tracked_files', row.path, 'state', row.state);
  if (!isGenerationMode(row.generation_mode)) {
    throw corrupt('tracked_files', row.path, 'generation_mode', row.generation_mode);
  }
  return {
    path: row.path,
    contentHash: row.content_hash,
    createdAt: row.created_at,
    lastAccessedAt: row.last_accessed_at,
    lastModifiedAt: row.last_modified_at,
    retentionScore: row.retention_score,
    state: row.state,
    generationMode: row.generation_mode,
    tags: parseStringArray(row.tags),
    sessionId: row.session_id ?? undefined,
    category: row.category ?? undefined,
    retentionDays: row.retention_days ?? undefined,
    stakeholders: parseStringArray(row.stakeholders),
    frameworks: parseStringArray(row.frameworks),
    retained:
      row.retained_reason !== null && row.retained_at !== null
        ? { reason: row.retained_reason, at: row.retained_at }
        : undefined,
  };
}

function rowToArchive(row: ArchiveRow): ArchiveRecord {
  if (!isArchiveReason(row.reason)) throw corrupt('archive_records', row.archive_id, 'reason', row.reason);
  return {
    archiveId: row.archive_id,
    originalPath: row.original_path,
    content: row.content,
    contentHash: row.content_hash,
    tags: parseStringArray(row.tags),
    category: row.category,
    archivedAt: row.archived_at,
    sourceRetentionScore: row.source_retention_score,
    reason: row.reason,
    sessionId: row.session_id ?? undefined,
    indexedAt: row.indexed_at ?? undefined,
  };
}

function rowToEvent(row: EventRow): LifecycleEvent {
  if (!isLifecycleState(row.from_state)) throw corrupt('lifecycle_events', row.path, 'from_state', row.from_state);
  if (!isLifecycleState(row.to_state)) throw corrupt('lifecycle_events', row.path, 'to_state', row.to_state);
  return {
    path: row.path,
    from: row.from_state,
    to: row.to_state,
    at: row.at,
    reason: row.reason,
    archiveId: row.archive_id ?? undefined,
  };
}

function rowToConsolidation(row: ConsolidationRow): ConsolidationLogEntry {
  if (!isOpportunityKind(row.kind)) throw corrupt('consolidation_log', row.id, 'kind', row.kind);
  const parsed: unknown = JSON.parse(row.sources);
  const list: unknown[] = Array.isArray(parsed) ? parsed : [];
  const sources: ConsolidationLogEntry['sources'] = [];
  for (const item of list) {
    if (
      typeof item === 'object' && item !== null &&
      'path' in item && typeof item.path === 'string' &&
      'contentHash' in item && typeof item.contentHash === 'string' &&
      'archiveId' in item && typeof item.archiveId === 'string'
    ) {
      sources.push({ path: item.path, contentHash: item.contentHash, archiveId: item.archiveId });
    }
  }
  return {
    id: row.id,
    appliedAt: row.applied_at,
    destinationPath: row.destination_path,
    destinationHash: row.destination_hash,
    sources,
    kind: row.kind,
    confidence: row.confidence,
  };
}

function rowToPurge(row: PurgeRow): PurgeEntry {
  return {
    archiveId: row.archive_id,
    originalPath: row.original_path,
    contentHash: row.content_hash,
    purgedAt: row.purged_at,
    reason: row.reason,
  };
}

function rowToRetry(row: RetryRow): RetryEntry {
  return {
    archiveId: row.archive_id,
    attempts: row.attempts,
    nextAttemptAt: row.next_attempt_at,
    lastError: row.last_error,
    enqueuedAt: row.enqueued_at,
  };
}

// ============================================================================
// Store
// ============================================================================

/**
 * SQLite implementation of the metadata store
 */
export class SQLiteMetadataStore implements IMetadataStore {
  private client: SQLiteClient;

  constructor(dbPath: string) {
    this.client = new SQLiteClient({ dbPath });
  }

  async initialize(): Promise<void> {
    this.guard('initialize', () => runMigrations(this.client));
  }

  async close(): Promise<void> {
    this.client.close();
  }

  // ==========================================================================
  // Tracked files
  // ==========================================================================

  async register(file: TrackedFile, options?: { update?: boolean }): Promise<RegisterResult> {
    return this.guard('register', () =>
      this.client.transaction((): RegisterResult => {
        const existing = this.getFileRow(file.path);

        if (!existing) {
          this.insertFile(file);
          this.insertEvent(file.path, 'created', 'active', file.createdAt, 'registered');
          return { file: { ...file, state: 'active' }, outcome: 'created' };
        }

        const current = rowToFile(existing);

        if (current.contentHash === file.contentHash) {
          this.db.prepare<[string, string], unknown>(Q.TOUCH_FILE).run(file.lastAccessedAt, file.path);
          if (current.state !== 'active') {
            this.insertEvent(file.path, current.state, 'active', file.lastAccessedAt, 'accessed');
          }
          return {
            file: { ...current, lastAccessedAt: file.lastAccessedAt, state: 'active' },
            outcome: 'unchanged',
          };
        }

        if (!options?.update) {
          throw new ConflictError(file.path, current.contentHash, file.contentHash);
        }

        this.db
          .prepare<
            [
              string, string, string, number, string, string, string | null, string | null, number | null,
              string, string, string,
            ],
            unknown
          >(Q.REPLACE_CONTENT)
          .run(
            file.contentHash,
            file.lastAccessedAt,
            file.lastModifiedAt,
            file.retentionScore,
            file.generationMode,
            JSON.stringify(file.tags),
            file.sessionId ?? null,
            file.category ?? null,
            file.retentionDays ?? null,
            JSON.stringify(file.stakeholders ?? []),
            JSON.stringify(file.frameworks ?? []),
            file.path
          );
        this.insertEvent(file.path, current.state, 'active', file.lastModifiedAt, 'content updated');
        return {
          file: { ...file, createdAt: current.createdAt, state: 'active', retained: current.retained },
          outcome: 'updated',
        };
      })
    );
  }

  async getFile(path: string): Promise<TrackedFile> {
    const file = await this.findFile(path);
    if (!file) {
      throw new NotFoundError(path);
    }
    return file;
  }

  async findFile(path: string): Promise<TrackedFile | null> {
    return this.guard('findFile', () => {
      const row = this.getFileRow(path);
      return row ? rowToFile(row) : null;
    });
  }

  async listFiles(query: FileQuery = {}): Promise<TrackedFile[]> {
    return this.guard('listFiles', () => {
      const conditions: string[] = [];
      const params: Array<string | number> = [];

      if (query.state) {
        conditions.push('state = ?');
        params.push(query.state);
      }
      if (query.accessedBefore) {
        conditions.push('last_accessed_at < ?');
        params.push(query.accessedBefore);
      }
      if (query.accessedSince) {
        conditions.push('last_accessed_at >= ?');
        params.push(query.accessedSince);
      }

      let sql = 'SELECT * FROM tracked_files';
      if (conditions.length > 0) {
        sql += ` WHERE ${conditions.join(' AND ')}`;
      }
      sql += ' ORDER BY last_accessed_at ASC, path ASC';
      if (query.limit !== undefined) {
        sql += ' LIMIT ?';
        params.push(query.limit);
      }

      return this.db.prepare<Array<string | number>, FileRow>(sql).all(...params).map(rowToFile);
    });
  }

  async touch(path: string, at: string): Promise<TrackedFile> {
    return this.guard('touch', () =>
      this.client.transaction(() => {
        const row = this.getFileRow(path);
        if (!row) {
          throw new NotFoundError(path);
        }
        const current = rowToFile(row);
        this.db.prepare<[string, string], unknown>(Q.TOUCH_FILE).run(at, path);
        if (current.state !== 'active') {
          this.insertEvent(path, current.state, 'active', at, 'accessed');
        }
        return { ...current, lastAccessedAt: at, state: 'active' as const };
      })
    );
  }

  async setRetention(path: string, mark: RetentionMark | null, at: string, reason: string): Promise<TrackedFile> {
    return this.guard('setRetention', () =>
      this.client.transaction(() => {
        const row = this.getFileRow(path);
        if (!row) {
          throw new NotFoundError(path);
        }
        const current = rowToFile(row);
        this.db
          .prepare<[string | null, string | null, string], unknown>(Q.SET_RETENTION)
          .run(mark?.reason ?? null, mark?.at ?? null, path);
        this.insertEvent(path, current.state, 'active', at, reason);
        return { ...current, state: 'active' as const, retained: mark ?? undefined };
      })
    );
  }

  async updateScore(path: string, score: number): Promise<void> {
    this.guard('updateScore', () => {
      const result = this.db.prepare<[number, string], unknown>(Q.UPDATE_SCORE).run(score, path);
      if (result.changes === 0) {
        throw new NotFoundError(path);
      }
    });
  }

  async transitionState(
    path: string,
    expected: PersistedState,
    next: PersistedState,
    at: string,
    reason: string
  ): Promise<boolean> {
    return this.guard('transitionState', () =>
      this.client.transaction(() => {
        const result = this.db
          .prepare<[string, string, string], unknown>(Q.CAS_STATE)
          .run(next, path, expected);
        if (result.changes === 0) {
          return false;
        }
        this.insertEvent(path, expected, next, at, reason);
        return true;
      })
    );
  }

  async archiveFile(path: string, record: ArchiveRecord): Promise<void> {
    this.guard('archiveFile', () =>
      this.client.transaction(() => {
        const row = this.getFileRow(path);
        if (!row) {
          throw new NotFoundError(path);
        }
        const current = rowToFile(row);
        this.insertArchive(record);
        this.db.prepare<[string], unknown>(Q.DELETE_FILE).run(path);
        this.insertEvent(path, current.state, 'archived', record.archivedAt, `archived (${record.reason})`, record.archiveId);
      })
    );
  }

  // ==========================================================================
  // Archive records
  // ==========================================================================

  async getArchiveRecord(archiveId: string): Promise<ArchiveRecord> {
    return this.guard('getArchiveRecord', () => {
      const row = this.db.prepare<[string], ArchiveRow>(Q.GET_ARCHIVE).get(archiveId);
      if (!row) {
        throw new NotFoundError(archiveId, 'archive');
      }
      return rowToArchive(row);
    });
  }

  async listArchiveRecords(options: { limit?: number; offset?: number } = {}): Promise<ArchiveRecord[]> {
    return this.guard('listArchiveRecords', () =>
      this.db
        .prepare<[number, number], ArchiveRow>(Q.LIST_ARCHIVES)
        .all(options.limit ?? -1, options.offset ?? 0)
        .map(rowToArchive)
    );
  }

  async listArchiveRecordsByPath(originalPath: string): Promise<ArchiveRecord[]> {
    return this.guard('listArchiveRecordsByPath', () =>
      this.db.prepare<[string], ArchiveRow>(Q.LIST_ARCHIVES_BY_PATH).all(originalPath).map(rowToArchive)
    );
  }

  async countArchiveRecords(): Promise<number> {
    return this.guard('countArchiveRecords', () =>
      this.db.prepare<[], { count: number }>(Q.COUNT_ARCHIVES).get()?.count ?? 0
    );
  }

  async markIndexed(archiveId: string, at: string): Promise<void> {
    this.guard('markIndexed', () => {
      this.db.prepare<[string, string], unknown>(Q.MARK_INDEXED).run(at, archiveId);
    });
  }

  async purgeArchiveRecord(archiveId: string, reason: string, at: string): Promise<PurgeEntry> {
    return this.guard('purgeArchiveRecord', () =>
      this.client.transaction(() => {
        const row = this.db.prepare<[string], ArchiveRow>(Q.GET_ARCHIVE).get(archiveId);
        if (!row) {
          throw new NotFoundError(archiveId, 'archive');
        }
        const entry: PurgeEntry = {
          archiveId,
          originalPath: row.original_path,
          contentHash: row.content_hash,
          purgedAt: at,
          reason,
        };
        this.db
          .prepare<[string, string, string, string, string], unknown>(Q.INSERT_PURGE)
          .run(entry.archiveId, entry.originalPath, entry.contentHash, entry.purgedAt, entry.reason);
        this.db.prepare<[string], unknown>(Q.DELETE_ARCHIVE).run(archiveId);
        return entry;
      })
    );
  }

  async listPurges(): Promise<PurgeEntry[]> {
    return this.guard('listPurges', () =>
      this.db.prepare<[], PurgeRow>(Q.LIST_PURGES).all().map(rowToPurge)
    );
  }

  // ==========================================================================
  // Audit
  // ==========================================================================

  async listEvents(path?: string): Promise<LifecycleEvent[]> {
    return this.guard('listEvents', () => {
      const rows = path === undefined
        ? this.db.prepare<[], EventRow>(Q.LIST_EVENTS).all()
        : this.db.prepare<[string], EventRow>(Q.LIST_EVENTS_FOR_PATH).all(path);
      return rows.map(rowToEvent);
    });
  }

  async commitConsolidation(commit: ConsolidationCommit): Promise<void> {
    const { destination, archived, entry } = commit;

    this.guard('commitConsolidation', () =>
      this.client.transaction(() => {
        entry.sources.forEach((source, i) => {
          const record = archived[i];
          const row = this.getFileRow(source.path);
          if (!row || !record) {
            throw new NotFoundError(source.path);
          }
          const current = rowToFile(row);
          if (current.contentHash !== source.contentHash) {
            throw new ValidationFailureError('Consolidation source changed', [
              `${source.path} hash is ${current.contentHash.slice(0, 12)}, expected ${source.contentHash.slice(0, 12)}`,
            ]);
          }
          this.insertArchive(record);
          this.db.prepare<[string], unknown>(Q.DELETE_FILE).run(source.path);
          this.insertEvent(
            source.path,
            current.state,
            'archived',
            entry.appliedAt,
            `consolidated into ${destination.path}`,
            record.archiveId
          );
        });

        const existing = this.getFileRow(destination.path);
        if (existing) {
          throw new ConflictError(destination.path, existing.content_hash, destination.contentHash);
        }
        this.insertFile(destination);
        this.insertEvent(
          destination.path,
          'created',
          'active',
          entry.appliedAt,
          `consolidated from ${entry.sources.length} files`
        );

        this.db
          .prepare<[string, string, string, string, string, string, number], unknown>(Q.INSERT_CONSOLIDATION)
          .run(
            entry.id,
            entry.appliedAt,
            entry.destinationPath,
            entry.destinationHash,
            JSON.stringify(entry.sources),
            entry.kind,
            entry.confidence
          );
      })
    );
  }

  async listConsolidations(): Promise<ConsolidationLogEntry[]> {
    return this.guard('listConsolidations', () =>
      this.db.prepare<[], ConsolidationRow>(Q.LIST_CONSOLIDATIONS).all().map(rowToConsolidation)
    );
  }

  // ==========================================================================
  // Index retry queue
  // ==========================================================================

  async enqueueRetry(archiveId: string, error: string, nextAttemptAt: string, at: string): Promise<void> {
    this.guard('enqueueRetry', () => {
      this.db
        .prepare<[string, string, string, string], unknown>(Q.UPSERT_RETRY)
        .run(archiveId, nextAttemptAt, error, at);
    });
  }

  async listDueRetries(at: string): Promise<RetryEntry[]> {
    return this.guard('listDueRetries', () =>
      this.db.prepare<[string], RetryRow>(Q.LIST_DUE_RETRIES).all(at).map(rowToRetry)
    );
  }

  async listRetries(): Promise<RetryEntry[]> {
    return this.guard('listRetries', () =>
      this.db.prepare<[], RetryRow>(Q.LIST_RETRIES).all().map(rowToRetry)
    );
  }

  async recordRetryFailure(archiveId: string, error: string, nextAttemptAt: string): Promise<void> {
    this.guard('recordRetryFailure', () => {
      this.db
        .prepare<[string, string, string], unknown>(Q.RECORD_RETRY_FAILURE)
        .run(nextAttemptAt, error, archiveId);
    });
  }

  async clearRetry(archiveId: string): Promise<void> {
    this.guard('clearRetry', () => {
      this.db.prepare<[string], unknown>(Q.DELETE_RETRY).run(archiveId);
    });
  }

  // ==========================================================================
  // Aggregation
  // ==========================================================================

  async getStats(): Promise<StoreStats> {
    return this.guard('getStats', () => {
      const trackedByState: Record<PersistedState, number> = { active: 0, aging: 0, archive_eligible: 0 };
      for (const row of this.db.prepare<[], { state: string; count: number }>(Q.COUNT_BY_STATE).all()) {
        if (isPersistedState(row.state)) {
          trackedByState[row.state] = row.count;
        }
      }

      const tally = (sql: string): Record<string, number> => {
        const result: Record<string, number> = {};
        for (const row of this.db.prepare<[], { key: string; count: number }>(sql).all()) {
          result[row.key] = row.count;
        }
        return result;
      };

      return {
        trackedByState,
        archived: this.db.prepare<[], { count: number }>(Q.COUNT_ARCHIVES).get()?.count ?? 0,
        archivedByCategory: tally(Q.COUNT_ARCHIVES_BY_CATEGORY),
        archivedByReason: tally(Q.COUNT_ARCHIVES_BY_REASON),
        pendingIndexRetries:
          this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM index_retry_queue').get()?.count ?? 0,
      };
    });
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * The underlying connection, shared with the session log
   */
  get database(): Database.Database {
    return this.client.database;
  }

  private get db() {
    return this.client.database;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw toStorageFailure(operation, error);
    }
  }

  private getFileRow(path: string): FileRow | undefined {
    return this.db.prepare<[string], FileRow>(Q.GET_FILE).get(path);
  }

  private insertFile(file: TrackedFile): void {
    this.db
      .prepare<
        [
          string, string, string, string, string, number, string, string, string, string | null, string | null,
          number | null, string, string,
        ],
        unknown
      >(Q.INSERT_FILE)
      .run(
        file.path,
        file.contentHash,
        file.createdAt,
        file.lastAccessedAt,
        file.lastModifiedAt,
        file.retentionScore,
        'active',
        file.generationMode,
        JSON.stringify(file.tags),
        file.sessionId ?? null,
        file.category ?? null,
        file.retentionDays ?? null,
        JSON.stringify(file.stakeholders ?? []),
        JSON.stringify(file.frameworks ?? [])
      );
  }

  private insertArchive(record: ArchiveRecord): void {
    this.db
      .prepare<
        [string, string, string, string, string, string, string, number, string, string | null, string | null],
        unknown
      >(Q.INSERT_ARCHIVE)
      .run(
        record.archiveId,
        record.originalPath,
        record.content,
        record.contentHash,
        JSON.stringify(record.tags),
        record.category,
        record.archivedAt,
        record.sourceRetentionScore,
        record.reason,
        record.sessionId ?? null,
        record.indexedAt ?? null
      );
  }

  private insertEvent(
    path: string,
    from: LifecycleState,
    to: LifecycleState,
    at: string,
    reason: string,
    archiveId?: string
  ): void {
    this.db
      .prepare<[string, string, string, string, string, string | null], unknown>(Q.INSERT_EVENT)
      .run(path, from, to, at, reason, archiveId ?? null);
  }
}
