/**
 * Index Segment
 *
 * One SQLite database holding an FTS5 table over a slice of the archive.
 * Opened lazily; any failure to open or read it is reported as
 * IndexDegradedError so search can skip the segment.
 */

import { rmSync } from 'node:fs';

import { IndexDegradedError } from '../errors.js';
import { SQLiteClient } from '../storage/sqlite/client.js';
import type { ArchiveRecord, SearchFilters } from '../types/index.js';
import { parseStringArray } from '../utils/json.js';
import { extractContext } from './context.js';

/** Stored in PRAGMA user_version; a segment written by another version is degraded until reindexed */
export const SEGMENT_VERSION = 1;

const SEGMENT_SCHEMA = `
CREATE TABLE IF NOT EXISTS entries (
  rowid INTEGER PRIMARY KEY,
  archive_id TEXT NOT NULL UNIQUE,
  original_path TEXT NOT NULL,
  category TEXT NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  archived_at TEXT NOT NULL,
  retention_score REAL NOT NULL,
  context TEXT NOT NULL DEFAULT '[]',  -- JSON array of labels
  summary TEXT NOT NULL DEFAULT ''
);

CREATE INDEX IF NOT EXISTS idx_entries_archived_at ON entries(archived_at);

CREATE VIRTUAL TABLE IF NOT EXISTS entries_fts USING fts5(
  original_path,
  tags,
  content
);
`;

const DROP_SCHEMA = `
DROP TABLE IF EXISTS entries_fts;
DROP TABLE IF EXISTS entries;
`;

/** Column of entries_fts that snippets are cut from */
const CONTENT_COLUMN = 2;

const PREVIEW_CHARS = 200;

/**
 * Row returned by a segment search
 */
export interface SegmentHit {
  archiveId: string;
  originalPath: string;
  category: string;
  tags: string[];
  archivedAt: string;
  sourceRetentionScore: number;
  /** bm25 rank; 0 for filter-only listings */
  rank: number;
  snippet: string;
  context: string[];
  summary: string;
}

interface HitRow {
  archive_id: string;
  original_path: string;
  category: string;
  tags: string;
  archived_at: string;
  retention_score: number;
  context: string;
  summary: string;
  rank: number;
  snippet: string | null;
}

/**
 * File name of a segment inside the index directory
 */
export function segmentFileName(id: number): string {
  return `segment-${String(id).padStart(2, '0')}.db`;
}

export class IndexSegment {
  private client: SQLiteClient | null = null;

  /**
   * @param dbPath - database file, or ':memory:'
   */
  constructor(
    readonly id: number,
    private readonly dbPath: string
  ) {}

  get inMemory(): boolean {
    return this.dbPath === ':memory:';
  }

  /**
   * Open the segment and make sure its schema is readable
   */
  open(): SQLiteClient {
    if (this.client) {
      return this.client;
    }
    let client: SQLiteClient | null = null;
    try {
      client = new SQLiteClient({ dbPath: this.dbPath, walMode: false, foreignKeys: false });
      const db = client.database;
      const existing = db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'entries'")
        .get();
      const version = db.pragma('user_version', { simple: true });
      if (existing && version !== SEGMENT_VERSION) {
        throw new Error(`segment format ${String(version)}, expected ${SEGMENT_VERSION}; reindex to rebuild`);
      }
      client.exec(SEGMENT_SCHEMA);
      db.pragma(`user_version = ${SEGMENT_VERSION}`);
      db.prepare('SELECT count(*) FROM entries_fts').get();
    } catch (error) {
      client?.close();
      throw new IndexDegradedError(this.id, error instanceof Error ? error : undefined);
    }
    this.client = client;
    return client;
  }

  /**
   * Insert or replace the entry for an archive record
   */
  upsert(record: ArchiveRecord): void {
    const client = this.open();
    const db = client.database;
    this.wrap(() =>
      client.transaction(() => {
        const existing = db
          .prepare<[string], { rowid: number }>('SELECT rowid FROM entries WHERE archive_id = ?')
          .get(record.archiveId);
        if (existing) {
          db.prepare<[number]>('DELETE FROM entries_fts WHERE rowid = ?').run(existing.rowid);
          db.prepare<[number]>('DELETE FROM entries WHERE rowid = ?').run(existing.rowid);
        }
        const context = extractContext(record.content);
        const inserted = db
          .prepare<[string, string, string, string, string, number, string, string]>(
            `INSERT INTO entries
               (archive_id, original_path, category, tags, archived_at, retention_score, context, summary)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            record.archiveId,
            record.originalPath,
            record.category,
            JSON.stringify(record.tags),
            record.archivedAt,
            record.sourceRetentionScore,
            JSON.stringify(context.labels),
            context.summary
          );
        db.prepare<[number | bigint, string, string, string]>(
          'INSERT INTO entries_fts (rowid, original_path, tags, content) VALUES (?, ?, ?, ?)'
        ).run(inserted.lastInsertRowid, record.originalPath, record.tags.join(' '), record.content);
      })
    );
  }

  remove(archiveId: string): void {
    const client = this.open();
    const db = client.database;
    this.wrap(() =>
      client.transaction(() => {
        const existing = db
          .prepare<[string], { rowid: number }>('SELECT rowid FROM entries WHERE archive_id = ?')
          .get(archiveId);
        if (existing) {
          db.prepare<[number]>('DELETE FROM entries_fts WHERE rowid = ?').run(existing.rowid);
          db.prepare<[number]>('DELETE FROM entries WHERE rowid = ?').run(existing.rowid);
        }
      })
    );
  }

  /**
   * Full-text search, or a filter-only listing when ftsQuery is null
   */
  search(
    ftsQuery: string | null,
    filters: SearchFilters,
    limit: number,
    snippetTokens: number
  ): SegmentHit[] {
    const db = this.open().database;
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    for (const tag of filters.tags ?? []) {
      conditions.push('EXISTS (SELECT 1 FROM json_each(e.tags) WHERE json_each.value = ?)');
      params.push(tag);
    }
    if (filters.category) {
      conditions.push('e.category = ?');
      params.push(filters.category);
    }
    if (filters.context) {
      conditions.push(`EXISTS (SELECT 1 FROM json_each(e.context) WHERE json_each.value LIKE ? ESCAPE '\\')`);
      params.push(`%${filters.context.toLowerCase().replace(/[\\%_]/g, match => `\\${match}`)}%`);
    }
    if (filters.archivedAfter) {
      conditions.push('e.archived_at >= ?');
      params.push(filters.archivedAfter);
    }
    if (filters.archivedBefore) {
      conditions.push('e.archived_at <= ?');
      params.push(filters.archivedBefore);
    }
    const filterSql = conditions.map(c => ` AND ${c}`).join('');

    const rows = this.wrap(() => {
      if (ftsQuery === null) {
        return db
          .prepare<Array<string | number>, HitRow>(
            `SELECT e.archive_id, e.original_path, e.category, e.tags, e.archived_at,
                    e.retention_score, e.context, e.summary, 0 AS rank, substr(f.content, 1, ${PREVIEW_CHARS}) AS snippet
             FROM entries e
             JOIN entries_fts f ON f.rowid = e.rowid
             WHERE 1 = 1${filterSql}
             ORDER BY e.archived_at DESC, e.archive_id ASC
             LIMIT ?`
          )
          .all(...params, limit);
      }
      return db
        .prepare<Array<string | number>, HitRow>(
          `SELECT e.archive_id, e.original_path, e.category, e.tags, e.archived_at,
                  e.retention_score, e.context, e.summary, bm25(entries_fts) AS rank,
                  snippet(entries_fts, ${CONTENT_COLUMN}, '[', ']', '...', ?) AS snippet
           FROM entries_fts
           JOIN entries e ON e.rowid = entries_fts.rowid
           WHERE entries_fts MATCH ?${filterSql}
           ORDER BY rank
           LIMIT ?`
        )
        .all(snippetTokens, ftsQuery, ...params, limit);
    });

    return rows.map(row => ({
      archiveId: row.archive_id,
      originalPath: row.original_path,
      category: row.category,
      tags: parseStringArray(row.tags),
      archivedAt: row.archived_at,
      sourceRetentionScore: row.retention_score,
      rank: row.rank,
      snippet: row.snippet ?? '',
      context: parseStringArray(row.context),
      summary: row.summary,
    }));
  }

  count(): number {
    const row = this.wrap(() =>
      this.open().database.prepare<[], { n: number }>('SELECT count(*) AS n FROM entries').get()
    );
    return row?.n ?? 0;
  }

  /**
   * Discard everything in the segment, including a corrupt file
   */
  reset(): void {
    if (this.inMemory) {
      try {
        const client = this.open();
        client.exec(DROP_SCHEMA);
        client.exec(SEGMENT_SCHEMA);
        return;
      } catch {
        this.close();
      }
    }
    this.close();
    if (!this.inMemory) {
      for (const suffix of ['', '-journal', '-wal', '-shm']) {
        rmSync(`${this.dbPath}${suffix}`, { force: true });
      }
    }
    this.open();
  }

  close(): void {
    this.client?.close();
    this.client = null;
  }

  private wrap<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new IndexDegradedError(this.id, error instanceof Error ? error : undefined);
    }
  }
}
