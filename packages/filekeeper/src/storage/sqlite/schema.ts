/**
 * SQLite Schema Definition
 *
 * Metadata database:
 * - tracked_files: one row per non-archived file, keyed by path
 * - archive_records: append-only archive log, keyed by archive ID
 * - lifecycle_events: append-only transition audit
 * - consolidation_log / purge_log: audit of destructive operations
 * - index_retry_queue: archive records whose index ingestion failed
 * - sessions / insight_generations: pattern recognizer history
 */

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS tracked_files (
  path TEXT PRIMARY KEY,
  content_hash TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_accessed_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL,
  retention_score REAL NOT NULL CHECK (retention_score >= 0 AND retention_score <= 10),
  state TEXT NOT NULL CHECK (state IN ('active', 'aging', 'archive_eligible')),
  generation_mode TEXT NOT NULL CHECK (generation_mode IN ('minimal', 'professional', 'research')),
  tags TEXT NOT NULL DEFAULT '[]',  -- JSON array
  session_id TEXT,
  category TEXT,
  retention_days INTEGER,
  stakeholders TEXT NOT NULL DEFAULT '[]',  -- JSON array
  frameworks TEXT NOT NULL DEFAULT '[]',  -- JSON array
  retained_reason TEXT,
  retained_at TEXT
);

CREATE TABLE IF NOT EXISTS archive_records (
  archive_id TEXT PRIMARY KEY,
  original_path TEXT NOT NULL,
  content TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',  -- JSON array
  category TEXT NOT NULL,
  archived_at TEXT NOT NULL,
  source_retention_score REAL NOT NULL,
  reason TEXT NOT NULL CHECK (reason IN ('sweep', 'manual', 'consolidated')),
  session_id TEXT,
  indexed_at TEXT
);

CREATE TABLE IF NOT EXISTS lifecycle_events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  path TEXT NOT NULL,
  from_state TEXT NOT NULL,
  to_state TEXT NOT NULL,
  at TEXT NOT NULL,
  reason TEXT NOT NULL,
  archive_id TEXT
);

CREATE TABLE IF NOT EXISTS consolidation_log (
  id TEXT PRIMARY KEY,
  applied_at TEXT NOT NULL,
  destination_path TEXT NOT NULL,
  destination_hash TEXT NOT NULL,
  sources TEXT NOT NULL,  -- JSON array of { path, contentHash, archiveId }
  kind TEXT NOT NULL,
  confidence REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS purge_log (
  archive_id TEXT PRIMARY KEY,
  original_path TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  purged_at TEXT NOT NULL,
  reason TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS index_retry_queue (
  archive_id TEXT PRIMARY KEY,
  attempts INTEGER NOT NULL DEFAULT 0,
  next_attempt_at TEXT NOT NULL,
  last_error TEXT NOT NULL,
  enqueued_at TEXT NOT NULL,
  FOREIGN KEY (archive_id) REFERENCES archive_records(archive_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS sessions (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL UNIQUE,
  recorded_at TEXT NOT NULL,
  files TEXT NOT NULL,  -- JSON array
  outcome TEXT NOT NULL CHECK (outcome IN ('success', 'partial', 'abandoned')),
  duration_minutes REAL NOT NULL CHECK (duration_minutes >= 0)
);

CREATE TABLE IF NOT EXISTS insight_generations (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  published_at TEXT NOT NULL,
  insights TEXT NOT NULL  -- JSON array
);

CREATE INDEX IF NOT EXISTS idx_tracked_state ON tracked_files(state);
CREATE INDEX IF NOT EXISTS idx_tracked_last_accessed ON tracked_files(last_accessed_at);
CREATE INDEX IF NOT EXISTS idx_archive_archived_at ON archive_records(archived_at);
CREATE INDEX IF NOT EXISTS idx_archive_original_path ON archive_records(original_path);
CREATE INDEX IF NOT EXISTS idx_events_path ON lifecycle_events(path);
CREATE INDEX IF NOT EXISTS idx_retry_next_attempt ON index_retry_queue(next_attempt_at);
`;

/**
 * Schema version for migrations
 */
export const SCHEMA_VERSION = 2;

/**
 * Upgrades from the previous version, keyed by the version they produce.
 * A fresh database gets SCHEMA directly.
 */
export const MIGRATIONS: Record<number, string> = {
  2: `
    ALTER TABLE tracked_files ADD COLUMN stakeholders TEXT NOT NULL DEFAULT '[]';
    ALTER TABLE tracked_files ADD COLUMN frameworks TEXT NOT NULL DEFAULT '[]';
    ALTER TABLE tracked_files ADD COLUMN retained_reason TEXT;
    ALTER TABLE tracked_files ADD COLUMN retained_at TEXT;
  `,
};
