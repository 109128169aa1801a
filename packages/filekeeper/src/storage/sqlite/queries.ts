/**
 * Prepared SQL for the metadata store
 */

// ============================================================================
// Tracked files
// ============================================================================

export const INSERT_FILE = `
  INSERT INTO tracked_files (
    path, content_hash, created_at, last_accessed_at, last_modified_at,
    retention_score, state, generation_mode, tags, session_id, category, retention_days,
    stakeholders, frameworks
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

export const REPLACE_CONTENT = `
  UPDATE tracked_files
  SET content_hash = ?, last_accessed_at = ?, last_modified_at = ?, retention_score = ?,
      state = 'active', generation_mode = ?, tags = ?, session_id = ?, category = ?, retention_days = ?,
      stakeholders = ?, frameworks = ?
  WHERE path = ?
`;

export const GET_FILE = `SELECT * FROM tracked_files WHERE path = ?`;

export const TOUCH_FILE = `
  UPDATE tracked_files SET last_accessed_at = ?, state = 'active' WHERE path = ?
`;

/** Retaining or releasing also brings the file back to active */
export const SET_RETENTION = `
  UPDATE tracked_files SET retained_reason = ?, retained_at = ?, state = 'active' WHERE path = ?
`;

export const UPDATE_SCORE = `UPDATE tracked_files SET retention_score = ? WHERE path = ?`;

/** Compare-and-set on lifecycle state */
export const CAS_STATE = `UPDATE tracked_files SET state = ? WHERE path = ? AND state = ?`;

export const DELETE_FILE = `DELETE FROM tracked_files WHERE path = ?`;

export const COUNT_BY_STATE = `SELECT state, COUNT(*) AS count FROM tracked_files GROUP BY state`;

// ============================================================================
// Archive records
// ============================================================================

export const INSERT_ARCHIVE = `
  INSERT INTO archive_records (
    archive_id, original_path, content, content_hash, tags, category,
    archived_at, source_retention_score, reason, session_id, indexed_at
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

export const GET_ARCHIVE = `SELECT * FROM archive_records WHERE archive_id = ?`;

export const LIST_ARCHIVES = `
  SELECT * FROM archive_records ORDER BY archived_at ASC, archive_id ASC LIMIT ? OFFSET ?
`;

export const LIST_ARCHIVES_BY_PATH = `
  SELECT * FROM archive_records WHERE original_path = ? ORDER BY archived_at ASC, archive_id ASC
`;

export const COUNT_ARCHIVES = `SELECT COUNT(*) AS count FROM archive_records`;

export const MARK_INDEXED = `UPDATE archive_records SET indexed_at = ? WHERE archive_id = ?`;

export const DELETE_ARCHIVE = `DELETE FROM archive_records WHERE archive_id = ?`;

export const COUNT_ARCHIVES_BY_CATEGORY = `
  SELECT category AS key, COUNT(*) AS count FROM archive_records GROUP BY category
`;

export const COUNT_ARCHIVES_BY_REASON = `
  SELECT reason AS key, COUNT(*) AS count FROM archive_records GROUP BY reason
`;

// ============================================================================
// Audit logs
// ============================================================================

export const INSERT_EVENT = `
  INSERT INTO lifecycle_events (path, from_state, to_state, at, reason, archive_id)
  VALUES (?, ?, ?, ?, ?, ?)
`;

export const LIST_EVENTS = `SELECT * FROM lifecycle_events ORDER BY id ASC`;

export const LIST_EVENTS_FOR_PATH = `SELECT * FROM lifecycle_events WHERE path = ? ORDER BY id ASC`;

export const INSERT_CONSOLIDATION = `
  INSERT INTO consolidation_log (
    id, applied_at, destination_path, destination_hash, sources, kind, confidence
  ) VALUES (?, ?, ?, ?, ?, ?, ?)
`;

export const LIST_CONSOLIDATIONS = `SELECT * FROM consolidation_log ORDER BY applied_at ASC, id ASC`;

export const INSERT_PURGE = `
  INSERT INTO purge_log (archive_id, original_path, content_hash, purged_at, reason)
  VALUES (?, ?, ?, ?, ?)
`;

export const LIST_PURGES = `SELECT * FROM purge_log ORDER BY purged_at ASC`;

// ============================================================================
// Index retry queue
// ============================================================================

export const UPSERT_RETRY = `
  INSERT INTO index_retry_queue (archive_id, attempts, next_attempt_at, last_error, enqueued_at)
  VALUES (?, 0, ?, ?, ?)
  ON CONFLICT(archive_id) DO UPDATE SET
    next_attempt_at = excluded.next_attempt_at,
    last_error = excluded.last_error
`;

export const LIST_DUE_RETRIES = `
  SELECT * FROM index_retry_queue WHERE next_attempt_at <= ? ORDER BY next_attempt_at ASC, archive_id ASC
`;

export const LIST_RETRIES = `SELECT * FROM index_retry_queue ORDER BY next_attempt_at ASC, archive_id ASC`;

export const RECORD_RETRY_FAILURE = `
  UPDATE index_retry_queue
  SET attempts = attempts + 1, next_attempt_at = ?, last_error = ?
  WHERE archive_id = ?
`;

export const DELETE_RETRY = `DELETE FROM index_retry_queue WHERE archive_id = ?`;
