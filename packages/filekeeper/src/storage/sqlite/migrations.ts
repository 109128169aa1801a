/**
 * Schema migrations
 */

import type { SQLiteClient } from './client.js';
import { MIGRATIONS, SCHEMA, SCHEMA_VERSION } from './schema.js';

/**
 * Bring the metadata database up to SCHEMA_VERSION
 */
export function runMigrations(client: SQLiteClient): void {
  client.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const row = client.database
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
    .get();
  const current = row?.version ?? 0;

  if (current >= SCHEMA_VERSION) {
    return;
  }

  const record = client.database.prepare<[number], unknown>('INSERT INTO schema_version (version) VALUES (?)');

  client.transaction(() => {
    if (current === 0) {
      client.exec(SCHEMA);
      record.run(SCHEMA_VERSION);
      return;
    }
    for (let version = current + 1; version <= SCHEMA_VERSION; version++) {
      const sql = MIGRATIONS[version];
      if (sql === undefined) {
        throw new Error(`no migration to schema version ${version}`);
      }
      client.exec(sql);
      record.run(version);
    }
  });
}
