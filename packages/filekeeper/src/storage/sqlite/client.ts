/**
 * SQLite Client Wrapper
 *
 * Wraps better-sqlite3 with WAL mode and foreign key support. Used for the
 * metadata database and for every archive index segment.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';

/**
 * SQLite client configuration
 */
export interface SQLiteClientConfig {
  /** Path to the database file, or ':memory:' */
  dbPath: string;
  /** Enable WAL mode (default: true) */
  walMode?: boolean;
  /** Enable foreign keys (default: true) */
  foreignKeys?: boolean;
  /** Log every statement through this function */
  verbose?: ((message?: unknown, ...additional: unknown[]) => void) | undefined;
}

/**
 * SQLite client wrapper
 */
export class SQLiteClient {
  private db: DatabaseType;

  constructor(config: SQLiteClientConfig) {
    this.db = new Database(config.dbPath, {
      verbose: config.verbose,
    });

    if (config.walMode ?? true) {
      this.db.pragma('journal_mode = WAL');
    }
    if (config.foreignKeys ?? true) {
      this.db.pragma('foreign_keys = ON');
    }
  }

  /**
   * Get the underlying database instance
   */
  get database(): DatabaseType {
    return this.db;
  }

  /**
   * Execute raw SQL
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Run a function inside a transaction; any throw rolls it back
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  get path(): string {
    return this.db.name;
  }
}
