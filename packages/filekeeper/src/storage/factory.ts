/**
 * Storage Factory
 *
 * Resolves where the workspace keeps its data and opens the metadata store.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { FilekeeperConfig } from '../config/index.js';
import { SQLiteMetadataStore } from './sqlite/metadata-store.js';

export const METADATA_DB_FILE = 'metadata.db';
export const INDEX_DIR = 'index';

export interface DataPaths {
  dataDir: string;
  metadataDb: string;
  indexDir: string;
}

/**
 * Data locations for a workspace root
 */
export function resolveDataPaths(rootDir: string, config: FilekeeperConfig): DataPaths {
  const dataDir = path.resolve(rootDir, config.storage.dataDir);
  return {
    dataDir,
    metadataDb: path.join(dataDir, METADATA_DB_FILE),
    indexDir: path.join(dataDir, INDEX_DIR),
  };
}

/**
 * Open and migrate a metadata store. Pass ':memory:' for an ephemeral store.
 */
export async function createMetadataStore(dbPath: string): Promise<SQLiteMetadataStore> {
  if (dbPath !== ':memory:') {
    await fs.mkdir(path.dirname(dbPath), { recursive: true });
  }
  const store = new SQLiteMetadataStore(dbPath);
  await store.initialize();
  return store;
}
