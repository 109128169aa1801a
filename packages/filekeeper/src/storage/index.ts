export * from './interface.js';
export { createMetadataStore, resolveDataPaths, METADATA_DB_FILE, INDEX_DIR, type DataPaths } from './factory.js';
export { SQLiteMetadataStore } from './sqlite/metadata-store.js';
export { SQLiteClient, type SQLiteClientConfig } from './sqlite/client.js';
