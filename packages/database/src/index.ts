/**
 * @tidewater/database
 * Run history, deployment history and the persistent stage cache
 */

export { initializeDatabase, getDatabase, closeDatabase } from './connection.js';
export type { DatabaseConnection, DatabaseConfig } from './connection.js';

export * from './schema.js';
export * from './repositories/index.js';
export { SqliteCacheStore, DEFAULT_SQLITE_CACHE_CONFIG } from './sqlite-cache-store.js';
export type { SqliteCacheStoreConfig } from './sqlite-cache-store.js';
