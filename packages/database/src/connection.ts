/**
 * Database Connection
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { ConfigurationError, createChildLogger } from '@tidewater/shared';
import * as schema from './schema.js';

export type DatabaseConnection = BetterSQLite3Database<typeof schema>;

export interface DatabaseConfig {
  path: string;
  verbose?: boolean;
}

const MEMORY_PATH = ':memory:';

const logger = createChildLogger({ component: 'Database' });

let dbInstance: DatabaseConnection | null = null;
let sqliteInstance: Database.Database | null = null;

/**
 * Initialize database connection
 */
export function initializeDatabase(config: DatabaseConfig): DatabaseConnection {
  if (dbInstance) {
    return dbInstance;
  }

  logger.info({ path: config.path }, 'Initializing database');

  if (config.path !== MEMORY_PATH) {
    mkdirSync(dirname(config.path), { recursive: true });
  }

  sqliteInstance = new Database(config.path, {
    verbose: config.verbose ? (msg) => logger.debug({ sql: msg }, 'SQL') : undefined,
  });

  // Enable WAL mode for better performance
  sqliteInstance.pragma('journal_mode = WAL');

  createTablesIfNotExist(sqliteInstance);

  dbInstance = drizzle(sqliteInstance, { schema });

  logger.info('Database initialized successfully');

  return dbInstance;
}

/**
 * Create database tables if they don't exist
 */
function createTablesIfNotExist(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS cache_entries (
      key TEXT PRIMARY KEY,
      kind TEXT NOT NULL CHECK (kind IN ('image', 'report', 'artifact')),
      stage_kind TEXT NOT NULL CHECK (stage_kind IN ('test', 'build', 'push', 'deploy')),
      ref TEXT NOT NULL,
      output TEXT NOT NULL,
      access_seq INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      last_accessed_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      branch TEXT NOT NULL,
      "commit" TEXT NOT NULL,
      event TEXT NOT NULL CHECK (event IN ('push', 'pull_request')),
      verdict TEXT NOT NULL CHECK (verdict IN ('success', 'partial-failure', 'failure')),
      deploy_enabled INTEGER NOT NULL,
      cancelled INTEGER NOT NULL,
      fatal_error TEXT,
      pipeline_results TEXT NOT NULL,
      started_at INTEGER NOT NULL,
      completed_at INTEGER NOT NULL,
      duration_ms INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS deployments (
      id TEXT PRIMARY KEY,
      run_id TEXT,
      service_id TEXT NOT NULL,
      cluster TEXT NOT NULL,
      namespace TEXT NOT NULL,
      deployment TEXT NOT NULL,
      container TEXT,
      image_ref TEXT NOT NULL,
      previous_image_ref TEXT,
      state TEXT NOT NULL CHECK (state IN ('pending', 'in-progress', 'stable', 'failed', 'rolled-back')),
      rolled_back INTEGER NOT NULL,
      failure_reason TEXT CHECK (failure_reason IN ('timeout', 'unhealthy', 'apply-failed')),
      message TEXT,
      transitions TEXT NOT NULL,
      duration_ms INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_cache_entries_access_seq ON cache_entries(access_seq);
    CREATE INDEX IF NOT EXISTS idx_runs_branch ON runs(branch);
    CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(started_at);
    CREATE INDEX IF NOT EXISTS idx_deployments_service ON deployments(service_id);
    CREATE INDEX IF NOT EXISTS idx_deployments_run ON deployments(run_id);
  `);
}

/**
 * Get database connection
 */
export function getDatabase(): DatabaseConnection {
  if (!dbInstance) {
    throw new ConfigurationError('Database not initialized. Call initializeDatabase first.');
  }
  return dbInstance;
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (sqliteInstance) {
    sqliteInstance.close();
    sqliteInstance = null;
    dbInstance = null;
    logger.info('Database connection closed');
  }
}
