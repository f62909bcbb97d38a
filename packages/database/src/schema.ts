/**
 * Database Schema
 * Using Drizzle ORM with SQLite
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Stage cache entries, keyed by fingerprint
 */
export const cacheEntries = sqliteTable(
  'cache_entries',
  {
    key: text('key').primaryKey(),
    kind: text('kind', { enum: ['image', 'report', 'artifact'] }).notNull(),
    stageKind: text('stage_kind', { enum: ['test', 'build', 'push', 'deploy'] }).notNull(),
    ref: text('ref').notNull(),
    output: text('output').notNull(), // JSON stringified StageOutput
    // Monotonic access counter; lowest is least recently used
    accessSeq: integer('access_seq').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    lastAccessedAt: integer('last_accessed_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    accessSeqIdx: index('idx_cache_entries_access_seq').on(table.accessSeq),
  })
);

/**
 * Finished runs
 */
export const runs = sqliteTable(
  'runs',
  {
    id: text('id').primaryKey(),
    branch: text('branch').notNull(),
    commit: text('commit').notNull(),
    event: text('event', { enum: ['push', 'pull_request'] }).notNull(),
    verdict: text('verdict', { enum: ['success', 'partial-failure', 'failure'] }).notNull(),
    deployEnabled: integer('deploy_enabled', { mode: 'boolean' }).notNull(),
    cancelled: integer('cancelled', { mode: 'boolean' }).notNull(),
    fatalError: text('fatal_error'), // JSON stringified StageError
    pipelineResults: text('pipeline_results').notNull(), // JSON array of PipelineResult
    startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
    completedAt: integer('completed_at', { mode: 'timestamp_ms' }).notNull(),
    durationMs: integer('duration_ms').notNull(),
  },
  (table) => ({
    branchIdx: index('idx_runs_branch').on(table.branch),
    startedAtIdx: index('idx_runs_started_at').on(table.startedAt),
  })
);

/**
 * Rollouts that reached a terminal state
 */
export const deployments = sqliteTable(
  'deployments',
  {
    id: text('id').primaryKey(),
    runId: text('run_id'),
    serviceId: text('service_id').notNull(),
    cluster: text('cluster').notNull(),
    namespace: text('namespace').notNull(),
    deployment: text('deployment').notNull(),
    container: text('container'),
    imageRef: text('image_ref').notNull(),
    previousImageRef: text('previous_image_ref'),
    state: text('state', { enum: ['pending', 'in-progress', 'stable', 'failed', 'rolled-back'] }).notNull(),
    rolledBack: integer('rolled_back', { mode: 'boolean' }).notNull(),
    failureReason: text('failure_reason', { enum: ['timeout', 'unhealthy', 'apply-failed'] }),
    message: text('message'),
    transitions: text('transitions').notNull(), // JSON array of RolloutTransition
    durationMs: integer('duration_ms').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    serviceIdx: index('idx_deployments_service').on(table.serviceId),
    runIdx: index('idx_deployments_run').on(table.runId),
  })
);

export type CacheEntryRow = typeof cacheEntries.$inferSelect;
export type RunRow = typeof runs.$inferSelect;
export type DeploymentRow = typeof deployments.$inferSelect;
