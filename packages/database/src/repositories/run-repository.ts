/**
 * Run Repository
 * Archives finished runs and serves them back to the HTTP surface
 */

import { desc, eq } from 'drizzle-orm';
import type { RunArchive, RunResult } from '@tidewater/shared';
import { getDatabase } from '../connection.js';
import { runs } from '../schema.js';
import type { RunRow } from '../schema.js';
import { parseColumn, pipelineResultsSchema, stageErrorSchema } from './records.js';

export interface ListRunsOptions {
  branch?: string;
  limit?: number;
  offset?: number;
}

export class RunRepository implements RunArchive {
  /**
   * Store a finished run; saving the same run again replaces it
   */
  async save(result: RunResult): Promise<void> {
    const db = getDatabase();

    const row: typeof runs.$inferInsert = {
      id: result.runId,
      branch: result.trigger.branch,
      commit: result.trigger.commit,
      event: result.trigger.event,
      verdict: result.verdict,
      deployEnabled: result.deployEnabled,
      cancelled: result.cancelled,
      fatalError: result.fatalError ? JSON.stringify(result.fatalError) : null,
      pipelineResults: JSON.stringify(result.pipelineResults),
      startedAt: result.startedAt,
      completedAt: result.completedAt,
      durationMs: result.durationMs,
    };

    await db.insert(runs).values(row).onConflictDoUpdate({ target: runs.id, set: row });
  }

  async findById(id: string): Promise<RunResult | null> {
    const db = getDatabase();
    const result = await db.select().from(runs).where(eq(runs.id, id)).limit(1);
    const row = result[0];
    return row ? this.mapToResult(row) : null;
  }

  /**
   * Most recent runs first
   */
  async list(options: ListRunsOptions = {}): Promise<RunResult[]> {
    const db = getDatabase();
    const query = db
      .select()
      .from(runs)
      .where(options.branch ? eq(runs.branch, options.branch) : undefined)
      .orderBy(desc(runs.startedAt))
      .limit(options.limit ?? 50)
      .offset(options.offset ?? 0);

    const rows = await query;
    return rows.map((row) => this.mapToResult(row));
  }

  async delete(id: string): Promise<boolean> {
    const db = getDatabase();
    const result = await db.delete(runs).where(eq(runs.id, id)).returning({ id: runs.id });
    return result.length > 0;
  }

  private mapToResult(row: RunRow): RunResult {
    return {
      runId: row.id,
      trigger: { branch: row.branch, commit: row.commit, event: row.event },
      verdict: row.verdict,
      pipelineResults: parseColumn(pipelineResultsSchema, 'runs.pipeline_results', row.pipelineResults),
      deployEnabled: row.deployEnabled,
      cancelled: row.cancelled,
      fatalError: row.fatalError ? parseColumn(stageErrorSchema, 'runs.fatal_error', row.fatalError) : undefined,
      startedAt: row.startedAt,
      completedAt: row.completedAt,
      durationMs: row.durationMs,
    };
  }
}
