/**
 * Deployment Repository
 * Records every rollout that reached a terminal state
 */

import { and, desc, eq } from 'drizzle-orm';
import type { DeploymentArchive, DeploymentResult } from '@tidewater/shared';
import { getDatabase } from '../connection.js';
import { deployments } from '../schema.js';
import type { DeploymentRow } from '../schema.js';
import { parseColumn, rolloutTransitionSchema } from './records.js';

export interface DeploymentRecord extends DeploymentResult {
  runId: string | null;
  createdAt: Date;
}

const transitionsSchema = rolloutTransitionSchema.array();

export class DeploymentRepository implements DeploymentArchive {
  async archive(result: DeploymentResult, runId?: string): Promise<void> {
    const db = getDatabase();

    await db.insert(deployments).values({
      id: result.deploymentId,
      runId: runId ?? null,
      serviceId: result.serviceId,
      cluster: result.target.cluster,
      namespace: result.target.namespace,
      deployment: result.target.deployment,
      container: result.target.container ?? null,
      imageRef: result.imageRef,
      previousImageRef: result.previousImageRef ?? null,
      state: result.state,
      rolledBack: result.rolledBack,
      failureReason: result.failureReason ?? null,
      message: result.message ?? null,
      transitions: JSON.stringify(result.transitions),
      durationMs: result.durationMs,
      createdAt: new Date(),
    });
  }

  async findById(id: string): Promise<DeploymentRecord | null> {
    const db = getDatabase();
    const result = await db.select().from(deployments).where(eq(deployments.id, id)).limit(1);
    const row = result[0];
    return row ? this.mapToRecord(row) : null;
  }

  async findByRun(runId: string): Promise<DeploymentRecord[]> {
    const db = getDatabase();
    const rows = await db
      .select()
      .from(deployments)
      .where(eq(deployments.runId, runId))
      .orderBy(desc(deployments.createdAt));
    return rows.map((row) => this.mapToRecord(row));
  }

  /**
   * Deployment history of a service, most recent first
   */
  async findByService(serviceId: string, limit = 20): Promise<DeploymentRecord[]> {
    const db = getDatabase();
    const rows = await db
      .select()
      .from(deployments)
      .where(eq(deployments.serviceId, serviceId))
      .orderBy(desc(deployments.createdAt))
      .limit(limit);
    return rows.map((row) => this.mapToRecord(row));
  }

  /**
   * Last image that rolled out cleanly for a service
   */
  async findLastStable(serviceId: string): Promise<DeploymentRecord | null> {
    const db = getDatabase();
    const result = await db
      .select()
      .from(deployments)
      .where(and(eq(deployments.serviceId, serviceId), eq(deployments.state, 'stable')))
      .orderBy(desc(deployments.createdAt))
      .limit(1);
    const row = result[0];
    return row ? this.mapToRecord(row) : null;
  }

  private mapToRecord(row: DeploymentRow): DeploymentRecord {
    return {
      deploymentId: row.id,
      runId: row.runId,
      serviceId: row.serviceId,
      target: {
        cluster: row.cluster,
        namespace: row.namespace,
        deployment: row.deployment,
        container: row.container ?? undefined,
      },
      state: row.state,
      outcome: row.state === 'stable' ? 'stable' : 'failed',
      rolledBack: row.rolledBack,
      imageRef: row.imageRef,
      previousImageRef: row.previousImageRef ?? undefined,
      message: row.message ?? undefined,
      failureReason: row.failureReason ?? undefined,
      transitions: parseColumn(transitionsSchema, 'deployments.transitions', row.transitions),
      durationMs: row.durationMs,
      createdAt: row.createdAt,
    };
  }
}
