/**
 * Run Manager
 * Starts orchestrator runs in the background and tracks the ones in flight
 */

import { randomUUID } from 'node:crypto';
import { createChildLogger } from '@tidewater/shared';
import type { RunResult, RunSpec, TriggerContext } from '@tidewater/shared';
import type { RunOptions } from '@tidewater/core';

export interface RunLauncher {
  run(spec: RunSpec, options?: RunOptions): Promise<RunResult>;
}

export interface ActiveRunSummary {
  runId: string;
  trigger: TriggerContext;
  services: string[];
  startedAt: Date;
  status: 'running' | 'cancelling';
}

interface ActiveRun {
  summary: ActiveRunSummary;
  controller: AbortController;
  done: Promise<RunResult | undefined>;
}

export class RunManager {
  private active = new Map<string, ActiveRun>();
  private logger = createChildLogger({ component: 'RunManager' });

  constructor(private readonly launcher: RunLauncher) {}

  /**
   * Start a run without waiting for it. Returns the run id.
   */
  start(spec: RunSpec): string {
    const runId = spec.runId ?? randomUUID();
    const controller = new AbortController();

    const summary: ActiveRunSummary = {
      runId,
      trigger: spec.trigger,
      services: spec.services.map((s) => s.id),
      startedAt: new Date(),
      status: 'running',
    };

    const done = this.launcher
      .run({ ...spec, runId }, { signal: controller.signal })
      .then((result): RunResult | undefined => result)
      .catch((error: unknown) => {
        this.logger.error(
          { runId, error: error instanceof Error ? error.message : String(error) },
          'Run crashed'
        );
        return undefined;
      })
      .finally(() => {
        this.active.delete(runId);
      });

    this.active.set(runId, { summary, controller, done });
    this.logger.info({ runId, trigger: spec.trigger }, 'Run scheduled');
    return runId;
  }

  /**
   * Request cancellation. Stages in flight finish; no new stage starts.
   */
  cancel(runId: string): boolean {
    const run = this.active.get(runId);
    if (!run) {
      return false;
    }
    run.summary.status = 'cancelling';
    run.controller.abort();
    this.logger.info({ runId }, 'Run cancellation requested');
    return true;
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  get(runId: string): ActiveRunSummary | undefined {
    return this.active.get(runId)?.summary;
  }

  list(): ActiveRunSummary[] {
    return [...this.active.values()].map((run) => run.summary);
  }

  /**
   * Resolve when the run finishes. Undefined for unknown or crashed runs.
   */
  async wait(runId: string): Promise<RunResult | undefined> {
    return this.active.get(runId)?.done;
  }

  /**
   * Cancel every active run and wait for all of them to settle
   */
  async shutdown(): Promise<void> {
    const runs = [...this.active.values()];
    if (runs.length === 0) {
      return;
    }
    this.logger.info({ count: runs.length }, 'Cancelling active runs');
    for (const run of runs) {
      run.controller.abort();
    }
    await Promise.all(runs.map((run) => run.done));
  }
}
