/**
 * Pipeline Orchestrator
 *
 * Runs every service pipeline of a run concurrently and aggregates the verdict.
 *
 *   RunSpec ──▶ trigger policy ──▶ ┌ pipeline(api) : test → build → push → deploy ┐
 *                                  ├ pipeline(web) : test → build → push → deploy ┤──▶ verdict
 *                                  └ ...                                          ┘
 *
 * One service's failure never halts another's. A fingerprint collision is the
 * only fault that stops the whole run.
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import { createChildLogger, wrapError } from '@tidewater/shared';
import type {
  CacheStore,
  PipelineResult,
  RunArchive,
  RunResult,
  RunSpec,
  ServiceDefinition,
  StageDefinition,
  StageError,
  StageResult,
  TriggerContext,
} from '@tidewater/shared';
import { ResilientCacheStore } from '../cache/resilient-cache-store.js';
import { isCollision, toStageError } from '../executor/stage-executor.js';
import type { StageRunner } from '../executor/types.js';
import { ServicePipeline } from '../pipeline/service-pipeline.js';
import { applyTriggerPolicy } from './trigger-policy.js';
import { computeVerdict } from './verdict.js';

export interface PipelineOrchestratorDependencies {
  executor: StageRunner;
  /** Leases taken during the run are released through it */
  cache: CacheStore;
  archive?: RunArchive;
}

export interface PipelineOrchestratorEvents {
  'run:started': (payload: { runId: string; trigger: TriggerContext; services: string[]; deployEnabled: boolean }) => void;
  'stage:started': (payload: { runId: string; serviceId: string; stage: StageDefinition }) => void;
  'stage:completed': (payload: { runId: string; serviceId: string; result: StageResult }) => void;
  'pipeline:completed': (payload: { runId: string; result: PipelineResult }) => void;
  'run:completed': (payload: { result: RunResult }) => void;
}

export interface RunOptions {
  /** Cooperative cancellation for the whole run */
  signal?: AbortSignal;
}

export class PipelineOrchestrator extends EventEmitter<PipelineOrchestratorEvents> {
  private logger = createChildLogger({ component: 'PipelineOrchestrator' });
  private cache: CacheStore;

  constructor(private readonly deps: PipelineOrchestratorDependencies) {
    super();
    this.cache = new ResilientCacheStore(deps.cache);
  }

  async run(spec: RunSpec, options: RunOptions = {}): Promise<RunResult> {
    const runId = spec.runId ?? randomUUID();
    const startedAt = new Date();
    const log = this.logger.child({ runId });

    // Trigger gating happens once, before any pipeline exists
    const { services, deployEnabled } = applyTriggerPolicy(spec.services, spec.trigger, spec.policy);

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let fatalError: StageError | undefined;

    const pipeline = new ServicePipeline(this.deps.executor);
    pipeline.on('stage:started', (event) => this.emit('stage:started', event));
    pipeline.on('stage:completed', (event) => {
      if (!fatalError && isCollision(event.result)) {
        fatalError = event.result.error;
        log.error(
          { serviceId: event.serviceId, stage: event.result.stage, key: event.result.fingerprint },
          'Fingerprint collision detected, cancelling run'
        );
        controller.abort();
      }
      this.emit('stage:completed', event);
    });

    log.info(
      { trigger: spec.trigger, services: services.map((s) => s.id), deployEnabled },
      'Run started'
    );
    this.emit('run:started', {
      runId,
      trigger: spec.trigger,
      services: services.map((s) => s.id),
      deployEnabled,
    });

    let pipelineResults: PipelineResult[];
    try {
      pipelineResults = await Promise.all(
        services.map((service) => this.runPipeline(pipeline, service, runId, spec.trigger, controller.signal))
      );
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
      pipeline.removeAllListeners();
      await this.cache.releaseLeases(runId);
    }

    const completedAt = new Date();
    const result: RunResult = {
      runId,
      trigger: spec.trigger,
      verdict: fatalError ? 'failure' : computeVerdict(pipelineResults),
      pipelineResults,
      deployEnabled,
      cancelled: options.signal?.aborted ?? false,
      fatalError,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };

    log.info(
      {
        verdict: result.verdict,
        cancelled: result.cancelled,
        durationMs: result.durationMs,
        pipelines: pipelineResults.map((p) => ({ serviceId: p.serviceId, status: p.finalStatus })),
      },
      'Run completed'
    );

    await this.archive(result);
    this.emit('run:completed', { result });
    return result;
  }

  private async runPipeline(
    pipeline: ServicePipeline,
    service: ServiceDefinition,
    runId: string,
    trigger: TriggerContext,
    signal: AbortSignal
  ): Promise<PipelineResult> {
    let result: PipelineResult;
    try {
      result = await pipeline.execute(service, { runId, trigger, signal });
    } catch (error) {
      // Keep the fault inside this service's result
      this.logger.error(
        { runId, serviceId: service.id, error: error instanceof Error ? error.message : String(error) },
        'Pipeline crashed'
      );
      result = {
        serviceId: service.id,
        stageResults: [],
        finalStatus: 'failed',
        failureKind: toStageError(wrapError(error)).kind,
        durationMs: 0,
      };
    }

    this.emit('pipeline:completed', { runId, result });
    return result;
  }

  private async archive(result: RunResult): Promise<void> {
    if (!this.deps.archive) {
      return;
    }
    try {
      await this.deps.archive.save(result);
    } catch (error) {
      this.logger.error(
        { runId: result.runId, error: error instanceof Error ? error.message : String(error) },
        'Failed to archive run'
      );
    }
  }
}
