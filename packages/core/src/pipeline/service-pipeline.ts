/**
 * Service Pipeline
 * Runs one service's stages strictly in declared order
 */

import { EventEmitter } from 'eventemitter3';
import { createChildLogger, logStageTransition, STAGE_STATUSES } from '@tidewater/shared';
import type {
  FailureKind,
  PipelineResult,
  PipelineStatus,
  ServiceDefinition,
  StageDefinition,
  StageResult,
  TriggerContext,
} from '@tidewater/shared';
import type { StageRunner } from '../executor/types.js';

export interface RunContext {
  runId: string;
  trigger: TriggerContext;
  /** Checked between stages; a running stage always finishes */
  signal?: AbortSignal;
}

export interface ServicePipelineEvents {
  'stage:started': (payload: { runId: string; serviceId: string; stage: StageDefinition }) => void;
  'stage:completed': (payload: { runId: string; serviceId: string; result: StageResult }) => void;
}

export class ServicePipeline extends EventEmitter<ServicePipelineEvents> {
  private logger = createChildLogger({ component: 'ServicePipeline' });

  constructor(private readonly executor: StageRunner) {
    super();
  }

  async execute(service: ServiceDefinition, context: RunContext): Promise<PipelineResult> {
    const startTime = Date.now();
    const log = this.logger.child({ runId: context.runId, serviceId: service.id });

    if (context.signal?.aborted) {
      log.info('Run cancelled before pipeline start');
      return {
        serviceId: service.id,
        stageResults: service.stages.map(skipped),
        finalStatus: 'not-started',
        durationMs: 0,
      };
    }

    const stageResults: StageResult[] = [];
    let halted: Extract<PipelineStatus, 'failed' | 'cancelled'> | undefined;
    let failureKind: FailureKind | undefined;

    for (const stage of service.stages) {
      if (!halted && context.signal?.aborted) {
        log.info({ stage: stage.name }, 'Run cancelled, halting pipeline');
        halted = 'cancelled';
      }

      if (halted) {
        stageResults.push(skipped(stage));
        logStageTransition(context.runId, service.id, stage.name, STAGE_STATUSES.SKIPPED);
        continue;
      }

      this.emit('stage:started', { runId: context.runId, serviceId: service.id, stage });
      logStageTransition(context.runId, service.id, stage.name, 'running');

      const result = await this.executor.run(stage, {
        runId: context.runId,
        service,
        trigger: context.trigger,
        previous: [...stageResults],
      });

      stageResults.push(result);
      logStageTransition(context.runId, service.id, stage.name, result.status);
      this.emit('stage:completed', { runId: context.runId, serviceId: service.id, result });

      if (result.status === STAGE_STATUSES.FAILED) {
        halted = 'failed';
        failureKind = result.error?.kind ?? 'execution';
        log.warn({ stage: stage.name, error: result.error?.message }, 'Stage failed, halting pipeline');
      }
    }

    const finalStatus: PipelineStatus = halted ?? 'success';
    log.info({ finalStatus, durationMs: Date.now() - startTime }, 'Pipeline finished');

    return {
      serviceId: service.id,
      stageResults,
      finalStatus,
      failureKind,
      durationMs: Date.now() - startTime,
    };
  }
}

function skipped(stage: StageDefinition): StageResult {
  return {
    stage: stage.name,
    kind: stage.kind,
    status: STAGE_STATUSES.SKIPPED,
    logs: [],
    attempts: 0,
    durationMs: 0,
  };
}
