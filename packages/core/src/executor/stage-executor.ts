/**
 * Stage Executor
 * Runs one stage of one service, consulting the cache store first
 */

import {
  BuildFailureError,
  classifyFailure,
  ClusterError,
  createChildLogger,
  FingerprintCollisionError,
  RolloutFailedError,
  RolloutTimeoutError,
  TestFailureError,
  ValidationError,
  wrapError,
} from '@tidewater/shared';
import type {
  ArtifactKind,
  CacheArtifact,
  CacheStore,
  CredentialProvider,
  StageDefinition,
  StageError,
  StageKind,
  StageOutput,
  StageResult,
} from '@tidewater/shared';
import { resolve } from 'node:path';
import { computeFingerprint } from '../cache/fingerprint.js';
import type { Fingerprint } from '../cache/fingerprint.js';
import { ResilientCacheStore } from '../cache/resilient-cache-store.js';
import type { ContainerBuildBackend } from '../build/types.js';
import { toLogLines } from './command-runner.js';
import { withRetry } from './retry.js';
import type {
  ActionOutcome,
  CommandRunner,
  Deployer,
  StageContext,
  StageExecutorConfig,
  StageRunner,
} from './types.js';
import { DEFAULT_STAGE_EXECUTOR_CONFIG } from './types.js';

export interface StageExecutorDeps {
  cache: CacheStore;
  commandRunner: CommandRunner;
  buildBackend: ContainerBuildBackend;
  /** Required only for services with a deploy stage */
  deployer?: Deployer;
  credentials?: CredentialProvider;
}

const ARTIFACT_KINDS: Record<StageKind, ArtifactKind> = {
  test: 'report',
  build: 'image',
  push: 'image',
  deploy: 'artifact',
};

export class StageExecutor implements StageRunner {
  private config: StageExecutorConfig;
  private cache: CacheStore;
  private logger = createChildLogger({ component: 'StageExecutor' });

  constructor(
    private readonly deps: StageExecutorDeps,
    config: Partial<StageExecutorConfig> = {}
  ) {
    this.config = { ...DEFAULT_STAGE_EXECUTOR_CONFIG, ...config };
    this.cache = new ResilientCacheStore(deps.cache);
  }

  /**
   * Run a stage. Never throws: every failure is recorded on the result.
   */
  async run(stage: StageDefinition, context: StageContext): Promise<StageResult> {
    const startTime = Date.now();
    const log = this.logger.child({ runId: context.runId, serviceId: context.service.id, stage: stage.name });

    // Deploys always reach the cluster
    if (stage.kind === 'deploy') {
      return this.execute(stage, context, startTime, undefined);
    }

    let fingerprint: Fingerprint;
    try {
      fingerprint = await this.fingerprint(stage, context);
    } catch (error) {
      log.error({ error: error instanceof Error ? error.message : String(error) }, 'Fingerprint computation failed');
      return this.failedResult(stage, startTime, [], wrapError(error), 0);
    }

    const cached = await this.cache.get(fingerprint.key, context.runId);
    if (cached && !(await this.isReusable(cached, fingerprint, context))) {
      return this.execute(stage, context, startTime, fingerprint);
    }
    if (cached) {
      log.info({ key: fingerprint.key }, 'Cache hit');
      return {
        stage: stage.name,
        kind: stage.kind,
        status: 'cached',
        fingerprint: fingerprint.key,
        output: cached.output,
        logs: [`Cache hit: ${fingerprint.key}`],
        attempts: 0,
        durationMs: Date.now() - startTime,
      };
    }

    log.debug({ key: fingerprint.key }, 'Cache miss');
    return this.execute(stage, context, startTime, fingerprint);
  }

  private async execute(
    stage: StageDefinition,
    context: StageContext,
    startTime: number,
    fingerprint: Fingerprint | undefined
  ): Promise<StageResult> {
    let outcome: ActionOutcome;
    try {
      outcome = await this.runAction(stage, context, fingerprint);
    } catch (error) {
      this.logger.error(
        { runId: context.runId, serviceId: context.service.id, stage: stage.name, error: error instanceof Error ? error.message : String(error) },
        'Stage execution error'
      );
      return this.failedResult(stage, startTime, [], wrapError(error), 1, fingerprint?.key);
    }

    if (outcome.failure) {
      return {
        ...this.failedResult(stage, startTime, outcome.logs, outcome.failure, outcome.attempts, fingerprint?.key),
        output: outcome.output,
      };
    }

    if (fingerprint && stage.kind !== 'deploy') {
      try {
        await this.cache.put(fingerprint.key, this.toArtifact(stage.kind, fingerprint, outcome.output), context.runId);
      } catch (error) {
        // Only a collision gets past the resilient store
        this.logger.error({ runId: context.runId, key: fingerprint.key }, 'Fingerprint collision while caching stage output');
        return this.failedResult(stage, startTime, outcome.logs, wrapError(error), outcome.attempts, fingerprint.key);
      }
    }

    return {
      stage: stage.name,
      kind: stage.kind,
      status: 'passed',
      fingerprint: fingerprint?.key,
      output: outcome.output,
      logs: outcome.logs,
      attempts: outcome.attempts,
      durationMs: Date.now() - startTime,
    };
  }

  private runAction(
    stage: StageDefinition,
    context: StageContext,
    fingerprint: Fingerprint | undefined
  ): Promise<ActionOutcome> {
    switch (stage.kind) {
      case 'test':
        return this.runTest(stage, context);
      case 'build':
        if (!fingerprint) {
          throw new ValidationError(`Build stage ${stage.name} has no fingerprint`);
        }
        return this.runBuild(stage, context, fingerprint);
      case 'push':
        return this.runPush(context);
      case 'deploy':
        return this.runDeploy(context);
    }
  }

  // ===========================================
  // Fingerprints
  // ===========================================

  private async fingerprint(stage: StageDefinition, context: StageContext): Promise<Fingerprint> {
    const { service } = context;

    switch (stage.kind) {
      case 'test':
        return computeFingerprint({
          serviceId: service.id,
          stage: stage.inputs.length > 0 ? stage : { ...stage, inputs: ['.'] },
          sourceDir: service.sourceDir,
        });

      case 'build':
        return computeFingerprint({
          serviceId: service.id,
          stage: stage.inputs.length > 0 ? stage : { ...stage, inputs: [service.build.contextDir] },
          sourceDir: service.sourceDir,
          extra: {
            dockerfile: service.build.dockerfile,
            imageRepository: service.build.imageRepository,
            buildArgs: service.build.buildArgs,
          },
        });

      default:
        // Push consumes the image of the stage before it; the published tags are part of its identity
        return computeFingerprint({
          serviceId: service.id,
          stage,
          sourceDir: service.sourceDir,
          upstreamKey: this.upstream(context)?.fingerprint,
          extra: { targetRefs: this.targetRefs(context) },
        });
    }
  }

  /**
   * A cached build names a local image; once that image is gone the entry is
   * dropped and the build runs again.
   */
  private async isReusable(cached: CacheArtifact, fingerprint: Fingerprint, context: StageContext): Promise<boolean> {
    const imageRef = cached.output.imageRef;
    if (cached.stageKind !== 'build' || !imageRef) {
      return true;
    }

    const log = this.logger.child({ runId: context.runId, serviceId: context.service.id, key: fingerprint.key });
    let present: boolean;
    try {
      present = await this.deps.buildBackend.hasImage(imageRef);
    } catch (error) {
      log.warn({ imageRef, error: error instanceof Error ? error.message : String(error) }, 'Image lookup failed');
      present = false;
    }
    if (present) {
      return true;
    }

    log.warn({ imageRef }, 'Cached image missing locally, rebuilding');
    try {
      await this.cache.invalidate(fingerprint.key);
    } catch (error) {
      log.warn({ error: error instanceof Error ? error.message : String(error) }, 'Failed to drop stale cache entry');
    }
    return false;
  }

  private toArtifact(kind: StageKind, fingerprint: Fingerprint, output: StageOutput): CacheArtifact {
    return {
      kind: ARTIFACT_KINDS[kind],
      stageKind: kind,
      ref: output.imageRef ?? fingerprint.digest,
      output,
    };
  }

  // ===========================================
  // Actions
  // ===========================================

  private async runTest(stage: StageDefinition, context: StageContext): Promise<ActionOutcome> {
    if (!stage.command) {
      throw new ValidationError(`Test stage ${stage.name} has no command`, { serviceId: context.service.id });
    }

    const timeoutMs = stage.timeoutMs ?? this.config.stageTimeoutMs;
    const result = await this.deps.commandRunner.run(stage.command, [], {
      cwd: context.service.sourceDir,
      env: stage.env,
      timeoutMs,
      shell: true,
    });
    const logs = toLogLines(result.stdout, result.stderr);

    if (result.timedOut) {
      return {
        output: {},
        logs,
        attempts: 1,
        failure: new TestFailureError(`Test command timed out after ${timeoutMs}ms`, null, {
          serviceId: context.service.id,
          stage: stage.name,
        }),
      };
    }

    if (result.exitCode !== 0) {
      return {
        output: {},
        logs,
        attempts: 1,
        failure: new TestFailureError(`Test command exited with code ${result.exitCode}`, result.exitCode, {
          serviceId: context.service.id,
          stage: stage.name,
        }),
      };
    }

    // Only deterministic material goes into the cached output; raw output stays in the logs
    const report = stage.outputs.length > 0 ? `passed (${stage.outputs.join(', ')})` : 'passed';
    return { output: { report }, logs, attempts: 1 };
  }

  private async runBuild(
    stage: StageDefinition,
    context: StageContext,
    fingerprint: Fingerprint
  ): Promise<ActionOutcome> {
    const { service } = context;
    const result = await this.deps.buildBackend.build({
      serviceId: service.id,
      contextDir: resolve(service.sourceDir, service.build.contextDir),
      dockerfile: service.build.dockerfile,
      imageRepository: service.build.imageRepository,
      contentDigest: fingerprint.digest,
      buildArgs: service.build.buildArgs,
      timeoutMs: stage.timeoutMs ?? this.config.stageTimeoutMs,
    });

    if (!result.success || !result.imageRef) {
      return {
        output: {},
        logs: result.logs,
        attempts: 1,
        failure: new BuildFailureError(result.error ?? 'Build produced no image', {
          serviceId: service.id,
          stage: stage.name,
        }),
      };
    }

    return { output: { imageRef: result.imageRef }, logs: result.logs, attempts: 1 };
  }

  private async runPush(context: StageContext): Promise<ActionOutcome> {
    const imageRef = this.upstream(context)?.output?.imageRef;
    if (!imageRef) {
      throw new ValidationError('Push stage has no built image to publish', { serviceId: context.service.id });
    }

    const targetRefs = this.targetRefs(context);
    const credentials = await this.deps.credentials?.getRegistryCredentials();

    const { value, attempts } = await withRetry(
      () => this.deps.buildBackend.push(imageRef, targetRefs, credentials),
      this.config.retry,
      { operation: `push ${context.service.id}` }
    );

    // The immutable commit tag is what later stages deploy
    return {
      output: { imageRef: targetRefs[0], tags: value.publishedRefs },
      logs: value.logs,
      attempts,
    };
  }

  private async runDeploy(context: StageContext): Promise<ActionOutcome> {
    const { service } = context;
    if (!service.deploy) {
      throw new ValidationError(`Service ${service.id} has a deploy stage but no deploy target`, {
        serviceId: service.id,
      });
    }
    if (!this.deps.deployer) {
      throw new ValidationError('No deployment controller configured', { serviceId: service.id });
    }

    const imageRef = this.upstream(context)?.output?.imageRef;
    if (!imageRef) {
      throw new ValidationError('Deploy stage has no published image to roll out', { serviceId: service.id });
    }

    const rolloutTimeoutMs = service.deploy.rolloutTimeoutMs ?? this.config.rolloutTimeoutMs;
    const deployment = await this.deps.deployer.deploy({
      serviceId: service.id,
      target: service.deploy.target,
      imageRef,
      descriptorTemplate: service.deploy.descriptorTemplate,
      rollbackEnabled: service.deploy.rollbackEnabled,
      rolloutTimeoutMs,
      pollIntervalMs: this.config.pollIntervalMs,
      runId: context.runId,
    });

    const output: StageOutput = { imageRef, deployment };
    const logs = deployment.transitions.map(
      (t) => `${t.at.toISOString()} ${t.from} -> ${t.to}${t.reason ? `: ${t.reason}` : ''}`
    );

    if (deployment.state === 'stable') {
      return { output, logs, attempts: 1 };
    }

    const errorContext = { serviceId: service.id, rolledBack: deployment.rolledBack };

    if (deployment.failureReason === 'apply-failed') {
      // The cluster refused the change: an infrastructure fault, not a verdict on the image
      throw new ClusterError(deployment.message ?? 'Cluster rejected the deployment descriptor', undefined, errorContext);
    }

    const failure = deployment.failureReason === 'timeout'
      ? new RolloutTimeoutError(rolloutTimeoutMs, errorContext)
      : new RolloutFailedError(deployment.message ?? 'Rollout failed', errorContext);

    return { output, logs, attempts: 1, failure };
  }

  // ===========================================
  // Helpers
  // ===========================================

  /** Nearest earlier stage that produced an image */
  private upstream(context: StageContext): StageResult | undefined {
    for (let i = context.previous.length - 1; i >= 0; i--) {
      const result = context.previous[i];
      if (result?.output?.imageRef) {
        return result;
      }
    }
    return undefined;
  }

  /** Immutable commit reference first, then the mutable tag */
  private targetRefs(context: StageContext): string[] {
    const repository = context.service.build.imageRepository;
    const commit = this.config.commitTagLength > 0
      ? context.trigger.commit.slice(0, this.config.commitTagLength)
      : context.trigger.commit;
    return [`${repository}:${commit}`, `${repository}:${this.config.mutableTag}`];
  }

  private failedResult(
    stage: StageDefinition,
    startTime: number,
    logs: string[],
    error: Error,
    attempts: number,
    fingerprint?: string
  ): StageResult {
    return {
      stage: stage.name,
      kind: stage.kind,
      status: 'failed',
      fingerprint,
      logs,
      error: toStageError(error),
      attempts,
      durationMs: Date.now() - startTime,
    };
  }
}

export function toStageError(error: Error): StageError {
  const wrapped = wrapError(error);
  return {
    code: wrapped.code,
    name: wrapped.name,
    message: wrapped.message,
    kind: classifyFailure(error),
  };
}

export function isCollision(result: StageResult): boolean {
  return result.error?.name === FingerprintCollisionError.name;
}
