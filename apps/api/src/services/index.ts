/**
 * API Services Module
 * Wires the cache, executor, deployment controller and orchestrator from configuration
 */

import {
  DeploymentController,
  DockerImageBuilder,
  EnvCredentialProvider,
  MemoryCacheStore,
  PipelineOrchestrator,
  ShellCommandRunner,
  StageExecutor,
  loadPipelineSpec,
} from '@tidewater/core';
import type { PipelineDefinition, PipelineSpecDefaults } from '@tidewater/core';
import { DeploymentRepository, RunRepository, SqliteCacheStore } from '@tidewater/database';
import type { DeploymentRecord } from '@tidewater/database';
import { K8sClusterBackend } from '@tidewater/kubernetes';
import { createChildLogger } from '@tidewater/shared';
import type { CacheStore, Config, RunResult } from '@tidewater/shared';
import { broadcastToChannel } from '../websocket/index.js';
import { RunManager } from './run-manager.js';

export { RunManager } from './run-manager.js';
export type { ActiveRunSummary, RunLauncher } from './run-manager.js';

const logger = createChildLogger({ component: 'Services' });

export interface RunQueries {
  findById(id: string): Promise<RunResult | null>;
  list(options?: { branch?: string; limit?: number; offset?: number }): Promise<RunResult[]>;
}

export interface DeploymentQueries {
  findById(id: string): Promise<DeploymentRecord | null>;
  findByRun(runId: string): Promise<DeploymentRecord[]>;
  findByService(serviceId: string, limit?: number): Promise<DeploymentRecord[]>;
}

export interface AppServices {
  runManager: RunManager;
  runs: RunQueries;
  deployments: DeploymentQueries;
  cache: Pick<CacheStore, 'invalidate'>;
  /** Reads the configured pipeline file on every call so edits apply to the next run */
  loadPipeline: () => Promise<PipelineDefinition>;
}

let services: AppServices | null = null;

export function specDefaultsFromConfig(config: Config): PipelineSpecDefaults {
  return {
    policy: {
      releaseBranch: config.pipeline.releaseBranch,
      deployOn: config.pipeline.deployOn,
    },
    rollbackEnabled: config.kubernetes.autoRollback,
  };
}

/**
 * Build the run engine from configuration. Shared by the API server and the CLI.
 */
export function createEngine(config: Config): {
  orchestrator: PipelineOrchestrator;
  deploymentController: DeploymentController;
  cache: CacheStore;
} {
  const cache: CacheStore =
    config.cache.backend === 'sqlite'
      ? new SqliteCacheStore({ capacity: config.cache.capacity })
      : new MemoryCacheStore({ capacity: config.cache.capacity });

  const credentials = new EnvCredentialProvider(config.credentials, config.kubernetes);
  const commandRunner = new ShellCommandRunner();

  const deploymentController = new DeploymentController(
    {
      cluster: new K8sClusterBackend({
        kubeconfig: config.kubernetes.kubeconfig,
        context: config.kubernetes.context,
        dryRun: config.kubernetes.dryRun,
      }),
      credentials,
      archive: new DeploymentRepository(),
    },
    {
      rolloutTimeoutMs: config.kubernetes.rolloutTimeoutMs,
      pollIntervalMs: config.kubernetes.pollIntervalMs,
      clusterCallTimeoutMs: config.kubernetes.requestTimeoutMs,
      serializeDeploys: config.kubernetes.serializeDeploys,
      retry: config.retry,
    }
  );

  const executor = new StageExecutor(
    {
      cache,
      commandRunner,
      buildBackend: new DockerImageBuilder(commandRunner, { binary: config.registry.binary }),
      deployer: deploymentController,
      credentials,
    },
    {
      stageTimeoutMs: config.pipeline.stageTimeoutMs,
      mutableTag: config.registry.mutableTag,
      commitTagLength: config.registry.commitTagLength,
      retry: config.retry,
      rolloutTimeoutMs: config.kubernetes.rolloutTimeoutMs,
      pollIntervalMs: config.kubernetes.pollIntervalMs,
    }
  );

  const orchestrator = new PipelineOrchestrator({
    executor,
    cache,
    archive: new RunRepository(),
  });

  logger.info(
    { cacheBackend: config.cache.backend, dryRun: config.kubernetes.dryRun, serializeDeploys: config.kubernetes.serializeDeploys },
    'Run engine initialized'
  );

  return { orchestrator, deploymentController, cache };
}

/**
 * Initialize all application services
 */
export function initializeServices(config: Config): AppServices {
  if (services) {
    logger.warn('Services already initialized');
    return services;
  }

  const { orchestrator, deploymentController, cache } = createEngine(config);

  // Progress streams to subscribers of run:<id>
  orchestrator.on('run:started', (payload) =>
    broadcastToChannel(`run:${payload.runId}`, { type: 'run:started', payload })
  );
  orchestrator.on('stage:started', ({ runId, serviceId, stage }) =>
    broadcastToChannel(`run:${runId}`, { type: 'stage:started', payload: { runId, serviceId, stage: stage.name } })
  );
  orchestrator.on('stage:completed', (payload) =>
    broadcastToChannel(`run:${payload.runId}`, { type: 'stage:completed', payload })
  );
  orchestrator.on('pipeline:completed', (payload) =>
    broadcastToChannel(`run:${payload.runId}`, { type: 'pipeline:completed', payload })
  );
  orchestrator.on('run:completed', ({ result }) =>
    broadcastToChannel(`run:${result.runId}`, { type: 'run:completed', payload: result })
  );
  deploymentController.on('rollout:transition', (payload) =>
    broadcastToChannel(`deployment:${payload.serviceId}`, { type: 'rollout:transition', payload })
  );

  const pipelinePath = config.pipeline.specFile;
  const defaults = specDefaultsFromConfig(config);

  services = {
    runManager: new RunManager(orchestrator),
    runs: new RunRepository(),
    deployments: new DeploymentRepository(),
    cache,
    loadPipeline: () => loadPipelineSpec(pipelinePath, defaults),
  };

  logger.info({ pipeline: pipelinePath }, 'Services initialized');
  return services;
}

/**
 * Cancel active runs and release services
 */
export async function shutdownServices(): Promise<void> {
  if (!services) {
    return;
  }

  logger.info('Shutting down services...');
  await services.runManager.shutdown();

  services = null;
  logger.info('Services shutdown complete');
}
