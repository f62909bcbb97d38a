/**
 * Test doubles for the API services
 */
import { vi } from 'vitest';
import type { PipelineDefinition, RunOptions } from '@tidewater/core';
import type { RunResult, RunSpec } from '@tidewater/shared';
import type { DeploymentRecord } from '@tidewater/database';
import { RunManager } from '../services/run-manager.js';
import type { AppServices, DeploymentQueries, RunQueries } from '../services/index.js';

export function makeRunResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    runId: 'run-1',
    trigger: { branch: 'main', commit: 'abc123', event: 'push' },
    verdict: 'success',
    pipelineResults: [
      { serviceId: 'api', stageResults: [], finalStatus: 'success', durationMs: 10 },
    ],
    deployEnabled: true,
    cancelled: false,
    startedAt: new Date('2024-05-01T10:00:00.000Z'),
    completedAt: new Date('2024-05-01T10:00:05.000Z'),
    durationMs: 5000,
    ...overrides,
  };
}

export const PIPELINE: PipelineDefinition = {
  services: [
    {
      id: 'api',
      sourceDir: '/srv/api',
      build: { contextDir: '.', dockerfile: 'Dockerfile', imageRepository: 'registry.example.com/shop/api' },
      stages: [{ name: 'unit', kind: 'test', command: 'npm test', inputs: [], outputs: [] }],
    },
  ],
  policy: { releaseBranch: 'main', deployOn: ['push'] },
};

/**
 * Launcher whose runs stay in flight until aborted or finished by the test
 */
export function createMockLauncher() {
  const finishers = new Map<string, (result: RunResult) => void>();
  const signals = new Map<string, AbortSignal>();

  const run = vi.fn((spec: RunSpec, options?: RunOptions) => {
    const runId = spec.runId ?? 'unknown';
    return new Promise<RunResult>((resolve) => {
      finishers.set(runId, resolve);
      if (options?.signal) {
        signals.set(runId, options.signal);
        options.signal.addEventListener('abort', () =>
          resolve(makeRunResult({ runId, verdict: 'failure', cancelled: true }))
        );
      }
    });
  });

  return {
    run,
    signal: (runId: string) => signals.get(runId),
    finish: (runId: string, result: RunResult) => finishers.get(runId)?.(result),
  };
}

export function createMockRunQueries(runs: RunResult[] = []) {
  return {
    findById: vi.fn(async (id: string) => runs.find((run) => run.runId === id) ?? null),
    list: vi.fn(async (_options?: Parameters<RunQueries['list']>[0]) => runs),
  } satisfies RunQueries;
}

export function createMockDeploymentQueries(records: DeploymentRecord[] = []) {
  return {
    findById: vi.fn(async (id: string) => records.find((record) => record.deploymentId === id) ?? null),
    findByRun: vi.fn(async (runId: string) => records.filter((record) => record.runId === runId)),
    findByService: vi.fn(async (serviceId: string, _limit?: number) =>
      records.filter((record) => record.serviceId === serviceId)
    ),
  } satisfies DeploymentQueries;
}

export function createMockServices(overrides: Partial<AppServices> = {}) {
  const launcher = createMockLauncher();
  const runs = createMockRunQueries();
  const deployments = createMockDeploymentQueries();
  const cache = { invalidate: vi.fn(async (_prefix: string) => 0) };
  const loadPipeline = vi.fn(async () => PIPELINE);

  const services: AppServices = {
    runManager: new RunManager(launcher),
    runs,
    deployments,
    cache,
    loadPipeline,
    ...overrides,
  };

  return { services, launcher, runs, deployments, cache, loadPipeline };
}
