/**
 * Stage Executor Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FingerprintCollisionError, RegistryError, TransientInfraError } from '@tidewater/shared';
import type { CacheStore, ServiceDefinition, StageDefinition, StageResult } from '@tidewater/shared';
import { MemoryCacheStore } from '../cache/memory-cache-store.js';
import { DeploymentController } from '../deployment/deployment-controller.js';
import {
  createService,
  createStages,
  FakeBuildBackend,
  FakeClusterBackend,
  FakeCommandRunner,
} from '../__tests__/fakes.js';
import { isCollision, StageExecutor } from './stage-executor.js';
import type { StageContext } from './types.js';

const TRIGGER = { branch: 'main', commit: 'abc123def4567890', event: 'push' } as const;
const PREVIOUS_IMAGE = 'registry.example.com/shop/api:previous1';
const API_TARGET = { cluster: 'prod', namespace: 'shop', deployment: 'api' };

const stageOf = (service: ServiceDefinition, kind: StageDefinition['kind']): StageDefinition => {
  const stage = service.stages.find((s) => s.kind === kind);
  if (!stage) throw new Error(`no ${kind} stage`);
  return stage;
};

describe('StageExecutor', () => {
  let sourceDir: string;
  let service: ServiceDefinition;
  let cache: MemoryCacheStore;
  let runner: FakeCommandRunner;
  let builder: FakeBuildBackend;
  let cluster: FakeClusterBackend;
  let executor: StageExecutor;

  const context = (previous: StageResult[] = []): StageContext => ({
    runId: 'run-1',
    service,
    trigger: TRIGGER,
    previous,
  });

  const createExecutor = (store: CacheStore = cache): StageExecutor =>
    new StageExecutor(
      {
        cache: store,
        commandRunner: runner,
        buildBackend: builder,
        deployer: new DeploymentController(
          { cluster },
          { rolloutTimeoutMs: 30, pollIntervalMs: 5, retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 } }
        ),
      },
      {
        retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 },
        rolloutTimeoutMs: 30,
        pollIntervalMs: 5,
      }
    );

  beforeEach(async () => {
    sourceDir = await mkdtemp(join(tmpdir(), 'tidewater-exec-'));
    await mkdir(join(sourceDir, 'src'));
    await writeFile(join(sourceDir, 'src', 'index.ts'), 'export const ok = true;\n');
    await writeFile(join(sourceDir, 'Dockerfile'), 'FROM node:20-alpine\nCOPY src ./src\n');

    service = createService('api', sourceDir);
    cache = new MemoryCacheStore({ capacity: 100 });
    runner = new FakeCommandRunner(() => ({ stdout: '3 passed\n' }));
    builder = new FakeBuildBackend();
    cluster = new FakeClusterBackend({ 'prod/shop/api': PREVIOUS_IMAGE });
    executor = createExecutor();
  });

  afterEach(async () => {
    await rm(sourceDir, { recursive: true, force: true });
  });

  // ===========================================
  // Test stage
  // ===========================================

  describe('test stage', () => {
    it('should run the command through a shell in the source directory', async () => {
      const result = await executor.run(stageOf(service, 'test'), context());

      expect(result.status).toBe('passed');
      expect(result.fingerprint).toMatch(/^api\/unit\/[0-9a-f]{64}$/);
      expect(result.logs).toEqual(['3 passed']);
      expect(runner.calls).toHaveLength(1);
      expect(runner.calls[0]?.command).toBe('npm test');
      expect(runner.calls[0]?.options).toMatchObject({ cwd: sourceDir, shell: true, timeoutMs: 600000 });
    });

    it('should report cached on an unchanged rerun without running the command', async () => {
      const first = await executor.run(stageOf(service, 'test'), context());
      const second = await executor.run(stageOf(service, 'test'), context());

      expect(second.status).toBe('cached');
      expect(second.attempts).toBe(0);
      expect(second.fingerprint).toBe(first.fingerprint);
      expect(second.output).toEqual({ report: 'passed' });
      expect(runner.calls).toHaveLength(1);
    });

    it('should miss the cache after an input file changes', async () => {
      const first = await executor.run(stageOf(service, 'test'), context());
      await writeFile(join(sourceDir, 'src', 'index.ts'), 'export const ok = false;\n');
      const second = await executor.run(stageOf(service, 'test'), context());

      expect(second.status).toBe('passed');
      expect(second.fingerprint).not.toBe(first.fingerprint);
      expect(runner.calls).toHaveLength(2);
    });

    it('should report a non-zero exit as a test failure', async () => {
      runner.respondWith(() => ({ exitCode: 1, stderr: 'expected 1 to be 2\n' }));

      const result = await executor.run(stageOf(service, 'test'), context());

      expect(result.status).toBe('failed');
      expect(result.error).toEqual({
        code: 'E2001',
        name: 'TestFailureError',
        message: 'Test command exited with code 1',
        kind: 'reported',
      });
      expect(result.logs).toEqual(['expected 1 to be 2']);
    });

    it('should not cache failures', async () => {
      runner.respondWith(() => ({ exitCode: 1 }));
      await executor.run(stageOf(service, 'test'), context());
      runner.respondWith(() => ({ exitCode: 0 }));
      const second = await executor.run(stageOf(service, 'test'), context());

      expect(second.status).toBe('passed');
      expect(runner.calls).toHaveLength(2);
    });

    it('should report a timeout as a test failure', async () => {
      runner.respondWith(() => ({ exitCode: null, timedOut: true }));

      const result = await executor.run({ ...stageOf(service, 'test'), timeoutMs: 50 }, context());

      expect(result.status).toBe('failed');
      expect(result.error?.code).toBe('E2001');
      expect(result.error?.message).toBe('Test command timed out after 50ms');
    });

    it('should degrade to a miss when the cache store fails', async () => {
      const broken: CacheStore = {
        get: vi.fn().mockRejectedValue(new Error('database is locked')),
        put: vi.fn().mockRejectedValue(new Error('database is locked')),
        invalidate: vi.fn().mockResolvedValue(0),
        releaseLeases: vi.fn().mockResolvedValue(undefined),
      };

      const result = await createExecutor(broken).run(stageOf(service, 'test'), context());

      expect(result.status).toBe('passed');
    });
  });

  // ===========================================
  // Build stage
  // ===========================================

  describe('build stage', () => {
    it('should build a content-addressed image from the build context', async () => {
      const result = await executor.run(stageOf(service, 'build'), context());

      expect(result.status).toBe('passed');
      expect(result.output?.imageRef).toMatch(/^registry\.example\.com\/shop\/api:build-[0-9a-f]{12}$/);
      expect(builder.builds[0]).toMatchObject({
        serviceId: 'api',
        contextDir: sourceDir,
        dockerfile: 'Dockerfile',
        imageRepository: 'registry.example.com/shop/api',
      });
    });

    it('should reuse the cached image on rerun', async () => {
      const first = await executor.run(stageOf(service, 'build'), context());
      const second = await executor.run(stageOf(service, 'build'), context());

      expect(second.status).toBe('cached');
      expect(second.output?.imageRef).toBe(first.output?.imageRef);
      expect(builder.builds).toHaveLength(1);
    });

    it('should rebuild when the cached image is gone from the local store', async () => {
      const first = await executor.run(stageOf(service, 'build'), context());
      builder.localImages.clear();

      const second = await executor.run(stageOf(service, 'build'), context());
      const third = await executor.run(stageOf(service, 'build'), context());

      expect(second.status).toBe('passed');
      expect(second.output?.imageRef).toBe(first.output?.imageRef);
      expect(third.status).toBe('cached');
      expect(builder.builds).toHaveLength(2);
    });

    it('should report a build failure', async () => {
      builder.failingServices.add('api');

      const result = await executor.run(stageOf(service, 'build'), context());

      expect(result.status).toBe('failed');
      expect(result.error).toMatchObject({ code: 'E2002', message: 'COPY failed: file not found', kind: 'reported' });
    });
  });

  // ===========================================
  // Push stage
  // ===========================================

  describe('push stage', () => {
    const built = async (): Promise<StageResult> => executor.run(stageOf(service, 'build'), context());

    it('should publish the commit tag and the mutable tag', async () => {
      const build = await built();
      const result = await executor.run(stageOf(service, 'push'), context([build]));

      expect(result.status).toBe('passed');
      expect(result.output).toEqual({
        imageRef: 'registry.example.com/shop/api:abc123def456',
        tags: ['registry.example.com/shop/api:abc123def456', 'registry.example.com/shop/api:latest'],
      });
      expect(builder.pushes[0]?.imageRef).toBe(build.output?.imageRef);
    });

    it('should retry transient registry errors', async () => {
      const build = await built();
      builder.pushErrors.push(new TransientInfraError('503 Service Unavailable'), new TransientInfraError('i/o timeout'));

      const result = await executor.run(stageOf(service, 'push'), context([build]));

      expect(result.status).toBe('passed');
      expect(result.attempts).toBe(3);
      expect(builder.pushes).toHaveLength(3);
    });

    it('should not retry a registry rejection', async () => {
      const build = await built();
      builder.pushErrors.push(new RegistryError('denied: requested access to the resource is denied'));

      const result = await executor.run(stageOf(service, 'push'), context([build]));

      expect(result.status).toBe('failed');
      expect(result.error).toMatchObject({ code: 'E3002', kind: 'execution' });
      expect(builder.pushes).toHaveLength(1);
    });

    it('should fail when no earlier stage produced an image', async () => {
      const result = await executor.run(stageOf(service, 'push'), context());

      expect(result.status).toBe('failed');
      expect(result.error?.code).toBe('E1001');
    });

    it('should push again for a new commit', async () => {
      const build = await built();
      await executor.run(stageOf(service, 'push'), context([build]));
      const next = await executor.run(stageOf(service, 'push'), {
        ...context([build]),
        trigger: { ...TRIGGER, commit: 'fedcba9876543210' },
      });

      expect(next.status).toBe('passed');
      expect(next.output?.imageRef).toBe('registry.example.com/shop/api:fedcba987654');
    });
  });

  // ===========================================
  // Deploy stage
  // ===========================================

  describe('deploy stage', () => {
    const published = (imageRef = 'registry.example.com/shop/api:abc123def456'): StageResult => ({
      stage: 'publish',
      kind: 'push',
      status: 'passed',
      output: { imageRef },
      logs: [],
      attempts: 1,
      durationMs: 1,
    });

    it('should roll out the published image and never cache it', async () => {
      const first = await executor.run(stageOf(service, 'deploy'), context([published()]));
      const second = await executor.run(stageOf(service, 'deploy'), context([published()]));

      expect(first.status).toBe('passed');
      expect(second.status).toBe('passed');
      expect(first.fingerprint).toBeUndefined();
      expect(cluster.applied).toHaveLength(2);
      expect(cluster.runningImage(API_TARGET)).toBe('registry.example.com/shop/api:abc123def456');
    });

    it('should report a rollout timeout and keep the previous image running', async () => {
      cluster.stuckImages.add('registry.example.com/shop/api:abc123def456');

      const result = await executor.run(stageOf(service, 'deploy'), context([published()]));

      expect(result.status).toBe('failed');
      expect(result.error).toMatchObject({ code: 'E4001', kind: 'reported' });
      expect(result.output?.deployment).toMatchObject({ state: 'rolled-back', rolledBack: true });
      expect(cluster.runningImage(API_TARGET)).toBe(PREVIOUS_IMAGE);
    });

    it('should fail when the service has no deploy target', async () => {
      service = createService('api', sourceDir, { deploy: undefined, stages: createStages() });

      const result = await executor.run(stageOf(service, 'deploy'), context([published()]));

      expect(result.status).toBe('failed');
      expect(result.error?.code).toBe('E1001');
    });
  });

  // ===========================================
  // Collisions
  // ===========================================

  describe('fingerprint collisions', () => {
    it('should fail the stage with the collision error', async () => {
      const colliding: CacheStore = {
        get: vi.fn().mockResolvedValue(undefined),
        put: vi.fn().mockRejectedValue(new FingerprintCollisionError('api/unit/abc')),
        invalidate: vi.fn().mockResolvedValue(0),
        releaseLeases: vi.fn().mockResolvedValue(undefined),
      };

      const result = await createExecutor(colliding).run(stageOf(service, 'test'), context());

      expect(result.status).toBe('failed');
      expect(result.error).toMatchObject({ code: 'E5001', name: 'FingerprintCollisionError', kind: 'execution' });
      expect(isCollision(result)).toBe(true);
    });
  });
});
