/**
 * ResilientCacheStore Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { FingerprintCollisionError } from '@tidewater/shared';
import type { CacheArtifact, CacheStore } from '@tidewater/shared';
import { ResilientCacheStore } from './resilient-cache-store.js';

const artifact: CacheArtifact = {
  kind: 'report',
  stageKind: 'test',
  ref: 'report',
  output: { report: 'ok' },
};

const createFailingStore = (error: Error): CacheStore => ({
  get: vi.fn().mockRejectedValue(error),
  put: vi.fn().mockRejectedValue(error),
  invalidate: vi.fn().mockResolvedValue(0),
  releaseLeases: vi.fn().mockRejectedValue(error),
});

describe('ResilientCacheStore', () => {
  it('should treat a failing read as a miss', async () => {
    const store = new ResilientCacheStore(createFailingStore(new Error('disk I/O error')));

    await expect(store.get('api/unit/1')).resolves.toBeUndefined();
  });

  it('should swallow a failing write', async () => {
    const store = new ResilientCacheStore(createFailingStore(new Error('disk I/O error')));

    await expect(store.put('api/unit/1', artifact)).resolves.toBeUndefined();
  });

  it('should propagate fingerprint collisions', async () => {
    const store = new ResilientCacheStore(createFailingStore(new FingerprintCollisionError('api/unit/1')));

    await expect(store.put('api/unit/1', artifact)).rejects.toBeInstanceOf(FingerprintCollisionError);
  });

  it('should pass successful reads through', async () => {
    const inner: CacheStore = {
      get: vi.fn().mockResolvedValue(artifact),
      put: vi.fn().mockResolvedValue(undefined),
      invalidate: vi.fn().mockResolvedValue(3),
      releaseLeases: vi.fn().mockResolvedValue(undefined),
    };
    const store = new ResilientCacheStore(inner);

    expect(await store.get('api/unit/1', 'run-1')).toBe(artifact);
    expect(inner.get).toHaveBeenCalledWith('api/unit/1', 'run-1');
    expect(await store.invalidate('api/')).toBe(3);
  });
});
