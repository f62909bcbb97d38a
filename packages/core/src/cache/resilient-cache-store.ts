/**
 * Cache store wrapper that degrades to a miss when the backing store fails.
 * A fingerprint collision is never degraded: it always reaches the caller.
 */

import { createChildLogger, FingerprintCollisionError } from '@tidewater/shared';
import type { CacheArtifact, CacheStore } from '@tidewater/shared';

export class ResilientCacheStore implements CacheStore {
  private logger = createChildLogger({ component: 'ResilientCacheStore' });

  constructor(private readonly inner: CacheStore) {}

  async get(key: string, runId?: string): Promise<CacheArtifact | undefined> {
    try {
      return await this.inner.get(key, runId);
    } catch (error) {
      this.logger.warn(
        { key, error: error instanceof Error ? error.message : String(error) },
        'Cache read failed, treating as miss'
      );
      return undefined;
    }
  }

  async put(key: string, artifact: CacheArtifact, runId?: string): Promise<void> {
    try {
      await this.inner.put(key, artifact, runId);
    } catch (error) {
      if (error instanceof FingerprintCollisionError) {
        throw error;
      }
      this.logger.warn(
        { key, error: error instanceof Error ? error.message : String(error) },
        'Cache write failed, result not cached'
      );
    }
  }

  async invalidate(prefix: string): Promise<number> {
    return this.inner.invalidate(prefix);
  }

  async releaseLeases(runId: string): Promise<void> {
    try {
      await this.inner.releaseLeases(runId);
    } catch (error) {
      this.logger.warn(
        { runId, error: error instanceof Error ? error.message : String(error) },
        'Failed to release cache leases'
      );
    }
  }
}
