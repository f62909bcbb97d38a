/**
 * In-process LRU cache store
 */

import { createChildLogger, FingerprintCollisionError } from '@tidewater/shared';
import type { CacheArtifact, CacheEntry, CacheStore } from '@tidewater/shared';
import { canonicalize, isUnderPrefix } from './fingerprint.js';
import type { MemoryCacheStoreConfig } from './types.js';
import { DEFAULT_MEMORY_CACHE_CONFIG } from './types.js';

export class MemoryCacheStore implements CacheStore {
  private config: MemoryCacheStoreConfig;
  // Map iteration order doubles as recency order: oldest first
  private entries = new Map<string, CacheEntry>();
  private leases = new Map<string, Set<string>>();
  private logger = createChildLogger({ component: 'MemoryCacheStore' });

  constructor(config: Partial<MemoryCacheStoreConfig> = {}) {
    this.config = { ...DEFAULT_MEMORY_CACHE_CONFIG, ...config };
  }

  async get(key: string, runId?: string): Promise<CacheArtifact | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    entry.lastAccessedAt = new Date();
    this.touch(entry);
    this.lease(key, runId);
    return entry.artifact;
  }

  async put(key: string, artifact: CacheArtifact, runId?: string): Promise<void> {
    const existing = this.entries.get(key);

    if (existing) {
      if (canonicalize(existing.artifact) !== canonicalize(artifact)) {
        this.logger.error({ key }, 'Fingerprint collision');
        throw new FingerprintCollisionError(key, { runId });
      }
      existing.lastAccessedAt = new Date();
      this.touch(existing);
      this.lease(key, runId);
      return;
    }

    const now = new Date();
    this.entries.set(key, { key, artifact, createdAt: now, lastAccessedAt: now });
    this.lease(key, runId);
    this.evict();
  }

  async invalidate(prefix: string): Promise<number> {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (isUnderPrefix(key, prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }

    this.logger.info({ prefix, removed }, 'Cache entries invalidated');
    return removed;
  }

  async releaseLeases(runId: string): Promise<void> {
    if (this.leases.delete(runId)) {
      this.evict();
    }
  }

  /** Number of stored entries */
  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  private touch(entry: CacheEntry): void {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
  }

  private lease(key: string, runId?: string): void {
    if (!runId) {
      return;
    }
    const keys = this.leases.get(runId) ?? new Set<string>();
    keys.add(key);
    this.leases.set(runId, keys);
  }

  private isLeased(key: string): boolean {
    for (const keys of this.leases.values()) {
      if (keys.has(key)) {
        return true;
      }
    }
    return false;
  }

  private evict(): void {
    if (this.entries.size <= this.config.capacity) {
      return;
    }

    for (const key of [...this.entries.keys()]) {
      if (this.entries.size <= this.config.capacity) {
        break;
      }
      if (this.isLeased(key)) {
        continue;
      }
      this.entries.delete(key);
      this.logger.debug({ key }, 'Evicted cache entry');
    }

    if (this.entries.size > this.config.capacity) {
      // Every remaining entry is leased by a live run; the store shrinks once they release
      this.logger.warn(
        { size: this.entries.size, capacity: this.config.capacity },
        'Cache over capacity with all entries leased'
      );
    }
  }
}
