/**
 * SQLite-backed cache store
 * Persists stage outputs across process restarts. Leases live in memory:
 * they only protect entries read or written by runs of this process.
 */

import { asc, count, eq, sql } from 'drizzle-orm';
import { canonicalize, segmentPrefix } from '@tidewater/core';
import { createChildLogger, FingerprintCollisionError } from '@tidewater/shared';
import type { CacheArtifact, CacheStore } from '@tidewater/shared';
import { getDatabase } from './connection.js';
import { parseColumn, stageOutputSchema } from './repositories/records.js';
import { cacheEntries } from './schema.js';
import type { CacheEntryRow } from './schema.js';

export interface SqliteCacheStoreConfig {
  /** Maximum number of entries; least recently used unleased entries are evicted beyond it */
  capacity: number;
}

export const DEFAULT_SQLITE_CACHE_CONFIG: SqliteCacheStoreConfig = {
  capacity: 1000,
};

export class SqliteCacheStore implements CacheStore {
  private config: SqliteCacheStoreConfig;
  private leases = new Map<string, Set<string>>();
  private accessSeq: number | undefined;
  private logger = createChildLogger({ component: 'SqliteCacheStore' });

  constructor(config: Partial<SqliteCacheStoreConfig> = {}) {
    this.config = { ...DEFAULT_SQLITE_CACHE_CONFIG, ...config };
  }

  async get(key: string, runId?: string): Promise<CacheArtifact | undefined> {
    const db = getDatabase();

    const row = db.transaction((tx) => {
      const found = tx.select().from(cacheEntries).where(eq(cacheEntries.key, key)).get();
      if (found) {
        tx.update(cacheEntries)
          .set({ accessSeq: this.nextSeq(), lastAccessedAt: new Date() })
          .where(eq(cacheEntries.key, key))
          .run();
      }
      return found;
    });

    if (!row) {
      return undefined;
    }

    this.lease(key, runId);
    return this.toArtifact(row);
  }

  async put(key: string, artifact: CacheArtifact, runId?: string): Promise<void> {
    const db = getDatabase();

    const collided = db.transaction((tx) => {
      const existing = tx.select().from(cacheEntries).where(eq(cacheEntries.key, key)).get();
      const now = new Date();

      if (existing) {
        if (canonicalize(this.toArtifact(existing)) !== canonicalize(artifact)) {
          return true;
        }
        tx.update(cacheEntries)
          .set({ accessSeq: this.nextSeq(), lastAccessedAt: now })
          .where(eq(cacheEntries.key, key))
          .run();
        return false;
      }

      tx.insert(cacheEntries)
        .values({
          key,
          kind: artifact.kind,
          stageKind: artifact.stageKind,
          ref: artifact.ref,
          output: JSON.stringify(artifact.output),
          accessSeq: this.nextSeq(),
          createdAt: now,
          lastAccessedAt: now,
        })
        .run();
      return false;
    });

    if (collided) {
      this.logger.error({ key }, 'Fingerprint collision');
      throw new FingerprintCollisionError(key, { runId });
    }

    this.lease(key, runId);
    this.evict();
  }

  async invalidate(prefix: string): Promise<number> {
    const db = getDatabase();
    const removed = db
      .delete(cacheEntries)
      .where(sql`${cacheEntries.key} = ${prefix} or instr(${cacheEntries.key}, ${segmentPrefix(prefix)}) = 1`)
      .returning({ key: cacheEntries.key })
      .all();

    this.logger.info({ prefix, removed: removed.length }, 'Cache entries invalidated');
    return removed.length;
  }

  async releaseLeases(runId: string): Promise<void> {
    if (this.leases.delete(runId)) {
      this.evict();
    }
  }

  /** Number of stored entries */
  size(): number {
    const db = getDatabase();
    const result = db.select({ total: count() }).from(cacheEntries).get();
    return result?.total ?? 0;
  }

  has(key: string): boolean {
    const db = getDatabase();
    return db.select({ key: cacheEntries.key }).from(cacheEntries).where(eq(cacheEntries.key, key)).get() !== undefined;
  }

  private nextSeq(): number {
    if (this.accessSeq === undefined) {
      const db = getDatabase();
      const result = db
        .select({ max: sql<number | null>`max(${cacheEntries.accessSeq})` })
        .from(cacheEntries)
        .get();
      this.accessSeq = result?.max ?? 0;
    }
    this.accessSeq += 1;
    return this.accessSeq;
  }

  private toArtifact(row: CacheEntryRow): CacheArtifact {
    return {
      kind: row.kind,
      stageKind: row.stageKind,
      ref: row.ref,
      output: parseColumn(stageOutputSchema, 'cache_entries.output', row.output),
    };
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
    let size = this.size();
    if (size <= this.config.capacity) {
      return;
    }

    const db = getDatabase();
    const candidates = db
      .select({ key: cacheEntries.key })
      .from(cacheEntries)
      .orderBy(asc(cacheEntries.accessSeq))
      .all();

    for (const { key } of candidates) {
      if (size <= this.config.capacity) {
        break;
      }
      if (this.isLeased(key)) {
        continue;
      }
      db.delete(cacheEntries).where(eq(cacheEntries.key, key)).run();
      size--;
      this.logger.debug({ key }, 'Evicted cache entry');
    }

    if (size > this.config.capacity) {
      this.logger.warn({ size, capacity: this.config.capacity }, 'Cache over capacity with all entries leased');
    }
  }
}
