/**
 * Cache store types
 */

import type { StageKind, StageOutput } from './pipeline.js';

export type ArtifactKind = 'image' | 'report' | 'artifact';

/**
 * Stored output of a stage
 */
export interface CacheArtifact {
  kind: ArtifactKind;
  stageKind: StageKind;
  /** Reference to the stored output (image reference, report digest, ...) */
  ref: string;
  output: StageOutput;
}

export interface CacheEntry {
  key: string;
  artifact: CacheArtifact;
  createdAt: Date;
  lastAccessedAt: Date;
}

/**
 * Content-addressed store shared by every pipeline of every run.
 *
 * Reads and writes made with a runId place a lease on the entry; leased
 * entries are not evicted until the run releases its leases.
 */
export interface CacheStore {
  get(key: string, runId?: string): Promise<CacheArtifact | undefined>;
  /** Throws FingerprintCollisionError when the key holds a different artifact */
  put(key: string, artifact: CacheArtifact, runId?: string): Promise<void>;
  /** Removes every entry under prefix, matched on whole `/` segments; returns the count removed */
  invalidate(prefix: string): Promise<number>;
  releaseLeases(runId: string): Promise<void>;
}
