/**
 * Stage fingerprints
 *
 * A fingerprint is a SHA-256 digest over the stage kind, the owning service,
 * the content of every declared input, the stage definition and the
 * upstream stage's fingerprint. It never includes time or run identity, so
 * identical inputs produce identical keys across runs and branches.
 */

import { createHash } from 'node:crypto';
import { readFile, readdir, stat } from 'node:fs/promises';
import { join, relative, resolve, sep } from 'node:path';
import type { StageDefinition } from '@tidewater/shared';

/** Directories never walked when an input names a directory */
const IGNORED_DIRECTORIES = new Set(['.git', 'node_modules']);

const MISSING_INPUT = 'missing';

export interface FingerprintInput {
  serviceId: string;
  stage: StageDefinition;
  /** Directory declared inputs are resolved against */
  sourceDir: string;
  /** Fingerprint of the stage whose output this stage consumes */
  upstreamKey?: string;
  /** Further definition material that changes what the stage produces */
  extra?: Record<string, unknown>;
}

export interface InputHash {
  path: string;
  hash: string;
}

export interface Fingerprint {
  /** Cache key: `<serviceId>/<stage>/<digest>` */
  key: string;
  digest: string;
  inputs: InputHash[];
}

/**
 * JSON with object keys sorted at every level, so logically equal values
 * serialize identically
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => a.localeCompare(b))) {
      if (entry !== undefined) {
        sorted[key] = sortKeys(entry);
      }
    }
    return sorted;
  }
  return value;
}

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Hash of the parts of a stage definition that affect its output.
 * Timeouts are excluded: they change when a stage gives up, not what it makes.
 */
export function hashStageDefinition(stage: StageDefinition): string {
  return sha256(
    canonicalize({
      name: stage.name,
      kind: stage.kind,
      command: stage.command,
      inputs: [...stage.inputs].sort(),
      outputs: [...stage.outputs].sort(),
      env: stage.env,
    })
  );
}

/**
 * Content hashes of every file reachable from the declared inputs, sorted by
 * path relative to sourceDir. A missing input hashes to a fixed marker so that
 * creating it later changes the fingerprint.
 */
export async function hashInputs(sourceDir: string, inputs: string[]): Promise<InputHash[]> {
  const root = resolve(sourceDir);
  const hashes = new Map<string, string>();

  for (const input of inputs) {
    await collectHashes(root, resolve(root, input), hashes);
  }

  return [...hashes.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, hash]) => ({ path, hash }));
}

async function collectHashes(root: string, target: string, hashes: Map<string, string>): Promise<void> {
  const relativePath = toPosix(relative(root, target));

  let info;
  try {
    info = await stat(target);
  } catch (error) {
    if (isNotFound(error)) {
      hashes.set(relativePath, MISSING_INPUT);
      return;
    }
    throw error;
  }

  if (info.isDirectory()) {
    const entries = await readdir(target, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory() && IGNORED_DIRECTORIES.has(entry.name)) {
        continue;
      }
      await collectHashes(root, join(target, entry.name), hashes);
    }
    return;
  }

  if (info.isFile()) {
    hashes.set(relativePath, sha256(await readFile(target)));
  }
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Compute the fingerprint for one stage of one service
 */
export async function computeFingerprint(input: FingerprintInput): Promise<Fingerprint> {
  const inputs = await hashInputs(input.sourceDir, input.stage.inputs);

  const digest = sha256(
    canonicalize({
      kind: input.stage.kind,
      serviceId: input.serviceId,
      definition: hashStageDefinition(input.stage),
      inputs,
      upstream: input.upstreamKey ?? null,
      extra: input.extra ?? null,
    })
  );

  return {
    key: `${input.serviceId}/${input.stage.name}/${digest}`,
    digest,
    inputs,
  };
}

/**
 * Prefix matching on whole key segments: `api` covers `api` and `api/...`
 * but not `api-gateway/...`
 */
export function segmentPrefix(prefix: string): string {
  return prefix.endsWith('/') ? prefix : `${prefix}/`;
}

export function isUnderPrefix(key: string, prefix: string): boolean {
  return key === prefix || key.startsWith(segmentPrefix(prefix));
}
