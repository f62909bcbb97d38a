/**
 * Pipeline domain types: services, stages, runs and their results
 */

import type { DeploymentResult, DeployTarget } from './deployment.js';

// ===========================================
// Stages
// ===========================================

export const STAGE_KINDS = {
  TEST: 'test',
  BUILD: 'build',
  PUSH: 'push',
  DEPLOY: 'deploy',
} as const;

export type StageKind = (typeof STAGE_KINDS)[keyof typeof STAGE_KINDS];

export const STAGE_STATUSES = {
  PASSED: 'passed',
  FAILED: 'failed',
  CACHED: 'cached',
  SKIPPED: 'skipped',
} as const;

export type StageStatus = (typeof STAGE_STATUSES)[keyof typeof STAGE_STATUSES];

/**
 * A single step of a service pipeline
 */
export interface StageDefinition {
  /** Unique within its service */
  name: string;
  kind: StageKind;
  /** Shell command for command-driven stages (test) */
  command?: string;
  /** Files or directories, relative to the service source dir, whose content feeds the fingerprint */
  inputs: string[];
  /** Declared outputs (test report path, image reference name) */
  outputs: string[];
  /** Per-stage timeout in ms (falls back to pipeline.stageTimeoutMs) */
  timeoutMs?: number;
  env?: Record<string, string>;
}

/**
 * Container build context for a service
 */
export interface BuildContextSpec {
  /** Build context directory, relative to the service source dir */
  contextDir: string;
  /** Dockerfile path, relative to the context dir */
  dockerfile: string;
  /** Repository part of the image reference, e.g. "registry.example.com/shop/api" */
  imageRepository: string;
  buildArgs?: Record<string, string>;
}

export interface ServiceDeployConfig {
  target: DeployTarget;
  /** Deployment descriptor template text containing the image placeholder */
  descriptorTemplate: string;
  rollbackEnabled: boolean;
  rolloutTimeoutMs?: number;
}

export interface ServiceDefinition {
  id: string;
  /** Absolute or working-directory relative source location */
  sourceDir: string;
  build: BuildContextSpec;
  /** Declared stage order */
  stages: StageDefinition[];
  deploy?: ServiceDeployConfig;
}

// ===========================================
// Triggers
// ===========================================

export type TriggerEvent = 'push' | 'pull_request';

export interface TriggerContext {
  branch: string;
  commit: string;
  event: TriggerEvent;
}

export interface TriggerPolicy {
  /** Only this branch may deploy */
  releaseBranch: string;
  /** Events that may deploy when the branch matches */
  deployOn: TriggerEvent[];
}

/**
 * Everything needed to start one run
 */
export interface RunSpec {
  /** Generated when absent */
  runId?: string;
  services: ServiceDefinition[];
  trigger: TriggerContext;
  policy: TriggerPolicy;
}

// ===========================================
// Results
// ===========================================

/**
 * What a stage produced; this is also what the cache stores
 */
export interface StageOutput {
  /** Image reference produced by build or published by push */
  imageRef?: string;
  /** Tags published by push */
  tags?: string[];
  /** Test report or command output summary */
  report?: string;
  deployment?: DeploymentResult;
}

/**
 * How a pipeline failed. Reported failures are verdicts about the code
 * (tests, builds, rollouts); execution errors are infrastructure or engine faults.
 */
export type FailureKind = 'reported' | 'execution';

export interface StageError {
  code: string;
  name: string;
  message: string;
  kind: FailureKind;
}

export interface StageResult {
  stage: string;
  kind: StageKind;
  status: StageStatus;
  fingerprint?: string;
  output?: StageOutput;
  logs: string[];
  error?: StageError;
  attempts: number;
  durationMs: number;
}

export type PipelineStatus = 'success' | 'failed' | 'cancelled' | 'not-started';

export interface PipelineResult {
  serviceId: string;
  stageResults: StageResult[];
  finalStatus: PipelineStatus;
  failureKind?: FailureKind;
  durationMs: number;
}

export type RunVerdict = 'success' | 'partial-failure' | 'failure';

export interface RunResult {
  runId: string;
  trigger: TriggerContext;
  verdict: RunVerdict;
  pipelineResults: PipelineResult[];
  /** Whether deploy stages were allowed by the trigger policy */
  deployEnabled: boolean;
  cancelled: boolean;
  /** Set when an engine invariant was violated and the run was aborted */
  fatalError?: StageError;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

/**
 * Persists finished runs
 */
export interface RunArchive {
  save(result: RunResult): Promise<void>;
}
