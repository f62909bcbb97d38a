/**
 * Stage executor types
 */

import type {
  DeploymentResult,
  DeploymentSpec,
  ServiceDefinition,
  StageDefinition,
  StageOutput,
  StageResult,
  TidewaterError,
  TriggerContext,
} from '@tidewater/shared';

// ===========================================
// Command runner
// ===========================================

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
  /** Kill the process after this many ms */
  timeoutMs?: number;
  /** Written to stdin, then stdin is closed */
  input?: string;
  /** Run through a shell; args must then be empty */
  shell?: boolean;
}

export interface CommandResult {
  /** null when the process was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Runs external processes for command-driven stages and the container build backend
 */
export interface CommandRunner {
  run(command: string, args: string[], options: CommandOptions): Promise<CommandResult>;
}

// ===========================================
// Retry
// ===========================================

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added or removed at random */
  jitterFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 15000,
  jitterFactor: 0.2,
};

// ===========================================
// Stage execution
// ===========================================

/**
 * Hands deploy stages to the deployment controller
 */
export interface Deployer {
  deploy(spec: DeploymentSpec): Promise<DeploymentResult>;
}

export interface StageContext {
  runId: string;
  service: ServiceDefinition;
  trigger: TriggerContext;
  /** Results of the stages that already ran in this pipeline, in order */
  previous: StageResult[];
}

/**
 * Runs one stage; failures are recorded on the result, never thrown
 */
export interface StageRunner {
  run(stage: StageDefinition, context: StageContext): Promise<StageResult>;
}

/**
 * Result of a stage action that ran to completion. A reported failure
 * (failing tests, broken build, unstable rollout) is returned, not thrown.
 */
export interface ActionOutcome {
  output: StageOutput;
  logs: string[];
  attempts: number;
  failure?: TidewaterError;
}

export interface StageExecutorConfig {
  /** Default stage timeout when a stage declares none */
  stageTimeoutMs: number;
  /** Tag that always points at the newest published image */
  mutableTag: string;
  /** Characters of the commit id used as the immutable tag (0 = full id) */
  commitTagLength: number;
  retry: RetryPolicy;
  /** Rollout timeout used when a service declares none */
  rolloutTimeoutMs: number;
  pollIntervalMs: number;
}

export const DEFAULT_STAGE_EXECUTOR_CONFIG: StageExecutorConfig = {
  stageTimeoutMs: 600000,
  mutableTag: 'latest',
  commitTagLength: 12,
  retry: DEFAULT_RETRY_POLICY,
  rolloutTimeoutMs: 300000, // 5 minutes
  pollIntervalMs: 2000,
};
