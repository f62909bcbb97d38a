/**
 * Deployment and cluster backend types
 */

import type { ClusterCredentials } from './credentials.js';

export const ROLLOUT_STATES = {
  PENDING: 'pending',
  IN_PROGRESS: 'in-progress',
  STABLE: 'stable',
  FAILED: 'failed',
  ROLLED_BACK: 'rolled-back',
} as const;

export type RolloutState = (typeof ROLLOUT_STATES)[keyof typeof ROLLOUT_STATES];

/**
 * Where a service runs
 */
export interface DeployTarget {
  /** Cluster identifier, used to serialize rollouts against the same cluster */
  cluster: string;
  namespace: string;
  deployment: string;
  /** Container whose image is rolled (default: first container) */
  container?: string;
}

export interface DeploymentSpec {
  serviceId: string;
  target: DeployTarget;
  imageRef: string;
  descriptorTemplate: string;
  rollbackEnabled: boolean;
  rolloutTimeoutMs?: number;
  pollIntervalMs?: number;
  runId?: string;
}

export interface RolloutTransition {
  from: RolloutState;
  to: RolloutState;
  at: Date;
  reason?: string;
}

/** Why a rollout ended without becoming stable */
export type RolloutFailureReason = 'timeout' | 'unhealthy' | 'apply-failed';

/** Terminal verdict: a rolled-back deploy still failed */
export type RolloutOutcome = 'stable' | 'failed';

export interface DeploymentResult {
  deploymentId: string;
  serviceId: string;
  target: DeployTarget;
  state: RolloutState;
  outcome: RolloutOutcome;
  rolledBack: boolean;
  imageRef: string;
  previousImageRef?: string;
  message?: string;
  failureReason?: RolloutFailureReason;
  transitions: RolloutTransition[];
  durationMs: number;
}

/**
 * Rollout status as reported by the cluster
 */
export interface RolloutStatus {
  stable: boolean;
  /** Backend explicitly reports the rollout as failed */
  failed: boolean;
  message: string;
  readyReplicas?: number;
  desiredReplicas?: number;
}

/**
 * Cluster the deployment controller rolls out against
 */
export interface ClusterBackend {
  /** Image currently running for the target, undefined when the workload does not exist */
  getRunningImage(target: DeployTarget, credentials?: ClusterCredentials): Promise<string | undefined>;
  /** Submit a rendered descriptor */
  apply(descriptor: string, target: DeployTarget, credentials?: ClusterCredentials): Promise<void>;
  getRolloutStatus(target: DeployTarget, credentials?: ClusterCredentials): Promise<RolloutStatus>;
}

/**
 * Stores finished deployments once they are stable or rolled back
 */
export interface DeploymentArchive {
  archive(result: DeploymentResult, runId?: string): Promise<void>;
}
