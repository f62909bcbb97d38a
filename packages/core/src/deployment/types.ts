/**
 * Deployment controller types
 */

import type { RetryPolicy } from '../executor/types.js';
import { DEFAULT_RETRY_POLICY } from '../executor/types.js';

export interface DeploymentControllerConfig {
  rolloutTimeoutMs: number;
  pollIntervalMs: number;
  /** Upper bound on a single apply or image lookup */
  clusterCallTimeoutMs: number;
  /** Serialize rollouts that target the same cluster and namespace */
  serializeDeploys: boolean;
  /** Retry policy for transient cluster API errors */
  retry: RetryPolicy;
}

export const DEFAULT_DEPLOYMENT_CONTROLLER_CONFIG: DeploymentControllerConfig = {
  rolloutTimeoutMs: 300000, // 5 minutes
  pollIntervalMs: 2000,
  clusterCallTimeoutMs: 30000,
  serializeDeploys: true,
  retry: DEFAULT_RETRY_POLICY,
};
