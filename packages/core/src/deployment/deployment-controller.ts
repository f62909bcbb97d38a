/**
 * Deployment Controller
 * Renders a descriptor, rolls it out, waits for stability and rolls back on failure
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import { createChildLogger, ROLLOUT_STATES, TransientInfraError } from '@tidewater/shared';
import type {
  ClusterBackend,
  ClusterCredentials,
  CredentialProvider,
  DeploymentArchive,
  DeploymentResult,
  DeploymentSpec,
  RolloutFailureReason,
  RolloutTransition,
} from '@tidewater/shared';
import { withRetry } from '../executor/retry.js';
import type { Deployer } from '../executor/types.js';
import { KeyedMutex } from './deploy-lock.js';
import { renderDescriptor } from './descriptor-renderer.js';
import { RolloutStateMachine } from './rollout-state-machine.js';
import type { DeploymentControllerConfig } from './types.js';
import { DEFAULT_DEPLOYMENT_CONTROLLER_CONFIG } from './types.js';

export interface DeploymentControllerEvents {
  'rollout:transition': (payload: { deploymentId: string; serviceId: string; transition: RolloutTransition }) => void;
  'rollout:completed': (payload: { result: DeploymentResult }) => void;
}

export interface DeploymentControllerDeps {
  cluster: ClusterBackend;
  credentials?: CredentialProvider;
  archive?: DeploymentArchive;
}

type PollOutcome =
  | { stable: true; message: string }
  | { stable: false; reason: Exclude<RolloutFailureReason, 'apply-failed'>; message: string };

export class DeploymentController extends EventEmitter<DeploymentControllerEvents> implements Deployer {
  private config: DeploymentControllerConfig;
  private locks = new KeyedMutex();
  private logger = createChildLogger({ component: 'DeploymentController' });

  constructor(
    private readonly deps: DeploymentControllerDeps,
    config: Partial<DeploymentControllerConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_DEPLOYMENT_CONTROLLER_CONFIG, ...config };
  }

  /**
   * Roll out an image. Resolves once the rollout is terminal: stable, failed or
   * rolled back. There is no cancellation: an in-flight rollout is never abandoned.
   */
  async deploy(spec: DeploymentSpec): Promise<DeploymentResult> {
    if (!this.config.serializeDeploys) {
      return this.rollout(spec);
    }

    const lockKey = `${spec.target.cluster}/${spec.target.namespace}`;
    if (this.locks.isLocked(lockKey)) {
      this.logger.info({ serviceId: spec.serviceId, lockKey }, 'Waiting for rollout in progress on target');
    }
    return this.locks.runExclusive(lockKey, () => this.rollout(spec));
  }

  private async rollout(spec: DeploymentSpec): Promise<DeploymentResult> {
    const startTime = Date.now();
    const deploymentId = randomUUID();
    const { target } = spec;
    const log = this.logger.child({ deploymentId, serviceId: spec.serviceId, runId: spec.runId });
    const machine = new RolloutStateMachine(deploymentId, (transition) =>
      this.emit('rollout:transition', { deploymentId, serviceId: spec.serviceId, transition })
    );

    // Nothing has touched the cluster until apply: errors here propagate
    const descriptor = renderDescriptor(spec.descriptorTemplate, spec.imageRef);
    const credentials = await this.deps.credentials?.getClusterCredentials(target.cluster);
    const previousImageRef = await this.callCluster('read running image', () =>
      this.deps.cluster.getRunningImage(target, credentials)
    );

    log.info({ imageRef: spec.imageRef, previousImageRef, target }, 'Starting rollout');

    const finish = async (
      patch: Pick<DeploymentResult, 'rolledBack'> & Partial<DeploymentResult>
    ): Promise<DeploymentResult> => {
      const result: DeploymentResult = {
        deploymentId,
        serviceId: spec.serviceId,
        target,
        state: machine.state,
        outcome: machine.state === ROLLOUT_STATES.STABLE ? 'stable' : 'failed',
        imageRef: spec.imageRef,
        previousImageRef,
        transitions: machine.transitions,
        durationMs: Date.now() - startTime,
        ...patch,
      };
      await this.archive(result, spec.runId);
      this.emit('rollout:completed', { result });
      return result;
    };

    try {
      await this.callCluster('apply descriptor', () => this.deps.cluster.apply(descriptor, target, credentials));
    } catch (error) {
      const message = `Apply failed: ${error instanceof Error ? error.message : String(error)}`;
      log.error({ error: message }, 'Rollout could not be submitted');
      machine.transition(ROLLOUT_STATES.FAILED, message);
      const rolledBack = await this.rollback(spec, previousImageRef, credentials, machine);
      return finish({ rolledBack, failureReason: 'apply-failed', message });
    }

    machine.transition(ROLLOUT_STATES.IN_PROGRESS, 'descriptor applied');

    const timeoutMs = spec.rolloutTimeoutMs ?? this.config.rolloutTimeoutMs;
    const polled = await this.waitForRollout(spec, credentials, timeoutMs);

    if (polled.stable) {
      machine.transition(ROLLOUT_STATES.STABLE, polled.message);
      log.info({ durationMs: Date.now() - startTime }, 'Rollout stable');
      return finish({ rolledBack: false, message: polled.message });
    }

    log.warn({ reason: polled.reason, message: polled.message }, 'Rollout failed');
    machine.transition(ROLLOUT_STATES.FAILED, polled.message);
    const rolledBack = await this.rollback(spec, previousImageRef, credentials, machine);
    return finish({ rolledBack, failureReason: polled.reason, message: polled.message });
  }

  /**
   * Poll rollout status until stable, explicitly failed, or the timeout elapses.
   * Status query errors count as "not yet stable".
   */
  private async waitForRollout(
    spec: DeploymentSpec,
    credentials: ClusterCredentials | undefined,
    timeoutMs: number
  ): Promise<PollOutcome> {
    const pollIntervalMs = spec.pollIntervalMs ?? this.config.pollIntervalMs;
    const deadline = Date.now() + timeoutMs;
    let lastMessage = 'no status received';

    for (;;) {
      try {
        const status = await withDeadline(
          this.deps.cluster.getRolloutStatus(spec.target, credentials),
          Math.max(deadline - Date.now(), 1),
          'rollout status query'
        );
        lastMessage = status.message;

        if (status.stable) {
          return { stable: true, message: status.message };
        }
        if (status.failed) {
          return { stable: false, reason: 'unhealthy', message: status.message };
        }
      } catch (error) {
        lastMessage = error instanceof Error ? error.message : String(error);
        this.logger.warn({ serviceId: spec.serviceId, error: lastMessage }, 'Rollout status query failed');
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return {
          stable: false,
          reason: 'timeout',
          message: `Rollout did not stabilize within ${timeoutMs}ms (last status: ${lastMessage})`,
        };
      }

      await sleep(Math.min(pollIntervalMs, remaining));
    }
  }

  /**
   * Resubmit the descriptor with the image that ran before. Returns whether the
   * previous image was restored.
   */
  private async rollback(
    spec: DeploymentSpec,
    previousImageRef: string | undefined,
    credentials: ClusterCredentials | undefined,
    machine: RolloutStateMachine
  ): Promise<boolean> {
    const log = this.logger.child({ serviceId: spec.serviceId, runId: spec.runId });

    if (!spec.rollbackEnabled) {
      log.warn('Rollback disabled, leaving failed rollout in place');
      return false;
    }
    if (!previousImageRef) {
      log.warn('No previous image recorded, nothing to roll back to');
      return false;
    }

    try {
      const descriptor = renderDescriptor(spec.descriptorTemplate, previousImageRef);
      await this.callCluster('apply rollback', () => this.deps.cluster.apply(descriptor, spec.target, credentials));
    } catch (error) {
      log.error(
        { previousImageRef, error: error instanceof Error ? error.message : String(error) },
        'Rollback failed, target left on failed rollout'
      );
      return false;
    }

    machine.transition(ROLLOUT_STATES.ROLLED_BACK, `restored ${previousImageRef}`);

    const restored = await this.waitForRollout(
      { ...spec, imageRef: previousImageRef },
      credentials,
      spec.rolloutTimeoutMs ?? this.config.rolloutTimeoutMs
    );
    if (!restored.stable) {
      log.error({ previousImageRef, message: restored.message }, 'Rolled back image did not become stable');
    }

    log.info({ previousImageRef }, 'Rolled back to previous image');
    return true;
  }

  private async callCluster<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const { value } = await withRetry(
      () => withDeadline(fn(), this.config.clusterCallTimeoutMs, operation),
      this.config.retry,
      { operation }
    );
    return value;
  }

  private async archive(result: DeploymentResult, runId?: string): Promise<void> {
    if (!this.deps.archive) {
      return;
    }
    try {
      await this.deps.archive.archive(result, runId);
    } catch (error) {
      this.logger.error(
        { deploymentId: result.deploymentId, error: error instanceof Error ? error.message : String(error) },
        'Failed to archive deployment'
      );
    }
  }
}

/**
 * Settle with the call, or reject once timeoutMs has passed. The cluster client
 * sets no request timeout of its own.
 */
function withDeadline<T>(call: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(
      () => reject(new TransientInfraError(`${operation} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
    call.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
