/**
 * Kubernetes Cluster Backend
 * Applies deployment descriptors and reports rollout status through the cluster API
 */

import * as k8s from '@kubernetes/client-node';
import * as yaml from 'js-yaml';
import { ClusterError, createChildLogger, TransientInfraError } from '@tidewater/shared';
import type { ClusterBackend, ClusterCredentials, DeployTarget, RolloutStatus } from '@tidewater/shared';
import type {
  AppliedResource,
  ApplyAction,
  K8sClusterBackendConfig,
  KubernetesApiFactory,
  KubernetesApis,
} from './types.js';
import { DEFAULT_K8S_CLUSTER_BACKEND_CONFIG } from './types.js';

const TRANSIENT_STATUS_CODES = new Set([408, 409, 429]);
const TRANSIENT_NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE']);
const TOKEN_IDENTITY = 'tidewater';

export class K8sClusterBackend implements ClusterBackend {
  private config: K8sClusterBackendConfig;
  private clients = new Map<string, KubernetesApis>();
  private createApis: KubernetesApiFactory;
  private logger = createChildLogger({ component: 'K8sClusterBackend' });

  constructor(config: Partial<K8sClusterBackendConfig> = {}, apiFactory?: KubernetesApiFactory) {
    this.config = { ...DEFAULT_K8S_CLUSTER_BACKEND_CONFIG, ...config };
    this.createApis = apiFactory ?? ((target, credentials) => this.makeApis(target, credentials));
  }

  async getRunningImage(target: DeployTarget, credentials?: ClusterCredentials): Promise<string | undefined> {
    const { apps } = this.apis(target, credentials);

    let deployment: k8s.V1Deployment;
    try {
      deployment = (await apps.readNamespacedDeployment(target.deployment, target.namespace)).body;
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return undefined;
      }
      throw toClusterError(error, `read deployment ${target.namespace}/${target.deployment}`);
    }

    const containers = deployment.spec?.template.spec?.containers ?? [];
    const container = target.container
      ? containers.find((c) => c.name === target.container)
      : containers[0];

    if (!container) {
      this.logger.warn({ target }, 'Deployment has no matching container');
      return undefined;
    }
    return container.image;
  }

  async apply(descriptor: string, target: DeployTarget, credentials?: ClusterCredentials): Promise<void> {
    await this.applyDescriptor(descriptor, target, credentials);
  }

  /**
   * Apply every supported document of a (multi-document) descriptor.
   * The descriptor must contain the target's Deployment.
   */
  async applyDescriptor(
    descriptor: string,
    target: DeployTarget,
    credentials?: ClusterCredentials
  ): Promise<AppliedResource[]> {
    const documents = parseDocuments(descriptor);

    const hasTarget = documents.some(
      (doc) => doc.kind === 'Deployment' && doc.metadata?.name === target.deployment
    );
    if (!hasTarget) {
      throw new ClusterError(`Descriptor contains no Deployment named ${target.deployment}`);
    }

    const { apps, core } = this.apis(target, credentials);
    const resources: AppliedResource[] = [];

    for (const doc of documents) {
      const kind = doc.kind ?? '';
      const name = doc.metadata?.name ?? '';
      const namespace = doc.metadata?.namespace ?? target.namespace;

      if (namespace !== target.namespace) {
        this.logger.warn({ kind, name, namespace, targetNamespace: target.namespace }, 'Skipping resource with mismatched namespace');
        resources.push({ kind, name, namespace, action: 'skipped' });
        continue;
      }

      if (this.config.dryRun) {
        this.logger.info({ kind, name, namespace }, 'DRY RUN: resource would be applied');
        resources.push({ kind, name, namespace, action: 'configured' });
        continue;
      }

      let action: ApplyAction;
      try {
        switch (kind) {
          case 'Deployment':
            action = await replaceOrCreate(
              () => apps.readNamespacedDeployment(name, namespace),
              () => apps.replaceNamespacedDeployment(name, namespace, doc),
              () => apps.createNamespacedDeployment(namespace, doc)
            );
            break;
          case 'Service': {
            const service: k8s.V1Service = { ...doc };
            action = await replaceOrCreate(
              () => core.readNamespacedService(name, namespace),
              (existing) => {
                // clusterIP is immutable; carry it over or the replace is rejected
                if (existing.spec?.clusterIP) {
                  service.spec = { ...service.spec, clusterIP: existing.spec.clusterIP };
                }
                return core.replaceNamespacedService(name, namespace, service);
              },
              () => core.createNamespacedService(namespace, service)
            );
            break;
          }
          case 'ConfigMap':
            action = await replaceOrCreate(
              () => core.readNamespacedConfigMap(name, namespace),
              () => core.replaceNamespacedConfigMap(name, namespace, doc),
              () => core.createNamespacedConfigMap(namespace, doc)
            );
            break;
          default:
            this.logger.warn({ kind, name }, 'Unsupported resource kind, skipping');
            action = 'skipped';
        }
      } catch (error) {
        throw toClusterError(error, `apply ${kind} ${namespace}/${name}`);
      }

      resources.push({ kind, name, namespace, action });
    }

    this.logger.info(
      { target, resources: resources.map((r) => `${r.kind}/${r.name}:${r.action}`), dryRun: this.config.dryRun },
      'Descriptor applied'
    );
    return resources;
  }

  async getRolloutStatus(target: DeployTarget, credentials?: ClusterCredentials): Promise<RolloutStatus> {
    // Nothing was written, so the live Deployment says nothing about this rollout
    if (this.config.dryRun) {
      return { stable: true, failed: false, message: 'DRY RUN: descriptor not applied, rollout not observed' };
    }

    const { apps } = this.apis(target, credentials);

    let deployment: k8s.V1Deployment;
    try {
      deployment = (await apps.readNamespacedDeployment(target.deployment, target.namespace)).body;
    } catch (error) {
      throw toClusterError(error, `read rollout status ${target.namespace}/${target.deployment}`);
    }

    return toRolloutStatus(deployment);
  }

  // ===========================================
  // Clients
  // ===========================================

  private apis(target: DeployTarget, credentials?: ClusterCredentials): KubernetesApis {
    // Token clients are built per call so the token is not kept around
    if (credentials?.token) {
      return this.createApis(target, credentials);
    }

    const key = [
      credentials?.kubeconfig ?? this.config.kubeconfig ?? '',
      credentials?.context ?? this.config.context ?? '',
      target.cluster,
    ].join('|');

    let apis = this.clients.get(key);
    if (!apis) {
      apis = this.createApis(target, credentials);
      this.clients.set(key, apis);
    }
    return apis;
  }

  private makeApis(target: DeployTarget, credentials?: ClusterCredentials): KubernetesApis {
    const kc = new k8s.KubeConfig();

    const kubeconfig = credentials?.kubeconfig ?? this.config.kubeconfig;
    if (kubeconfig) {
      kc.loadFromFile(kubeconfig);
    } else {
      kc.loadFromDefault();
    }

    const context = credentials?.context
      ?? this.config.context
      ?? (kc.getContextObject(target.cluster) ? target.cluster : undefined);
    if (context) {
      kc.setCurrentContext(context);
    }

    if (credentials?.token) {
      const cluster = kc.getCurrentCluster();
      if (!cluster) {
        throw new ClusterError(`No cluster configured for context ${kc.getCurrentContext()}`);
      }
      kc.loadFromOptions({
        clusters: [cluster],
        users: [{ name: TOKEN_IDENTITY, token: credentials.token }],
        contexts: [{ name: TOKEN_IDENTITY, cluster: cluster.name, user: TOKEN_IDENTITY }],
        currentContext: TOKEN_IDENTITY,
      });
    }

    this.logger.info({ cluster: target.cluster, context: kc.getCurrentContext() }, 'Kubernetes client initialized');

    return {
      apps: kc.makeApiClient(k8s.AppsV1Api),
      core: kc.makeApiClient(k8s.CoreV1Api),
    };
  }
}

// ===========================================
// Helpers
// ===========================================

function isKubernetesObject(doc: unknown): doc is k8s.KubernetesObject {
  return typeof doc === 'object' && doc !== null && 'kind' in doc && typeof doc.kind === 'string';
}

/**
 * Split a descriptor into its resource documents, dropping empty ones
 */
export function parseDocuments(descriptor: string): k8s.KubernetesObject[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(descriptor);
  } catch (error) {
    throw new ClusterError(`Descriptor is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  return documents.filter(isKubernetesObject).filter((doc) => Boolean(doc.metadata?.name));
}

async function replaceOrCreate<T>(
  read: () => Promise<{ body: T }>,
  replace: (existing: T) => Promise<unknown>,
  create: () => Promise<unknown>
): Promise<ApplyAction> {
  let existing: T;
  try {
    existing = (await read()).body;
  } catch (error) {
    if (statusCodeOf(error) === 404) {
      await create();
      return 'created';
    }
    throw error;
  }

  await replace(existing);
  return 'configured';
}

/**
 * Stable once the controller has observed the latest spec and every desired
 * replica is updated, ready and available with no old replicas left.
 */
export function toRolloutStatus(deployment: k8s.V1Deployment): RolloutStatus {
  const generation = deployment.metadata?.generation ?? 0;
  const observedGeneration = deployment.status?.observedGeneration ?? 0;
  const desiredReplicas = deployment.spec?.replicas ?? 1;
  const replicas = deployment.status?.replicas ?? 0;
  const updatedReplicas = deployment.status?.updatedReplicas ?? 0;
  const readyReplicas = deployment.status?.readyReplicas ?? 0;
  const availableReplicas = deployment.status?.availableReplicas ?? 0;

  const conditions = deployment.status?.conditions ?? [];
  const progressing = conditions.find((c) => c.type === 'Progressing');

  if (progressing?.reason === 'ProgressDeadlineExceeded') {
    return {
      stable: false,
      failed: true,
      message: progressing.message ?? 'Progress deadline exceeded',
      readyReplicas,
      desiredReplicas,
    };
  }

  if (observedGeneration < generation) {
    return { stable: false, failed: false, message: 'Waiting for the new spec to be observed', readyReplicas, desiredReplicas };
  }

  const stable =
    updatedReplicas === desiredReplicas &&
    readyReplicas === desiredReplicas &&
    availableReplicas === desiredReplicas &&
    replicas === updatedReplicas;

  let message: string;
  if (stable) {
    message = 'Rollout completed successfully';
  } else if (updatedReplicas < desiredReplicas) {
    message = `${updatedReplicas} of ${desiredReplicas} updated replicas`;
  } else if (replicas > updatedReplicas) {
    message = `${replicas - updatedReplicas} old replicas pending termination`;
  } else {
    message = `${availableReplicas} of ${desiredReplicas} updated replicas available`;
  }

  return { stable, failed: false, message, readyReplicas, desiredReplicas };
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function networkCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function bodyMessageOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('body' in error)) {
    return undefined;
  }
  const { body } = error;
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

/**
 * 5xx, throttling, conflicts and dropped connections are worth retrying;
 * every other API error is final.
 */
export function toClusterError(error: unknown, operation: string): ClusterError | TransientInfraError {
  if (error instanceof ClusterError || error instanceof TransientInfraError) {
    return error;
  }

  const statusCode = statusCodeOf(error);
  const detail = bodyMessageOf(error) ?? (error instanceof Error ? error.message : String(error));
  const message = `Failed to ${operation}: ${detail}`;

  if (statusCode !== undefined && (statusCode >= 500 || TRANSIENT_STATUS_CODES.has(statusCode))) {
    return new TransientInfraError(message, { statusCode });
  }

  const networkCode = networkCodeOf(error);
  if (statusCode === undefined && networkCode !== undefined && TRANSIENT_NETWORK_CODES.has(networkCode)) {
    return new TransientInfraError(message, { networkCode });
  }

  return new ClusterError(message, statusCode);
}
