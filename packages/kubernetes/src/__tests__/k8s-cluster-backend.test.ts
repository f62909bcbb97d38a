/**
 * Kubernetes Cluster Backend Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import type * as k8s from '@kubernetes/client-node';
import { ClusterError, TransientInfraError } from '@tidewater/shared';
import type { DeployTarget } from '@tidewater/shared';
import { K8sClusterBackend, parseDocuments, toClusterError, toRolloutStatus } from '../k8s-cluster-backend.js';
import type { CoreApi, DeploymentApi, KubernetesApis } from '../types.js';

class FakeHttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly body: { message: string } = { message: `status ${statusCode}` }
  ) {
    super('HTTP request failed');
  }
}

class FakeNetworkError extends Error {
  constructor(public readonly code: string) {
    super(`connect ${code}`);
  }
}

/**
 * In-memory resource store keyed by kind/namespace/name
 */
class FakeCluster {
  readonly objects = new Map<string, k8s.KubernetesObject>();
  readonly writes: string[] = [];
  failNext?: Error;

  private key(kind: string, namespace: string, name: string): string {
    return `${kind}/${namespace}/${name}`;
  }

  read<T>(kind: string, namespace: string, name: string, toBody: (obj: k8s.KubernetesObject) => T): Promise<{ body: T }> {
    const error = this.failNext;
    if (error) {
      this.failNext = undefined;
      return Promise.reject(error);
    }
    const obj = this.objects.get(this.key(kind, namespace, name));
    if (!obj) {
      return Promise.reject(new FakeHttpError(404));
    }
    return Promise.resolve({ body: toBody(obj) });
  }

  write<T extends k8s.KubernetesObject>(verb: string, kind: string, namespace: string, body: T): Promise<{ body: T }> {
    const name = body.metadata?.name ?? '';
    this.writes.push(`${verb} ${kind}/${name}`);
    this.objects.set(this.key(kind, namespace, name), body);
    return Promise.resolve({ body });
  }

  deploymentApi(): DeploymentApi {
    return {
      readNamespacedDeployment: (name, namespace) => this.read('Deployment', namespace, name, (obj) => ({ ...obj })),
      createNamespacedDeployment: (namespace, body) => this.write('create', 'Deployment', namespace, body),
      replaceNamespacedDeployment: (_name, namespace, body) => this.write('replace', 'Deployment', namespace, body),
    };
  }

  coreApi(): CoreApi {
    return {
      readNamespacedService: (name, namespace) =>
        this.read('Service', namespace, name, (): k8s.V1Service => ({ spec: { clusterIP: '10.0.0.12' } })),
      createNamespacedService: (namespace, body) => this.write('create', 'Service', namespace, body),
      replaceNamespacedService: (_name, namespace, body) => this.write('replace', 'Service', namespace, body),
      readNamespacedConfigMap: (name, namespace) => this.read('ConfigMap', namespace, name, (obj) => ({ ...obj })),
      createNamespacedConfigMap: (namespace, body) => this.write('create', 'ConfigMap', namespace, body),
      replaceNamespacedConfigMap: (_name, namespace, body) => this.write('replace', 'ConfigMap', namespace, body),
    };
  }
}

const TARGET: DeployTarget = { cluster: 'prod', namespace: 'shop', deployment: 'api' };

const deploymentWith = (image: string, container = 'api'): k8s.V1Deployment => ({
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: { name: 'api', namespace: 'shop' },
  spec: {
    selector: { matchLabels: { app: 'api' } },
    template: { spec: { containers: [{ name: container, image }] } },
  },
});

const DESCRIPTOR = `apiVersion: apps/v1
kind: Deployment
metadata:
  name: api
spec:
  selector:
    matchLabels:
      app: api
  template:
    spec:
      containers:
        - name: api
          image: registry.example.com/shop/api:abc123
---
apiVersion: v1
kind: Service
metadata:
  name: api
spec:
  ports:
    - port: 80
---
apiVersion: v1
kind: ConfigMap
metadata:
  name: api-config
data:
  LOG_LEVEL: info
`;

describe('K8sClusterBackend', () => {
  let cluster: FakeCluster;
  let factory: Mock<[DeployTarget], KubernetesApis>;
  let backend: K8sClusterBackend;

  beforeEach(() => {
    cluster = new FakeCluster();
    factory = vi.fn<[DeployTarget], KubernetesApis>(() => ({
      apps: cluster.deploymentApi(),
      core: cluster.coreApi(),
    }));
    backend = new K8sClusterBackend({}, factory);
  });

  // ===========================================
  // getRunningImage
  // ===========================================

  describe('getRunningImage', () => {
    it('should return the image of the first container', async () => {
      cluster.objects.set('Deployment/shop/api', deploymentWith('registry.example.com/shop/api:old'));

      await expect(backend.getRunningImage(TARGET)).resolves.toBe('registry.example.com/shop/api:old');
    });

    it('should return the image of the named container', async () => {
      const deployment = deploymentWith('registry.example.com/shop/api:old');
      deployment.spec?.template.spec?.containers.push({ name: 'sidecar', image: 'envoy:1.30' });
      cluster.objects.set('Deployment/shop/api', deployment);

      await expect(backend.getRunningImage({ ...TARGET, container: 'sidecar' })).resolves.toBe('envoy:1.30');
    });

    it('should return undefined when the deployment does not exist', async () => {
      await expect(backend.getRunningImage(TARGET)).resolves.toBeUndefined();
    });

    it('should surface server errors as transient', async () => {
      cluster.failNext = new FakeHttpError(503, { message: 'etcd unavailable' });

      await expect(backend.getRunningImage(TARGET)).rejects.toThrow(TransientInfraError);
    });

    it('should reuse clients for the same cluster', async () => {
      await backend.getRunningImage(TARGET);
      await backend.getRunningImage(TARGET);

      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should build a fresh client for token credentials', async () => {
      await backend.getRunningImage(TARGET, { token: 'test-token' });
      await backend.getRunningImage(TARGET, { token: 'test-token' });

      expect(factory).toHaveBeenCalledTimes(2);
    });
  });

  // ===========================================
  // apply
  // ===========================================

  describe('applyDescriptor', () => {
    it('should create resources that do not exist', async () => {
      const resources = await backend.applyDescriptor(DESCRIPTOR, TARGET);

      expect(resources).toEqual([
        { kind: 'Deployment', name: 'api', namespace: 'shop', action: 'created' },
        { kind: 'Service', name: 'api', namespace: 'shop', action: 'created' },
        { kind: 'ConfigMap', name: 'api-config', namespace: 'shop', action: 'created' },
      ]);
      expect(cluster.writes).toEqual(['create Deployment/api', 'create Service/api', 'create ConfigMap/api-config']);
    });

    it('should replace existing resources and keep the service clusterIP', async () => {
      await backend.applyDescriptor(DESCRIPTOR, TARGET);
      cluster.writes.length = 0;

      const resources = await backend.applyDescriptor(DESCRIPTOR, TARGET);

      expect(resources.map((r) => r.action)).toEqual(['configured', 'configured', 'configured']);
      expect(cluster.writes).toEqual(['replace Deployment/api', 'replace Service/api', 'replace ConfigMap/api-config']);
      const service: k8s.V1Service = { ...cluster.objects.get('Service/shop/api') };
      expect(service.spec?.clusterIP).toBe('10.0.0.12');
    });

    it('should skip resources in another namespace', async () => {
      const descriptor = `${DESCRIPTOR}---
apiVersion: v1
kind: ConfigMap
metadata:
  name: shared
  namespace: kube-system
`;
      const resources = await backend.applyDescriptor(descriptor, TARGET);

      expect(resources[3]).toEqual({ kind: 'ConfigMap', name: 'shared', namespace: 'kube-system', action: 'skipped' });
      expect(cluster.writes).not.toContain('create ConfigMap/shared');
    });

    it('should skip unsupported kinds', async () => {
      const descriptor = `${DESCRIPTOR}---
apiVersion: batch/v1
kind: Job
metadata:
  name: migrate
`;
      const resources = await backend.applyDescriptor(descriptor, TARGET);

      expect(resources[3]).toEqual({ kind: 'Job', name: 'migrate', namespace: 'shop', action: 'skipped' });
      expect(cluster.writes).toHaveLength(3);
    });

    it('should reject a descriptor without the target deployment', async () => {
      await expect(backend.apply(DESCRIPTOR, { ...TARGET, deployment: 'web' })).rejects.toThrow(
        'Descriptor contains no Deployment named web'
      );
      expect(cluster.writes).toEqual([]);
    });

    it('should not write anything in dry-run mode', async () => {
      backend = new K8sClusterBackend({ dryRun: true }, factory);

      const resources = await backend.applyDescriptor(DESCRIPTOR, TARGET);

      expect(resources.map((r) => r.action)).toEqual(['configured', 'configured', 'configured']);
      expect(cluster.writes).toEqual([]);
    });

    it('should report a rejected write as a cluster error', async () => {
      cluster.failNext = new FakeHttpError(422, { message: 'spec.selector: Required value' });

      const error = await backend.apply(DESCRIPTOR, TARGET).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ClusterError);
      expect(error).toMatchObject({
        statusCode: 422,
        message: 'Failed to apply Deployment shop/api: spec.selector: Required value',
      });
    });
  });

  // ===========================================
  // Rollout status
  // ===========================================

  describe('getRolloutStatus', () => {
    it('should read the target deployment status', async () => {
      const deployment: k8s.V1Deployment = {
        ...deploymentWith('registry.example.com/shop/api:abc123'),
        status: { observedGeneration: 1, replicas: 1, updatedReplicas: 1, readyReplicas: 1, availableReplicas: 1 },
      };
      cluster.objects.set('Deployment/shop/api', deployment);

      await expect(backend.getRolloutStatus(TARGET)).resolves.toMatchObject({ stable: true, failed: false });
    });

    it('should fail when the deployment does not exist', async () => {
      await expect(backend.getRolloutStatus(TARGET)).rejects.toThrow(ClusterError);
    });

    it('should not read the live deployment in dry-run mode', async () => {
      backend = new K8sClusterBackend({ dryRun: true }, factory);
      cluster.objects.set('Deployment/shop/api', deploymentWith('registry.example.com/shop/api:abc123'));

      await expect(backend.getRolloutStatus(TARGET)).resolves.toEqual({
        stable: true,
        failed: false,
        message: 'DRY RUN: descriptor not applied, rollout not observed',
      });
      expect(factory).not.toHaveBeenCalled();
    });
  });
});

describe('toRolloutStatus', () => {
  const withStatus = (status: k8s.V1DeploymentStatus, replicas = 2, generation = 3): k8s.V1Deployment => ({
    metadata: { name: 'api', generation },
    spec: { replicas, selector: {}, template: {} },
    status,
  });

  it('should be stable when every replica is updated and available', () => {
    const status = toRolloutStatus(
      withStatus({ observedGeneration: 3, replicas: 2, updatedReplicas: 2, readyReplicas: 2, availableReplicas: 2 })
    );

    expect(status).toEqual({
      stable: true,
      failed: false,
      message: 'Rollout completed successfully',
      readyReplicas: 2,
      desiredReplicas: 2,
    });
  });

  it('should wait until the new generation is observed', () => {
    const status = toRolloutStatus(
      withStatus({ observedGeneration: 2, replicas: 2, updatedReplicas: 2, readyReplicas: 2, availableReplicas: 2 })
    );

    expect(status.stable).toBe(false);
    expect(status.message).toBe('Waiting for the new spec to be observed');
  });

  it('should report partially updated rollouts', () => {
    const status = toRolloutStatus(
      withStatus({ observedGeneration: 3, replicas: 3, updatedReplicas: 1, readyReplicas: 2, availableReplicas: 2 })
    );

    expect(status).toMatchObject({ stable: false, failed: false, message: '1 of 2 updated replicas' });
  });

  it('should wait for old replicas to terminate', () => {
    const status = toRolloutStatus(
      withStatus({ observedGeneration: 3, replicas: 3, updatedReplicas: 2, readyReplicas: 2, availableReplicas: 2 })
    );

    expect(status).toMatchObject({ stable: false, message: '1 old replicas pending termination' });
  });

  it('should report a failed rollout when the progress deadline is exceeded', () => {
    const status = toRolloutStatus(
      withStatus({
        observedGeneration: 3,
        conditions: [
          {
            type: 'Progressing',
            status: 'False',
            reason: 'ProgressDeadlineExceeded',
            message: 'ReplicaSet "api-7d9" has timed out progressing.',
          },
        ],
      })
    );

    expect(status).toMatchObject({
      stable: false,
      failed: true,
      message: 'ReplicaSet "api-7d9" has timed out progressing.',
    });
  });
});

describe('parseDocuments', () => {
  it('should drop empty documents and documents without a name', () => {
    const docs = parseDocuments('---\nkind: ConfigMap\nmetadata:\n  name: a\n---\n---\nkind: Secret\n');

    expect(docs).toEqual([{ kind: 'ConfigMap', metadata: { name: 'a' } }]);
  });

  it('should reject invalid YAML', () => {
    expect(() => parseDocuments('kind: [')).toThrow(ClusterError);
  });
});

describe('toClusterError', () => {
  it('should treat 5xx, 409 and 429 as transient', () => {
    expect(toClusterError(new FakeHttpError(500), 'read')).toBeInstanceOf(TransientInfraError);
    expect(toClusterError(new FakeHttpError(409), 'read')).toBeInstanceOf(TransientInfraError);
    expect(toClusterError(new FakeHttpError(429), 'read')).toBeInstanceOf(TransientInfraError);
  });

  it('should treat dropped connections as transient', () => {
    expect(toClusterError(new FakeNetworkError('ECONNRESET'), 'read')).toBeInstanceOf(TransientInfraError);
  });

  it('should treat other client errors as final', () => {
    const error = toClusterError(new FakeHttpError(403, { message: 'forbidden' }), 'read deployment');

    expect(error).toBeInstanceOf(ClusterError);
    expect(error.message).toBe('Failed to read deployment: forbidden');
  });
});
