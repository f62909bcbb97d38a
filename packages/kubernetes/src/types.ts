/**
 * Kubernetes cluster backend types
 */

import type * as k8s from '@kubernetes/client-node';
import type { ClusterCredentials, DeployTarget } from '@tidewater/shared';

export interface K8sClusterBackendConfig {
  /** Kubeconfig path (default: KUBECONFIG or ~/.kube/config) */
  kubeconfig?: string;
  /** Context to use; when unset, a context named after the target cluster is preferred */
  context?: string;
  /** Parse and log descriptors without writing to the cluster */
  dryRun: boolean;
}

export const DEFAULT_K8S_CLUSTER_BACKEND_CONFIG: K8sClusterBackendConfig = {
  dryRun: false,
};

interface ApiResponse<T> {
  body: T;
}

/**
 * The parts of AppsV1Api the backend calls
 */
export interface DeploymentApi {
  readNamespacedDeployment(name: string, namespace: string): Promise<ApiResponse<k8s.V1Deployment>>;
  createNamespacedDeployment(namespace: string, body: k8s.V1Deployment): Promise<ApiResponse<k8s.V1Deployment>>;
  replaceNamespacedDeployment(name: string, namespace: string, body: k8s.V1Deployment): Promise<ApiResponse<k8s.V1Deployment>>;
}

/**
 * The parts of CoreV1Api the backend calls
 */
export interface CoreApi {
  readNamespacedService(name: string, namespace: string): Promise<ApiResponse<k8s.V1Service>>;
  createNamespacedService(namespace: string, body: k8s.V1Service): Promise<ApiResponse<k8s.V1Service>>;
  replaceNamespacedService(name: string, namespace: string, body: k8s.V1Service): Promise<ApiResponse<k8s.V1Service>>;
  readNamespacedConfigMap(name: string, namespace: string): Promise<ApiResponse<k8s.V1ConfigMap>>;
  createNamespacedConfigMap(namespace: string, body: k8s.V1ConfigMap): Promise<ApiResponse<k8s.V1ConfigMap>>;
  replaceNamespacedConfigMap(name: string, namespace: string, body: k8s.V1ConfigMap): Promise<ApiResponse<k8s.V1ConfigMap>>;
}

export interface KubernetesApis {
  apps: DeploymentApi;
  core: CoreApi;
}

export type KubernetesApiFactory = (target: DeployTarget, credentials?: ClusterCredentials) => KubernetesApis;

export type ApplyAction = 'created' | 'configured' | 'skipped';

export interface AppliedResource {
  kind: string;
  name: string;
  namespace: string;
  action: ApplyAction;
}
