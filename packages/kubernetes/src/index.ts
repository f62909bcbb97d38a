/**
 * @tidewater/kubernetes
 * Kubernetes cluster backend for the deployment controller
 */

export { K8sClusterBackend, parseDocuments, toClusterError, toRolloutStatus } from './k8s-cluster-backend.js';
export * from './types.js';
