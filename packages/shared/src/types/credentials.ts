/**
 * Credentials handed to collaborators for the duration of one call.
 * Never persisted, never logged.
 */

export interface RegistryCredentials {
  server: string;
  username: string;
  password: string;
}

export interface ClusterCredentials {
  /** Path to a kubeconfig file */
  kubeconfig?: string;
  context?: string;
  /** Bearer token, used instead of kubeconfig user credentials */
  token?: string;
}

export interface CredentialProvider {
  getRegistryCredentials(): Promise<RegistryCredentials | undefined>;
  getClusterCredentials(cluster: string): Promise<ClusterCredentials | undefined>;
}
