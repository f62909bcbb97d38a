/**
 * Credential provider backed by configuration (environment variables).
 * Values are handed out per call and never stored elsewhere.
 */

import type {
  ClusterCredentials,
  Config,
  CredentialProvider,
  RegistryCredentials,
} from '@tidewater/shared';

export class EnvCredentialProvider implements CredentialProvider {
  constructor(
    private readonly credentials: Config['credentials'],
    private readonly kubernetes: Pick<Config['kubernetes'], 'kubeconfig' | 'context'>
  ) {}

  async getRegistryCredentials(): Promise<RegistryCredentials | undefined> {
    const { registryServer, registryUsername, registryPassword } = this.credentials;
    if (!registryServer || !registryUsername || !registryPassword) {
      return undefined;
    }
    return { server: registryServer, username: registryUsername, password: registryPassword };
  }

  async getClusterCredentials(_cluster: string): Promise<ClusterCredentials | undefined> {
    const { kubeconfig, context } = this.kubernetes;
    const token = this.credentials.clusterToken;
    if (!kubeconfig && !context && !token) {
      return undefined;
    }
    return { kubeconfig, context, token };
  }
}
