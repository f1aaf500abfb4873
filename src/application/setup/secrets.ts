/**
 * Secret Provisioner
 *
 * Secrets are created or replaced, so reruns never fail on existing objects.
 */

import type { Logger } from 'pino';
import { SECRETS } from '../../config/defaults';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';

export interface ProvisionedSecrets {
  namespace: 'created' | 'exists';
  secrets: Record<string, 'created' | 'replaced'>;
}

export class SecretProvisioner {
  private readonly logger: Logger;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'ensureNamespace' | 'applySecret'>,
    private readonly reporter: Reporter,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'SecretProvisioner' });
  }

  async provision(namespace: string, credential: string): Promise<ProvisionedSecrets> {
    this.reporter.info('Creating secrets...');

    const namespaceState = await this.cluster.ensureNamespace(namespace);
    const secrets: Record<string, 'created' | 'replaced'> = {};

    for (const name of [SECRETS.platform, SECRETS.tools]) {
      this.reporter.info(`Creating ${name} secret in ${namespace} namespace...`);
      secrets[name] = await this.cluster.applySecret(namespace, name, {
        [SECRETS.credentialKey]: credential,
      });
      this.logger.debug({ namespace, secret: name, action: secrets[name] }, 'Secret applied');
    }

    this.reporter.success('Secrets created successfully');
    return { namespace: namespaceState, secrets };
  }
}
