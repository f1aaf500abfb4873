/**
 * Control-Plane Installer
 *
 * One-time install of Argo CD. An existing namespace means "installed"; version
 * drift is not reconciled.
 */

import type { Logger } from 'pino';
import { CONTROL_PLANE, TIMINGS } from '../../config/defaults';
import { InstallTimeoutError } from '../../errors';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';
import { pollUntil, systemClock, type Clock } from '../utils/async-utils';

export interface ControlPlaneInstallerOptions {
  namespace: string;
  manifestUrl?: string;
  timeoutSeconds?: number;
  pollIntervalMs?: number;
  clock?: Clock;
}

export class ControlPlaneInstaller {
  private readonly logger: Logger;

  constructor(
    private readonly cluster: Pick<
      ClusterClient,
      'namespaceExists' | 'ensureNamespace' | 'applyManifest' | 'isDeploymentAvailable'
    >,
    private readonly reporter: Reporter,
    private readonly options: ControlPlaneInstallerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ControlPlaneInstaller' });
  }

  /**
   * @returns false when the controller was already present and nothing was done
   */
  async ensureInstalled(): Promise<boolean> {
    const { namespace } = this.options;

    if (await this.cluster.namespaceExists(namespace)) {
      this.reporter.info('ArgoCD already installed');
      return false;
    }

    this.reporter.info('Installing ArgoCD...');
    await this.cluster.ensureNamespace(namespace);
    await this.cluster.applyManifest(
      this.options.manifestUrl ?? CONTROL_PLANE.installManifestUrl,
      namespace,
    );

    this.reporter.info('Waiting for ArgoCD to be ready...');
    const timeoutSeconds = this.options.timeoutSeconds ?? TIMINGS.installTimeoutSeconds;
    const intervalMs = this.options.pollIntervalMs ?? TIMINGS.installPollIntervalMs;

    const ready = await pollUntil(
      () => this.cluster.isDeploymentAvailable(namespace, CONTROL_PLANE.serverDeployment),
      {
        intervalMs,
        // one check at t=0 plus one per interval up to the timeout
        maxAttempts: Math.floor((timeoutSeconds * 1000) / intervalMs) + 1,
        clock: this.options.clock ?? systemClock,
        logger: this.logger,
        label: 'argocd-install',
      },
    );

    if (ready.status === 'exhausted') {
      throw new InstallTimeoutError(CONTROL_PLANE.serverDeployment, namespace, timeoutSeconds);
    }

    this.reporter.success('ArgoCD installed');
    return true;
  }
}
