/**
 * Control-plane API access: the Argo CD server tunnel plus a CLI login.
 * Established once per run and reused by every application.
 */

import type { Logger } from 'pino';
import { CONTROL_PLANE, TIMINGS } from '../../config/defaults';
import { errorMessage } from '../../errors';
import type { GitOpsCli } from '../../infrastructure/argocd/cli';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';
import { pollUntil, systemClock, type Clock } from '../utils/async-utils';
import type { PortForwardManager, ProcessHandle, TunnelSpec } from './port-forward';

export interface ApiAccess {
  /** Resolves true when the control-plane API is reachable and the CLI is logged in */
  ensure(): Promise<boolean>;
}

export interface ControlPlaneAccessOptions {
  namespace: string;
  tunnel: TunnelSpec;
  clock?: Clock;
}

export class ControlPlaneAccess implements ApiAccess {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private established?: Promise<boolean>;
  private handle?: ProcessHandle;
  private password?: string;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'isDeploymentAvailable' | 'readSecretValue'>,
    private readonly tunnels: Pick<PortForwardManager, 'start'>,
    private readonly cli: Pick<GitOpsCli, 'login'>,
    private readonly reporter: Reporter,
    private readonly options: ControlPlaneAccessOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ControlPlaneAccess' });
    this.clock = options.clock ?? systemClock;
  }

  ensure(): Promise<boolean> {
    this.established ??= this.establish();
    return this.established;
  }

  get tunnel(): ProcessHandle | undefined {
    return this.handle;
  }

  /**
   * Initial admin password, read on first use
   */
  async adminPassword(): Promise<string | undefined> {
    if (this.password === undefined) {
      try {
        this.password = await this.cluster.readSecretValue(
          this.options.namespace,
          CONTROL_PLANE.adminSecret,
          'password',
        );
      } catch (error) {
        this.logger.warn({ error: errorMessage(error) }, 'Admin password unreadable');
      }
    }
    return this.password;
  }

  private async establish(): Promise<boolean> {
    const { namespace, tunnel } = this.options;

    this.reporter.info('Waiting for ArgoCD server to be ready...');
    const intervalMs = TIMINGS.installPollIntervalMs;
    const ready = await pollUntil(
      () => this.cluster.isDeploymentAvailable(namespace, CONTROL_PLANE.serverDeployment),
      {
        intervalMs,
        maxAttempts: Math.floor((TIMINGS.serverReadyTimeoutSeconds * 1000) / intervalMs) + 1,
        clock: this.clock,
        logger: this.logger,
        label: 'argocd-server',
      },
    );
    if (ready.status === 'exhausted') {
      this.reporter.warn('ArgoCD server not ready, but continuing...');
    }

    const started = await this.tunnels.start(tunnel, { attempts: 3 });
    if (!started.ok) {
      return false;
    }
    this.handle = started.value;

    const password = await this.adminPassword();
    const server = `localhost:${tunnel.localPort}`;
    if (password === undefined) {
      this.reporter.warn(
        `Initial admin secret ${CONTROL_PLANE.adminSecret} not found; log in manually: argocd login ${server} --insecure`,
      );
      return false;
    }

    this.reporter.success(
      `ArgoCD accessible at: https://${server} (${CONTROL_PLANE.adminUser}/${password})`,
    );

    try {
      const login = await this.cli.login(server, CONTROL_PLANE.adminUser, password);
      if (!login.ok) {
        this.reporter.warn(`argocd login failed: ${login.error}`);
        return false;
      }
    } catch (error) {
      this.reporter.warn(`argocd login failed: ${errorMessage(error)}`);
      return false;
    }
    return true;
  }
}
