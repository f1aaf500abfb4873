/**
 * Workload UI exposure: wait for the UI service to have endpoints, then tunnel it.
 */

import type { Logger } from 'pino';
import { TIMINGS } from '../../config/defaults';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';
import { pollUntil, systemClock, type Clock } from '../utils/async-utils';
import { manualCommand, tunnelUrl, type PortForwardManager, type TunnelSpec } from './port-forward';

export type UiExposure = 'responding' | 'unresponsive' | 'not-started' | 'not-ready';

export class UiExposer {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'serviceHasEndpoints'>,
    private readonly tunnels: Pick<PortForwardManager, 'start' | 'verify'>,
    private readonly reporter: Reporter,
    private readonly tunnel: TunnelSpec,
    logger: Logger,
    clock?: Clock,
  ) {
    this.logger = logger.child({ component: 'UiExposer' });
    this.clock = clock ?? systemClock;
  }

  async expose(): Promise<UiExposure> {
    const { tunnel, reporter } = this;
    const budget = TIMINGS.uiReady;

    reporter.info(`Waiting for ${tunnel.label} service to be ready...`);
    const ready = await pollUntil(
      () => this.cluster.serviceHasEndpoints(tunnel.namespace, tunnel.service),
      {
        intervalMs: budget.intervalMs,
        maxAttempts: budget.maxAttempts,
        clock: this.clock,
        logger: this.logger,
        label: 'ui-endpoints',
        onAttempt: (attempt, max) => {
          if (attempt % budget.reportEvery === 0) {
            reporter.info(`Still waiting for ${tunnel.label} service... (${attempt}/${max})`);
          }
        },
      },
    );

    if (ready.status === 'exhausted') {
      reporter.warn(`${tunnel.label} service not ready after ${ready.attempts} checks`);
      reporter.info(`Check with: kubectl get pods -n ${tunnel.namespace}`);
      reporter.info(`Then start manually: ${manualCommand(tunnel)}`);
      return 'not-ready';
    }
    reporter.success(`${tunnel.label} service is ready`);

    const started = await this.tunnels.start(tunnel, { attempts: 1 });
    if (!started.ok) {
      return 'not-started';
    }

    if (await this.tunnels.verify(started.value)) {
      return 'responding';
    }

    reporter.info(`Try accessing ${tunnelUrl(tunnel)} in a few moments`);
    if (tunnel.logFile) {
      reporter.info(`Check logs: tail -f ${tunnel.logFile}`);
    }
    return 'unresponsive';
  }
}
