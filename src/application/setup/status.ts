/**
 * `--status`: tunnel liveness from the PID files, plus one readiness probe of the UI.
 */

import { PROBE_PATHS, TIMINGS } from '../../config/defaults';
import type { HttpProber } from '../../infrastructure/http/prober';
import type { Reporter } from '../../lib/reporter';
import {
  manualCommand,
  tunnelUrl,
  type KnownTunnels,
  type PortForwardManager,
  type TunnelStatus,
} from './port-forward';

export interface StatusReport {
  tunnels: TunnelStatus[];
  uiResponding: boolean;
}

export async function reportStatus(
  tunnels: KnownTunnels,
  manager: Pick<PortForwardManager, 'status'>,
  prober: HttpProber,
  reporter: Reporter,
): Promise<StatusReport> {
  reporter.info('Port-forward status:');

  const statuses: TunnelStatus[] = [];
  for (const spec of [tunnels.argocd, tunnels.kagentUi]) {
    const status = await manager.status(spec);
    statuses.push(status);
    if (status.pid === undefined) {
      reporter.warn(`${spec.label} port-forward not running (no PID file)`);
    } else if (status.alive) {
      reporter.success(`${spec.label} port-forward running (PID: ${status.pid}) at ${tunnelUrl(spec)}`);
    } else {
      reporter.warn(`${spec.label} port-forward not running (stale PID: ${status.pid})`);
    }
  }

  let uiResponding = false;
  const ui = statuses.find((s) => s.spec.id === tunnels.kagentUi.id);
  if (ui?.alive) {
    const base = tunnelUrl(tunnels.kagentUi);
    for (const path of PROBE_PATHS) {
      if (await prober.probe(`${base}${path}`, TIMINGS.portForwardProbe)) {
        uiResponding = true;
        break;
      }
    }
    if (uiResponding) {
      reporter.success(`${tunnels.kagentUi.label} is responding at: ${base}`);
    } else {
      reporter.warn(`${tunnels.kagentUi.label} port-forward is running but not responding at: ${base}`);
    }
  }

  reporter.line();
  reporter.info('Manual port-forward commands:');
  for (const spec of [tunnels.argocd, tunnels.kagentUi]) {
    reporter.line(`   ${spec.label}: ${manualCommand(spec)}`);
  }

  return { tunnels: statuses, uiResponding };
}
