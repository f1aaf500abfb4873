/**
 * Final setup report
 */

import type { Logger } from 'pino';
import { CONTROL_PLANE } from '../../config/defaults';
import { errorMessage } from '../../errors';
import type { ApplicationSummary, ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';
import { manualCommand, tunnelUrl, type KnownTunnels } from './port-forward';
import type { ApplicationOutcome } from './reconciliation';
import type { UiExposure } from './ui-exposure';

export interface SetupSummary {
  argocdNamespace: string;
  kagentNamespace: string;
  tunnels: KnownTunnels;
  adminPassword?: string;
  argocdTunnel: boolean;
  ui: UiExposure;
  outcomes: ApplicationOutcome[];
}

/**
 * Render application rows as fixed-width columns
 */
export function formatApplicationTable(
  apps: ApplicationSummary[],
  outcomes: ApplicationOutcome[] = [],
): string[] {
  const rows = apps.map((app) => [
    app.name,
    app.syncStatus,
    app.healthStatus,
    outcomes.find((o) => o.name === app.name)?.outcome ?? '-',
  ]);
  const header = ['NAME', 'SYNC STATUS', 'HEALTH STATUS', 'SETUP'];
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column]?.length ?? 0)),
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join('   ')
      .trimEnd();
  return [render(header), ...rows.map(render)];
}

export class SummaryPrinter {
  private readonly logger: Logger;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'listApplications'>,
    private readonly reporter: Reporter,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'SummaryPrinter' });
  }

  async print(summary: SetupSummary): Promise<void> {
    const { reporter } = this;
    const { argocd, kagentUi } = summary.tunnels;

    reporter.line();
    reporter.success('Setup complete!');
    reporter.line();
    reporter.line('📋 Access Information:');
    if (summary.argocdTunnel) {
      reporter.line(`   ArgoCD UI:  ${tunnelUrl(argocd)}`);
    } else {
      reporter.line(`   ArgoCD UI:  not forwarded (${manualCommand(argocd)})`);
    }
    reporter.line(`   Username:   ${CONTROL_PLANE.adminUser}`);
    reporter.line(`   Password:   ${summary.adminPassword ?? '<unavailable>'}`);
    if (summary.ui === 'responding' || summary.ui === 'unresponsive') {
      reporter.line(`   Kagent UI:  ${tunnelUrl(kagentUi)}`);
    } else {
      reporter.line(`   Kagent UI:  not forwarded (${manualCommand(kagentUi)})`);
    }

    reporter.line();
    reporter.line('📦 ArgoCD Applications:');
    let apps: ApplicationSummary[] = [];
    try {
      apps = await this.cluster.listApplications(summary.argocdNamespace);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Could not list applications');
    }
    if (apps.length === 0) {
      reporter.line('   (none found)');
    } else {
      for (const row of formatApplicationTable(apps, summary.outcomes)) {
        reporter.line(`   ${row}`);
      }
    }

    const degraded = summary.outcomes.filter((o) => o.outcome !== 'synced');
    if (degraded.length > 0) {
      reporter.line();
      reporter.warn(
        `Not fully synced: ${degraded.map((o) => `${o.name} (${o.outcome})`).join(', ')}`,
      );
    }

    reporter.line();
    reporter.line('🎯 Next Steps:');
    reporter.line(`   1. Open ${tunnelUrl(kagentUi)} to chat with your agents`);
    reporter.line(`   2. Watch deployments in ArgoCD at ${tunnelUrl(argocd)}`);
    reporter.line('   3. Commit changes to the descriptors and let ArgoCD reconcile them');
    reporter.line();
    reporter.line('🔧 Helpful Commands:');
    reporter.line(`   kubectl get applications -n ${summary.argocdNamespace}`);
    reporter.line(`   kubectl get pods -n ${summary.kagentNamespace}`);
    reporter.line('   argocd app list');
    reporter.line('   kagent-setup --status');
    reporter.line('   kagent-setup --teardown');
  }
}
