/**
 * Certificate Reconciler
 *
 * Makes kind nodes trust a custom CA bundle. A live TLS probe from inside the
 * cluster decides whether any work is needed; nodes whose installed bundle
 * already matches are left untouched.
 */

import { existsSync } from 'node:fs';
import type { Logger } from 'pino';
import { CERTIFICATES, TIMINGS } from '../../config/defaults';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { NodeRuntime } from '../../infrastructure/kind/node-runtime';
import type { Reporter } from '../../lib/reporter';
import { errorMessage } from '../../errors';
import { pollUntil, systemClock, type Clock } from '../utils/async-utils';

export type CertificateOutcome =
  | { status: 'skipped'; reason: 'no-bundle' | 'already-trusted' }
  | { status: 'up-to-date'; nodes: string[] }
  | {
      status: 'updated';
      updatedNodes: string[];
      runtimeReloaded: boolean;
      clusterRecovered?: boolean;
    };

export interface CertificateReconcilerOptions {
  clusterName: string;
  caBundlePath: string;
  clock?: Clock;
  /** Existence check for the local bundle */
  fileExists?: (path: string) => boolean;
}

export class CertificateReconciler {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly fileExists: (path: string) => boolean;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'probeTls' | 'ping'>,
    private readonly nodes: NodeRuntime,
    private readonly reporter: Reporter,
    private readonly options: CertificateReconcilerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'CertificateReconciler' });
    this.clock = options.clock ?? systemClock;
    this.fileExists = options.fileExists ?? existsSync;
  }

  async reconcile(forceRestart: boolean): Promise<CertificateOutcome> {
    const bundle = this.options.caBundlePath;

    if (!bundle || !this.fileExists(bundle)) {
      this.reporter.info(
        `CA bundle not found at ${bundle || '(not configured)'} - skipping certificate fixes`,
      );
      this.reporter.info('To configure custom CA certificates, set CA_BUNDLE_PATH in your .env file');
      return { status: 'skipped', reason: 'no-bundle' };
    }

    if (await this.alreadyTrusted()) {
      this.reporter.info('TLS certificates are working - skipping certificate fixes');
      return { status: 'skipped', reason: 'already-trusted' };
    }

    this.reporter.info('Applying certificate fixes for Kind cluster...');
    this.reporter.info('Copying CA bundle to Kind nodes...');

    const nodes = await this.nodes.listNodes(this.options.clusterName);
    const updatedNodes: string[] = [];

    for (const node of nodes) {
      this.reporter.info(`Processing node: ${node}`);
      if (await this.nodes.bundleMatches(node, bundle, CERTIFICATES.nodeBundlePath)) {
        this.reporter.info(`Certificates already up to date on ${node}`);
        continue;
      }
      await this.nodes.copyBundle(node, bundle, CERTIFICATES.nodeBundlePath);
      await this.nodes.refreshTrustStore(node);
      updatedNodes.push(node);
    }

    if (updatedNodes.length === 0) {
      this.reporter.success('Certificate fixes not needed - already applied');
      return { status: 'up-to-date', nodes };
    }

    if (!forceRestart) {
      this.reporter.info(
        'Certificates updated but skipping containerd restart (use --initial to force restart)',
      );
      return { status: 'updated', updatedNodes, runtimeReloaded: false };
    }

    this.reporter.info('Restarting containerd on nodes with updated certificates (--initial setup)...');
    for (const node of updatedNodes) {
      await this.nodes.reloadContainerRuntime(node);
    }

    this.reporter.info('Waiting for containerd to be ready...');
    await this.clock.sleep(TIMINGS.runtimeReloadGraceMs);

    const recovery = await pollUntil(() => this.cluster.ping(), {
      ...TIMINGS.clusterRecovery,
      clock: this.clock,
      logger: this.logger,
      label: 'cluster-recovery',
    });

    if (recovery.status === 'exhausted') {
      this.reporter.warn(
        `Cluster not reachable after ${recovery.attempts} checks; continuing (check with: kubectl cluster-info)`,
      );
    }

    this.reporter.success('Certificate fixes applied');
    return {
      status: 'updated',
      updatedNodes,
      runtimeReloaded: true,
      clusterRecovered: recovery.status === 'ready',
    };
  }

  private async alreadyTrusted(): Promise<boolean> {
    try {
      const probe = await this.cluster.probeTls(
        CERTIFICATES.probeUrl,
        CERTIFICATES.probeImage,
        CERTIFICATES.probePod,
      );
      if (!probe.trusted) {
        // scheduling failures land here too; keep them visible
        this.logger.warn({ reason: probe.reason }, 'TLS probe did not succeed');
      }
      return probe.trusted;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'TLS probe could not run');
      return false;
    }
  }
}
