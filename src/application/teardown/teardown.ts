/**
 * Teardown Orchestrator
 *
 * Removes the workload and nothing else: the control plane, the cluster and
 * pulled images stay. Nothing is deleted without an explicit `y`.
 */

import type { Logger } from 'pino';
import { APPLICATIONS, CONTROL_PLANE, SECRETS, TIMINGS } from '../../config/defaults';
import { errorMessage } from '../../errors';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { PidStore } from '../../infrastructure/process/pid-store';
import type { Prompt } from '../../infrastructure/prompt';
import type { Reporter } from '../../lib/reporter';
import type { PortForwardManager } from '../setup/port-forward';
import { systemClock, type Clock } from '../utils/async-utils';
import type { NamespaceReaper, ReapOutcome } from './namespace-reaper';

export const CONFIRMATION_QUESTION = '❓ Are you sure you want to proceed? (y/N): ';

const AFFIRMATIVE = /^[Yy]$/;

export interface TeardownInventory {
  applications: string[];
  namespacePresent: boolean;
  projectPresent: boolean;
}

export type TeardownResult =
  | { status: 'cancelled' }
  | { status: 'completed'; inventory: TeardownInventory; namespace: ReapOutcome };

export interface TeardownOptions {
  argocdNamespace: string;
  kagentNamespace: string;
  applications?: readonly string[];
  clock?: Clock;
}

export interface TeardownDeps {
  cluster: Pick<
    ClusterClient,
    | 'listApplications'
    | 'namespaceExists'
    | 'appProjectExists'
    | 'deleteApplication'
    | 'deleteSecret'
    | 'deleteAppProject'
  >;
  reaper: Pick<NamespaceReaper, 'reap'>;
  tunnels: Pick<PortForwardManager, 'stopAll'>;
  pids: PidStore;
  prompt: Prompt;
  reporter: Reporter;
  logger: Logger;
}

export class TeardownOrchestrator {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly applications: readonly string[];

  constructor(
    private readonly deps: TeardownDeps,
    private readonly options: TeardownOptions,
  ) {
    this.logger = deps.logger.child({ component: 'TeardownOrchestrator' });
    this.clock = options.clock ?? systemClock;
    this.applications = options.applications ?? APPLICATIONS;
  }

  async inventory(): Promise<TeardownInventory> {
    const { cluster } = this.deps;
    const { argocdNamespace, kagentNamespace } = this.options;

    let present: string[] = [];
    try {
      present = (await cluster.listApplications(argocdNamespace))
        .map((app) => app.name)
        .filter((name) => this.applications.includes(name));
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Could not list applications');
    }

    return {
      applications: present,
      namespacePresent: await cluster.namespaceExists(kagentNamespace),
      projectPresent: await cluster.appProjectExists(argocdNamespace, CONTROL_PLANE.projectName),
    };
  }

  async teardown(): Promise<TeardownResult> {
    const { reporter, prompt } = this.deps;
    const inventory = await this.inventory();

    this.printInventory(inventory);
    const answer = await prompt.ask(CONFIRMATION_QUESTION);
    if (!AFFIRMATIVE.test(answer.trim())) {
      reporter.info('Teardown cancelled');
      return { status: 'cancelled' };
    }

    reporter.info('Starting teardown...');
    const namespace = await this.removeWorkload();
    this.printRemoved();
    return { status: 'completed', inventory, namespace };
  }

  private async removeWorkload(): Promise<ReapOutcome> {
    const { cluster, reaper, tunnels, pids, reporter } = this.deps;
    const { argocdNamespace, kagentNamespace } = this.options;

    reporter.info('Stopping port-forwards...');
    await tunnels.stopAll();

    reporter.info('Deleting ArgoCD applications...');
    for (const name of this.applications) {
      if (await cluster.deleteApplication(argocdNamespace, name)) {
        reporter.success(`Application ${name} deleted`);
      }
    }
    await this.clock.sleep(TIMINGS.applicationDeletePauseMs);

    const outcome = await reaper.reap(kagentNamespace);

    reporter.info('Cleaning up remaining resources...');
    for (const secret of [SECRETS.platform, SECRETS.tools]) {
      await cluster.deleteSecret(kagentNamespace, secret);
    }
    if (await cluster.deleteAppProject(argocdNamespace, CONTROL_PLANE.projectName)) {
      reporter.success(`AppProject ${CONTROL_PLANE.projectName} deleted`);
    }

    for (const id of await pids.list()) {
      await pids.remove(id);
    }

    return outcome;
  }

  private printInventory(inventory: TeardownInventory): void {
    const { reporter } = this.deps;
    const { argocdNamespace, kagentNamespace } = this.options;

    reporter.warn('This will remove the following resources:');
    if (inventory.applications.length > 0) {
      reporter.line(`   • ArgoCD applications: ${inventory.applications.join(', ')}`);
    } else {
      reporter.line('   • ArgoCD applications: (none found)');
    }
    reporter.line(
      `   • Namespace ${kagentNamespace}${inventory.namespacePresent ? '' : ' (not present)'} and everything in it`,
    );
    reporter.line(`   • Secrets ${SECRETS.platform} and ${SECRETS.tools}`);
    reporter.line(
      `   • AppProject ${CONTROL_PLANE.projectName} in ${argocdNamespace}${inventory.projectPresent ? '' : ' (not present)'}`,
    );
    reporter.line('   • Port-forward processes and their PID files');
    reporter.line();
  }

  private printRemoved(): void {
    const { reporter } = this.deps;
    reporter.line();
    reporter.success('Teardown complete!');
    reporter.line();
    reporter.line('Removed:');
    reporter.line(`   • Applications: ${this.applications.join(', ')}`);
    reporter.line(`   • ${this.options.kagentNamespace} namespace and secrets`);
    reporter.line(`   • AppProject ${CONTROL_PLANE.projectName}`);
    reporter.line('   • Port-forward processes');
    reporter.line();
    reporter.line('Preserved:');
    reporter.line('   • ArgoCD installation');
    reporter.line('   • Kind cluster');
    reporter.line('   • Downloaded container images');
  }
}
