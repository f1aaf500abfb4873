/**
 * Reconciliation Waiter & Syncer
 *
 * Each application moves through pending, visible, operation-settled and
 * sync-attempted on its own. Sync failures degrade to warnings so one
 * application never blocks the next; an application that never appears is fatal
 * for the whole step.
 */

import type { Logger } from 'pino';
import { TIMINGS } from '../../config/defaults';
import { ApplicationNotFoundError, SyncExhaustedError } from '../../errors';
import type { GitOpsCli } from '../../infrastructure/argocd/cli';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';
import { pollUntil, systemClock, type Clock } from '../utils/async-utils';
import type { ApiAccess } from './api-access';

/** Phases in which a new sync may be issued */
const SETTLED_PHASES = new Set(['Succeeded', 'Unknown', '']);

export type SyncOutcome = 'synced' | 'sync-exhausted' | 'skipped';

export interface ApplicationOutcome {
  name: string;
  outcome: SyncOutcome;
  /** Whether the in-flight operation settled before the sync was issued */
  settled: boolean;
  syncAttempts: number;
}

export interface ReconciliationOptions {
  namespace: string;
  clock?: Clock;
}

export class ReconciliationWaiter {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'getApplication'>,
    private readonly cli: Pick<GitOpsCli, 'operationPhase' | 'sync'>,
    private readonly access: ApiAccess,
    private readonly reporter: Reporter,
    private readonly options: ReconciliationOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ReconciliationWaiter' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Settle every application in order. Each outcome is appended to `outcomes` as
   * soon as it is known, so the caller keeps them when a later application throws.
   *
   * @throws ApplicationNotFoundError when an application never becomes visible
   */
  async settle(
    appNames: readonly string[],
    outcomes: ApplicationOutcome[] = [],
  ): Promise<ApplicationOutcome[]> {
    for (const [index, name] of appNames.entries()) {
      await this.waitVisible(name);

      if (!(await this.access.ensure())) {
        this.reporter.warn(`ArgoCD API not accessible, skipping sync of ${name}`);
        outcomes.push({ name, outcome: 'skipped', settled: false, syncAttempts: 0 });
      } else {
        const settled = await this.waitOperationSettled(name);
        outcomes.push({ name, settled, ...(await this.sync(name)) });
      }

      if (index < appNames.length - 1) {
        await this.clock.sleep(TIMINGS.betweenApplicationsMs);
      }
    }

    return outcomes;
  }

  private async waitVisible(name: string): Promise<void> {
    const { namespace } = this.options;
    const budget = TIMINGS.applicationVisible;

    this.reporter.info(`Waiting for application ${name} to be created...`);
    const visible = await pollUntil(
      async () => (await this.cluster.getApplication(namespace, name)) !== undefined,
      {
        intervalMs: budget.intervalMs,
        maxAttempts: budget.maxAttempts,
        clock: this.clock,
        logger: this.logger,
        label: `visible-${name}`,
        onAttempt: (attempt, max) => {
          if (attempt % budget.reportEvery === 0) {
            this.reporter.info(`Still waiting for application ${name}... (${attempt}/${max})`);
          }
        },
      },
    );

    if (visible.status === 'exhausted') {
      throw new ApplicationNotFoundError(name, namespace, visible.attempts);
    }
    this.reporter.success(`Application ${name} found`);
  }

  private async waitOperationSettled(name: string): Promise<boolean> {
    const budget = TIMINGS.operationSettle;

    const settled = await pollUntil(
      async () => {
        const phase = await this.cli.operationPhase(name);
        if (SETTLED_PHASES.has(phase)) return true;
        this.reporter.info(`Waiting for ongoing operation on ${name} to complete (${phase})...`);
        return false;
      },
      {
        intervalMs: budget.intervalMs,
        maxAttempts: budget.maxAttempts,
        clock: this.clock,
        logger: this.logger,
        label: `operation-${name}`,
      },
    );

    if (settled.status === 'exhausted') {
      this.logger.warn({ app: name, attempts: settled.attempts }, 'Operation did not settle');
      this.reporter.warn(`Operation on ${name} still running, proceeding with sync anyway`);
      return false;
    }
    return true;
  }

  private async sync(name: string): Promise<Pick<ApplicationOutcome, 'outcome' | 'syncAttempts'>> {
    const budget = TIMINGS.sync;
    let lastFailure = '';

    this.reporter.info(`Syncing ${name}...`);
    const result = await pollUntil(
      async (attempt) => {
        const synced = await this.cli.sync(name, budget.timeoutSeconds);
        if (synced.ok) return true;
        lastFailure = synced.error;
        this.logger.debug({ app: name, attempt, error: synced.error }, 'Sync attempt failed');
        if (attempt < budget.maxAttempts) {
          this.reporter.warn(
            `Sync attempt ${attempt} for ${name} failed, retrying in ${budget.intervalMs / 1000} seconds...`,
          );
        }
        return false;
      },
      {
        intervalMs: budget.intervalMs,
        maxAttempts: budget.maxAttempts,
        clock: this.clock,
        logger: this.logger,
        label: `sync-${name}`,
      },
    );

    if (result.status === 'ready') {
      this.reporter.success(`${name} synced successfully`);
      return { outcome: 'synced', syncAttempts: result.attempts };
    }

    const failure = new SyncExhaustedError(
      name,
      result.attempts,
      lastFailure || result.lastError?.message || 'unknown error',
    );
    this.reporter.warn(failure.message);
    if (failure.remediation) this.reporter.info(`Retry manually: ${failure.remediation}`);
    return { outcome: 'sync-exhausted', syncAttempts: result.attempts };
  }
}
