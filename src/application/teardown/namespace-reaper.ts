/**
 * Namespace Reaper
 *
 * Removal ladder: graceful delete, then finalizer strip, then zero-grace force
 * delete. Each rung has its own outcome; only a namespace that is still present
 * after the final confirmation poll counts as a failure, and even that is
 * reported rather than thrown.
 */

import type { Logger } from 'pino';
import { TIMINGS } from '../../config/defaults';
import { PartialTeardownFailure, errorMessage } from '../../errors';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';
import { pollUntil, systemClock, type Clock } from '../utils/async-utils';

export type ReapRung = 'absent' | 'graceful' | 'escalated';

export interface ReapOutcome {
  namespace: string;
  rung: ReapRung;
  gone: boolean;
  /** Problems met on the way, already reported as warnings */
  failures: PartialTeardownFailure[];
}

export class NamespaceReaper {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly cluster: Pick<
      ClusterClient,
      'namespaceExists' | 'deleteNamespace' | 'stripNamespaceFinalizers' | 'forceDeleteNamespace'
    >,
    private readonly reporter: Reporter,
    logger: Logger,
    clock?: Clock,
  ) {
    this.logger = logger.child({ component: 'NamespaceReaper' });
    this.clock = clock ?? systemClock;
  }

  async reap(namespace: string): Promise<ReapOutcome> {
    const failures: PartialTeardownFailure[] = [];
    const warn = (failure: PartialTeardownFailure): void => {
      failures.push(failure);
      this.reporter.warn(failure.message);
    };

    this.reporter.info(`Deleting namespace ${namespace}...`);

    try {
      if (!(await this.cluster.deleteNamespace(namespace))) {
        this.reporter.info(`Namespace ${namespace} already absent`);
        return { namespace, rung: 'absent', gone: true, failures };
      }
      if (await this.waitGone(namespace, TIMINGS.namespaceGraceful)) {
        this.reporter.success(`Namespace ${namespace} deleted`);
        return { namespace, rung: 'graceful', gone: true, failures };
      }
      warn(
        new PartialTeardownFailure(
          'Namespace deletion timed out, forcing cleanup...',
          namespace,
          'graceful',
        ),
      );
    } catch (error) {
      warn(
        new PartialTeardownFailure(
          `Namespace deletion failed (${errorMessage(error)}), forcing cleanup...`,
          namespace,
          'graceful',
        ),
      );
    }

    try {
      await this.cluster.stripNamespaceFinalizers(namespace);
    } catch (error) {
      warn(
        new PartialTeardownFailure(
          `Could not remove finalizers from ${namespace}: ${errorMessage(error)}`,
          namespace,
          'strip-finalizers',
        ),
      );
    }

    try {
      await this.cluster.forceDeleteNamespace(namespace);
    } catch (error) {
      warn(
        new PartialTeardownFailure(
          `Force delete of ${namespace} failed: ${errorMessage(error)}`,
          namespace,
          'force',
        ),
      );
    }

    this.reporter.info(`Waiting for namespace ${namespace} to be fully deleted...`);
    const gone = await this.waitGone(namespace, TIMINGS.namespaceGone);
    if (gone) {
      this.reporter.success(`Namespace ${namespace} deleted`);
    } else {
      warn(
        new PartialTeardownFailure(
          `Namespace ${namespace} still exists after cleanup attempts`,
          namespace,
          'confirm-gone',
          `kubectl get namespace ${namespace} -o yaml`,
        ),
      );
      this.reporter.info(`Inspect it with: kubectl get namespace ${namespace} -o yaml`);
    }

    this.logger.debug({ namespace, gone, failures: failures.length }, 'Namespace reaped');
    return { namespace, rung: 'escalated', gone, failures };
  }

  private async waitGone(
    namespace: string,
    budget: { intervalMs: number; maxAttempts: number },
  ): Promise<boolean> {
    const result = await pollUntil(async () => !(await this.cluster.namespaceExists(namespace)), {
      ...budget,
      clock: this.clock,
      logger: this.logger,
      label: `namespace-gone-${namespace}`,
    });
    return result.status === 'ready';
  }
}
