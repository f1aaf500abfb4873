/**
 * Setup Pipeline
 *
 * Runs the setup steps strictly in sequence. Prerequisite and install failures
 * abort the run; failures of independent later steps are reported and the
 * remaining steps still run.
 */

import { APPLICATIONS } from '../config/defaults';
import type { Deps } from '../app/container';
import { ApplicationNotFoundError } from '../errors';
import { createTimer } from '../lib/logger';
import { ControlPlaneAccess } from './setup/api-access';
import { ApplicationDeployer } from './setup/applications';
import { CertificateReconciler, type CertificateOutcome } from './setup/certificates';
import { ControlPlaneInstaller } from './setup/control-plane';
import { installInterruptCleanup, type SignalSource } from './setup/interrupt';
import { PrerequisiteChecker } from './setup/prerequisites';
import { ReconciliationWaiter, type ApplicationOutcome } from './setup/reconciliation';
import { SecretProvisioner } from './setup/secrets';
import { SummaryPrinter } from './setup/summary';
import { UiExposer, type UiExposure } from './setup/ui-exposure';

export interface SetupOptions {
  /** Leave the control-plane installation alone */
  skipArgocd?: boolean;
  /** Allow the certificate step to reload the node container runtime */
  initial?: boolean;
}

export interface SetupReport {
  certificates: CertificateOutcome;
  installed: boolean;
  applications: ApplicationOutcome[];
  ui: UiExposure;
  /** Fatal problem of an independent step; the run still finished */
  reconciliationError?: ApplicationNotFoundError;
  exitCode: 0 | 1;
}

export interface PipelineHooks {
  signals?: SignalSource;
  exit?: (code: number) => void;
}

export class SetupPipeline {
  constructor(
    private readonly deps: Deps,
    private readonly hooks: PipelineHooks = {},
  ) {}

  async run(options: SetupOptions = {}): Promise<SetupReport> {
    const { deps } = this;
    const { config, logger, reporter, cluster, clock, portForwards, tunnels } = deps;

    const disposeInterrupt = installInterruptCleanup({
      stopAll: () => portForwards.stopAll(),
      reporter,
      logger,
      ...(this.hooks.signals && { signals: this.hooks.signals }),
      ...(this.hooks.exit && { exit: this.hooks.exit }),
    });

    try {
      reporter.info('Setting up Kagent with ArgoCD...');

      await this.step('prerequisites', () =>
        new PrerequisiteChecker(
          deps.runner,
          cluster,
          config.containerRuntime,
          reporter,
          logger,
        ).check(),
      );

      const certificates = await this.step('certificates', () =>
        new CertificateReconciler(
          cluster,
          deps.nodes,
          reporter,
          { clusterName: config.clusterName, caBundlePath: config.caBundlePath, clock },
          logger,
        ).reconcile(options.initial ?? false),
      );

      await this.step('secrets', () =>
        new SecretProvisioner(cluster, reporter, logger).provision(
          config.kagentNamespace,
          config.openaiApiKey,
        ),
      );

      let installed = false;
      if (options.skipArgocd) {
        reporter.info('Skipping ArgoCD installation');
      } else {
        installed = await this.step('control-plane', () =>
          new ControlPlaneInstaller(
            cluster,
            reporter,
            { namespace: config.argocdNamespace, clock },
            logger,
          ).ensureInstalled(),
        );
      }

      await this.step('applications', () =>
        new ApplicationDeployer(
          cluster,
          reporter,
          { manifestDir: config.manifestDir, clock },
          logger,
        ).deploy(),
      );

      const access = new ControlPlaneAccess(
        cluster,
        portForwards,
        deps.gitops,
        reporter,
        { namespace: config.argocdNamespace, tunnel: tunnels.argocd, clock },
        logger,
      );

      const applications: ApplicationOutcome[] = [];
      let reconciliationError: ApplicationNotFoundError | undefined;
      try {
        await this.step('reconciliation', () =>
          new ReconciliationWaiter(
            cluster,
            deps.gitops,
            access,
            reporter,
            { namespace: config.argocdNamespace, clock },
            logger,
          ).settle(APPLICATIONS, applications),
        );
      } catch (error) {
        if (!(error instanceof ApplicationNotFoundError)) throw error;
        reconciliationError = error;
        reporter.error(error.message);
        if (error.remediation) reporter.info(`Check with: ${error.remediation}`);
      }

      const ui = await this.step('ui', () =>
        new UiExposer(cluster, portForwards, reporter, tunnels.kagentUi, logger, clock).expose(),
      );

      await new SummaryPrinter(cluster, reporter, logger).print({
        argocdNamespace: config.argocdNamespace,
        kagentNamespace: config.kagentNamespace,
        tunnels,
        adminPassword: await access.adminPassword(),
        argocdTunnel: access.tunnel !== undefined,
        ui,
        outcomes: applications,
      });

      return {
        certificates,
        installed,
        applications,
        ui,
        ...(reconciliationError && { reconciliationError }),
        exitCode: reconciliationError ? 1 : 0,
      };
    } finally {
      disposeInterrupt();
    }
  }

  private async step<T>(name: string, action: () => Promise<T>): Promise<T> {
    const timer = createTimer(this.deps.logger, name);
    try {
      const result = await action();
      timer.end();
      return result;
    } catch (error) {
      timer.error(error);
      throw error;
    }
  }
}
