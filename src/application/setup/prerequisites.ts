/**
 * Prerequisite Checker
 *
 * Runs every check before any mutating step and stops at the first failure.
 */

import type { Logger } from 'pino';
import type { ContainerRuntime } from '../../config/app-config';
import { PrerequisiteError } from '../../errors';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';

export interface RequiredTool {
  command: string;
  label: string;
  install?: string;
}

export interface ToolLocator {
  isAvailable(command: string): Promise<boolean>;
}

/**
 * Executables the setup drives, in the order they are checked
 */
export function requiredTools(runtime: ContainerRuntime): RequiredTool[] {
  return [
    { command: 'kubectl', label: 'kubectl', install: 'brew install kubectl' },
    { command: 'argocd', label: 'ArgoCD CLI', install: 'brew install argocd' },
    { command: 'helm', label: 'Helm', install: 'brew install helm' },
    { command: 'kind', label: 'Kind', install: 'brew install kind' },
    {
      command: runtime,
      label: runtime === 'podman' ? 'Podman' : 'Docker',
      install: runtime === 'podman' ? 'brew install podman' : undefined,
    },
  ];
}

export class PrerequisiteChecker {
  private readonly logger: Logger;

  constructor(
    private readonly tools: ToolLocator,
    private readonly cluster: Pick<ClusterClient, 'ping'>,
    private readonly runtime: ContainerRuntime,
    private readonly reporter: Reporter,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'PrerequisiteChecker' });
  }

  async check(): Promise<void> {
    this.reporter.info('Checking prerequisites...');

    for (const tool of requiredTools(this.runtime)) {
      if (!(await this.tools.isAvailable(tool.command))) {
        this.logger.debug({ command: tool.command }, 'Required tool missing');
        throw new PrerequisiteError(
          tool.install ? `${tool.label} not found. Install with: ${tool.install}` : `${tool.label} not found`,
          tool.command,
          tool.install,
        );
      }
    }

    if (!(await this.cluster.ping())) {
      throw new PrerequisiteError(
        'Cannot connect to Kubernetes cluster',
        'cluster',
        'kubectl cluster-info',
      );
    }

    this.reporter.success('Prerequisites check passed');
  }
}
