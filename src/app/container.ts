/**
 * Dependency Injection Container
 *
 * Builds every collaborator once from the loaded configuration. Tests pass
 * overrides for the infrastructure pieces and get real application steps wired
 * to fakes.
 */

import type { Logger } from 'pino';
import { exportedEnvironment, type AppConfig } from '../config/app-config';
import { systemClock, type Clock } from '../application/utils/async-utils';
import {
  PortForwardManager,
  knownTunnels,
  type KnownTunnels,
} from '../application/setup/port-forward';
import { ArgoCdCli, type GitOpsCli } from '../infrastructure/argocd/cli';
import { CommandExecutor, type CommandRunner } from '../infrastructure/command-executor';
import { FetchHttpProber, type HttpProber } from '../infrastructure/http/prober';
import { KindNodeRuntime, type NodeRuntime } from '../infrastructure/kind/node-runtime';
import {
  createKubernetesClient,
  type ClusterClient,
} from '../infrastructure/kubernetes/client';
import { FilePidStore, type PidStore } from '../infrastructure/process/pid-store';
import { NodeProcessTable, type ProcessTable } from '../infrastructure/process/process-table';
import { InquirerPrompt, type Prompt } from '../infrastructure/prompt';
import { createLogger } from '../lib/logger';
import { ConsoleReporter, type Reporter } from '../lib/reporter';

/**
 * Collaborators shared by setup, teardown and status
 */
export interface TunnelDeps {
  logger: Logger;
  reporter: Reporter;
  clock: Clock;
  runner: CommandRunner;
  processes: ProcessTable;
  pids: PidStore;
  prober: HttpProber;
  tunnels: KnownTunnels;
  portForwards: PortForwardManager;
}

/**
 * All application dependencies with their types
 */
export interface Deps extends TunnelDeps {
  config: AppConfig;
  cluster: ClusterClient;
  gitops: GitOpsCli;
  nodes: NodeRuntime;
  prompt: Prompt;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Omit<Deps, 'config' | 'tunnels' | 'portForwards'>>;

export interface TunnelScope {
  argocdNamespace: string;
  kagentNamespace: string;
  stateDir: string;
  logLevel?: string;
  env?: Record<string, string>;
}

/**
 * Tunnel bookkeeping only; needs no credentials
 */
export function createTunnelDeps(scope: TunnelScope, overrides: DepsOverrides = {}): TunnelDeps {
  const logger = overrides.logger ?? createLogger({ level: scope.logLevel ?? 'warn' });
  const reporter = overrides.reporter ?? new ConsoleReporter();
  const clock = overrides.clock ?? systemClock;
  const runner = overrides.runner ?? new CommandExecutor(logger, scope.env);
  const processes = overrides.processes ?? new NodeProcessTable(runner, logger, scope.env);
  const pids = overrides.pids ?? new FilePidStore(scope.stateDir);
  const prober = overrides.prober ?? new FetchHttpProber();
  const tunnels = knownTunnels(scope.argocdNamespace, scope.kagentNamespace, scope.stateDir);

  const portForwards = new PortForwardManager({ processes, pids, prober, reporter, logger, clock }, [
    tunnels.argocd,
    tunnels.kagentUi,
  ]);

  return { logger, reporter, clock, runner, processes, pids, prober, tunnels, portForwards };
}

/**
 * Create the application container from loaded configuration
 */
export function createContainer(config: AppConfig, overrides: DepsOverrides = {}): Deps {
  const env = exportedEnvironment(config);
  const base = createTunnelDeps(
    {
      argocdNamespace: config.argocdNamespace,
      kagentNamespace: config.kagentNamespace,
      stateDir: config.stateDir,
      logLevel: config.logLevel,
      env,
    },
    overrides,
  );
  const { logger, runner } = base;

  return {
    ...base,
    config,
    cluster: overrides.cluster ?? createKubernetesClient(logger, runner),
    gitops: overrides.gitops ?? new ArgoCdCli(runner, logger),
    nodes: overrides.nodes ?? new KindNodeRuntime(runner, config.containerRuntime, logger),
    prompt: overrides.prompt ?? new InquirerPrompt(),
  };
}
