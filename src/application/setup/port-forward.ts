/**
 * Port-Forward Manager
 *
 * Tunnels are detached `kubectl port-forward` processes. Their PIDs live in
 * well-known files so a later invocation can find and stop them. A live process
 * is not a working tunnel: readiness is probed separately over HTTP.
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { CONTROL_PLANE, KAGENT_UI, PROBE_PATHS, TIMINGS } from '../../config/defaults';
import { Failure, Success, type Result } from '../../domain/types/result';
import { ProbeExhaustedError, errorMessage } from '../../errors';
import type { HttpProber } from '../../infrastructure/http/prober';
import type { PidStore } from '../../infrastructure/process/pid-store';
import type { ProcessTable } from '../../infrastructure/process/process-table';
import type { Reporter } from '../../lib/reporter';
import { pollUntil, systemClock, type Clock } from '../utils/async-utils';

export interface TunnelSpec {
  /** Well-known identifier; also names the PID file */
  id: string;
  label: string;
  service: string;
  namespace: string;
  localPort: number;
  remotePort: number;
  scheme: 'http' | 'https';
  logFile?: string;
}

export interface ProcessHandle {
  id: string;
  pid: number;
  spec: TunnelSpec;
}

export interface TunnelStatus {
  spec: TunnelSpec;
  pid?: number;
  alive: boolean;
}

export interface KnownTunnels {
  argocd: TunnelSpec;
  kagentUi: TunnelSpec;
}

export function knownTunnels(
  argocdNamespace: string,
  kagentNamespace: string,
  stateDir: string,
): KnownTunnels {
  return {
    argocd: {
      id: 'argocd',
      label: 'ArgoCD',
      service: CONTROL_PLANE.serverService,
      namespace: argocdNamespace,
      localPort: CONTROL_PLANE.localPort,
      remotePort: CONTROL_PLANE.remotePort,
      scheme: 'https',
    },
    kagentUi: {
      id: 'kagent-ui',
      label: 'Kagent UI',
      service: KAGENT_UI.service,
      namespace: kagentNamespace,
      localPort: KAGENT_UI.localPort,
      remotePort: KAGENT_UI.remotePort,
      scheme: 'http',
      logFile: join(stateDir, KAGENT_UI.logFile),
    },
  };
}

export const tunnelUrl = (spec: TunnelSpec): string => `${spec.scheme}://localhost:${spec.localPort}`;

export const manualCommand = (spec: TunnelSpec): string =>
  `kubectl port-forward svc/${spec.service} -n ${spec.namespace} ${spec.localPort}:${spec.remotePort}`;

export interface StartOptions {
  /** Launch attempts before giving up */
  attempts?: number;
}

export interface PortForwardManagerDeps {
  processes: ProcessTable;
  pids: PidStore;
  prober: HttpProber;
  reporter: Reporter;
  logger: Logger;
  clock?: Clock;
}

export class PortForwardManager {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly specs = new Map<string, TunnelSpec>();

  constructor(
    private readonly deps: PortForwardManagerDeps,
    specs: TunnelSpec[] = [],
  ) {
    this.logger = deps.logger.child({ component: 'PortForwardManager' });
    this.clock = deps.clock ?? systemClock;
    for (const spec of specs) this.specs.set(spec.id, spec);
  }

  /**
   * Replace any tunnel on the same local port with a fresh one
   */
  async start(spec: TunnelSpec, options: StartOptions = {}): Promise<Result<ProcessHandle>> {
    const { reporter } = this.deps;
    const attempts = options.attempts ?? 1;
    this.specs.set(spec.id, spec);

    reporter.info(`Starting ${spec.label} port-forward...`);
    await this.stop(spec.id, { removeLog: false });
    await this.clock.sleep(TIMINGS.portForwardSweepPauseMs);

    const started = await pollUntil(
      async (attempt) => {
        const handle = await this.launch(spec);
        if (handle) return handle;
        if (attempt < attempts) {
          reporter.warn(`Port-forward attempt ${attempt} failed, retrying...`);
        }
        return undefined;
      },
      {
        intervalMs: TIMINGS.portForwardRetryPauseMs,
        maxAttempts: attempts,
        clock: this.clock,
        logger: this.logger,
        label: `port-forward-${spec.id}`,
      },
    );

    if (started.status === 'ready') {
      reporter.success(`${spec.label} port-forward started (PID: ${started.value.pid})`);
      return Success(started.value);
    }

    reporter.warn(
      attempts > 1
        ? `${spec.label} port-forward failed to start after ${attempts} attempts`
        : `Failed to start ${spec.label} port-forward`,
    );
    reporter.info(`You can try manually: ${manualCommand(spec)}`);
    return Failure(`${spec.label} port-forward exited immediately`);
  }

  /**
   * Probe the tunnel over HTTP until any candidate path answers
   */
  async verify(handle: ProcessHandle): Promise<boolean> {
    const { reporter, prober } = this.deps;
    const { spec } = handle;
    const url = tunnelUrl(spec);
    const budget = TIMINGS.portForwardProbe;

    reporter.info(`Testing ${spec.label} connectivity...`);

    const result = await pollUntil(
      async () => {
        for (const path of PROBE_PATHS) {
          if (await prober.probe(`${url}${path}`, budget)) return true;
        }
        return false;
      },
      {
        intervalMs: budget.intervalMs,
        maxAttempts: budget.maxAttempts,
        clock: this.clock,
        onAttempt: (attempt, max) => {
          if (attempt < max) {
            reporter.info(
              `Attempt ${attempt}/${max} - ${spec.label} not responding yet, retrying in ${budget.intervalMs / 1000} seconds...`,
            );
          }
        },
      },
    );

    if (result.status === 'ready') {
      reporter.success(`${spec.label} is responding at: ${url}`);
      return true;
    }

    reporter.warn(new ProbeExhaustedError(spec.label, url, result.attempts).message);
    reporter.info('This might be normal if the service is still starting up.');
    return false;
  }

  /**
   * Stop the tunnel recorded under `id`. Absent PID files and dead processes are fine.
   */
  async stop(id: string, options: { removeLog?: boolean } = {}): Promise<boolean> {
    const { processes, pids } = this.deps;
    const spec = this.specs.get(id);
    let stopped = false;

    const pid = await pids.read(id);
    if (pid !== undefined) {
      try {
        stopped = processes.terminate(pid);
      } catch (error) {
        this.logger.warn({ id, pid, error: errorMessage(error) }, 'Could not terminate tunnel');
      }
    }

    if (spec) {
      await processes.terminateMatching(`port-forward.*${spec.localPort}`);
      if (spec.logFile && options.removeLog !== false) {
        await rm(spec.logFile, { force: true });
      }
    }

    await pids.remove(id);
    this.logger.debug({ id, pid, stopped }, 'Tunnel stopped');
    return stopped;
  }

  /**
   * Stop every known tunnel. PID files of other ids are never used to signal anything.
   */
  async stopAll(): Promise<void> {
    for (const id of this.specs.keys()) {
      await this.stop(id);
    }
  }

  async status(spec: TunnelSpec): Promise<TunnelStatus> {
    const pid = await this.deps.pids.read(spec.id);
    if (pid === undefined) return { spec, alive: false };
    return { spec, pid, alive: this.deps.processes.isAlive(pid) };
  }

  private async launch(spec: TunnelSpec): Promise<ProcessHandle | undefined> {
    const { processes, pids } = this.deps;
    let pid: number;
    try {
      pid = processes.spawnDetached(
        'kubectl',
        [
          'port-forward',
          `svc/${spec.service}`,
          '-n',
          spec.namespace,
          `${spec.localPort}:${spec.remotePort}`,
        ],
        spec.logFile ? { logFile: spec.logFile } : {},
      );
    } catch (error) {
      this.logger.warn({ id: spec.id, error: errorMessage(error) }, 'Tunnel launch failed');
      return undefined;
    }

    await pids.write(spec.id, pid);
    await this.clock.sleep(TIMINGS.portForwardStartGraceMs);

    if (processes.isAlive(pid)) {
      return { id: spec.id, pid, spec };
    }
    await pids.remove(spec.id);
    return undefined;
  }
}
