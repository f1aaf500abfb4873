/**
 * Summary and Status Report Tests
 */

import { describe, it, expect } from '@jest/globals';
import { PortForwardManager, knownTunnels } from '../../../../src/application/setup/port-forward';
import { reportStatus } from '../../../../src/application/setup/status';
import { SummaryPrinter, formatApplicationTable } from '../../../../src/application/setup/summary';
import { createSilentLogger } from '../../../../src/lib/logger';
import {
  FakeProcessTable,
  MemoryPidStore,
  RecordingReporter,
  ScriptedProber,
  createClusterState,
  createFakeCluster,
} from '../../../__support__/utilities/fakes';

const tunnels = knownTunnels('argocd', 'kagent', '/state');

describe('formatApplicationTable', () => {
  it('should align columns', () => {
    const rows = formatApplicationTable(
      [
        { name: 'kagent', syncStatus: 'Synced', healthStatus: 'Healthy' },
        { name: 'mcp-sqlite-vec', syncStatus: 'OutOfSync', healthStatus: 'Progressing' },
      ],
      [{ name: 'kagent', outcome: 'synced', settled: true, syncAttempts: 1 }],
    );

    expect(rows).toEqual([
      'NAME             SYNC STATUS   HEALTH STATUS   SETUP',
      'kagent           Synced        Healthy         synced',
      'mcp-sqlite-vec   OutOfSync     Progressing     -',
    ]);
  });
});

describe('SummaryPrinter', () => {
  it('should print access details, applications and degraded outcomes', async () => {
    const state = createClusterState();
    state.applications.set('kagent', {
      name: 'kagent',
      syncStatus: 'Synced',
      healthStatus: 'Healthy',
    });
    const reporter = new RecordingReporter();

    await new SummaryPrinter(createFakeCluster(state), reporter, createSilentLogger()).print({
      argocdNamespace: 'argocd',
      kagentNamespace: 'kagent',
      tunnels,
      adminPassword: 'test-password',
      argocdTunnel: true,
      ui: 'not-ready',
      outcomes: [{ name: 'kagent', outcome: 'sync-exhausted', settled: true, syncAttempts: 3 }],
    });

    const lines = reporter.messages('line');
    expect(lines).toContain('   ArgoCD UI:  https://localhost:8080');
    expect(lines).toContain('   Password:   test-password');
    expect(lines).toContain(
      '   Kagent UI:  not forwarded (kubectl port-forward svc/kagent-ui -n kagent 8090:80)',
    );
    expect(lines).toContain('   kagent   Synced        Healthy         sync-exhausted');
    expect(reporter.messages('warn')).toEqual(['Not fully synced: kagent (sync-exhausted)']);
  });
});

describe('reportStatus', () => {
  it('should report liveness from PID files and probe the UI once', async () => {
    const processes = new FakeProcessTable();
    const pids = new MemoryPidStore();
    const prober = new ScriptedProber([false, true]);
    const reporter = new RecordingReporter();
    const manager = new PortForwardManager(
      { processes, pids, prober, reporter, logger: createSilentLogger() },
      [tunnels.argocd, tunnels.kagentUi],
    );
    await pids.write('argocd', 77);
    await pids.write('kagent-ui', 78);
    processes.alive.add(78);

    const report = await reportStatus(tunnels, manager, prober, reporter);

    expect(report.tunnels.map((t) => [t.spec.id, t.pid, t.alive])).toEqual([
      ['argocd', 77, false],
      ['kagent-ui', 78, true],
    ]);
    expect(report.uiResponding).toBe(true);
    expect(prober.urls).toEqual(['http://localhost:8090/health', 'http://localhost:8090/api/health']);
    expect(reporter.messages('warn')).toEqual(['ArgoCD port-forward not running (stale PID: 77)']);
    expect(reporter.messages('success')).toEqual([
      'Kagent UI port-forward running (PID: 78) at http://localhost:8090',
      'Kagent UI is responding at: http://localhost:8090',
    ]);
  });

  it('should not probe when no tunnel is running', async () => {
    const prober = new ScriptedProber();
    const reporter = new RecordingReporter();
    const manager = new PortForwardManager(
      {
        processes: new FakeProcessTable(),
        pids: new MemoryPidStore(),
        prober,
        reporter,
        logger: createSilentLogger(),
      },
      [],
    );

    const report = await reportStatus(tunnels, manager, prober, reporter);

    expect(report.uiResponding).toBe(false);
    expect(prober.urls).toEqual([]);
    expect(reporter.messages('line')).toContain(
      '   ArgoCD: kubectl port-forward svc/argocd-server -n argocd 8080:443',
    );
  });
});
