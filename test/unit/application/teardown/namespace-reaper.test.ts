/**
 * Namespace Reaper Tests
 */

import { describe, it, expect } from '@jest/globals';
import { NamespaceReaper } from '../../../../src/application/teardown/namespace-reaper';
import { createSilentLogger } from '../../../../src/lib/logger';
import {
  FakeClock,
  RecordingReporter,
  createClusterState,
  createFakeCluster,
} from '../../../__support__/utilities/fakes';

function setup() {
  const state = createClusterState({ namespaces: new Set(['kagent']) });
  const cluster = createFakeCluster(state);
  const clock = new FakeClock();
  const reporter = new RecordingReporter();
  const reaper = new NamespaceReaper(cluster, reporter, createSilentLogger(), clock);
  return { state, cluster, clock, reporter, reaper };
}

describe('NamespaceReaper', () => {
  it('should stop after a graceful delete', async () => {
    const { cluster, reaper } = setup();

    const outcome = await reaper.reap('kagent');

    expect(outcome).toEqual({ namespace: 'kagent', rung: 'graceful', gone: true, failures: [] });
    expect(cluster.stripNamespaceFinalizers).not.toHaveBeenCalled();
    expect(cluster.forceDeleteNamespace).not.toHaveBeenCalled();
  });

  it('should report an absent namespace', async () => {
    const { state, cluster, reaper } = setup();
    state.namespaces.clear();

    const outcome = await reaper.reap('kagent');

    expect(outcome.rung).toBe('absent');
    expect(cluster.namespaceExists).not.toHaveBeenCalled();
  });

  it('should strip finalizers and then force delete when graceful deletion hangs', async () => {
    const { cluster, clock, reaper } = setup();
    // the namespace stays Terminating until the force delete
    cluster.deleteNamespace.mockResolvedValue(true);

    const outcome = await reaper.reap('kagent');

    const strip = cluster.stripNamespaceFinalizers.mock.invocationCallOrder[0];
    const force = cluster.forceDeleteNamespace.mock.invocationCallOrder[0];
    const lastGracefulCheck = cluster.namespaceExists.mock.invocationCallOrder[15];
    expect(strip).toBeDefined();
    expect(force).toBeDefined();
    expect(lastGracefulCheck).toBeLessThan(strip ?? 0);
    expect(strip).toBeLessThan(force ?? 0);
    expect(outcome.rung).toBe('escalated');
    expect(outcome.gone).toBe(true);
    expect(outcome.failures.map((f) => f.rung)).toEqual(['graceful']);
    // 15 pauses while waiting gracefully, none once the force delete landed
    expect(clock.sleeps).toEqual(Array<number>(15).fill(2000));
  });

  it('should escalate when the graceful delete call fails', async () => {
    const { cluster, reporter, reaper } = setup();
    cluster.deleteNamespace.mockRejectedValue(new Error('etcdserver: request timed out'));

    const outcome = await reaper.reap('kagent');

    expect(cluster.stripNamespaceFinalizers).toHaveBeenCalledWith('kagent');
    expect(cluster.forceDeleteNamespace).toHaveBeenCalledWith('kagent');
    expect(outcome.gone).toBe(true);
    expect(reporter.messages('warn')).toEqual([
      'Namespace deletion failed (etcdserver: request timed out), forcing cleanup...',
    ]);
  });

  it('should still force delete when stripping finalizers fails', async () => {
    const { cluster, reaper } = setup();
    cluster.deleteNamespace.mockResolvedValue(true);
    cluster.stripNamespaceFinalizers.mockRejectedValue(new Error('forbidden'));

    const outcome = await reaper.reap('kagent');

    expect(cluster.forceDeleteNamespace).toHaveBeenCalledTimes(1);
    expect(outcome.failures.map((f) => f.rung)).toEqual(['graceful', 'strip-finalizers']);
  });

  it('should report a namespace that never goes away without throwing', async () => {
    const { cluster, clock, reaper } = setup();
    cluster.deleteNamespace.mockResolvedValue(true);
    cluster.forceDeleteNamespace.mockResolvedValue(undefined);

    const outcome = await reaper.reap('kagent');

    expect(outcome.gone).toBe(false);
    expect(outcome.failures.map((f) => f.rung)).toEqual(['graceful', 'confirm-gone']);
    expect(cluster.namespaceExists).toHaveBeenCalledTimes(16 + 30);
    expect(clock.sleeps).toHaveLength(15 + 29);
  });
});
