/**
 * Teardown Orchestrator Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { NamespaceReaper } from '../../../../src/application/teardown/namespace-reaper';
import {
  CONFIRMATION_QUESTION,
  TeardownOrchestrator,
} from '../../../../src/application/teardown/teardown';
import { createSilentLogger } from '../../../../src/lib/logger';
import {
  FakeClock,
  MemoryPidStore,
  RecordingReporter,
  ScriptedPrompt,
  createClusterState,
  createFakeCluster,
} from '../../../__support__/utilities/fakes';

function setup(answer: string) {
  const state = createClusterState({
    namespaces: new Set(['argocd', 'kagent']),
    projects: new Set(['kagent']),
  });
  state.applications.set('kagent', { name: 'kagent', syncStatus: 'Synced', healthStatus: 'Healthy' });
  state.applications.set('mcp-sqlite-vec', {
    name: 'mcp-sqlite-vec',
    syncStatus: 'Synced',
    healthStatus: 'Healthy',
  });
  state.applications.set('guestbook', { name: 'guestbook', syncStatus: 'Synced', healthStatus: 'Healthy' });
  state.secrets.set('kagent/kagent-openai', { OPENAI_API_KEY: 'test-secret' });
  state.secrets.set('kagent/mcp-secrets', { OPENAI_API_KEY: 'test-secret' });

  const cluster = createFakeCluster(state);
  const clock = new FakeClock();
  const reporter = new RecordingReporter();
  const logger = createSilentLogger();
  const pids = new MemoryPidStore();
  const stopAll = jest.fn(async () => {});
  const prompt = new ScriptedPrompt([answer]);
  const orchestrator = new TeardownOrchestrator(
    {
      cluster,
      reaper: new NamespaceReaper(cluster, reporter, logger, clock),
      tunnels: { stopAll },
      pids,
      prompt,
      reporter,
      logger,
    },
    { argocdNamespace: 'argocd', kagentNamespace: 'kagent', clock },
  );
  return { state, cluster, clock, reporter, pids, stopAll, prompt, orchestrator };
}

describe('TeardownOrchestrator', () => {
  it.each(['', 'n', 'N', 'yes', 'yy', 'no', ' y y'])(
    'should delete nothing when the answer is %p',
    async (answer) => {
      const { cluster, stopAll, orchestrator } = setup(answer);

      const result = await orchestrator.teardown();

      expect(result).toEqual({ status: 'cancelled' });
      expect(stopAll).not.toHaveBeenCalled();
      expect(cluster.deleteApplication).not.toHaveBeenCalled();
      expect(cluster.deleteNamespace).not.toHaveBeenCalled();
      expect(cluster.deleteSecret).not.toHaveBeenCalled();
      expect(cluster.deleteAppProject).not.toHaveBeenCalled();
    },
  );

  it('should print the inventory before asking', async () => {
    const { reporter, prompt, orchestrator } = setup('n');

    await orchestrator.teardown();

    expect(prompt.questions).toEqual([CONFIRMATION_QUESTION]);
    expect(reporter.messages('line')).toContain(
      '   • ArgoCD applications: kagent, mcp-sqlite-vec',
    );
    expect(reporter.messages('line')).toContain('   • Namespace kagent and everything in it');
  });

  it.each(['y', 'Y'])('should remove the workload on %p', async (answer) => {
    const { state, cluster, clock, pids, stopAll, orchestrator } = setup(answer);
    await pids.write('argocd', 101);

    const result = await orchestrator.teardown();

    expect(result.status).toBe('completed');
    expect(stopAll).toHaveBeenCalledTimes(1);
    expect(cluster.deleteApplication.mock.calls).toEqual([
      ['argocd', 'kagent'],
      ['argocd', 'mcp-sqlite-vec'],
    ]);
    expect(state.applications.has('guestbook')).toBe(true);
    expect(state.namespaces).toEqual(new Set(['argocd']));
    expect(state.secrets.size).toBe(0);
    expect(state.projects.size).toBe(0);
    expect(pids.pids.size).toBe(0);
    expect(clock.sleeps[0]).toBe(3000);
  });

  it('should stop tunnels before deleting anything and reap before deleting the project', async () => {
    const { cluster, stopAll, orchestrator } = setup('y');

    await orchestrator.teardown();

    const order = (calls: number[]): number => calls[0] ?? Number.NaN;
    expect(order(stopAll.mock.invocationCallOrder)).toBeLessThan(
      order(cluster.deleteApplication.mock.invocationCallOrder),
    );
    expect(order(cluster.deleteNamespace.mock.invocationCallOrder)).toBeLessThan(
      order(cluster.deleteAppProject.mock.invocationCallOrder),
    );
  });

  it('should be safe to run against an empty cluster', async () => {
    const { state, orchestrator } = setup('y');
    state.applications.clear();
    state.namespaces.clear();
    state.projects.clear();
    state.secrets.clear();

    await expect(orchestrator.teardown()).resolves.toMatchObject({ status: 'completed' });
  });
});
