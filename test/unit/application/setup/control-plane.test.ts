/**
 * Control-Plane Installer Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ControlPlaneInstaller } from '../../../../src/application/setup/control-plane';
import { InstallTimeoutError } from '../../../../src/errors';
import { createSilentLogger } from '../../../../src/lib/logger';
import {
  FakeClock,
  RecordingReporter,
  createClusterState,
  createFakeCluster,
} from '../../../__support__/utilities/fakes';

const INSTALL_URL = 'https://raw.githubusercontent.com/argoproj/argo-cd/stable/manifests/install.yaml';

describe('ControlPlaneInstaller', () => {
  it('should do nothing when the namespace already exists', async () => {
    const cluster = createFakeCluster(createClusterState({ namespaces: new Set(['argocd']) }));
    const installer = new ControlPlaneInstaller(
      cluster,
      new RecordingReporter(),
      { namespace: 'argocd', clock: new FakeClock() },
      createSilentLogger(),
    );

    expect(await installer.ensureInstalled()).toBe(false);
    expect(cluster.applyManifest).not.toHaveBeenCalled();
  });

  it('should install and wait for the server deployment', async () => {
    const state = createClusterState();
    const cluster = createFakeCluster(state);
    cluster.isDeploymentAvailable.mockResolvedValueOnce(false).mockResolvedValueOnce(true);
    const clock = new FakeClock();
    const installer = new ControlPlaneInstaller(
      cluster,
      new RecordingReporter(),
      { namespace: 'argocd', clock },
      createSilentLogger(),
    );

    expect(await installer.ensureInstalled()).toBe(true);
    expect(state.namespaces.has('argocd')).toBe(true);
    expect(cluster.applyManifest).toHaveBeenCalledWith(INSTALL_URL, 'argocd');
    expect(cluster.isDeploymentAvailable).toHaveBeenCalledWith('argocd', 'argocd-server');
    expect(clock.sleeps).toEqual([5000]);
  });

  it('should fail with InstallTimeoutError once the timeout is spent', async () => {
    const cluster = createFakeCluster();
    const clock = new FakeClock();
    const installer = new ControlPlaneInstaller(
      cluster,
      new RecordingReporter(),
      { namespace: 'argocd', timeoutSeconds: 20, pollIntervalMs: 5000, clock },
      createSilentLogger(),
    );

    const failure = installer.ensureInstalled();

    await expect(failure).rejects.toBeInstanceOf(InstallTimeoutError);
    expect(cluster.isDeploymentAvailable).toHaveBeenCalledTimes(5);
    expect(clock.elapsed).toBe(20000);
  });
});
