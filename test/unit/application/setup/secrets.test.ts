/**
 * Secret Provisioner Tests
 */

import { describe, it, expect } from '@jest/globals';
import { SecretProvisioner } from '../../../../src/application/setup/secrets';
import { createSilentLogger } from '../../../../src/lib/logger';
import {
  RecordingReporter,
  createClusterState,
  createFakeCluster,
} from '../../../__support__/utilities/fakes';

describe('SecretProvisioner', () => {
  it('should create the namespace and both secrets', async () => {
    const state = createClusterState();
    const provisioner = new SecretProvisioner(
      createFakeCluster(state),
      new RecordingReporter(),
      createSilentLogger(),
    );

    const result = await provisioner.provision('kagent', 'test-secret');

    expect(result).toEqual({
      namespace: 'created',
      secrets: { 'kagent-openai': 'created', 'mcp-secrets': 'created' },
    });
    expect(state.secrets.get('kagent/kagent-openai')).toEqual({ OPENAI_API_KEY: 'test-secret' });
    expect(state.secrets.get('kagent/mcp-secrets')).toEqual({ OPENAI_API_KEY: 'test-secret' });
  });

  it('should replace existing objects on a second run', async () => {
    const state = createClusterState();
    const cluster = createFakeCluster(state);
    const provisioner = new SecretProvisioner(cluster, new RecordingReporter(), createSilentLogger());

    await provisioner.provision('kagent', 'test-secret');
    const second = await provisioner.provision('kagent', 'rotated-secret');

    expect(second).toEqual({
      namespace: 'exists',
      secrets: { 'kagent-openai': 'replaced', 'mcp-secrets': 'replaced' },
    });
    expect(state.secrets.size).toBe(2);
    expect(state.secrets.get('kagent/kagent-openai')).toEqual({ OPENAI_API_KEY: 'rotated-secret' });
  });
});
