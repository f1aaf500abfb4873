/**
 * CLI Tests
 *
 * Drives runCli end to end with fakes in place of the cluster and processes.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseArgs, runCli } from '../../../src/cli/cli';
import { createSilentLogger } from '../../../src/lib/logger';
import {
  FakeProcessTable,
  MemoryPidStore,
  RecordingReporter,
  ScriptedPrompt,
  ScriptedProber,
  createClusterState,
  createFakeCluster,
} from '../../__support__/utilities/fakes';

class BufferOut {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

describe('parseArgs', () => {
  it('should parse every flag', () => {
    expect(parseArgs(['--skip-argocd', '--initial'])).toEqual({
      skipArgocd: true,
      initial: true,
      envFile: '.env',
    });
    expect(parseArgs(['--teardown'])).toMatchObject({ teardown: true });
    expect(parseArgs(['--status', '--env-file', 'demo.env'])).toEqual({
      status: true,
      envFile: 'demo.env',
    });
  });

  it('should default to a plain setup', () => {
    expect(parseArgs([])).toEqual({ envFile: '.env' });
  });
});

describe('runCli', () => {
  let dir: string;
  let reporter: RecordingReporter;
  let out: BufferOut;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kagent-cli-'));
    reporter = new RecordingReporter();
    out = new BufferOut();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print help and exit 0', async () => {
    const code = await runCli(['--help'], { reporter, out, cwd: dir });

    expect(code).toBe(0);
    expect(out.text).toContain('Usage: kagent-setup [options]');
    expect(out.text).toContain('--skip-argocd');
    expect(out.text).toContain('$ kagent-setup --teardown');
  });

  it('should reject an unknown option with exit 1', async () => {
    const code = await runCli(['--bogus'], { reporter, out, cwd: dir });

    expect(code).toBe(1);
    expect(reporter.messages('error')).toEqual(["unknown option '--bogus'"]);
  });

  it('should reject positional arguments', async () => {
    const code = await runCli(['setup'], { reporter, out, cwd: dir });

    expect(code).toBe(1);
    expect(reporter.messages('error')).toHaveLength(1);
  });

  it('should stop with exit 1 when the configuration file is missing', async () => {
    const code = await runCli([], {
      reporter,
      out,
      cwd: dir,
      overrides: { logger: createSilentLogger() },
    });

    const envFile = join(dir, '.env');
    expect(code).toBe(1);
    expect(reporter.messages('error')).toEqual([
      `.env file not found at ${envFile}! Create it from .env.template`,
    ]);
    expect(reporter.messages('info')).toEqual([`Try: cp .env.template ${envFile}`]);
  });

  it('should report status without a configuration file', async () => {
    const prober = new ScriptedProber();

    const code = await runCli(['--status'], {
      reporter,
      out,
      cwd: dir,
      overrides: {
        logger: createSilentLogger(),
        processes: new FakeProcessTable(),
        pids: new MemoryPidStore(),
        prober,
      },
    });

    expect(code).toBe(0);
    expect(reporter.messages('warn')).toEqual([
      'ArgoCD port-forward not running (no PID file)',
      'Kagent UI port-forward not running (no PID file)',
    ]);
    expect(prober.urls).toEqual([]);
  });

  it('should leave the cluster alone when teardown is declined', async () => {
    writeFileSync(join(dir, '.env'), 'OPENAI_API_KEY=test-secret\n');
    const cluster = createFakeCluster(
      createClusterState({ namespaces: new Set(['argocd', 'kagent']) }),
    );

    const code = await runCli(['--teardown'], {
      reporter,
      out,
      cwd: dir,
      home: dir,
      overrides: {
        logger: createSilentLogger(),
        cluster,
        prompt: new ScriptedPrompt(['n']),
        processes: new FakeProcessTable(),
        pids: new MemoryPidStore(),
      },
    });

    expect(code).toBe(0);
    expect(cluster.deleteNamespace).not.toHaveBeenCalled();
  });
});
