/**
 * Kind node access through the container runtime CLI (podman or docker).
 * Kind nodes are containers, so certificate files are read and written with
 * `exec` and `cp` on the node container.
 */

import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { ContainerRuntime } from '../../config/app-config';
import type { CommandRunner } from '../command-executor';

export interface NodeRuntime {
  /** Node container names, enumerated fresh on every call */
  listNodes(clusterName: string): Promise<string[]>;
  /** Whether the node's installed bundle matches the local file byte for byte */
  bundleMatches(node: string, localPath: string, nodePath: string): Promise<boolean>;
  copyBundle(node: string, localPath: string, nodePath: string): Promise<void>;
  refreshTrustStore(node: string): Promise<void>;
  /** SIGHUP the node's containerd so it picks up the new trust store */
  reloadContainerRuntime(node: string): Promise<void>;
}

export class KindNodeRuntime implements NodeRuntime {
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    private readonly runtime: ContainerRuntime,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'KindNodeRuntime' });
  }

  async listNodes(clusterName: string): Promise<string[]> {
    const { stdout } = await this.runner.run('kind', ['get', 'nodes', '--name', clusterName]);
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('No kind nodes'));
  }

  async bundleMatches(node: string, localPath: string, nodePath: string): Promise<boolean> {
    const local = await readFile(localPath, 'utf-8');
    const result = await this.runner.execute(this.runtime, ['exec', node, 'cat', nodePath]);
    if (result.exitCode !== 0) {
      this.logger.debug({ node, nodePath, stderr: result.stderr }, 'Node bundle unreadable');
      return false;
    }
    // execute() trims output, so compare trimmed content
    return result.stdout === local.trim();
  }

  async copyBundle(node: string, localPath: string, nodePath: string): Promise<void> {
    await this.runner.run(this.runtime, ['cp', localPath, `${node}:${nodePath}`]);
  }

  async refreshTrustStore(node: string): Promise<void> {
    await this.runner.run(this.runtime, ['exec', node, 'update-ca-certificates'], {
      timeout: 60000,
    });
  }

  async reloadContainerRuntime(node: string): Promise<void> {
    await this.runner.run(this.runtime, ['exec', node, 'pkill', '-HUP', 'containerd']);
  }
}
