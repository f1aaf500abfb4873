/**
 * OS process operations used by the port-forward manager
 */

import { spawn } from 'node:child_process';
import { closeSync, openSync } from 'node:fs';
import type { Logger } from 'pino';
import { errnoCode } from '../../errors';
import type { CommandRunner } from '../command-executor';

export interface SpawnDetachedOptions {
  /** File receiving stdout and stderr; output is discarded when omitted */
  logFile?: string;
}

export interface ProcessTable {
  /** Start a process that outlives this one and return its PID */
  spawnDetached(command: string, args: string[], options?: SpawnDetachedOptions): number;
  isAlive(pid: number): boolean;
  /** SIGTERM the process; false when it was already gone */
  terminate(pid: number): boolean;
  /** Best-effort `pkill -f <pattern>` */
  terminateMatching(pattern: string): Promise<void>;
}

export class NodeProcessTable implements ProcessTable {
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    logger: Logger,
    private readonly env: Record<string, string> = {},
  ) {
    this.logger = logger.child({ component: 'ProcessTable' });
  }

  spawnDetached(command: string, args: string[], options: SpawnDetachedOptions = {}): number {
    const fd = options.logFile ? openSync(options.logFile, 'a') : undefined;
    try {
      const child = spawn(command, args, {
        detached: true,
        env: { ...process.env, ...this.env },
        stdio: fd === undefined ? 'ignore' : ['ignore', fd, fd],
      });
      child.on('error', (error) => {
        this.logger.warn({ command, error: error.message }, 'Background process failed');
      });
      child.unref();

      if (child.pid === undefined) {
        throw new Error(`Failed to start ${command}`);
      }
      this.logger.debug({ command, args, pid: child.pid }, 'Background process started');
      return child.pid;
    } finally {
      if (fd !== undefined) closeSync(fd);
    }
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      // EPERM: the process exists but belongs to someone else
      return errnoCode(error) === 'EPERM';
    }
  }

  terminate(pid: number): boolean {
    try {
      process.kill(pid, 'SIGTERM');
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ESRCH') return false;
      throw error;
    }
  }

  async terminateMatching(pattern: string): Promise<void> {
    try {
      // exit code 1 means nothing matched
      await this.runner.execute('pkill', ['-f', pattern], { timeout: 5000 });
    } catch (error) {
      this.logger.debug({ pattern, error }, 'pkill unavailable');
    }
  }
}
