/**
 * Command Executor - runs the external CLIs the orchestrator drives
 * (kubectl, argocd, kind, the container runtime) with a timeout and a
 * fixed base environment.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import { CommandError } from '../errors';

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
  maxBuffer?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
}

/**
 * The part of the executor collaborators depend on
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
  run(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
  isAvailable(command: string): Promise<boolean>;
}

export class CommandExecutor implements CommandRunner {
  /**
   * @param baseEnv - variables merged over the parent environment for every child
   */
  constructor(
    private readonly logger: Logger,
    private readonly baseEnv: Record<string, string> = {},
  ) {}

  /**
   * Execute a command with arguments; a non-zero exit is reported, not thrown
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = {},
      timeout = 30000,
      maxBuffer = 10 * 1024 * 1024, // 10MB
    } = options;

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env: { ...process.env, ...this.baseEnv, ...env },
        shell: false,
      };

      const child = spawn(command, args, spawnOptions);

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => {
            if (child.exitCode === null) {
              child.kill('SIGKILL');
            }
          }, 5000).unref();
        }, timeout);
      }

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stdout.length + chunk.length <= maxBuffer) {
          stdout += chunk;
        } else {
          child.kill('SIGTERM');
          reject(new Error(`Command output exceeded maximum buffer size of ${maxBuffer} bytes`));
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length + chunk.length <= maxBuffer) {
          stderr += chunk;
        }
      });

      child.on('close', (code: number | null) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        const exitCode = code ?? -1;

        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          timedOut,
        });
      });

      child.on('error', (error: Error) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        this.logger.error({ command, error: error.message }, 'Command execution failed');

        reject(error);
      });
    });
  }

  /**
   * Execute a command and throw CommandError on a non-zero exit
   */
  async run(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const result = await this.execute(command, args, options);
    if (result.exitCode !== 0) {
      throw new CommandError(
        command,
        args,
        result.exitCode,
        result.timedOut ? `timed out after ${options.timeout ?? 30000}ms` : result.stderr,
      );
    }
    return result;
  }

  /**
   * Check if a command is on PATH
   */
  async isAvailable(command: string): Promise<boolean> {
    try {
      const result = await this.execute('which', [command], { timeout: 5000 });
      return result.exitCode === 0 && result.stdout.length > 0;
    } catch (error) {
      this.logger.debug({ command, error }, 'Availability check failed');
      return false;
    }
  }
}
