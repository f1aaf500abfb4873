/**
 * Argo CD CLI wrapper
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { Failure, Success, type Result } from '../../domain/types/result';
import { errorMessage } from '../../errors';
import type { CommandRunner } from '../command-executor';

const AppStatusSchema = z.object({
  status: z
    .object({
      operationState: z.object({ phase: z.string().nullish() }).nullish(),
    })
    .nullish(),
});

export interface GitOpsCli {
  login(server: string, username: string, password: string): Promise<Result<void>>;
  /** Phase of the in-flight operation, `Unknown` when absent or unreadable */
  operationPhase(app: string): Promise<string>;
  sync(app: string, timeoutSeconds: number): Promise<Result<void>>;
}

export class ArgoCdCli implements GitOpsCli {
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ArgoCdCli' });
  }

  async login(server: string, username: string, password: string): Promise<Result<void>> {
    const result = await this.runner.execute(
      'argocd',
      ['login', server, '--username', username, '--password', password, '--insecure'],
      { timeout: 60000 },
    );
    if (result.exitCode !== 0) {
      // args carry the password, so only stderr is surfaced
      return Failure(result.stderr || `argocd login exited with code ${result.exitCode}`);
    }
    return Success(undefined);
  }

  async operationPhase(app: string): Promise<string> {
    try {
      const result = await this.runner.execute('argocd', ['app', 'get', app, '-o', 'json'], {
        timeout: 60000,
      });
      if (result.exitCode !== 0) {
        this.logger.debug({ app, stderr: result.stderr }, 'Application lookup failed');
        return 'Unknown';
      }
      const parsed = AppStatusSchema.safeParse(JSON.parse(result.stdout));
      return (parsed.success && parsed.data.status?.operationState?.phase) || 'Unknown';
    } catch (error) {
      this.logger.debug({ app, error: errorMessage(error) }, 'Application status unreadable');
      return 'Unknown';
    }
  }

  async sync(app: string, timeoutSeconds: number): Promise<Result<void>> {
    try {
      const result = await this.runner.execute(
        'argocd',
        ['app', 'sync', app, '--timeout', String(timeoutSeconds)],
        // the CLI enforces its own timeout; this one only guards a hung process
        { timeout: (timeoutSeconds + 30) * 1000 },
      );
      if (result.exitCode !== 0) {
        return Failure(result.stderr || `argocd app sync exited with code ${result.exitCode}`);
      }
      return Success(undefined);
    } catch (error) {
      return Failure(errorMessage(error));
    }
  }
}
