/**
 * kagent-setup command line
 *
 * Flag parsing and dispatch. `--status` and `--teardown` short-circuit the setup
 * pipeline; any error escaping a step becomes a `❌` line and exit code 1.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { createContainer, createTunnelDeps, type DepsOverrides } from '../app/container';
import { SetupPipeline, type PipelineHooks } from '../application/pipeline';
import { reportStatus } from '../application/setup/status';
import { NamespaceReaper } from '../application/teardown/namespace-reaper';
import { TeardownOrchestrator } from '../application/teardown/teardown';
import { loadConfig, type AppConfig, type LoadConfigOptions } from '../config/app-config';
import { CONFIG_DEFAULTS } from '../config/defaults';
import { ConfigError, errorMessage, isApplicationError } from '../errors';
import { ConsoleReporter, type Reporter, type WritableLike } from '../lib/reporter';

export interface CliOptions {
  skipArgocd?: boolean;
  initial?: boolean;
  teardown?: boolean;
  status?: boolean;
  envFile?: string;
}

export interface CliRuntime {
  reporter?: Reporter;
  /** Receives help text */
  out?: WritableLike;
  cwd?: string;
  home?: string;
  overrides?: DepsOverrides;
  hooks?: PipelineHooks;
}

const CliOptionsSchema = z.object({
  skipArgocd: z.boolean().optional(),
  initial: z.boolean().optional(),
  teardown: z.boolean().optional(),
  status: z.boolean().optional(),
  envFile: z.string().optional(),
});

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(out: WritableLike = process.stdout, reporter?: Reporter): Command {
  return new Command()
    .name('kagent-setup')
    .description('Set up Kagent with ArgoCD on a kind cluster')
    .version(packageVersion())
    .option('--skip-argocd', 'skip ArgoCD installation')
    .option('--initial', 'initial setup: restart the container runtime on nodes after certificate updates')
    .option('--teardown', 'remove the kagent workload, keeping ArgoCD and the cluster')
    .option('--status', 'show port-forward status')
    .option('--env-file <path>', 'configuration file', CONFIG_DEFAULTS.envFile)
    .addHelpText(
      'after',
      `
Examples:
  $ kagent-setup                  Full setup
  $ kagent-setup --initial        First run on a fresh cluster
  $ kagent-setup --skip-argocd    Reuse the existing ArgoCD installation
  $ kagent-setup --status         Check the port-forwards
  $ kagent-setup --teardown       Remove the workload`,
    )
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out.write(text),
      writeErr: (text) => out.write(text),
      outputError: (text, write) => {
        const message = text.replace(/^error: /, '').trim();
        if (reporter) reporter.error(message);
        else write(`❌ ${message}\n`);
      },
    });
}

/**
 * Parse flags; throws CommanderError for help, version and unknown options
 */
export function parseArgs(args: string[], out?: WritableLike, reporter?: Reporter): CliOptions {
  const program = createProgram(out, reporter);
  program.parse(args, { from: 'user' });
  return CliOptionsSchema.parse(program.opts());
}

function statusScope(runtime: CliRuntime, options: CliOptions): {
  argocdNamespace: string;
  kagentNamespace: string;
  stateDir: string;
} {
  try {
    return loadConfig(configOptions(runtime, options));
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    return CONFIG_DEFAULTS;
  }
}

function configOptions(runtime: CliRuntime, options: CliOptions): LoadConfigOptions {
  return {
    ...(options.envFile !== undefined && { envFile: options.envFile }),
    ...(runtime.cwd !== undefined && { cwd: runtime.cwd }),
    ...(runtime.home !== undefined && { home: runtime.home }),
  };
}

async function teardown(config: AppConfig, overrides: DepsOverrides): Promise<void> {
  const deps = createContainer(config, overrides);
  const { cluster, reporter, logger, clock } = deps;

  await new TeardownOrchestrator(
    {
      cluster,
      reaper: new NamespaceReaper(cluster, reporter, logger, clock),
      tunnels: deps.portForwards,
      pids: deps.pids,
      prompt: deps.prompt,
      reporter,
      logger,
    },
    {
      argocdNamespace: config.argocdNamespace,
      kagentNamespace: config.kagentNamespace,
      clock,
    },
  ).teardown();
}

/**
 * Run the command line and resolve to the process exit code
 */
export async function runCli(args: string[], runtime: CliRuntime = {}): Promise<number> {
  const reporter = runtime.reporter ?? runtime.overrides?.reporter ?? new ConsoleReporter();
  const overrides: DepsOverrides = { ...runtime.overrides, reporter };

  let options: CliOptions;
  try {
    options = parseArgs(args, runtime.out, reporter);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  try {
    if (options.status) {
      const deps = createTunnelDeps(statusScope(runtime, options), overrides);
      await reportStatus(deps.tunnels, deps.portForwards, deps.prober, reporter);
      return 0;
    }

    const config = loadConfig(configOptions(runtime, options));

    if (options.teardown) {
      await teardown(config, overrides);
      return 0;
    }

    const report = await new SetupPipeline(createContainer(config, overrides), runtime.hooks).run({
      skipArgocd: options.skipArgocd ?? false,
      initial: options.initial ?? false,
    });
    return report.exitCode;
  } catch (error) {
    reporter.error(errorMessage(error));
    if (isApplicationError(error) && error.remediation) {
      reporter.info(`Try: ${error.remediation}`);
    }
    return 1;
  }
}
