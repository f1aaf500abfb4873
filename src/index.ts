/**
 * Programmatic entry points
 */

export { runCli, parseArgs, type CliOptions } from './cli/cli';
export { createContainer, createTunnelDeps, type Deps, type DepsOverrides } from './app/container';
export { SetupPipeline, type SetupOptions, type SetupReport } from './application/pipeline';
export { TeardownOrchestrator, type TeardownResult } from './application/teardown/teardown';
export { NamespaceReaper, type ReapOutcome } from './application/teardown/namespace-reaper';
export { reportStatus } from './application/setup/status';
export { pollUntil, systemClock, type Clock, type PollResult } from './application/utils/async-utils';
export { loadConfig, parseConfig, type AppConfig } from './config/app-config';
export * from './errors';
export type { Result } from './domain/types/result';
