/**
 * Environment Loader
 *
 * Reads the dotenv file once at startup, validates it with Zod and produces an
 * immutable configuration object that is handed to every component.
 */

import { z } from 'zod';
import { parse as parseDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { ConfigError } from '../errors';
import { CONFIG_DEFAULTS } from './defaults';

const LogLevelSchema = z
  .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
  .default(CONFIG_DEFAULTS.logLevel);

// Blank values fall back to the default
const optional = () =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().optional(),
  );

/**
 * Keys recognised in the dotenv file
 */
const EnvFileSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: 'OPENAI_API_KEY is required in .env' })
    .trim()
    .min(1, 'OPENAI_API_KEY is required in .env'),
  KIND_CLUSTER_NAME: optional(),
  CA_BUNDLE_PATH: optional(),
  ARGOCD_NAMESPACE: optional(),
  KAGENT_NAMESPACE: optional(),
  CONTAINER_RUNTIME: z.enum(['podman', 'docker']).default(CONFIG_DEFAULTS.containerRuntime),
  ARGOCD_MANIFEST_DIR: optional(),
  STATE_DIR: optional(),
  LOG_LEVEL: LogLevelSchema,
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ContainerRuntime = z.infer<typeof EnvFileSchema>['CONTAINER_RUNTIME'];

export interface AppConfig {
  readonly openaiApiKey: string;
  readonly clusterName: string;
  readonly caBundlePath: string;
  readonly argocdNamespace: string;
  readonly kagentNamespace: string;
  readonly containerRuntime: ContainerRuntime;
  readonly manifestDir: string;
  readonly stateDir: string;
  readonly logLevel: LogLevel;
  readonly envFile: string;
}

export interface LoadConfigOptions {
  /** Path of the dotenv file, relative to cwd unless absolute */
  envFile?: string;
  cwd?: string;
  home?: string;
}

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/**
 * Load and validate configuration from the dotenv file
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? homedir();
  const envFile = resolve(cwd, options.envFile ?? CONFIG_DEFAULTS.envFile);

  if (!existsSync(envFile)) {
    throw new ConfigError(
      `.env file not found at ${envFile}! Create it from .env.template`,
      [],
      `cp .env.template ${envFile}`,
    );
  }

  return parseConfig(readFileSync(envFile, 'utf-8'), { envFile, cwd, home });
}

/**
 * Validate dotenv content and fill defaults
 */
export function parseConfig(
  content: string,
  context: { envFile: string; cwd: string; home: string },
): AppConfig {
  const result = EnvFileSchema.safeParse(parseDotenv(content));

  if (!result.success) {
    const issues = result.error.issues;
    const keys = issues.map((issue) => issue.path.join('.'));
    const message = issues
      .map((issue) => {
        const key = issue.path.join('.');
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      })
      .join('; ');
    throw new ConfigError(message, keys, `Edit ${context.envFile}`);
  }

  const env = result.data;
  const manifestDir = env.ARGOCD_MANIFEST_DIR ?? CONFIG_DEFAULTS.manifestDir;

  return Object.freeze({
    openaiApiKey: env.OPENAI_API_KEY,
    clusterName: env.KIND_CLUSTER_NAME ?? CONFIG_DEFAULTS.clusterName,
    caBundlePath: expandHome(env.CA_BUNDLE_PATH ?? CONFIG_DEFAULTS.caBundlePath, context.home),
    argocdNamespace: env.ARGOCD_NAMESPACE ?? CONFIG_DEFAULTS.argocdNamespace,
    kagentNamespace: env.KAGENT_NAMESPACE ?? CONFIG_DEFAULTS.kagentNamespace,
    containerRuntime: env.CONTAINER_RUNTIME,
    manifestDir: isAbsolute(manifestDir) ? manifestDir : resolve(context.cwd, manifestDir),
    stateDir: env.STATE_DIR ?? CONFIG_DEFAULTS.stateDir,
    logLevel: env.LOG_LEVEL,
    envFile: context.envFile,
  });
}

/**
 * Variables every external tool invocation inherits
 */
export function exportedEnvironment(config: AppConfig): Record<string, string> {
  return {
    OPENAI_API_KEY: config.openaiApiKey,
    KIND_CLUSTER_NAME: config.clusterName,
    CA_BUNDLE_PATH: config.caBundlePath,
  };
}
