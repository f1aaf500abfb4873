/**
 * Error types for the demo environment orchestrator.
 *
 * Fatal kinds (configuration, prerequisites, install timeout, missing application)
 * are thrown. Degraded kinds (sync or probe exhaustion, partial teardown) are
 * carried inside step outcomes and printed as warnings.
 */

/**
 * Base error class for all orchestrator errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
    /** Manual command or action that works around the failure */
    public readonly remediation?: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    remediation?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      ...(this.remediation !== undefined && { remediation: this.remediation }),
    };
  }
}

/**
 * Missing or invalid configuration
 */
export class ConfigError extends ApplicationError {
  constructor(
    message: string,
    public readonly keys: string[] = [],
    remediation?: string,
  ) {
    super(message, 'CONFIG_ERROR', { keys }, remediation);
  }
}

/**
 * A required executable is missing or the cluster cannot be reached
 */
export class PrerequisiteError extends ApplicationError {
  constructor(
    message: string,
    public readonly requirement: string,
    remediation?: string,
  ) {
    super(message, 'PREREQUISITE_ERROR', { requirement }, remediation);
  }
}

/**
 * The GitOps controller did not become available in time
 */
export class InstallTimeoutError extends ApplicationError {
  constructor(
    public readonly deployment: string,
    public readonly namespace: string,
    public readonly timeoutSeconds: number,
  ) {
    super(
      `Deployment ${deployment} in namespace ${namespace} was not available after ${timeoutSeconds}s`,
      'INSTALL_TIMEOUT',
      { deployment, namespace, timeoutSeconds },
      `kubectl get pods -n ${namespace}`,
    );
  }
}

/**
 * A declared application object never appeared in the control plane
 */
export class ApplicationNotFoundError extends ApplicationError {
  constructor(
    public readonly application: string,
    public readonly namespace: string,
    public readonly attempts: number,
  ) {
    super(
      `Application ${application} not found after waiting (${attempts} checks)`,
      'APPLICATION_NOT_FOUND',
      { application, namespace, attempts },
      `kubectl get applications -n ${namespace}`,
    );
  }
}

export class SyncExhaustedError extends ApplicationError {
  constructor(
    public readonly application: string,
    public readonly attempts: number,
    public readonly lastFailure: string,
  ) {
    super(
      `Failed to sync ${application} after ${attempts} attempts, continuing...`,
      'SYNC_EXHAUSTED',
      { application, attempts, lastFailure },
      `argocd app sync ${application}`,
    );
  }
}

export class ProbeExhaustedError extends ApplicationError {
  constructor(
    public readonly target: string,
    public readonly url: string,
    public readonly attempts: number,
  ) {
    super(
      `${target} port-forward appears to be running but not responding at: ${url}`,
      'PROBE_EXHAUSTED',
      { target, url, attempts },
    );
  }
}

/**
 * Namespace removal needed escalation or never completed
 */
export class PartialTeardownFailure extends ApplicationError {
  constructor(
    message: string,
    public readonly namespace: string,
    public readonly rung: 'graceful' | 'strip-finalizers' | 'force' | 'confirm-gone',
    remediation?: string,
  ) {
    super(message, 'PARTIAL_TEARDOWN', { namespace, rung }, remediation);
  }
}

/**
 * An external tool exited with a non-zero status
 */
export class CommandError extends ApplicationError {
  constructor(
    public readonly command: string,
    public readonly args: string[],
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(
      `${command} ${args.join(' ')} exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`,
      'COMMAND_FAILED',
      { command, args, exitCode },
    );
  }
}

/**
 * Error thrown when a Kubernetes API call fails
 */
export class KubernetesError extends ApplicationError {
  constructor(
    message: string,
    public readonly resource?: string,
    public readonly namespace?: string,
    public override readonly cause?: unknown,
  ) {
    super(message, 'K8S_ERROR', { resource, namespace });
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return typeof error.message === 'string' ? error.message : String(error.message);
  }
  return String(error);
}

/**
 * `code` of a Node system error. Checked structurally: errors raised by Node
 * built-ins may come from another realm, where `instanceof Error` is false.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
