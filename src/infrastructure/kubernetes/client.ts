/**
 * Kubernetes Client - the cluster control-plane interface
 *
 * Typed API access goes through @kubernetes/client-node. Manifest application and
 * the in-cluster TLS probe shell out to kubectl, which resolves multi-document files
 * and remote URLs and manages the probe pod's lifecycle.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { z } from 'zod';
import { TIMINGS } from '../../config/defaults';
import { KubernetesError, errorMessage } from '../../errors';
import type { CommandRunner } from '../command-executor';

const ARGO_GROUP = 'argoproj.io';
const ARGO_VERSION = 'v1alpha1';

const ApplicationSchema = z.object({
  metadata: z.object({ name: z.string() }),
  status: z
    .object({
      sync: z.object({ status: z.string().optional() }).optional(),
      health: z.object({ status: z.string().optional() }).optional(),
      operationState: z.object({ phase: z.string().optional() }).optional(),
    })
    .optional(),
});

const ApplicationListSchema = z.object({ items: z.array(ApplicationSchema) });

/**
 * What the orchestrator needs to know about an application object
 */
export interface ApplicationSummary {
  name: string;
  syncStatus: string;
  healthStatus: string;
  operationPhase?: string;
}

export type TlsProbeResult = { trusted: true } | { trusted: false; reason: string };

export interface ClusterClient {
  ping(): Promise<boolean>;
  namespaceExists(name: string): Promise<boolean>;
  ensureNamespace(name: string): Promise<'created' | 'exists'>;
  applySecret(
    namespace: string,
    name: string,
    data: Record<string, string>,
  ): Promise<'created' | 'replaced'>;
  /** Resolves false when the secret was already absent */
  deleteSecret(namespace: string, name: string): Promise<boolean>;
  readSecretValue(namespace: string, name: string, key: string): Promise<string | undefined>;
  isDeploymentAvailable(namespace: string, name: string): Promise<boolean>;
  /** Apply a manifest file or URL */
  applyManifest(source: string, namespace?: string): Promise<void>;
  getApplication(namespace: string, name: string): Promise<ApplicationSummary | undefined>;
  listApplications(namespace: string): Promise<ApplicationSummary[]>;
  deleteApplication(namespace: string, name: string): Promise<boolean>;
  appProjectExists(namespace: string, name: string): Promise<boolean>;
  deleteAppProject(namespace: string, name: string): Promise<boolean>;
  /** Graceful delete request; resolves false when the namespace was already absent */
  deleteNamespace(name: string): Promise<boolean>;
  /** Empty `spec.finalizers` through the namespace finalize subresource */
  stripNamespaceFinalizers(name: string): Promise<void>;
  forceDeleteNamespace(name: string): Promise<void>;
  /** The service exists and has at least one ready endpoint address */
  serviceHasEndpoints(namespace: string, name: string): Promise<boolean>;
  /** Fetch `url` from a short-lived pod to learn whether nodes trust its issuer */
  probeTls(url: string, image: string, podName: string): Promise<TlsProbeResult>;
}

export interface KubernetesClientOptions {
  kubeconfig?: string;
  /** Timeout for kubectl invocations, in milliseconds */
  commandTimeout?: number;
  /** Budget for the TLS probe pod, in milliseconds */
  probeTimeout?: number;
}

function statusCode(error: unknown): number | undefined {
  if (error instanceof k8s.HttpError) {
    return error.statusCode ?? error.response?.statusCode;
  }
  return undefined;
}

const isNotFound = (error: unknown): boolean => statusCode(error) === 404;
const isConflict = (error: unknown): boolean => statusCode(error) === 409;

function describe(error: unknown): string {
  if (error instanceof k8s.HttpError) {
    const body: unknown = error.body;
    const parsed = z.object({ message: z.string() }).safeParse(body);
    return parsed.success ? parsed.data.message : `HTTP ${error.statusCode ?? 'error'}`;
  }
  return errorMessage(error);
}

function summarize(raw: unknown): ApplicationSummary {
  const app = ApplicationSchema.parse(raw);
  const phase = app.status?.operationState?.phase;
  return {
    name: app.metadata.name,
    syncStatus: app.status?.sync?.status ?? 'Unknown',
    healthStatus: app.status?.health?.status ?? 'Unknown',
    ...(phase !== undefined && { operationPhase: phase }),
  };
}

/**
 * Create a cluster client backed by the current kubeconfig context
 */
export const createKubernetesClient = (
  logger: Logger,
  runner: CommandRunner,
  options: KubernetesClientOptions = {},
): ClusterClient => {
  const kc = new k8s.KubeConfig();

  if (options.kubeconfig) {
    kc.loadFromString(options.kubeconfig);
  } else {
    kc.loadFromDefault();
  }

  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const appsApi = kc.makeApiClient(k8s.AppsV1Api);
  const customApi = kc.makeApiClient(k8s.CustomObjectsApi);
  const commandTimeout = options.commandTimeout ?? 120000;
  const probeTimeout = options.probeTimeout ?? TIMINGS.probePodTimeoutMs;

  const fail = (action: string, error: unknown, resource?: string, namespace?: string): never => {
    throw new KubernetesError(`Failed to ${action}: ${describe(error)}`, resource, namespace, error);
  };

  const deleteCustomObject = async (
    namespace: string,
    plural: string,
    name: string,
  ): Promise<boolean> => {
    try {
      await customApi.deleteNamespacedCustomObject(ARGO_GROUP, ARGO_VERSION, namespace, plural, name);
      logger.info({ plural, name, namespace }, 'Custom object deleted');
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      return fail(`delete ${plural}/${name}`, error, plural, namespace);
    }
  };

  return {
    async ping(): Promise<boolean> {
      try {
        await coreApi.listNamespace();
        return true;
      } catch (error) {
        logger.debug({ error: describe(error) }, 'Cluster ping failed');
        return false;
      }
    },

    async namespaceExists(name: string): Promise<boolean> {
      try {
        await coreApi.readNamespace(name);
        return true;
      } catch (error) {
        if (isNotFound(error)) return false;
        return fail(`read namespace ${name}`, error, 'namespace');
      }
    },

    async ensureNamespace(name: string): Promise<'created' | 'exists'> {
      try {
        await coreApi.createNamespace({ metadata: { name } });
        logger.info({ namespace: name }, 'Namespace created');
        return 'created';
      } catch (error) {
        if (isConflict(error)) return 'exists';
        return fail(`create namespace ${name}`, error, 'namespace');
      }
    },

    async applySecret(
      namespace: string,
      name: string,
      data: Record<string, string>,
    ): Promise<'created' | 'replaced'> {
      const body: k8s.V1Secret = {
        apiVersion: 'v1',
        kind: 'Secret',
        type: 'Opaque',
        metadata: { name, namespace },
        stringData: data,
      };
      try {
        await coreApi.createNamespacedSecret(namespace, body);
        return 'created';
      } catch (error) {
        if (!isConflict(error)) {
          return fail(`create secret ${name}`, error, 'secret', namespace);
        }
      }
      try {
        await coreApi.replaceNamespacedSecret(name, namespace, body);
        return 'replaced';
      } catch (error) {
        return fail(`replace secret ${name}`, error, 'secret', namespace);
      }
    },

    async deleteSecret(namespace: string, name: string): Promise<boolean> {
      try {
        await coreApi.deleteNamespacedSecret(name, namespace);
        return true;
      } catch (error) {
        if (isNotFound(error)) return false;
        return fail(`delete secret ${name}`, error, 'secret', namespace);
      }
    },

    async readSecretValue(
      namespace: string,
      name: string,
      key: string,
    ): Promise<string | undefined> {
      try {
        const { body } = await coreApi.readNamespacedSecret(name, namespace);
        const encoded = body.data?.[key];
        return encoded === undefined ? undefined : Buffer.from(encoded, 'base64').toString('utf-8');
      } catch (error) {
        if (isNotFound(error)) return undefined;
        return fail(`read secret ${name}`, error, 'secret', namespace);
      }
    },

    async isDeploymentAvailable(namespace: string, name: string): Promise<boolean> {
      try {
        const { body } = await appsApi.readNamespacedDeployment(name, namespace);
        return (
          body.status?.conditions?.some(
            (condition) => condition.type === 'Available' && condition.status === 'True',
          ) ?? false
        );
      } catch (error) {
        if (isNotFound(error)) return false;
        return fail(`read deployment ${name}`, error, 'deployment', namespace);
      }
    },

    async applyManifest(source: string, namespace?: string): Promise<void> {
      const args = ['apply', ...(namespace ? ['-n', namespace] : []), '-f', source];
      await runner.run('kubectl', args, { timeout: commandTimeout });
      logger.info({ source, namespace }, 'Manifest applied');
    },

    async getApplication(
      namespace: string,
      name: string,
    ): Promise<ApplicationSummary | undefined> {
      try {
        const { body } = await customApi.getNamespacedCustomObject(
          ARGO_GROUP,
          ARGO_VERSION,
          namespace,
          'applications',
          name,
        );
        return summarize(body);
      } catch (error) {
        if (isNotFound(error)) return undefined;
        return fail(`read application ${name}`, error, 'application', namespace);
      }
    },

    async listApplications(namespace: string): Promise<ApplicationSummary[]> {
      try {
        const { body } = await customApi.listNamespacedCustomObject(
          ARGO_GROUP,
          ARGO_VERSION,
          namespace,
          'applications',
        );
        return ApplicationListSchema.parse(body).items.map(summarize);
      } catch (error) {
        if (isNotFound(error)) return [];
        return fail('list applications', error, 'application', namespace);
      }
    },

    deleteApplication: (namespace, name) => deleteCustomObject(namespace, 'applications', name),

    async appProjectExists(namespace: string, name: string): Promise<boolean> {
      try {
        await customApi.getNamespacedCustomObject(
          ARGO_GROUP,
          ARGO_VERSION,
          namespace,
          'appprojects',
          name,
        );
        return true;
      } catch (error) {
        if (isNotFound(error)) return false;
        return fail(`read appproject ${name}`, error, 'appproject', namespace);
      }
    },

    deleteAppProject: (namespace, name) => deleteCustomObject(namespace, 'appprojects', name),

    async deleteNamespace(name: string): Promise<boolean> {
      try {
        await coreApi.deleteNamespace(name);
        return true;
      } catch (error) {
        if (isNotFound(error)) return false;
        return fail(`delete namespace ${name}`, error, 'namespace');
      }
    },

    async stripNamespaceFinalizers(name: string): Promise<void> {
      try {
        const { body } = await coreApi.readNamespace(name);
        body.spec = { ...body.spec, finalizers: [] };
        await coreApi.replaceNamespaceFinalize(name, body);
        logger.warn({ namespace: name }, 'Namespace finalizers stripped');
      } catch (error) {
        if (isNotFound(error)) return;
        fail(`strip finalizers of namespace ${name}`, error, 'namespace');
      }
    },

    async forceDeleteNamespace(name: string): Promise<void> {
      try {
        await coreApi.deleteNamespace(name, undefined, undefined, 0);
      } catch (error) {
        if (isNotFound(error)) return;
        fail(`force delete namespace ${name}`, error, 'namespace');
      }
    },

    async serviceHasEndpoints(namespace: string, name: string): Promise<boolean> {
      try {
        await coreApi.readNamespacedService(name, namespace);
        const { body } = await coreApi.readNamespacedEndpoints(name, namespace);
        return Boolean(body.subsets?.[0]?.addresses?.[0]?.ip);
      } catch (error) {
        if (isNotFound(error)) return false;
        return fail(`read service ${name}`, error, 'service', namespace);
      }
    },

    async probeTls(url: string, image: string, podName: string): Promise<TlsProbeResult> {
      // A pod left behind by an interrupted probe would make `kubectl run` fail
      await runner.execute('kubectl', ['delete', 'pod', podName, '--ignore-not-found=true'], {
        timeout: commandTimeout,
      });

      const result = await runner.execute(
        'kubectl',
        [
          'run',
          podName,
          `--image=${image}`,
          '--rm',
          '-i',
          '--restart=Never',
          '--quiet',
          '--',
          'curl',
          '-s',
          '--connect-timeout',
          '3',
          url,
        ],
        { timeout: probeTimeout },
      );

      if (result.exitCode === 0) {
        return { trusted: true };
      }
      return {
        trusted: false,
        reason: result.timedOut
          ? `probe pod did not finish within ${probeTimeout}ms`
          : result.stderr || `probe exited with code ${result.exitCode}`,
      };
    },
  };
};
