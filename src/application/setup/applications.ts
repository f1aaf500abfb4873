/**
 * Application Deployer
 *
 * Applies the project descriptor, pauses so the controller indexes the project,
 * then applies each application descriptor. Every descriptor is read and checked
 * before the first one is applied.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadAll } from 'js-yaml';
import type { Logger } from 'pino';
import { z } from 'zod';
import { DESCRIPTORS, TIMINGS } from '../../config/defaults';
import { ConfigError, errorMessage } from '../../errors';
import type { ClusterClient } from '../../infrastructure/kubernetes/client';
import type { Reporter } from '../../lib/reporter';
import { systemClock, type Clock } from '../utils/async-utils';

const DescriptorSchema = z.object({
  apiVersion: z.string(),
  kind: z.string(),
  metadata: z.object({ name: z.string().min(1), namespace: z.string().optional() }),
});

export type Descriptor = z.infer<typeof DescriptorSchema>;

export interface DescriptorFile {
  path: string;
  documents: Descriptor[];
}

export interface DeployedApplications {
  project: string;
  applications: string[];
}

export interface ApplicationDeployerOptions {
  manifestDir: string;
  projectFile?: string;
  applicationFiles?: readonly string[];
  clock?: Clock;
}

/**
 * Parse a descriptor file and require every document to be of `kind`
 */
export async function readDescriptorFile(path: string, kind: string): Promise<DescriptorFile> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read descriptor ${path}: ${errorMessage(error)}`, [
      'ARGOCD_MANIFEST_DIR',
    ]);
  }

  const documents: Descriptor[] = [];
  for (const raw of loadAll(content)) {
    if (raw === null || raw === undefined) continue;
    const parsed = DescriptorSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid descriptor in ${path}: ${parsed.error.issues[0]?.message}`);
    }
    if (parsed.data.kind !== kind) {
      throw new ConfigError(`Expected ${kind} in ${path}, found ${parsed.data.kind}`);
    }
    documents.push(parsed.data);
  }

  if (documents.length === 0) {
    throw new ConfigError(`Descriptor ${path} contains no ${kind}`);
  }
  return { path, documents };
}

export class ApplicationDeployer {
  private readonly logger: Logger;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'applyManifest'>,
    private readonly reporter: Reporter,
    private readonly options: ApplicationDeployerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ApplicationDeployer' });
  }

  async deploy(): Promise<DeployedApplications> {
    const { manifestDir } = this.options;
    const clock = this.options.clock ?? systemClock;

    this.reporter.info('Deploying ArgoCD applications...');

    const project = await readDescriptorFile(
      join(manifestDir, this.options.projectFile ?? DESCRIPTORS.project),
      'AppProject',
    );
    const applications: DescriptorFile[] = [];
    for (const file of this.options.applicationFiles ?? DESCRIPTORS.applications) {
      applications.push(await readDescriptorFile(join(manifestDir, file), 'Application'));
    }

    await this.cluster.applyManifest(project.path);
    await clock.sleep(TIMINGS.projectIndexPauseMs);

    for (const file of applications) {
      await this.cluster.applyManifest(file.path);
      this.logger.debug({ path: file.path }, 'Application descriptor applied');
    }

    this.reporter.success('ArgoCD applications deployed');

    return {
      project: project.documents[0]?.metadata.name ?? '',
      applications: applications.flatMap((file) => file.documents.map((doc) => doc.metadata.name)),
    };
  }
}
