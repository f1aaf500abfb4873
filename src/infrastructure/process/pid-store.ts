/**
 * PID files at well-known paths, one per managed tunnel, so a later invocation
 * (`--status`, `--teardown`) can find processes an earlier one started.
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { errnoCode } from '../../errors';

const SUFFIX = '-port-forward.pid';

export interface PidStore {
  read(id: string): Promise<number | undefined>;
  write(id: string, pid: number): Promise<void>;
  /** Remove the PID file; absent files are fine */
  remove(id: string): Promise<void>;
  /** Identifiers of every PID file present */
  list(): Promise<string[]>;
  pathOf(id: string): string;
}

export class FilePidStore implements PidStore {
  constructor(private readonly dir: string) {}

  pathOf(id: string): string {
    return join(this.dir, `${id}${SUFFIX}`);
  }

  async read(id: string): Promise<number | undefined> {
    let content: string;
    try {
      content = await readFile(this.pathOf(id), 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return undefined;
      throw error;
    }
    const pid = Number.parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  }

  async write(id: string, pid: number): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathOf(id), `${pid}\n`, 'utf-8');
  }

  async remove(id: string): Promise<void> {
    await rm(this.pathOf(id), { force: true });
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(SUFFIX))
      .map((entry) => entry.slice(0, -SUFFIX.length))
      .sort();
  }
}
