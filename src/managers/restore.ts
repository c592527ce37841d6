import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { $ } from 'execa';
import { DUMP_EXTENSION } from '../config/constants.js';
import { ToolInvocationError, errorMessage } from '../errors/index.js';
import type { RegionTarget, Settings } from '../types/config.js';
import type { RestorePoint, RestoreReport, RestoreTarget } from '../types/snapshot.js';
import { bundlePathFor, resolveRestorePath } from '../utils/paths.js';
import type { Reporter } from '../utils/progress.js';
import type { ArchiveManager } from './archive.js';
import { describeFailure, type DatabaseClient } from './database.js';
import type { ObjectStoreFactory } from './object-store.js';
import type { Workspace } from './workspace.js';

export type HookRunner = (command: string) => Promise<void>;

export interface Ownership {
  uid: number;
  gid: number;
}

export interface RestoreRequest {
  workspace: Workspace;
  point: RestorePoint;
  region: RegionTarget;
  target: RestoreTarget;
  hook?: string;
}

/**
 * Runs a post-restore hook executable.
 */
export const runHookCommand: HookRunner = async (command) => {
  try {
    await $`${command}`;
  } catch (error) {
    throw new ToolInvocationError('Post-restore hook', describeFailure(error));
  }
};

/**
 * Replaces local paths and databases with the contents of a snapshot.
 *
 * Paths keep the owner and group they had before the restore. Databases are
 * restored one after another; a failing database is reported and the next
 * one is still attempted (no rollback of the ones already loaded).
 */
export class RestoreExecutor {
  constructor(
    private settings: Pick<Settings, 'allowedRoot'>,
    private stores: ObjectStoreFactory,
    private database: DatabaseClient | null,
    private archive: ArchiveManager,
    private reporter: Reporter,
    private runHook: HookRunner = runHookCommand
  ) {}

  /**
   * Fails on the first path that must not be emptied, before anything is touched.
   */
  checkPaths(paths: readonly string[]): string[] {
    return paths.map(p => resolveRestorePath(p, this.settings.allowedRoot));
  }

  async restore(request: RestoreRequest): Promise<RestoreReport> {
    const { workspace, point, region, target } = request;
    const paths = this.checkPaths(target.paths);

    await this.reporter.step(`Download ${point.id} from s3://${point.bucket}`, async () => {
      try {
        await this.stores(region).getObject(point.bucket, point.archiveKey, workspace.archivePath);
      } catch (error) {
        throw new ToolInvocationError('Download snapshot', errorMessage(error));
      }
    });

    await this.reporter.step('Uncompress snapshot', async () => {
      try {
        await this.archive.extract(workspace.archivePath, workspace.snapshotDir);
      } catch (error) {
        throw new ToolInvocationError('Uncompress snapshot', errorMessage(error));
      }
    });

    const report: RestoreReport = { point, paths: [], databases: [], hookRan: false };

    if (paths.length === 0) {
      this.reporter.warn('No paths configured, skipping file restore');
    }
    for (const targetPath of paths) {
      report.paths.push(await this.restorePath(targetPath, workspace.snapshotDir));
    }

    const databases = target.databases.length > 0
      ? [...target.databases]
      : await findDumps(workspace.snapshotDir);

    if (databases.length === 0) {
      this.reporter.warn('No database in the snapshot, skipping database restore');
    } else if (!this.database) {
      this.reporter.warn('Snapshot contains databases but no database credentials are configured, skipping them');
      for (const name of databases) {
        report.databases.push({ name, restored: false, error: 'no database credentials configured' });
      }
    } else {
      for (const name of databases) {
        report.databases.push(await this.restoreDatabase(this.database, name, workspace.snapshotDir));
      }
    }

    const incomplete = report.databases.some(db => !db.restored);
    if (request.hook) {
      if (incomplete) {
        this.reporter.warn(`Not running post-restore hook ${request.hook}: the restore is incomplete`);
      } else {
        const hook = request.hook;
        await this.reporter.step('Run post-restore hook', () => this.runHook(hook));
        report.hookRan = true;
      }
    }

    return report;
  }

  private async restorePath(targetPath: string, bundleDir: string): Promise<RestoreReport['paths'][number]> {
    const source = bundlePathFor(bundleDir, targetPath);
    const sourceStats = await fs.lstat(source).catch(() => null);
    if (!sourceStats) {
      this.reporter.warn(`${targetPath} is not part of this snapshot, leaving it untouched`);
      return { path: targetPath, restored: false, reason: 'not in snapshot' };
    }

    const owner = await this.reporter.step(`Read ownership of ${targetPath}`, () =>
      recordOwnership(targetPath, sourceStats.isDirectory())
    );

    await this.reporter.step(`Restore ${targetPath} (${owner.uid}:${owner.gid})`, async () => {
      // Last check before anything is removed
      const safePath = resolveRestorePath(targetPath, this.settings.allowedRoot);
      try {
        if (sourceStats.isDirectory()) {
          await emptyDirectory(safePath);
          await moveEntries(source, safePath);
        } else {
          await fs.rm(safePath, { recursive: true, force: true });
          await move(source, safePath);
        }
      } catch (error) {
        throw new ToolInvocationError(`Restore ${targetPath}`, errorMessage(error));
      }
      try {
        await chownRecursive(safePath, owner);
      } catch (error) {
        throw new ToolInvocationError(`Restore ownership of ${targetPath}`, errorMessage(error));
      }
    });

    return { path: targetPath, restored: true };
  }

  private async restoreDatabase(
    database: DatabaseClient,
    name: string,
    bundleDir: string
  ): Promise<RestoreReport['databases'][number]> {
    const dump = path.join(bundleDir, `${name}${DUMP_EXTENSION}`);
    try {
      await fs.access(dump);
      await this.reporter.step(`Drop database ${name}`, async () => {
        const outcome = await database.dropDatabase(name);
        if (outcome === 'absent') {
          this.reporter.info(`${name} did not exist yet`);
        }
      });
      await this.reporter.step(`Create database ${name}`, () => database.createDatabase(name));
      await this.reporter.step(`Load ${name}${DUMP_EXTENSION}`, () => database.loadDump(name, dump));
      return { name, restored: true };
    } catch (error) {
      const message = errorMessage(error);
      this.reporter.warn(`Database ${name} was not restored: ${message}`);
      return { name, restored: false, error: message };
    }
  }
}

/**
 * Owner and group to reapply after the restore. A path that does not exist
 * yet is created and inherits its parent's ownership.
 */
export async function recordOwnership(target: string, isDirectory: boolean): Promise<Ownership> {
  const current = await fs.stat(target).catch(() => null);
  if (current) {
    return { uid: current.uid, gid: current.gid };
  }

  const parent = path.dirname(target);
  await fs.mkdir(isDirectory ? target : parent, { recursive: true });
  const parentStats = await fs.stat(parent);
  return { uid: parentStats.uid, gid: parentStats.gid };
}

/**
 * Database names derived from the dumps at the bundle root.
 */
export async function findDumps(bundleDir: string): Promise<string[]> {
  const entries = await fs.readdir(bundleDir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.endsWith(DUMP_EXTENSION))
    .map(entry => entry.name.slice(0, -DUMP_EXTENSION.length))
    .filter(name => name !== '')
    .sort();
}

async function emptyDirectory(dir: string): Promise<void> {
  const entries = await fs.readdir(dir);
  for (const entry of entries) {
    await fs.rm(path.join(dir, entry), { recursive: true, force: true });
  }
}

async function moveEntries(sourceDir: string, targetDir: string): Promise<void> {
  const entries = await fs.readdir(sourceDir);
  for (const entry of entries) {
    await move(path.join(sourceDir, entry), path.join(targetDir, entry));
  }
}

async function move(source: string, target: string): Promise<void> {
  try {
    await fs.rename(source, target);
  } catch (error) {
    // Workspace and target on different filesystems
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      await fs.cp(source, target, { recursive: true, preserveTimestamps: true, verbatimSymlinks: true });
      await fs.rm(source, { recursive: true, force: true });
      return;
    }
    throw error;
  }
}

async function chownRecursive(target: string, owner: Ownership): Promise<void> {
  await fs.lchown(target, owner.uid, owner.gid);

  const stats = await fs.lstat(target);
  if (!stats.isDirectory()) {
    return;
  }

  const entries = await fs.readdir(target, { withFileTypes: true });
  for (const entry of entries) {
    const child = path.join(target, entry.name);
    if (entry.isDirectory()) {
      await chownRecursive(child, owner);
    } else {
      await fs.lchown(child, owner.uid, owner.gid);
    }
  }
}
