import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ARCHIVE_NAME } from '../config/constants.js';
import { errorMessage } from '../errors/index.js';
import type { Reporter } from '../utils/progress.js';

/**
 * Local working area of one run:
 *
 *   <root>/<snapshot id>/   unpacked bundle contents
 *   <root>/backup.zip       the compressed bundle
 */
export class Workspace {
  readonly snapshotDir: string;
  readonly archivePath: string;

  constructor(readonly root: string, readonly id: string) {
    this.snapshotDir = path.join(root, id);
    this.archivePath = path.join(root, ARCHIVE_NAME);
  }

  async create(): Promise<void> {
    await fs.mkdir(this.snapshotDir, { recursive: true });
  }

  async destroy(): Promise<void> {
    await fs.rm(this.snapshotDir, { recursive: true, force: true });
    await fs.rm(this.archivePath, { force: true });
  }
}

/**
 * Run `fn` with a freshly created workspace and remove it afterwards,
 * whether `fn` succeeds or throws. A failing teardown is reported, never
 * allowed to mask the outcome of `fn`.
 */
export async function withWorkspace<T>(
  root: string,
  id: string,
  reporter: Reporter,
  fn: (workspace: Workspace) => Promise<T>
): Promise<T> {
  const workspace = new Workspace(root, id);
  await workspace.create();

  try {
    return await fn(workspace);
  } finally {
    try {
      await reporter.step('Local cleanup', () => workspace.destroy());
    } catch (error) {
      reporter.warn(`Could not remove ${workspace.snapshotDir}: ${errorMessage(error)}`);
    }
  }
}
