import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DUMP_EXTENSION, EXCLUDED_DATABASES } from '../config/constants.js';
import { ConfigurationError, ToolInvocationError, errorMessage } from '../errors/index.js';
import { bundlePathFor } from '../utils/paths.js';
import type { Reporter } from '../utils/progress.js';
import type { SnapshotBundle } from '../types/snapshot.js';
import type { ArchiveManager } from './archive.js';
import type { DatabaseClient } from './database.js';
import type { Workspace } from './workspace.js';

/**
 * Assembles a complete local bundle: one dump per database, one mirrored
 * subtree per path, all compressed into a single archive. Any failure aborts
 * the build, so an incomplete bundle never leaves this class.
 */
export class SnapshotBuilder {
  constructor(
    private database: DatabaseClient | null,
    private archive: ArchiveManager,
    private reporter: Reporter
  ) {}

  /**
   * Databases to back up. An empty configured list means "everything the
   * credentials can see", minus the system schemas.
   */
  async resolveDatabases(configured: readonly string[]): Promise<string[]> {
    if (configured.length > 0) {
      return [...configured];
    }

    if (!this.database) {
      this.reporter.warn('No database information available, switching to files only');
      return [];
    }

    const database = this.database;
    this.reporter.info('No database specified, searching with the configured credentials');
    const found = await this.reporter.step('List databases', () => database.listDatabases());
    const databases = found.filter(name => name !== '' && !EXCLUDED_DATABASES.includes(name));
    for (const name of databases) {
      this.reporter.info(`Found database ${name}`);
    }
    return databases;
  }

  /**
   * Refuse to build an empty bundle.
   */
  assertNotEmpty(databases: readonly string[], paths: readonly string[]): void {
    if (databases.length === 0 && paths.length === 0) {
      throw new ConfigurationError(
        ['nothing to back up: no databases and no paths'],
        'Set backup.paths / PATH_LIST or backup.databases / DATABASE_NAME'
      );
    }
  }

  async build(
    workspace: Workspace,
    databases: readonly string[],
    paths: readonly string[]
  ): Promise<SnapshotBundle> {
    this.assertNotEmpty(databases, paths);

    if (databases.length > 0) {
      const database = this.database;
      if (!database) {
        throw new ConfigurationError(['databases requested but no database credentials configured']);
      }
      for (const name of databases) {
        await this.reporter.step(`Dump database ${name}`, () =>
          database.dumpDatabase(name, path.join(workspace.snapshotDir, `${name}${DUMP_EXTENSION}`))
        );
      }
    }

    for (const source of paths) {
      await this.reporter.step(`Copy ${source}`, () => this.copyPath(source, workspace.snapshotDir));
    }

    const sizeBytes = await this.reporter.step('Compress snapshot', async () => {
      try {
        return await this.archive.create(workspace.snapshotDir, workspace.archivePath);
      } catch (error) {
        throw new ToolInvocationError('Compress snapshot', errorMessage(error));
      }
    });

    await this.verify(workspace.archivePath, databases);

    return {
      id: workspace.id,
      archivePath: workspace.archivePath,
      sizeBytes,
      databases: [...databases],
      paths: [...paths],
    };
  }

  private async copyPath(source: string, bundleDir: string): Promise<void> {
    const target = bundlePathFor(bundleDir, source);
    try {
      await fs.access(source);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.cp(source, target, {
        recursive: true,
        preserveTimestamps: true,
        verbatimSymlinks: true,
      });
    } catch (error) {
      throw new ToolInvocationError(`Copy ${source}`, errorMessage(error));
    }
  }

  /**
   * Every requested dump must be at the archive root before publishing.
   */
  private async verify(archivePath: string, databases: readonly string[]): Promise<void> {
    let rootFiles: string[];
    try {
      rootFiles = await this.archive.listRootFiles(archivePath);
    } catch (error) {
      throw new ToolInvocationError('Verify archive', errorMessage(error));
    }

    const missing = databases.filter(name => !rootFiles.includes(`${name}${DUMP_EXTENSION}`));
    if (missing.length > 0) {
      throw new ToolInvocationError('Verify archive', `missing dumps for ${missing.join(', ')}`);
    }
  }
}
