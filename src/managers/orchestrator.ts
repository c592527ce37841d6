import { LATEST_ALIAS } from '../config/constants.js';
import type { Settings } from '../types/config.js';
import type { BackupReport, PruneReport, RestorePoint, RestoreReport } from '../types/snapshot.js';
import type { Reporter } from '../utils/progress.js';
import { formatSnapshotId } from '../utils/snapshot-id.js';
import { ArchiveManager } from './archive.js';
import { SnapshotBuilder } from './builder.js';
import { SnapshotCatalog } from './catalog.js';
import { bucketName, selectRegion } from './config.js';
import type { DatabaseClient } from './database.js';
import type { ObjectStoreFactory } from './object-store.js';
import { ObjectStoreReplicator } from './replicator.js';
import { RestoreExecutor, runHookCommand, type HookRunner } from './restore.js';
import { RetentionPruner } from './retention.js';
import { RestoreSelector } from './selector.js';
import { withWorkspace } from './workspace.js';

export interface OrchestratorDeps {
  settings: Settings;
  stores: ObjectStoreFactory;
  database: DatabaseClient | null;
  reporter: Reporter;
  archive?: ArchiveManager;
  runHook?: HookRunner;
  clock?: () => Date;
}

export interface RestoreOptions {
  hook?: string;
}

/**
 * Sequences the components for each mode and owns the workspace lifecycle.
 *
 *   backup:  build -> publish to every region -> prune regions that were published
 *   restore: locate (no side effects) -> download, unpack, replace
 *   show:    list restore points
 */
export class SyncOrchestrator {
  private settings: Settings;
  private reporter: Reporter;
  private clock: () => Date;
  private builder: SnapshotBuilder;
  private replicator: ObjectStoreReplicator;
  private pruner: RetentionPruner;
  private selector: RestoreSelector;
  private executor: RestoreExecutor;
  private catalog: SnapshotCatalog;

  constructor(deps: OrchestratorDeps) {
    const archive = deps.archive ?? new ArchiveManager();
    this.settings = deps.settings;
    this.reporter = deps.reporter;
    this.clock = deps.clock ?? (() => new Date());
    this.builder = new SnapshotBuilder(deps.database, archive, deps.reporter);
    this.replicator = new ObjectStoreReplicator(deps.settings, deps.stores, deps.reporter);
    this.pruner = new RetentionPruner(deps.settings, deps.stores, deps.reporter);
    this.selector = new RestoreSelector(deps.settings, deps.stores);
    this.executor = new RestoreExecutor(
      deps.settings,
      deps.stores,
      deps.database,
      archive,
      deps.reporter,
      deps.runHook ?? runHookCommand
    );
    this.catalog = new SnapshotCatalog(deps.settings, deps.stores);
  }

  async backup(): Promise<BackupReport> {
    const startedAt = this.clock();
    const id = formatSnapshotId(startedAt);

    // Decide what goes into the bundle before anything is written locally
    const databases = await this.builder.resolveDatabases(this.settings.databases);
    this.builder.assertNotEmpty(databases, this.settings.paths);

    return withWorkspace(this.settings.workingDir, id, this.reporter, async (workspace) => {
      const bundle = await this.builder.build(workspace, databases, this.settings.paths);
      const regions = await this.replicator.publish(bundle);

      const pruned: PruneReport[] = [];
      for (const outcome of regions) {
        if (!outcome.ok) {
          this.reporter.warn(`Skipping cleanup of ${outcome.label}: publishing failed there`);
          continue;
        }
        const region = selectRegion(this.settings, outcome.label);
        pruned.push(await this.pruner.prune(region, startedAt, id));
      }

      return { bundle, regions, pruned };
    });
  }

  /**
   * Validate a restore point. Nothing local is created or removed.
   */
  async locateRestorePoint(requested: string = LATEST_ALIAS, regionLabel?: string): Promise<RestorePoint> {
    this.executor.checkPaths(this.settings.paths);
    const region = selectRegion(this.settings, regionLabel);
    return this.selector.select(requested, region);
  }

  async restore(point: RestorePoint, options: RestoreOptions = {}): Promise<RestoreReport> {
    const region = selectRegion(this.settings, point.region);
    this.executor.checkPaths(this.settings.paths);
    const id = formatSnapshotId(this.clock());

    return withWorkspace(this.settings.workingDir, id, this.reporter, (workspace) =>
      this.executor.restore({
        workspace,
        point,
        region,
        target: { paths: this.settings.paths, databases: this.settings.databases },
        hook: options.hook,
      })
    );
  }

  async show(regionLabel?: string): Promise<{ bucket: string; region: string; points: string[] }> {
    const region = selectRegion(this.settings, regionLabel);
    const points = await this.catalog.list(region);
    return { bucket: bucketName(this.settings, region), region: region.label, points };
  }
}
