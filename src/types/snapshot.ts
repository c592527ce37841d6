/**
 * A complete, local bundle ready to publish.
 */
export interface SnapshotBundle {
  id: string;
  archivePath: string;
  sizeBytes: number;
  databases: string[];
  paths: string[];
}

export type PublishStep = 'upload' | 'clear-alias' | 'copy-alias';

export interface RegionOutcome {
  label: string;
  bucket: string;
  ok: boolean;
  failedStep?: PublishStep;
  error?: string;
}

export interface PruneReport {
  label: string;
  bucket: string;
  deleted: string[];
  retained: string[];
  malformed: string[];
  failed: { key: string; error: string }[];
}

export interface BackupReport {
  bundle: SnapshotBundle;
  regions: RegionOutcome[];
  pruned: PruneReport[];
}

/**
 * A restore point confirmed to exist remotely.
 */
export interface RestorePoint {
  id: string;
  region: string;
  bucket: string;
  archiveKey: string;
}

export interface RestoreReport {
  point: RestorePoint;
  paths: { path: string; restored: boolean; reason?: string }[];
  databases: { name: string; restored: boolean; error?: string }[];
  hookRan: boolean;
}

export interface RestoreTarget {
  paths: readonly string[];
  databases: readonly string[];
}
