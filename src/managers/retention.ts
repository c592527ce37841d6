import { LATEST_ALIAS } from '../config/constants.js';
import { errorMessage } from '../errors/index.js';
import type { RegionTarget, Settings } from '../types/config.js';
import type { PruneReport } from '../types/snapshot.js';
import { parseSnapshotId } from '../utils/snapshot-id.js';
import type { Reporter } from '../utils/progress.js';
import { bucketName } from './config.js';
import type { ObjectStoreFactory } from './object-store.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionPlan {
  expired: string[];
  retained: string[];
  malformed: string[];
}

/**
 * Sort top-level keys of a bucket into expired, retained and unrecognized.
 *
 * The latest alias and `keep` are always retained. Keys that are not snapshot
 * identifiers are never expired.
 */
export function planRetention(
  keys: readonly string[],
  now: Date,
  retentionDays: number,
  keep?: string
): RetentionPlan {
  const plan: RetentionPlan = { expired: [], retained: [], malformed: [] };
  const windowMs = retentionDays * DAY_MS;

  for (const key of keys) {
    if (key === LATEST_ALIAS || key === keep) {
      plan.retained.push(key);
      continue;
    }

    const created = parseSnapshotId(key);
    if (!created) {
      plan.malformed.push(key);
      continue;
    }

    if (now.getTime() - created.getTime() > windowMs) {
      plan.expired.push(key);
    } else {
      plan.retained.push(key);
    }
  }

  return plan;
}

/**
 * Best-effort removal of expired snapshots, one key at a time.
 */
export class RetentionPruner {
  constructor(
    private settings: Pick<Settings, 'serviceName' | 'retentionDays'>,
    private stores: ObjectStoreFactory,
    private reporter: Reporter
  ) {}

  async prune(region: RegionTarget, now: Date, keep?: string): Promise<PruneReport> {
    const store = this.stores(region);
    const bucket = bucketName(this.settings, region);
    const report: PruneReport = {
      label: region.label,
      bucket,
      deleted: [],
      retained: [],
      malformed: [],
      failed: [],
    };

    let keys: string[];
    try {
      keys = await this.reporter.step(`List snapshots in s3://${bucket}`, () => store.listPrefixes(bucket));
    } catch (error) {
      const message = errorMessage(error);
      this.reporter.warn(`Cleanup of ${region.label} skipped: ${message}`);
      report.failed.push({ key: '*', error: message });
      return report;
    }

    const plan = planRetention(keys, now, this.settings.retentionDays, keep);
    report.retained = plan.retained;
    report.malformed = plan.malformed;

    for (const key of plan.malformed) {
      this.reporter.warn(`Leaving unrecognized key s3://${bucket}/${key}/ in place`);
    }

    for (const key of plan.expired) {
      try {
        await this.reporter.step(`Remove s3://${bucket}/${key}/`, () => store.deletePrefix(bucket, `${key}/`));
        report.deleted.push(key);
      } catch (error) {
        const message = errorMessage(error);
        this.reporter.warn(`Could not remove ${key} from ${region.label}: ${message}`);
        report.failed.push({ key, error: message });
      }
    }

    return report;
  }
}
