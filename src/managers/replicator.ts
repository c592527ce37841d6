import { ARCHIVE_NAME, LATEST_ALIAS } from '../config/constants.js';
import { errorMessage } from '../errors/index.js';
import type { RegionTarget, Settings } from '../types/config.js';
import type { PublishStep, RegionOutcome, SnapshotBundle } from '../types/snapshot.js';
import type { Reporter } from '../utils/progress.js';
import { bucketName } from './config.js';
import type { ObjectStoreFactory } from './object-store.js';

/**
 * Publishes a bundle to every region and re-points each region's latest alias.
 *
 * Per region, strictly in this order:
 *   1. put   <bucket>/<id>/backup.zip
 *   2. del   <bucket>/latest/
 *   3. copy  <bucket>/<id>/ -> <bucket>/latest/
 *
 * A failure between 2 and 3 leaves the alias absent, never stale.
 * Regions are independent: one failing region does not stop the others.
 */
export class ObjectStoreReplicator {
  constructor(
    private settings: Pick<Settings, 'serviceName' | 'regions'>,
    private stores: ObjectStoreFactory,
    private reporter: Reporter
  ) {}

  async publish(bundle: SnapshotBundle): Promise<RegionOutcome[]> {
    const outcomes: RegionOutcome[] = [];

    for (const region of this.settings.regions) {
      outcomes.push(await this.publishToRegion(bundle, region));
    }

    return outcomes;
  }

  private async publishToRegion(bundle: SnapshotBundle, region: RegionTarget): Promise<RegionOutcome> {
    const store = this.stores(region);
    const bucket = bucketName(this.settings, region);
    const snapshotPrefix = `${bundle.id}/`;
    const aliasPrefix = `${LATEST_ALIAS}/`;

    let step: PublishStep = 'upload';
    try {
      await this.reporter.step(`Upload to s3://${bucket} (${region.endpoint})`, async () => {
        await store.putObject(bucket, `${snapshotPrefix}${ARCHIVE_NAME}`, bundle.archivePath);
        step = 'clear-alias';
        await store.deletePrefix(bucket, aliasPrefix);
        step = 'copy-alias';
        await store.copyPrefix(bucket, snapshotPrefix, aliasPrefix);
      });
      return { label: region.label, bucket, ok: true };
    } catch (error) {
      const detail = describeStepFailure(step, errorMessage(error));
      this.reporter.warn(`${region.label}: ${detail}`);
      return { label: region.label, bucket, ok: false, failedStep: step, error: detail };
    }
  }
}

function describeStepFailure(step: PublishStep, message: string): string {
  switch (step) {
    case 'upload':
      return `upload failed, latest alias untouched: ${message}`;
    case 'clear-alias':
      return `could not clear the latest alias: ${message}`;
    case 'copy-alias':
      return `latest alias is currently absent, copy failed: ${message}`;
  }
}
