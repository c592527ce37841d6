import { ARCHIVE_NAME, LATEST_ALIAS } from '../config/constants.js';
import { PreconditionError, ToolInvocationError, errorMessage } from '../errors/index.js';
import type { RegionTarget, Settings } from '../types/config.js';
import type { RestorePoint } from '../types/snapshot.js';
import { isSnapshotId } from '../utils/snapshot-id.js';
import { bucketName } from './config.js';
import type { ObjectStoreFactory } from './object-store.js';

/**
 * Confirms a requested restore point exists remotely. Read-only: it never
 * touches the local filesystem.
 */
export class RestoreSelector {
  constructor(
    private settings: Pick<Settings, 'serviceName'>,
    private stores: ObjectStoreFactory
  ) {}

  /**
   * `id` must be exactly `latest` or an identifier; surrounding whitespace is rejected.
   */
  async select(id: string, region: RegionTarget): Promise<RestorePoint> {
    if (id !== LATEST_ALIAS && !isSnapshotId(id)) {
      throw new PreconditionError(
        `'${id}' is not a restore point name`,
        `Use '${LATEST_ALIAS}' or an identifier like 20240131-235959`
      );
    }

    const bucket = bucketName(this.settings, region);
    let keys: string[];
    try {
      keys = await this.stores(region).listObjects(bucket, `${id}/`);
    } catch (error) {
      throw new ToolInvocationError(`List s3://${bucket}/${id}/`, errorMessage(error));
    }

    if (keys.length === 0) {
      throw new PreconditionError(
        `Restore point '${id}' not found in s3://${bucket}`,
        'Run the show command to list available restore points'
      );
    }

    const archiveKey = `${id}/${ARCHIVE_NAME}`;
    if (!keys.includes(archiveKey)) {
      throw new PreconditionError(`Restore point '${id}' in s3://${bucket} has no ${ARCHIVE_NAME}`);
    }

    return { id, region: region.label, bucket, archiveKey };
  }
}
