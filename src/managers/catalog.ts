import type { RegionTarget, Settings } from '../types/config.js';
import { bucketName } from './config.js';
import type { ObjectStoreFactory } from './object-store.js';

/**
 * Restore points available in a region, oldest first. The "latest" alias is
 * part of the list and sorts after every dated identifier.
 */
export class SnapshotCatalog {
  constructor(
    private settings: Pick<Settings, 'serviceName'>,
    private stores: ObjectStoreFactory
  ) {}

  async list(region: RegionTarget): Promise<string[]> {
    const keys = await this.stores(region).listPrefixes(bucketName(this.settings, region));
    return [...keys].sort();
  }
}
