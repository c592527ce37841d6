import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ObjectStoreReplicator } from '../src/managers/replicator.js';
import type { SnapshotBundle } from '../src/types/snapshot.js';
import { MemoryStores } from './helpers/memory-store.js';
import { createSilentReporter, makeSettings, makeTempDir } from './helpers/setup.js';

describe('ObjectStoreReplicator', () => {
  let tempDir: string;
  let bundle: SnapshotBundle;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    const archivePath = path.join(tempDir, 'backup.zip');
    await fs.writeFile(archivePath, 'zip-bytes');
    bundle = { id: '20240301-120000', archivePath, sizeBytes: 9, databases: [], paths: [] };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('uploads, clears the alias and copies it, in that order', async () => {
    const stores = new MemoryStores();
    const primary = stores.get('primary');
    primary.seed('shop-backup-primary', 'latest/backup.zip', 'old');
    primary.seed('shop-backup-primary', 'latest/stray.txt', 'old');
    const replicator = new ObjectStoreReplicator(makeSettings(), stores.factory, createSilentReporter());

    const outcomes = await replicator.publish(bundle);

    expect(outcomes).toEqual([
      { label: 'primary', bucket: 'shop-backup-primary', ok: true },
      { label: 'secondary', bucket: 'shop-backup-secondary', ok: true },
    ]);
    expect(primary.calls).toEqual([
      'putObject shop-backup-primary 20240301-120000/backup.zip',
      'deletePrefix shop-backup-primary latest/',
      'copyPrefix shop-backup-primary 20240301-120000/',
    ]);
    expect(primary.keys('shop-backup-primary')).toEqual(['20240301-120000/backup.zip', 'latest/backup.zip']);
    expect(primary.buckets.get('shop-backup-primary')?.get('latest/backup.zip')?.toString()).toBe('zip-bytes');
  });

  test('a failing region does not stop the next one', async () => {
    const stores = new MemoryStores();
    stores.get('primary').failOn('putObject');
    const reporter = createSilentReporter();
    const replicator = new ObjectStoreReplicator(makeSettings(), stores.factory, reporter);

    const outcomes = await replicator.publish(bundle);

    expect(outcomes[0]).toEqual({
      label: 'primary',
      bucket: 'shop-backup-primary',
      ok: false,
      failedStep: 'upload',
      error: 'upload failed, latest alias untouched: putObject refused',
    });
    expect(outcomes[1]?.ok).toBe(true);
    expect(stores.get('secondary').keys('shop-backup-secondary')).toEqual([
      '20240301-120000/backup.zip',
      'latest/backup.zip',
    ]);
    expect(reporter.warnings).toEqual(['primary: upload failed, latest alias untouched: putObject refused']);
  });

  test('reports an absent alias when the copy fails', async () => {
    const stores = new MemoryStores();
    const secondary = stores.get('secondary');
    secondary.seed('shop-backup-secondary', 'latest/backup.zip', 'old');
    secondary.failOn('copyPrefix');
    const replicator = new ObjectStoreReplicator(makeSettings(), stores.factory, createSilentReporter());

    const outcomes = await replicator.publish(bundle);

    expect(outcomes[1]).toEqual({
      label: 'secondary',
      bucket: 'shop-backup-secondary',
      ok: false,
      failedStep: 'copy-alias',
      error: 'latest alias is currently absent, copy failed: copyPrefix refused',
    });
    expect(secondary.keys('shop-backup-secondary')).toEqual(['20240301-120000/backup.zip']);
  });
});
