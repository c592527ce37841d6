import { describe, test, expect } from 'vitest';
import { RetentionPruner, planRetention } from '../src/managers/retention.js';
import { formatSnapshotId } from '../src/utils/snapshot-id.js';
import { MemoryStores } from './helpers/memory-store.js';
import { createSilentReporter, makeSettings } from './helpers/setup.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const now = new Date(2024, 5, 15, 12, 0, 0);

function daysAgo(days: number): string {
  return formatSnapshotId(new Date(now.getTime() - days * DAY_MS));
}

describe('planRetention', () => {
  test('expires only snapshots strictly older than the window', () => {
    const keys = [5, 29, 30, 31, 100].map(daysAgo);

    const plan = planRetention(keys, now, 30);

    expect(plan.expired).toEqual([daysAgo(31), daysAgo(100)]);
    expect(plan.retained).toEqual([daysAgo(5), daysAgo(29), daysAgo(30)]);
    expect(plan.malformed).toEqual([]);
  });

  test('always keeps the latest alias and the kept snapshot', () => {
    const old = daysAgo(400);

    const plan = planRetention(['latest', old, daysAgo(500)], now, 30, old);

    expect(plan.retained).toEqual(['latest', old]);
    expect(plan.expired).toEqual([daysAgo(500)]);
  });

  test('never expires keys that are not snapshot identifiers', () => {
    const plan = planRetention(['manual-copy', '20241301-000000', 'tmp'], now, 1);

    expect(plan.malformed).toEqual(['manual-copy', '20241301-000000', 'tmp']);
    expect(plan.expired).toEqual([]);
  });
});

describe('RetentionPruner', () => {
  const region = { label: 'primary', endpoint: 's3.one.example' };
  const bucket = 'shop-backup-primary';

  test('deletes expired snapshots and reports the rest', async () => {
    const stores = new MemoryStores();
    const store = stores.get('primary');
    for (const days of [5, 29, 30, 31, 100]) {
      store.seed(bucket, `${daysAgo(days)}/backup.zip`);
    }
    store.seed(bucket, 'latest/backup.zip');
    store.seed(bucket, 'notes/readme.txt');
    const pruner = new RetentionPruner(makeSettings(), stores.factory, createSilentReporter());

    const report = await pruner.prune(region, now);

    expect(report.deleted.sort()).toEqual([daysAgo(100), daysAgo(31)].sort());
    expect(report.malformed).toEqual(['notes']);
    expect(report.failed).toEqual([]);
    expect(store.keys(bucket)).toEqual([
      `${daysAgo(30)}/backup.zip`,
      `${daysAgo(29)}/backup.zip`,
      `${daysAgo(5)}/backup.zip`,
      'latest/backup.zip',
      'notes/readme.txt',
    ]);
  });

  test('keeps going when one deletion fails', async () => {
    const stores = new MemoryStores();
    const store = stores.get('primary');
    store.seed(bucket, `${daysAgo(40)}/backup.zip`);
    store.seed(bucket, `${daysAgo(50)}/backup.zip`);
    store.failOn('deletePrefix', prefix => prefix === `${daysAgo(50)}/`);
    const reporter = createSilentReporter();
    const pruner = new RetentionPruner(makeSettings(), stores.factory, reporter);

    const report = await pruner.prune(region, now);

    expect(report.deleted).toEqual([daysAgo(40)]);
    expect(report.failed).toEqual([{ key: daysAgo(50), error: 'deletePrefix refused' }]);
    expect(store.keys(bucket)).toEqual([`${daysAgo(50)}/backup.zip`]);
    expect(reporter.warnings).toEqual([`Could not remove ${daysAgo(50)} from primary: deletePrefix refused`]);
  });

  test('skips the region when listing fails', async () => {
    const stores = new MemoryStores();
    stores.get('primary').failOn('listPrefixes');
    const pruner = new RetentionPruner(makeSettings(), stores.factory, createSilentReporter());

    const report = await pruner.prune(region, now);

    expect(report.deleted).toEqual([]);
    expect(report.failed).toEqual([{ key: '*', error: 'listPrefixes refused' }]);
  });
});
