import * as fs from 'node:fs/promises';
import type { ObjectStore, ObjectStoreFactory } from '../../src/managers/object-store.js';
import type { RegionTarget } from '../../src/types/config.js';

export type StoreOperation = 'putObject' | 'getObject' | 'listObjects' | 'listPrefixes' | 'deletePrefix' | 'copyPrefix';

/**
 * In-process object store: buckets are maps of key -> content.
 * Calls are recorded, and any operation can be made to fail.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly buckets = new Map<string, Map<string, Buffer>>();
  readonly calls: string[] = [];
  private failures = new Map<StoreOperation, (arg: string) => boolean>();

  failOn(operation: StoreOperation, when: (arg: string) => boolean = () => true): void {
    this.failures.set(operation, when);
  }

  seed(bucket: string, key: string, content: string | Buffer = 'x'): void {
    this.bucket(bucket).set(key, Buffer.isBuffer(content) ? content : Buffer.from(content));
  }

  keys(bucket: string): string[] {
    return [...this.bucket(bucket).keys()].sort();
  }

  async putObject(bucket: string, key: string, file: string): Promise<void> {
    this.record('putObject', bucket, key);
    this.bucket(bucket).set(key, await fs.readFile(file));
  }

  async getObject(bucket: string, key: string, file: string): Promise<void> {
    this.record('getObject', bucket, key);
    const content = this.bucket(bucket).get(key);
    if (!content) {
      throw new Error(`NoSuchKey: ${key}`);
    }
    await fs.writeFile(file, content);
  }

  async listObjects(bucket: string, prefix: string): Promise<string[]> {
    this.record('listObjects', bucket, prefix);
    return this.keys(bucket).filter(key => key.startsWith(prefix));
  }

  async listPrefixes(bucket: string): Promise<string[]> {
    this.record('listPrefixes', bucket, '');
    const prefixes = new Set<string>();
    for (const key of this.keys(bucket)) {
      const slash = key.indexOf('/');
      if (slash > 0) prefixes.add(key.slice(0, slash));
    }
    return [...prefixes];
  }

  async deletePrefix(bucket: string, prefix: string): Promise<number> {
    this.record('deletePrefix', bucket, prefix);
    const keys = this.keys(bucket).filter(key => key.startsWith(prefix));
    for (const key of keys) this.bucket(bucket).delete(key);
    return keys.length;
  }

  async copyPrefix(bucket: string, fromPrefix: string, toPrefix: string): Promise<number> {
    this.record('copyPrefix', bucket, fromPrefix);
    const keys = this.keys(bucket).filter(key => key.startsWith(fromPrefix));
    for (const key of keys) {
      const content = this.bucket(bucket).get(key);
      if (content) this.bucket(bucket).set(toPrefix + key.slice(fromPrefix.length), content);
    }
    return keys.length;
  }

  private bucket(name: string): Map<string, Buffer> {
    let bucket = this.buckets.get(name);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(name, bucket);
    }
    return bucket;
  }

  private record(operation: StoreOperation, bucket: string, arg: string): void {
    this.calls.push(`${operation} ${bucket} ${arg}`.trim());
    const failure = this.failures.get(operation);
    if (failure && failure(arg)) {
      throw new Error(`${operation} refused`);
    }
  }
}

/**
 * One store per region label, created on first use.
 */
export class MemoryStores {
  readonly byLabel = new Map<string, MemoryObjectStore>();

  get(label: string): MemoryObjectStore {
    let store = this.byLabel.get(label);
    if (!store) {
      store = new MemoryObjectStore();
      this.byLabel.set(label, store);
    }
    return store;
  }

  readonly factory: ObjectStoreFactory = (region: RegionTarget) => this.get(region.label);
}
