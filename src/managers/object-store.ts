import * as fs from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CopyObjectCommand,
  CreateMultipartUploadCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  UploadPartCopyCommand,
} from '@aws-sdk/client-s3';
import type { CompletedPart, ListObjectsV2CommandOutput } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { errorMessage } from '../errors/index.js';
import type { RegionTarget, StorageCredentials } from '../types/config.js';

/**
 * Object storage as the snapshot lifecycle sees it: flat keys, "directories"
 * are key prefixes ending in "/". Every method throws on failure.
 */
export interface ObjectStore {
  putObject(bucket: string, key: string, file: string): Promise<void>;
  getObject(bucket: string, key: string, file: string): Promise<void>;
  /** Every key below `prefix`. */
  listObjects(bucket: string, prefix: string): Promise<string[]>;
  /** Top-level "directory" names of the bucket, without the trailing slash. */
  listPrefixes(bucket: string): Promise<string[]>;
  /** Returns the number of deleted keys. */
  deletePrefix(bucket: string, prefix: string): Promise<number>;
  /** Returns the number of copied keys. */
  copyPrefix(bucket: string, fromPrefix: string, toPrefix: string): Promise<number>;
}

export type ObjectStoreFactory = (region: RegionTarget) => ObjectStore;

// DeleteObjects accepts at most this many keys per request
const DELETE_BATCH = 1000;

// Largest object a single CopyObject request accepts
export const MAX_SINGLE_COPY_BYTES = 5 * 1024 ** 3;

const UPLOAD_PART_BYTES = 64 * 1024 ** 2;
const COPY_PART_BYTES = 512 * 1024 ** 2;

/**
 * S3-compatible storage, one client per region endpoint.
 */
export class S3ObjectStore implements ObjectStore {
  private client: S3Client;

  constructor(endpoint: string, credentials: StorageCredentials) {
    this.client = new S3Client({
      endpoint: normalizeEndpoint(endpoint),
      region: credentials.signingRegion,
      forcePathStyle: true,
      credentials: {
        accessKeyId: credentials.accessKey,
        secretAccessKey: credentials.secretKey,
      },
    });
  }

  /**
   * Streams the file in parts, so bundles above the single-request limit
   * upload too.
   */
  async putObject(bucket: string, key: string, file: string): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: fs.createReadStream(file),
      },
      partSize: UPLOAD_PART_BYTES,
      queueSize: 4,
    });
    await upload.done();
  }

  async getObject(bucket: string, key: string, file: string): Promise<void> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!(response.Body instanceof Readable)) {
      throw new Error(`Empty or unsupported response body for s3://${bucket}/${key}`);
    }
    await pipeline(response.Body, fs.createWriteStream(file));
  }

  async listObjects(bucket: string, prefix: string): Promise<string[]> {
    const keys: string[] = [];
    for await (const page of this.pages(bucket, prefix)) {
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
    }
    return keys;
  }

  async listPrefixes(bucket: string): Promise<string[]> {
    const prefixes: string[] = [];
    for await (const page of this.pages(bucket, '', '/')) {
      for (const common of page.CommonPrefixes ?? []) {
        if (common.Prefix) prefixes.push(common.Prefix.replace(/\/$/, ''));
      }
    }
    return prefixes;
  }

  async deletePrefix(bucket: string, prefix: string): Promise<number> {
    const keys = await this.listObjects(bucket, prefix);

    for (let i = 0; i < keys.length; i += DELETE_BATCH) {
      const batch = keys.slice(i, i + DELETE_BATCH);
      const result = await this.client.send(new DeleteObjectsCommand({
        Bucket: bucket,
        Delete: { Objects: batch.map(Key => ({ Key })), Quiet: true },
      }));
      const firstError = result.Errors?.[0];
      if (firstError) {
        throw new Error(`Failed to delete s3://${bucket}/${firstError.Key ?? prefix}: ${firstError.Message ?? firstError.Code ?? 'unknown error'}`);
      }
    }

    return keys.length;
  }

  async copyPrefix(bucket: string, fromPrefix: string, toPrefix: string): Promise<number> {
    const keys = await this.listObjects(bucket, fromPrefix);

    for (const key of keys) {
      const source = `${bucket}/${encodeURIComponent(key).replace(/%2F/g, '/')}`;
      const target = toPrefix + key.slice(fromPrefix.length);
      const head = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      const size = head.ContentLength ?? 0;

      if (size > MAX_SINGLE_COPY_BYTES) {
        await this.multipartCopy(bucket, source, target, size);
      } else {
        await this.client.send(new CopyObjectCommand({ Bucket: bucket, CopySource: source, Key: target }));
      }
    }

    return keys.length;
  }

  private async multipartCopy(bucket: string, source: string, key: string, size: number): Promise<void> {
    const { UploadId } = await this.client.send(new CreateMultipartUploadCommand({ Bucket: bucket, Key: key }));
    if (!UploadId) {
      throw new Error(`No upload id returned for s3://${bucket}/${key}`);
    }

    try {
      const parts: CompletedPart[] = [];
      for (const [index, range] of copyPartRanges(size, COPY_PART_BYTES).entries()) {
        const partNumber = index + 1;
        const result = await this.client.send(new UploadPartCopyCommand({
          Bucket: bucket,
          Key: key,
          UploadId,
          PartNumber: partNumber,
          CopySource: source,
          CopySourceRange: range,
        }));
        parts.push({ PartNumber: partNumber, ETag: result.CopyPartResult?.ETag });
      }
      await this.client.send(new CompleteMultipartUploadCommand({
        Bucket: bucket,
        Key: key,
        UploadId,
        MultipartUpload: { Parts: parts },
      }));
    } catch (error) {
      try {
        await this.client.send(new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId }));
      } catch (abortError) {
        throw new Error(`${errorMessage(error)} (aborting upload ${UploadId} also failed: ${errorMessage(abortError)})`);
      }
      throw error;
    }
  }

  private async *pages(bucket: string, prefix: string, delimiter?: string): AsyncGenerator<ListObjectsV2CommandOutput> {
    let token: string | undefined;
    do {
      const page = await this.client.send(new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix,
        Delimiter: delimiter,
        ContinuationToken: token,
      }));
      yield page;
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
  }
}

/**
 * Region endpoints are configured as bare hosts ("s3.gra.example.net");
 * the SDK wants a URL.
 */
export function normalizeEndpoint(endpoint: string): string {
  return /^https?:\/\//.test(endpoint) ? endpoint : `https://${endpoint}`;
}

export function createS3StoreFactory(credentials: StorageCredentials): ObjectStoreFactory {
  return (region) => new S3ObjectStore(region.endpoint, credentials);
}

/**
 * Byte ranges ("bytes=first-last", inclusive) covering `size` bytes in
 * parts of at most `partSize`.
 */
export function copyPartRanges(size: number, partSize: number): string[] {
  const ranges: string[] = [];
  for (let start = 0; start < size; start += partSize) {
    ranges.push(`bytes=${start}-${Math.min(start + partSize, size) - 1}`);
  }
  return ranges;
}
