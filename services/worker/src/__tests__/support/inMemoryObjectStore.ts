import { S3ServiceException } from '@aws-sdk/client-s3';
import type { ObjectStore } from '../../lib/objectStore.js';

export interface StoredObject {
  body: Buffer;
  contentType: string;
}

export type StoreOperation = 'getObjectBuffer' | 'putObject' | 'headBucket' | 'listKeys' | 'deleteKeys' | 'listBucketNames';

export function clientFault(name = 'AccessDenied', httpStatusCode = 403): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: 'client',
    $metadata: { httpStatusCode },
    message: name,
  });
}

export function serverFault(name = 'InternalError'): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: 'server',
    $metadata: { httpStatusCode: 500 },
    message: name,
  });
}

/**
 * S3 stand-in keeping buckets as maps. Failures can be queued per operation.
 */
export class InMemoryObjectStore implements ObjectStore {
  readonly buckets = new Map<string, Map<string, StoredObject>>();
  readonly versions = new Map<string, Buffer>();
  readonly calls: { operation: StoreOperation; bucket?: string; key?: string }[] = [];
  private readonly failures = new Map<StoreOperation, unknown[]>();

  bucket(name: string): Map<string, StoredObject> {
    let bucket = this.buckets.get(name);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(name, bucket);
    }
    return bucket;
  }

  seed(bucket: string, key: string, body: string | Uint8Array, contentType = 'application/octet-stream'): void {
    this.bucket(bucket).set(key, { body: Buffer.from(body), contentType });
  }

  seedVersion(bucket: string, key: string, versionId: string, body: Uint8Array): void {
    this.bucket(bucket);
    this.versions.set(`${bucket}/${key}#${versionId}`, Buffer.from(body));
  }

  failNext(operation: StoreOperation, ...errors: unknown[]): void {
    this.failures.set(operation, [...(this.failures.get(operation) ?? []), ...errors]);
  }

  keys(bucket: string): string[] {
    return [...this.bucket(bucket).keys()].sort();
  }

  count(operation: StoreOperation): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }

  private record(operation: StoreOperation, bucket?: string, key?: string): void {
    this.calls.push({ operation, bucket, key });
    const queued = this.failures.get(operation);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }
  }

  private existing(bucket: string): Map<string, StoredObject> {
    const found = this.buckets.get(bucket);
    if (!found) {
      throw clientFault('NoSuchBucket', 404);
    }
    return found;
  }

  async getObjectBuffer(bucket: string, key: string, versionId?: string): Promise<Buffer> {
    this.record('getObjectBuffer', bucket, key);
    const objects = this.existing(bucket);
    if (versionId !== undefined) {
      const version = this.versions.get(`${bucket}/${key}#${versionId}`);
      if (!version) {
        throw clientFault('NoSuchVersion', 404);
      }
      return version;
    }
    const object = objects.get(key);
    if (!object) {
      throw clientFault('NoSuchKey', 404);
    }
    return object.body;
  }

  async putObject(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void> {
    this.record('putObject', bucket, key);
    this.existing(bucket).set(key, { body: Buffer.from(body), contentType });
  }

  async headBucket(bucket: string): Promise<void> {
    this.record('headBucket', bucket);
    this.existing(bucket);
  }

  async listKeys(bucket: string, prefix?: string): Promise<string[]> {
    this.record('listKeys', bucket);
    return [...this.existing(bucket).keys()].filter((key) => !prefix || key.startsWith(prefix));
  }

  async deleteKeys(bucket: string, keys: string[]): Promise<void> {
    this.record('deleteKeys', bucket);
    const objects = this.existing(bucket);
    for (const key of keys) {
      objects.delete(key);
    }
  }

  async listBucketNames(): Promise<string[]> {
    this.record('listBucketNames');
    return [...this.buckets.keys()];
  }
}
