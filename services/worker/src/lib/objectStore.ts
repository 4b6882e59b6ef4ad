/**
 * Object Store Client (S3/MinIO)
 *
 * The pipeline only talks to S3 through the ObjectStore interface, so the
 * same code runs against the source account (ambient credentials) and the
 * destination account (assumed-role credentials).
 */

import {
  S3Client,
  type S3ClientConfig,
  GetObjectCommand,
  PutObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  DeleteObjectsCommand,
  ListBucketsCommand,
} from '@aws-sdk/client-s3';
import { loadConfig } from './config.js';
import { DeleteObjectsError } from './errors.js';
import type { TemporaryCredentials } from './credentialBroker.js';

// Hard limit of a single DeleteObjects request
export const DELETE_BATCH_SIZE = 1000;

export interface ObjectStore {
  getObjectBuffer(bucket: string, key: string, versionId?: string): Promise<Buffer>;
  putObject(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void>;
  headBucket(bucket: string): Promise<void>;
  /**
   * Every key in the bucket, following continuation tokens until the listing is complete
   */
  listKeys(bucket: string, prefix?: string): Promise<string[]>;
  deleteKeys(bucket: string, keys: string[]): Promise<void>;
  listBucketNames(): Promise<string[]>;
}

/**
 * Get S3 client configured for the environment.
 * Without credentials the SDK falls back to the function's own role.
 */
export function getS3Client(credentials?: TemporaryCredentials): S3Client {
  const config = loadConfig();

  const clientConfig: S3ClientConfig = {
    region: config.awsRegion,
  };

  if (credentials) {
    clientConfig.credentials = {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
      expiration: credentials.expiration,
    };
  }

  // MinIO configuration
  if (config.s3Endpoint) {
    clientConfig.endpoint = config.s3Endpoint;
    clientConfig.forcePathStyle = config.s3ForcePathStyle;
  }

  return new S3Client(clientConfig);
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async getObjectBuffer(bucket: string, key: string, versionId?: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
        VersionId: versionId,
      })
    );

    if (!response.Body) {
      throw new Error(`Object not found: ${key} in bucket ${bucket}`);
    }

    return Buffer.from(await response.Body.transformToByteArray());
  }

  async putObject(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
  }

  async headBucket(bucket: string): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
  }

  async listKeys(bucket: string, prefix?: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );

      for (const object of response.Contents ?? []) {
        if (object.Key !== undefined) {
          keys.push(object.Key);
        }
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }

  async deleteKeys(bucket: string, keys: string[]): Promise<void> {
    for (let offset = 0; offset < keys.length; offset += DELETE_BATCH_SIZE) {
      const batch = keys.slice(offset, offset + DELETE_BATCH_SIZE);
      const response = await this.client.send(
        new DeleteObjectsCommand({
          Bucket: bucket,
          Delete: {
            Objects: batch.map((key) => ({ Key: key })),
            Quiet: true,
          },
        })
      );

      // DeleteObjects succeeds at the HTTP level even when individual keys fail
      const failedKeys = (response.Errors ?? []).map((error) => error.Key ?? '<unknown>');
      if (failedKeys.length > 0) {
        throw new DeleteObjectsError(bucket, failedKeys);
      }
    }
  }

  async listBucketNames(): Promise<string[]> {
    const response = await this.client.send(new ListBucketsCommand({}));
    return (response.Buckets ?? []).flatMap((bucket) => (bucket.Name ? [bucket.Name] : []));
  }
}

export function createObjectStore(credentials?: TemporaryCredentials): ObjectStore {
  return new S3ObjectStore(getS3Client(credentials));
}
