/**
 * Blob Storage Module
 *
 * Stores document bytes in an S3-compatible bucket under opaque keys.
 * S3_ENDPOINT points the client at a non-AWS store (MinIO, LocalStack, R2).
 */

import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { StorageConfig } from '../utils/config.js';

export interface BlobStore {
  /** Upload bytes under `key`, returning the blob URL */
  put(bytes: Uint8Array, key: string, contentType: string): Promise<string>;
  get(key: string): Promise<Uint8Array>;
  /** Resolves false instead of throwing when the store refuses the delete */
  delete(key: string): Promise<boolean>;
  list(prefix?: string): Promise<string[]>;
  exists(key: string): Promise<boolean>;
  /** Whether the bucket is reachable with the configured credentials */
  ping(): Promise<boolean>;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === 'NotFound' || error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404)
  );
}

export class S3BlobStore implements BlobStore {
  private client: S3Client;
  private config: StorageConfig;

  constructor(config: StorageConfig, client?: S3Client) {
    this.config = config;
    this.client =
      client ??
      new S3Client({
        region: config.region,
        ...(config.endpoint ? { endpoint: config.endpoint, forcePathStyle: true } : {}),
      });
  }

  urlFor(key: string): string {
    const encodedKey = key.split('/').map(encodeURIComponent).join('/');
    if (this.config.endpoint) {
      return `${this.config.endpoint.replace(/\/+$/, '')}/${this.config.bucket}/${encodedKey}`;
    }
    return `https://${this.config.bucket}.s3.${this.config.region}.amazonaws.com/${encodedKey}`;
  }

  async put(bytes: Uint8Array, key: string, contentType: string): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.config.bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
      })
    );
    console.log(`[S3] Uploaded ${key} (${bytes.byteLength} bytes)`);
    return this.urlFor(key);
  }

  async get(key: string): Promise<Uint8Array> {
    const result = await this.client.send(new GetObjectCommand({ Bucket: this.config.bucket, Key: key }));
    if (!result.Body) {
      throw new Error(`Blob ${key} has no body`);
    }
    return result.Body.transformToByteArray();
  }

  async delete(key: string): Promise<boolean> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.config.bucket, Key: key }));
      console.log(`[S3] Deleted ${key}`);
      return true;
    } catch (error) {
      console.error(`[S3] Failed to delete ${key}:`, error);
      return false;
    }
  }

  async list(prefix?: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.config.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.config.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.config.bucket }));
      return true;
    } catch (error) {
      console.error(`[S3] Bucket ${this.config.bucket} unreachable:`, error);
      return false;
    }
  }
}
