/**
 * Amazon S3 blob store for archived meetings
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { ArchivalConfig } from '../config.js';

/**
 * Write-only key/value sink the archival publisher depends on
 */
export interface BlobStore {
  /** Human-readable location, used in logs */
  readonly location: string;
  /** `signal` aborts the write when the caller stops waiting for it */
  put(key: string, body: string, contentType: string, signal?: AbortSignal): Promise<void>;
  /** Verify the destination is reachable with the configured credentials */
  check(signal?: AbortSignal): Promise<void>;
  /** Time-limited URL for reading back an object */
  getReadUrl(key: string, expiresInSeconds: number): Promise<string>;
}

export class S3BlobStore implements BlobStore {
  readonly location: string;
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(config: Pick<ArchivalConfig, 'bucket' | 'region' | 'accessKeyId' | 'secretAccessKey'>) {
    this.bucket = config.bucket;
    this.location = `s3://${config.bucket}`;
    this.client = new S3Client({
      region: config.region,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      maxAttempts: 2,
    });
  }

  async put(key: string, body: string, contentType: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: Buffer.from(body, 'utf-8'),
        ContentType: contentType,
      }),
      { abortSignal: signal }
    );
  }

  async check(signal?: AbortSignal): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }), { abortSignal: signal });
  }

  async getReadUrl(key: string, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      { expiresIn: expiresInSeconds }
    );
  }
}
