/**
 * AWS S3 Storage Implementation
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  NotFound,
} from '@aws-sdk/client-s3';
import { Config } from '../config';
import { StorageNotFoundError } from '../errors';
import { Logger, errorMessage } from '../utils';
import type { StorageBackend, StorageObject } from './storage';

export class S3Storage implements StorageBackend {
  private client: S3Client;
  private bucket: string;

  constructor(client?: S3Client, bucket: string = Config.S3_BUCKET) {
    this.bucket = bucket;

    this.client = client ?? new S3Client({
      region: Config.S3_REGION,
      credentials: {
        accessKeyId: Config.S3_ACCESS_KEY,
        secretAccessKey: Config.S3_SECRET_KEY,
      },
      ...(Config.S3_ENDPOINT ? {
        endpoint: Config.S3_ENDPOINT,
        forcePathStyle: true, // Required for MinIO and some S3-compatible services
      } : {}),
    });

    Logger.debug('S3Storage initialized', {
      bucket: this.bucket,
      region: Config.S3_REGION,
      hasEndpoint: !!Config.S3_ENDPOINT,
    });
  }

  async put(key: string, data: Buffer | string, contentType: string): Promise<string> {
    const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: buffer,
          ContentType: contentType,
        })
      );
    } catch (error) {
      Logger.error('S3 put failed', { key, error: errorMessage(error) });
      throw error;
    }

    Logger.debug('S3 put successful', { key, size: buffer.length });
    return this.getPublicUrl(key);
  }

  async get(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );

      if (!response.Body) {
        throw new Error('No data returned from S3');
      }

      const bytes = await response.Body.transformToByteArray();
      return Buffer.from(bytes);
    } catch (error) {
      if (error instanceof NoSuchKey || error instanceof NotFound) {
        throw new StorageNotFoundError(key);
      }
      Logger.error('S3 get failed', { key, error: errorMessage(error) });
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
      return true;
    } catch (error) {
      if (error instanceof NotFound || error instanceof NoSuchKey) {
        return false;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
      Logger.debug('S3 delete successful', { key });
    } catch (error) {
      Logger.error('S3 delete failed', { key, error: errorMessage(error) });
      throw error;
    }
  }

  async list(prefix: string): Promise<StorageObject[]> {
    const objects: StorageObject[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );

      for (const obj of response.Contents || []) {
        if (!obj.Key) continue;
        objects.push({
          path: obj.Key,
          url: this.getPublicUrl(obj.Key),
          size: obj.Size || 0,
          uploadedAt: obj.LastModified || new Date(),
        });
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  async urlFor(key: string): Promise<string> {
    return this.getPublicUrl(key);
  }

  private getPublicUrl(key: string): string {
    if (Config.S3_ENDPOINT) {
      // Custom endpoint (MinIO, DigitalOcean Spaces, etc.)
      const endpoint = Config.S3_ENDPOINT.replace(/\/$/, '');
      return `${endpoint}/${this.bucket}/${key}`;
    }
    return `https://${this.bucket}.s3.${Config.S3_REGION}.amazonaws.com/${key}`;
  }
}
