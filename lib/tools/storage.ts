/**
 * Storage Tool - Abstraction over local disk, Vercel Blob and S3-compatible storage
 */

import { put, list, del } from '@vercel/blob';
import { Config } from '../config';
import { StorageNotFoundError } from '../errors';
import { Logger } from '../utils';
import { LocalStorage } from './storage-local';
import { S3Storage } from './storage-s3';

export interface StorageObject {
  path: string;
  url: string;
  size: number;
  uploadedAt: Date;
}

export interface StorageBackend {
  put(path: string, data: Buffer | string, contentType: string): Promise<string>;
  get(path: string): Promise<Buffer>;
  exists(path: string): Promise<boolean>;
  list(prefix: string): Promise<StorageObject[]>;
  delete(path: string): Promise<void>;
  urlFor(path: string): Promise<string>;
}

export function createStorageBackend(name: string = Config.STORAGE_BACKEND): StorageBackend {
  switch (name) {
    case 'local':
      return new LocalStorage(Config.DATA_DIR, `${Config.PODCAST_BASE_URL.replace(/\/$/, '')}/files`);
    case 's3':
      return new S3Storage();
    case 'vercel-blob':
      return new BlobStorage();
    default:
      throw new Error(`Unknown storage backend: ${name}`);
  }
}

export class StorageTool {
  private backend: StorageBackend;

  constructor(backend: StorageBackend = createStorageBackend()) {
    this.backend = backend;
  }

  async put(path: string, data: Buffer | string, contentType: string): Promise<string> {
    Logger.debug('Storage put', { path, size: data.length, contentType });
    return this.backend.put(path, data, contentType);
  }

  async get(path: string): Promise<Buffer> {
    Logger.debug('Storage get', { path });
    return this.backend.get(path);
  }

  /**
   * Like get(), but resolves null when the object does not exist.
   */
  async getIfExists(path: string): Promise<Buffer | null> {
    try {
      return await this.backend.get(path);
    } catch (error) {
      if (error instanceof StorageNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  async getJson(path: string): Promise<unknown> {
    const data = await this.getIfExists(path);
    return data === null ? null : JSON.parse(data.toString('utf-8'));
  }

  async putJson(path: string, value: unknown): Promise<string> {
    return this.put(path, JSON.stringify(value, null, 2), 'application/json');
  }

  async exists(path: string): Promise<boolean> {
    return this.backend.exists(path);
  }

  async list(prefix: string): Promise<StorageObject[]> {
    return this.backend.list(prefix);
  }

  async delete(path: string): Promise<void> {
    Logger.debug('Storage delete', { path });
    await this.backend.delete(path);
  }

  async deletePrefix(prefix: string): Promise<number> {
    const objects = await this.backend.list(prefix);
    for (const obj of objects) {
      await this.backend.delete(obj.path);
    }
    return objects.length;
  }

  async urlFor(path: string): Promise<string> {
    return this.backend.urlFor(path);
  }
}

/**
 * Vercel Blob backend. Objects are written without a random suffix so a path
 * always names the same blob.
 */
export class BlobStorage implements StorageBackend {
  private token: string;

  constructor(token: string = Config.BLOB_READ_WRITE_TOKEN) {
    this.token = token;
  }

  async put(path: string, data: Buffer | string, contentType: string): Promise<string> {
    const blob = await put(path, data, {
      access: 'public',
      contentType,
      addRandomSuffix: false,
      token: this.token,
    });

    Logger.debug('Blob created', {
      pathname: blob.pathname,
      url: blob.url,
    });

    return blob.url;
  }

  async get(path: string): Promise<Buffer> {
    const blob = await this.find(path);
    if (!blob) {
      throw new StorageNotFoundError(path);
    }

    const response = await fetch(blob.url);
    if (!response.ok) {
      throw new Error(`Failed to fetch blob: ${response.statusText}`);
    }

    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  async exists(path: string): Promise<boolean> {
    return (await this.find(path)) !== null;
  }

  async list(prefix: string): Promise<StorageObject[]> {
    const objects: StorageObject[] = [];
    let cursor: string | undefined;

    do {
      const result = await list({ prefix, cursor, token: this.token });
      for (const blob of result.blobs) {
        objects.push({
          path: blob.pathname,
          url: blob.url,
          size: blob.size,
          uploadedAt: new Date(blob.uploadedAt),
        });
      }
      cursor = result.hasMore ? result.cursor : undefined;
    } while (cursor);

    return objects;
  }

  async delete(path: string): Promise<void> {
    const blob = await this.find(path);
    if (blob) {
      await del(blob.url, { token: this.token });
    } else {
      Logger.warn('Blob not found for deletion', { path });
    }
  }

  async urlFor(path: string): Promise<string> {
    const blob = await this.find(path);
    if (!blob) {
      throw new StorageNotFoundError(path);
    }
    return blob.url;
  }

  private async find(path: string): Promise<{ url: string } | null> {
    const { blobs } = await list({ prefix: path, limit: 10, token: this.token });
    const exactMatch = blobs.find(b => b.pathname === path);
    return exactMatch ? { url: exactMatch.url } : null;
  }
}
