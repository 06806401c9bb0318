/**
 * Local disk storage - objects are files under a root directory
 */

import { Dirent, promises as fs } from 'fs';
import path from 'path';
import { StorageNotFoundError } from '../errors';
import { Crypto, Logger } from '../utils';
import type { StorageBackend, StorageObject } from './storage';

export class LocalStorage implements StorageBackend {
  private root: string;
  private baseUrl: string;

  constructor(root: string, baseUrl: string) {
    this.root = path.resolve(root);
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async put(key: string, data: Buffer | string, _contentType: string): Promise<string> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });

    // Write-then-rename so readers never observe a partially written object.
    const temp = `${target}.${Crypto.uuid()}.tmp`;
    await fs.writeFile(temp, data);
    await fs.rename(temp, target);

    return this.publicUrl(key);
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(key));
    } catch (error) {
      if (isNotFound(error)) {
        throw new StorageNotFoundError(key);
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolve(key));
      return stat.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(prefix: string): Promise<StorageObject[]> {
    // Walk from the deepest directory fully named by the prefix.
    const dirPart = prefix.includes('/') ? prefix.substring(0, prefix.lastIndexOf('/')) : '';
    const objects: StorageObject[] = [];
    await this.walk(this.resolve(dirPart), objects);

    return objects
      .filter(obj => obj.path.startsWith(prefix))
      .sort((a, b) => a.path.localeCompare(b.path));
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(this.resolve(key));
    } catch (error) {
      if (isNotFound(error)) {
        Logger.warn('Local object not found for deletion', { path: key });
        return;
      }
      throw error;
    }
  }

  async urlFor(key: string): Promise<string> {
    return this.publicUrl(key);
  }

  private async walk(dir: string, out: StorageObject[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(full, out);
      } else if (entry.isFile() && !entry.name.endsWith('.tmp')) {
        const stat = await fs.stat(full);
        const key = path.relative(this.root, full).split(path.sep).join('/');
        out.push({
          path: key,
          url: this.publicUrl(key),
          size: stat.size,
          uploadedAt: stat.mtime,
        });
      }
    }
  }

  private resolve(key: string): string {
    const target = path.resolve(this.root, key);
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new Error(`Storage key escapes the storage root: ${key}`);
    }
    return target;
  }

  private publicUrl(key: string): string {
    return `${this.baseUrl}/${key}`;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
