/**
 * Item Record Store - one JSON object per item, keyed by (batch_id, item_id)
 */

import { ItemRecord, ItemState, RankedItem } from '../types';
import { Logger } from '../utils';
import { StorageTool } from './storage';

const ITEM_STATES: readonly ItemState[] = [
  'pending',
  'content_fetched',
  'content_extracted',
  'script_generated',
  'audio_generated',
  'published',
  'dead_lettered',
];

export function batchPrefix(batchId: string): string {
  return `batches/${encodeURIComponent(batchId)}/`;
}

export function isItemRecord(value: unknown): value is ItemRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const field = (key: string): unknown => Reflect.get(value, key);
  const payload = field('payload');
  return (
    typeof field('item_id') === 'string' &&
    typeof field('batch_id') === 'string' &&
    typeof field('rank') === 'number' &&
    typeof field('attempt_count') === 'number' &&
    typeof field('terminal') === 'boolean' &&
    typeof payload === 'object' &&
    payload !== null &&
    ITEM_STATES.some(state => state === field('stage'))
  );
}

export function isRankedItem(value: unknown): value is RankedItem {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const field = (key: string): unknown => Reflect.get(value, key);
  return (
    typeof field('item_id') === 'string' &&
    typeof field('rank') === 'number' &&
    typeof field('source_url') === 'string' &&
    typeof field('title') === 'string'
  );
}

export class ItemRecordStore {
  private storage: StorageTool;

  constructor(storage: StorageTool = new StorageTool()) {
    this.storage = storage;
  }

  /**
   * Builds the initial `pending` record for a freshly enumerated item.
   */
  static newRecord(batchId: string, item: RankedItem, now: Date = new Date()): ItemRecord {
    const timestamp = now.toISOString();
    return {
      item_id: item.item_id,
      batch_id: batchId,
      rank: item.rank,
      stage: 'pending',
      attempt_count: 0,
      payload: { metadata: item, outputs: {} },
      last_error: null,
      failed_stage: null,
      replay_count: 0,
      created_at: timestamp,
      updated_at: timestamp,
      terminal: false,
    };
  }

  async save(record: ItemRecord): Promise<void> {
    await this.storage.putJson(this.pathFor(record.batch_id, record.item_id), record);
  }

  async get(batchId: string, itemId: string): Promise<ItemRecord | null> {
    const value = await this.storage.getJson(this.pathFor(batchId, itemId));
    if (value === null) {
      return null;
    }
    if (!isItemRecord(value)) {
      throw new Error(`Malformed item record for ${batchId}/${itemId}`);
    }
    return value;
  }

  /**
   * Stores the enumerated items of a batch. Written before any item record so
   * a run interrupted while creating records can finish the job on resume.
   */
  async saveManifest(batchId: string, items: RankedItem[]): Promise<void> {
    await this.storage.putJson(this.manifestPath(batchId), { batch_id: batchId, items });
  }

  async getManifest(batchId: string): Promise<RankedItem[] | null> {
    const value = await this.storage.getJson(this.manifestPath(batchId));
    if (value === null) {
      return null;
    }
    const items: unknown = typeof value === 'object' && value !== null ? Reflect.get(value, 'items') : undefined;
    if (!Array.isArray(items) || !items.every(isRankedItem)) {
      throw new Error(`Malformed item manifest for ${batchId}`);
    }
    return items;
  }

  /**
   * All records of a batch, in rank order.
   */
  async listBatch(batchId: string): Promise<ItemRecord[]> {
    const objects = await this.storage.list(`${batchPrefix(batchId)}items/`);
    const records: ItemRecord[] = [];

    for (const obj of objects) {
      if (!obj.path.endsWith('.json')) continue;
      const value = await this.storage.getJson(obj.path);
      if (isItemRecord(value)) {
        records.push(value);
      } else {
        Logger.warn('Skipping malformed item record', { path: obj.path });
      }
    }

    return records.sort((a, b) => a.rank - b.rank);
  }

  /**
   * Batch ids that have at least one stored object, oldest first.
   */
  async listBatchIds(): Promise<string[]> {
    const objects = await this.storage.list('batches/');
    const ids = new Set<string>();
    for (const obj of objects) {
      const segment = obj.path.split('/')[1];
      if (segment && obj.path.split('/').length > 2) {
        ids.add(decodeURIComponent(segment));
      }
    }
    return Array.from(ids).sort();
  }

  private manifestPath(batchId: string): string {
    return `${batchPrefix(batchId)}manifest.json`;
  }

  private pathFor(batchId: string, itemId: string): string {
    return `${batchPrefix(batchId)}items/${encodeURIComponent(itemId)}.json`;
  }
}
