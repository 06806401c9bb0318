/**
 * Dead-Letter Sink - append-only record of items that reached dead_lettered.
 *
 * Entries are keyed by (batch_id, item_id, stage, timestamp) and never
 * rewritten, so a replayed item that fails again gets a second entry.
 */

import { DeadLetterEntry, ErrorKind } from '../types';
import { Crypto, Logger } from '../utils';
import { batchPrefix } from './item-store';
import { StorageTool } from './storage';

export type DeadLetterInput = Omit<DeadLetterEntry, 'entry_id' | 'dead_lettered_at'>;

function isDeadLetterEntry(value: unknown): value is DeadLetterEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const field = (key: string): unknown => Reflect.get(value, key);
  const lastError = field('last_error');
  return (
    typeof field('entry_id') === 'string' &&
    typeof field('item_id') === 'string' &&
    typeof field('batch_id') === 'string' &&
    typeof field('stage') === 'string' &&
    typeof field('dead_lettered_at') === 'string' &&
    typeof lastError === 'object' &&
    lastError !== null
  );
}

export class DeadLetterSink {
  private storage: StorageTool;
  private now: () => Date;

  constructor(storage: StorageTool = new StorageTool(), now: () => Date = () => new Date()) {
    this.storage = storage;
    this.now = now;
  }

  async append(input: DeadLetterInput): Promise<DeadLetterEntry> {
    const at = this.now();
    const entry: DeadLetterEntry = {
      entry_id: Crypto.uuid(),
      ...input,
      dead_lettered_at: at.toISOString(),
    };

    const name = [
      encodeURIComponent(entry.item_id),
      entry.stage,
      String(at.getTime()),
      entry.entry_id.slice(0, 8),
    ].join('__');
    await this.storage.putJson(`${batchPrefix(entry.batch_id)}dead-letters/${name}.json`, entry);

    Logger.debug('Dead-letter entry written', {
      batch_id: entry.batch_id,
      item_id: entry.item_id,
      stage: entry.stage,
      entry_id: entry.entry_id,
    });
    return entry;
  }

  /**
   * Entries of a batch, oldest first.
   */
  async listByBatch(batchId: string): Promise<DeadLetterEntry[]> {
    const objects = await this.storage.list(`${batchPrefix(batchId)}dead-letters/`);
    const entries: DeadLetterEntry[] = [];

    for (const obj of objects) {
      if (!obj.path.endsWith('.json')) continue;
      const value = await this.storage.getJson(obj.path);
      if (isDeadLetterEntry(value)) {
        entries.push(value);
      } else {
        Logger.warn('Skipping malformed dead-letter entry', { path: obj.path });
      }
    }

    return entries.sort(
      (a, b) => a.dead_lettered_at.localeCompare(b.dead_lettered_at) || a.rank - b.rank
    );
  }

  async latestForItem(batchId: string, itemId: string): Promise<DeadLetterEntry | null> {
    const entries = (await this.listByBatch(batchId)).filter(e => e.item_id === itemId);
    return entries.length > 0 ? entries[entries.length - 1] : null;
  }

  /**
   * Count of entries per error kind, for the batch report.
   */
  static causeCounts(entries: DeadLetterEntry[]): Partial<Record<ErrorKind, number>> {
    const counts: Partial<Record<ErrorKind, number>> = {};
    for (const entry of entries) {
      counts[entry.last_error.kind] = (counts[entry.last_error.kind] ?? 0) + 1;
    }
    return counts;
  }
}
