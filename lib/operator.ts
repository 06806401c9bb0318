/**
 * Operator interface - read access to dead letters and item records, manual
 * replay of dead-lettered items, and retention cleanup.
 */

import { Config } from './config';
import { BatchNotFoundError, ItemNotFoundError, ReplayError } from './errors';
import { precedingState } from './pipeline/stages';
import { DeadLetterSink } from './tools/dead-letter-sink';
import { ItemRecordStore, batchPrefix } from './tools/item-store';
import { RunsStorage } from './tools/runs-storage';
import { StorageTool } from './tools/storage';
import { DeadLetterEntry, ItemRecord } from './types';
import { Clock, Logger } from './utils';

export interface PipelineOperatorOptions {
  storage: StorageTool;
  store: ItemRecordStore;
  deadLetters: DeadLetterSink;
  runs: RunsStorage;
  retentionDays?: number;
}

const BATCH_ID_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export class PipelineOperator {
  private storage: StorageTool;
  private store: ItemRecordStore;
  private deadLetters: DeadLetterSink;
  private runs: RunsStorage;
  private retentionDays: number;

  constructor(options: PipelineOperatorOptions) {
    this.storage = options.storage;
    this.store = options.store;
    this.deadLetters = options.deadLetters;
    this.runs = options.runs;
    this.retentionDays = options.retentionDays ?? Config.RETENTION_DAYS;
  }

  async listDeadLetters(batchId: string): Promise<DeadLetterEntry[]> {
    return this.deadLetters.listByBatch(batchId);
  }

  async getItem(batchId: string, itemId: string): Promise<ItemRecord> {
    const record = await this.store.get(batchId, itemId);
    if (!record) {
      throw new ItemNotFoundError(batchId, itemId);
    }
    return record;
  }

  async listItems(batchId: string): Promise<ItemRecord[]> {
    const records = await this.store.listBatch(batchId);
    if (records.length === 0) {
      throw new BatchNotFoundError(batchId);
    }
    return records;
  }

  /**
   * Re-enqueues a dead-lettered item at its failing stage with a fresh retry
   * budget. Outputs of stages it already completed are kept, so the next run
   * resumes where it failed. The item runs on the next coordinator run of
   * its batch.
   */
  async replay(batchId: string, itemId: string): Promise<ItemRecord> {
    if (RunsStorage.isBatchActive(batchId)) {
      throw new ReplayError(`Batch ${batchId} has a run in progress; replay after it finishes`);
    }

    const record = await this.getItem(batchId, itemId);
    if (record.stage !== 'dead_lettered') {
      throw new ReplayError(`Item ${itemId} is ${record.stage}, only dead-lettered items can be replayed`);
    }
    if (record.failed_stage === null) {
      throw new ReplayError(`Item ${itemId} has no recorded failing stage`);
    }

    const replayed: ItemRecord = {
      ...record,
      stage: precedingState(record.failed_stage),
      attempt_count: 0,
      last_error: null,
      failed_stage: null,
      terminal: false,
      replay_count: record.replay_count + 1,
      updated_at: new Date().toISOString(),
    };
    await this.store.save(replayed);

    Logger.info('Item replayed', {
      batch_id: batchId,
      item_id: itemId,
      failed_stage: record.failed_stage,
      to: replayed.stage,
      replay_count: replayed.replay_count,
    });
    return replayed;
  }

  /**
   * Deletes every stored object of batches older than the retention window.
   * Published episodes and the feed are kept. Returns the purged batch ids.
   */
  async purgeExpired(now: Date = new Date()): Promise<string[]> {
    const cutoff = Clock.toDateString(Clock.addDays(now, -this.retentionDays));
    const purged: string[] = [];

    for (const batchId of await this.store.listBatchIds()) {
      if (!BATCH_ID_PATTERN.test(batchId) || batchId >= cutoff) continue;
      if (RunsStorage.isBatchActive(batchId)) continue;

      const deleted = await this.storage.deletePrefix(batchPrefix(batchId));
      await this.runs.removeBatch(batchId);
      purged.push(batchId);

      Logger.info('Batch purged', { batch_id: batchId, objects: deleted });
    }

    return purged;
  }
}
