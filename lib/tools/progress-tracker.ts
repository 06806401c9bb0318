/**
 * Progress Tracker - Simple in-memory progress tracking for batch runs
 */

import { ItemRecord, ItemState } from '../types';

export type StateCounts = Record<ItemState, number>;

export interface BatchProgress {
  batchId: string;
  runId: string;
  startedAt: string;
  status: 'running' | 'completed' | 'failed';
  total: number;
  counts: StateCounts;
  progress: number; // 0-100, share of items in a terminal state
  updatedAt: string;
}

function emptyCounts(): StateCounts {
  return {
    pending: 0,
    content_fetched: 0,
    content_extracted: 0,
    script_generated: 0,
    audio_generated: 0,
    published: 0,
    dead_lettered: 0,
  };
}

export class ProgressTracker {
  private batches: Map<string, BatchProgress> = new Map();

  startRun(batchId: string, runId: string, records: ItemRecord[]): void {
    const counts = emptyCounts();
    for (const record of records) {
      counts[record.stage] += 1;
    }

    const now = new Date().toISOString();
    const progress: BatchProgress = {
      batchId,
      runId,
      startedAt: now,
      status: 'running',
      total: records.length,
      counts,
      progress: 0,
      updatedAt: now,
    };
    progress.progress = this.percentTerminal(progress);
    this.batches.set(batchId, progress);
  }

  /**
   * Moves one item from `from` to its new state.
   */
  recordTransition(record: ItemRecord, from: ItemState): void {
    const batch = this.batches.get(record.batch_id);
    if (!batch) return;

    batch.counts[from] = Math.max(0, batch.counts[from] - 1);
    batch.counts[record.stage] += 1;
    batch.progress = this.percentTerminal(batch);
    batch.updatedAt = new Date().toISOString();
  }

  finishRun(batchId: string, status: 'completed' | 'failed'): void {
    const batch = this.batches.get(batchId);
    if (!batch) return;

    batch.status = status;
    batch.updatedAt = new Date().toISOString();
  }

  getProgress(batchId: string): BatchProgress | null {
    // Support 'latest' to get the most recent run
    if (batchId === 'latest') {
      const all = Array.from(this.batches.values())
        .sort((a, b) => b.startedAt.localeCompare(a.startedAt));
      return all[0] || null;
    }
    return this.batches.get(batchId) || null;
  }

  clearOldRuns(maxAgeMs: number = 60 * 60 * 1000): void {
    const cutoff = Date.now() - maxAgeMs;
    for (const [batchId, batch] of this.batches.entries()) {
      if (batch.status !== 'running' && Date.parse(batch.updatedAt) < cutoff) {
        this.batches.delete(batchId);
      }
    }
  }

  private percentTerminal(batch: BatchProgress): number {
    if (batch.total === 0) return 100;
    const done = batch.counts.published + batch.counts.dead_lettered;
    return Math.round((done / batch.total) * 100);
  }
}

export const progressTracker = new ProgressTracker();
