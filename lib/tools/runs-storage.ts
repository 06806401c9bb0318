/**
 * Runs Storage - Maintains the index of coordinator runs across batches
 */

import { BatchInProgressError } from '../errors';
import { BatchCounts, BatchOutcome, BatchReport } from '../types';
import { Logger, errorMessage } from '../utils';
import { batchPrefix } from './item-store';
import { StorageTool } from './storage';

export interface RunSummary {
  batch_id: string;
  run_id: string;
  status: 'running' | 'completed' | 'failed';
  outcome?: BatchOutcome;
  started_at: string;
  completed_at?: string;
  duration_ms?: number;
  counts?: BatchCounts;
  error?: string;
}

export interface RunsIndex {
  runs: RunSummary[];
  last_updated: string;
}

const MAX_INDEXED_RUNS = 100;

function isRunsIndex(value: unknown): value is RunsIndex {
  return (
    typeof value === 'object' &&
    value !== null &&
    Array.isArray(Reflect.get(value, 'runs'))
  );
}

function isBatchReport(value: unknown): value is BatchReport {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'run_id') === 'string' &&
    typeof Reflect.get(value, 'outcome') === 'string'
  );
}

export class RunsStorage {
  private storage: StorageTool;
  private indexPath = 'batches/index.json';

  // In-process concurrency guard, one run per batch
  private static activeBatches = new Set<string>();

  constructor(storage: StorageTool = new StorageTool()) {
    this.storage = storage;
  }

  /**
   * Start a run for a batch. Throws BatchInProgressError when the batch
   * already has a run in this process.
   */
  async startRun(batchId: string, runId: string, startedAt: Date = new Date()): Promise<RunSummary> {
    if (RunsStorage.activeBatches.has(batchId)) {
      Logger.warn('Run already in progress', { batch_id: batchId, attempted: runId });
      throw new BatchInProgressError(batchId);
    }
    RunsStorage.activeBatches.add(batchId);

    const summary: RunSummary = {
      batch_id: batchId,
      run_id: runId,
      status: 'running',
      started_at: startedAt.toISOString(),
    };

    try {
      await this.upsert(summary);
    } catch (error) {
      RunsStorage.activeBatches.delete(batchId);
      throw error;
    }

    Logger.info('Run started', { batch_id: batchId, run_id: runId });
    return summary;
  }

  /**
   * Complete a run: store its report and update the index.
   */
  async completeRun(report: BatchReport): Promise<void> {
    try {
      await this.storage.putJson(this.reportPath(report.batch_id, report.run_id), report);
      await this.upsert({
        batch_id: report.batch_id,
        run_id: report.run_id,
        status: 'completed',
        outcome: report.outcome,
        started_at: report.started_at,
        completed_at: report.completed_at,
        duration_ms: Date.parse(report.completed_at) - Date.parse(report.started_at),
        counts: report.counts,
      });
    } finally {
      RunsStorage.activeBatches.delete(report.batch_id);
    }

    Logger.info('Run completed', {
      batch_id: report.batch_id,
      run_id: report.run_id,
      outcome: report.outcome,
    });
  }

  /**
   * Fail a run that could not produce a report (e.g. ranking source down).
   */
  async failRun(batchId: string, runId: string, error: string): Promise<void> {
    try {
      const existing = await this.get(runId);
      const completedAt = new Date().toISOString();
      await this.upsert({
        batch_id: batchId,
        run_id: runId,
        status: 'failed',
        started_at: existing?.started_at ?? completedAt,
        completed_at: completedAt,
        error,
      });
    } finally {
      RunsStorage.activeBatches.delete(batchId);
    }

    Logger.info('Run failed', { batch_id: batchId, run_id: runId, error });
  }

  static isBatchActive(batchId: string): boolean {
    return RunsStorage.activeBatches.has(batchId);
  }

  /**
   * List runs with pagination, newest first
   */
  async list(page: number = 1, pageSize: number = 20): Promise<{
    runs: RunSummary[];
    total: number;
    page: number;
    pageSize: number;
    hasMore: boolean;
  }> {
    const index = await this.loadIndex();

    const start = (page - 1) * pageSize;
    const end = start + pageSize;

    return {
      runs: index.runs.slice(start, end),
      total: index.runs.length,
      page,
      pageSize,
      hasMore: end < index.runs.length,
    };
  }

  async get(runId: string): Promise<RunSummary | null> {
    const index = await this.loadIndex();
    return index.runs.find(r => r.run_id === runId) || null;
  }

  async getReport(batchId: string, runId: string): Promise<BatchReport | null> {
    const value = await this.storage.getJson(this.reportPath(batchId, runId));
    return isBatchReport(value) ? value : null;
  }

  /**
   * Drop index entries of batches that no longer exist.
   */
  async removeBatch(batchId: string): Promise<void> {
    const index = await this.loadIndex();
    const runs = index.runs.filter(r => r.batch_id !== batchId);
    if (runs.length !== index.runs.length) {
      await this.saveIndex({ ...index, runs });
    }
  }

  private async upsert(summary: RunSummary): Promise<void> {
    const index = await this.loadIndex();
    const existingIndex = index.runs.findIndex(r => r.run_id === summary.run_id);

    if (existingIndex >= 0) {
      index.runs[existingIndex] = summary;
    } else {
      // Newest first
      index.runs.unshift(summary);
    }

    if (index.runs.length > MAX_INDEXED_RUNS) {
      index.runs = index.runs.slice(0, MAX_INDEXED_RUNS);
    }

    await this.saveIndex(index);
  }

  private async loadIndex(): Promise<RunsIndex> {
    try {
      const value = await this.storage.getJson(this.indexPath);
      if (isRunsIndex(value)) {
        return value;
      }
    } catch (error) {
      Logger.warn('Failed to load runs index', { error: errorMessage(error) });
    }
    return { runs: [], last_updated: new Date().toISOString() };
  }

  private async saveIndex(index: RunsIndex): Promise<void> {
    try {
      await this.storage.putJson(this.indexPath, {
        ...index,
        last_updated: new Date().toISOString(),
      });
    } catch (error) {
      Logger.error('Failed to save runs index', {
        path: this.indexPath,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  private reportPath(batchId: string, runId: string): string {
    return `${batchPrefix(batchId)}runs/${encodeURIComponent(runId)}.json`;
  }
}
