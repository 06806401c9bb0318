/**
 * Orchestrator - the batch coordinator for one day's items.
 *
 * Enumerates the day's ranked items (or loads them when the batch already
 * exists), runs one ItemStateMachine per non-terminal item under a bounded
 * worker pool and a wall-clock deadline, then aggregates the terminal states
 * into a BatchReport. Items never wait on each other.
 */

import { Config, clampTimerDelay } from './config';
import { SourceUnavailableError } from './errors';
import { computeBackoff } from './pipeline/backoff';
import { CircuitBreakerRegistry } from './pipeline/circuit-breaker';
import { ItemStateMachine, StageExecutors } from './pipeline/item-state-machine';
import { Semaphore } from './pipeline/semaphore';
import { StageExecutor } from './pipeline/stage-executor';
import { STAGE_SEQUENCE, StageHandler, StageHandlers } from './pipeline/stages';
import { RankingSource } from './sources/types';
import { DeadLetterSink } from './tools/dead-letter-sink';
import { FeedPublisher } from './tools/feed-publisher';
import { ItemRecordStore } from './tools/item-store';
import { ProgressTracker, progressTracker } from './tools/progress-tracker';
import { RunsStorage } from './tools/runs-storage';
import {
  BatchCounts,
  BatchOutcome,
  BatchReport,
  DeadLetterEntry,
  DependencyClass,
  ErrorKind,
  ItemFailureSummary,
  ItemRecord,
  PipelineStage,
  RankedItem,
  RetryPolicy,
} from './types';
import { Clock, Logger, errorMessage, sleep } from './utils';

export interface BatchCoordinatorOptions {
  source: RankingSource;
  stages: StageHandlers;
  store: ItemRecordStore;
  deadLetters: DeadLetterSink;
  runs: RunsStorage;
  breakers?: CircuitBreakerRegistry;
  /** Rebuilds the podcast feed after each run; omit to skip. */
  feedPublisher?: FeedPublisher;
  progress?: ProgressTracker;
  batchSize?: number;
  maxConcurrentItems?: number;
  deadlineMs?: number;
  timeZone?: string;
  retryPolicies?: Partial<Record<PipelineStage, RetryPolicy>>;
  /** Retry policy for listing the day's items. */
  enumerationPolicy?: RetryPolicy;
  stageTimeouts?: Partial<Record<PipelineStage, number>>;
  dependencyConcurrency?: Partial<Record<DependencyClass, number>>;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface BatchRunInput {
  /** Defaults to today's date in the configured timezone. */
  batchId?: string;
  now?: Date;
}

interface ItemOutcome {
  record: ItemRecord;
  /** Set when the state machine itself failed (e.g. the store was unreachable). */
  error?: string;
}

class BatchDeadlineExceeded extends Error {
  constructor(deadline: Date) {
    super(`Batch deadline ${deadline.toISOString()} reached`);
    this.name = 'BatchDeadlineExceeded';
  }
}

const DEPENDENCY_CLASSES: readonly DependencyClass[] = ['web', 'extractor', 'llm', 'tts', 'storage'];

export class BatchCoordinator {
  private source: RankingSource;
  private stages: StageHandlers;
  private store: ItemRecordStore;
  private deadLetters: DeadLetterSink;
  private runs: RunsStorage;
  private breakers: CircuitBreakerRegistry;
  private feedPublisher?: FeedPublisher;
  private progress: ProgressTracker;
  private batchSize: number;
  private maxConcurrentItems: number;
  private deadlineMs: number;
  private timeZone: string;
  private retryPolicies: Partial<Record<PipelineStage, RetryPolicy>>;
  private enumerationPolicy: RetryPolicy;
  private stageTimeouts: Partial<Record<PipelineStage, number>>;
  private random: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  // Per-dependency call limits, shared by every run of this coordinator
  private dependencySlots: Map<DependencyClass, Semaphore> = new Map();

  constructor(options: BatchCoordinatorOptions) {
    this.source = options.source;
    this.stages = options.stages;
    this.store = options.store;
    this.deadLetters = options.deadLetters;
    this.runs = options.runs;
    this.breakers = options.breakers ?? new CircuitBreakerRegistry(Config.getBreakerConfig());
    this.feedPublisher = options.feedPublisher;
    this.progress = options.progress ?? progressTracker;
    this.batchSize = options.batchSize ?? Config.BATCH_SIZE;
    this.maxConcurrentItems = options.maxConcurrentItems ?? Config.MAX_CONCURRENT_ITEMS;
    this.deadlineMs = clampTimerDelay(options.deadlineMs ?? Config.getBatchDeadlineMs());
    this.timeZone = options.timeZone ?? Config.TIMEZONE;
    this.retryPolicies = options.retryPolicies ?? {};
    this.enumerationPolicy = options.enumerationPolicy ?? Config.getRetryPolicy('content_fetched');
    this.stageTimeouts = options.stageTimeouts ?? {};
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;

    for (const dependency of DEPENDENCY_CLASSES) {
      const limit = options.dependencyConcurrency?.[dependency] ?? Config.getDependencyConcurrency(dependency);
      this.dependencySlots.set(dependency, new Semaphore(limit));
    }
  }

  /**
   * Runs (or resumes) a batch until every item is terminal or the deadline
   * passes. Throws BatchInProgressError when the batch is already running
   * and SourceUnavailableError when the day's items cannot be listed.
   */
  async run(input: BatchRunInput = {}): Promise<BatchReport> {
    const startedAt = input.now ?? new Date();
    const batchId = input.batchId ?? Clock.batchIdFor(startedAt, this.timeZone);
    const runId = `${batchId}_${Date.now()}`;
    const deadline = new Date(startedAt.getTime() + this.deadlineMs);

    await this.runs.startRun(batchId, runId, startedAt);

    const controller = new AbortController();
    const timer = setTimeout(() => {
      Logger.warn('Batch deadline reached, cancelling in-flight items', {
        batch_id: batchId,
        run_id: runId,
        deadline: deadline.toISOString(),
      });
      controller.abort(new BatchDeadlineExceeded(deadline));
    }, this.deadlineMs);

    Logger.info('Batch run starting', {
      batch_id: batchId,
      run_id: runId,
      deadline: deadline.toISOString(),
      max_concurrent_items: this.maxConcurrentItems,
    });

    try {
      const { records, resumed } = await this.loadRecords(batchId, controller.signal, startedAt);

      this.progress.startRun(batchId, runId, records);
      const outcomes = await this.runItems(records, controller.signal);

      const report = await this.buildReport({
        batchId,
        runId,
        resumed,
        deadline,
        deadlineExceeded: controller.signal.aborted,
        startedAt,
        outcomes,
      });

      if (this.feedPublisher && report.counts.succeeded > 0) {
        report.feed = await this.rebuildFeed(this.feedPublisher);
      }

      await this.runs.completeRun(report);
      this.progress.finishRun(batchId, 'completed');

      Logger.info('Batch run complete', {
        batch_id: batchId,
        run_id: runId,
        outcome: report.outcome,
        counts: report.counts,
        cause_counts: report.cause_counts,
      });
      return report;
    } catch (error) {
      Logger.error('Batch run failed', {
        batch_id: batchId,
        run_id: runId,
        error: errorMessage(error),
      });
      this.progress.finishRun(batchId, 'failed');
      await this.runs.failRun(batchId, runId, errorMessage(error));
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Lists the day's items, retrying with backoff before giving up with
   * SourceUnavailableError.
   */
  async enumerate(signal: AbortSignal): Promise<RankedItem[]> {
    const policy = this.enumerationPolicy;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.source.listTodayItems(this.batchSize, signal);
      } catch (error) {
        if (attempt >= policy.maxRetries || signal.aborted) {
          throw error instanceof SourceUnavailableError
            ? error
            : new SourceUnavailableError(`Ranking source ${this.source.name} failed: ${errorMessage(error)}`);
        }

        const delayMs = computeBackoff(policy, attempt, this.random);
        Logger.warn('Ranking source failed, retrying', {
          source: this.source.name,
          attempt: attempt + 1,
          max_retries: policy.maxRetries,
          delay_ms: delayMs,
          error: errorMessage(error),
        });
        await this.sleep(delayMs, signal);
      }
    }
  }

  /**
   * Loads the batch's records, or enumerates the day's items when the batch is
   * new. The item manifest is saved before any record, and on resume every
   * manifest item without a record gets a fresh pending one.
   */
  private async loadRecords(
    batchId: string,
    signal: AbortSignal,
    now: Date
  ): Promise<{ records: ItemRecord[]; resumed: boolean }> {
    const manifest = await this.store.getManifest(batchId);
    const existing = await this.store.listBatch(batchId);

    if (manifest === null && existing.length === 0) {
      const items = this.dedupe(batchId, await this.enumerate(signal));
      await this.store.saveManifest(batchId, items);
      const records = await this.createRecords(batchId, items, now);
      Logger.info('Batch enumerated', { batch_id: batchId, source: this.source.name, items: records.length });
      return { records, resumed: false };
    }

    const known = new Set(existing.map(record => record.item_id));
    const missing = (manifest ?? []).filter(item => !known.has(item.item_id));
    const created = await this.createRecords(batchId, missing, now);
    const records = existing.concat(created).sort((a, b) => a.rank - b.rank);

    Logger.info('Resuming existing batch', {
      batch_id: batchId,
      items: records.length,
      recreated: created.length,
      pending: records.filter(r => !r.terminal).length,
    });
    return { records, resumed: true };
  }

  private dedupe(batchId: string, items: RankedItem[]): RankedItem[] {
    const seen = new Set<string>();
    const unique: RankedItem[] = [];

    for (const item of items.slice(0, this.batchSize)) {
      if (seen.has(item.item_id)) {
        Logger.warn('Duplicate item id from ranking source', { batch_id: batchId, item_id: item.item_id });
        continue;
      }
      seen.add(item.item_id);
      unique.push(item);
    }
    return unique;
  }

  private async createRecords(batchId: string, items: RankedItem[], now: Date): Promise<ItemRecord[]> {
    const records: ItemRecord[] = [];
    for (const item of items) {
      const record = ItemRecordStore.newRecord(batchId, item, now);
      await this.store.save(record);
      records.push(record);
    }
    return records;
  }

  private async runItems(records: ItemRecord[], signal: AbortSignal): Promise<ItemOutcome[]> {
    const machine = new ItemStateMachine({
      store: this.store,
      deadLetters: this.deadLetters,
      executors: this.buildExecutors(),
      signal,
      onTransition: (record, from) => this.progress.recordTransition(record, from),
      sleep: this.sleep,
    });
    const pool = new Semaphore(this.maxConcurrentItems);

    return Promise.all(
      records.map(record => (record.terminal ? { record } : this.runItem(machine, pool, record, signal)))
    );
  }

  private async runItem(
    machine: ItemStateMachine,
    pool: Semaphore,
    record: ItemRecord,
    signal: AbortSignal
  ): Promise<ItemOutcome> {
    // When the deadline passes while waiting for a slot the machine runs
    // without one: it only records the cancellation.
    const acquired = await pool.acquire(signal);
    try {
      return { record: await machine.run(record) };
    } catch (error) {
      Logger.error('Item state machine failed', {
        severity: 'high',
        batch_id: record.batch_id,
        item_id: record.item_id,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return { record: await this.lastKnownRecord(record), error: errorMessage(error) };
    } finally {
      if (acquired) {
        pool.release();
      }
    }
  }

  private async lastKnownRecord(record: ItemRecord): Promise<ItemRecord> {
    try {
      return (await this.store.get(record.batch_id, record.item_id)) ?? record;
    } catch (error) {
      Logger.warn('Could not reload item record', {
        batch_id: record.batch_id,
        item_id: record.item_id,
        error: errorMessage(error),
      });
      return record;
    }
  }

  private buildExecutors(): StageExecutors {
    return {
      content_fetched: this.buildExecutor(this.stages.content_fetched),
      content_extracted: this.buildExecutor(this.stages.content_extracted),
      script_generated: this.buildExecutor(this.stages.script_generated),
      audio_generated: this.buildExecutor(this.stages.audio_generated),
      published: this.buildExecutor(this.stages.published),
    };
  }

  private buildExecutor<S extends PipelineStage>(handler: StageHandler<S>): StageExecutor<S> {
    const semaphore = this.dependencySlots.get(handler.dependency) ?? new Semaphore(1);
    return new StageExecutor({
      handler,
      policy: this.retryPolicies[handler.stage] ?? Config.getRetryPolicy(handler.stage),
      timeoutMs: this.stageTimeouts[handler.stage] ?? Config.getStageTimeout(handler.stage),
      breaker: this.breakers.get(handler.dependency),
      semaphore,
      random: this.random,
    });
  }

  private async buildReport(args: {
    batchId: string;
    runId: string;
    resumed: boolean;
    deadline: Date;
    deadlineExceeded: boolean;
    startedAt: Date;
    outcomes: ItemOutcome[];
  }): Promise<BatchReport> {
    const entries = await this.deadLetters.listByBatch(args.batchId);
    const latestEntry = new Map<string, DeadLetterEntry>();
    for (const entry of entries) {
      latestEntry.set(entry.item_id, entry);
    }

    const counts: BatchCounts = {
      total: args.outcomes.length,
      succeeded: 0,
      dead_lettered: 0,
      in_progress: 0,
    };
    const published: BatchReport['published'] = [];
    const failures: ItemFailureSummary[] = [];

    for (const outcome of args.outcomes.slice().sort((a, b) => a.record.rank - b.record.rank)) {
      const { record } = outcome;

      if (record.stage === 'published') {
        counts.succeeded++;
        published.push({
          item_id: record.item_id,
          rank: record.rank,
          title: record.payload.metadata.title,
          episode_url: record.payload.outputs.published?.episode_url ?? '',
        });
        continue;
      }

      if (record.stage === 'dead_lettered') {
        counts.dead_lettered++;
        const entry = latestEntry.get(record.item_id);
        const error = entry?.last_error ?? record.last_error;
        failures.push({
          item_id: record.item_id,
          rank: record.rank,
          stage: entry?.stage ?? record.failed_stage ?? STAGE_SEQUENCE[0],
          cause: error?.kind ?? 'internal_error',
          detail: error ? `${error.cause}: ${error.message}` : 'no error recorded',
        });
        continue;
      }

      counts.in_progress++;
      failures.push({
        item_id: record.item_id,
        rank: record.rank,
        stage: record.last_error?.stage ?? STAGE_SEQUENCE[0],
        cause: 'internal_error',
        detail: outcome.error ?? `item left in state ${record.stage}`,
      });
    }

    const causeCounts: Partial<Record<ErrorKind, number>> = {};
    for (const failure of failures) {
      causeCounts[failure.cause] = (causeCounts[failure.cause] ?? 0) + 1;
    }

    return {
      batch_id: args.batchId,
      run_id: args.runId,
      outcome: batchOutcome(counts),
      counts,
      resumed: args.resumed,
      deadline: args.deadline.toISOString(),
      deadline_exceeded: args.deadlineExceeded,
      started_at: args.startedAt.toISOString(),
      completed_at: new Date().toISOString(),
      published,
      failures,
      cause_counts: causeCounts,
    };
  }

  private async rebuildFeed(publisher: FeedPublisher): Promise<BatchReport['feed']> {
    try {
      return await publisher.rebuild();
    } catch (error) {
      Logger.error('Feed rebuild failed', { error: errorMessage(error) });
      return { error: errorMessage(error) };
    }
  }
}

export function batchOutcome(counts: BatchCounts): BatchOutcome {
  if (counts.total > 0 && counts.succeeded === counts.total) {
    return 'full_success';
  }
  return counts.succeeded > 0 ? 'partial_success' : 'total_failure';
}
