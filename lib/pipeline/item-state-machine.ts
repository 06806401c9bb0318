/**
 * Item State Machine - drives one item through the stage sequence.
 *
 * pending -> content_fetched -> content_extracted -> script_generated
 *         -> audio_generated -> published, with dead_lettered reachable from
 * any non-terminal state. The record is persisted after every transition and
 * every retry, so a resumed item re-runs only the stage it was in.
 */

import { IllegalTransitionError } from '../errors';
import { DeadLetterSink } from '../tools/dead-letter-sink';
import { ItemRecordStore } from '../tools/item-store';
import { ItemError, ItemRecord, ItemState, PipelineStage, StageOutputs } from '../types';
import { Logger, sleep } from '../utils';
import { StageExecutor, StageResult } from './stage-executor';
import { canTransition, nextStage, withStageOutput } from './stages';

export type StageExecutors = { [S in PipelineStage]: StageExecutor<S> };

export interface ItemStateMachineOptions {
  store: ItemRecordStore;
  deadLetters: DeadLetterSink;
  executors: StageExecutors;
  /** Batch cancellation signal. */
  signal: AbortSignal;
  onTransition?: (record: ItemRecord, from: ItemState) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class ItemStateMachine {
  private readonly store: ItemRecordStore;
  private readonly deadLetters: DeadLetterSink;
  private readonly executors: StageExecutors;
  private readonly signal: AbortSignal;
  private readonly onTransition?: (record: ItemRecord, from: ItemState) => void;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: ItemStateMachineOptions) {
    this.store = options.store;
    this.deadLetters = options.deadLetters;
    this.executors = options.executors;
    this.signal = options.signal;
    this.onTransition = options.onTransition;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Runs the item until it is terminal and returns the final record.
   */
  async run(initial: ItemRecord): Promise<ItemRecord> {
    let record = initial;

    while (!record.terminal) {
      const stage = nextStage(record.stage);
      if (stage === null) {
        throw new IllegalTransitionError(record.stage, 'next stage');
      }

      if (this.signal.aborted) {
        return this.deadLetter(record, stage, {
          kind: 'batch_deadline_exceeded',
          cause: 'cancelled',
          message: 'Batch deadline reached before the item finished',
          stage,
          at: new Date().toISOString(),
        });
      }

      const result = await this.executeStage(stage, record);

      if (result.ok) {
        record = await this.advance(record, stage, result.output);
        continue;
      }

      const executor = this.executors[stage];
      if (!result.retryable || record.attempt_count >= executor.maxRetries) {
        return this.deadLetter(record, stage, result.error);
      }

      const delayMs = executor.backoffDelay(record.attempt_count);
      record = await this.persist({
        ...record,
        attempt_count: record.attempt_count + 1,
        last_error: result.error,
      });

      Logger.warn('Retrying stage', {
        batch_id: record.batch_id,
        item_id: record.item_id,
        stage,
        attempt: record.attempt_count,
        max_retries: executor.maxRetries,
        delay_ms: delayMs,
        error_kind: result.error.kind,
        cause: result.error.cause,
      });

      await this.sleep(delayMs, this.signal);
    }

    return record;
  }

  private executeStage<S extends PipelineStage>(stage: S, record: ItemRecord): Promise<StageResult<S>> {
    return this.executors[stage].execute(record.payload, {
      batch_id: record.batch_id,
      item_id: record.item_id,
      attempt: record.attempt_count,
      signal: this.signal,
    });
  }

  private async advance<S extends PipelineStage>(
    record: ItemRecord,
    stage: S,
    output: StageOutputs[S]
  ): Promise<ItemRecord> {
    const from = record.stage;
    this.assertTransition(from, stage);

    const next = await this.persist({
      ...record,
      stage,
      attempt_count: 0,
      last_error: null,
      payload: withStageOutput(record.payload, stage, output),
      terminal: stage === 'published',
    });

    Logger.info('Item advanced', {
      batch_id: next.batch_id,
      item_id: next.item_id,
      from,
      to: stage,
    });
    this.onTransition?.(next, from);
    return next;
  }

  private async deadLetter(record: ItemRecord, stage: PipelineStage, error: ItemError): Promise<ItemRecord> {
    const from = record.stage;
    this.assertTransition(from, 'dead_lettered');

    // The sink entry goes first: a crash in between leaves a live item that is
    // retried on resume rather than a terminal item with no entry.
    await this.deadLetters.append({
      item_id: record.item_id,
      batch_id: record.batch_id,
      rank: record.rank,
      stage,
      last_error: error,
      attempt_count: record.attempt_count,
    });

    const next = await this.persist({
      ...record,
      stage: 'dead_lettered',
      failed_stage: stage,
      last_error: error,
      terminal: true,
    });

    Logger.warn('Item dead-lettered', {
      batch_id: next.batch_id,
      item_id: next.item_id,
      from,
      to: 'dead_lettered',
      stage,
      error_kind: error.kind,
      cause: error.cause,
      attempt_count: next.attempt_count,
    });
    this.onTransition?.(next, from);
    return next;
  }

  private async persist(record: ItemRecord): Promise<ItemRecord> {
    const next = { ...record, updated_at: new Date().toISOString() };
    await this.store.save(next);
    return next;
  }

  private assertTransition(from: ItemState, to: ItemState): void {
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(from, to);
    }
  }
}
