/**
 * Wiring for the production pipeline: storage, stores, stages, ranking source
 * and coordinator built from Config.
 */

import { Config } from './config';
import { PipelineOperator } from './operator';
import { BatchCoordinator } from './orchestrator';
import { CircuitBreakerRegistry } from './pipeline/circuit-breaker';
import { RankingSource, createRankingSource } from './sources';
import { createStageHandlers } from './stages';
import { DeadLetterSink } from './tools/dead-letter-sink';
import { FeedPublisher } from './tools/feed-publisher';
import { ItemRecordStore } from './tools/item-store';
import { RunsStorage } from './tools/runs-storage';
import { StorageTool, createStorageBackend } from './tools/storage';

export interface Pipeline {
  storage: StorageTool;
  coordinator: BatchCoordinator;
  operator: PipelineOperator;
}

export interface PipelineOverrides {
  storage?: StorageTool;
  source?: RankingSource;
}

export function createPipeline(overrides: PipelineOverrides = {}): Pipeline {
  const storage = overrides.storage ?? new StorageTool(createStorageBackend(Config.STORAGE_BACKEND));
  const store = new ItemRecordStore(storage);
  const deadLetters = new DeadLetterSink(storage);
  const runs = new RunsStorage(storage);

  const coordinator = new BatchCoordinator({
    source: overrides.source ?? createRankingSource(Config.RANKING_SOURCE),
    stages: createStageHandlers(storage),
    store,
    deadLetters,
    runs,
    breakers: new CircuitBreakerRegistry(Config.getBreakerConfig()),
    feedPublisher: new FeedPublisher(storage),
  });

  const operator = new PipelineOperator({ storage, store, deadLetters, runs });

  return { storage, coordinator, operator };
}

export { BatchCoordinator, PipelineOperator };
export * from './types';
export * from './errors';
