import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { BatchInProgressError, SourceUnavailableError, StageFailure } from '../lib/errors';
import { BatchCoordinator, BatchCoordinatorOptions, batchOutcome } from '../lib/orchestrator';
import { CircuitBreakerRegistry } from '../lib/pipeline/circuit-breaker';
import { withStageOutput } from '../lib/pipeline/stages';
import { audioPath } from '../lib/stages/audio';
import { ExtractStage } from '../lib/stages/extract';
import { PublishStage } from '../lib/stages/publish';
import { DeadLetterSink } from '../lib/tools/dead-letter-sink';
import { FEED_PATH, FeedPublisher } from '../lib/tools/feed-publisher';
import { ItemRecordStore } from '../lib/tools/item-store';
import { ProgressTracker } from '../lib/tools/progress-tracker';
import { RunsStorage } from '../lib/tools/runs-storage';
import { ItemRecord } from '../lib/types';
import { sleep } from '../lib/utils';
import {
  FAST_RETRY,
  FakeSource,
  FakeStage,
  FakeStages,
  TempStorage,
  articleHtml,
  createFakeStages,
  createTempStorage,
  extractedOutput,
  fetchedOutput,
  noSleep,
  publishedOutput,
  rankedItems,
  scriptOutput,
} from './helpers';

describe('BatchCoordinator', () => {
  let temp: TempStorage;
  let store: ItemRecordStore;
  let deadLetters: DeadLetterSink;
  let runs: RunsStorage;
  let progress: ProgressTracker;

  beforeEach(() => {
    temp = createTempStorage();
    store = new ItemRecordStore(temp.storage);
    deadLetters = new DeadLetterSink(temp.storage);
    runs = new RunsStorage(temp.storage);
    progress = new ProgressTracker();
  });

  afterEach(() => {
    temp.cleanup();
  });

  function coordinatorFor(
    source: FakeSource,
    stages: BatchCoordinatorOptions['stages'],
    overrides: Partial<BatchCoordinatorOptions> = {}
  ): BatchCoordinator {
    return new BatchCoordinator({
      source,
      stages,
      store,
      deadLetters,
      runs,
      progress,
      batchSize: 20,
      maxConcurrentItems: 4,
      deadlineMs: 60_000,
      timeZone: 'UTC',
      enumerationPolicy: FAST_RETRY,
      random: () => 0.5,
      sleep: noSleep,
      ...overrides,
    });
  }

  it('should publish every item and report full_success', async () => {
    const stages = createFakeStages();
    const report = await coordinatorFor(new FakeSource(rankedItems(3)), stages).run({ batchId: '2024-06-01' });

    expect(report.outcome).toBe('full_success');
    expect(report.counts).toEqual({ total: 3, succeeded: 3, dead_lettered: 0, in_progress: 0 });
    expect(report.resumed).toBe(false);
    expect(report.deadline_exceeded).toBe(false);
    expect(report.failures).toEqual([]);
    expect(report.cause_counts).toEqual({});
    expect(report.published.map(p => p.item_id)).toEqual(['item-01', 'item-02', 'item-03']);
    expect(report.published[0]).toEqual({
      item_id: 'item-01',
      rank: 1,
      title: 'Story 1',
      episode_url: publishedOutput('item-01').episode_url,
    });
  });

  it('should isolate per-item failures and report partial_success', async () => {
    const shortItems = new Set(['item-05', 'item-12']);
    const stages = {
      ...createFakeStages({
        content_fetched: new FakeStage('content_fetched', 'web', async (payload, ctx) =>
          fetchedOutput(payload.metadata.source_url, articleHtml(shortItems.has(ctx.item_id) ? 10 : 80))
        ),
      }),
      content_extracted: new ExtractStage(50),
    };

    const report = await coordinatorFor(new FakeSource(rankedItems(20)), stages).run({ batchId: '2024-06-02' });

    expect(report.outcome).toBe('partial_success');
    expect(report.counts).toEqual({ total: 20, succeeded: 18, dead_lettered: 2, in_progress: 0 });
    expect(report.failures).toEqual([
      {
        item_id: 'item-05',
        rank: 5,
        stage: 'content_extracted',
        cause: 'permanent_error',
        detail: 'content_too_short: Extracted 10 words, need at least 50',
      },
      {
        item_id: 'item-12',
        rank: 12,
        stage: 'content_extracted',
        cause: 'permanent_error',
        detail: 'content_too_short: Extracted 10 words, need at least 50',
      },
    ]);
    expect(report.cause_counts).toEqual({ permanent_error: 2 });
    expect(report.published).toHaveLength(18);
    expect(stages.script_generated.calls).toBe(18);

    const dead = await deadLetters.listByBatch('2024-06-02');
    expect(dead.map(e => e.item_id).sort()).toEqual(['item-05', 'item-12']);
  });

  it('should report total_failure when nothing is published', async () => {
    const stages = createFakeStages({
      content_fetched: new FakeStage('content_fetched', 'web', async () => {
        throw StageFailure.permanent('http_404', 'HTTP 404: Not Found');
      }),
    });
    const feedPublisher = new FeedPublisher(temp.storage);

    const report = await coordinatorFor(new FakeSource(rankedItems(3)), stages, { feedPublisher }).run({
      batchId: '2024-06-03',
    });

    expect(report.outcome).toBe('total_failure');
    expect(report.counts).toEqual({ total: 3, succeeded: 0, dead_lettered: 3, in_progress: 0 });
    expect(report.cause_counts).toEqual({ permanent_error: 3 });
    expect(report.feed).toBeUndefined();
    expect(await temp.storage.exists(FEED_PATH)).toBe(false);
  });

  it('should publish episodes and rebuild the feed with real publish stage', async () => {
    const stages: FakeStages = createFakeStages({
      audio_generated: new FakeStage('audio_generated', 'tts', async (_payload, ctx) => {
        const path = audioPath(ctx.batch_id, ctx.item_id);
        const data = Buffer.from('mp3');
        const url = await temp.storage.put(path, data, 'audio/mpeg');
        return {
          storage_path: path,
          url,
          bytes: data.length,
          content_type: 'audio/mpeg',
          voice: 'alloy',
          reused: false,
        };
      }),
    });
    const feedPublisher = new FeedPublisher(
      temp.storage,
      {
        title: 'Test Feed',
        description: 'Test description',
        author: 'Test Author',
        email: 'test@example.com',
        language: 'en-us',
        category: 'Technology',
        base_url: 'http://localhost',
      },
      30
    );

    const report = await coordinatorFor(
      new FakeSource(rankedItems(2)),
      { ...stages, published: new PublishStage(temp.storage) },
      { feedPublisher }
    ).run({ batchId: '2024-06-04' });

    expect(report.outcome).toBe('full_success');
    expect(report.published[0].episode_url).toBe('http://localhost/files/episodes/2024-06-04/item-01.mp3');
    expect(report.feed).toEqual({ url: 'http://localhost/files/feed.xml', episodes: 2 });

    const xml = (await temp.storage.get(FEED_PATH)).toString('utf-8');
    expect(xml).toContain('<guid isPermaLink="false">2024-06-04/item-01</guid>');
    expect(xml).toContain(
      '<enclosure url="http://localhost/files/episodes/2024-06-04/item-02.mp3" length="3" type="audio/mpeg"/>'
    );
    expect(xml.indexOf('<title>Story 1</title>')).toBeLessThan(xml.indexOf('<title>Story 2</title>'));
  });

  it('should dead-letter unfinished items when the deadline passes', async () => {
    const stages = createFakeStages({
      content_fetched: new FakeStage('content_fetched', 'web', (payload, ctx) => {
        if (ctx.item_id === 'item-01') {
          return Promise.resolve(fetchedOutput(payload.metadata.source_url));
        }
        return new Promise((_resolve, reject) => {
          ctx.signal.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }),
    });

    const report = await coordinatorFor(new FakeSource(rankedItems(4)), stages, {
      maxConcurrentItems: 2,
      deadlineMs: 300,
    }).run({ batchId: '2024-06-05' });

    expect(report.deadline_exceeded).toBe(true);
    expect(report.outcome).toBe('partial_success');
    expect(report.counts).toEqual({ total: 4, succeeded: 1, dead_lettered: 3, in_progress: 0 });
    expect(report.cause_counts).toEqual({ batch_deadline_exceeded: 3 });
    expect(report.failures.map(f => f.stage)).toEqual(['content_fetched', 'content_fetched', 'content_fetched']);
  });

  it('should hold items to the worker pool and calls to the dependency limit', async () => {
    const stages = createFakeStages({
      content_fetched: new FakeStage('content_fetched', 'web', async payload => {
        await sleep(10);
        return fetchedOutput(payload.metadata.source_url);
      }),
      script_generated: new FakeStage('script_generated', 'llm', async () => {
        await sleep(10);
        return scriptOutput();
      }),
    });

    const report = await coordinatorFor(new FakeSource(rankedItems(12)), stages, {
      maxConcurrentItems: 3,
      dependencyConcurrency: { web: 2, llm: 8 },
    }).run({ batchId: '2024-06-06' });

    expect(report.counts.succeeded).toBe(12);
    expect(stages.content_fetched.peak).toBe(2);
    expect(stages.script_generated.peak).toBeLessThanOrEqual(3);
  });

  it('should resume a stored batch without enumerating again', async () => {
    const [first, second] = rankedItems(2);
    const published: ItemRecord = {
      ...ItemRecordStore.newRecord('2024-06-07', first),
      stage: 'published',
      terminal: true,
      payload: {
        metadata: first,
        outputs: {
          content_fetched: fetchedOutput(first.source_url),
          content_extracted: extractedOutput(first.title),
          script_generated: scriptOutput(),
          published: publishedOutput(first.item_id),
        },
      },
    };
    const base = ItemRecordStore.newRecord('2024-06-07', second);
    const midway: ItemRecord = {
      ...base,
      stage: 'script_generated',
      payload: withStageOutput(
        withStageOutput(
          withStageOutput(base.payload, 'content_fetched', fetchedOutput(second.source_url)),
          'content_extracted',
          extractedOutput(second.title)
        ),
        'script_generated',
        scriptOutput()
      ),
    };
    await store.save(published);
    await store.save(midway);

    const source = new FakeSource(rankedItems(5));
    const stages = createFakeStages();
    const report = await coordinatorFor(source, stages).run({ batchId: '2024-06-07' });

    expect(source.calls).toBe(0);
    expect(report.resumed).toBe(true);
    expect(report.counts).toEqual({ total: 2, succeeded: 2, dead_lettered: 0, in_progress: 0 });
    expect(stages.content_fetched.calls).toBe(0);
    expect(stages.script_generated.calls).toBe(0);
    expect(stages.audio_generated.calls).toBe(1);
    expect(stages.audio_generated.callsByItem.get('item-02')).toBe(1);
  });

  it('should recreate records missing from an interrupted enumeration on resume', async () => {
    const items = rankedItems(5);
    await store.saveManifest('2024-06-19', items);
    await store.save(ItemRecordStore.newRecord('2024-06-19', items[0]));
    await store.save(ItemRecordStore.newRecord('2024-06-19', items[1]));

    const source = new FakeSource(rankedItems(5));
    const stages = createFakeStages();
    const report = await coordinatorFor(source, stages).run({ batchId: '2024-06-19' });

    expect(source.calls).toBe(0);
    expect(report.resumed).toBe(true);
    expect(report.counts).toEqual({ total: 5, succeeded: 5, dead_lettered: 0, in_progress: 0 });
    expect(report.published.map(p => p.item_id)).toEqual(['item-01', 'item-02', 'item-03', 'item-04', 'item-05']);
    expect(await store.listBatch('2024-06-19')).toHaveLength(5);
  });

  it('should save the enumerated items before running them', async () => {
    await coordinatorFor(new FakeSource(rankedItems(3)), createFakeStages()).run({ batchId: '2024-06-20' });

    expect((await store.getManifest('2024-06-20'))?.map(item => item.item_id)).toEqual([
      'item-01',
      'item-02',
      'item-03',
    ]);
  });

  it('should fail fast once a dependency breaker opens', async () => {
    const stages = createFakeStages({
      audio_generated: new FakeStage('audio_generated', 'tts', async () => {
        throw StageFailure.transient('openai_500', 'server error');
      }),
    });
    const breakers = new CircuitBreakerRegistry({ failureThreshold: 2, windowMs: 60_000, cooldownMs: 60_000 });

    const report = await coordinatorFor(new FakeSource(rankedItems(3)), stages, {
      maxConcurrentItems: 1,
      breakers,
      retryPolicies: { audio_generated: { ...FAST_RETRY, maxRetries: 2 } },
    }).run({ batchId: '2024-06-08' });

    expect(stages.audio_generated.calls).toBe(2);
    expect(report.counts.dead_lettered).toBe(3);
    expect(report.cause_counts).toEqual({ dependency_unavailable: 3 });
    expect(breakers.get('tts').snapshot().state).toBe('open');
  });

  it('should not let items queued on a dependency slot reach a dependency whose breaker opened', async () => {
    const stages = createFakeStages({
      audio_generated: new FakeStage('audio_generated', 'tts', async () => {
        await sleep(10);
        throw StageFailure.transient('openai_500', 'server error');
      }),
    });
    const breakers = new CircuitBreakerRegistry({ failureThreshold: 1, windowMs: 60_000, cooldownMs: 60_000 });

    const report = await coordinatorFor(new FakeSource(rankedItems(3)), stages, {
      maxConcurrentItems: 3,
      dependencyConcurrency: { tts: 1 },
      breakers,
      retryPolicies: { audio_generated: { ...FAST_RETRY, maxRetries: 2 } },
    }).run({ batchId: '2024-06-18' });

    expect(stages.audio_generated.calls).toBe(1);
    expect(report.counts.dead_lettered).toBe(3);
    expect(report.cause_counts).toEqual({ dependency_unavailable: 3 });
  });

  it('should reject a second concurrent run of the same batch', async () => {
    const stages = createFakeStages({
      content_fetched: new FakeStage('content_fetched', 'web', async payload => {
        await sleep(30);
        return fetchedOutput(payload.metadata.source_url);
      }),
    });
    const coordinator = coordinatorFor(new FakeSource(rankedItems(2)), stages);

    const first = coordinator.run({ batchId: '2024-06-09' });
    await expect(coordinator.run({ batchId: '2024-06-09' })).rejects.toBeInstanceOf(BatchInProgressError);

    const report = await first;
    expect(report.outcome).toBe('full_success');
    expect(RunsStorage.isBatchActive('2024-06-09')).toBe(false);
  });

  it('should retry enumeration and then fail with SourceUnavailableError', async () => {
    const source = new FakeSource(rankedItems(3), 10);
    const coordinator = coordinatorFor(source, createFakeStages(), {
      enumerationPolicy: { ...FAST_RETRY, maxRetries: 2 },
    });

    await expect(coordinator.run({ batchId: '2024-06-10' })).rejects.toBeInstanceOf(SourceUnavailableError);

    expect(source.calls).toBe(3);
    expect(RunsStorage.isBatchActive('2024-06-10')).toBe(false);
    const { runs: listed } = await runs.list();
    expect(listed[0]).toMatchObject({ batch_id: '2024-06-10', status: 'failed' });
    expect(await store.listBatch('2024-06-10')).toEqual([]);
  });

  it('should recover when the ranking source fails once', async () => {
    const source = new FakeSource(rankedItems(2), 1);
    const report = await coordinatorFor(source, createFakeStages()).run({ batchId: '2024-06-11' });

    expect(source.calls).toBe(2);
    expect(report.counts.succeeded).toBe(2);
  });

  it('should record the run and its report in the runs index', async () => {
    const report = await coordinatorFor(new FakeSource(rankedItems(2)), createFakeStages()).run({
      batchId: '2024-06-12',
    });

    const { runs: listed, total } = await runs.list();
    expect(total).toBe(1);
    expect(listed[0]).toMatchObject({
      batch_id: '2024-06-12',
      run_id: report.run_id,
      status: 'completed',
      outcome: 'full_success',
      counts: report.counts,
    });
    expect(await runs.getReport('2024-06-12', report.run_id)).toEqual(report);
  });

  it('should track progress through the run', async () => {
    await coordinatorFor(new FakeSource(rankedItems(3)), createFakeStages()).run({ batchId: '2024-06-13' });

    const snapshot = progress.getProgress('2024-06-13');
    expect(snapshot?.status).toBe('completed');
    expect(snapshot?.total).toBe(3);
    expect(snapshot?.counts.published).toBe(3);
    expect(snapshot?.counts.pending).toBe(0);
    expect(snapshot?.progress).toBe(100);
  });

  it('should derive the batch id from the run time in the configured timezone', async () => {
    const report = await coordinatorFor(new FakeSource(rankedItems(1)), createFakeStages(), {
      timeZone: 'Asia/Tokyo',
    }).run({ now: new Date('2024-06-14T20:00:00Z') });

    expect(report.batch_id).toBe('2024-06-15');
  });
});

describe('batchOutcome', () => {
  it('should classify counts into an outcome', () => {
    expect(batchOutcome({ total: 3, succeeded: 3, dead_lettered: 0, in_progress: 0 })).toBe('full_success');
    expect(batchOutcome({ total: 3, succeeded: 1, dead_lettered: 2, in_progress: 0 })).toBe('partial_success');
    expect(batchOutcome({ total: 3, succeeded: 0, dead_lettered: 3, in_progress: 0 })).toBe('total_failure');
    expect(batchOutcome({ total: 0, succeeded: 0, dead_lettered: 0, in_progress: 0 })).toBe('total_failure');
  });
});
