/**
 * Shared fixtures for pipeline tests: temporary local storage, in-process
 * stage fakes and a fake ranking source.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { Semaphore } from '../lib/pipeline/semaphore';
import { CircuitBreakerRegistry } from '../lib/pipeline/circuit-breaker';
import { StageExecutors } from '../lib/pipeline/item-state-machine';
import { StageExecutor } from '../lib/pipeline/stage-executor';
import { StageContext, StageHandler, StageHandlers } from '../lib/pipeline/stages';
import { RankingSource } from '../lib/sources/types';
import { LocalStorage } from '../lib/tools/storage-local';
import { StorageTool } from '../lib/tools/storage';
import {
  DependencyClass,
  ItemPayload,
  PipelineStage,
  RankedItem,
  RetryPolicy,
  StageOutputs,
} from '../lib/types';

export interface TempStorage {
  dir: string;
  storage: StorageTool;
  cleanup(): void;
}

export function createTempStorage(): TempStorage {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'story-pipeline-'));
  return {
    dir,
    storage: new StorageTool(new LocalStorage(dir, 'http://localhost/files')),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

export const FAST_RETRY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1,
  maxDelayMs: 5,
  jitterMin: 0.5,
  jitterMax: 1.5,
};

export const noSleep = async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined;

type StageImpl<S extends PipelineStage> = (
  payload: ItemPayload,
  ctx: StageContext,
  call: number
) => Promise<StageOutputs[S]>;

/**
 * In-process stage that counts its calls and tracks how many run at once.
 */
export class FakeStage<S extends PipelineStage> implements StageHandler<S> {
  calls = 0;
  running = 0;
  peak = 0;
  readonly callsByItem = new Map<string, number>();

  constructor(
    readonly stage: S,
    readonly dependency: DependencyClass,
    private impl: StageImpl<S>
  ) {}

  async run(payload: ItemPayload, ctx: StageContext): Promise<StageOutputs[S]> {
    this.calls++;
    const itemCalls = (this.callsByItem.get(ctx.item_id) ?? 0) + 1;
    this.callsByItem.set(ctx.item_id, itemCalls);
    this.running++;
    this.peak = Math.max(this.peak, this.running);
    try {
      return await this.impl(payload, ctx, itemCalls);
    } finally {
      this.running--;
    }
  }
}

export function articleHtml(words: number, title = 'Test Article'): string {
  const body = Array.from({ length: words }, (_, i) => `word${i}`).join(' ');
  return `<html><head><title>${title}</title></head><body><article><p>${body}</p></article></body></html>`;
}

export function fetchedOutput(url: string, html: string = articleHtml(80)): StageOutputs['content_fetched'] {
  return {
    url,
    final_url: url,
    status: 200,
    content_type: 'text/html',
    html,
    truncated: false,
    fetched_at: '2024-05-01T00:00:00.000Z',
  };
}

export function extractedOutput(title = 'Test Article'): StageOutputs['content_extracted'] {
  return { title, text: 'some extracted text', word_count: 3, method: 'article' };
}

export function scriptOutput(): StageOutputs['script_generated'] {
  return { text: 'Here is the story of the day.', word_count: 7, model: 'test-model' };
}

export function audioOutput(itemId: string): StageOutputs['audio_generated'] {
  return {
    storage_path: `audio/${itemId}.mp3`,
    url: `http://localhost/files/audio/${itemId}.mp3`,
    bytes: 3,
    content_type: 'audio/mpeg',
    voice: 'alloy',
    reused: false,
  };
}

export function publishedOutput(itemId: string): StageOutputs['published'] {
  return {
    episode_url: `http://localhost/files/episodes/${itemId}.mp3`,
    manifest_path: `episodes/${itemId}.json`,
    published_at: '2024-05-01T00:00:00.000Z',
  };
}

export interface FakeStages {
  content_fetched: FakeStage<'content_fetched'>;
  content_extracted: FakeStage<'content_extracted'>;
  script_generated: FakeStage<'script_generated'>;
  audio_generated: FakeStage<'audio_generated'>;
  published: FakeStage<'published'>;
}

/**
 * Fakes for all five stages that succeed immediately unless overridden.
 */
export function createFakeStages(overrides: Partial<FakeStages> = {}): FakeStages {
  return {
    content_fetched:
      overrides.content_fetched ??
      new FakeStage('content_fetched', 'web', async payload => fetchedOutput(payload.metadata.source_url)),
    content_extracted:
      overrides.content_extracted ??
      new FakeStage('content_extracted', 'extractor', async payload => extractedOutput(payload.metadata.title)),
    script_generated:
      overrides.script_generated ?? new FakeStage('script_generated', 'llm', async () => scriptOutput()),
    audio_generated:
      overrides.audio_generated ??
      new FakeStage('audio_generated', 'tts', async (_payload, ctx) => audioOutput(ctx.item_id)),
    published:
      overrides.published ??
      new FakeStage('published', 'storage', async (_payload, ctx) => publishedOutput(ctx.item_id)),
  };
}

export interface ExecutorOptions {
  policy?: RetryPolicy;
  timeoutMs?: number;
  breakers?: CircuitBreakerRegistry;
  concurrency?: number;
}

export function buildExecutors(handlers: StageHandlers, options: ExecutorOptions = {}): StageExecutors {
  const breakers = options.breakers ?? new CircuitBreakerRegistry();
  const build = <S extends PipelineStage>(handler: StageHandler<S>): StageExecutor<S> =>
    new StageExecutor({
      handler,
      policy: options.policy ?? FAST_RETRY,
      timeoutMs: options.timeoutMs ?? 5_000,
      breaker: breakers.get(handler.dependency),
      semaphore: new Semaphore(options.concurrency ?? 8),
      random: () => 0.5,
    });

  return {
    content_fetched: build(handlers.content_fetched),
    content_extracted: build(handlers.content_extracted),
    script_generated: build(handlers.script_generated),
    audio_generated: build(handlers.audio_generated),
    published: build(handlers.published),
  };
}

export function rankedItems(count: number): RankedItem[] {
  return Array.from({ length: count }, (_, i) => ({
    item_id: `item-${String(i + 1).padStart(2, '0')}`,
    rank: i + 1,
    source_url: `https://example.com/story/${i + 1}`,
    title: `Story ${i + 1}`,
  }));
}

export class FakeSource implements RankingSource {
  readonly name = 'fake';
  calls = 0;

  constructor(private items: RankedItem[], private failuresBeforeSuccess = 0) {}

  async listTodayItems(limit: number): Promise<RankedItem[]> {
    this.calls++;
    if (this.calls <= this.failuresBeforeSuccess) {
      throw new Error('ranking service down');
    }
    return this.items.slice(0, limit);
  }
}
