/**
 * Hacker News ranking source - the front page's top stories
 */

import { Config } from '../config';
import { SourceUnavailableError } from '../errors';
import { Semaphore } from '../pipeline/semaphore';
import { HttpTool } from '../tools/http';
import { RankedItem } from '../types';
import { Logger, errorMessage } from '../utils';
import { RankingSource } from './types';

export interface HackerNewsStory {
  id: number;
  title: string;
  url?: string;
  score: number;
  by: string;
  time: number;
  descendants?: number;
  type?: string;
}

export interface HackerNewsSourceOptions {
  baseUrl?: string;
  concurrency?: number;
  /** How many ids past `limit` to look at to replace unusable stories. */
  overscan?: number;
}

export function parseStory(value: unknown): HackerNewsStory | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const field = (key: string): unknown => Reflect.get(value, key);
  const id = field('id');
  const title = field('title');
  const score = field('score');
  const by = field('by');
  const time = field('time');
  const url = field('url');
  const descendants = field('descendants');
  const type = field('type');

  if (
    typeof id !== 'number' ||
    typeof title !== 'string' ||
    typeof score !== 'number' ||
    typeof by !== 'string' ||
    typeof time !== 'number'
  ) {
    return null;
  }

  return {
    id,
    title,
    score,
    by,
    time,
    ...(typeof url === 'string' && url ? { url } : {}),
    ...(typeof descendants === 'number' ? { descendants } : {}),
    ...(typeof type === 'string' ? { type } : {}),
  };
}

export class HackerNewsRankingSource implements RankingSource {
  readonly name = 'hackernews';

  private baseUrl: string;
  private concurrency: number;
  private overscan: number;

  constructor(options: HackerNewsSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? Config.HN_API_BASE_URL).replace(/\/$/, '');
    this.concurrency = options.concurrency ?? Config.RANKING_FETCH_CONCURRENCY;
    this.overscan = options.overscan ?? 10;
  }

  async listTodayItems(limit: number, signal?: AbortSignal): Promise<RankedItem[]> {
    const ids = await this.getTopStoryIds(signal);
    const candidates = ids.slice(0, limit + this.overscan);

    Logger.info('Fetching top story details', { candidates: candidates.length, limit });

    const semaphore = new Semaphore(this.concurrency);
    const stories = await Promise.all(
      candidates.map(async (id, index) => {
        const story = await semaphore.run(() => this.getStory(id, signal), signal);
        return story ? { story, position: index + 1 } : null;
      })
    );

    const items: RankedItem[] = [];
    for (const entry of stories) {
      if (!entry) continue;
      const { story, position } = entry;
      if (!story.url) {
        Logger.debug('Skipping story without url', { id: story.id, title: story.title });
        continue;
      }
      items.push({
        item_id: String(story.id),
        rank: position,
        source_url: story.url,
        title: story.title,
        score: story.score,
        author: story.by,
        posted_at: new Date(story.time * 1000).toISOString(),
        comments_url: `https://news.ycombinator.com/item?id=${story.id}`,
      });
      if (items.length >= limit) break;
    }

    Logger.info('Top stories listed', { count: items.length });
    return items;
  }

  async getTopStoryIds(signal?: AbortSignal): Promise<number[]> {
    let data: unknown;
    try {
      data = await HttpTool.fetchJson(`${this.baseUrl}/topstories.json`, { signal });
    } catch (error) {
      throw new SourceUnavailableError(`Hacker News top stories unavailable: ${errorMessage(error)}`);
    }

    if (!Array.isArray(data)) {
      throw new SourceUnavailableError('Hacker News top stories response is not a list');
    }
    return data.filter((id): id is number => typeof id === 'number');
  }

  /**
   * One story's details, or null when it cannot be read or lacks required fields.
   */
  async getStory(id: number, signal?: AbortSignal): Promise<HackerNewsStory | null> {
    try {
      const data = await HttpTool.fetchJson(`${this.baseUrl}/item/${id}.json`, { signal });
      const story = parseStory(data);
      if (!story) {
        Logger.warn('Story missing required fields', { id });
      }
      return story;
    } catch (error) {
      Logger.warn('Failed to fetch story', { id, error: errorMessage(error) });
      return null;
    }
  }
}
