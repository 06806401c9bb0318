/**
 * RSS ranking source - treats a feed's item order as the day's ranking
 */

import { Config } from '../config';
import { SourceUnavailableError } from '../errors';
import { FeedItem, FeedTool } from '../tools/feed';
import { RankedItem } from '../types';
import { Crypto, Logger, errorMessage } from '../utils';
import { RankingSource } from './types';

export function rssItemId(item: FeedItem): string {
  return Crypto.sha256(item.guid || item.link).substring(0, 16);
}

export class RssRankingSource implements RankingSource {
  readonly name = 'rss';

  private feedUrl: string;
  private feedTool: FeedTool;

  constructor(feedUrl: string = Config.RANKING_FEED_URL, feedTool: FeedTool = new FeedTool()) {
    this.feedUrl = feedUrl;
    this.feedTool = feedTool;
  }

  async listTodayItems(limit: number, signal?: AbortSignal): Promise<RankedItem[]> {
    let entries: FeedItem[];
    try {
      entries = await this.feedTool.parseFeed(this.feedUrl, signal);
    } catch (error) {
      throw new SourceUnavailableError(`Ranking feed ${this.feedUrl} unavailable: ${errorMessage(error)}`);
    }

    const seen = new Set<string>();
    const items: RankedItem[] = [];

    for (const entry of entries) {
      if (items.length >= limit) break;
      if (!entry.link || !entry.title) {
        Logger.debug('Skipping feed entry without link or title', { guid: entry.guid });
        continue;
      }

      const itemId = rssItemId(entry);
      if (seen.has(itemId)) continue;
      seen.add(itemId);

      items.push({
        item_id: itemId,
        rank: items.length + 1,
        source_url: entry.link,
        title: entry.title,
        ...(entry.author ? { author: entry.author } : {}),
        ...(entry.pubDate && !Number.isNaN(entry.pubDate.getTime())
          ? { posted_at: entry.pubDate.toISOString() }
          : {}),
        ...(entry.comments ? { comments_url: entry.comments } : {}),
      });
    }

    Logger.info('Ranking feed listed', { url: this.feedUrl, count: items.length });
    return items;
  }
}
