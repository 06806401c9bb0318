import { Config } from '../config';
import { HackerNewsRankingSource } from './hackernews';
import { RssRankingSource } from './rss';
import { RankingSource } from './types';

export { HackerNewsRankingSource, RssRankingSource };
export type { RankingSource };

export function createRankingSource(name: string = Config.RANKING_SOURCE): RankingSource {
  switch (name) {
    case 'hackernews':
      return new HackerNewsRankingSource();
    case 'rss':
      return new RssRankingSource();
    default:
      throw new Error(`Unknown ranking source: ${name}`);
  }
}
