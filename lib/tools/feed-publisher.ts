/**
 * Feed Publisher - rebuilds feed.xml from the stored episode manifests
 */

import { Config } from '../config';
import { EpisodeManifest, PodcastConfig } from '../types';
import { Logger } from '../utils';
import { FeedTool } from './feed';
import { StorageTool } from './storage';

export const FEED_PATH = 'feed.xml';

export function isEpisodeManifest(value: unknown): value is EpisodeManifest {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const field = (key: string): unknown => Reflect.get(value, key);
  return (
    typeof field('batch_id') === 'string' &&
    typeof field('item_id') === 'string' &&
    typeof field('rank') === 'number' &&
    typeof field('title') === 'string' &&
    typeof field('episode_url') === 'string' &&
    typeof field('published_at') === 'string'
  );
}

export class FeedPublisher {
  private storage: StorageTool;
  private podcast: PodcastConfig;
  private maxEpisodes: number;

  constructor(
    storage: StorageTool = new StorageTool(),
    podcast: PodcastConfig = Config.getPodcastConfig(),
    maxEpisodes: number = Config.FEED_MAX_EPISODES
  ) {
    this.storage = storage;
    this.podcast = podcast;
    this.maxEpisodes = maxEpisodes;
  }

  /**
   * Newest batch first, rank order within a batch.
   */
  async loadManifests(): Promise<EpisodeManifest[]> {
    const objects = await this.storage.list('episodes/');
    const manifests: EpisodeManifest[] = [];

    for (const obj of objects) {
      if (!obj.path.endsWith('.json')) continue;
      const value = await this.storage.getJson(obj.path);
      if (isEpisodeManifest(value)) {
        manifests.push(value);
      } else {
        Logger.warn('Skipping malformed episode manifest', { path: obj.path });
      }
    }

    return manifests.sort((a, b) => b.batch_id.localeCompare(a.batch_id) || a.rank - b.rank);
  }

  async rebuild(): Promise<{ url: string; episodes: number }> {
    const manifests = (await this.loadManifests()).slice(0, this.maxEpisodes);

    const xml = FeedTool.buildPodcastFeed({
      title: this.podcast.title,
      description: this.podcast.description,
      link: this.podcast.base_url,
      language: this.podcast.language,
      author: this.podcast.author,
      email: this.podcast.email,
      category: this.podcast.category,
      imageUrl: this.podcast.image_url,
      items: manifests.map(manifest => ({
        title: manifest.title,
        description: manifest.description || manifest.title,
        link: manifest.comments_url || manifest.source_url,
        enclosureUrl: manifest.episode_url,
        enclosureLength: manifest.audio_bytes,
        pubDate: new Date(manifest.published_at),
        duration: manifest.duration_sec,
        guid: `${manifest.batch_id}/${manifest.item_id}`,
      })),
    });

    const url = await this.storage.put(FEED_PATH, xml, 'application/rss+xml');
    Logger.info('Feed rebuilt', { url, episodes: manifests.length });
    return { url, episodes: manifests.length };
  }
}
