/**
 * PublishStage - copies the audio to its public episode path and writes the
 * episode manifest the feed is rebuilt from
 */

import { StageContext, requireOutput } from '../pipeline/stages';
import { StorageTool } from '../tools/storage';
import { EpisodeManifest, ItemPayload, PublishedEpisode } from '../types';
import { estimateReadingTime } from '../utils';
import { BaseStage } from './base';

export function episodePaths(batchId: string, itemId: string): { audio: string; manifest: string } {
  const base = `episodes/${encodeURIComponent(batchId)}/${encodeURIComponent(itemId)}`;
  return { audio: `${base}.mp3`, manifest: `${base}.json` };
}

export class PublishStage extends BaseStage<'published'> {
  readonly stage = 'published';
  readonly dependency = 'storage';

  private storage: StorageTool;

  constructor(storage: StorageTool = new StorageTool()) {
    super();
    this.storage = storage;
  }

  protected async process(payload: ItemPayload, ctx: StageContext): Promise<PublishedEpisode> {
    const audio = requireOutput(payload, 'audio_generated');
    const script = requireOutput(payload, 'script_generated');
    const extracted = requireOutput(payload, 'content_extracted');
    const paths = episodePaths(ctx.batch_id, ctx.item_id);

    // Skip the copy when an earlier attempt already uploaded it
    let episodeUrl: string;
    if (await this.storage.exists(paths.audio)) {
      episodeUrl = await this.storage.urlFor(paths.audio);
    } else {
      const data = await this.storage.get(audio.storage_path);
      episodeUrl = await this.storage.put(paths.audio, data, audio.content_type);
    }

    const publishedAt = new Date().toISOString();
    const { metadata } = payload;
    const manifest: EpisodeManifest = {
      batch_id: ctx.batch_id,
      item_id: ctx.item_id,
      rank: metadata.rank,
      title: metadata.title,
      source_url: metadata.source_url,
      ...(metadata.comments_url ? { comments_url: metadata.comments_url } : {}),
      ...(extracted.description ? { description: extracted.description } : {}),
      episode_url: episodeUrl,
      audio_bytes: audio.bytes,
      duration_sec: estimateReadingTime(script.text),
      word_count: script.word_count,
      published_at: publishedAt,
    };

    await this.storage.putJson(paths.manifest, manifest);

    return {
      episode_url: episodeUrl,
      manifest_path: paths.manifest,
      published_at: publishedAt,
    };
  }
}
