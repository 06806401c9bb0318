/**
 * AudioStage - synthesizes the script and stores the MP3.
 *
 * The object path is derived from (batch_id, item_id), so a repeated call
 * finds the earlier upload and returns it without a second synthesis.
 */

import { Config } from '../config';
import { StageContext, requireOutput } from '../pipeline/stages';
import { batchPrefix } from '../tools/item-store';
import { StorageTool } from '../tools/storage';
import { TtsTool, TtsVoice, parseVoice } from '../tools/tts';
import { AudioReference, ItemPayload } from '../types';
import { Logger } from '../utils';
import { BaseStage } from './base';

export function audioPath(batchId: string, itemId: string): string {
  return `${batchPrefix(batchId)}audio/${encodeURIComponent(itemId)}.mp3`;
}

export interface AudioStageOptions {
  storage?: StorageTool;
  tts?: TtsTool;
  voice?: TtsVoice;
}

export class AudioStage extends BaseStage<'audio_generated'> {
  readonly stage = 'audio_generated';
  readonly dependency = 'tts';

  private storage: StorageTool;
  private tts: TtsTool;
  private voice: TtsVoice;

  constructor(options: AudioStageOptions = {}) {
    super();
    this.storage = options.storage ?? new StorageTool();
    this.tts = options.tts ?? new TtsTool();
    this.voice = options.voice ?? parseVoice(Config.OPENAI_TTS_VOICE);
  }

  protected async process(payload: ItemPayload, ctx: StageContext): Promise<AudioReference> {
    const path = audioPath(ctx.batch_id, ctx.item_id);

    const existing = await this.storage.getIfExists(path);
    if (existing && existing.length > 0) {
      Logger.info('Reusing stored audio', {
        batch_id: ctx.batch_id,
        item_id: ctx.item_id,
        path,
        bytes: existing.length,
      });
      return {
        storage_path: path,
        url: await this.storage.urlFor(path),
        bytes: existing.length,
        content_type: 'audio/mpeg',
        voice: this.voice,
        reused: true,
      };
    }

    const script = requireOutput(payload, 'script_generated');
    const audio = await this.tts.synthesize({
      voice: this.voice,
      text: script.text,
      signal: ctx.signal,
    });

    const url = await this.storage.put(path, audio, 'audio/mpeg');

    return {
      storage_path: path,
      url,
      bytes: audio.length,
      content_type: 'audio/mpeg',
      voice: this.voice,
      reused: false,
    };
  }
}
