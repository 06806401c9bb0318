/**
 * TTS Tool - Text-to-speech using OpenAI
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { StageFailure } from '../errors';
import { Logger } from '../utils';
import { createOpenAIClient, createSpeech } from '../utils/openai-helper';

export type TtsVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

const TTS_VOICES: readonly TtsVoice[] = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'];

/** Longest input the speech endpoint accepts in one request. */
export const TTS_MAX_INPUT_CHARS = 4096;

export interface TtsOptions {
  voice: TtsVoice;
  text: string;
  format?: 'mp3' | 'opus' | 'aac' | 'flac';
  speed?: number;
  signal?: AbortSignal;
}

export function parseVoice(value: string): TtsVoice {
  return TTS_VOICES.find(voice => voice === value) ?? 'alloy';
}

/**
 * Splits text into pieces no longer than `maxChars`, preferring sentence
 * boundaries, then whitespace.
 */
export function chunkText(text: string, maxChars: number = TTS_MAX_INPUT_CHARS): string[] {
  const chunks: string[] = [];
  let rest = text.trim();

  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars);
    let cut = Math.max(window.lastIndexOf('. '), window.lastIndexOf('! '), window.lastIndexOf('? '));
    if (cut > 0) {
      cut += 1;
    } else {
      cut = window.lastIndexOf(' ');
      if (cut <= 0) cut = maxChars;
    }
    chunks.push(rest.slice(0, cut).trim());
    rest = rest.slice(cut).trim();
  }

  if (rest.length > 0) {
    chunks.push(rest);
  }
  return chunks;
}

export class TtsTool {
  private client: OpenAI;
  private model: string;

  constructor(client: OpenAI = createOpenAIClient(), model: string = Config.OPENAI_TTS_MODEL) {
    this.client = client;
    this.model = model;
  }

  /**
   * Synthesizes the whole text, one request per chunk, and concatenates the
   * MP3 frames.
   */
  async synthesize(options: TtsOptions): Promise<Buffer> {
    const { voice, text, format = 'mp3', speed = 1.0, signal } = options;
    const chunks = chunkText(text);

    Logger.debug('Starting TTS synthesis', {
      voice,
      textLength: text.length,
      chunks: chunks.length,
      model: this.model,
    });

    const parts: Buffer[] = [];
    for (const chunk of chunks) {
      const part = await createSpeech(
        this.client,
        {
          model: this.model,
          voice,
          input: chunk,
          response_format: format,
          speed,
        },
        signal
      );
      if (part.length === 0) {
        throw StageFailure.transient('empty_audio', 'OpenAI TTS returned an empty audio buffer');
      }
      parts.push(part);
    }

    const buffer = Buffer.concat(parts);
    Logger.debug('TTS synthesis complete', { bufferSize: buffer.length });
    return buffer;
  }
}
