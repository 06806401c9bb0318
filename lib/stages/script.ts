/**
 * ScriptStage - turns extracted article text into a short spoken segment
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { StageFailure } from '../errors';
import { StageContext, requireOutput } from '../pipeline/stages';
import { GeneratedScript, ItemPayload } from '../types';
import { countWords, extractDomain, truncate } from '../utils';
import { createChatCompletion, createOpenAIClient } from '../utils/openai-helper';
import { BaseStage } from './base';

export const SCRIPT_SYSTEM_PROMPT = `You are a news presenter writing one segment of a daily audio briefing.

REQUIREMENTS:
- 150 to 300 words, written to be read aloud
- Open with the headline fact, then the context a listener needs
- Name the source publication once
- No markdown, bullet points, stage directions or sound cues
- Do not invent figures that are not in the article

Respond with the segment text only.`;

export interface ScriptStageOptions {
  client?: OpenAI;
  model?: string;
  maxInputChars?: number;
  temperature?: number;
}

export class ScriptStage extends BaseStage<'script_generated'> {
  readonly stage = 'script_generated';
  readonly dependency = 'llm';

  private client: OpenAI;
  private model: string;
  private maxInputChars: number;
  private temperature: number;

  constructor(options: ScriptStageOptions = {}) {
    super();
    this.client = options.client ?? createOpenAIClient();
    this.model = options.model ?? Config.OPENAI_SCRIPT_MODEL;
    this.maxInputChars = options.maxInputChars ?? Config.MAX_SCRIPT_INPUT_CHARS;
    this.temperature = options.temperature ?? 0.7;
  }

  buildUserPrompt(payload: ItemPayload): string {
    const extracted = requireOutput(payload, 'content_extracted');
    const { metadata } = payload;

    const lines = [
      `HEADLINE: ${metadata.title}`,
      `SOURCE: ${extractDomain(metadata.source_url)}`,
      `RANK TODAY: #${metadata.rank}`,
    ];
    if (extracted.description) {
      lines.push(`SUMMARY: ${extracted.description}`);
    }
    lines.push('', 'ARTICLE:', truncate(extracted.text, this.maxInputChars));
    return lines.join('\n');
  }

  protected async process(payload: ItemPayload, ctx: StageContext): Promise<GeneratedScript> {
    const response = await createChatCompletion(
      this.client,
      {
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: SCRIPT_SYSTEM_PROMPT },
          { role: 'user', content: this.buildUserPrompt(payload) },
        ],
      },
      ctx.signal
    );

    const text = (response.choices[0]?.message?.content || '').trim();
    if (!text) {
      throw StageFailure.transient('empty_completion', 'Script model returned an empty completion');
    }

    return {
      text,
      word_count: countWords(text),
      model: response.model || this.model,
    };
  }
}
