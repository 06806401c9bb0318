/**
 * OpenAI API Helper - calls made under the stage executor, with SDK errors
 * mapped onto transient and permanent stage failures.
 *
 * The SDK's own retries are disabled (`maxRetries: 0`); retry and backoff
 * belong to the pipeline.
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { StageFailure } from '../errors';
import { Logger } from '../utils';

export function createOpenAIClient(apiKey: string = Config.OPENAI_API_KEY): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

/**
 * Maps an error thrown by the OpenAI SDK to a StageFailure. Errors that are
 * not SDK API errors are returned unchanged.
 */
export function classifyOpenAIError(error: unknown): unknown {
  if (error instanceof OpenAI.APIUserAbortError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionError) {
    // Also covers APIConnectionTimeoutError
    return StageFailure.transient('openai_connection', error.message);
  }
  if (error instanceof OpenAI.RateLimitError) {
    return StageFailure.transient('openai_rate_limited', error.message);
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === undefined || status >= 500 || status === 408 || status === 409) {
      return StageFailure.transient(`openai_${status ?? 'unknown'}`, error.message);
    }
    Logger.error('Non-retryable OpenAI error', {
      status,
      code: error.code,
      error: error.message,
    });
    return StageFailure.permanent(`openai_${status}`, error.message);
  }
  return error;
}

async function callOpenAI<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw classifyOpenAIError(error);
  }
}

/**
 * Create OpenAI chat completion
 */
export async function createChatCompletion(
  client: OpenAI,
  params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  signal?: AbortSignal
): Promise<OpenAI.Chat.ChatCompletion> {
  return callOpenAI(() => client.chat.completions.create(params, { signal }));
}

/**
 * Create OpenAI TTS
 */
export async function createSpeech(
  client: OpenAI,
  params: OpenAI.Audio.SpeechCreateParams,
  signal?: AbortSignal
): Promise<Buffer> {
  return callOpenAI(async () => {
    const response = await client.audio.speech.create(params, { signal });
    return Buffer.from(await response.arrayBuffer());
  });
}
