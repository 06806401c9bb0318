/**
 * HTTP Tool - Fetch content from URLs, classifying failures for the pipeline.
 *
 * Retries are not done here: callers run under the stage executor, which owns
 * retry, timeout and cancellation.
 */

import { Config } from '../config';
import { StageFailure } from '../errors';
import { Logger, errorMessage } from '../utils';

export interface HttpResponse {
  status: number;
  text: string;
  contentType: string;
  url: string;
  truncated: boolean;
}

export interface HttpFetchOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** Body bytes kept; the rest is discarded and `truncated` is set. */
  maxBytes?: number;
  /** Media types accepted (without parameters); others fail permanently. */
  allowedContentTypes?: string[];
}

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

/**
 * True when a request answered with `status` is worth repeating.
 */
export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

export function mediaType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export class HttpTool {
  static async fetch(url: string, options: HttpFetchOptions = {}): Promise<HttpResponse> {
    const { headers = {}, signal, maxBytes, allowedContentTypes } = options;

    Logger.debug('HTTP fetch', { url });

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': Config.USER_AGENT,
          ...headers,
        },
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw StageFailure.transient('network', `Request to ${url} failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const message = `HTTP ${response.status}: ${response.statusText}`;
      throw isTransientStatus(response.status)
        ? StageFailure.transient(`http_${response.status}`, message)
        : StageFailure.permanent(`http_${response.status}`, message);
    }

    const contentType = response.headers.get('content-type') || 'text/plain';
    if (allowedContentTypes && !allowedContentTypes.includes(mediaType(contentType))) {
      throw StageFailure.permanent('unsupported_content_type', `Unsupported content type: ${contentType}`);
    }

    const { text, truncated } = await HttpTool.readBody(response, maxBytes);

    return {
      status: response.status,
      text,
      contentType,
      url: response.url || url,
      truncated,
    };
  }

  /**
   * GET a JSON document. Parse errors are permanent.
   */
  static async fetchJson(url: string, options: HttpFetchOptions = {}): Promise<unknown> {
    const response = await HttpTool.fetch(url, {
      ...options,
      headers: { Accept: 'application/json', ...options.headers },
    });
    try {
      return JSON.parse(response.text);
    } catch (error) {
      throw StageFailure.permanent('invalid_json', `Invalid JSON from ${url}: ${errorMessage(error)}`);
    }
  }

  private static async readBody(
    response: Response,
    maxBytes: number | undefined
  ): Promise<{ text: string; truncated: boolean }> {
    if (maxBytes === undefined || !response.body) {
      return { text: await response.text(), truncated: false };
    }

    const reader = response.body.getReader();
    const chunks: Buffer[] = [];
    let received = 0;
    let truncated = false;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      const remaining = maxBytes - received;
      if (value.length > remaining) {
        chunks.push(Buffer.from(value.subarray(0, remaining)));
        received += remaining;
        truncated = true;
        await reader.cancel();
        break;
      }
      chunks.push(Buffer.from(value));
      received += value.length;
    }

    if (truncated) {
      Logger.debug('HTTP body truncated', { url: response.url, maxBytes });
    }
    return { text: Buffer.concat(chunks).toString('utf-8'), truncated };
  }
}
