/**
 * FetchStage - downloads the item's source page
 */

import { Config } from '../config';
import { StageContext } from '../pipeline/stages';
import { HttpTool, mediaType } from '../tools/http';
import { FetchedContent, ItemPayload } from '../types';
import { BaseStage } from './base';

export interface FetchStageOptions {
  maxBytes?: number;
  allowedContentTypes?: string[];
}

export class FetchStage extends BaseStage<'content_fetched'> {
  readonly stage = 'content_fetched';
  readonly dependency = 'web';

  private maxBytes: number;
  private allowedContentTypes: string[];

  constructor(options: FetchStageOptions = {}) {
    super();
    this.maxBytes = options.maxBytes ?? Config.MAX_CONTENT_BYTES;
    this.allowedContentTypes = options.allowedContentTypes ?? Config.ALLOWED_CONTENT_TYPES;
  }

  protected async process(payload: ItemPayload, ctx: StageContext): Promise<FetchedContent> {
    const url = payload.metadata.source_url;

    const response = await HttpTool.fetch(url, {
      signal: ctx.signal,
      maxBytes: this.maxBytes,
      allowedContentTypes: this.allowedContentTypes,
      headers: { Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5' },
    });

    return {
      url,
      final_url: response.url,
      status: response.status,
      content_type: mediaType(response.contentType),
      html: response.text,
      truncated: response.truncated,
      fetched_at: new Date().toISOString(),
    };
  }
}
