/**
 * ExtractStage - pulls the readable article text out of the fetched HTML
 * using simple heuristics
 */

import { Config } from '../config';
import { StageFailure } from '../errors';
import { StageContext, requireOutput } from '../pipeline/stages';
import { ExtractedContent, ItemPayload } from '../types';
import { cleanText, countWords } from '../utils';
import { BaseStage } from './base';

type ExtractionMethod = ExtractedContent['method'];

const CONTENT_PATTERNS: Array<{ method: ExtractionMethod; pattern: RegExp }> = [
  { method: 'article', pattern: /<article[^>]*>([\s\S]*?)<\/article>/i },
  { method: 'main', pattern: /<main[^>]*>([\s\S]*?)<\/main>/i },
  {
    method: 'content-block',
    pattern: /<div[^>]*class="[^"]*(?:article|post|content|entry|story)[^"]*"[^>]*>([\s\S]*?)<\/div>/i,
  },
  {
    method: 'content-block',
    pattern: /<div[^>]*id="[^"]*(?:article|post|content|entry|story)[^"]*"[^>]*>([\s\S]*?)<\/div>/i,
  },
];

export function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(parseInt(code, 10)))
    .replace(/&amp;/g, '&');
}

function stripTags(html: string): string {
  return cleanText(decodeEntities(html.replace(/<[^>]+>/g, ' ')));
}

/**
 * Extracts title, description and main text from an HTML document.
 */
export function extractMainContent(html: string): Omit<ExtractedContent, 'word_count'> {
  const withoutScripts = html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '');

  const titleMatch = withoutScripts.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  const descriptionMatch =
    withoutScripts.match(/<meta[^>]+name=["']description["'][^>]+content=["']([^"']*)["']/i) ||
    withoutScripts.match(/<meta[^>]+property=["']og:description["'][^>]+content=["']([^"']*)["']/i);

  let method: ExtractionMethod = 'body';
  let body = withoutScripts;

  for (const { method: candidate, pattern } of CONTENT_PATTERNS) {
    const match = withoutScripts.match(pattern);
    if (match && match[1] && stripTags(match[1]).length > 0) {
      method = candidate;
      body = match[1];
      break;
    }
  }

  if (method === 'body') {
    const bodyMatch = withoutScripts.match(/<body[^>]*>([\s\S]*?)<\/body>/i);
    if (bodyMatch && bodyMatch[1]) {
      body = bodyMatch[1];
    }
  }

  const description = descriptionMatch ? stripTags(descriptionMatch[1]) : '';

  return {
    title: titleMatch ? stripTags(titleMatch[1]) : '',
    text: stripTags(body),
    ...(description ? { description } : {}),
    method,
  };
}

export class ExtractStage extends BaseStage<'content_extracted'> {
  readonly stage = 'content_extracted';
  readonly dependency = 'extractor';

  private minWordCount: number;

  constructor(minWordCount: number = Config.MIN_WORD_COUNT) {
    super();
    this.minWordCount = minWordCount;
  }

  protected async process(payload: ItemPayload, _ctx: StageContext): Promise<ExtractedContent> {
    const fetched = requireOutput(payload, 'content_fetched');
    const extracted = extractMainContent(fetched.html);
    const wordCount = countWords(extracted.text);

    if (wordCount < this.minWordCount) {
      throw StageFailure.permanent(
        'content_too_short',
        `Extracted ${wordCount} words, need at least ${this.minWordCount}`
      );
    }

    return {
      ...extracted,
      title: extracted.title || payload.metadata.title,
      word_count: wordCount,
    };
  }
}
