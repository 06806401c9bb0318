import { describe, it, expect, vi, afterEach } from 'vitest';
import { StageFailure } from '../lib/errors';
import { FetchStage } from '../lib/stages/fetch';
import { HttpTool, isTransientStatus, mediaType } from '../lib/tools/http';
import { ItemPayload } from '../lib/types';

function stubFetch(respond: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => respond(String(input), init));
  vi.stubGlobal('fetch', mock);
  return mock;
}

async function failureOf(promise: Promise<unknown>): Promise<StageFailure> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof StageFailure) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a StageFailure');
}

describe('HttpTool', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return the body and content type', async () => {
    const mock = stubFetch(
      () => new Response('<p>hello</p>', { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } })
    );

    const response = await HttpTool.fetch('https://example.com/a', { headers: { Accept: 'text/html' } });

    expect(response).toEqual({
      status: 200,
      text: '<p>hello</p>',
      contentType: 'text/html; charset=utf-8',
      url: 'https://example.com/a',
      truncated: false,
    });
    expect(mock).toHaveBeenCalledTimes(1);
  });

  it('should classify server errors and rate limits as transient', async () => {
    stubFetch(() => new Response('down', { status: 503, statusText: 'Service Unavailable' }));
    const serverError = await failureOf(HttpTool.fetch('https://example.com/a'));
    expect(serverError.retryable).toBe(true);
    expect(serverError.code).toBe('http_503');
    expect(serverError.message).toBe('HTTP 503: Service Unavailable');

    stubFetch(() => new Response('slow down', { status: 429, statusText: 'Too Many Requests' }));
    const rateLimited = await failureOf(HttpTool.fetch('https://example.com/a'));
    expect(rateLimited.retryable).toBe(true);
    expect(rateLimited.code).toBe('http_429');
  });

  it('should classify client errors as permanent', async () => {
    stubFetch(() => new Response('missing', { status: 404, statusText: 'Not Found' }));

    const failure = await failureOf(HttpTool.fetch('https://example.com/a'));

    expect(failure.retryable).toBe(false);
    expect(failure.code).toBe('http_404');
  });

  it('should classify network errors as transient', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    const failure = await failureOf(HttpTool.fetch('https://example.com/a'));

    expect(failure.retryable).toBe(true);
    expect(failure.code).toBe('network');
    expect(failure.message).toBe('Request to https://example.com/a failed: fetch failed');
  });

  it('should rethrow the abort reason when the caller cancelled', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled by caller');
    controller.abort(reason);
    stubFetch((_url, init) => {
      throw init?.signal?.reason;
    });

    await expect(HttpTool.fetch('https://example.com/a', { signal: controller.signal })).rejects.toBe(reason);
  });

  it('should reject content types outside the allow list', async () => {
    stubFetch(() => new Response('%PDF', { status: 200, headers: { 'content-type': 'application/pdf' } }));

    const failure = await failureOf(
      HttpTool.fetch('https://example.com/a.pdf', { allowedContentTypes: ['text/html'] })
    );

    expect(failure.retryable).toBe(false);
    expect(failure.code).toBe('unsupported_content_type');
  });

  it('should truncate bodies past maxBytes', async () => {
    stubFetch(() => new Response('abcdefghij', { status: 200, headers: { 'content-type': 'text/plain' } }));

    const response = await HttpTool.fetch('https://example.com/a', { maxBytes: 4 });

    expect(response.text).toBe('abcd');
    expect(response.truncated).toBe(true);
  });

  it('should parse JSON and fail permanently on invalid JSON', async () => {
    stubFetch(() => new Response('[1,2,3]', { status: 200, headers: { 'content-type': 'application/json' } }));
    await expect(HttpTool.fetchJson('https://example.com/list.json')).resolves.toEqual([1, 2, 3]);

    stubFetch(() => new Response('{oops', { status: 200, headers: { 'content-type': 'application/json' } }));
    const failure = await failureOf(HttpTool.fetchJson('https://example.com/list.json'));
    expect(failure.retryable).toBe(false);
    expect(failure.code).toBe('invalid_json');
  });

  it('should expose the status and media type helpers', () => {
    expect(isTransientStatus(500)).toBe(true);
    expect(isTransientStatus(408)).toBe(true);
    expect(isTransientStatus(403)).toBe(false);
    expect(mediaType('Text/HTML; charset=utf-8')).toBe('text/html');
  });
});

describe('FetchStage', () => {
  const payload: ItemPayload = {
    metadata: { item_id: '1', rank: 1, source_url: 'https://example.com/story', title: 'Story' },
    outputs: {},
  };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should record the fetched page', async () => {
    stubFetch(
      () => new Response('<html>story</html>', { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } })
    );
    const stage = new FetchStage({ maxBytes: 1024, allowedContentTypes: ['text/html'] });

    const output = await stage.run(payload, {
      batch_id: '2024-05-01',
      item_id: '1',
      attempt: 0,
      signal: new AbortController().signal,
    });

    expect(output).toMatchObject({
      url: 'https://example.com/story',
      final_url: 'https://example.com/story',
      status: 200,
      content_type: 'text/html',
      html: '<html>story</html>',
      truncated: false,
    });
    expect(stage.calls).toBe(1);
  });
});
