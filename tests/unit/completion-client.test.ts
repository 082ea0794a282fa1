import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_RUNTIME_CONFIG } from '../../src/config.js';
import {
  CompletionClient,
  FetchFn,
  buildMessages,
  completionsEndpoint,
} from '../../src/llm/completion-client.js';
import { CompletionConfig, RuntimeConfig } from '../../src/types/config.js';
import { ConversationTurn } from '../../src/types/message.js';
import { completionResponse, errorResponse, requestBody } from '../helpers/fakes.js';

const OPTIONS: CompletionConfig = {
  timeoutMs: 1_000,
  maxTokens: 256,
  rateLimitRetries: 2,
  rateLimitBackoffMs: 100,
  networkRetries: 1,
};

const CONFIG: RuntimeConfig = {
  ...DEFAULT_RUNTIME_CONFIG,
  apiKey: 'test-secret',
  apiUrl: 'https://llm.test',
  systemPrompt: 'Be brief.',
};

const HISTORY: ConversationTurn[] = [{ role: 'user', content: 'hello', timestamp: 1 }];

function setup(...responses: Array<Response | Error>) {
  const queue = [...responses];
  const fetch = vi.fn<FetchFn>(async () => {
    const next = queue.shift();
    if (next === undefined) throw new Error('no more responses');
    if (next instanceof Error) throw next;
    return next;
  });
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new CompletionClient(OPTIONS, { fetch, sleep });
  return { client, fetch, sleep };
}

describe('CompletionClient.complete', () => {
  it('posts the history with the snapshot settings and returns the trimmed reply', async () => {
    const { client, fetch } = setup(completionResponse('  hi there  ', 'deepseek-chat-v2'));

    const result = await client.complete(HISTORY, CONFIG);

    expect(result).toMatchObject({ ok: true, text: 'hi there', model: 'deepseek-chat-v2', attempts: 1 });
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(new Headers(init.headers).get('authorization')).toBe('Bearer test-secret');
    expect(requestBody(init)).toEqual({
      model: 'deepseek-chat',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hello' },
      ],
      temperature: 1.3,
      max_tokens: 256,
    });
  });

  it('falls back to the configured model name when the response omits one', async () => {
    const body = JSON.stringify({ choices: [{ message: { content: 'ok' } }] });
    const { client } = setup(new Response(body, { status: 200 }));
    expect(await client.complete(HISTORY, CONFIG)).toMatchObject({ ok: true, model: 'deepseek-chat' });
  });

  it('fails with AuthError without calling the API when no key is set', async () => {
    const { client, fetch } = setup();
    const result = await client.complete(HISTORY, { ...CONFIG, apiKey: '' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('AuthError');
    expect(fetch).not.toHaveBeenCalled();
  });

  it.each([401, 403])('maps HTTP %i to AuthError without retrying', async (status) => {
    const { client, fetch } = setup(errorResponse(status, { error: { message: 'invalid key' } }));
    const result = await client.complete(HISTORY, CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('AuthError');
      expect(result.error.message).toBe(`HTTP ${status}: invalid key`);
      expect(result.attempts).toBe(1);
    }
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('retries rate limits with exponential backoff, then gives up', async () => {
    const { client, fetch, sleep } = setup(errorResponse(429), errorResponse(429), errorResponse(429));
    const result = await client.complete(HISTORY, CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RateLimited');
      expect(result.attempts).toBe(3);
    }
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('honours Retry-After, capped at 30 seconds', async () => {
    const { client, sleep } = setup(
      errorResponse(429, {}, { 'Retry-After': '2' }),
      errorResponse(429, {}, { 'Retry-After': '120' }),
      completionResponse('finally'),
    );
    const result = await client.complete(HISTORY, CONFIG);
    expect(result).toMatchObject({ ok: true, text: 'finally', attempts: 3 });
    expect(sleep.mock.calls).toEqual([[2000], [30000]]);
  });

  it('retries a server error once', async () => {
    const { client, sleep } = setup(errorResponse(503), completionResponse('recovered'));
    expect(await client.complete(HISTORY, CONFIG)).toMatchObject({ ok: true, text: 'recovered', attempts: 2 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up on repeated network failures', async () => {
    const { client, fetch } = setup(new TypeError('fetch failed'), new TypeError('fetch failed'));
    const result = await client.complete(HISTORY, CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('NetworkError');
      expect(result.error.message).toBe('Request failed: fetch failed');
    }
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('maps other client errors to RequestRejected', async () => {
    const { client } = setup(errorResponse(400, { error: 'unknown model' }));
    const result = await client.complete(HISTORY, CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RequestRejected');
      expect(result.error.message).toBe('HTTP 400: unknown model');
      expect(result.error.status).toBe(400);
    }
  });

  it.each([
    { label: 'a body that is not JSON', response: () => new Response('<html>', { status: 200 }), message: 'Response body is not JSON' },
    {
      label: 'no choices',
      response: () => new Response(JSON.stringify({ choices: [] }), { status: 200 }),
      message: 'Response has no choices[0].message.content',
    },
    { label: 'empty content', response: () => completionResponse('   '), message: 'Completion content is empty' },
  ])('reports MalformedResponse for $label', async ({ response, message }) => {
    const { client, fetch } = setup(response());
    const result = await client.complete(HISTORY, CONFIG);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MalformedResponse');
      expect(result.error.message).toBe(message);
    }
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});

describe('CompletionClient.testConnection', () => {
  it('makes a single low-temperature attempt', async () => {
    const { client, fetch } = setup(errorResponse(500));
    const result = await client.testConnection(CONFIG);
    expect(result.ok).toBe(false);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(requestBody(fetch.mock.calls[0][1])).toMatchObject({ temperature: 0.1 });
  });
});

describe('buildMessages', () => {
  it('omits the system message when the prompt is empty', () => {
    expect(buildMessages(HISTORY, '')).toEqual([{ role: 'user', content: 'hello' }]);
  });
});

describe('completionsEndpoint', () => {
  it.each([
    ['https://api.deepseek.com', 'https://api.deepseek.com/v1/chat/completions'],
    ['https://llm.test/v1', 'https://llm.test/v1/chat/completions'],
    ['https://llm.test/v1/', 'https://llm.test/v1/chat/completions'],
    ['https://llm.test/v1/chat/completions', 'https://llm.test/v1/chat/completions'],
  ])('%s -> %s', (apiUrl, expected) => {
    expect(completionsEndpoint(apiUrl)).toBe(expected);
  });
});
