import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createRelay, Relay } from '../../src/app.js';
import { parseHostConfig } from '../../src/config.js';
import { FetchFn } from '../../src/llm/completion-client.js';
import { WebServer } from '../../src/web/web-server.js';
import {
  FakeDelivery,
  FakeStoreReader,
  completionResponse,
  inbound,
  makeTempDir,
} from '../helpers/fakes.js';

const PEER = 'alice@example.com';

describe('web console', () => {
  let cleanup: () => void;
  let relay: Relay;
  let server: WebServer;
  let reader: FakeStoreReader;
  let baseUrl: string;
  const llmFetch = vi.fn<FetchFn>(async () => completionResponse('connection test succeeded'));

  beforeEach(async () => {
    const temp = makeTempDir();
    cleanup = temp.cleanup;
    reader = new FakeStoreReader();
    const config = parseHostConfig({
      web: { port: 0 },
      sync: { pollIntervalMs: 60_000 },
      runtimeDefaults: { apiKey: 'test-secret' },
    });
    relay = await createRelay(config, {
      dataRoot: temp.dir,
      reader,
      delivery: new FakeDelivery(),
      fetch: llmFetch,
    });
    if (!relay.webServer) throw new Error('web console disabled');
    server = relay.webServer;
    await server.start();
    baseUrl = `http://127.0.0.1:${server.address()}`;
  });

  afterEach(async () => {
    await server.stop();
    cleanup();
  });

  async function call(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, init);
    return { status: res.status, body: await res.json() };
  }

  function post(path: string, body: unknown): Promise<{ status: number; body: unknown }> {
    return call(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async function processOneMessage(): Promise<void> {
    await relay.syncLoop.runCycle(); // baseline
    reader.add(inbound(1, PEER, 'hello'));
    await relay.syncLoop.runCycle();
  }

  it('serves the console page', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await res.text()).toContain('<title>imsg-relay console</title>');
  });

  it('masks the API key', async () => {
    expect(await call('/api/config')).toEqual({
      status: 200,
      body: {
        apiKey: '••••cret',
        apiKeySet: true,
        apiUrl: 'https://api.deepseek.com',
        modelName: 'deepseek-chat',
        systemPrompt: 'You are a friendly AI assistant that helps users with their questions.',
        temperature: 1.3,
        maxHistory: 10,
      },
    });
  });

  it('saves edits and keeps the stored key when the masked value comes back', async () => {
    const res = await post('/api/config', { apiKey: '••••cret', modelName: 'other-model', maxHistory: 20 });

    expect(res).toMatchObject({ status: 200, body: { status: 'success', config: { modelName: 'other-model', maxHistory: 20 } } });
    expect(relay.configStore.snapshot().apiKey).toBe('test-secret');
    expect(relay.configStore.snapshot().modelName).toBe('other-model');
  });

  it('rejects an invalid edit and keeps the current config', async () => {
    const res = await post('/api/config', { temperature: 2 });

    expect(res).toMatchObject({ status: 400, body: { status: 'error', issues: [{ path: 'temperature' }] } });
    expect(relay.configStore.snapshot().temperature).toBe(1.3);
  });

  it('rejects a body that is not JSON', async () => {
    const res = await call('/api/config', { method: 'POST', body: '{nope' });
    expect(res).toEqual({ status: 400, body: { error: 'Invalid JSON body' } });
  });

  it('tests a candidate config without saving it', async () => {
    const res = await post('/api/config/test', { modelName: 'candidate-model' });

    expect(res).toMatchObject({
      status: 200,
      body: { status: 'success', response: 'connection test succeeded', model: 'test-model' },
    });
    expect(relay.configStore.snapshot().modelName).toBe('deepseek-chat');
  });

  it('lists conversations, history and calls after a reply', async () => {
    await processOneMessage();

    expect(await call('/api/conversations')).toMatchObject({
      status: 200,
      body: { conversations: [{ peer: PEER, messageCount: 2, lastSeenCursor: 1, queued: 0, inFlight: false }] },
    });
    expect(await call(`/api/history?peer=${encodeURIComponent(PEER)}`)).toMatchObject({
      status: 200,
      body: {
        peer: PEER,
        messages: [
          { role: 'user', content: 'hello' },
          { role: 'assistant', content: 'connection test succeeded', delivery: 'sent' },
        ],
      },
    });
    expect(await call('/api/calls')).toMatchObject({
      status: 200,
      body: { entries: [{ conversationId: PEER, requestSummary: 'hello' }] },
    });
  });

  it('clears one conversation', async () => {
    await processOneMessage();

    expect(await post('/api/history/clear', { peer: PEER })).toEqual({
      status: 200,
      body: { status: 'success', cleared: PEER },
    });
    expect(await call('/api/conversations')).toEqual({ status: 200, body: { conversations: [] } });
    expect(relay.registry.get(PEER)?.history()).toEqual([]);
  });

  it('requires a peer for history', async () => {
    expect(await call('/api/history')).toEqual({ status: 400, body: { error: 'peer query param required' } });
  });

  it('reports loop status', async () => {
    await processOneMessage();
    expect(await call('/api/status')).toMatchObject({
      status: 200,
      body: { loop: 'idle', storeCursor: 1, inFlight: 0, lastCycle: { fetched: 1, started: 1 } },
    });
  });

  it('answers unknown routes with 404', async () => {
    expect(await call('/api/nope')).toEqual({ status: 404, body: { error: 'Not found' } });
  });

  it('streams console events', async () => {
    const res = await fetch(`${baseUrl}/api/events`);
    expect(res.headers.get('content-type')).toBe('text/event-stream');
    if (!res.body) throw new Error('no stream');
    const stream = res.body.getReader();
    const decoder = new TextDecoder();
    let received = '';

    const readUntil = async (marker: string): Promise<void> => {
      while (!received.includes(marker)) {
        const { value, done } = await stream.read();
        if (done) throw new Error('stream ended');
        received += decoder.decode(value, { stream: true });
      }
    };

    await readUntil(':ok\n\n');
    await relay.configStore.update({ modelName: 'live-model' });
    await readUntil('"live-model"}\n\n');

    expect(received).toBe(':ok\n\nevent: config\ndata: {"modelName":"live-model"}\n\n');
    await stream.cancel();
  });
});
