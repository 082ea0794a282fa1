import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { FileHistoryStore } from '../../src/history/file-history-store.js';
import { CallLogStore } from '../../src/storage/call-log.js';
import { RetentionSweeper } from '../../src/storage/retention.js';
import { makeTempDir } from '../helpers/fakes.js';

const NOW = Date.parse('2024-06-30T00:00:00.000Z');

describe('RetentionSweeper', () => {
  let dir: string;
  let cleanup: () => void;
  let history: FileHistoryStore;
  let calls: CallLogStore;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    history = new FileHistoryStore(join(dir, 'history'), 1, 10);
    calls = new CallLogStore({ dir: join(dir, 'calls'), maxSegmentSizeBytes: 1 });
  });

  afterEach(() => cleanup());

  function callEntry(ts: string) {
    return { conversationId: 'a@example.com', requestSummary: 'q', responseSummary: 'a', latencyMs: 1, attempts: 1, ts };
  }

  it('drops history and calls older than the configured days', async () => {
    await history.append('a@example.com', { role: 'user', content: 'ancient', ts: '2024-05-01T00:00:00.000Z' });
    await history.append('a@example.com', { role: 'user', content: 'recent', ts: '2024-06-25T00:00:00.000Z' });
    calls.append(callEntry('2024-05-01T00:00:00.000Z'));
    calls.append(callEntry('2024-06-25T00:00:00.000Z'));

    const sweeper = new RetentionSweeper(history, calls, { enabled: true, days: 30, intervalMs: 60_000 }, () => NOW);
    expect(await sweeper.sweep()).toEqual({ historyRemoved: 1, callsRemoved: 1 });

    expect((await history.tail('a@example.com', 10)).map((e) => e.content)).toEqual(['recent']);
    expect(calls.recent().map((e) => e.ts)).toEqual(['2024-06-25T00:00:00.000Z']);
  });

  it('removes nothing when everything is within the window', async () => {
    await history.append('a@example.com', { role: 'user', content: 'recent', ts: '2024-06-29T00:00:00.000Z' });
    const sweeper = new RetentionSweeper(history, calls, { enabled: true, days: 30, intervalMs: 60_000 }, () => NOW);
    expect(await sweeper.sweep()).toEqual({ historyRemoved: 0, callsRemoved: 0 });
  });
});
