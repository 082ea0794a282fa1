import { describe, it, expect } from 'vitest';
import { ConversationClaims } from '../../src/concurrency/conversation-claims.js';
import { ConversationRegistry } from '../../src/conversation/conversation-registry.js';
import { inbound } from '../helpers/fakes.js';

const PEER = '+15550001111';

describe('ConversationClaims', () => {
  it('grants one claim per key until released', () => {
    const claims = new ConversationClaims();
    const first = claims.tryClaim(PEER);
    expect(first).toBeDefined();
    expect(claims.tryClaim(PEER)).toBeUndefined();
    expect(claims.tryClaim('other@example.com')).toBeDefined();

    first?.release();
    first?.release();
    expect(claims.isClaimed(PEER)).toBe(false);
    expect(claims.size).toBe(1);
  });

  it('resolves waitForIdle once every claim is released', async () => {
    const claims = new ConversationClaims();
    const a = claims.tryClaim('a');
    const b = claims.tryClaim('b');
    let idle = false;
    const waiting = claims.waitForIdle().then(() => {
      idle = true;
    });

    a?.release();
    await Promise.resolve();
    expect(idle).toBe(false);

    b?.release();
    await waiting;
    expect(idle).toBe(true);
  });

  it('does not treat a released claim as owning the key', () => {
    const claims = new ConversationClaims();
    const stale = claims.tryClaim(PEER);
    stale?.release();
    const fresh = claims.tryClaim(PEER);
    expect(stale && claims.owns(stale)).toBe(false);
    expect(fresh && claims.owns(fresh)).toBe(true);
  });
});

describe('Conversation', () => {
  it('ignores messages at or below the cursor and duplicates', () => {
    const registry = ConversationRegistry.restore({ storeCursor: 10, conversations: { [PEER]: 10 } });
    expect(registry.ingest([inbound(9, PEER, 'old'), inbound(10, PEER, 'seen'), inbound(11, PEER, 'new')])).toBe(1);
    expect(registry.ingest([inbound(11, PEER, 'new')])).toBe(0);
    expect(registry.get(PEER)?.queuedCount).toBe(1);
  });

  it('requires the live claim to advance', () => {
    const registry = new ConversationRegistry();
    registry.ingest([inbound(1, PEER, 'hello')]);
    const conversation = registry.get(PEER);
    const claim = registry.claim(PEER);
    if (!conversation || !claim) throw new Error('setup failed');

    claim.release();
    expect(() => conversation.advance(claim, 10)).toThrow(`Conversation ${PEER} is not claimed by the caller`);
  });

  it('turns queued messages into user turns and moves the cursor', () => {
    const registry = new ConversationRegistry();
    registry.ingest([inbound(3, PEER, 'one'), inbound(4, PEER, '   '), inbound(5, PEER, 'two')]);
    const conversation = registry.get(PEER);
    const claim = registry.claim(PEER);
    if (!conversation || !claim) throw new Error('setup failed');

    const drained = conversation.advance(claim, 10);

    expect(drained.map((m) => m.id)).toEqual([3, 4, 5]);
    expect(conversation.history().map((t) => t.content)).toEqual(['one', 'two']);
    expect(conversation.lastSeenCursor).toBe(5);
    expect(conversation.queuedCount).toBe(0);
  });

  it('evicts the oldest turns beyond maxHistory', () => {
    const registry = new ConversationRegistry();
    registry.ingest([1, 2, 3, 4].map((id) => inbound(id, PEER, `m${id}`)));
    const conversation = registry.get(PEER);
    const claim = registry.claim(PEER);
    if (!conversation || !claim) throw new Error('setup failed');

    conversation.advance(claim, 4);
    expect(conversation.history().map((t) => t.content)).toEqual(['m1', 'm2', 'm3', 'm4']);

    conversation.appendAssistant('reply', 4);
    expect(conversation.history().map((t) => t.content)).toEqual(['m2', 'm3', 'm4', 'reply']);
  });

  it('drops the two oldest turns when a full history gains one exchange', () => {
    const registry = new ConversationRegistry();
    registry.ingest([1, 2, 3, 4].map((id) => inbound(id, PEER, `m${id}`)));
    const conversation = registry.get(PEER);
    const claim = registry.claim(PEER);
    if (!conversation || !claim) throw new Error('setup failed');
    conversation.advance(claim, 4);
    expect(conversation.history()).toHaveLength(4);

    registry.ingest([inbound(5, PEER, 'hello')]);
    conversation.advance(claim, 4);
    conversation.appendAssistant('hi there', 4);

    expect(conversation.history().map((t) => [t.role, t.content])).toEqual([
      ['user', 'm3'],
      ['user', 'm4'],
      ['user', 'hello'],
      ['assistant', 'hi there'],
    ]);
  });
});

describe('ConversationRegistry', () => {
  it('orders pending conversations by their oldest waiting message and skips in-flight ones', () => {
    const registry = new ConversationRegistry();
    registry.ingest([inbound(7, 'b@example.com', 'b'), inbound(5, 'a@example.com', 'a'), inbound(9, 'c@example.com', 'c')]);

    expect(registry.pending().map((c) => c.peer)).toEqual(['a@example.com', 'b@example.com', 'c@example.com']);

    registry.claim('b@example.com');
    expect(registry.pending().map((c) => c.peer)).toEqual(['a@example.com', 'c@example.com']);
    expect(registry.isInFlight('b@example.com')).toBe(true);
    expect(registry.inFlightCount).toBe(1);
  });

  it('reads again from below the oldest queued message', () => {
    const registry = new ConversationRegistry(4);
    registry.ingest([inbound(5, 'a@example.com', 'a'), inbound(8, 'b@example.com', 'b')]);
    expect(registry.highWaterMark).toBe(8);
    expect(registry.readCursor()).toBe(4);
    expect(registry.toCursorState()).toEqual({
      storeCursor: 4,
      conversations: { 'a@example.com': 0, 'b@example.com': 0 },
    });
  });

  it('only moves the baseline forward', () => {
    const registry = new ConversationRegistry(20);
    registry.setBaseline(10);
    expect(registry.highWaterMark).toBe(20);
    registry.setBaseline(30);
    expect(registry.readCursor()).toBe(30);
  });

  it('restores history from the store, bounded by maxHistory', async () => {
    const registry = ConversationRegistry.restore({ storeCursor: 3, conversations: { [PEER]: 3 } });
    const entries = ['a', 'b', 'c'].map((content, i) => ({
      seq: i + 1,
      ts: '2024-01-01T00:00:00.000Z',
      role: 'user' as const,
      content,
    }));
    const historyStore = {
      append: async () => entries[0],
      tail: async (_peer: string, limit: number) => entries.slice(-limit),
      listConversations: async () => [],
      clear: async () => {},
      pruneOlderThan: async () => 0,
    };

    await registry.hydrate(historyStore, 2);

    expect(registry.get(PEER)?.history()).toEqual([
      { role: 'user', content: 'b', timestamp: Date.parse('2024-01-01T00:00:00.000Z') },
      { role: 'user', content: 'c', timestamp: Date.parse('2024-01-01T00:00:00.000Z') },
    ]);
  });

  it('resets in-memory history', () => {
    const registry = new ConversationRegistry();
    registry.ingest([inbound(1, PEER, 'hello')]);
    const conversation = registry.get(PEER);
    const claim = registry.claim(PEER);
    if (!conversation || !claim) throw new Error('setup failed');
    conversation.advance(claim, 10);

    registry.resetHistory(PEER);
    expect(conversation.history()).toEqual([]);
    expect(conversation.lastSeenCursor).toBe(1);
  });
});
