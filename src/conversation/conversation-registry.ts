import { createLogger } from '../logging/logger.js';
import { Claim, ConversationClaims } from '../concurrency/conversation-claims.js';
import { HistoryStore } from '../history/history-store.js';
import { CursorState } from '../storage/types.js';
import { InboundMessage } from '../types/message.js';
import { Conversation } from './conversation.js';

const log = createLogger('conversations');

/**
 * Tracks every conversation seen, the store high-water mark, and which
 * conversations are in flight.
 */
export class ConversationRegistry {
  private conversations = new Map<string, Conversation>();
  private claims = new ConversationClaims();

  constructor(private storeCursor: number = 0) {}

  static restore(state: CursorState): ConversationRegistry {
    const registry = new ConversationRegistry(state.storeCursor);
    for (const [peer, cursor] of Object.entries(state.conversations)) {
      registry.conversations.set(peer, registry.create(peer, cursor));
    }
    return registry;
  }

  get highWaterMark(): number {
    return this.storeCursor;
  }

  /** Sets the starting point on first run ("now"). Only moves forward. */
  setBaseline(cursor: number): void {
    this.storeCursor = Math.max(this.storeCursor, cursor);
  }

  get(peer: string): Conversation | undefined {
    return this.conversations.get(peer);
  }

  list(): Conversation[] {
    return [...this.conversations.values()];
  }

  /**
   * Queues fetched messages on their conversations, creating conversations
   * for unseen peers, and raises the high-water mark. Returns the number of
   * messages newly queued.
   */
  ingest(messages: readonly InboundMessage[]): number {
    const byPeer = new Map<string, InboundMessage[]>();
    for (const message of messages) {
      const list = byPeer.get(message.peer) ?? [];
      list.push(message);
      byPeer.set(message.peer, list);
      this.storeCursor = Math.max(this.storeCursor, message.id);
    }

    let queued = 0;
    for (const [peer, peerMessages] of byPeer) {
      let conversation = this.conversations.get(peer);
      if (!conversation) {
        conversation = this.create(peer, 0);
        this.conversations.set(peer, conversation);
        log.info('New conversation', { peer });
      }
      queued += conversation.enqueue(peerMessages);
    }
    return queued;
  }

  /**
   * Conversations with queued messages that are not in flight, oldest
   * waiting message first.
   */
  pending(): Conversation[] {
    return this.list()
      .filter((c) => c.queuedCount > 0 && !this.claims.isClaimed(c.peer))
      .sort((a, b) => (a.firstQueuedId ?? 0) - (b.firstQueuedId ?? 0));
  }

  /** Marks the conversation in flight; undefined when it already is. */
  claim(peer: string): Claim | undefined {
    return this.claims.tryClaim(peer);
  }

  isInFlight(peer: string): boolean {
    return this.claims.isClaimed(peer);
  }

  get inFlightCount(): number {
    return this.claims.size;
  }

  waitForIdle(): Promise<void> {
    return this.claims.waitForIdle();
  }

  /**
   * Where the next fetch starts: below the oldest queued message, so
   * deferred work is seen again after a restart.
   */
  readCursor(): number {
    let cursor = this.storeCursor;
    for (const conversation of this.conversations.values()) {
      const first = conversation.firstQueuedId;
      if (first !== undefined) cursor = Math.min(cursor, first - 1);
    }
    return cursor;
  }

  toCursorState(): CursorState {
    const conversations: Record<string, number> = {};
    for (const conversation of this.conversations.values()) {
      conversations[conversation.peer] = conversation.lastSeenCursor;
    }
    return { storeCursor: this.readCursor(), conversations };
  }

  /** Reloads each known conversation's context from the durable history. */
  async hydrate(historyStore: HistoryStore, maxHistory: number): Promise<void> {
    for (const conversation of this.conversations.values()) {
      const entries = await historyStore.tail(conversation.peer, maxHistory);
      conversation.restoreHistory(
        entries.map((e) => ({ role: e.role, content: e.content, timestamp: Date.parse(e.ts) })),
        maxHistory,
      );
    }
    log.info('Conversations restored', { count: this.conversations.size });
  }

  resetHistory(peer?: string): void {
    if (peer !== undefined) {
      this.conversations.get(peer)?.resetHistory();
      return;
    }
    for (const conversation of this.conversations.values()) conversation.resetHistory();
  }

  private create(peer: string, cursor: number): Conversation {
    return new Conversation(peer, cursor, (claim) => this.claims.owns(claim));
  }
}
