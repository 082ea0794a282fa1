import { Claim } from '../concurrency/conversation-claims.js';
import { ConversationTurn, InboundMessage } from '../types/message.js';

/**
 * Per-peer context: the last processed store id, a bounded FIFO of turns,
 * and inbound messages fetched but not yet processed.
 */
export class Conversation {
  private turns: ConversationTurn[] = [];
  private queue: InboundMessage[] = [];

  constructor(
    public readonly peer: string,
    private cursor: number,
    private readonly isHeld: (claim: Claim) => boolean,
  ) {}

  get lastSeenCursor(): number {
    return this.cursor;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** Id of the oldest message still waiting to be processed. */
  get firstQueuedId(): number | undefined {
    return this.queue[0]?.id;
  }

  history(): readonly ConversationTurn[] {
    return this.turns;
  }

  /**
   * Queues messages newer than both the cursor and anything already queued.
   * Returns how many were added.
   */
  enqueue(messages: readonly InboundMessage[]): number {
    let added = 0;
    for (const message of messages) {
      const floor = Math.max(this.cursor, this.queue[this.queue.length - 1]?.id ?? 0);
      if (message.id <= floor) continue;
      this.queue.push(message);
      added++;
    }
    return added;
  }

  /**
   * Drains the queue into history as user turns and moves the cursor to the
   * highest drained id. Requires the conversation's live claim, so a second
   * cycle cannot start on a conversation that is in flight.
   * Blank messages advance the cursor but add no turn.
   */
  advance(claim: Claim, maxHistory: number): InboundMessage[] {
    if (claim.key !== this.peer || !this.isHeld(claim)) {
      throw new Error(`Conversation ${this.peer} is not claimed by the caller`);
    }
    const drained = this.queue;
    this.queue = [];
    for (const message of drained) {
      if (message.text.trim()) {
        this.turns.push({ role: 'user', content: message.text, timestamp: message.receivedAt });
      }
      this.cursor = Math.max(this.cursor, message.id);
    }
    this.trim(maxHistory);
    return drained;
  }

  appendAssistant(text: string, maxHistory: number, timestamp: number = Date.now()): void {
    this.turns.push({ role: 'assistant', content: text, timestamp });
    this.trim(maxHistory);
  }

  /** Replaces history wholesale; used when re-hydrating after a restart. */
  restoreHistory(turns: readonly ConversationTurn[], maxHistory: number): void {
    this.turns = [...turns];
    this.trim(maxHistory);
  }

  resetHistory(): void {
    this.turns = [];
  }

  private trim(maxHistory: number): void {
    const excess = this.turns.length - Math.max(1, maxHistory);
    if (excess > 0) this.turns.splice(0, excess);
  }
}
