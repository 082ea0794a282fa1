import { ConversationSummary, HistoryEntry, NewHistoryEntry } from '../storage/types.js';

/** Durable per-peer conversation log, read by the console and used to re-hydrate context. */
export interface HistoryStore {
  append(peer: string, entry: NewHistoryEntry): Promise<HistoryEntry>;

  /** Latest `limit` entries, oldest first. */
  tail(peer: string, limit: number): Promise<HistoryEntry[]>;

  listConversations(): Promise<ConversationSummary[]>;

  /** Clears one peer, or every peer when omitted. */
  clear(peer?: string): Promise<void>;

  /** Removes segments older than `cutoff`; returns the number of entries removed. */
  pruneOlderThan(cutoff: Date): Promise<number>;
}
