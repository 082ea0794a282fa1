import { InboundMessage } from '../types/message.js';

/**
 * Read side of the host messaging application: an append-only log of
 * inbound messages keyed by a monotonic id.
 */
export interface MessageStoreReader {
  /**
   * Inbound messages with `id > sinceCursor`, ascending by id. Has no side
   * effects: the same cursor yields the same result until new rows land.
   * Rejects with StoreUnavailableError when the log cannot be opened or read.
   */
  fetchNew(sinceCursor: number): Promise<InboundMessage[]>;

  /** Highest id currently in the log; 0 when empty. */
  latestCursor(): Promise<number>;

  close(): void;
}

/**
 * Write side: hands one text to the platform for one recipient.
 * Resolves on success, rejects with SendFailureError otherwise. Called at
 * most once per reply.
 */
export interface DeliveryPrimitive {
  readonly name: string;
  deliver(peer: string, text: string): Promise<void>;
}
