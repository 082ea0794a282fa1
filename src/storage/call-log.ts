import { randomUUID } from 'node:crypto';
import { createLogger } from '../logging/logger.js';
import { CallLogEntry, NewCallLogEntry, callLogEntrySchema } from './types.js';
import { SegmentedLog } from './segmented-log.js';

const log = createLogger('call-log');

function decodeEntry(value: unknown): CallLogEntry | undefined {
  const parsed = callLogEntrySchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export type CallLogListener = (entry: CallLogEntry) => void;

/**
 * Append-only audit trail of completion attempts. Entries are never
 * rewritten, and segments have no count cap: only retention drops them.
 */
export class CallLogStore {
  private log: SegmentedLog<CallLogEntry>;
  private listeners: CallLogListener[] = [];

  constructor(opts: { dir: string; maxSegmentSizeBytes?: number }) {
    this.log = new SegmentedLog(opts.dir, decodeEntry, {
      maxSegmentSizeBytes: opts.maxSegmentSizeBytes ?? 1_048_576,
    });
  }

  onAppend(listener: CallLogListener): void {
    this.listeners.push(listener);
  }

  /**
   * Records one entry. Never throws: a write failure is logged and the
   * entry is returned as undefined.
   */
  append(entry: Omit<NewCallLogEntry, 'id'> & { id?: string }): CallLogEntry | undefined {
    let stored: CallLogEntry;
    try {
      stored = this.log.append({ ...entry, id: entry.id ?? randomUUID() });
    } catch (err) {
      log.error('Failed to write call log entry', {
        conversationId: entry.conversationId,
        error: String(err),
      });
      return undefined;
    }
    for (const listener of this.listeners) {
      try {
        listener(stored);
      } catch (err) {
        log.warn('Call log listener failed', { error: String(err) });
      }
    }
    return stored;
  }

  /** Newest first. */
  recent(opts: { peer?: string; limit?: number } = {}): CallLogEntry[] {
    const limit = opts.limit ?? 50;
    const { peer } = opts;
    if (peer === undefined) {
      return this.log.tail(limit).reverse();
    }
    return this.log
      .tail(Number.MAX_SAFE_INTEGER)
      .filter((entry) => entry.conversationId === peer)
      .slice(-limit)
      .reverse();
  }

  pruneOlderThan(cutoff: Date): number {
    return this.log.pruneOlderThan(cutoff);
  }
}
