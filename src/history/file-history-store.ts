import { existsSync, readdirSync, rmSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '../logging/logger.js';
import { HistoryStore } from './history-store.js';
import {
  ConversationSummary,
  HistoryEntry,
  NewHistoryEntry,
  historyEntrySchema,
} from '../storage/types.js';
import { SegmentedLog, SegmentedLogOptions } from '../storage/segmented-log.js';

const log = createLogger('history');

function decodeEntry(value: unknown): HistoryEntry | undefined {
  const parsed = historyEntrySchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * One segmented JSONL log per peer under `<dataDir>/<encoded peer>/`.
 */
export class FileHistoryStore implements HistoryStore {
  private logs = new Map<string, SegmentedLog<HistoryEntry>>();
  private options: SegmentedLogOptions;

  constructor(
    private readonly dataDir: string,
    maxSegmentSizeBytes: number = 524_288,
    maxSegments: number = 20,
  ) {
    this.options = { maxSegmentSizeBytes, maxSegments };
  }

  private logFor(peer: string): SegmentedLog<HistoryEntry> {
    let peerLog = this.logs.get(peer);
    if (!peerLog) {
      peerLog = new SegmentedLog(join(this.dataDir, encodeURIComponent(peer)), decodeEntry, this.options);
      this.logs.set(peer, peerLog);
    }
    return peerLog;
  }

  async append(peer: string, entry: NewHistoryEntry): Promise<HistoryEntry> {
    return this.logFor(peer).append(entry);
  }

  async tail(peer: string, limit: number): Promise<HistoryEntry[]> {
    return this.logFor(peer).tail(limit);
  }

  async listConversations(): Promise<ConversationSummary[]> {
    return this.knownPeers()
      .map((peer) => {
        const peerLog = this.logFor(peer);
        return { peer, messageCount: peerLog.count(), lastActivity: peerLog.lastActivity() };
      })
      .sort((a, b) => (b.lastActivity ?? '').localeCompare(a.lastActivity ?? ''));
  }

  async clear(peer?: string): Promise<void> {
    if (peer !== undefined) {
      this.logFor(peer).clear();
      log.info('History cleared', { peer });
      return;
    }
    if (existsSync(this.dataDir)) {
      rmSync(this.dataDir, { recursive: true, force: true });
    }
    this.logs.clear();
    log.info('All history cleared');
  }

  async pruneOlderThan(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const peer of this.knownPeers()) {
      removed += this.logFor(peer).pruneOlderThan(cutoff);
    }
    return removed;
  }

  private knownPeers(): string[] {
    if (!existsSync(this.dataDir)) return [];
    return readdirSync(this.dataDir)
      .filter((name) => statSync(join(this.dataDir, name)).isDirectory())
      .map((name) => decodeURIComponent(name));
  }
}
