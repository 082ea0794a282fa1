import { createLogger } from '../logging/logger.js';
import { StoreUnavailableError, describeError } from '../errors.js';
import { MessageStoreReader } from '../channels/channel.js';
import { Conversation } from '../conversation/conversation.js';
import { ConversationRegistry } from '../conversation/conversation-registry.js';
import { CursorStore } from '../storage/cursor-store.js';
import { RuntimeConfigStore } from '../storage/runtime-config-store.js';
import { RuntimeConfig, SyncConfig } from '../types/config.js';
import { ConversationProcessor } from './conversation-processor.js';

const log = createLogger('sync-loop');

export type LoopState = 'idle' | 'polling' | 'processing' | 'stopped';

export interface CycleSummary {
  startedAt: number;
  finishedAt: number;
  /** Messages returned by the store */
  fetched: number;
  /** Conversations started this cycle */
  started: number;
  /** Conversations with queued messages left for a later cycle */
  deferred: number;
  skipped?: 'store-unavailable' | 'baseline' | 'stopping';
  error?: string;
}

export interface SyncLoopDeps {
  reader: MessageStoreReader;
  registry: ConversationRegistry;
  processor: ConversationProcessor;
  configStore: RuntimeConfigStore;
  cursorStore: CursorStore;
  options: SyncConfig;
  /** True when no cursor file existed; the first successful poll only records "now". */
  needsBaseline?: boolean;
  onCycle?: (summary: CycleSummary) => void;
}

/**
 * Idle → Polling → Processing → Idle, once per tick. Each cycle reads the
 * runtime config once and hands that snapshot to every conversation it
 * starts. A soft deadline bounds how long a cycle waits; conversations
 * still running past it finish in the background under their claims.
 */
export class SyncLoop {
  private state: LoopState = 'idle';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private currentCycle: Promise<CycleSummary> | null = null;
  private stopping = false;
  private needsBaseline: boolean;
  private lastCycle: CycleSummary | undefined;

  constructor(private readonly deps: SyncLoopDeps) {
    this.needsBaseline = deps.needsBaseline ?? false;
  }

  start(): void {
    if (this.stopping) return;
    log.info('Sync loop started', { pollIntervalMs: this.deps.options.pollIntervalMs });
    this.scheduleNext(0);
  }

  /**
   * Stops scheduling, waits for the running cycle and for every in-flight
   * conversation, then writes the cursors one last time.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentCycle) await this.currentCycle;
    await this.deps.registry.waitForIdle();
    this.saveCursors();
    this.deps.reader.close();
    this.state = 'stopped';
    log.info('Sync loop stopped');
  }

  getState(): LoopState {
    return this.state;
  }

  getLastCycle(): CycleSummary | undefined {
    return this.lastCycle;
  }

  /** Runs one cycle now. Exposed for tests and the timer. */
  runCycle(): Promise<CycleSummary> {
    if (this.currentCycle) return this.currentCycle;
    const cycle = this.cycle().finally(() => {
      this.currentCycle = null;
    });
    this.currentCycle = cycle;
    return cycle;
  }

  private scheduleNext(delayMs: number): void {
    if (this.stopping) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runCycle()
        .catch((err) => log.error('Sync cycle crashed', { error: describeError(err) }))
        .finally(() => this.scheduleNext(this.deps.options.pollIntervalMs));
    }, delayMs);
  }

  private async cycle(): Promise<CycleSummary> {
    const startedAt = Date.now();
    const summary: CycleSummary = { startedAt, finishedAt: startedAt, fetched: 0, started: 0, deferred: 0 };

    if (this.stopping) {
      return this.finish({ ...summary, skipped: 'stopping' });
    }

    this.state = 'polling';
    const config = this.deps.configStore.snapshot();
    const { registry, reader } = this.deps;

    try {
      if (this.needsBaseline) {
        const latest = await reader.latestCursor();
        registry.setBaseline(latest);
        this.needsBaseline = false;
        this.saveCursors();
        log.info('Baseline recorded; earlier messages will not be answered', { storeCursor: latest });
        return this.finish({ ...summary, skipped: 'baseline' });
      }

      const messages = await reader.fetchNew(registry.readCursor());
      summary.fetched = messages.length;
      const queued = registry.ingest(messages);
      if (queued > 0) log.info('New messages queued', { fetched: messages.length, queued });
    } catch (err) {
      const error = describeError(err);
      if (err instanceof StoreUnavailableError) {
        log.error('Message store unavailable, skipping cycle', { error });
      } else {
        log.error('Polling failed, skipping cycle', { error });
      }
      return this.finish({ ...summary, skipped: 'store-unavailable', error });
    }

    this.state = 'processing';
    const candidates = registry.pending();
    summary.started = await this.processWithDeadline(candidates, config);
    summary.deferred = registry.list().filter((c) => c.queuedCount > 0).length;

    this.saveCursors();
    return this.finish(summary);
  }

  /**
   * Starts candidates through a pool of `maxConcurrentConversations`
   * workers. No conversation starts after the deadline, and the cycle stops
   * waiting at the deadline. Returns the number started.
   */
  private async processWithDeadline(candidates: Conversation[], config: RuntimeConfig): Promise<number> {
    if (candidates.length === 0) return 0;

    const { cycleDeadlineMs, maxConcurrentConversations } = this.deps.options;
    const deadline = Date.now() + cycleDeadlineMs;
    const queue = [...candidates];
    let started = 0;

    const worker = async (): Promise<void> => {
      while (queue.length > 0 && Date.now() < deadline && !this.stopping) {
        const conversation = queue.shift();
        if (!conversation) return;
        const claimed = this.runConversation(conversation, config);
        if (!claimed) continue;
        started++;
        await claimed;
      }
    };

    const workers = Array.from({ length: Math.min(maxConcurrentConversations, queue.length) }, () => worker());

    let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
    const deadlineReached = new Promise<'deadline'>((resolve) => {
      deadlineTimer = setTimeout(() => resolve('deadline'), cycleDeadlineMs);
    });

    try {
      const outcome = await Promise.race([Promise.all(workers).then(() => 'done' as const), deadlineReached]);
      if (outcome === 'deadline') {
        log.warn('Cycle deadline reached; remaining conversations deferred', {
          started,
          notStarted: queue.length,
          inFlight: this.deps.registry.inFlightCount,
        });
      }
    } finally {
      clearTimeout(deadlineTimer);
    }
    return started;
  }

  /**
   * Claims and processes one conversation. Returns undefined when the
   * conversation is already in flight. The returned promise never rejects.
   */
  private runConversation(conversation: Conversation, config: RuntimeConfig): Promise<void> | undefined {
    const claim = this.deps.registry.claim(conversation.peer);
    if (!claim) return undefined;

    const { peer } = conversation;
    return this.deps.processor
      .process(conversation, claim, config)
      .then((outcome) => {
        log.debug('Conversation processed', { peer, outcome: outcome.kind });
      })
      .catch((err) => {
        log.error('Conversation processing failed', { peer, error: describeError(err) });
        this.deps.processor.recordCrash(peer, err);
      })
      .finally(() => {
        claim.release();
        this.saveCursors();
      });
  }

  private saveCursors(): void {
    try {
      this.deps.cursorStore.save(this.deps.registry.toCursorState());
    } catch (err) {
      log.error('Failed to persist cursors', { error: describeError(err) });
    }
  }

  private finish(summary: CycleSummary): CycleSummary {
    const done = { ...summary, finishedAt: Date.now() };
    this.lastCycle = done;
    if (this.state !== 'stopped') this.state = 'idle';
    try {
      this.deps.onCycle?.(done);
    } catch (err) {
      log.warn('Cycle listener failed', { error: describeError(err) });
    }
    return done;
  }
}
