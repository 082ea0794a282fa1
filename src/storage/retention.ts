import { createLogger } from '../logging/logger.js';
import { describeError } from '../errors.js';
import { HistoryStore } from '../history/history-store.js';
import { RetentionConfig } from '../types/config.js';
import { CallLogStore } from './call-log.js';

const log = createLogger('retention');

const DAY_MS = 86_400_000;

export interface SweepResult {
  historyRemoved: number;
  callsRemoved: number;
}

/**
 * Drops history and call-log segments whose newest record is older than
 * `days`. Whole segments only; nothing is rewritten.
 */
export class RetentionSweeper {
  private timer: ReturnType<typeof setInterval> | undefined;
  private running: Promise<SweepResult> | undefined;

  constructor(
    private readonly historyStore: HistoryStore,
    private readonly callLog: CallLogStore,
    private readonly config: RetentionConfig,
    private readonly now: () => number = Date.now,
  ) {}

  start(): void {
    if (!this.config.enabled || this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err) => log.error('Retention sweep failed', { error: describeError(err) }));
    }, this.config.intervalMs);
    this.timer.unref();
    log.info('Retention sweeper started', { days: this.config.days, intervalMs: this.config.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** One pass; concurrent callers share the pass already running. */
  sweep(): Promise<SweepResult> {
    if (this.running) return this.running;
    const run = this.prune().finally(() => {
      this.running = undefined;
    });
    this.running = run;
    return run;
  }

  private async prune(): Promise<SweepResult> {
    const cutoff = new Date(this.now() - this.config.days * DAY_MS);
    const historyRemoved = await this.historyStore.pruneOlderThan(cutoff);
    const callsRemoved = this.callLog.pruneOlderThan(cutoff);
    if (historyRemoved > 0 || callsRemoved > 0) {
      log.info('Retention sweep removed old records', {
        cutoff: cutoff.toISOString(),
        historyRemoved,
        callsRemoved,
      });
    }
    return { historyRemoved, callsRemoved };
  }
}
