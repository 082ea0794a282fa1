import { existsSync, readFileSync, rmSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '../logging/logger.js';
import { SegmentIndex, segmentIndexSchema } from './types.js';
import {
  appendJsonLine,
  atomicWriteJson,
  formatTimestampFilename,
  parseJsonLines,
  readJsonFile,
} from './atomic-write.js';

const log = createLogger('segmented-log');

export interface SegmentedLogOptions {
  maxSegmentSizeBytes: number;
  /** Oldest segments beyond this count are dropped on append. Unset means no cap. */
  maxSegments?: number;
}

interface Sequenced {
  seq: number;
  ts: string;
}

/**
 * Append-only JSONL log split into size-bounded segment files with an
 * `_index.json` describing them. Lines are only ever appended; segments are
 * removed whole (rollover past `maxSegments` when set, retention pruning, clear).
 */
export class SegmentedLog<T extends Sequenced> {
  constructor(
    private readonly dir: string,
    private readonly decode: (value: unknown) => T | undefined,
    private readonly options: SegmentedLogOptions,
  ) {}

  private get indexPath(): string {
    return join(this.dir, '_index.json');
  }

  readIndex(): SegmentIndex {
    try {
      const raw = readJsonFile(this.indexPath);
      if (raw === undefined) return emptyIndex();
      const parsed = segmentIndexSchema.safeParse(raw);
      if (parsed.success) return parsed.data;
      log.error('Segment index has an unexpected shape, resetting', { dir: this.dir });
    } catch (err) {
      log.error('Failed to read segment index, resetting', { dir: this.dir, error: String(err) });
    }
    return emptyIndex();
  }

  private writeIndex(index: SegmentIndex): void {
    atomicWriteJson(this.indexPath, index);
  }

  /** Assigns seq (and ts when absent), appends, and returns the stored record. */
  append(entry: Omit<T, 'seq' | 'ts'> & { ts?: string }): T {
    const index = this.readIndex();
    const ts = entry.ts ?? new Date().toISOString();
    const record = { ...entry, seq: index.nextSeq, ts };
    const stored = this.decode(record);
    if (!stored) {
      throw new Error(`Refusing to append a record that does not match the log schema (${this.dir})`);
    }

    let current = index.segments[index.segments.length - 1];
    if (!current || current.sizeBytes >= this.options.maxSegmentSizeBytes) {
      index.segmentsCreated++;
      current = {
        file: `${formatTimestampFilename()}-${index.segmentsCreated}.jsonl`,
        firstSeq: stored.seq,
        lastSeq: stored.seq,
        count: 0,
        sizeBytes: 0,
        startedAt: ts,
        endedAt: ts,
      };
      index.segments.push(current);
    }

    const bytesWritten = appendJsonLine(join(this.dir, current.file), stored);
    current.lastSeq = stored.seq;
    current.count++;
    current.sizeBytes += bytesWritten;
    current.endedAt = ts;
    index.nextSeq++;

    const { maxSegments } = this.options;
    while (maxSegments !== undefined && index.segments.length > maxSegments) {
      const oldest = index.segments.shift();
      if (oldest) this.deleteSegmentFile(oldest.file);
    }

    this.writeIndex(index);
    return stored;
  }

  /** Most recent `limit` records, oldest first. */
  tail(limit: number): T[] {
    if (limit <= 0) return [];
    const index = this.readIndex();
    const collected: T[] = [];
    for (let i = index.segments.length - 1; i >= 0 && collected.length < limit; i--) {
      collected.unshift(...this.readSegment(index.segments[i].file));
    }
    return collected.slice(-limit);
  }

  count(): number {
    return this.readIndex().segments.reduce((sum, seg) => sum + seg.count, 0);
  }

  lastActivity(): string | undefined {
    const segments = this.readIndex().segments;
    return segments[segments.length - 1]?.endedAt;
  }

  /** Removes segments whose newest record is older than `cutoff`. Returns records removed. */
  pruneOlderThan(cutoff: Date): number {
    const index = this.readIndex();
    const keep = index.segments.filter((seg) => Date.parse(seg.endedAt) >= cutoff.getTime());
    const dropped = index.segments.filter((seg) => !keep.includes(seg));
    if (dropped.length === 0) return 0;

    for (const seg of dropped) this.deleteSegmentFile(seg.file);
    this.writeIndex({ ...index, segments: keep });
    return dropped.reduce((sum, seg) => sum + seg.count, 0);
  }

  clear(): void {
    if (!existsSync(this.dir)) return;
    rmSync(this.dir, { recursive: true, force: true });
  }

  private readSegment(file: string): T[] {
    const path = join(this.dir, file);
    if (!existsSync(path)) {
      log.warn('Segment file missing, skipping', { file: path });
      return [];
    }
    try {
      return parseJsonLines(readFileSync(path, 'utf-8'), this.decode, () =>
        log.warn('Skipping corrupt JSONL line', { file: path }),
      );
    } catch (err) {
      log.error('Failed to read segment file', { file: path, error: String(err) });
      return [];
    }
  }

  private deleteSegmentFile(file: string): void {
    const path = join(this.dir, file);
    try {
      if (existsSync(path)) unlinkSync(path);
    } catch (err) {
      log.warn('Failed to delete segment', { file: path, error: String(err) });
    }
  }
}

function emptyIndex(): SegmentIndex {
  return { nextSeq: 1, segmentsCreated: 0, segments: [] };
}
