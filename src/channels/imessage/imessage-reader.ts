import Database from 'better-sqlite3';
import { z } from 'zod';
import { createLogger } from '../../logging/logger.js';
import { StoreUnavailableError, describeError } from '../../errors.js';
import { InboundMessage } from '../../types/message.js';
import { MessageStoreReader } from '../channel.js';

const log = createLogger('message-store');

/** 2001-01-01T00:00:00Z, the epoch of Messages' `date` column. */
const APPLE_EPOCH_MS = 978_307_200_000;

const FETCH_SQL = `
  SELECT m.ROWID AS id, m.text AS text, m.date AS date, m.cache_roomnames AS room, h.id AS handle
  FROM message m
  JOIN handle h ON m.handle_id = h.ROWID
  WHERE m.ROWID > @since
    AND m.is_from_me = 0
    AND m.text IS NOT NULL
    AND (@includeGroups = 1 OR m.cache_roomnames IS NULL)
  ORDER BY m.ROWID ASC
  LIMIT @limit
`;

const rowSchema = z.object({
  id: z.number().int(),
  text: z.string(),
  date: z.number().nullable(),
  room: z.string().nullable(),
  handle: z.string(),
});

const maxRowSchema = z.object({ latest: z.number().int().nullable() });

export interface IMessageReaderOptions {
  ignoreGroupChats: boolean;
  batchSize: number;
}

/**
 * Reads the Messages database (chat.db) read-only. The connection is opened
 * lazily and dropped after any failure so the next poll reopens it.
 */
export class IMessageStoreReader implements MessageStoreReader {
  private db: Database.Database | null = null;

  constructor(
    private readonly dbPath: string,
    private readonly options: IMessageReaderOptions,
  ) {}

  async fetchNew(sinceCursor: number): Promise<InboundMessage[]> {
    const rows = this.query((db) =>
      db.prepare(FETCH_SQL).all({
        since: sinceCursor,
        includeGroups: this.options.ignoreGroupChats ? 0 : 1,
        limit: this.options.batchSize,
      }),
    );

    const messages: InboundMessage[] = [];
    for (const row of rows) {
      const parsed = rowSchema.safeParse(row);
      if (!parsed.success) {
        log.warn('Skipping message row with unexpected shape', { since: sinceCursor });
        continue;
      }
      const { id, text, date, room, handle } = parsed.data;
      messages.push({
        id,
        peer: normalizePeer(handle),
        text,
        receivedAt: appleDateToMillis(date),
        ...(room ? { room } : {}),
      });
    }
    return messages;
  }

  async latestCursor(): Promise<number> {
    const row = this.query((db) => db.prepare('SELECT MAX(ROWID) AS latest FROM message').get());
    const parsed = maxRowSchema.safeParse(row);
    return parsed.success ? (parsed.data.latest ?? 0) : 0;
  }

  close(): void {
    if (!this.db) return;
    try {
      this.db.close();
    } catch (err) {
      log.warn('Failed to close message store', { error: String(err) });
    }
    this.db = null;
  }

  private query<T>(fn: (db: Database.Database) => T): T {
    const db = this.open();
    try {
      return fn(db);
    } catch (err) {
      this.close();
      throw new StoreUnavailableError(`Message store read failed: ${describeError(err)}`, { cause: err });
    }
  }

  private open(): Database.Database {
    if (this.db) return this.db;
    try {
      this.db = new Database(this.dbPath, { readonly: true, fileMustExist: true, timeout: 5_000 });
      log.info('Message store opened', { path: this.dbPath });
      return this.db;
    } catch (err) {
      throw new StoreUnavailableError(
        `Cannot open message store at ${this.dbPath}: ${describeError(err)}`,
        { cause: err },
      );
    }
  }
}

/**
 * Canonical peer id: e-mail handles lowercased, phone handles reduced to
 * an optional leading `+` and digits.
 */
export function normalizePeer(handle: string): string {
  const trimmed = handle.trim();
  if (trimmed.includes('@')) return trimmed.toLowerCase();
  if (/^\+?[\d\s().-]+$/.test(trimmed)) {
    const digits = trimmed.replace(/\D/g, '');
    return trimmed.startsWith('+') ? `+${digits}` : digits;
  }
  return trimmed;
}

/** Messages stores seconds on old databases and nanoseconds on newer ones. */
export function appleDateToMillis(date: number | null): number {
  if (date === null) return Date.now();
  if (date > 1e11) return APPLE_EPOCH_MS + Math.floor(date / 1e6);
  return APPLE_EPOCH_MS + date * 1000;
}
