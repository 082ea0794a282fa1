/**
 * Storage types for history, the call log, and cursors.
 */
import { z } from 'zod';

// ─── Segments ───────────────────────────────────────────────────────────────────

export interface SegmentMeta {
  file: string;
  firstSeq: number;
  lastSeq: number;
  count: number;
  sizeBytes: number;
  startedAt: string;
  endedAt: string;
}

export interface SegmentIndex {
  nextSeq: number;
  segmentsCreated: number;
  segments: SegmentMeta[];
}

export const segmentIndexSchema = z.object({
  nextSeq: z.number().int().positive(),
  segmentsCreated: z.number().int().min(0).default(0),
  segments: z.array(
    z.object({
      file: z.string(),
      firstSeq: z.number().int(),
      lastSeq: z.number().int(),
      count: z.number().int(),
      sizeBytes: z.number().int(),
      startedAt: z.string(),
      endedAt: z.string(),
    }),
  ),
});

// ─── History ────────────────────────────────────────────────────────────────────

const outboundReplySchema = z.object({
  peer: z.string(),
  text: z.string(),
  inReplyTo: z.number().int(),
  sentAt: z.number().optional(),
  status: z.enum(['pending', 'sent', 'failed']),
  error: z.string().optional(),
});

export const historyEntrySchema = z.object({
  seq: z.number().int(),
  ts: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  /** Store row id of the inbound message (user entries) */
  inboundId: z.number().int().optional(),
  /** Store row id answered (assistant entries) */
  inReplyTo: z.number().int().optional(),
  delivery: z.enum(['pending', 'sent', 'failed']).optional(),
});

export type HistoryEntry = z.infer<typeof historyEntrySchema>;

export type NewHistoryEntry = Omit<HistoryEntry, 'seq' | 'ts'> & { ts?: string };

export interface ConversationSummary {
  peer: string;
  messageCount: number;
  lastActivity?: string;
}

// ─── Call log ───────────────────────────────────────────────────────────────────

export const callLogEntrySchema = z.object({
  seq: z.number().int(),
  id: z.string(),
  conversationId: z.string(),
  ts: z.string(),
  requestSummary: z.string(),
  responseSummary: z.string(),
  latencyMs: z.number(),
  attempts: z.number().int(),
  model: z.string().optional(),
  error: z.string().optional(),
  errorKind: z.string().optional(),
  reply: outboundReplySchema.optional(),
});

export type CallLogEntry = z.infer<typeof callLogEntrySchema>;

export type NewCallLogEntry = Omit<CallLogEntry, 'seq' | 'ts'> & { ts?: string };

// ─── Cursors ────────────────────────────────────────────────────────────────────

export const cursorStateSchema = z.object({
  /** Every store row at or below this id has been queued or processed */
  storeCursor: z.number().int().min(0),
  conversations: z.record(z.string(), z.number().int().min(0)),
});

export type CursorState = z.infer<typeof cursorStateSchema>;
