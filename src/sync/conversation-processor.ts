import { createLogger } from '../logging/logger.js';
import { Claim } from '../concurrency/conversation-claims.js';
import { Conversation } from '../conversation/conversation.js';
import { CompletionClient } from '../llm/completion-client.js';
import { MessageSender } from '../channels/message-sender.js';
import { HistoryStore } from '../history/history-store.js';
import { CallLogStore } from '../storage/call-log.js';
import { RuntimeConfig } from '../types/config.js';
import { OutboundReply } from '../types/message.js';

const log = createLogger('processor');

const SUMMARY_LENGTH = 80;

export type ProcessOutcome =
  | { kind: 'replied'; reply: OutboundReply }
  | { kind: 'completion-failed'; errorKind: string }
  | { kind: 'nothing-to-answer' };

export interface ActivityEvent {
  type: 'message';
  peer: string;
  role: 'user' | 'assistant';
  content: string;
  delivery?: OutboundReply['status'];
}

export interface ConversationProcessorDeps {
  completion: CompletionClient;
  sender: MessageSender;
  historyStore: HistoryStore;
  callLog: CallLogStore;
  onActivity?: (event: ActivityEvent) => void;
}

/**
 * One conversation's turn of the sync cycle: ingest queued messages,
 * ask for a completion, send it once, record everything.
 */
export class ConversationProcessor {
  constructor(private readonly deps: ConversationProcessorDeps) {}

  async process(conversation: Conversation, claim: Claim, config: RuntimeConfig): Promise<ProcessOutcome> {
    const { peer } = conversation;
    const drained = conversation.advance(claim, config.maxHistory);
    const answerable = drained.filter((m) => m.text.trim());

    for (const message of answerable) {
      await this.deps.historyStore.append(peer, {
        role: 'user',
        content: message.text,
        inboundId: message.id,
        ts: new Date(message.receivedAt).toISOString(),
      });
      this.emit({ type: 'message', peer, role: 'user', content: message.text });
    }

    const latest = answerable[answerable.length - 1];
    if (!latest) {
      log.debug('Only blank messages queued, nothing to answer', { peer, count: drained.length });
      return { kind: 'nothing-to-answer' };
    }

    const result = await this.deps.completion.complete(conversation.history(), config);

    if (!result.ok) {
      this.deps.callLog.append({
        conversationId: peer,
        requestSummary: summarize(latest.text),
        responseSummary: '',
        latencyMs: result.latencyMs,
        attempts: result.attempts,
        model: config.modelName,
        error: result.error.message,
        errorKind: result.error.kind,
      });
      return { kind: 'completion-failed', errorKind: result.error.kind };
    }

    conversation.appendAssistant(result.text, config.maxHistory);

    const reply = await this.deps.sender.send(peer, result.text, latest.id);

    // Logged before the history write; the delivery status must survive its failure.
    this.deps.callLog.append({
      conversationId: peer,
      requestSummary: summarize(latest.text),
      responseSummary: summarize(result.text),
      latencyMs: result.latencyMs,
      attempts: result.attempts,
      model: result.model,
      reply,
      ...(reply.status === 'failed'
        ? { error: reply.error ?? 'delivery failed', errorKind: 'SendFailure' }
        : {}),
    });

    await this.deps.historyStore.append(peer, {
      role: 'assistant',
      content: result.text,
      inReplyTo: latest.id,
      delivery: reply.status,
    });
    this.emit({ type: 'message', peer, role: 'assistant', content: result.text, delivery: reply.status });

    return { kind: 'replied', reply };
  }

  /** Records a failure that escaped `process` so it still leaves a trace. */
  recordCrash(peer: string, err: unknown): void {
    try {
      this.deps.callLog.append({
        conversationId: peer,
        requestSummary: '',
        responseSummary: '',
        latencyMs: 0,
        attempts: 0,
        error: err instanceof Error ? err.message : String(err),
        errorKind: 'Internal',
      });
    } catch (appendErr) {
      log.error('Failed to record crash in call log', { peer, error: String(appendErr) });
    }
  }

  private emit(event: ActivityEvent): void {
    try {
      this.deps.onActivity?.(event);
    } catch (err) {
      log.warn('Activity listener failed', { error: String(err) });
    }
  }
}

export function summarize(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > SUMMARY_LENGTH ? `${flat.slice(0, SUMMARY_LENGTH - 1)}…` : flat;
}
