import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { createLogger } from '../logging/logger.js';
import { CompletionError, describeError } from '../errors.js';
import { CompletionConfig, RuntimeConfig } from '../types/config.js';
import { ChatMessage, ConversationTurn } from '../types/message.js';

const log = createLogger('completion');

const TEST_PROMPT = "Hello, this is a connection test. Please reply with 'connection test succeeded'.";
const TEST_SYSTEM_PROMPT = 'This is a connection test. Reply briefly.';
const MAX_RETRY_AFTER_MS = 30_000;

const completionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

const errorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

export type CompletionResult =
  | { ok: true; text: string; model: string; attempts: number; latencyMs: number }
  | { ok: false; error: CompletionError; attempts: number; latencyMs: number };

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface CompletionClientDeps {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Client for an OpenAI-compatible `/v1/chat/completions` endpoint. Never
 * throws: every outcome is a CompletionResult.
 */
export class CompletionClient {
  private fetchFn: FetchFn;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly options: CompletionConfig,
    deps: CompletionClientDeps = {},
  ) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Asks for the next assistant turn of `history` (oldest first) under the
   * given config snapshot. Rate limits are retried with backoff up to
   * `rateLimitRetries` times, network failures `networkRetries` times.
   */
  async complete(history: readonly ConversationTurn[], config: RuntimeConfig): Promise<CompletionResult> {
    const messages = buildMessages(history, config.systemPrompt);
    const start = Date.now();
    let attempts = 0;
    let rateLimitRetries = 0;
    let networkRetries = 0;

    log.debug('Completion request', { model: config.modelName, messageCount: messages.length });

    for (;;) {
      attempts++;
      try {
        const { text, model } = await this.request(messages, config, config.temperature);
        const latencyMs = Date.now() - start;
        log.info('Completion done', { model, attempts, durationMs: latencyMs });
        return { ok: true, text, model, attempts, latencyMs };
      } catch (err) {
        const error = toCompletionError(err);

        if (error.kind === 'RateLimited' && rateLimitRetries < this.options.rateLimitRetries) {
          const waitMs = this.backoffFor(error, rateLimitRetries);
          rateLimitRetries++;
          log.warn('Rate limited, backing off', { attempt: attempts, waitMs });
          await this.sleep(waitMs);
          continue;
        }
        if (error.kind === 'NetworkError' && networkRetries < this.options.networkRetries) {
          networkRetries++;
          log.warn('Network error, retrying', { attempt: attempts, error: error.message });
          continue;
        }

        const latencyMs = Date.now() - start;
        log.error('Completion failed', { kind: error.kind, attempts, error: error.message });
        return { ok: false, error, attempts, latencyMs };
      }
    }
  }

  /** One attempt with a fixed prompt; used by the console's connection test. */
  async testConnection(config: RuntimeConfig): Promise<CompletionResult> {
    const start = Date.now();
    const messages: ChatMessage[] = [
      { role: 'system', content: TEST_SYSTEM_PROMPT },
      { role: 'user', content: TEST_PROMPT },
    ];
    try {
      const { text, model } = await this.request(messages, config, 0.1);
      return { ok: true, text, model, attempts: 1, latencyMs: Date.now() - start };
    } catch (err) {
      return { ok: false, error: toCompletionError(err), attempts: 1, latencyMs: Date.now() - start };
    }
  }

  private backoffFor(error: CompletionError, retryIndex: number): number {
    if (error.retryAfter !== undefined) {
      return Math.min(error.retryAfter * 1000, MAX_RETRY_AFTER_MS);
    }
    return this.options.rateLimitBackoffMs * 2 ** retryIndex;
  }

  private async request(
    messages: ChatMessage[],
    config: RuntimeConfig,
    temperature: number,
  ): Promise<{ text: string; model: string }> {
    if (!config.apiKey) {
      throw new CompletionError('AuthError', 'API key is not configured');
    }

    let res: Response;
    try {
      res = await this.fetchFn(completionsEndpoint(config.apiUrl), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify({
          model: config.modelName,
          messages,
          temperature,
          max_tokens: this.options.maxTokens,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new CompletionError('NetworkError', `Request failed: ${describeError(err)}`);
    }

    const bodyText = await res.text().catch(() => '');

    if (!res.ok) {
      throw errorForStatus(res, bodyText);
    }

    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch {
      throw new CompletionError('MalformedResponse', 'Response body is not JSON', res.status);
    }

    const parsed = completionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CompletionError('MalformedResponse', 'Response has no choices[0].message.content', res.status);
    }

    const text = (parsed.data.choices[0].message.content ?? '').trim();
    if (!text) {
      throw new CompletionError('MalformedResponse', 'Completion content is empty', res.status);
    }
    return { text, model: parsed.data.model ?? config.modelName };
  }
}

/** System prompt first (when set), then history oldest-first. */
export function buildMessages(history: readonly ConversationTurn[], systemPrompt: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  for (const turn of history) {
    messages.push({ role: turn.role, content: turn.content });
  }
  return messages;
}

export function completionsEndpoint(apiUrl: string): string {
  const base = apiUrl.replace(/\/+$/, '');
  if (base.endsWith('/chat/completions')) return base;
  if (base.endsWith('/v1')) return `${base}/chat/completions`;
  return `${base}/v1/chat/completions`;
}

function errorForStatus(res: Response, bodyText: string): CompletionError {
  const detail = extractErrorMessage(bodyText);
  const message = `HTTP ${res.status}${detail ? `: ${detail}` : ''}`;

  if (res.status === 401 || res.status === 403) {
    return new CompletionError('AuthError', message, res.status);
  }
  if (res.status === 429) {
    return new CompletionError('RateLimited', message, res.status, parseRetryAfter(res.headers.get('retry-after')));
  }
  if (res.status === 408 || res.status >= 500) {
    return new CompletionError('NetworkError', message, res.status);
  }
  return new CompletionError('RequestRejected', message, res.status);
}

function extractErrorMessage(bodyText: string): string | undefined {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(bodyText));
    if (!parsed.success) return undefined;
    const { error } = parsed.data;
    return typeof error === 'string' ? error : error.message;
  } catch {
    return undefined;
  }
}

function parseRetryAfter(value: string | null): number | undefined {
  if (value === null) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function toCompletionError(err: unknown): CompletionError {
  if (err instanceof CompletionError) return err;
  return new CompletionError('NetworkError', describeError(err));
}
