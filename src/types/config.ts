export interface HostConfig {
  messageStore: MessageStoreConfig;
  sync: SyncConfig;
  completion: CompletionConfig;
  sender: SenderConfig;
  runtimeDefaults: RuntimeConfig;
  history: HistoryConfig;
  retention: RetentionConfig;
  web: WebConfig;
  logging: LoggingConfig;
}

export interface MessageStoreConfig {
  path: string;
  ignoreGroupChats: boolean;
  batchSize: number;
}

export interface SyncConfig {
  pollIntervalMs: number;
  /** Soft deadline per cycle; conversations not started by then wait for the next tick */
  cycleDeadlineMs: number;
  maxConcurrentConversations: number;
}

export interface CompletionConfig {
  timeoutMs: number;
  maxTokens: number;
  rateLimitRetries: number;
  rateLimitBackoffMs: number;
  networkRetries: number;
}

export interface SenderConfig {
  timeoutMs: number;
}

/**
 * Operator-editable settings. Instances are frozen; an edit produces a new
 * snapshot rather than mutating the one a running cycle holds.
 */
export interface RuntimeConfig {
  apiKey: string;
  apiUrl: string;
  modelName: string;
  systemPrompt: string;
  temperature: number;
  maxHistory: number;
}

export interface HistoryConfig {
  maxSegmentSizeBytes: number;
  maxSegments: number;
}

export interface RetentionConfig {
  enabled: boolean;
  days: number;
  intervalMs: number;
}

export interface WebConfig {
  enabled: boolean;
  port: number;
  host: string;
}

export interface LoggingConfig {
  file?: string;
}
