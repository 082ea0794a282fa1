import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigInvalidError, ConfigIssue } from './errors.js';
import { HostConfig, RuntimeConfig } from './types/config.js';

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = Object.freeze({
  apiKey: '',
  apiUrl: 'https://api.deepseek.com',
  modelName: 'deepseek-chat',
  systemPrompt: 'You are a friendly AI assistant that helps users with their questions.',
  temperature: 1.3,
  maxHistory: 10,
});

const apiUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL')
  .transform((value) => value.replace(/\/+$/, ''));

export const runtimeConfigSchema = z.object({
  apiKey: z.string().trim(),
  apiUrl: apiUrlSchema,
  modelName: z.string().trim().min(1, 'must not be empty'),
  systemPrompt: z.string(),
  temperature: z.number().min(0).max(1.5),
  maxHistory: z.number().int().min(1).max(50),
});

const hostConfigSchema = z.object({
  messageStore: z
    .object({
      path: z.string().default('~/Library/Messages/chat.db'),
      ignoreGroupChats: z.boolean().default(true),
      batchSize: z.number().int().positive().default(200),
    })
    .default({}),
  sync: z
    .object({
      pollIntervalMs: z.number().int().min(100).default(5_000),
      cycleDeadlineMs: z.number().int().min(100).default(20_000),
      maxConcurrentConversations: z.number().int().min(1).default(4),
    })
    .default({}),
  completion: z
    .object({
      timeoutMs: z.number().int().positive().default(30_000),
      maxTokens: z.number().int().positive().default(2048),
      rateLimitRetries: z.number().int().min(0).max(5).default(2),
      rateLimitBackoffMs: z.number().int().min(0).default(1_000),
      networkRetries: z.number().int().min(0).max(3).default(1),
    })
    .default({}),
  sender: z
    .object({
      timeoutMs: z.number().int().positive().default(15_000),
    })
    .default({}),
  runtimeDefaults: z
    .object({
      apiKey: runtimeConfigSchema.shape.apiKey.default(DEFAULT_RUNTIME_CONFIG.apiKey),
      apiUrl: apiUrlSchema.default(DEFAULT_RUNTIME_CONFIG.apiUrl),
      modelName: runtimeConfigSchema.shape.modelName.default(DEFAULT_RUNTIME_CONFIG.modelName),
      systemPrompt: runtimeConfigSchema.shape.systemPrompt.default(DEFAULT_RUNTIME_CONFIG.systemPrompt),
      temperature: runtimeConfigSchema.shape.temperature.default(DEFAULT_RUNTIME_CONFIG.temperature),
      maxHistory: runtimeConfigSchema.shape.maxHistory.default(DEFAULT_RUNTIME_CONFIG.maxHistory),
    })
    .default({}),
  history: z
    .object({
      maxSegmentSizeBytes: z.number().int().positive().default(524_288),
      maxSegments: z.number().int().positive().default(20),
    })
    .default({}),
  retention: z
    .object({
      enabled: z.boolean().default(true),
      days: z.number().int().positive().default(30),
      intervalMs: z.number().int().positive().default(86_400_000),
    })
    .default({}),
  web: z
    .object({
      enabled: z.boolean().default(true),
      port: z.number().int().min(0).max(65_535).default(8888),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),
  logging: z
    .object({
      file: z.string().optional(),
    })
    .default({}),
});

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{(\w+)\}/g, (_, name: string) => process.env[name] ?? '');
}

function walkAndResolve(obj: unknown): unknown {
  if (typeof obj === 'string') return resolveEnvVars(obj);
  if (Array.isArray(obj)) return obj.map(walkAndResolve);
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = walkAndResolve(v);
    }
    return result;
  }
  return obj;
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/** Parses an already-decoded YAML document. Exposed for tests. */
export function parseHostConfig(raw: unknown): HostConfig {
  const result = hostConfigSchema.safeParse(walkAndResolve(raw ?? {}));
  if (!result.success) {
    throw new ConfigInvalidError(toConfigIssues(result.error));
  }
  const config = result.data;
  return {
    ...config,
    messageStore: { ...config.messageStore, path: expandHome(config.messageStore.path) },
    runtimeDefaults: Object.freeze({ ...config.runtimeDefaults }),
  };
}

/** Loads config.yaml; a missing file yields the defaults. */
export function loadConfig(path: string): HostConfig {
  if (!existsSync(path)) return parseHostConfig({});
  return parseHostConfig(parse(readFileSync(path, 'utf-8')));
}
