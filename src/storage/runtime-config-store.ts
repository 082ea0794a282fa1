import { createLogger } from '../logging/logger.js';
import { runtimeConfigSchema, toConfigIssues } from '../config.js';
import { ConfigInvalidError } from '../errors.js';
import { RuntimeConfig } from '../types/config.js';
import { atomicWriteJson, readJsonFile } from './atomic-write.js';

const log = createLogger('runtime-config');

export type RuntimeConfigListener = (config: RuntimeConfig) => void;

/**
 * Single writer for RuntimeConfig. Readers take `snapshot()`, a frozen
 * object that is replaced, never mutated, so a cycle holding a snapshot
 * keeps seeing the values it started with.
 */
export class RuntimeConfigStore {
  private current: RuntimeConfig;
  private writeChain: Promise<unknown> = Promise.resolve();
  private listeners: RuntimeConfigListener[] = [];

  constructor(
    private readonly filePath: string,
    defaults: RuntimeConfig,
  ) {
    this.current = this.loadOrCreate(defaults);
  }

  snapshot(): RuntimeConfig {
    return this.current;
  }

  onChange(listener: RuntimeConfigListener): void {
    this.listeners.push(listener);
  }

  /**
   * Validates `patch` merged over the current config, persists it, then
   * publishes it. Rejects with ConfigInvalidError and keeps the previous
   * config when validation fails.
   */
  update(patch: Partial<RuntimeConfig>): Promise<RuntimeConfig> {
    const run = this.writeChain.then(() => this.apply(patch));
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private apply(patch: Partial<RuntimeConfig>): RuntimeConfig {
    const next = validateRuntimeConfig({ ...this.current, ...patch });
    atomicWriteJson(this.filePath, next);
    this.current = next;
    log.info('Runtime config updated', {
      fields: Object.keys(patch),
      modelName: next.modelName,
    });
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (err) {
        log.warn('Runtime config listener failed', { error: String(err) });
      }
    }
    return next;
  }

  private loadOrCreate(defaults: RuntimeConfig): RuntimeConfig {
    try {
      const raw = readJsonFile(this.filePath);
      if (raw !== undefined) {
        const stored = typeof raw === 'object' && raw !== null ? raw : {};
        const config = validateRuntimeConfig({ ...defaults, ...stored });
        log.info('Runtime config loaded', { file: this.filePath, modelName: config.modelName });
        return config;
      }
    } catch (err) {
      log.error('Stored runtime config rejected, falling back to defaults', {
        file: this.filePath,
        error: String(err),
      });
      return validateRuntimeConfig(defaults);
    }

    const config = validateRuntimeConfig(defaults);
    atomicWriteJson(this.filePath, config);
    log.info('Runtime config created with defaults', { file: this.filePath });
    return config;
  }
}

export function validateRuntimeConfig(candidate: unknown): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigInvalidError(toConfigIssues(result.error));
  }
  return Object.freeze(result.data);
}

/** Whether the config carries enough to call the completion API. */
export function isComplete(config: RuntimeConfig): boolean {
  return Boolean(config.apiKey && config.apiUrl && config.modelName);
}

export function maskApiKey(apiKey: string): string {
  if (!apiKey) return '';
  return `••••${apiKey.slice(-4)}`;
}
