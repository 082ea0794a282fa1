import { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { toConfigIssues } from '../../config.js';
import { ConfigInvalidError } from '../../errors.js';
import { CompletionClient } from '../../llm/completion-client.js';
import {
  RuntimeConfigStore,
  maskApiKey,
  validateRuntimeConfig,
} from '../../storage/runtime-config-store.js';
import { RuntimeConfig } from '../../types/config.js';
import { json, readJsonBody } from './http-utils.js';

export interface ConfigRouteDeps {
  configStore: RuntimeConfigStore;
  completion: CompletionClient;
}

const configPatchSchema = z.object({
  apiKey: z.string().optional(),
  apiUrl: z.string().optional(),
  modelName: z.string().optional(),
  systemPrompt: z.string().optional(),
  temperature: z.number().optional(),
  maxHistory: z.number().optional(),
});

export function publicConfig(config: RuntimeConfig): Omit<RuntimeConfig, 'apiKey'> & { apiKey: string; apiKeySet: boolean } {
  return { ...config, apiKey: maskApiKey(config.apiKey), apiKeySet: Boolean(config.apiKey) };
}

/**
 * Turns a request body into a patch. The masked key the console displays
 * is dropped so round-tripping the form keeps the stored key.
 */
function toPatch(body: unknown, current: RuntimeConfig): Partial<RuntimeConfig> {
  const parsed = configPatchSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConfigInvalidError(toConfigIssues(parsed.error));
  }
  const patch: Partial<RuntimeConfig> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (value === undefined) continue;
    if (key === 'apiKey' && value === maskApiKey(current.apiKey)) continue;
    Object.assign(patch, { [key]: value });
  }
  return patch;
}

export async function handleConfigRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  deps: ConfigRouteDeps,
): Promise<boolean> {
  // GET /api/config
  if (req.method === 'GET' && url.pathname === '/api/config') {
    json(res, 200, publicConfig(deps.configStore.snapshot()));
    return true;
  }

  // POST /api/config
  if (req.method === 'POST' && url.pathname === '/api/config') {
    const body = await readJsonBody(req);
    if (body === undefined) {
      json(res, 400, { error: 'Invalid JSON body' });
      return true;
    }
    try {
      const updated = await deps.configStore.update(toPatch(body, deps.configStore.snapshot()));
      json(res, 200, { status: 'success', config: publicConfig(updated) });
    } catch (err) {
      if (err instanceof ConfigInvalidError) {
        json(res, 400, { status: 'error', error: err.message, issues: err.issues });
        return true;
      }
      throw err;
    }
    return true;
  }

  // POST /api/config/test
  if (req.method === 'POST' && url.pathname === '/api/config/test') {
    const body = await readJsonBody(req);
    if (body === undefined) {
      json(res, 400, { error: 'Invalid JSON body' });
      return true;
    }
    let candidate: RuntimeConfig;
    try {
      const current = deps.configStore.snapshot();
      candidate = validateRuntimeConfig({ ...current, ...toPatch(body, current) });
    } catch (err) {
      if (err instanceof ConfigInvalidError) {
        json(res, 400, { status: 'error', error: err.message, issues: err.issues });
        return true;
      }
      throw err;
    }
    const result = await deps.completion.testConnection(candidate);
    if (result.ok) {
      json(res, 200, { status: 'success', response: result.text, model: result.model, latencyMs: result.latencyMs });
    } else {
      json(res, 200, { status: 'error', kind: result.error.kind, error: result.error.message });
    }
    return true;
  }

  return false;
}
