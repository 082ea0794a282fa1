import { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { ConversationRegistry } from '../../conversation/conversation-registry.js';
import { HistoryStore } from '../../history/history-store.js';
import { CallLogStore } from '../../storage/call-log.js';
import { SyncLoop } from '../../sync/sync-loop.js';
import { json, parseLimit, readJsonBody } from './http-utils.js';

export interface ConsoleRouteDeps {
  historyStore: HistoryStore;
  callLog: CallLogStore;
  registry: ConversationRegistry;
  syncLoop: SyncLoop;
}

const clearBodySchema = z.object({
  peer: z.string().min(1).nullish(),
});

export async function handleConsoleRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  deps: ConsoleRouteDeps,
): Promise<boolean> {
  // GET /api/status
  if (req.method === 'GET' && url.pathname === '/api/status') {
    const memUsage = process.memoryUsage();
    json(res, 200, {
      loop: deps.syncLoop.getState(),
      lastCycle: deps.syncLoop.getLastCycle() ?? null,
      storeCursor: deps.registry.highWaterMark,
      inFlight: deps.registry.inFlightCount,
      memory: {
        rss: Math.round(memUsage.rss / 1024 / 1024),
        heapUsed: Math.round(memUsage.heapUsed / 1024 / 1024),
      },
      uptime: Math.round(process.uptime()),
    });
    return true;
  }

  // GET /api/conversations
  if (req.method === 'GET' && url.pathname === '/api/conversations') {
    const stored = await deps.historyStore.listConversations();
    const conversations = stored.map((summary) => {
      const live = deps.registry.get(summary.peer);
      return {
        ...summary,
        lastSeenCursor: live?.lastSeenCursor ?? null,
        queued: live?.queuedCount ?? 0,
        inFlight: deps.registry.isInFlight(summary.peer),
      };
    });
    json(res, 200, { conversations });
    return true;
  }

  // GET /api/history?peer=&limit=
  if (req.method === 'GET' && url.pathname === '/api/history') {
    const peer = url.searchParams.get('peer');
    if (!peer) {
      json(res, 400, { error: 'peer query param required' });
      return true;
    }
    const limit = parseLimit(url.searchParams.get('limit'), 100);
    const messages = await deps.historyStore.tail(peer, limit);
    json(res, 200, { peer, messages });
    return true;
  }

  // POST /api/history/clear
  if (req.method === 'POST' && url.pathname === '/api/history/clear') {
    const parsed = clearBodySchema.safeParse(await readJsonBody(req));
    if (!parsed.success) {
      json(res, 400, { error: 'Body must be {"peer"?: string}' });
      return true;
    }
    const peer = parsed.data.peer ?? undefined;
    await deps.historyStore.clear(peer);
    deps.registry.resetHistory(peer);
    json(res, 200, { status: 'success', cleared: peer ?? 'all' });
    return true;
  }

  // GET /api/calls?peer=&limit=
  if (req.method === 'GET' && url.pathname === '/api/calls') {
    const peer = url.searchParams.get('peer') ?? undefined;
    const limit = parseLimit(url.searchParams.get('limit'), 50);
    json(res, 200, { entries: deps.callLog.recent({ peer, limit }) });
    return true;
  }

  return false;
}
