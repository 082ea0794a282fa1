import { ServerResponse } from 'node:http';
import { createLogger } from '../logging/logger.js';

const log = createLogger('sse-manager');

export type ConsoleEventName = 'message' | 'call' | 'cycle' | 'config';

export interface SSEMessage {
  event: ConsoleEventName;
  data: unknown;
}

/** Fans console events out to every connected browser. */
export class SSEManager {
  private clients = new Set<ServerResponse>();

  register(res: ServerResponse): void {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    // Send initial comment to keep connection alive
    res.write(':ok\n\n');
    this.clients.add(res);

    res.on('close', () => {
      this.clients.delete(res);
      log.debug('SSE client disconnected', { clients: this.clients.size });
    });

    log.debug('SSE client connected', { clients: this.clients.size });
  }

  broadcast(message: SSEMessage): void {
    if (this.clients.size === 0) return;

    const payload = `event: ${message.event}\ndata: ${JSON.stringify(message.data)}\n\n`;
    for (const res of this.clients) {
      try {
        res.write(payload);
      } catch (err) {
        log.debug('Dropping SSE client after write failure', { error: String(err) });
        this.clients.delete(res);
      }
    }
  }

  closeAll(): void {
    for (const res of this.clients) {
      try {
        res.end();
      } catch (err) {
        log.debug('SSE client already closed', { error: String(err) });
      }
    }
    this.clients.clear();
  }
}
