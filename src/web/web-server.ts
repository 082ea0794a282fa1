import { createServer, IncomingMessage, ServerResponse, Server } from 'node:http';
import { createLogger } from '../logging/logger.js';
import { SSEManager } from './sse-manager.js';
import { ConfigRouteDeps, handleConfigRoutes } from './routes/config-routes.js';
import { ConsoleRouteDeps, handleConsoleRoutes } from './routes/console-routes.js';
import { json } from './routes/http-utils.js';
import { getConsoleHtml } from './web-html.js';

const log = createLogger('web-server');

export interface WebServerDeps extends ConfigRouteDeps, ConsoleRouteDeps {
  sseManager: SSEManager;
}

/** Operator console: JSON API, SSE feed, and one HTML page. */
export class WebServer {
  private server: Server | null = null;
  private cachedHtml: string;

  constructor(
    private readonly port: number,
    private readonly host: string,
    private readonly deps: WebServerDeps,
  ) {
    this.cachedHtml = getConsoleHtml();
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err) => {
          log.error('Unhandled request failure', { error: String(err) });
        });
      });
      this.server = server;

      server.once('error', (err) => {
        log.error('Web server error', { error: String(err) });
        reject(err);
      });

      server.listen(this.port, this.host, () => {
        log.info('Web console started', { url: `http://${this.host}:${this.address()}` });
        resolve();
      });
    });
  }

  /** Bound port; differs from the configured one when that was 0. */
  address(): number {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr.port : this.port;
  }

  async stop(): Promise<void> {
    this.deps.sseManager.closeAll();
    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(() => {
        log.info('Web console stopped');
        resolve();
      });
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

      if (req.method === 'GET' && url.pathname === '/api/events') {
        this.deps.sseManager.register(res);
        return;
      }

      if (await handleConfigRoutes(req, res, url, this.deps)) return;
      if (await handleConsoleRoutes(req, res, url, this.deps)) return;

      if (req.method === 'GET' && (url.pathname === '/' || url.pathname === '/index.html')) {
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end(this.cachedHtml);
        return;
      }

      json(res, 404, { error: 'Not found' });
    } catch (err) {
      log.error('Request handler error', { error: String(err) });
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  }
}
