#!/usr/bin/env node
import { addLogFile, createLogger, parseLogLevel, setLogLevel } from './logging/logger.js';
import { loadConfig } from './config.js';
import { createRelay } from './app.js';

const log = createLogger('main');

// ─── Global error boundaries ────────────────────────────────────────────────────
// A failure in one conversation must not take the relay down.

process.on('uncaughtException', (err) => {
  log.error('Uncaught exception (process NOT exiting)', {
    error: String(err),
    stack: err.stack,
  });
});

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled rejection (process NOT exiting)', {
    reason: String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

async function main(): Promise<void> {
  setLogLevel(parseLogLevel(process.env.LOG_LEVEL));

  const configPath = process.env.CONFIG_PATH ?? 'config.yaml';
  log.info('Loading config', { path: configPath });

  const config = loadConfig(configPath);
  if (config.logging.file) addLogFile(config.logging.file);
  log.info('Config loaded', {
    store: config.messageStore.path,
    pollIntervalMs: config.sync.pollIntervalMs,
  });

  const relay = await createRelay(config);
  await relay.start();

  log.info('imsg-relay started', {
    dataRoot: relay.paths.root,
    console: relay.webServer ? `http://${config.web.host}:${relay.webServer.address()}` : 'disabled',
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down...', { signal });
    try {
      await relay.stop();
      process.exit(0);
    } catch (err) {
      log.error('Shutdown failed', { error: String(err) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  log.error('Fatal startup error', { error: String(err) });
  process.exit(1);
});
