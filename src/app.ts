import { createLogger } from './logging/logger.js';
import { describeError } from './errors.js';
import { DeliveryPrimitive, MessageStoreReader } from './channels/channel.js';
import { IMessageStoreReader } from './channels/imessage/imessage-reader.js';
import { IMessageSender } from './channels/imessage/imessage-sender.js';
import { MessageSender } from './channels/message-sender.js';
import { ConversationRegistry } from './conversation/conversation-registry.js';
import { FileHistoryStore } from './history/file-history-store.js';
import { CompletionClient, FetchFn } from './llm/completion-client.js';
import { CallLogStore } from './storage/call-log.js';
import { CursorStore } from './storage/cursor-store.js';
import { DataPaths, resolveDataPaths } from './storage/paths.js';
import { RetentionSweeper } from './storage/retention.js';
import { RuntimeConfigStore, isComplete } from './storage/runtime-config-store.js';
import { ConversationProcessor } from './sync/conversation-processor.js';
import { SyncLoop } from './sync/sync-loop.js';
import { HostConfig } from './types/config.js';
import { SSEManager } from './web/sse-manager.js';
import { WebServer } from './web/web-server.js';

const log = createLogger('app');

export interface RelayOverrides {
  dataRoot?: string;
  reader?: MessageStoreReader;
  delivery?: DeliveryPrimitive;
  fetch?: FetchFn;
}

export interface Relay {
  paths: DataPaths;
  configStore: RuntimeConfigStore;
  registry: ConversationRegistry;
  syncLoop: SyncLoop;
  webServer: WebServer | undefined;
  sseManager: SSEManager;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Wires the stores, the sync loop, and the console together. Nothing runs
 * until `start()`.
 */
export async function createRelay(config: HostConfig, overrides: RelayOverrides = {}): Promise<Relay> {
  const paths = resolveDataPaths(overrides.dataRoot);
  log.info('Data root', { path: paths.root });

  const configStore = new RuntimeConfigStore(paths.runtimeConfigFile, config.runtimeDefaults);
  const historyStore = new FileHistoryStore(
    paths.historyDir,
    config.history.maxSegmentSizeBytes,
    config.history.maxSegments,
  );
  const callLog = new CallLogStore({ dir: paths.callLogDir });
  const cursorStore = new CursorStore(paths.cursorFile);

  const saved = cursorStore.load();
  const registry = saved ? ConversationRegistry.restore(saved) : new ConversationRegistry();
  await registry.hydrate(historyStore, configStore.snapshot().maxHistory);

  const reader =
    overrides.reader ??
    new IMessageStoreReader(config.messageStore.path, {
      ignoreGroupChats: config.messageStore.ignoreGroupChats,
      batchSize: config.messageStore.batchSize,
    });
  const sender = new MessageSender(overrides.delivery ?? new IMessageSender(config.sender.timeoutMs));
  const completion = new CompletionClient(config.completion, { fetch: overrides.fetch });

  const sseManager = new SSEManager();

  const processor = new ConversationProcessor({
    completion,
    sender,
    historyStore,
    callLog,
    onActivity: (event) => sseManager.broadcast({ event: 'message', data: event }),
  });

  const syncLoop = new SyncLoop({
    reader,
    registry,
    processor,
    configStore,
    cursorStore,
    options: config.sync,
    needsBaseline: saved === undefined,
    onCycle: (summary) => sseManager.broadcast({ event: 'cycle', data: summary }),
  });

  callLog.onAppend((entry) => sseManager.broadcast({ event: 'call', data: entry }));
  configStore.onChange((next) => sseManager.broadcast({ event: 'config', data: { modelName: next.modelName } }));

  const retention = new RetentionSweeper(historyStore, callLog, config.retention);

  const webServer = config.web.enabled
    ? new WebServer(config.web.port, config.web.host, {
        configStore,
        completion,
        historyStore,
        callLog,
        registry,
        syncLoop,
        sseManager,
      })
    : undefined;

  return {
    paths,
    configStore,
    registry,
    syncLoop,
    webServer,
    sseManager,

    async start(): Promise<void> {
      if (!isComplete(configStore.snapshot())) {
        log.warn('Runtime config has no API key yet; replies will fail until one is set in the console');
      }
      if (webServer) await webServer.start();
      syncLoop.start();
      if (config.retention.enabled) {
        retention.start();
        retention.sweep().catch((err) => log.error('Initial retention sweep failed', { error: describeError(err) }));
      }
    },

    async stop(): Promise<void> {
      retention.stop();
      await syncLoop.stop();
      sseManager.closeAll();
      if (webServer) await webServer.stop();
    },
  };
}
