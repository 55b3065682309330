import { join } from "path";
import { createStorage } from "./storage";
import type { RecordStorage } from "./storage/types";
import { EntityStatusStore } from "./status/store";
import { createCollectionQueue, createEntryStatusQueue } from "./queue/queues";
import type { CollectionQueue, EntryStatusQueue } from "./queue/queues";
import { createRemoteApi } from "./api/client";
import type { RemoteApi } from "./api/client";
import { ConnectivityMonitor } from "./connectivity";
import { createEventBus } from "./events";
import type { EventBus } from "./events";
import { CountCache } from "./cache/counts";
import { EntryRecordCache } from "./cache/records";
import { BackgroundDispatcher } from "./dispatch/dispatcher";
import { createInlineRunner, createPiscinaRunner } from "./dispatch/runner";
import type { JobRunner } from "./dispatch/runner";
import { SyncCoordinator } from "./coordinator/coordinator";
import type { SyncPrompt } from "./coordinator/types";
import { EntryStatusService } from "./service/entry-status";
import { createLogNotifier } from "./notifications";
import type { Notifier } from "./notifications";
import { createEnvSettings } from "./config";
import type { SettingsProvider } from "./config";
import { createLogger } from "./observability/logger";
import type { Logger } from "./observability/logger";

export interface SyncEngineOptions {
  settings?: SettingsProvider;
  /** Defaults to files under the configured data directory. */
  storage?: RecordStorage;
  logger?: Logger;
  notifier?: Notifier;
  prompt?: SyncPrompt;
  connectivity?: ConnectivityMonitor;
  runner?: JobRunner;
  /** Replaces the HTTP client, e.g. with an in-process fake. */
  api?: () => RemoteApi;
  now?: () => number;
}

export interface SyncEngine {
  settings: SettingsProvider;
  storage: RecordStorage;
  store: EntityStatusStore;
  entryQueue: EntryStatusQueue;
  feedQueue: CollectionQueue;
  categoryQueue: CollectionQueue;
  bus: EventBus;
  connectivity: ConnectivityMonitor;
  recordCache: EntryRecordCache;
  counts: CountCache;
  dispatcher: BackgroundDispatcher;
  coordinator: SyncCoordinator;
  service: EntryStatusService;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const createSyncEngine = (options: SyncEngineOptions = {}): SyncEngine => {
  const settings = options.settings ?? createEnvSettings();
  const initial = settings.getSettings();
  const logger = options.logger ?? createLogger({ level: initial.logLevel });
  const now = options.now ?? Date.now;

  const storage =
    options.storage ??
    createStorage({ type: "local", local: { basePath: join(initial.dataDir, "sync") } });

  const bus = createEventBus(logger);
  const recordCache = new EntryRecordCache();
  const store = new EntityStatusStore({ storage, logger, cache: recordCache, now });
  const entryQueue = createEntryStatusQueue({ storage, logger });
  const feedQueue = createCollectionQueue("feed", { storage, logger });
  const categoryQueue = createCollectionQueue("category", { storage, logger });

  const api =
    options.api ??
    (() => {
      const current = settings.getSettings();
      return createRemoteApi({
        serverAddress: current.serverAddress,
        apiToken: current.apiToken,
        timeoutMs: current.requestTimeoutMs,
      });
    });

  const connectivity = options.connectivity ?? new ConnectivityMonitor(true);
  const notifier = options.notifier ?? createLogNotifier(logger);
  const runner =
    options.runner ??
    createPiscinaRunner({
      threads: initial.workerThreads,
      logger,
      fallback: createInlineRunner(),
    });

  const counts = new CountCache({
    source: api,
    enabled: initial.cacheEnabled,
    ttlMs: initial.cacheTtlMs,
    now,
  });

  const dispatcher = new BackgroundDispatcher({
    store,
    queue: entryQueue,
    runner,
    bus,
    connectivity,
    settings,
    logger,
    now,
  });

  const coordinator = new SyncCoordinator({
    store,
    entryQueue,
    feedQueue,
    categoryQueue,
    api,
    bus,
    notifier,
    settings,
    connectivity,
    prompt: options.prompt,
    logger,
  });

  const service = new EntryStatusService({
    store,
    entryQueue,
    feedQueue,
    categoryQueue,
    api,
    dispatcher,
    bus,
    notifier,
    settings,
    connectivity,
    logger,
    now,
  });

  const detach: Array<() => void> = [];
  let started = false;

  return {
    settings,
    storage,
    store,
    entryQueue,
    feedQueue,
    categoryQueue,
    bus,
    connectivity,
    recordCache,
    counts,
    dispatcher,
    coordinator,
    service,

    async start() {
      if (started) return;
      started = true;

      const warmed = await recordCache.warm(store);
      detach.push(recordCache.attach(bus), counts.attach(bus), coordinator.attach(connectivity));
      dispatcher.start();
      logger.info({ msg: "Sync engine started", records: warmed });
    },

    async stop() {
      if (!started) return;
      started = false;

      for (const unsubscribe of detach.splice(0)) {
        unsubscribe();
      }
      dispatcher.stop();
      await runner.destroy();
      logger.info("Sync engine stopped");
    },
  };
};
