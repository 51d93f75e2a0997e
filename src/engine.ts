/**
 * Composition root: builds the queue once and hands it to every consumer.
 */

import type { Config } from "./config.ts";
import { type Logger, createLogger } from "./lib/logger.ts";
import { ConnectivityMonitor } from "./offline/connectivity-monitor.ts";
import {
  type CollectionDefinition,
  DEFAULT_COLLECTIONS,
  LocalStore,
} from "./offline/local-store.ts";
import { QueueService } from "./offline/queue-service.ts";
import { SyncCoordinator } from "./offline/sync-coordinator.ts";
import { WriteRouter } from "./offline/write-router.ts";
import { HttpRemoteRepository, createReachabilityProbe } from "./remote/http-repository.ts";
import type { RemoteRepositories, RemoteRepository } from "./remote/types.ts";
import { type PersistentQueueStore, SqliteQueueStore } from "./storage/queue-store.ts";

export interface SyncEngineOptions {
  config: Config;
  /** Defaults to one HTTP repository per collection when REMOTE_URL is set. */
  repositories?: RemoteRepositories;
  /** Defaults to the SQLite store in config.dataDir. */
  store?: PersistentQueueStore;
  fetch?: typeof fetch;
  /** User access token for the remote store; falls back to the API key. */
  getToken?: () => string | null;
  logger?: Logger;
  collections?: readonly CollectionDefinition[];
}

export interface SyncEngine {
  config: Config;
  store: PersistentQueueStore;
  connectivity: ConnectivityMonitor;
  queue: QueueService;
  coordinator: SyncCoordinator;
  localStore: LocalStore;
  router: WriteRouter;
  /** Load the queue, check connectivity and start syncing. */
  start(): Promise<void>;
  /** Stop timers and close the store. */
  destroy(): void;
}

export function createHttpRepositories(
  config: Config,
  collections: readonly CollectionDefinition[],
  options: { fetch?: typeof fetch; getToken?: () => string | null } = {},
): RemoteRepositories {
  const repositories = new Map<string, RemoteRepository>();
  const baseUrl = config.remote.url;
  if (!baseUrl) {
    return repositories;
  }

  for (const { name } of collections) {
    repositories.set(
      name,
      new HttpRemoteRepository({
        baseUrl,
        collection: name,
        apiKey: config.remote.apiKey,
        getToken: options.getToken,
        fetch: options.fetch,
      }),
    );
  }
  return repositories;
}

export function createSyncEngine(options: SyncEngineOptions): SyncEngine {
  const { config } = options;
  const logger = options.logger ?? createLogger(config.logLevel);
  const collections = options.collections ?? DEFAULT_COLLECTIONS;

  const store = options.store ?? new SqliteQueueStore(config.dataDir, { logger });
  const repositories =
    options.repositories ??
    createHttpRepositories(config, collections, {
      fetch: options.fetch,
      getToken: options.getToken,
    });

  if (repositories.size === 0) {
    logger.warn("No remote repositories configured, writes will stay queued");
  }

  const connectivity = new ConnectivityMonitor({
    debounceMs: config.connectivity.debounceMs,
    probe: config.remote.url
      ? createReachabilityProbe(config.remote.url, { fetch: options.fetch })
      : undefined,
    probeIntervalMs: config.connectivity.probeIntervalMs,
    logger,
  });
  const isOnline = () => connectivity.isOnline();

  const queue = new QueueService({
    store,
    repositories,
    isOnline,
    retryBaseDelayMs: config.retry.baseDelayMs,
    retryMaxDelayMs: config.retry.maxDelayMs,
    failFastOnPermanentErrors: config.retry.failFastOnPermanentErrors,
    logger,
  });

  const coordinator = new SyncCoordinator({
    queue,
    connectivity,
    syncDelayMs: config.sync.delayMs,
    syncedDisplayMs: config.sync.syncedDisplayMs,
    logger,
  });

  const localStore = new LocalStore(collections, { logger });

  const router = new WriteRouter({
    localStore,
    queue,
    repositories,
    isOnline,
    failFastOnPermanentErrors: config.retry.failFastOnPermanentErrors,
    logger,
  });

  return {
    config,
    store,
    connectivity,
    queue,
    coordinator,
    localStore,
    router,

    async start() {
      await queue.initialize();
      await connectivity.start();
      await coordinator.initialize();
    },

    destroy() {
      coordinator.destroy();
      queue.destroy();
      connectivity.destroy();
      store.close();
    },
  };
}
