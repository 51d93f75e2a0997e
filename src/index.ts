export { type Config, loadConfig } from "./config.ts";
export {
  type SyncEngine,
  type SyncEngineOptions,
  createHttpRepositories,
  createSyncEngine,
} from "./engine.ts";
export {
  DurabilityError,
  PermanentValidationError,
  TransientNetworkError,
  UnknownEntityError,
  WriteRolledBackError,
} from "./lib/errors.ts";
export { type Logger, createLogger } from "./lib/logger.ts";
export * from "./lib/types.ts";
export * from "./offline/index.ts";
export { dispatchWrite } from "./remote/dispatch.ts";
export {
  HttpRemoteRepository,
  type HttpRemoteRepositoryOptions,
  createReachabilityProbe,
} from "./remote/http-repository.ts";
export type { RemoteRepositories, RemoteRepository, RemoteResult } from "./remote/types.ts";
export {
  type PersistentQueueStore,
  QUEUE_CONTAINER,
  QUEUE_DB_FILE,
  SqliteQueueStore,
} from "./storage/queue-store.ts";
