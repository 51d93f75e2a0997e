/**
 * Offline-first write path.
 */

export {
  ConnectivityMonitor,
  type ConnectivityListener,
  type ConnectivityMonitorOptions,
} from "./connectivity-monitor.ts";

export {
  LocalStore,
  DEFAULT_COLLECTIONS,
  expenseCollection,
  recurringExpenseCollection,
  type CollectionDefinition,
  type LocalChange,
  type LocalStoreListener,
  type UndoEntry,
} from "./local-store.ts";

export {
  QueueService,
  MAX_ATTEMPTS,
  type ProcessResult,
  type QueueEvent,
  type QueueEventListener,
  type QueueServiceOptions,
} from "./queue-service.ts";

export {
  SyncCoordinator,
  type SyncCoordinatorOptions,
  type SyncStateListener,
} from "./sync-coordinator.ts";

export {
  WriteRouter,
  type BatchWriteResult,
  type WriteResult,
  type WriteRouterOptions,
} from "./write-router.ts";
