/**
 * Sync coordinator for the write queue.
 *
 * Folds queue events and connectivity changes into a single SyncState for
 * the status indicator, and decides when a queue pass should run.
 */

import { errorMessage } from "../lib/errors.ts";
import { type Logger, defaultLogger } from "../lib/logger.ts";
import type { QueuedWriteRecord, SyncState } from "../lib/types.ts";
import type { ConnectivityMonitor } from "./connectivity-monitor.ts";
import type { ProcessResult, QueueEvent, QueueService } from "./queue-service.ts";

export interface SyncCoordinatorOptions {
  queue: QueueService;
  connectivity: ConnectivityMonitor;
  /** Delay before a pass after an enqueue while online. */
  syncDelayMs?: number;
  /** How long `synced` is shown before falling back to `idle`. */
  syncedDisplayMs?: number;
  logger?: Logger;
}

export type SyncStateListener = (state: SyncState) => void;

function initialState(): SyncState {
  return {
    phase: "idle",
    pendingCount: 0,
    failedCount: 0,
    lastSyncedAt: null,
    lastError: null,
  };
}

export class SyncCoordinator {
  private queue: QueueService;
  private connectivity: ConnectivityMonitor;
  private syncDelayMs: number;
  private syncedDisplayMs: number;
  private logger: Logger;

  private state: SyncState = initialState();
  private listeners: Set<SyncStateListener> = new Set();
  private unsubscribeConnectivity: (() => void) | null = null;
  private unsubscribeQueue: (() => void) | null = null;
  private syncTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private syncedTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private initialized = false;

  constructor(options: SyncCoordinatorOptions) {
    this.queue = options.queue;
    this.connectivity = options.connectivity;
    this.syncDelayMs = options.syncDelayMs ?? 100;
    this.syncedDisplayMs = options.syncedDisplayMs ?? 3000;
    this.logger = (options.logger ?? defaultLogger).child({ component: "sync" });
  }

  /**
   * Derive the initial state from the loaded queue and start listening.
   * The queue must be initialized first.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    this.unsubscribeConnectivity = this.connectivity.subscribe((online) => {
      if (online && this.queue.getPendingCount() > 0) {
        this.scheduleSync();
      }
    });
    this.unsubscribeQueue = this.queue.subscribe((event) => this.handleQueueEvent(event));

    const pendingCount = this.queue.getPendingCount();
    const failedCount = this.queue.getFailedCount();

    if (failedCount > 0) {
      this.setState({
        phase: "error",
        pendingCount,
        failedCount,
        lastError: this.latestFailure(),
      });
    } else if (pendingCount > 0) {
      this.setState({ phase: "pending", pendingCount, failedCount });
    } else {
      this.setState({ pendingCount, failedCount });
    }

    this.initialized = true;

    if (this.connectivity.isOnline() && pendingCount > 0) {
      this.syncNow().catch((error: unknown) => {
        this.logger.error({ err: error }, "Startup sync failed");
      });
    }
  }

  private handleQueueEvent(event: QueueEvent): void {
    const counts = {
      pendingCount: this.queue.getPendingCount(),
      failedCount: this.queue.getFailedCount(),
    };

    switch (event.type) {
      case "record:enqueued": {
        const phase = this.state.phase === "syncing" ? "syncing" : "pending";
        this.clearSyncedTimer();
        this.setState({ ...counts, phase });
        if (this.connectivity.isOnline()) {
          this.scheduleSync();
        }
        return;
      }

      case "pass:started":
        this.clearSyncedTimer();
        this.setState({ ...counts, phase: "syncing", lastError: null });
        return;

      case "pass:completed":
        this.completePass(event.result, counts);
        return;

      case "record:removed":
        if (
          event.reason === "purged" &&
          this.state.phase === "error" &&
          counts.failedCount === 0
        ) {
          this.setState({
            ...counts,
            phase: counts.pendingCount > 0 ? "pending" : "idle",
            lastError: null,
          });
          return;
        }
        this.setState(counts);
        return;

      case "record:updated":
        this.setState(counts);
        return;
    }
  }

  private completePass(
    result: ProcessResult,
    counts: { pendingCount: number; failedCount: number },
  ): void {
    const waiting = counts.pendingCount - this.queue.getStalledRecords().length;
    if (waiting > 0) {
      // Interrupted, or waiting on backoff timers
      this.setState({ ...counts, phase: "pending" });
      return;
    }

    if (counts.failedCount > 0) {
      this.setState({ ...counts, phase: "error", lastError: this.latestFailure() });
      return;
    }

    this.setState({
      ...counts,
      phase: "synced",
      lastSyncedAt: new Date().toISOString(),
      lastError: null,
    });
    this.logger.debug({ processed: result.processed }, "Queue drained");
    this.scheduleIdle();
  }

  private latestFailure(): string | null {
    let latest: QueuedWriteRecord | null = null;
    for (const record of this.queue.getFailedRecords()) {
      if (!latest || (record.lastAttemptAt ?? "") >= (latest.lastAttemptAt ?? "")) {
        latest = record;
      }
    }
    return latest?.lastError ?? null;
  }

  /**
   * Schedule a queue pass with debouncing.
   */
  private scheduleSync(): void {
    if (this.syncTimeoutId) {
      clearTimeout(this.syncTimeoutId);
    }

    this.syncTimeoutId = setTimeout(() => {
      this.syncTimeoutId = null;
      this.syncNow().catch((error: unknown) => {
        this.logger.error({ err: error }, "Scheduled sync failed");
      });
    }, this.syncDelayMs);
  }

  private scheduleIdle(): void {
    this.clearSyncedTimer();

    this.syncedTimeoutId = setTimeout(() => {
      this.syncedTimeoutId = null;
      if (this.state.phase === "synced") {
        this.setState({ phase: "idle" });
      }
    }, this.syncedDisplayMs);
    this.syncedTimeoutId.unref();
  }

  private clearSyncedTimer(): void {
    if (this.syncedTimeoutId) {
      clearTimeout(this.syncedTimeoutId);
      this.syncedTimeoutId = null;
    }
  }

  /**
   * Run a queue pass now. Returns null while offline.
   */
  async syncNow(): Promise<ProcessResult | null> {
    if (!this.connectivity.isOnline()) {
      return null;
    }

    try {
      return await this.queue.processQueue();
    } catch (error) {
      const message = errorMessage(error, "Sync error");
      this.logger.error({ err: error }, "Queue pass failed");
      this.setState({ phase: "error", lastError: message });
      return null;
    }
  }

  /**
   * Reset failed records and run a pass.
   */
  async retryAll(): Promise<ProcessResult | null> {
    let result: ProcessResult | null;
    try {
      result = await this.queue.retryAll();
    } catch (error) {
      const message = errorMessage(error, "Retry failed");
      this.logger.error({ err: error }, "Retry failed");
      this.setState({ phase: "error", lastError: message });
      return null;
    }

    // Offline: nothing ran, the reset records wait for connectivity
    if (this.state.phase === "error" && this.queue.getFailedCount() === 0) {
      const pendingCount = this.queue.getPendingCount();
      this.setState({
        phase: pendingCount > 0 ? "pending" : "idle",
        pendingCount,
        failedCount: 0,
        lastError: null,
      });
    }

    return result;
  }

  /**
   * Leave the error phase without touching failed records.
   */
  dismissError(): void {
    if (this.state.phase !== "error") return;

    this.setState({
      phase: this.queue.getPendingCount() > 0 ? "pending" : "idle",
      lastError: null,
    });
  }

  /**
   * Remove every failed record. Returns the number removed.
   */
  async purgeFailed(): Promise<number> {
    const removed = await this.queue.purgeFailed();
    // Writes held back behind a purged record can go now
    if (removed > 0 && this.connectivity.isOnline() && this.queue.getPendingCount() > 0) {
      this.scheduleSync();
    }
    return removed;
  }

  getState(): SyncState {
    return { ...this.state };
  }

  /**
   * Pending and failed records, oldest first.
   */
  getRecords(): QueuedWriteRecord[] {
    return this.queue.getRecords();
  }

  /**
   * Subscribe to state changes.
   */
  subscribe(listener: SyncStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setState(patch: Partial<SyncState>): void {
    const next: SyncState = { ...this.state, ...patch };
    if (
      next.phase === this.state.phase &&
      next.pendingCount === this.state.pendingCount &&
      next.failedCount === this.state.failedCount &&
      next.lastSyncedAt === this.state.lastSyncedAt &&
      next.lastError === this.state.lastError
    ) {
      return;
    }

    if (next.phase !== this.state.phase) {
      this.logger.debug({ from: this.state.phase, to: next.phase }, "Sync phase changed");
    }
    this.state = next;

    for (const listener of this.listeners) {
      try {
        listener({ ...next });
      } catch (error) {
        this.logger.error({ err: error }, "Error in sync state listener");
      }
    }
  }

  /**
   * Cleanup resources. The queue and monitor are owned by the caller.
   */
  destroy(): void {
    if (this.syncTimeoutId) {
      clearTimeout(this.syncTimeoutId);
      this.syncTimeoutId = null;
    }
    this.clearSyncedTimer();

    this.unsubscribeConnectivity?.();
    this.unsubscribeConnectivity = null;
    this.unsubscribeQueue?.();
    this.unsubscribeQueue = null;

    this.listeners.clear();
    this.initialized = false;
  }
}
