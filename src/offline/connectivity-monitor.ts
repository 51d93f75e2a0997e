/**
 * Connectivity monitor for the write queue.
 *
 * The host platform reports raw connectivity events through `report()`.
 * Changes are only surfaced to subscribers once they have held for the
 * debounce window, so a flapping radio does not trigger a sync per event.
 */

import { type Logger, defaultLogger } from "../lib/logger.ts";

export type ConnectivityListener = (online: boolean) => void;

export interface ConnectivityMonitorOptions {
  initialOnline?: boolean;
  debounceMs?: number;
  /** Reachability check used by checkConnectivity(). */
  probe?: () => Promise<boolean>;
  /** Poll the probe at this interval after start(); 0 disables polling. */
  probeIntervalMs?: number;
  logger?: Logger;
}

export class ConnectivityMonitor {
  private online: boolean;
  private reported: boolean;
  private debounceMs: number;
  private probe: (() => Promise<boolean>) | null;
  private probeIntervalMs: number;
  private listeners: Set<ConnectivityListener> = new Set();
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private logger: Logger;

  constructor(options: ConnectivityMonitorOptions = {}) {
    this.online = options.initialOnline ?? false;
    this.reported = this.online;
    this.debounceMs = options.debounceMs ?? 500;
    this.probe = options.probe ?? null;
    this.probeIntervalMs = options.probeIntervalMs ?? 0;
    this.logger = (options.logger ?? defaultLogger).child({ component: "connectivity" });
  }

  /**
   * Report a raw connectivity event from the platform.
   */
  report(online: boolean, options: { immediate?: boolean } = {}): void {
    this.reported = online;

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }

    if (options.immediate || this.debounceMs <= 0) {
      this.settle();
      return;
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.settle();
    }, this.debounceMs);
  }

  private settle(): void {
    if (this.reported === this.online) {
      return;
    }

    this.online = this.reported;
    this.logger.info({ online: this.online }, "Connectivity changed");
    this.notifyListeners();
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.online);
      } catch (error) {
        this.logger.error({ err: error }, "Error in connectivity listener");
      }
    }
  }

  /**
   * Check if currently online (after debouncing).
   */
  isOnline(): boolean {
    return this.online;
  }

  /**
   * Subscribe to connectivity changes.
   */
  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Run the reachability probe and report its result.
   * Without a probe, returns the current state.
   */
  async checkConnectivity(options: { immediate?: boolean } = {}): Promise<boolean> {
    if (!this.probe) {
      return this.online;
    }

    let reachable: boolean;
    try {
      reachable = await this.probe();
    } catch (error) {
      this.logger.warn({ err: error }, "Connectivity probe failed, keeping current state");
      return this.online;
    }

    this.report(reachable, options);
    return reachable;
  }

  /**
   * Run an initial check and start polling when configured.
   */
  async start(): Promise<void> {
    await this.checkConnectivity({ immediate: true });

    if (this.probe && this.probeIntervalMs > 0 && !this.pollTimer) {
      this.pollTimer = setInterval(() => {
        this.checkConnectivity().catch((error: unknown) => {
          this.logger.error({ err: error }, "Connectivity poll failed");
        });
      }, this.probeIntervalMs);
      this.pollTimer.unref();
    }
  }

  /**
   * Wait for online state.
   */
  async waitForOnline(): Promise<void> {
    if (this.online) {
      return;
    }

    return new Promise((resolve) => {
      const unsubscribe = this.subscribe((online) => {
        if (online) {
          unsubscribe();
          resolve();
        }
      });
    });
  }

  /**
   * Stop timers and drop listeners.
   */
  destroy(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.listeners.clear();
  }
}
