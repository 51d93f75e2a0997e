/**
 * Queue of writes that could not reach the remote store.
 *
 * Every record is written through to the durable store before the caller is
 * acknowledged, then replayed by processQueue() with exponential backoff.
 */

import { randomUUID } from "node:crypto";
import { DurabilityError, errorMessage } from "../lib/errors.ts";
import { type Logger, defaultLogger } from "../lib/logger.ts";
import {
  type QueuedWriteRecord,
  type WriteRequest,
  writeRequestSchema,
} from "../lib/types.ts";
import { dispatchWrite } from "../remote/dispatch.ts";
import type { RemoteRepositories } from "../remote/types.ts";
import type { PersistentQueueStore } from "../storage/queue-store.ts";

export const MAX_ATTEMPTS = 5;

const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
const DEFAULT_RETRY_MAX_DELAY_MS = 60_000;

export interface QueueServiceOptions {
  store: PersistentQueueStore;
  repositories: RemoteRepositories;
  /** Checked before every record; a pass stops when it turns false. */
  isOnline?: () => boolean;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** Fail permanent (validation) errors on the first attempt. */
  failFastOnPermanentErrors?: boolean;
  logger?: Logger;
}

export interface ProcessResult {
  processed: number;
  retrying: number;
  failed: number;
  interrupted: boolean;
}

export type QueueEvent =
  | { type: "record:enqueued"; records: QueuedWriteRecord[]; batchId: string | null }
  | { type: "record:updated"; record: QueuedWriteRecord }
  | { type: "record:removed"; recordId: string; reason: "synced" | "purged" }
  | { type: "pass:started"; due: number }
  | { type: "pass:completed"; result: ProcessResult };

export type QueueEventListener = (event: QueueEvent) => void;

function entityKey(collection: string, entityId: string): string {
  return `${collection}/${entityId}`;
}

function emptyResult(): ProcessResult {
  return { processed: 0, retrying: 0, failed: 0, interrupted: false };
}

export class QueueService {
  private store: PersistentQueueStore;
  private repositories: RemoteRepositories;
  private isOnline: () => boolean;
  private retryBaseDelayMs: number;
  private retryMaxDelayMs: number;
  private failFast: boolean;
  private logger: Logger;

  private records: Map<string, QueuedWriteRecord> = new Map();
  private retryTimers: Map<string, ReturnType<typeof setTimeout>> = new Map();
  private listeners: Set<QueueEventListener> = new Set();
  private activeRun: Promise<ProcessResult> | null = null;
  private rerunRequested = false;
  private initialized = false;
  private destroyed = false;

  constructor(options: QueueServiceOptions) {
    this.store = options.store;
    this.repositories = options.repositories;
    this.isOnline = options.isOnline ?? (() => true);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS;
    this.failFast = options.failFastOnPermanentErrors ?? false;
    this.logger = (options.logger ?? defaultLogger).child({ component: "queue" });
  }

  /**
   * Load the durable store into the working set.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const stored = await this.store.getAll();

    for (const record of stored) {
      if (record.status === "syncing") {
        // Killed mid-attempt: the write may or may not have landed, send it again
        const reset: QueuedWriteRecord = { ...record, status: "pending" };
        await this.persist(reset);
        this.records.set(reset.id, reset);
        continue;
      }

      this.records.set(record.id, record);
    }

    this.armRetryTimers(Date.now());
    this.initialized = true;
    this.logger.info(
      { pending: this.getPendingCount(), failed: this.getFailedCount() },
      "Queue loaded",
    );
  }

  /**
   * Queue a single write. Resolves with the record ID once it is durable.
   */
  async enqueueSingle(request: WriteRequest): Promise<string> {
    const record = this.buildRecord(request, null);

    await this.persistAll([record]);
    this.records.set(record.id, record);

    this.logger.info(
      {
        recordId: record.id,
        operation: record.operationType,
        collection: record.targetCollection,
        entityId: record.entityId,
      },
      "Queued write",
    );
    this.emit({ type: "record:enqueued", records: [record], batchId: null });

    return record.id;
  }

  /**
   * Queue several related writes under one batch ID. All records become
   * durable in one transaction; each is retried on its own.
   */
  async enqueueBatch(requests: WriteRequest[]): Promise<string> {
    if (requests.length === 0) {
      throw new Error("Cannot enqueue an empty batch");
    }

    const batchId = randomUUID();
    const records = requests.map((request) => this.buildRecord(request, batchId));

    await this.persistAll(records);
    for (const record of records) {
      this.records.set(record.id, record);
    }

    this.logger.info({ batchId, size: records.length }, "Queued batch");
    this.emit({ type: "record:enqueued", records, batchId });

    return batchId;
  }

  private buildRecord(request: WriteRequest, batchId: string | null): QueuedWriteRecord {
    const parsed = writeRequestSchema.parse(request);
    return {
      id: randomUUID(),
      batchId,
      operationType: parsed.operationType,
      targetCollection: parsed.targetCollection,
      entityId: parsed.entityId,
      payload: parsed.payload,
      enqueuedAt: new Date().toISOString(),
      attemptCount: 0,
      lastError: null,
      lastErrorKind: null,
      lastAttemptAt: null,
      nextAttemptAt: null,
      status: "pending",
    };
  }

  /**
   * Replay due records against the remote store.
   *
   * Single flight: a call made while a pass is running asks for one more
   * pass once the current one finishes and shares its promise.
   */
  processQueue(): Promise<ProcessResult> {
    if (this.activeRun) {
      this.rerunRequested = true;
      return this.activeRun;
    }

    this.activeRun = this.drain().finally(() => {
      this.activeRun = null;
    });
    return this.activeRun;
  }

  private async drain(): Promise<ProcessResult> {
    const total = emptyResult();

    do {
      this.rerunRequested = false;
      const pass = await this.runPass();

      total.processed += pass.processed;
      total.retrying += pass.retrying;
      total.failed += pass.failed;
      total.interrupted = pass.interrupted;

      if (pass.interrupted) break;
    } while (this.rerunRequested && !this.destroyed);

    return total;
  }

  private async runPass(): Promise<ProcessResult> {
    const result = emptyResult();

    if (this.destroyed || !this.isOnline()) {
      return result;
    }

    const now = Date.now();
    this.armRetryTimers(now);

    const due = this.getDueRecords(now);
    if (due.length === 0) {
      return result;
    }

    this.logger.debug({ due: due.length }, "Processing queue");
    this.emit({ type: "pass:started", due: due.length });

    for (const { id } of due) {
      if (this.destroyed) break;

      if (!this.isOnline()) {
        result.interrupted = true;
        this.logger.info("Connectivity lost, stopping queue pass");
        break;
      }

      // Purged or reset while earlier records were in flight
      const record = this.records.get(id);
      if (!record || record.status !== "pending") continue;

      await this.attempt(record, result);
    }

    this.logger.info(
      {
        processed: result.processed,
        retrying: result.retrying,
        failed: result.failed,
        interrupted: result.interrupted,
      },
      "Queue pass complete",
    );
    this.emit({ type: "pass:completed", result });

    return result;
  }

  private async attempt(record: QueuedWriteRecord, result: ProcessResult): Promise<void> {
    this.clearRetry(record.id);

    const syncing: QueuedWriteRecord = {
      ...record,
      status: "syncing",
      lastAttemptAt: new Date().toISOString(),
    };
    await this.save(syncing);

    try {
      await this.settle(syncing, result);
    } catch (error) {
      // The store still says syncing; initialize() resets that on restart
      this.records.set(record.id, record);
      this.emit({ type: "record:updated", record });
      throw error;
    }
  }

  private async settle(syncing: QueuedWriteRecord, result: ProcessResult): Promise<void> {
    const outcome = await dispatchWrite(this.repositories, syncing);

    if (outcome.ok) {
      await this.drop(syncing.id, "synced");
      result.processed++;
      if (this.hasPendingFor(syncing.targetCollection, syncing.entityId)) {
        // A later write to the same entity was held back behind this one
        this.rerunRequested = true;
      }
      return;
    }

    const attemptCount = syncing.attemptCount + 1;
    const exhausted =
      attemptCount >= MAX_ATTEMPTS || (this.failFast && outcome.kind === "permanent");

    if (exhausted) {
      await this.save({
        ...syncing,
        attemptCount,
        lastError: outcome.error,
        lastErrorKind: outcome.kind,
        nextAttemptAt: null,
        status: "failed",
      });
      result.failed++;
      this.logger.warn(
        { recordId: syncing.id, attempts: attemptCount, error: outcome.error },
        "Giving up on queued write",
      );
      return;
    }

    const delay = this.calculateBackoff(attemptCount);
    await this.save({
      ...syncing,
      attemptCount,
      lastError: outcome.error,
      lastErrorKind: outcome.kind,
      nextAttemptAt: new Date(Date.now() + delay).toISOString(),
      status: "pending",
    });
    this.scheduleRetry(syncing.id, delay);
    result.retrying++;
    this.logger.info(
      { recordId: syncing.id, attempt: attemptCount, retryInMs: delay, error: outcome.error },
      "Queued write failed, retry scheduled",
    );
  }

  /**
   * Backoff before the next attempt: 2^attemptCount units, capped.
   */
  calculateBackoff(attemptCount: number): number {
    return Math.min(this.retryBaseDelayMs * 2 ** attemptCount, this.retryMaxDelayMs);
  }

  private scheduleRetry(recordId: string, delayMs: number): void {
    this.clearRetry(recordId);

    const timer = setTimeout(() => {
      this.retryTimers.delete(recordId);
      this.processQueue().catch((error: unknown) => {
        this.logger.error({ err: error }, "Scheduled queue pass failed");
      });
    }, delayMs);
    timer.unref();

    this.retryTimers.set(recordId, timer);
  }

  /**
   * Make sure every pending record that is not yet due has a timer.
   */
  private armRetryTimers(now: number): void {
    for (const record of this.records.values()) {
      if (
        record.status !== "pending" ||
        !record.nextAttemptAt ||
        this.retryTimers.has(record.id)
      ) {
        continue;
      }
      const delay = Date.parse(record.nextAttemptAt) - now;
      if (delay > 0) {
        this.scheduleRetry(record.id, delay);
      }
    }
  }

  private clearRetry(recordId: string): void {
    const timer = this.retryTimers.get(recordId);
    if (timer) {
      clearTimeout(timer);
      this.retryTimers.delete(recordId);
    }
  }

  /**
   * Reset failed records to pending and process the queue.
   */
  async retryAll(): Promise<ProcessResult> {
    const failed = this.getFailedRecords();

    for (const record of failed) {
      await this.save({
        ...record,
        status: "pending",
        attemptCount: 0,
        lastError: null,
        lastErrorKind: null,
        nextAttemptAt: null,
      });
    }

    this.logger.info({ count: failed.length }, "Reset failed writes to pending");
    return this.processQueue();
  }

  /**
   * Remove every failed record. Returns the number removed.
   */
  async purgeFailed(): Promise<number> {
    const failed = this.getFailedRecords();

    for (const record of failed) {
      await this.drop(record.id, "purged");
    }

    this.logger.info({ count: failed.length }, "Purged failed writes");
    return failed.length;
  }

  private async save(record: QueuedWriteRecord): Promise<void> {
    await this.persist(record);
    this.records.set(record.id, record);
    this.emit({ type: "record:updated", record });
  }

  private async drop(recordId: string, reason: "synced" | "purged"): Promise<void> {
    try {
      await this.store.remove(recordId);
    } catch (error) {
      throw new DurabilityError(
        `Failed to remove queued write ${recordId}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    this.clearRetry(recordId);
    this.records.delete(recordId);
    this.emit({ type: "record:removed", recordId, reason });
  }

  private async persist(record: QueuedWriteRecord): Promise<void> {
    try {
      await this.store.put(record);
    } catch (error) {
      throw new DurabilityError(
        `Failed to persist queued write ${record.id}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async persistAll(records: QueuedWriteRecord[]): Promise<void> {
    try {
      await this.store.putAll(records);
    } catch (error) {
      throw new DurabilityError(
        `Failed to persist ${records.length} queued write(s): ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Pending records whose time has come, in enqueue order. A record waits
   * while an earlier record for the same entity is still queued.
   */
  private getDueRecords(now: number): QueuedWriteRecord[] {
    const seen = new Set<string>();
    const due: QueuedWriteRecord[] = [];

    for (const record of this.records.values()) {
      const key = entityKey(record.targetCollection, record.entityId);
      const blocked = seen.has(key);
      seen.add(key);

      if (
        !blocked &&
        record.status === "pending" &&
        (!record.nextAttemptAt || Date.parse(record.nextAttemptAt) <= now)
      ) {
        due.push(record);
      }
    }
    return due;
  }

  /**
   * Whether any write to this entity is still queued, in any status.
   */
  hasPendingFor(collection: string, entityId: string): boolean {
    for (const record of this.records.values()) {
      if (record.targetCollection === collection && record.entityId === entityId) {
        return true;
      }
    }
    return false;
  }

  /**
   * Pending records held back by a failed record for the same entity. They
   * move again once that record is retried or purged.
   */
  getStalledRecords(): QueuedWriteRecord[] {
    const failed = new Set(
      this.getFailedRecords().map((record) =>
        entityKey(record.targetCollection, record.entityId),
      ),
    );
    return this.getPendingRecords().filter((record) =>
      failed.has(entityKey(record.targetCollection, record.entityId)),
    );
  }

  /**
   * All records, in enqueue order.
   */
  getRecords(): QueuedWriteRecord[] {
    return [...this.records.values()];
  }

  /**
   * Records waiting for (or in the middle of) an attempt.
   */
  getPendingRecords(): QueuedWriteRecord[] {
    return this.getRecords().filter((record) => record.status !== "failed");
  }

  getFailedRecords(): QueuedWriteRecord[] {
    return this.getRecords().filter((record) => record.status === "failed");
  }

  getPendingCount(): number {
    return this.getPendingRecords().length;
  }

  getFailedCount(): number {
    return this.getFailedRecords().length;
  }

  isProcessing(): boolean {
    return this.activeRun !== null;
  }

  /**
   * Subscribe to queue events.
   */
  subscribe(listener: QueueEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: QueueEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, "Error in queue listener");
      }
    }
  }

  /**
   * Cancel scheduled retries and drop listeners. The store stays open.
   */
  destroy(): void {
    this.destroyed = true;
    for (const timer of this.retryTimers.values()) {
      clearTimeout(timer);
    }
    this.retryTimers.clear();
    this.listeners.clear();
  }
}
