/**
 * Tests for SyncCoordinator.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { SyncPhase, SyncState } from "../src/lib/types.ts";
import { ConnectivityMonitor } from "../src/offline/connectivity-monitor.ts";
import { QueueService } from "../src/offline/queue-service.ts";
import { SyncCoordinator } from "../src/offline/sync-coordinator.ts";
import { SqliteQueueStore } from "../src/storage/queue-store.ts";
import {
  FakeRemoteRepository,
  MemoryQueueStore,
  createTempDir,
  createWriteRequest,
  removeTempDir,
  repositoriesFor,
  testLogger,
} from "./helpers/test-utils.ts";

interface Harness {
  store: MemoryQueueStore;
  remote: FakeRemoteRepository;
  connectivity: ConnectivityMonitor;
  queue: QueueService;
  coordinator: SyncCoordinator;
  phases: SyncPhase[];
}

function createHarness(
  options: {
    online?: boolean;
    failFast?: boolean;
    syncedDisplayMs?: number;
    debounceMs?: number;
  } = {},
): Harness {
  const store = new MemoryQueueStore();
  const remote = new FakeRemoteRepository();
  const connectivity = new ConnectivityMonitor({
    initialOnline: options.online ?? false,
    debounceMs: options.debounceMs ?? 0,
    logger: testLogger,
  });
  const queue = new QueueService({
    store,
    repositories: repositoriesFor(remote),
    isOnline: () => connectivity.isOnline(),
    retryBaseDelayMs: 5,
    retryMaxDelayMs: 20,
    failFastOnPermanentErrors: options.failFast ?? false,
    logger: testLogger,
  });
  const coordinator = new SyncCoordinator({
    queue,
    connectivity,
    syncDelayMs: 0,
    syncedDisplayMs: options.syncedDisplayMs ?? 1000,
    logger: testLogger,
  });

  const phases: SyncPhase[] = [];
  coordinator.subscribe((state) => {
    if (phases[phases.length - 1] !== state.phase) {
      phases.push(state.phase);
    }
  });

  return { store, remote, connectivity, queue, coordinator, phases };
}

describe("SyncCoordinator", () => {
  let harness: Harness;

  async function start(h: Harness): Promise<Harness> {
    await h.queue.initialize();
    await h.coordinator.initialize();
    return h;
  }

  afterEach(() => {
    harness.coordinator.destroy();
    harness.queue.destroy();
    harness.connectivity.destroy();
  });

  describe("initialize()", () => {
    test("starts idle with an empty queue", async () => {
      harness = await start(createHarness());

      expect(harness.coordinator.getState()).toEqual({
        phase: "idle",
        pendingCount: 0,
        failedCount: 0,
        lastSyncedAt: null,
        lastError: null,
      });
    });

    test("is idempotent", async () => {
      harness = await start(createHarness());
      await harness.coordinator.initialize();

      await harness.queue.enqueueSingle(createWriteRequest());

      expect(harness.phases).toEqual(["pending"]);
    });

    test("starts in error when the queue holds failed records", async () => {
      harness = createHarness();
      await harness.store.put({
        id: "rec-1",
        batchId: null,
        ...createWriteRequest(),
        enqueuedAt: "2026-03-14T10:00:00.000Z",
        attemptCount: 5,
        lastError: "amount must be positive",
        lastErrorKind: "permanent",
        lastAttemptAt: "2026-03-14T10:05:00.000Z",
        nextAttemptAt: null,
        status: "failed",
      });
      await start(harness);

      const state = harness.coordinator.getState();
      expect(state.phase).toBe("error");
      expect(state.failedCount).toBe(1);
      expect(state.lastError).toBe("amount must be positive");
    });
  });

  test("offline writes drain when connectivity returns", async () => {
    harness = await start(createHarness());
    await harness.queue.enqueueSingle(createWriteRequest({ entityId: "a" }));
    await harness.queue.enqueueSingle(createWriteRequest({ entityId: "b" }));
    await harness.queue.enqueueSingle(createWriteRequest({ entityId: "c" }));

    expect(harness.coordinator.getState().phase).toBe("pending");
    expect(harness.coordinator.getState().pendingCount).toBe(3);

    harness.connectivity.report(true);

    await vi.waitFor(() => {
      expect(harness.coordinator.getState().phase).toBe("synced");
    });
    expect(harness.phases).toEqual(["pending", "syncing", "synced"]);
    expect(harness.coordinator.getState().pendingCount).toBe(0);
    expect(harness.coordinator.getState().lastSyncedAt).not.toBeNull();
    expect(await harness.store.getAll()).toHaveLength(0);
  });

  test("a write the remote always rejects ends in error after five attempts", async () => {
    harness = await start(createHarness());
    harness.remote.always({ ok: false, kind: "permanent", error: "amount must be positive" });
    await harness.queue.enqueueSingle(createWriteRequest());

    harness.connectivity.report(true);

    await vi.waitFor(() => {
      expect(harness.coordinator.getState().phase).toBe("error");
    });

    const state = harness.coordinator.getState();
    expect(state.failedCount).toBe(1);
    expect(state.pendingCount).toBe(0);
    expect(state.lastError).toBe("amount must be positive");

    const [record] = await harness.store.getAll();
    expect(record.status).toBe("failed");
    expect(record.attemptCount).toBe(5);
  });

  test("a failed write holding back a later one still surfaces as error", async () => {
    harness = await start(createHarness({ failFast: true }));
    harness.remote.always({ ok: false, kind: "permanent", error: "invalid category" });
    await harness.queue.enqueueSingle(createWriteRequest());
    await harness.queue.enqueueSingle(createWriteRequest({ operationType: "update" }));

    harness.connectivity.report(true);

    await vi.waitFor(() => {
      expect(harness.coordinator.getState().phase).toBe("error");
    });
    const state = harness.coordinator.getState();
    expect(state.pendingCount).toBe(1);
    expect(state.failedCount).toBe(1);
    expect(state.lastError).toBe("invalid category");
    expect(harness.remote.calls).toHaveLength(1);
  });

  test("records reloaded at startup sync automatically when online", async () => {
    const dataDir = createTempDir();
    try {
      const firstStore = new SqliteQueueStore(dataDir, { logger: testLogger });
      const firstQueue = new QueueService({
        store: firstStore,
        repositories: new Map(),
        isOnline: () => false,
        logger: testLogger,
      });
      await firstQueue.initialize();
      await firstQueue.enqueueSingle(createWriteRequest({ entityId: "a" }));
      await firstQueue.enqueueSingle(createWriteRequest({ entityId: "b" }));
      firstQueue.destroy();
      firstStore.close();

      const store = new SqliteQueueStore(dataDir, { logger: testLogger });
      harness = createHarness({ online: true });
      const queue = new QueueService({
        store,
        repositories: repositoriesFor(harness.remote),
        isOnline: () => harness.connectivity.isOnline(),
        logger: testLogger,
      });
      const coordinator = new SyncCoordinator({
        queue,
        connectivity: harness.connectivity,
        logger: testLogger,
      });

      try {
        await queue.initialize();
        await coordinator.initialize();

        await vi.waitFor(() => {
          expect(coordinator.getState().pendingCount).toBe(0);
        });
        expect(harness.remote.calls.map((call) => call.id)).toEqual(["a", "b"]);
        expect(await store.getAll()).toHaveLength(0);
      } finally {
        coordinator.destroy();
        queue.destroy();
        store.close();
      }
    } finally {
      removeTempDir(dataDir);
    }
  });

  test("an enqueue while online schedules a pass", async () => {
    harness = await start(createHarness({ online: true }));

    await harness.queue.enqueueSingle(createWriteRequest());

    await vi.waitFor(() => {
      expect(harness.coordinator.getState().phase).toBe("synced");
    });
    expect(harness.remote.calls).toHaveLength(1);
  });

  test("synced falls back to idle", async () => {
    harness = await start(createHarness({ online: true, syncedDisplayMs: 20 }));

    await harness.queue.enqueueSingle(createWriteRequest());

    await vi.waitFor(() => {
      expect(harness.phases).toEqual(["pending", "syncing", "synced", "idle"]);
    });
  });

  test("flapping connectivity starts a single pass", async () => {
    harness = await start(createHarness({ debounceMs: 20 }));
    await harness.queue.enqueueSingle(createWriteRequest());

    harness.connectivity.report(true);
    harness.connectivity.report(false);
    harness.connectivity.report(true);

    await vi.waitFor(() => {
      expect(harness.coordinator.getState().phase).toBe("synced");
    });
    expect(harness.phases.filter((phase) => phase === "syncing")).toHaveLength(1);
    expect(harness.remote.maxInFlight).toBe(1);
  });

  test("goes back to pending when connectivity drops mid-pass", async () => {
    harness = await start(createHarness());
    harness.remote.onCall = () => {
      harness.connectivity.report(false);
    };
    await harness.queue.enqueueSingle(createWriteRequest({ entityId: "a" }));
    await harness.queue.enqueueSingle(createWriteRequest({ entityId: "b" }));

    harness.connectivity.report(true);

    await vi.waitFor(() => {
      expect(harness.remote.calls).toHaveLength(1);
      expect(harness.coordinator.getState().phase).toBe("pending");
    });
    expect(harness.coordinator.getState().pendingCount).toBe(1);
  });

  describe("syncNow()", () => {
    test("returns null while offline", async () => {
      harness = await start(createHarness());
      await harness.queue.enqueueSingle(createWriteRequest());

      expect(await harness.coordinator.syncNow()).toBeNull();
      expect(harness.remote.calls).toHaveLength(0);
    });

    test("leaves the state unchanged on an empty queue", async () => {
      harness = await start(createHarness({ online: true }));
      const before: SyncState = harness.coordinator.getState();
      const listener = vi.fn();
      harness.coordinator.subscribe(listener);

      const result = await harness.coordinator.syncNow();

      expect(result).toEqual({ processed: 0, retrying: 0, failed: 0, interrupted: false });
      expect(listener).not.toHaveBeenCalled();
      expect(harness.coordinator.getState()).toEqual(before);
    });

    test("turns a store failure into the error phase", async () => {
      harness = await start(createHarness());
      const recordId = await harness.queue.enqueueSingle(createWriteRequest());
      harness.store.failWrites = true;
      harness.connectivity.report(true);

      await vi.waitFor(() => {
        expect(harness.coordinator.getState().phase).toBe("error");
      });

      const state = harness.coordinator.getState();
      expect(state.phase).toBe("error");
      expect(state.lastError).toBe(`Failed to persist queued write ${recordId}: disk full`);
    });
  });

  describe("error handling actions", () => {
    beforeEach(async () => {
      harness = await start(createHarness({ failFast: true }));
      harness.remote.always({ ok: false, kind: "permanent", error: "invalid category" });
      await harness.queue.enqueueSingle(createWriteRequest());
      harness.connectivity.report(true);
      await vi.waitFor(() => {
        expect(harness.coordinator.getState().phase).toBe("error");
      });
    });

    test("dismissError() leaves error without touching failed records", () => {
      harness.coordinator.dismissError();

      const state = harness.coordinator.getState();
      expect(state.phase).toBe("idle");
      expect(state.lastError).toBeNull();
      expect(state.failedCount).toBe(1);
      expect(harness.coordinator.getRecords()).toHaveLength(1);
    });

    test("retryAll() while offline moves to pending", async () => {
      harness.connectivity.report(false);

      const result = await harness.coordinator.retryAll();

      expect(result).toEqual({ processed: 0, retrying: 0, failed: 0, interrupted: false });
      const state = harness.coordinator.getState();
      expect(state.phase).toBe("pending");
      expect(state.pendingCount).toBe(1);
      expect(state.failedCount).toBe(0);
      expect(state.lastError).toBeNull();
    });

    test("retryAll() syncs records the remote now accepts", async () => {
      harness.remote.always({ ok: true });

      await harness.coordinator.retryAll();

      expect(harness.coordinator.getState().phase).toBe("synced");
      expect(await harness.store.getAll()).toHaveLength(0);
    });

    test("purgeFailed() lets a write held back by the failed one go", async () => {
      await harness.queue.enqueueSingle(createWriteRequest({ operationType: "update" }));
      expect(harness.queue.getStalledRecords()).toHaveLength(1);

      harness.remote.always({ ok: true });
      await harness.coordinator.purgeFailed();

      await vi.waitFor(() => {
        expect(harness.coordinator.getState().phase).toBe("synced");
      });
      expect(harness.remote.calls.map((call) => call.method)).toEqual(["create", "update"]);
      expect(await harness.store.getAll()).toHaveLength(0);
    });

    test("purgeFailed() clears the error", async () => {
      const removed = await harness.coordinator.purgeFailed();

      expect(removed).toBe(1);
      const state = harness.coordinator.getState();
      expect(state.phase).toBe("idle");
      expect(state.failedCount).toBe(0);
      expect(state.lastError).toBeNull();
    });
  });
});
