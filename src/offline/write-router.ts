/**
 * Single entry point for user writes.
 *
 * A write is applied to the local view first, then sent to the remote store
 * when online. Anything the remote store did not confirm goes to the queue.
 * If it can be neither confirmed nor queued, the local change is undone.
 */

import type { z } from "zod";
import {
  PermanentValidationError,
  UnknownEntityError,
  WriteRolledBackError,
  errorMessage,
} from "../lib/errors.ts";
import { type Logger, defaultLogger } from "../lib/logger.ts";
import {
  type Entity,
  type WriteIntent,
  type WriteRequest,
  entitySchema,
} from "../lib/types.ts";
import { dispatchWrite } from "../remote/dispatch.ts";
import type { RemoteRepositories } from "../remote/types.ts";
import type { CollectionDefinition, LocalChange, LocalStore, UndoEntry } from "./local-store.ts";
import type { QueueService } from "./queue-service.ts";

export interface WriteRouterOptions {
  localStore: LocalStore;
  queue: QueueService;
  repositories: RemoteRepositories;
  isOnline: () => boolean;
  /** Treat a permanent remote rejection as final instead of queueing. */
  failFastOnPermanentErrors?: boolean;
  logger?: Logger;
}

export type WriteResult = { status: "synced" } | { status: "queued"; recordId: string };

export interface BatchWriteResult {
  synced: number;
  queued: number;
  /** Batch ID of the queued part, null when everything was confirmed. */
  batchId: string | null;
}

interface PreparedWrite {
  change: LocalChange;
  request: WriteRequest;
}

interface AppliedWrite extends PreparedWrite {
  undo: UndoEntry;
}

export class WriteRouter {
  private localStore: LocalStore;
  private queue: QueueService;
  private repositories: RemoteRepositories;
  private isOnline: () => boolean;
  private failFast: boolean;
  private logger: Logger;

  constructor(options: WriteRouterOptions) {
    this.localStore = options.localStore;
    this.queue = options.queue;
    this.repositories = options.repositories;
    this.isOnline = options.isOnline;
    this.failFast = options.failFastOnPermanentErrors ?? false;
    this.logger = (options.logger ?? defaultLogger).child({ component: "writes" });
  }

  create(collection: string, entity: Entity): Promise<WriteResult> {
    return this.write({ operation: "create", collection, entity });
  }

  update(collection: string, entity: Entity): Promise<WriteResult> {
    return this.write({ operation: "update", collection, entity });
  }

  delete(collection: string, id: string): Promise<WriteResult> {
    return this.write({ operation: "delete", collection, id });
  }

  async write(intent: WriteIntent): Promise<WriteResult> {
    const prepared = this.prepare(intent);
    const undo = this.localStore.apply(prepared.change);

    try {
      if (this.canSendDirect(prepared.request) && (await this.sendDirect(prepared.request))) {
        return { status: "synced" };
      }

      const recordId = await this.queue.enqueueSingle(prepared.request);
      return { status: "queued", recordId };
    } catch (error) {
      this.localStore.revert(undo);
      this.logger.warn(
        { err: error, collection: intent.collection, entityId: prepared.change.id },
        "Write rolled back",
      );
      throw new WriteRolledBackError(
        `Write to ${intent.collection}/${prepared.change.id} was rolled back: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Apply several related writes. The ones the remote store does not
   * confirm are queued together under one batch ID.
   */
  async writeBatch(intents: WriteIntent[]): Promise<BatchWriteResult> {
    if (intents.length === 0) {
      return { synced: 0, queued: 0, batchId: null };
    }

    const applied: AppliedWrite[] = [];
    try {
      for (const intent of intents) {
        // Later intents may depend on earlier ones (create then update)
        const prepared = this.prepare(intent);
        applied.push({ ...prepared, undo: this.localStore.apply(prepared.change) });
      }
    } catch (error) {
      this.revertAll(applied);
      throw error;
    }

    const unconfirmed: AppliedWrite[] = [];
    const held = new Set<string>();
    for (const [index, write] of applied.entries()) {
      const { targetCollection, entityId } = write.request;
      const key = `${targetCollection}/${entityId}`;
      try {
        if (
          !held.has(key) &&
          this.canSendDirect(write.request) &&
          (await this.sendDirect(write.request))
        ) {
          continue;
        }
      } catch (error) {
        // This write and the ones after it were never confirmed
        throw this.rollBackBatch([...unconfirmed, ...applied.slice(index)], error);
      }
      held.add(key);
      unconfirmed.push(write);
    }

    if (unconfirmed.length === 0) {
      return { synced: applied.length, queued: 0, batchId: null };
    }

    let batchId: string;
    try {
      batchId = await this.queue.enqueueBatch(unconfirmed.map((write) => write.request));
    } catch (error) {
      throw this.rollBackBatch(unconfirmed, error);
    }

    return {
      synced: applied.length - unconfirmed.length,
      queued: unconfirmed.length,
      batchId,
    };
  }

  private rollBackBatch(writes: AppliedWrite[], error: unknown): WriteRolledBackError {
    this.revertAll(writes);
    this.logger.warn({ err: error, count: writes.length }, "Batch write rolled back");
    return new WriteRolledBackError(
      `Batch write of ${writes.length} change(s) was rolled back: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  private revertAll(writes: AppliedWrite[]): void {
    for (const write of [...writes].reverse()) {
      this.localStore.revert(write.undo);
    }
  }

  /**
   * A write goes straight to the remote store only when online and nothing
   * for the same entity is still waiting in the queue.
   */
  private canSendDirect(request: WriteRequest): boolean {
    return (
      this.isOnline() && !this.queue.hasPendingFor(request.targetCollection, request.entityId)
    );
  }

  /**
   * Try the remote store directly. Returns false when the write should be
   * queued; throws when it must be rolled back.
   */
  private async sendDirect(request: WriteRequest): Promise<boolean> {
    const outcome = await dispatchWrite(this.repositories, request);
    if (outcome.ok) {
      return true;
    }

    if (this.failFast && outcome.kind === "permanent") {
      throw new PermanentValidationError(outcome.error);
    }

    this.logger.info(
      {
        collection: request.targetCollection,
        entityId: request.entityId,
        kind: outcome.kind,
        error: outcome.error,
      },
      "Direct write failed, queueing",
    );
    return false;
  }

  private prepare(intent: WriteIntent): PreparedWrite {
    const definition = this.localStore.getCollection(intent.collection);
    if (!definition) {
      throw new PermanentValidationError(`Unknown collection "${intent.collection}"`);
    }

    switch (intent.operation) {
      case "create": {
        const entity = validate(definition, intent.entity);
        if (this.localStore.get(intent.collection, entity.id)) {
          throw new PermanentValidationError(
            `Entity ${entity.id} already exists in ${intent.collection}`,
          );
        }
        return this.prepared("create", intent.collection, entity.id, entity);
      }

      case "update": {
        const existing = this.localStore.get(intent.collection, intent.entity.id);
        if (!existing) {
          throw new UnknownEntityError(intent.collection, intent.entity.id);
        }
        const entity = validate(definition, { ...existing, ...intent.entity });
        return this.prepared("update", intent.collection, entity.id, entity);
      }

      case "delete": {
        if (!this.localStore.get(intent.collection, intent.id)) {
          throw new UnknownEntityError(intent.collection, intent.id);
        }
        return this.prepared("delete", intent.collection, intent.id, null);
      }
    }
  }

  private prepared(
    operationType: WriteRequest["operationType"],
    collection: string,
    id: string,
    entity: Entity | null,
  ): PreparedWrite {
    return {
      change: { collection, id, entity },
      request: {
        operationType,
        targetCollection: collection,
        entityId: id,
        payload: entity ?? {},
      },
    };
  }
}

function validate(definition: CollectionDefinition, value: unknown): Entity {
  const schema: z.ZodType<Entity, z.ZodTypeDef, unknown> = definition.schema ?? entitySchema;
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "entity"}: ${issue.message}`)
      .join("; ");
    throw new PermanentValidationError(`Invalid ${definition.name}: ${details}`);
  }
  return result.data;
}
