/**
 * In-memory view of the user's entities, mutated optimistically by the
 * WriteRouter before the remote store has confirmed anything.
 */

import type { z } from "zod";
import { type Logger, defaultLogger } from "../lib/logger.ts";
import {
  EXPENSES_COLLECTION,
  type Entity,
  RECURRING_EXPENSES_COLLECTION,
  expenseSchema,
  recurringExpenseSchema,
} from "../lib/types.ts";

export interface CollectionDefinition {
  name: string;
  /** Validates entities before they are written. */
  schema?: z.ZodType<Entity, z.ZodTypeDef, unknown>;
  /** List order; defaults to ascending id. */
  compare?(a: Entity, b: Entity): number;
}

/**
 * A change to one entity. `entity: null` removes it.
 */
export interface LocalChange {
  collection: string;
  id: string;
  entity: Entity | null;
}

/**
 * Snapshot taken before a change, enough to undo it.
 */
export interface UndoEntry {
  collection: string;
  id: string;
  previous: Entity | null;
}

export type LocalStoreListener = (collection: string) => void;

function stringField(entity: Entity, key: string): string {
  const value = entity[key];
  return typeof value === "string" ? value : "";
}

function byId(a: Entity, b: Entity): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export const expenseCollection: CollectionDefinition = {
  name: EXPENSES_COLLECTION,
  schema: expenseSchema,
  // Newest first
  compare(a, b) {
    const byDate = stringField(b, "date").localeCompare(stringField(a, "date"));
    return byDate !== 0 ? byDate : byId(a, b);
  },
};

export const recurringExpenseCollection: CollectionDefinition = {
  name: RECURRING_EXPENSES_COLLECTION,
  schema: recurringExpenseSchema,
  compare(a, b) {
    const byStart = stringField(a, "startDate").localeCompare(stringField(b, "startDate"));
    return byStart !== 0 ? byStart : byId(a, b);
  },
};

export const DEFAULT_COLLECTIONS: readonly CollectionDefinition[] = [
  expenseCollection,
  recurringExpenseCollection,
];

interface CollectionState {
  definition: CollectionDefinition;
  entities: Map<string, Entity>;
}

export class LocalStore {
  private collections: Map<string, CollectionState> = new Map();
  private listeners: Set<LocalStoreListener> = new Set();
  private logger: Logger;

  constructor(
    definitions: readonly CollectionDefinition[] = DEFAULT_COLLECTIONS,
    options: { logger?: Logger } = {},
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ component: "local-store" });
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: CollectionDefinition): void {
    if (this.collections.has(definition.name)) return;
    this.collections.set(definition.name, { definition, entities: new Map() });
  }

  getCollection(name: string): CollectionDefinition | undefined {
    return this.collections.get(name)?.definition;
  }

  getCollectionNames(): string[] {
    return [...this.collections.keys()];
  }

  list(collection: string): Entity[] {
    const state = this.collections.get(collection);
    if (!state) return [];

    const compare = state.definition.compare ?? byId;
    return [...state.entities.values()].sort((a, b) => compare(a, b));
  }

  get(collection: string, id: string): Entity | undefined {
    return this.collections.get(collection)?.entities.get(id);
  }

  /**
   * Replace a collection's contents, e.g. with a fresh remote fetch.
   */
  hydrate(collection: string, entities: Entity[]): void {
    const state = this.require(collection);
    state.entities = new Map(entities.map((entity) => [entity.id, entity]));
    this.notify(collection);
  }

  /**
   * Apply a change and return what is needed to undo it.
   */
  apply(change: LocalChange): UndoEntry {
    const state = this.require(change.collection);
    const previous = state.entities.get(change.id) ?? null;

    if (change.entity) {
      state.entities.set(change.id, change.entity);
    } else {
      state.entities.delete(change.id);
    }
    this.notify(change.collection);

    return { collection: change.collection, id: change.id, previous };
  }

  /**
   * Restore the snapshot in an undo entry.
   */
  revert(entry: UndoEntry): void {
    const state = this.require(entry.collection);

    if (entry.previous) {
      state.entities.set(entry.id, entry.previous);
    } else {
      state.entities.delete(entry.id);
    }
    this.notify(entry.collection);
  }

  subscribe(listener: LocalStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private require(collection: string): CollectionState {
    const state = this.collections.get(collection);
    if (!state) {
      throw new Error(`Unknown collection "${collection}"`);
    }
    return state;
  }

  private notify(collection: string): void {
    for (const listener of this.listeners) {
      try {
        listener(collection);
      } catch (error) {
        this.logger.error({ err: error, collection }, "Error in local store listener");
      }
    }
  }
}
