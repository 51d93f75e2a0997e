/**
 * Contract of the remote store the queue writes to.
 */

import type { Entity, RemoteErrorKind } from "../lib/types.ts";

export type RemoteResult =
  | { ok: true }
  | { ok: false; kind: RemoteErrorKind; error: string };

/**
 * Implementations report failures as results. They may also throw a
 * TransientNetworkError or PermanentValidationError; any other thrown error
 * is treated as transient.
 */
export interface RemoteRepository {
  create(entity: Entity): Promise<RemoteResult>;
  update(entity: Entity): Promise<RemoteResult>;
  delete(id: string): Promise<RemoteResult>;
}

/**
 * Remote repositories keyed by collection name.
 */
export type RemoteRepositories = ReadonlyMap<string, RemoteRepository>;
