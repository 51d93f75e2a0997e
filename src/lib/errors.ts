/**
 * Error taxonomy for the write path.
 */

import type { RemoteErrorKind } from "./types.ts";

/**
 * A remote write failed for a reason that may go away (no network, timeout,
 * server overload). Drives the backoff loop.
 */
export class TransientNetworkError extends Error {
  readonly kind: RemoteErrorKind = "transient";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientNetworkError";
  }
}

/**
 * The remote store or the local schema rejected the write itself.
 */
export class PermanentValidationError extends Error {
  readonly kind: RemoteErrorKind = "permanent";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PermanentValidationError";
  }
}

/**
 * The durable queue store could not record a write.
 */
export class DurabilityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DurabilityError";
  }
}

/**
 * An optimistic mutation was undone because the write was neither confirmed
 * remotely nor queued.
 */
export class WriteRolledBackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WriteRolledBackError";
  }
}

export class UnknownEntityError extends Error {
  constructor(collection: string, id: string) {
    super(`Entity ${id} not found in ${collection}`);
    this.name = "UnknownEntityError";
  }
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string" && error.length > 0) return error;
  return fallback;
}
