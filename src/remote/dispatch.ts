import {
  PermanentValidationError,
  TransientNetworkError,
  errorMessage,
} from "../lib/errors.ts";
import type { WriteRequest } from "../lib/types.ts";
import type { RemoteRepositories, RemoteResult } from "./types.ts";

/**
 * Send one write to the repository of its collection.
 *
 * Never throws: a thrown TransientNetworkError or PermanentValidationError
 * keeps its kind, anything else becomes a transient failure.
 */
export async function dispatchWrite(
  repositories: RemoteRepositories,
  request: WriteRequest,
): Promise<RemoteResult> {
  const repository = repositories.get(request.targetCollection);
  if (!repository) {
    return {
      ok: false,
      kind: "permanent",
      error: `No remote repository for collection "${request.targetCollection}"`,
    };
  }

  try {
    switch (request.operationType) {
      case "create":
        return await repository.create({ ...request.payload, id: request.entityId });
      case "update":
        return await repository.update({ ...request.payload, id: request.entityId });
      case "delete":
        return await repository.delete(request.entityId);
    }
  } catch (error) {
    return toRemoteFailure(error);
  }
}

function toRemoteFailure(error: unknown): RemoteResult {
  if (error instanceof PermanentValidationError || error instanceof TransientNetworkError) {
    return { ok: false, kind: error.kind, error: error.message };
  }
  return { ok: false, kind: "transient", error: errorMessage(error, "Network error") };
}
