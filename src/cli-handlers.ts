import type { SyncEngine } from "./engine.ts";
import { errorMessage } from "./lib/errors.ts";
import { queuedWriteStatusSchema } from "./lib/types.ts";

/**
 * Run an admin command against an engine whose queue is initialized.
 * Returns the process exit code.
 */
export async function runAdminCli(args: string[], engine: SyncEngine): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const [category, action, ...params] = args;

  try {
    switch (category) {
      case "queue":
        if (!action) {
          printHelp();
          return 1;
        }
        return await handleQueue(action, params, engine);
      case "help":
      case "--help":
      case "-h":
        printHelp();
        return 0;
      default:
        console.error(`Unknown category: ${category}`);
        printHelp();
        return 1;
    }
  } catch (error) {
    console.error("Error:", errorMessage(error));
    return 1;
  }
}

function printHelp() {
  console.log(`
ledger-sync admin CLI

Usage:
  ledger-sync <category> <cmd>

Commands:
  queue list [pending|syncing|failed]
  queue stats
  queue retry
  queue purge-failed
`);
}

async function handleQueue(
  action: string,
  params: string[],
  engine: SyncEngine,
): Promise<number> {
  const { queue } = engine;

  switch (action) {
    case "list": {
      const status = params[0] ? queuedWriteStatusSchema.parse(params[0]) : null;
      const records = queue
        .getRecords()
        .filter((record) => !status || record.status === status);
      console.table(
        records.map((record) => ({
          id: record.id,
          batch: record.batchId ?? "",
          operation: record.operationType,
          collection: record.targetCollection,
          entity: record.entityId,
          status: record.status,
          attempts: record.attemptCount,
          lastError: record.lastError ?? "",
          nextAttemptAt: record.nextAttemptAt ?? "",
        })),
      );
      return 0;
    }
    case "stats": {
      console.table([
        {
          pending: queue.getPendingCount(),
          failed: queue.getFailedCount(),
          total: queue.getRecords().length,
        },
      ]);
      return 0;
    }
    case "retry": {
      const online = await engine.connectivity.checkConnectivity({ immediate: true });
      const result = await queue.retryAll();
      if (!online) {
        console.log("Remote store unreachable, failed writes reset to pending");
      }
      console.log(
        `Processed ${result.processed}, retrying ${result.retrying}, failed ${result.failed}`,
      );
      return 0;
    }
    case "purge-failed": {
      const removed = await queue.purgeFailed();
      console.log(`Removed ${removed} failed write(s)`);
      return 0;
    }
    default:
      console.error(`Unknown queue action: ${action}`);
      printHelp();
      return 1;
  }
}
