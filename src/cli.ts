#!/usr/bin/env node
import { runAdminCli } from "./cli-handlers.ts";
import { loadConfig } from "./config.ts";
import { createSyncEngine } from "./engine.ts";

async function main() {
  const config = loadConfig();
  const engine = createSyncEngine({ config });

  await engine.queue.initialize();

  let code: number;
  try {
    code = await runAdminCli(process.argv.slice(2), engine);
  } finally {
    engine.destroy();
  }
  process.exit(code);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
