import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const configSchema = z.object({
  dataDir: z.string().default("./data"),

  // Remote backend (PostgREST dialect)
  remote: z.object({
    url: z.string().url().optional(),
    apiKey: z.string().optional(),
  }),

  // Retry policy
  retry: z.object({
    baseDelayMs: z.coerce.number().int().min(0).default(1000),
    maxDelayMs: z.coerce.number().int().min(0).default(60_000),
    failFastOnPermanentErrors: booleanFlag,
  }),

  // Connectivity
  connectivity: z.object({
    debounceMs: z.coerce.number().int().min(0).default(500),
    probeIntervalMs: z.coerce.number().int().min(0).default(0),
  }),

  // Sync status display
  sync: z.object({
    delayMs: z.coerce.number().int().min(0).default(100),
    syncedDisplayMs: z.coerce.number().int().min(0).default(3000),
  }),

  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    dataDir: env.DATA_DIR,

    remote: {
      url: env.REMOTE_URL || undefined,
      apiKey: env.REMOTE_API_KEY || undefined,
    },

    retry: {
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      failFastOnPermanentErrors: env.FAIL_FAST_ON_PERMANENT_ERRORS,
    },

    connectivity: {
      debounceMs: env.CONNECTIVITY_DEBOUNCE_MS,
      probeIntervalMs: env.CONNECTIVITY_PROBE_INTERVAL_MS,
    },

    sync: {
      delayMs: env.SYNC_DELAY_MS,
      syncedDisplayMs: env.SYNCED_DISPLAY_MS,
    },

    logLevel: env.LOG_LEVEL,
  });
}
