import { type LevelWithSilent, type Logger, pino } from "pino";

export type { Logger };

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    name: "ledger-sync",
    level,
  });
}

/**
 * Logger used when a component is constructed without one.
 */
export const defaultLogger: Logger = createLogger(
  process.env.LOG_LEVEL === "silent" ? "silent" : "info",
);
