import { env } from "node:process";
import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export function createLogger(level: string = env.LOG_LEVEL || "info"): Logger {
  return pino({
    level,
    base: { service: "rateio" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Process-wide logger; modules take an injected Logger and fall back to this one. */
export const log = createLogger();
