import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(level: string = "info"): Logger {
  return pino({
    level,
    base: { service: "tea-journal-bot" },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export const silentLogger: Logger = pino({ level: "silent" });
