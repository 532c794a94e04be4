/**
 * Structured logging.
 */
import { pino, stdTimeFunctions, type Logger } from "pino";

export type { Logger };

export const createLogger = (level = "info"): Logger =>
  pino({
    name: "sensorshift",
    level,
    base: undefined,
    timestamp: stdTimeFunctions.isoTime,
  });

/** A logger that drops everything; the default for library callers and tests. */
export const silentLogger = (): Logger => pino({ level: "silent" });
