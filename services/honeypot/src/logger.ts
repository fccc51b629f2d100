import pino, { Logger } from "pino";

/**
 * Create a named module logger. Level comes from LOG_LEVEL.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL || "info" });
}
