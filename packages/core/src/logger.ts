import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export const logger: Logger = pino({
  name: "filament",
  level: process.env.LOG_LEVEL || "info",
});

export function childLogger(module: string): Logger {
  return logger.child({ module });
}

/** A logger that drops everything; handy for tests and one-off scripts. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
