import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(level = "info"): Logger {
  return pino({
    name: "biomeai",
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Silent logger for tests and tooling. */
export function nullLogger(): Logger {
  return pino({ level: "silent" });
}
