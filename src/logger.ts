import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({
    name: "prwatch",
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
