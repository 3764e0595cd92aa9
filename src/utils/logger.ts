import pino, { type Logger } from "pino";

let logger: Logger | null = null;

export function getLogger(): Logger {
  if (!logger) {
    logger = pino({
      name: "slotkeeper",
      level: process.env.LOG_LEVEL ?? "info",
    });
  }
  return logger;
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
