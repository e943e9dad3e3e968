import pino, { type Logger } from "pino";
import { LOG_LEVELS, type LogLevel } from "./config.js";

export type { Logger };

function resolveLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.trim();
  return LOG_LEVELS.find((level) => level === fromEnv) ?? "info";
}

let root: Logger | null = null;

function getRootLogger(): Logger {
  if (!root) {
    root = pino({
      level: resolveLevel(),
      base: { service: "strike-desk" },
      formatters: {
        level: (label) => ({ severity: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return root;
}

/** Child logger tagged with the emitting module. */
export function createLogger(module: string): Logger {
  return getRootLogger().child({ module });
}

export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}
