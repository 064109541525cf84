import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Levels accepted by the logger, from most to least severe.
 */
export const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevelName = (typeof logLevels)[number];

export const DEFAULT_LOGGER_NAME = "structwalk";
export const DEFAULT_LOG_LEVEL: LogLevelName = "warn";

// One logger per name and level, shared by every call that asks for it
const loggers = new Map<string, Logger>();

/**
 * Returns the shared pino logger for a name and level.
 */
export function createLogger(
  name: string = DEFAULT_LOGGER_NAME,
  level: LogLevelName = DEFAULT_LOG_LEVEL
): Logger {
  const key = `${name}:${level}`;
  let logger = loggers.get(key);
  if (!logger) {
    logger = pino({ name, level });
    loggers.set(key, logger);
  }
  return logger;
}
