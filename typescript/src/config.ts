import { z } from "zod";
import { ConfigurationError } from "./errors";
import {
  DEFAULT_LOG_LEVEL,
  DEFAULT_LOGGER_NAME,
  createLogger,
  logLevels,
  type Logger,
} from "./logger";
import { Registry, defaultRegistry } from "./registry";

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "child" in value &&
    typeof value.child === "function" &&
    "debug" in value &&
    typeof value.debug === "function"
  );
}

const optionsSchema = z
  .object({
    /** Logger used for every call; overrides logLevel and loggerName. */
    logger: z.custom<Logger>(isLogger, "Expected a pino logger").optional(),
    logLevel: z.enum(logLevels).default(DEFAULT_LOG_LEVEL),
    loggerName: z.string().min(1).default(DEFAULT_LOGGER_NAME),
    /** Registry that resolves t.ref() names. */
    registry: z.instanceof(Registry).optional(),
  })
  .strict();

const envSchema = z.object({
  STRUCTWALK_LOG_LEVEL: z.enum(logLevels).optional(),
  STRUCTWALK_LOGGER_NAME: z.string().min(1).optional(),
});

/**
 * Options accepted by serialize, deserialize and Serde.
 */
export type SerdeOptions = z.input<typeof optionsSchema>;

/**
 * Options after validation and defaulting.
 */
export interface ResolvedOptions {
  logger: Logger;
  registry: Registry;
}

/**
 * Validates options and fills in the logger and registry.
 * @throws ConfigurationError if the options are invalid
 */
export function resolveOptions(options: SerdeOptions = {}): ResolvedOptions {
  const result = optionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(`Invalid options:\n${z.prettifyError(result.error)}`);
  }

  const { logger, logLevel, loggerName, registry } = result.data;
  return {
    logger: logger ?? createLogger(loggerName, logLevel),
    registry: registry ?? defaultRegistry,
  };
}

/**
 * Reads options from STRUCTWALK_* environment variables.
 * @throws ConfigurationError if a variable holds an invalid value
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): SerdeOptions {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Invalid environment:\n${z.prettifyError(result.error)}`);
  }

  const options: SerdeOptions = {};
  if (result.data.STRUCTWALK_LOG_LEVEL) {
    options.logLevel = result.data.STRUCTWALK_LOG_LEVEL;
  }
  if (result.data.STRUCTWALK_LOGGER_NAME) {
    options.loggerName = result.data.STRUCTWALK_LOGGER_NAME;
  }
  return options;
}
