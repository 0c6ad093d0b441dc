import { type Logger, pino } from "pino"
import { loadEnv } from "./env"

export type { Logger }

/**
 * Creates the library logger.
 * The level defaults to `JSON_PATH_MUTATOR_LOG_LEVEL` (itself `silent` when unset).
 */
export function createLogger(level: string = loadEnv().JSON_PATH_MUTATOR_LOG_LEVEL): Logger {
  return pino({ name: "json-path-mutator", level })
}
