import { z } from "zod"

const envSchema = z.object({
  // pino level used by the default logger
  JSON_PATH_MUTATOR_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("silent"),
})

type EnvVars = z.infer<typeof envSchema>

/**
 * Reads the library settings from the environment.
 * Throws a `ZodError` when a variable holds an unsupported value.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): EnvVars {
  const rawEnv: Record<string, string | undefined> = {}

  for (const key of Object.keys(envSchema.shape)) {
    rawEnv[key] = source[key]
  }

  return envSchema.parse(rawEnv)
}
