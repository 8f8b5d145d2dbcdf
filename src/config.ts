/**
 * Configuration Management
 */

import dotenv from 'dotenv'
import { fileURLToPath } from 'url'
import { z } from 'zod'

dotenv.config()

const DEFAULT_STATIC_DIR = fileURLToPath(new URL('../static', import.meta.url))

// Environment values arrive as strings; only the literal "true" enables a flag
const envBoolean = z
  .enum(['true', 'false'])
  .default('false')
  .transform(value => value === 'true')

const ConfigSchema = z.object({
  env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  port: z.coerce.number().int().positive().default(8000),
  host: z.string().default('0.0.0.0'),
  staticDir: z.string().default(DEFAULT_STATIC_DIR),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'text']).default('json')
  }),

  cors: z.object({
    origin: z.string().default('*'),
    credentials: envBoolean
  })
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Build a validated configuration from an environment record.
 * Throws a ZodError when a value is present but malformed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  return ConfigSchema.parse({
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    staticDir: env.STATIC_DIR,

    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT
    },

    cors: {
      origin: env.CORS_ORIGIN,
      credentials: env.CORS_CREDENTIALS
    }
  })
}

export const config: Config = loadConfig()
