import { z } from 'zod'

const configSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(8000),
  store: z.enum(['sqlite', 'memory']).default('sqlite'),
  databasePath: z.string().min(1).default('./jfind.db'),
  apiPrefix: z.string().regex(/^(\/[A-Za-z0-9._~-]+)*$/, 'API_PREFIX must be empty or look like /segment').default(''),
  corsOrigin: z.string().min(1).default('*'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')
})

export type Config = z.infer<typeof configSchema>

export type ConfigOverrides = Partial<Pick<Config, 'host' | 'port' | 'databasePath'>>

function intOrRaw(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined
  return /^\d+$/.test(value) ? parseInt(value, 10) : value
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value
}

/**
 * Reads configuration from the environment, CLI overrides taking precedence.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): Config {
  const raw = {
    host: overrides.host ?? nonEmpty(env.HOST),
    port: overrides.port ?? intOrRaw(env.PORT),
    store: nonEmpty(env.STORE),
    databasePath: overrides.databasePath ?? nonEmpty(env.DATABASE_PATH),
    apiPrefix: env.API_PREFIX,
    corsOrigin: nonEmpty(env.CORS_ORIGIN),
    logLevel: nonEmpty(env.LOG_LEVEL)
  }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const errors = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`)
  }
  return result.data
}
