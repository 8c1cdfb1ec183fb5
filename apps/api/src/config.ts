import { z } from 'zod'

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

const flagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1')

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(6129),
  DATABASE_URL: z.string({ required_error: 'is required' }).url('must be a connection URL'),
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
    ),
  DEMO_RESET_ENABLED: flagSchema,
  LOG_LEVEL: logLevelSchema.default('info'),
})

export type AppConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  port: number
  databaseUrl: string
  allowedOrigins: string[]
  demoResetEnabled: boolean
  logLevel: z.infer<typeof logLevelSchema>
}

export class ConfigError extends Error {
  issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Reads API configuration from the environment. Every invalid key is reported
 * at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`))
  }

  return {
    nodeEnv: parsed.data.NODE_ENV,
    port: parsed.data.PORT,
    databaseUrl: parsed.data.DATABASE_URL,
    allowedOrigins: parsed.data.ALLOWED_ORIGINS,
    demoResetEnabled: parsed.data.DEMO_RESET_ENABLED,
    logLevel: parsed.data.LOG_LEVEL,
  }
}
