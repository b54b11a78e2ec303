import { z } from 'zod'
import type { LogLevel } from './logger'
import type { Dialect } from './types'

export const DEFAULT_TIMEOUT = 60_000

const EnvSchema = z.object({
  INVENIO_API_URL: z.string().url().optional(),
  INVENIO_API_KEY: z.string().min(1).optional(),
  INVENIO_TIMEOUT_MS: z.coerce.number().int().min(0).default(DEFAULT_TIMEOUT),
  INVENIO_DIALECT: z
    .enum(['invenio-draft', 'zenodo-deposition'])
    .default('invenio-draft'),
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),
})

export type Config = {
  apiUrl?: string
  apiKey?: string
  timeout: number
  dialect: Dialect
  logLevel: LogLevel
}

// Empty variables count as unset, so `INVENIO_API_KEY= cmd` falls back to
// the defaults instead of failing validation.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  )
  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid environment configuration: ${problems}`)
  }
  return {
    apiUrl: parsed.data.INVENIO_API_URL,
    apiKey: parsed.data.INVENIO_API_KEY,
    timeout: parsed.data.INVENIO_TIMEOUT_MS,
    dialect: parsed.data.INVENIO_DIALECT,
    logLevel: parsed.data.LOG_LEVEL,
  }
}
