/**
 * Process configuration read once from the environment at startup.
 *
 * @module config
 */

import { z } from 'zod'
import { DEFAULT_MAPPING_FILE } from './mapping-store.js'
import { normalizeUrl } from './url.js'

const envSchema = z.object({
  WP_URL: z.string().trim().min(1, 'must not be empty'),
  WP_USERNAME: z.string().min(1, 'must not be empty'),
  WP_APP_PASSWORD: z.string().min(1, 'must not be empty'),
  MAPPING_FILE: z.string().min(1).default(DEFAULT_MAPPING_FILE),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  TYPE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(300000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
})

export type AppConfig = {
  /** Normalised site URL. */
  readonly baseUrl: string
  readonly username: string
  readonly applicationPassword: string
  readonly mappingFile: string
  readonly requestTimeoutMs: number
  readonly typeCacheTtlMs: number
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error'
}

/** Raised when a required variable is missing or a value is malformed. */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
  }
}

/**
 * Validate the environment and build the immutable {@link AppConfig}.
 *
 * @param env - Variables to read, usually `process.env`.
 * @throws {@link ConfigError} listing every problem found.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.code === 'invalid_type' && issue.received === 'undefined'
          ? `${issue.path.join('.')} is required`
          : `${issue.path.join('.')}: ${issue.message}`,
      ),
    )
  }

  const values = parsed.data
  return Object.freeze({
    baseUrl: normalizeUrl(values.WP_URL),
    username: values.WP_USERNAME,
    applicationPassword: values.WP_APP_PASSWORD,
    mappingFile: values.MAPPING_FILE,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    typeCacheTtlMs: values.TYPE_CACHE_TTL_MS,
    logLevel: values.LOG_LEVEL,
  })
}
