/**
 * Server configuration loaded from environment variables
 */

import { Abort, ErrorCode, type ConfigErrorContext } from '@switchyard/shared/errors'
import { LogLevel } from '@switchyard/shared/logger'
import { z } from 'zod'

export const ENVIRONMENTS = ['production', 'development', 'test'] as const
export type Environment = (typeof ENVIRONMENTS)[number]

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1')

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(9757),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(ENVIRONMENTS).default('development'),
  ENABLE_CORS: booleanFlag.default('false'),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  LOG_JSON: booleanFlag.default('false'),
  METHOD_OVERRIDE_FIELD: z.string().min(1).default('_method'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
})

export interface ServerConfig {
  port: number
  host: string
  environment: Environment
  enableCors: boolean
  logLevel: LogLevel
  logJson: boolean
  methodOverrideField: string
  requestTimeoutMs?: number
}

/**
 * Validate environment variables into a server config
 * @throws Abort (INVALID_CONFIG) naming every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''))
  const result = EnvSchema.safeParse(present)

  if (!result.success) {
    const metadata: ConfigErrorContext = {
      issues: result.error.errors.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    }
    throw new Abort(ErrorCode.INVALID_CONFIG, {
      reason: `Invalid environment: ${metadata.issues.map(issue => issue.field).join(', ')}`,
      metadata,
    })
  }

  const parsed = result.data
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    environment: parsed.NODE_ENV,
    enableCors: parsed.ENABLE_CORS,
    logLevel: parsed.LOG_LEVEL,
    logJson: parsed.LOG_JSON,
    methodOverrideField: parsed.METHOD_OVERRIDE_FIELD,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
  }
}
