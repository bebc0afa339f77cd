import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { LogLevel } from './logger.js'

/** Default per-request timeout in ms (60 s). */
export const REQUEST_TIMEOUT_MS = 60_000

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes')

const envSchema = z.object({
  BENCH_DUO_STORE: z.string().min(1).default('.bench-duo/store.json'),
  BENCH_DUO_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(REQUEST_TIMEOUT_MS),
  BENCH_DUO_WARM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BENCH_DUO_WARM_BEFORE_DUEL: booleanFlag.default('true'),
  BENCH_DUO_INLINE_BATCH: booleanFlag.default('false'),
  BENCH_DUO_STATUS_LOG_SIZE: z.coerce.number().int().positive().default(50),
  BENCH_DUO_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
})

export interface BenchDuoConfig {
  storePath: string
  requestTimeoutMs: number
  warmTimeoutMs: number
  warmBeforeDuel: boolean
  inlineBatch: boolean
  statusLogSize: number
  logLevel: LogLevel
}

/**
 * Read configuration from environment variables (after dotenv has loaded `.env`).
 * Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): BenchDuoConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('BENCH_DUO_') && value !== undefined && value !== ''),
  )

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigurationError(`Invalid configuration: ${issues}`)
  }

  const e = parsed.data
  return {
    storePath: e.BENCH_DUO_STORE,
    requestTimeoutMs: e.BENCH_DUO_REQUEST_TIMEOUT_MS,
    warmTimeoutMs: e.BENCH_DUO_WARM_TIMEOUT_MS,
    warmBeforeDuel: e.BENCH_DUO_WARM_BEFORE_DUEL,
    inlineBatch: e.BENCH_DUO_INLINE_BATCH,
    statusLogSize: e.BENCH_DUO_STATUS_LOG_SIZE,
    logLevel: e.BENCH_DUO_LOG_LEVEL,
  }
}
