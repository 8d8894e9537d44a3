/**
 * Configuration
 *
 * Anti-cheat and batch limits, plus environment loading for the SQLite-backed
 * service.
 */

import { z } from 'zod'
import { ValidationError } from './errors'
import type { LogLevel } from './logger'
import { isValidTimezone } from './time-date'

// ============================================================================
// Policy
// ============================================================================

export type StreakPolicy = {
  /** Claims more than this many days after the server's "today" are rejected */
  maxFutureDays: number
  /** Claims more than this many days before the server's "today" are rejected */
  maxBackdateDays: number
  /** Offline batches larger than this are rejected without processing */
  maxBatchSize: number
}

export const DEFAULT_POLICY: Readonly<StreakPolicy> = {
  maxFutureDays: 1,
  maxBackdateDays: 7,
  maxBatchSize: 30,
}

/**
 * Which legacy record wins when several share a date.
 * 'first-seen' keeps input order; 'earliest-completed' orders by completedAt first.
 */
export type MigrationOrder = 'first-seen' | 'earliest-completed'

export function resolvePolicy(overrides: Partial<StreakPolicy> = {}): StreakPolicy {
  const policy = { ...DEFAULT_POLICY, ...overrides }
  for (const [key, value] of Object.entries(policy)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`Policy '${key}' must be a non-negative integer, got ${value}`)
    }
  }
  return policy
}

// ============================================================================
// Environment
// ============================================================================

const intFromEnv = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .optional()
    .transform((s) => (s === undefined ? fallback : Number(s)))

const EnvSchema = z.object({
  STREAK_DB_PATH: z.string().min(1).default('streaks.db'),
  STREAK_MAX_FUTURE_DAYS: intFromEnv(DEFAULT_POLICY.maxFutureDays),
  STREAK_MAX_BACKDATE_DAYS: intFromEnv(DEFAULT_POLICY.maxBackdateDays),
  STREAK_MAX_BATCH_SIZE: intFromEnv(DEFAULT_POLICY.maxBatchSize),
  STREAK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  STREAK_DEFAULT_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isValidTimezone, 'must be an IANA timezone'),
  STREAK_MIGRATION_ORDER: z.enum(['first-seen', 'earliest-completed']).default('first-seen'),
})

export type ServiceConfig = {
  databasePath: string
  policy: StreakPolicy
  logLevel: LogLevel
  defaultTimezone: string
  migrationOrder: MigrationOrder
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ValidationError(`Invalid environment: ${problems}`)
  }

  const data = parsed.data
  return {
    databasePath: data.STREAK_DB_PATH,
    policy: resolvePolicy({
      maxFutureDays: data.STREAK_MAX_FUTURE_DAYS,
      maxBackdateDays: data.STREAK_MAX_BACKDATE_DAYS,
      maxBatchSize: data.STREAK_MAX_BATCH_SIZE,
    }),
    logLevel: data.STREAK_LOG_LEVEL,
    defaultTimezone: data.STREAK_DEFAULT_TIMEZONE,
    migrationOrder: data.STREAK_MIGRATION_ORDER,
  }
}
