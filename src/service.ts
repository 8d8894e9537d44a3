/**
 * Service bootstrap: opens the SQLite store at start-up and hands back an
 * engine whose close() releases it at shutdown.
 */

import { loadConfig, type ServiceConfig } from './config'
import { createConsoleLogger, type Logger } from './logger'
import { createStreakEngine, type StreakEngine } from './public-api'
import { createSqliteAdapter } from './sqlite-adapter'
import type { Clock } from './internal/types'

export type StreakService = {
  config: ServiceConfig
  engine: StreakEngine
}

export type ServiceOverrides = {
  clock?: Clock
  logger?: Logger
}

export async function openStreakService(
  env: Record<string, string | undefined> = process.env,
  overrides: ServiceOverrides = {},
): Promise<StreakService> {
  const config = loadConfig(env)
  const logger = overrides.logger ?? createConsoleLogger(config.logLevel)
  const adapter = await createSqliteAdapter(config.databasePath)

  const engine = createStreakEngine({
    adapter,
    logger,
    policy: config.policy,
    defaultTimezone: config.defaultTimezone,
    migrationOrder: config.migrationOrder,
    ...(overrides.clock ? { clock: overrides.clock } : {}),
  })

  logger.info('Streak service started', { databasePath: config.databasePath })
  return { config, engine }
}
