/**
 * Legacy Migrator
 *
 * One-time backfill of the completion ledger from legacy "task marked done on
 * date X" records. Historic data skips anti-cheat validation. All rows go in
 * one atomic batch insert, then one full recompute per user runs.
 */

import type { Completion } from '../adapter'
import type { MigrationOrder } from '../config'
import { ValidationError } from '../errors'
import type { StreakSnapshot } from '../recalculation'
import { isValidTimezone, parseDate, type LocalDate } from '../time-date'
import { toSnapshot, uuid } from './helpers'
import type { EngineDeps, Recalculator } from './types'

export type LegacyTaskRecord = {
  /** Calendar date the task belonged to (YYYY-MM-DD) */
  date?: string | null
  isCompleted: boolean
  /** When the task was marked done (ISO 8601), if known */
  completedAt?: string | null
}

export type MigrationOptions = {
  order?: MigrationOrder
  /** Zone stamped on migrated completions (legacy records carry none); defaults to the engine's zone */
  timezone?: string
}

export type MigrationReport = {
  migrated: number
  /** Same-date records dropped from the input plus dates already on the ledger */
  skippedDuplicate: number
  /** Completed records with a missing or unparseable date */
  skippedInvalid: number
  streak: StreakSnapshot
}

type Candidate = {
  date: LocalDate
  completedAt: string | null
}

type LegacyMigratorDeps = Pick<EngineDeps, 'adapter' | 'clock' | 'logger' | 'defaultTimezone'> & {
  recalculator: Recalculator
  defaultOrder: MigrationOrder
}

function completedAtMs(c: Candidate): number {
  const ms = c.completedAt != null ? Date.parse(c.completedAt) : NaN
  return Number.isNaN(ms) ? Number.POSITIVE_INFINITY : ms
}

export function createLegacyMigrator(deps: LegacyMigratorDeps) {
  const { adapter, clock, logger, defaultTimezone, recalculator, defaultOrder } = deps

  async function migrate(
    userId: string,
    records: readonly LegacyTaskRecord[],
    options: MigrationOptions = {},
  ): Promise<MigrationReport> {
    const order = options.order ?? defaultOrder
    const timezone = options.timezone ?? defaultTimezone
    if (!isValidTimezone(timezone)) {
      throw new ValidationError(`Invalid migration timezone: ${timezone}`)
    }

    let skippedInvalid = 0
    let skippedDuplicate = 0
    const candidates: Candidate[] = []

    for (const record of records) {
      if (!record.isCompleted) continue
      const parsed = record.date ? parseDate(record.date) : null
      if (!parsed?.ok) {
        skippedInvalid++
        continue
      }
      candidates.push({ date: parsed.value, completedAt: record.completedAt ?? null })
    }

    if (order === 'earliest-completed') {
      candidates.sort((a, b) => {
        const ma = completedAtMs(a)
        const mb = completedAtMs(b)
        return ma < mb ? -1 : ma > mb ? 1 : 0
      })
    }

    // First candidate per date wins
    const seen = new Set<LocalDate>()
    const winners: Candidate[] = []
    for (const c of candidates) {
      if (seen.has(c.date)) {
        skippedDuplicate++
        continue
      }
      seen.add(c.date)
      winners.push(c)
    }

    const recordedAtUtc = clock().toISOString()
    const completions = winners.map((w): Completion => ({
      id: uuid(),
      userId,
      localDate: w.date,
      recordedAtUtc,
      timezoneIdentifier: timezone,
      source: 'migration',
      ...(w.completedAt != null ? { clientCompletedAt: w.completedAt } : {}),
    }))
    const { inserted: migrated, duplicates } = await adapter.createCompletions(completions)
    skippedDuplicate += duplicates

    if (migrated === 0) {
      return {
        migrated,
        skippedDuplicate,
        skippedInvalid,
        streak: toSnapshot(await adapter.getAggregate(userId)),
      }
    }

    const aggregate = await recalculator.recompute(userId)
    logger.info('Migrated legacy completions', { userId, migrated, skippedDuplicate, skippedInvalid })
    return { migrated, skippedDuplicate, skippedInvalid, streak: toSnapshot(aggregate) }
  }

  return { migrate }
}
