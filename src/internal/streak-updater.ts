/**
 * Streak Updater
 *
 * Advances the cached aggregate by one new date. Every path that cannot be
 * trusted incrementally (backfill, a lost conditional write, a lost
 * first-insert race, a decayed current streak) hands off to a full recompute
 * instead of retrying.
 */

import type { StreakAggregate } from '../adapter'
import { ConcurrentUpdateConflictError, DuplicateKeyError } from '../errors'
import { daysBetween, type LocalDate } from '../time-date'
import type { EngineDeps, Recalculator, StreakUpdater } from './types'

type StreakUpdaterDeps = Pick<EngineDeps, 'adapter' | 'clock' | 'logger'> & {
  recalculator: Recalculator
}

export function createStreakUpdater(deps: StreakUpdaterDeps): StreakUpdater {
  const { adapter, clock, logger, recalculator } = deps

  async function startAggregate(userId: string, newLocalDate: LocalDate): Promise<StreakAggregate> {
    const fresh: StreakAggregate = {
      userId,
      currentStreak: 1,
      longestStreak: 1,
      lastCompletedLocalDate: newLocalDate,
      updatedAt: clock().toISOString(),
      version: 1,
    }
    try {
      await adapter.insertAggregate(fresh)
      return fresh
    } catch (e) {
      if (!(e instanceof DuplicateKeyError)) throw e
      logger.debug('Aggregate created concurrently; recomputing', { userId, date: newLocalDate })
      return recalculator.recompute(userId)
    }
  }

  async function advance(userId: string, newLocalDate: LocalDate): Promise<StreakAggregate> {
    const existing = await adapter.getAggregate(userId)
    if (!existing) return startAggregate(userId, newLocalDate)

    const lastDate = existing.lastCompletedLocalDate
    let newStreak = 1

    if (lastDate !== null) {
      const delta = daysBetween(lastDate, newLocalDate)

      if (delta === 0) return existing

      if (delta < 0) {
        logger.debug('Backfill completion; recomputing', { userId, date: newLocalDate, lastDate })
        return recalculator.recompute(userId)
      }

      if (delta === 1) {
        // A recompute may have decayed currentStreak to 0 while the run still exists
        if (existing.currentStreak === 0) return recalculator.recompute(userId)
        newStreak = existing.currentStreak + 1
      }
    }

    const next: StreakAggregate = {
      userId,
      currentStreak: newStreak,
      longestStreak: Math.max(existing.longestStreak, newStreak),
      lastCompletedLocalDate: newLocalDate,
      updatedAt: clock().toISOString(),
      version: existing.version + 1,
    }

    const written = await adapter.compareAndSetAggregate(userId, existing.version, next)
    if (!written) {
      const conflict = new ConcurrentUpdateConflictError(userId, existing.version)
      logger.debug(`${conflict.message}; recomputing`, { userId, date: newLocalDate })
      return recalculator.recompute(userId)
    }

    return next
  }

  return { advance }
}
