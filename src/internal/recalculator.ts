/**
 * Recalculator
 *
 * Loads a user's full completion ledger, runs computeStreak, and stores the
 * result. Safe to call from any state.
 *
 * The store is conditional on the aggregate version read before the ledger,
 * so a result computed from a ledger that has since grown never replaces a
 * newer write. A lost write starts over with a fresh read.
 */

import type { StreakAggregate } from '../adapter'
import { DuplicateKeyError } from '../errors'
import { computeStreak } from '../recalculation'
import { localDateInZone } from '../time-date'
import type { EngineDeps, Recalculator, StreakEvaluation } from './types'

type RecalculatorDeps = Pick<EngineDeps, 'adapter' | 'clock' | 'defaultTimezone'>

export function createRecalculator(deps: RecalculatorDeps): Recalculator {
  const { adapter, clock, defaultTimezone } = deps

  async function evaluate(userId: string): Promise<StreakEvaluation> {
    const completions = await adapter.getCompletionsByUser(userId)
    const dates = completions.map((c) => c.localDate)
    const latest = completions[completions.length - 1]

    // "Today" is judged in the zone of the user's most recent completion
    const today = localDateInZone(clock(), latest?.timezoneIdentifier ?? defaultTimezone)
    const expected = computeStreak(dates, today)
    const runAtLastDate = latest ? computeStreak(dates, latest.localDate).currentStreak : 0

    return { expected, runAtLastDate }
  }

  async function recompute(userId: string): Promise<StreakAggregate> {
    for (;;) {
      const stored = await adapter.getAggregate(userId)
      const { expected } = await evaluate(userId)
      const aggregate: StreakAggregate = {
        userId,
        currentStreak: expected.currentStreak,
        longestStreak: expected.longestStreak,
        lastCompletedLocalDate: expected.lastCompletedDate,
        updatedAt: clock().toISOString(),
        version: (stored?.version ?? 0) + 1,
      }

      if (stored) {
        if (await adapter.compareAndSetAggregate(userId, stored.version, aggregate)) return aggregate
        continue
      }

      // Aggregates are created by the first completion, never by an empty ledger
      if (expected.lastCompletedDate === null) return aggregate

      try {
        await adapter.insertAggregate(aggregate)
        return aggregate
      } catch (e) {
        if (!(e instanceof DuplicateKeyError)) throw e
        // Created concurrently; the next pass reads it
      }
    }
  }

  return { evaluate, recompute }
}
