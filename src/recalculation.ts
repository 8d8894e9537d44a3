/**
 * Full Recalculation
 *
 * Ground truth for a user's streak: a deterministic function of the complete
 * set of completion dates. The incremental updater is a cache of this.
 */

import { type LocalDate, addDays, compareDates, daysBetween } from './time-date'

export type StreakSnapshot = {
  currentStreak: number
  longestStreak: number
  lastCompletedDate: LocalDate | null
}

export const EMPTY_SNAPSHOT: Readonly<StreakSnapshot> = {
  currentStreak: 0,
  longestStreak: 0,
  lastCompletedDate: null,
}

/**
 * Compute current and longest streak from completion dates (any order,
 * duplicates allowed) as seen on `today`.
 *
 * The current streak is the run ending at the most recent date, or 0 when that
 * date is more than one day before `today`.
 */
export function computeStreak(dates: readonly LocalDate[], today: LocalDate): StreakSnapshot {
  const sorted = [...new Set(dates)].sort(compareDates)
  const mostRecent = sorted[sorted.length - 1]
  if (mostRecent === undefined) return { ...EMPTY_SNAPSHOT }

  let longest = 1
  let run = 1
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1]
    const curr = sorted[i]
    if (prev !== undefined && curr !== undefined && addDays(prev, 1) === curr) {
      run++
    } else {
      run = 1
    }
    if (run > longest) longest = run
  }

  let current = 0
  if (daysBetween(mostRecent, today) <= 1) {
    current = 1
    for (let i = sorted.length - 2; i >= 0; i--) {
      const later = sorted[i + 1]
      const earlier = sorted[i]
      if (later === undefined || earlier === undefined || addDays(earlier, 1) !== later) break
      current++
    }
  }

  return { currentStreak: current, longestStreak: longest, lastCompletedDate: mostRecent }
}
