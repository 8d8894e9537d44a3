/**
 * Internal Types
 *
 * Dependencies shared by the stateful internal modules, and the reader
 * interfaces they expose to one another.
 */

import type { Adapter, StreakAggregate } from '../adapter'
import type { StreakPolicy } from '../config'
import type { Logger } from '../logger'
import type { StreakSnapshot } from '../recalculation'
import type { LocalDate } from '../time-date'

export type Clock = () => Date

export type EngineDeps = {
  adapter: Adapter
  clock: Clock
  logger: Logger
  policy: StreakPolicy
  defaultTimezone: string
}

/** What a full recalculation would produce right now, without writing it. */
export type StreakEvaluation = {
  expected: StreakSnapshot
  /** Length of the run ending at the most recent date, ignoring elapsed time */
  runAtLastDate: number
}

export type Recalculator = {
  evaluate(userId: string): Promise<StreakEvaluation>
  recompute(userId: string): Promise<StreakAggregate>
}

export type StreakUpdater = {
  advance(userId: string, newLocalDate: LocalDate): Promise<StreakAggregate>
}
