/**
 * Internal Helpers
 *
 * Small pure utilities shared across internal modules.
 */

import type { StreakAggregate } from '../adapter'
import { EMPTY_SNAPSHOT, type StreakSnapshot } from '../recalculation'

// ============================================================================
// ID Generation
// ============================================================================

export function uuid(): string {
  return crypto.randomUUID()
}

// ============================================================================
// Aggregate ↔ Snapshot
// ============================================================================

export function toSnapshot(aggregate: StreakAggregate | null): StreakSnapshot {
  if (!aggregate) return { ...EMPTY_SNAPSHOT }
  return {
    currentStreak: aggregate.currentStreak,
    longestStreak: aggregate.longestStreak,
    lastCompletedDate: aggregate.lastCompletedLocalDate,
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
