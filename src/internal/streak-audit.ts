/**
 * Streak Audit
 *
 * Checks stored aggregates against a fresh recalculation and optionally
 * repairs them.
 */

import type { StreakSnapshot } from '../recalculation'
import { toSnapshot } from './helpers'
import type { EngineDeps, Recalculator } from './types'

export type AuditOptions = {
  /** Overwrite inconsistent aggregates with the recalculated values */
  repair?: boolean
}

export type AuditReport = {
  userId: string
  stored: StreakSnapshot
  expected: StreakSnapshot
  consistent: boolean
  repaired: boolean
}

type StreakAuditorDeps = Pick<EngineDeps, 'adapter' | 'logger'> & {
  recalculator: Recalculator
}

export function createStreakAuditor(deps: StreakAuditorDeps) {
  const { adapter, logger, recalculator } = deps

  async function audit(userId: string, options: AuditOptions = {}): Promise<AuditReport> {
    const stored = toSnapshot(await adapter.getAggregate(userId))
    const { expected, runAtLastDate } = await recalculator.evaluate(userId)

    // The incremental path never decays currentStreak as days pass, so a run
    // that has since been broken by elapsed time is still consistent.
    const currentMatches =
      stored.currentStreak === expected.currentStreak ||
      (expected.currentStreak === 0 && stored.currentStreak === runAtLastDate)

    const consistent =
      currentMatches &&
      stored.longestStreak === expected.longestStreak &&
      stored.lastCompletedDate === expected.lastCompletedDate

    let repaired = false
    if (!consistent) {
      logger.warn('Streak aggregate out of sync with ledger', { userId, stored, expected })
      if (options.repair) {
        await recalculator.recompute(userId)
        repaired = true
      }
    }

    return { userId, stored, expected, consistent, repaired }
  }

  async function auditAll(options: AuditOptions = {}): Promise<AuditReport[]> {
    const reports: AuditReport[] = []
    for (const userId of await adapter.listUserIds()) {
      reports.push(await audit(userId, options))
    }
    return reports
  }

  return { audit, auditAll }
}
