/**
 * Completion Recorder
 *
 * The single write path for streak state: validate the claim, append it to the
 * ledger, then advance the aggregate. A claim for a day already on the ledger
 * is an idempotent no-op, reported through `isDuplicate`.
 */

import type { CompletionSource } from '../adapter'
import { validateCompletion } from '../anti-cheat'
import { DuplicateKeyError } from '../errors'
import type { StreakSnapshot } from '../recalculation'
import { toSnapshot, uuid } from './helpers'
import type { EngineDeps, StreakUpdater } from './types'

export type RecordOptions = {
  /** Client-side completion instant, kept for audit */
  clientCompletedAt?: string
}

export type RecordResult = StreakSnapshot & {
  isDuplicate: boolean
}

type CompletionRecorderDeps = Pick<EngineDeps, 'adapter' | 'clock' | 'policy'> & {
  updater: StreakUpdater
}

export function createCompletionRecorder(deps: CompletionRecorderDeps) {
  const { adapter, clock, policy, updater } = deps

  async function record(
    userId: string,
    localDateStr: string,
    timezoneId: string,
    source: CompletionSource,
    options: RecordOptions = {},
  ): Promise<RecordResult> {
    const now = clock()

    const validated = validateCompletion(localDateStr, timezoneId, now, policy)
    if (!validated.ok) throw validated.error
    const localDate = validated.value

    try {
      await adapter.createCompletion({
        id: uuid(),
        userId,
        localDate,
        recordedAtUtc: now.toISOString(),
        timezoneIdentifier: timezoneId,
        source,
        ...(options.clientCompletedAt != null ? { clientCompletedAt: options.clientCompletedAt } : {}),
      })
    } catch (e) {
      if (!(e instanceof DuplicateKeyError)) throw e
      const aggregate = await adapter.getAggregate(userId)
      return { ...toSnapshot(aggregate), isDuplicate: true }
    }

    const aggregate = await updater.advance(userId, localDate)
    return { ...toSnapshot(aggregate), isDuplicate: false }
  }

  return { record }
}

export type CompletionRecorder = ReturnType<typeof createCompletionRecorder>
