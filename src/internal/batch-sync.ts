/**
 * Offline Batch Sync
 *
 * Replays client-buffered completions through the recorder, oldest date
 * first and strictly one at a time, so the updater sees them in calendar
 * order and stays on its incremental path.
 */

import { z } from 'zod'
import { CompletionRejectedError, type RejectionReason } from '../errors'
import type { StreakSnapshot } from '../recalculation'
import { errorMessage, toSnapshot } from './helpers'
import type { CompletionRecorder } from './completion-recorder'
import type { EngineDeps } from './types'

// ============================================================================
// Types
// ============================================================================

const TaskIdSchema = z.union([z.string(), z.number().finite().transform((n) => String(n))])

// Parsed on its own so a malformed item still reports the task it came from
const ItemEnvelopeSchema = z.object({
  taskId: TaskIdSchema.nullish().catch(undefined),
})

const OfflineCompletionSchema = ItemEnvelopeSchema.extend({
  completionLocalDate: z.string().nullish(),
  timezoneIdentifier: z.string().nullish(),
  completedAt: z.string().nullish(),
})

export type OfflineCompletion = z.infer<typeof OfflineCompletionSchema>

export type SyncItemStatus = 'recorded' | 'duplicate' | 'rejected' | 'error'

export type SyncRejectionReason = RejectionReason | 'MissingDate' | 'MalformedItem'

export type SyncItemResult = {
  taskId: string
  status: SyncItemStatus
  reason?: SyncRejectionReason
  error?: string
}

export type SyncCounts = {
  processed: number
  recorded: number
  duplicate: number
  rejected: number
  errored: number
}

export type SyncBatchResult = {
  /** Set when the whole batch was refused without processing any item */
  error: string | null
  finalStreak: StreakSnapshot
  results: SyncItemResult[]
  counts: SyncCounts
}

type PreparedItem =
  | { kind: 'ok'; taskId: string; item: OfflineCompletion }
  | { kind: 'malformed'; taskId: string; message: string }

type BatchSyncDeps = Pick<EngineDeps, 'adapter' | 'logger' | 'policy'> & {
  recorder: CompletionRecorder
}

const UNKNOWN_TASK = 'unknown'
const FALLBACK_TIMEZONE = 'UTC'

// ============================================================================
// Helpers
// ============================================================================

function emptyCounts(processed: number): SyncCounts {
  return { processed, recorded: 0, duplicate: 0, rejected: 0, errored: 0 }
}

function describe(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

function prepare(raw: unknown): PreparedItem {
  const envelope = ItemEnvelopeSchema.safeParse(raw)
  if (!envelope.success) {
    return { kind: 'malformed', taskId: UNKNOWN_TASK, message: describe(envelope.error) }
  }
  const taskId = envelope.data.taskId ?? UNKNOWN_TASK
  const parsed = OfflineCompletionSchema.safeParse(raw)
  if (!parsed.success) {
    return { kind: 'malformed', taskId, message: describe(parsed.error) }
  }
  return { kind: 'ok', taskId, item: parsed.data }
}

function sortKey(p: PreparedItem): string {
  return p.kind === 'ok' ? p.item.completionLocalDate ?? '' : ''
}

// ============================================================================
// Batch Sync
// ============================================================================

export function createBatchSync(deps: BatchSyncDeps) {
  const { adapter, logger, policy, recorder } = deps

  async function syncBatch(userId: string, items: readonly unknown[]): Promise<SyncBatchResult> {
    if (items.length > policy.maxBatchSize) {
      const error = `Batch too large: ${items.length} > ${policy.maxBatchSize}`
      logger.warn('Offline batch refused', { userId, size: items.length, max: policy.maxBatchSize })
      return {
        error,
        finalStreak: toSnapshot(await adapter.getAggregate(userId)),
        results: [],
        counts: emptyCounts(0),
      }
    }

    // Array.prototype.sort is stable, so equal dates keep submission order
    const ordered = items.map(prepare).sort((a, b) => {
      const ka = sortKey(a)
      const kb = sortKey(b)
      return ka < kb ? -1 : ka > kb ? 1 : 0
    })

    const results: SyncItemResult[] = []
    const counts = emptyCounts(ordered.length)
    let finalStreak: StreakSnapshot | null = null

    for (const prepared of ordered) {
      if (prepared.kind === 'malformed') {
        results.push({ taskId: prepared.taskId, status: 'rejected', reason: 'MalformedItem', error: prepared.message })
        counts.rejected++
        continue
      }

      const { taskId, item } = prepared
      // null and '' count as absent
      if (!item.completionLocalDate) {
        results.push({ taskId, status: 'rejected', reason: 'MissingDate', error: 'Missing completionLocalDate' })
        counts.rejected++
        continue
      }

      try {
        const result = await recorder.record(
          userId,
          item.completionLocalDate,
          item.timezoneIdentifier ?? FALLBACK_TIMEZONE,
          'offline_sync',
          item.completedAt != null ? { clientCompletedAt: item.completedAt } : {},
        )
        if (result.isDuplicate) {
          results.push({ taskId, status: 'duplicate' })
          counts.duplicate++
        } else {
          results.push({ taskId, status: 'recorded' })
          counts.recorded++
        }
        finalStreak = {
          currentStreak: result.currentStreak,
          longestStreak: result.longestStreak,
          lastCompletedDate: result.lastCompletedDate,
        }
      } catch (e) {
        if (e instanceof CompletionRejectedError) {
          results.push({ taskId, status: 'rejected', reason: e.reason, error: e.message })
          counts.rejected++
        } else {
          logger.error('Offline completion failed', { userId, taskId, error: errorMessage(e) })
          results.push({ taskId, status: 'error', error: errorMessage(e) })
          counts.errored++
        }
      }
    }

    return {
      error: null,
      finalStreak: finalStreak ?? toSnapshot(await adapter.getAggregate(userId)),
      results,
      counts,
    }
  }

  return { syncBatch }
}

export type BatchSync = ReturnType<typeof createBatchSync>
