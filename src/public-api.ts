/**
 * Public API Module
 *
 * Consumer-facing interface that ties the components together: config
 * validation, dependency wiring, and the adapter lifecycle.
 */

import type { Adapter, Completion, CompletionSource } from './adapter'
import { resolvePolicy, type MigrationOrder, type StreakPolicy } from './config'
import { EngineClosedError, ValidationError } from './errors'
import { createConsoleLogger, type Logger } from './logger'
import type { StreakSnapshot } from './recalculation'
import { isValidTimezone } from './time-date'
import { createBatchSync, type SyncBatchResult } from './internal/batch-sync'
import { createCompletionRecorder, type RecordOptions, type RecordResult } from './internal/completion-recorder'
import {
  createLegacyMigrator,
  type LegacyTaskRecord,
  type MigrationOptions,
  type MigrationReport,
} from './internal/legacy-migrator'
import { createRecalculator } from './internal/recalculator'
import { createStreakAuditor, type AuditOptions, type AuditReport } from './internal/streak-audit'
import { createStreakUpdater } from './internal/streak-updater'
import { toSnapshot } from './internal/helpers'
import type { Clock } from './internal/types'

// ============================================================================
// Error Classes
// ============================================================================

export { ValidationError, EngineClosedError, CompletionRejectedError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'
export type { Clock } from './internal/types'
export type { RecordOptions, RecordResult } from './internal/completion-recorder'
export type {
  OfflineCompletion, SyncBatchResult, SyncItemResult, SyncItemStatus,
  SyncCounts, SyncRejectionReason,
} from './internal/batch-sync'
export type { LegacyTaskRecord, MigrationOptions, MigrationReport } from './internal/legacy-migrator'
export type { AuditOptions, AuditReport } from './internal/streak-audit'

export type StreakEngineConfig = {
  adapter: Adapter
  /** Source of the server's current instant; defaults to `() => new Date()` */
  clock?: Clock
  logger?: Logger
  policy?: Partial<StreakPolicy>
  /** Zone used to judge "today" for a user with no completions, and for migrated rows */
  defaultTimezone?: string
  migrationOrder?: MigrationOrder
}

export type StreakEngine = {
  /** Record one completion. Throws CompletionRejectedError for implausible claims. */
  record(
    userId: string,
    localDate: string,
    timezoneId: string,
    source?: CompletionSource,
    options?: RecordOptions,
  ): Promise<RecordResult>

  /** Replay a client's offline buffer; never throws for individual items. */
  syncBatch(userId: string, items: readonly unknown[]): Promise<SyncBatchResult>

  /** Rebuild the user's aggregate from the full ledger. */
  recompute(userId: string): Promise<StreakSnapshot>

  /** Stored aggregate, or zeros when the user has never completed. */
  getStreak(userId: string): Promise<StreakSnapshot>

  getCompletions(userId: string): Promise<Completion[]>

  migrateLegacyCompletions(
    userId: string,
    records: readonly LegacyTaskRecord[],
    options?: MigrationOptions,
  ): Promise<MigrationReport>

  audit(userId: string, options?: AuditOptions): Promise<AuditReport>
  auditAll(options?: AuditOptions): Promise<AuditReport[]>

  /** Closes the adapter. Later calls reject with EngineClosedError. */
  close(): Promise<void>
}

// ============================================================================
// Factory
// ============================================================================

export function createStreakEngine(config: StreakEngineConfig): StreakEngine {
  if (!config.adapter || typeof config.adapter !== 'object') {
    throw new ValidationError('Adapter is required')
  }
  if (config.clock !== undefined && typeof config.clock !== 'function') {
    throw new ValidationError('Clock must be a function returning a Date')
  }

  const defaultTimezone = config.defaultTimezone ?? 'UTC'
  if (!isValidTimezone(defaultTimezone)) {
    throw new ValidationError(`Invalid timezone: ${defaultTimezone}`)
  }

  const deps = {
    adapter: config.adapter,
    clock: config.clock ?? (() => new Date()),
    logger: config.logger ?? createConsoleLogger('info'),
    policy: resolvePolicy(config.policy),
    defaultTimezone,
  }

  const recalculator = createRecalculator(deps)
  const updater = createStreakUpdater({ ...deps, recalculator })
  const recorder = createCompletionRecorder({ ...deps, updater })
  const batchSync = createBatchSync({ ...deps, recorder })
  const migrator = createLegacyMigrator({
    ...deps,
    recalculator,
    defaultOrder: config.migrationOrder ?? 'first-seen',
  })
  const auditor = createStreakAuditor({ ...deps, recalculator })

  let closed = false

  function ensureOpen() {
    if (closed) throw new EngineClosedError()
  }

  return {
    async record(userId, localDate, timezoneId, source = 'online', options = {}) {
      ensureOpen()
      return recorder.record(userId, localDate, timezoneId, source, options)
    },

    async syncBatch(userId, items) {
      ensureOpen()
      return batchSync.syncBatch(userId, items)
    },

    async recompute(userId) {
      ensureOpen()
      return toSnapshot(await recalculator.recompute(userId))
    },

    async getStreak(userId) {
      ensureOpen()
      return toSnapshot(await deps.adapter.getAggregate(userId))
    },

    async getCompletions(userId) {
      ensureOpen()
      return deps.adapter.getCompletionsByUser(userId)
    },

    async migrateLegacyCompletions(userId, records, options = {}) {
      ensureOpen()
      return migrator.migrate(userId, records, options)
    },

    async audit(userId, options = {}) {
      ensureOpen()
      return auditor.audit(userId, options)
    },

    async auditAll(options = {}) {
      ensureOpen()
      return auditor.auditAll(options)
    },

    async close() {
      if (closed) return
      closed = true
      await deps.adapter.close?.()
    },
  }
}
