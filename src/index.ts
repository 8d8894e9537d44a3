/**
 * streak-ledger
 *
 * Public API exports
 */

// Error system (base class, codes, error classes)
export {
  StreakError, StreakErrorCode,
  DuplicateKeyError, InvalidDataError,
  ValidationError, ParseError,
  CompletionRejectedError, RejectionReason,
  ConcurrentUpdateConflictError, EngineClosedError,
} from './errors'
export type { RejectionDetails } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, makeDate, yearOf, monthOf, dayOf,
  addDays, daysBetween, compareDates,
  isValidTimezone, localDateInZone,
} from './time-date'

// Configuration & logging
export type { StreakPolicy, MigrationOrder, ServiceConfig } from './config'
export { DEFAULT_POLICY, resolvePolicy, loadConfig } from './config'
export type { Logger, LogLevel } from './logger'
export { createConsoleLogger, silentLogger } from './logger'

// Anti-cheat
export { validateCompletion } from './anti-cheat'

// Full recalculation
export type { StreakSnapshot } from './recalculation'
export { computeStreak, EMPTY_SNAPSHOT } from './recalculation'

// Adapter (persistence interface + in-memory implementation)
export type { Adapter, Completion, CompletionBatchResult, CompletionSource, StreakAggregate } from './adapter'
export { createMemoryAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// High-level API
export type {
  StreakEngine, StreakEngineConfig, Clock,
  RecordOptions, RecordResult,
  OfflineCompletion, SyncBatchResult, SyncItemResult, SyncItemStatus, SyncCounts, SyncRejectionReason,
  LegacyTaskRecord, MigrationOptions, MigrationReport,
  AuditOptions, AuditReport,
} from './public-api'
export { createStreakEngine } from './public-api'

// Service bootstrap
export type { StreakService, ServiceOverrides } from './service'
export { openStreakService } from './service'
