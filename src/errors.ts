/**
 * Consolidated error system for streak-ledger.
 *
 * All error classes extend StreakError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they are working with.
 */

import type { LocalDate } from './time-date'

// ============================================================================
// Error Codes
// ============================================================================

export const StreakErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Configuration & input
  VALIDATION: 'VALIDATION',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Anti-cheat
  COMPLETION_REJECTED: 'COMPLETION_REJECTED',

  // Streak update (never leaves the engine)
  CONCURRENT_UPDATE_CONFLICT: 'CONCURRENT_UPDATE_CONFLICT',

  // Lifecycle
  ENGINE_CLOSED: 'ENGINE_CLOSED',
} as const

export type StreakErrorCode = (typeof StreakErrorCode)[keyof typeof StreakErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class StreakError extends Error {
  readonly code: StreakErrorCode

  constructor(code: StreakErrorCode, message: string) {
    super(message)
    this.name = 'StreakError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends StreakError {
  constructor(message: string) {
    super(StreakErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class InvalidDataError extends StreakError {
  constructor(message: string) {
    super(StreakErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ValidationError extends StreakError {
  constructor(message: string) {
    super(StreakErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends StreakError {
  constructor(message: string) {
    super(StreakErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Anti-Cheat Errors
// ============================================================================

export const RejectionReason = {
  INVALID_DATE_FORMAT: 'InvalidDateFormat',
  UNKNOWN_TIMEZONE: 'UnknownTimezone',
  FUTURE_DATE_REJECTED: 'FutureDateRejected',
  BACKDATE_REJECTED: 'BackdateRejected',
} as const

export type RejectionReason = (typeof RejectionReason)[keyof typeof RejectionReason]

export type RejectionDetails = {
  claimedDate: string
  timezoneId: string
  /** Server's view of "today" in the claimed zone; absent when the zone never resolved */
  serverLocalDate?: LocalDate
  /** claimedDate − serverLocalDate, in days */
  offsetDays?: number
}

/**
 * A client claim that failed anti-cheat validation. Non-retryable: the same
 * claim will be rejected again.
 */
export class CompletionRejectedError extends StreakError {
  readonly reason: RejectionReason
  readonly details: RejectionDetails

  constructor(reason: RejectionReason, message: string, details: RejectionDetails) {
    super(StreakErrorCode.COMPLETION_REJECTED, message)
    this.name = 'CompletionRejectedError'
    this.reason = reason
    this.details = details
  }
}

// ============================================================================
// Streak Update Errors
// ============================================================================

/** Raised when a conditional aggregate write loses to a concurrent writer. */
export class ConcurrentUpdateConflictError extends StreakError {
  readonly userId: string

  constructor(userId: string, expectedVersion: number) {
    super(
      StreakErrorCode.CONCURRENT_UPDATE_CONFLICT,
      `Streak aggregate for '${userId}' changed since it was read (expected version ${expectedVersion})`,
    )
    this.name = 'ConcurrentUpdateConflictError'
    this.userId = userId
  }
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

export class EngineClosedError extends StreakError {
  constructor() {
    super(StreakErrorCode.ENGINE_CLOSED, 'Streak engine has been closed')
    this.name = 'EngineClosedError'
  }
}
