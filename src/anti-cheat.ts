/**
 * Anti-Cheat Validation
 *
 * Bounds how far a client-controlled clock can move the ledger. The claimed
 * date is compared against the server's own belief about "today" in the
 * claimed timezone; no other server-side timezone truth is assumed.
 */

import { type Result, Ok, Err } from './result'
import { type LocalDate, parseDate, isValidTimezone, localDateInZone, daysBetween } from './time-date'
import { CompletionRejectedError, RejectionReason } from './errors'
import { DEFAULT_POLICY, type StreakPolicy } from './config'

export { CompletionRejectedError, RejectionReason } from './errors'

type ValidationPolicy = Pick<StreakPolicy, 'maxFutureDays' | 'maxBackdateDays'>

export function validateCompletion(
  localDateStr: string,
  timezoneId: string,
  serverUtcNow: Date,
  policy: ValidationPolicy = DEFAULT_POLICY,
): Result<LocalDate, CompletionRejectedError> {
  const parsed = parseDate(localDateStr)
  if (!parsed.ok) {
    return Err(new CompletionRejectedError(
      RejectionReason.INVALID_DATE_FORMAT,
      `Invalid date format: ${localDateStr}`,
      { claimedDate: localDateStr, timezoneId },
    ))
  }

  if (!isValidTimezone(timezoneId)) {
    return Err(new CompletionRejectedError(
      RejectionReason.UNKNOWN_TIMEZONE,
      `Unknown timezone: ${timezoneId}`,
      { claimedDate: localDateStr, timezoneId },
    ))
  }

  const claimed = parsed.value
  const serverLocalDate = localDateInZone(serverUtcNow, timezoneId)
  const offsetDays = daysBetween(serverLocalDate, claimed)
  const details = { claimedDate: localDateStr, timezoneId, serverLocalDate, offsetDays }

  if (offsetDays > policy.maxFutureDays) {
    return Err(new CompletionRejectedError(
      RejectionReason.FUTURE_DATE_REJECTED,
      `Future date rejected: claimed ${localDateStr}, server sees ${serverLocalDate} in ${timezoneId}`,
      details,
    ))
  }

  if (offsetDays < -policy.maxBackdateDays) {
    return Err(new CompletionRejectedError(
      RejectionReason.BACKDATE_REJECTED,
      `Backdate rejected: claimed ${localDateStr}, server sees ${serverLocalDate} in ${timezoneId} ` +
        `(max ${policy.maxBackdateDays} days back)`,
      details,
    ))
  }

  return Ok(claimed)
}
