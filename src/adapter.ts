/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory implementation.
 * All methods are async so synchronous (better-sqlite3) and networked stores
 * share one contract.
 *
 * Two logical collections: an append-only completion ledger unique on
 * (userId, localDate), and a streak aggregate cache keyed by userId.
 */

import { compareDates, type LocalDate } from './time-date'
import { DuplicateKeyError, InvalidDataError } from './errors'

export type { LocalDate } from './time-date'

// ============================================================================
// Error Classes
// ============================================================================

export { DuplicateKeyError, InvalidDataError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type CompletionSource = 'online' | 'offline_sync' | 'migration'

export type Completion = {
  id: string
  userId: string
  /** Authoritative date for all streak math */
  localDate: LocalDate
  /** Server instant of insertion (ISO 8601); audit only */
  recordedAtUtc: string
  timezoneIdentifier: string
  source: CompletionSource
  /** Client-reported completion instant, when the client sent one */
  clientCompletedAt?: string
}

export type StreakAggregate = {
  userId: string
  currentStreak: number
  longestStreak: number
  lastCompletedLocalDate: LocalDate | null
  updatedAt: string
  /** Starts at 1 and grows by one on every write; compareAndSetAggregate is conditioned on it */
  version: number
}

export type CompletionBatchResult = {
  inserted: number
  /** Rows skipped because (userId, localDate) was already on the ledger */
  duplicates: number
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  // Completion ledger
  /** Throws DuplicateKeyError when (userId, localDate) or id already exists */
  createCompletion(completion: Completion): Promise<void>
  /**
   * Inserts all rows as one atomic step. Rows whose (userId, localDate) is
   * taken are skipped; any other failure inserts none of them.
   */
  createCompletions(completions: readonly Completion[]): Promise<CompletionBatchResult>
  getCompletion(userId: string, localDate: LocalDate): Promise<Completion | null>
  /** Ascending by localDate */
  getCompletionsByUser(userId: string): Promise<Completion[]>
  /** Users with at least one completion, sorted */
  listUserIds(): Promise<string[]>

  // Streak aggregate
  getAggregate(userId: string): Promise<StreakAggregate | null>
  /** Throws DuplicateKeyError when the user already has an aggregate */
  insertAggregate(aggregate: StreakAggregate): Promise<void>
  /**
   * Writes `next` only if the stored version still equals `expectedVersion`.
   * Returns whether the write happened.
   */
  compareAndSetAggregate(userId: string, expectedVersion: number, next: StreakAggregate): Promise<boolean>

  // Lifecycle (optional; persistent adapters implement it)
  close?(): Promise<void>
}

// ============================================================================
// Shared Checks
// ============================================================================

export function assertAggregateShape(aggregate: StreakAggregate): void {
  const { currentStreak, longestStreak } = aggregate
  if (!Number.isInteger(currentStreak) || currentStreak < 0) {
    throw new InvalidDataError(`currentStreak must be a non-negative integer, got ${currentStreak}`)
  }
  if (!Number.isInteger(longestStreak) || longestStreak < 0) {
    throw new InvalidDataError(`longestStreak must be a non-negative integer, got ${longestStreak}`)
  }
  if (currentStreak > longestStreak) {
    throw new InvalidDataError(
      `currentStreak (${currentStreak}) exceeds longestStreak (${longestStreak}) for '${aggregate.userId}'`,
    )
  }
  if (!Number.isInteger(aggregate.version) || aggregate.version < 1) {
    throw new InvalidDataError(`version must be a positive integer, got ${aggregate.version}`)
  }
}

// ============================================================================
// Memory Adapter
// ============================================================================

export function createMemoryAdapter(): Adapter {
  // ---- State ----
  const state = {
    completions: new Map<string, Completion>(),
    // `${userId}\u0000${localDate}` → completion id
    completionKeys: new Map<string, string>(),
    aggregates: new Map<string, StreakAggregate>(),
  }

  // ---- Rollback ----
  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function completionKey(userId: string, localDate: LocalDate): string {
    return `${userId}\u0000${localDate}`
  }

  function insertCompletion(completion: Completion) {
    const key = completionKey(completion.userId, completion.localDate)
    if (state.completionKeys.has(key)) {
      throw new DuplicateKeyError(
        `Completion for user '${completion.userId}' on '${completion.localDate}' already exists`,
      )
    }
    if (state.completions.has(completion.id)) {
      throw new DuplicateKeyError(`Completion '${completion.id}' already exists`)
    }
    state.completions.set(completion.id, clone(completion))
    state.completionKeys.set(key, completion.id)
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Completion
    // ================================================================
    async createCompletion(completion: Completion) {
      insertCompletion(completion)
    },

    async createCompletions(completions: readonly Completion[]) {
      // Runs without awaiting, so no other call can interleave with the batch
      const snapshot = clone(state)
      let inserted = 0
      let duplicates = 0
      try {
        for (const completion of completions) {
          if (state.completionKeys.has(completionKey(completion.userId, completion.localDate))) {
            duplicates++
            continue
          }
          insertCompletion(completion)
          inserted++
        }
      } catch (e) {
        restoreState(snapshot)
        throw e
      }
      return { inserted, duplicates }
    },

    async getCompletion(userId: string, localDate: LocalDate) {
      const id = state.completionKeys.get(completionKey(userId, localDate))
      const c = id === undefined ? undefined : state.completions.get(id)
      return c ? clone(c) : null
    },

    async getCompletionsByUser(userId: string) {
      return [...state.completions.values()]
        .filter((c) => c.userId === userId)
        .sort((a, b) => compareDates(a.localDate, b.localDate))
        .map(clone)
    },

    async listUserIds() {
      const ids = new Set<string>()
      for (const c of state.completions.values()) ids.add(c.userId)
      return [...ids].sort()
    },

    // ================================================================
    // Streak Aggregate
    // ================================================================
    async getAggregate(userId: string) {
      const a = state.aggregates.get(userId)
      return a ? clone(a) : null
    },

    async insertAggregate(aggregate: StreakAggregate) {
      assertAggregateShape(aggregate)
      if (state.aggregates.has(aggregate.userId)) {
        throw new DuplicateKeyError(`Streak aggregate for '${aggregate.userId}' already exists`)
      }
      state.aggregates.set(aggregate.userId, clone(aggregate))
    },

    async compareAndSetAggregate(userId: string, expectedVersion: number, next: StreakAggregate) {
      assertAggregateShape(next)
      const existing = state.aggregates.get(userId)
      if (!existing || existing.version !== expectedVersion) {
        return false
      }
      state.aggregates.set(userId, clone({ ...next, userId }))
      return true
    },
  }

  return adapter
}
