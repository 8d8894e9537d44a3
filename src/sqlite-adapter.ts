/**
 * SQLite Adapter
 *
 * Production implementation of the streak adapter using better-sqlite3.
 * The (user_id, local_date) uniqueness and the aggregate invariants live in the
 * schema, so concurrent duplicates are rejected by the store itself.
 */
import Database from 'better-sqlite3'
import type { Adapter, Completion, CompletionBatchResult, CompletionSource, StreakAggregate, LocalDate } from './adapter'
import { DuplicateKeyError, InvalidDataError } from './errors'

// Re-export errors so callers can import them beside the adapter
export { DuplicateKeyError, InvalidDataError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  getSchemaVersion(): Promise<number>
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS completion (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    local_date TEXT NOT NULL,
    recorded_at_utc TEXT NOT NULL,
    timezone_identifier TEXT NOT NULL,
    source TEXT NOT NULL CHECK (source IN ('online', 'offline_sync', 'migration')),
    client_completed_at TEXT,
    UNIQUE(user_id, local_date)
  );
  CREATE INDEX IF NOT EXISTS idx_completion_user_date_desc ON completion(user_id, local_date DESC);

  CREATE TABLE IF NOT EXISTS streak_aggregate (
    user_id TEXT PRIMARY KEY,
    current_streak INTEGER NOT NULL CHECK (current_streak >= 0),
    longest_streak INTEGER NOT NULL CHECK (longest_streak >= current_streak),
    last_completed_local_date TEXT,
    updated_at TEXT NOT NULL,
    version INTEGER NOT NULL CHECK (version >= 1)
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint|PRIMARY KEY/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type CompletionRow = {
  id: string
  user_id: string
  local_date: string
  recorded_at_utc: string
  timezone_identifier: string
  source: CompletionSource
  client_completed_at: string | null
}

type AggregateRow = {
  user_id: string
  current_streak: number
  longest_streak: number
  last_completed_local_date: string | null
  updated_at: string
  version: number
}

type SchemaVersionRow = {
  v: number | null
}

type NameRow = {
  name: string
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

// Dates are only written through LocalDate-typed fields, so stored text is a valid LocalDate.
function toCompletion(row: CompletionRow): Completion {
  return {
    id: row.id,
    userId: row.user_id,
    localDate: row.local_date as LocalDate,
    recordedAtUtc: row.recorded_at_utc,
    timezoneIdentifier: row.timezone_identifier,
    source: row.source,
    ...(row.client_completed_at != null ? { clientCompletedAt: row.client_completed_at } : {}),
  }
}

function toAggregate(row: AggregateRow): StreakAggregate {
  return {
    userId: row.user_id,
    currentStreak: row.current_streak,
    longestStreak: row.longest_streak,
    lastCompletedLocalDate: row.last_completed_local_date as LocalDate | null,
    updatedAt: row.updated_at,
    version: row.version,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.pragma('journal_mode = WAL')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare<[number, string]>('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const selectCompletion = db.prepare<[string, string], CompletionRow>(
    'SELECT * FROM completion WHERE user_id = ? AND local_date = ?',
  )
  const selectCompletionsByUser = db.prepare<[string], CompletionRow>(
    'SELECT * FROM completion WHERE user_id = ? ORDER BY local_date ASC',
  )
  const selectAggregate = db.prepare<[string], AggregateRow>(
    'SELECT * FROM streak_aggregate WHERE user_id = ?',
  )
  const insertCompletion = db.prepare<[string, string, string, string, string, string, string | null]>(
    'INSERT INTO completion (id, user_id, local_date, recorded_at_utc, timezone_identifier, source, client_completed_at) VALUES (?, ?, ?, ?, ?, ?, ?)',
  )

  function runInsert(completion: Completion) {
    insertCompletion.run(
      completion.id,
      completion.userId,
      completion.localDate,
      completion.recordedAtUtc,
      completion.timezoneIdentifier,
      completion.source,
      completion.clientCompletedAt ?? null,
    )
  }

  // better-sqlite3 transactions are synchronous: nothing else runs on this connection until it commits
  const insertBatch = db.transaction((completions: readonly Completion[]): CompletionBatchResult => {
    let inserted = 0
    let duplicates = 0
    for (const completion of completions) {
      if (selectCompletion.get(completion.userId, completion.localDate)) {
        duplicates++
        continue
      }
      runInsert(completion)
      inserted++
    }
    return { inserted, duplicates }
  })

  const adapter: SqliteAdapter = {
    // ================================================================
    // Completion
    // ================================================================
    async createCompletion(completion: Completion) {
      safe(() => runInsert(completion))
    },

    async createCompletions(completions: readonly Completion[]) {
      return safe(() => insertBatch(completions))
    },

    async getCompletion(userId: string, localDate: LocalDate) {
      const row = selectCompletion.get(userId, localDate)
      return row ? toCompletion(row) : null
    },

    async getCompletionsByUser(userId: string) {
      return selectCompletionsByUser.all(userId).map(toCompletion)
    },

    async listUserIds() {
      const rows = db.prepare<[], { user_id: string }>(
        'SELECT DISTINCT user_id FROM completion ORDER BY user_id',
      ).all()
      return rows.map((r) => r.user_id)
    },

    // ================================================================
    // Streak Aggregate
    // ================================================================
    async getAggregate(userId: string) {
      const row = selectAggregate.get(userId)
      return row ? toAggregate(row) : null
    },

    async insertAggregate(aggregate: StreakAggregate) {
      safe(() =>
        db.prepare<[string, number, number, string | null, string, number]>(
          'INSERT INTO streak_aggregate (user_id, current_streak, longest_streak, last_completed_local_date, updated_at, version) VALUES (?, ?, ?, ?, ?, ?)',
        ).run(
          aggregate.userId,
          aggregate.currentStreak,
          aggregate.longestStreak,
          aggregate.lastCompletedLocalDate,
          aggregate.updatedAt,
          aggregate.version,
        ),
      )
    },

    async compareAndSetAggregate(userId: string, expectedVersion: number, next: StreakAggregate) {
      const info = safe(() =>
        db.prepare<[number, number, string | null, string, number, string, number]>(`
          UPDATE streak_aggregate
          SET current_streak = ?, longest_streak = ?, last_completed_local_date = ?, updated_at = ?, version = ?
          WHERE user_id = ? AND version = ?
        `).run(
          next.currentStreak,
          next.longestStreak,
          next.lastCompletedLocalDate,
          next.updatedAt,
          next.version,
          userId,
          expectedVersion,
        ),
      )
      return info.changes === 1
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras (introspection)
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], NameRow>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async getTableColumns(table: string) {
      const rows = db.prepare<[], NameRow>(`PRAGMA table_info("${table}")`).all()
      return rows.map((r) => r.name)
    },

    async listIndices(table: string) {
      const rows = db.prepare<[], NameRow>(`PRAGMA index_list("${table}")`).all()
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },
  }

  return adapter
}
