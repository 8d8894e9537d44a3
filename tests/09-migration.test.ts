/**
 * Segment 09: Legacy Migration Tests
 *
 * Backfills the ledger from legacy task records in one atomic batch, skipping
 * anti-cheat, then runs one full recompute.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createMemoryAdapter, type Adapter } from '../src/adapter'
import type { MigrationOrder } from '../src/config'
import { DuplicateKeyError, ValidationError } from '../src/errors'
import { silentLogger, type Logger } from '../src/logger'
import { createLegacyMigrator } from '../src/internal/legacy-migrator'
import { createRecalculator } from '../src/internal/recalculator'
import { addDays, type LocalDate } from '../src/time-date'

// ============================================================================
// Test Helpers
// ============================================================================

const clock = () => new Date('2026-02-16T12:00:00Z')

let adapter: Adapter

function buildMigrator(options: { logger?: Logger; order?: MigrationOrder } = {}) {
  const recalculator = createRecalculator({ adapter, clock, defaultTimezone: 'UTC' })
  return createLegacyMigrator({
    adapter,
    clock,
    logger: options.logger ?? silentLogger,
    defaultTimezone: 'UTC',
    recalculator,
    defaultOrder: options.order ?? 'first-seen',
  })
}

beforeEach(() => {
  adapter = createMemoryAdapter()
})

// ============================================================================
// 1. BACKFILL
// ============================================================================

describe('Backfill', () => {
  it('migrates completed records and recomputes once', async () => {
    const report = await buildMigrator().migrate('alice', [
      { date: '2026-02-14', isCompleted: true },
      { date: '2026-02-15', isCompleted: true },
      { date: '2026-02-16', isCompleted: true },
      { date: '2026-02-10', isCompleted: false },
    ])

    expect(report).toEqual({
      migrated: 3,
      skippedDuplicate: 0,
      skippedInvalid: 0,
      streak: { currentStreak: 3, longestStreak: 3, lastCompletedDate: '2026-02-16' },
    })
    expect(await adapter.getAggregate('alice')).toMatchObject({ currentStreak: 3, longestStreak: 3 })
  })

  it('stamps migrated rows with source, zone and server time', async () => {
    await buildMigrator().migrate('alice', [
      { date: '2026-02-16', isCompleted: true, completedAt: '2026-02-16T07:00:00Z' },
    ])
    const [stored] = await adapter.getCompletionsByUser('alice')
    expect(stored).toMatchObject({
      localDate: '2026-02-16',
      source: 'migration',
      timezoneIdentifier: 'UTC',
      recordedAtUtc: '2026-02-16T12:00:00.000Z',
      clientCompletedAt: '2026-02-16T07:00:00Z',
    })
  })

  it('historic dates bypass the backdate window', async () => {
    const report = await buildMigrator().migrate('alice', [
      { date: '2025-03-01', isCompleted: true },
      { date: '2025-03-02', isCompleted: true },
    ])
    expect(report.migrated).toBe(2)
    expect(report.streak).toEqual({ currentStreak: 0, longestStreak: 2, lastCompletedDate: '2025-03-02' })
  })

  it('uses the requested zone', async () => {
    const report = await buildMigrator().migrate(
      'alice',
      [
        { date: '2026-02-15', isCompleted: true },
        { date: '2026-02-16', isCompleted: true },
      ],
      { timezone: 'America/Chicago' },
    )
    expect(report.streak.currentStreak).toBe(2)
    const stored = await adapter.getCompletionsByUser('alice')
    expect(stored.map((c) => c.timezoneIdentifier)).toEqual(['America/Chicago', 'America/Chicago'])
  })

  it('logs a summary', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    await buildMigrator({ logger }).migrate('alice', [
      { date: '2026-02-16', isCompleted: true },
      { date: 'soon', isCompleted: true },
    ])
    expect(logger.info).toHaveBeenCalledWith('Migrated legacy completions', {
      userId: 'alice',
      migrated: 1,
      skippedDuplicate: 0,
      skippedInvalid: 1,
    })
  })
})

// ============================================================================
// 2. SKIPS
// ============================================================================

describe('Skips', () => {
  it('records without a usable date are skipped as invalid', async () => {
    const report = await buildMigrator().migrate('alice', [
      { date: null, isCompleted: true },
      { date: 'garbage', isCompleted: true },
      { isCompleted: true },
      { date: 'garbage', isCompleted: false },
    ])
    expect(report).toEqual({
      migrated: 0,
      skippedDuplicate: 0,
      skippedInvalid: 3,
      streak: { currentStreak: 0, longestStreak: 0, lastCompletedDate: null },
    })
    expect(await adapter.getAggregate('alice')).toBeNull()
  })

  it('dates already on the ledger are skipped as duplicates', async () => {
    await adapter.createCompletion({
      id: 'existing',
      userId: 'alice',
      localDate: '2026-02-15' as LocalDate,
      recordedAtUtc: '2026-02-15T10:00:00.000Z',
      timezoneIdentifier: 'UTC',
      source: 'online',
    })

    const report = await buildMigrator().migrate('alice', [
      { date: '2026-02-15', isCompleted: true },
      { date: '2026-02-16', isCompleted: true },
    ])
    expect(report.migrated).toBe(1)
    expect(report.skippedDuplicate).toBe(1)
    expect(report.streak).toEqual({ currentStreak: 2, longestStreak: 2, lastCompletedDate: '2026-02-16' })
    expect((await adapter.getCompletion('alice', '2026-02-15' as LocalDate))?.source).toBe('online')
  })

  it('an unknown zone is refused before anything is written', async () => {
    await expect(
      buildMigrator().migrate('alice', [{ date: '2026-02-16', isCompleted: true }], { timezone: 'Nowhere/Land' }),
    ).rejects.toThrow(new ValidationError('Invalid migration timezone: Nowhere/Land'))
    expect(await adapter.getCompletionsByUser('alice')).toEqual([])
  })
})

// ============================================================================
// 3. SAME-DATE ORDER
// ============================================================================

describe('Same-Date Order', () => {
  const records = [
    { date: '2026-02-15', isCompleted: true, completedAt: '2026-02-15T20:00:00Z' },
    { date: '2026-02-15', isCompleted: true, completedAt: '2026-02-15T08:00:00Z' },
  ]

  it('first-seen keeps the first record in input order', async () => {
    const report = await buildMigrator().migrate('alice', records)
    expect(report.skippedDuplicate).toBe(1)
    const [stored] = await adapter.getCompletionsByUser('alice')
    expect(stored?.clientCompletedAt).toBe('2026-02-15T20:00:00Z')
  })

  it('earliest-completed keeps the earliest completedAt', async () => {
    await buildMigrator().migrate('alice', records, { order: 'earliest-completed' })
    const [stored] = await adapter.getCompletionsByUser('alice')
    expect(stored?.clientCompletedAt).toBe('2026-02-15T08:00:00Z')
  })

  it('the configured default order applies when none is passed', async () => {
    await buildMigrator({ order: 'earliest-completed' }).migrate('alice', records)
    const [stored] = await adapter.getCompletionsByUser('alice')
    expect(stored?.clientCompletedAt).toBe('2026-02-15T08:00:00Z')
  })
})

// ============================================================================
// 4. ATOMICITY
// ============================================================================

describe('Atomicity', () => {
  it('a storage failure rolls back every inserted row', async () => {
    // Append a row whose id repeats the first one, so the batch fails after inserting it
    const original = adapter.createCompletions.bind(adapter)
    vi.spyOn(adapter, 'createCompletions').mockImplementationOnce(async (rows) => {
      const [first] = rows
      return original(first ? [...rows, { ...first, localDate: addDays(first.localDate, 30) }] : rows)
    })

    await expect(
      buildMigrator().migrate('alice', [
        { date: '2026-02-15', isCompleted: true },
        { date: '2026-02-16', isCompleted: true },
      ]),
    ).rejects.toBeInstanceOf(DuplicateKeyError)
    expect(await adapter.getCompletionsByUser('alice')).toEqual([])
    expect(await adapter.getAggregate('alice')).toBeNull()
  })

  it('a failed migration keeps a live completion written just before its batch', async () => {
    const original = adapter.createCompletions.bind(adapter)
    vi.spyOn(adapter, 'createCompletions').mockImplementationOnce(async (rows) => {
      // A live write from another caller lands before the batch starts
      await adapter.createCompletion({
        id: 'bob-live',
        userId: 'bob',
        localDate: '2026-02-16' as LocalDate,
        recordedAtUtc: '2026-02-16T12:00:00.000Z',
        timezoneIdentifier: 'UTC',
        source: 'online',
      })
      const [first] = rows
      return original(first ? [...rows, { ...first, localDate: addDays(first.localDate, 30) }] : rows)
    })

    await expect(
      buildMigrator().migrate('alice', [{ date: '2026-02-15', isCompleted: true }]),
    ).rejects.toBeInstanceOf(DuplicateKeyError)
    expect(await adapter.getCompletionsByUser('alice')).toEqual([])
    expect((await adapter.getCompletionsByUser('bob')).map((c) => c.id)).toEqual(['bob-live'])
  })
})
