/**
 * Segment 08: Offline Batch Sync Tests
 *
 * A client's offline buffer is replayed oldest date first through the
 * recorder. One bad item never aborts the batch; an oversized batch is
 * refused outright.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createMemoryAdapter, type Adapter } from '../src/adapter'
import { DEFAULT_POLICY } from '../src/config'
import type { Logger } from '../src/logger'
import { createBatchSync, type BatchSync } from '../src/internal/batch-sync'
import { createCompletionRecorder } from '../src/internal/completion-recorder'
import { createRecalculator } from '../src/internal/recalculator'
import { createStreakUpdater } from '../src/internal/streak-updater'

// ============================================================================
// Test Helpers
// ============================================================================

const clock = () => new Date('2026-02-16T12:00:00Z')

let adapter: Adapter
let logger: Logger & { warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> }
let sync: BatchSync

beforeEach(() => {
  adapter = createMemoryAdapter()
  logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
  const policy = { ...DEFAULT_POLICY }
  const recalculator = createRecalculator({ adapter, clock, defaultTimezone: 'UTC' })
  const updater = createStreakUpdater({ adapter, clock, logger, recalculator })
  const recorder = createCompletionRecorder({ adapter, clock, policy, updater })
  sync = createBatchSync({ adapter, logger, policy, recorder })
})

// ============================================================================
// 1. ORDERING
// ============================================================================

describe('Ordering', () => {
  it('replays out-of-order items by date', async () => {
    const result = await sync.syncBatch('alice', [
      { taskId: 't16', completionLocalDate: '2026-02-16', timezoneIdentifier: 'UTC' },
      { taskId: 't14', completionLocalDate: '2026-02-14', timezoneIdentifier: 'UTC' },
      { taskId: 't15', completionLocalDate: '2026-02-15', timezoneIdentifier: 'UTC' },
    ])

    expect(result).toEqual({
      error: null,
      finalStreak: { currentStreak: 3, longestStreak: 3, lastCompletedDate: '2026-02-16' },
      results: [
        { taskId: 't14', status: 'recorded' },
        { taskId: 't15', status: 'recorded' },
        { taskId: 't16', status: 'recorded' },
      ],
      counts: { processed: 3, recorded: 3, duplicate: 0, rejected: 0, errored: 0 },
    })
  })

  it('same-date items keep submission order', async () => {
    const result = await sync.syncBatch('alice', [
      { taskId: 'first', completionLocalDate: '2026-02-16' },
      { taskId: 'second', completionLocalDate: '2026-02-16' },
    ])
    expect(result.results).toEqual([
      { taskId: 'first', status: 'recorded' },
      { taskId: 'second', status: 'duplicate' },
    ])
  })

  it('resending a batch records nothing new', async () => {
    const batch = [
      { taskId: 'a', completionLocalDate: '2026-02-15' },
      { taskId: 'b', completionLocalDate: '2026-02-16' },
    ]
    await sync.syncBatch('alice', batch)
    const again = await sync.syncBatch('alice', batch)
    expect(again.counts).toEqual({ processed: 2, recorded: 0, duplicate: 2, rejected: 0, errored: 0 })
    expect(again.finalStreak).toEqual({ currentStreak: 2, longestStreak: 2, lastCompletedDate: '2026-02-16' })
  })
})

// ============================================================================
// 2. ITEM DEFAULTS
// ============================================================================

describe('Item Defaults', () => {
  it('stores items as offline_sync in UTC when no zone is given', async () => {
    await sync.syncBatch('alice', [{ taskId: 'a', completionLocalDate: '2026-02-16', completedAt: '2026-02-16T06:00:00Z' }])
    const [stored] = await adapter.getCompletionsByUser('alice')
    expect(stored).toMatchObject({
      source: 'offline_sync',
      timezoneIdentifier: 'UTC',
      clientCompletedAt: '2026-02-16T06:00:00Z',
    })
  })

  it('items without a taskId report "unknown"', async () => {
    const result = await sync.syncBatch('alice', [{ completionLocalDate: '2026-02-16' }])
    expect(result.results).toEqual([{ taskId: 'unknown', status: 'recorded' }])
  })
})

// ============================================================================
// 3. PER-ITEM FAILURES
// ============================================================================

describe('Per-Item Failures', () => {
  it('a rejected claim does not stop the batch', async () => {
    const result = await sync.syncBatch('alice', [
      { taskId: 't1', completionLocalDate: '2026-02-15' },
      { taskId: 't2', completionLocalDate: '2026-02-20' },
      { taskId: 't3', completionLocalDate: '2026-02-16' },
    ])

    expect(result.results).toEqual([
      { taskId: 't1', status: 'recorded' },
      { taskId: 't3', status: 'recorded' },
      {
        taskId: 't2',
        status: 'rejected',
        reason: 'FutureDateRejected',
        error: 'Future date rejected: claimed 2026-02-20, server sees 2026-02-16 in UTC',
      },
    ])
    expect(result.finalStreak).toEqual({ currentStreak: 2, longestStreak: 2, lastCompletedDate: '2026-02-16' })
    expect(result.counts).toEqual({ processed: 3, recorded: 2, duplicate: 0, rejected: 1, errored: 0 })
  })

  it('an item without a date is rejected', async () => {
    const result = await sync.syncBatch('alice', [{ taskId: 'a' }])
    expect(result.results).toEqual([
      { taskId: 'a', status: 'rejected', reason: 'MissingDate', error: 'Missing completionLocalDate' },
    ])
  })

  it('null and empty dates count as missing', async () => {
    const result = await sync.syncBatch('alice', [
      { taskId: 'n', completionLocalDate: null },
      { taskId: 'e', completionLocalDate: '' },
    ])
    expect(result.results).toEqual([
      { taskId: 'n', status: 'rejected', reason: 'MissingDate', error: 'Missing completionLocalDate' },
      { taskId: 'e', status: 'rejected', reason: 'MissingDate', error: 'Missing completionLocalDate' },
    ])
    expect(result.counts).toEqual({ processed: 2, recorded: 0, duplicate: 0, rejected: 2, errored: 0 })
  })

  it('malformed items are rejected before any processing', async () => {
    const result = await sync.syncBatch('alice', [
      { taskId: 'ok', completionLocalDate: '2026-02-16' },
      42,
      { taskId: 'b', completionLocalDate: 20260216 },
    ])
    expect(result.results).toEqual([
      { taskId: 'unknown', status: 'rejected', reason: 'MalformedItem', error: 'Expected object, received number' },
      {
        taskId: 'b',
        status: 'rejected',
        reason: 'MalformedItem',
        error: 'completionLocalDate: Expected string, received number',
      },
      { taskId: 'ok', status: 'recorded' },
    ])
    expect(result.counts).toEqual({ processed: 3, recorded: 1, duplicate: 0, rejected: 2, errored: 0 })
  })

  it('a null item is malformed', async () => {
    const result = await sync.syncBatch('alice', [null])
    expect(result.results).toEqual([
      { taskId: 'unknown', status: 'rejected', reason: 'MalformedItem', error: 'Expected object, received null' },
    ])
  })

  it('storage failures are reported per item and logged', async () => {
    vi.spyOn(adapter, 'createCompletion').mockRejectedValueOnce(new Error('disk full'))

    const result = await sync.syncBatch('alice', [
      { taskId: 't1', completionLocalDate: '2026-02-15' },
      { taskId: 't2', completionLocalDate: '2026-02-16' },
    ])

    expect(result.results).toEqual([
      { taskId: 't1', status: 'error', error: 'disk full' },
      { taskId: 't2', status: 'recorded' },
    ])
    expect(result.finalStreak).toEqual({ currentStreak: 1, longestStreak: 1, lastCompletedDate: '2026-02-16' })
    expect(result.counts.errored).toBe(1)
    expect(logger.error).toHaveBeenCalledWith('Offline completion failed', {
      userId: 'alice',
      taskId: 't1',
      error: 'disk full',
    })
  })
})

// ============================================================================
// 4. TASK IDS
// ============================================================================

describe('Task Ids', () => {
  it('a numeric taskId is reported as its decimal string', async () => {
    const result = await sync.syncBatch('alice', [
      { taskId: 7, completionLocalDate: '2026-02-16' },
      { taskId: 9, completionLocalDate: 5 },
    ])
    expect(result.results).toEqual([
      {
        taskId: '9',
        status: 'rejected',
        reason: 'MalformedItem',
        error: 'completionLocalDate: Expected string, received number',
      },
      { taskId: '7', status: 'recorded' },
    ])
  })

  it('a taskId of any other type is reported as unknown and the item still syncs', async () => {
    const result = await sync.syncBatch('alice', [
      { taskId: true, completionLocalDate: '2026-02-15' },
      { taskId: { id: 'x' }, completionLocalDate: '2026-02-16', timezoneIdentifier: null },
    ])
    expect(result.results).toEqual([
      { taskId: 'unknown', status: 'recorded' },
      { taskId: 'unknown', status: 'recorded' },
    ])
    expect(result.finalStreak).toEqual({ currentStreak: 2, longestStreak: 2, lastCompletedDate: '2026-02-16' })
  })
})

// ============================================================================
// 5. BATCH LIMITS
// ============================================================================

describe('Batch Limits', () => {
  it('refuses a batch over the limit without processing it', async () => {
    const items = Array.from({ length: 31 }, (_, i) => ({ taskId: `t${i}`, completionLocalDate: '2026-02-16' }))
    const result = await sync.syncBatch('alice', items)

    expect(result).toEqual({
      error: 'Batch too large: 31 > 30',
      finalStreak: { currentStreak: 0, longestStreak: 0, lastCompletedDate: null },
      results: [],
      counts: { processed: 0, recorded: 0, duplicate: 0, rejected: 0, errored: 0 },
    })
    expect(await adapter.getCompletionsByUser('alice')).toEqual([])
    expect(logger.warn).toHaveBeenCalledWith('Offline batch refused', { userId: 'alice', size: 31, max: 30 })
  })

  it('accepts a batch exactly at the limit', async () => {
    const items = Array.from({ length: 30 }, (_, i) => ({ taskId: `t${i}`, completionLocalDate: '2026-02-16' }))
    const result = await sync.syncBatch('alice', items)
    expect(result.error).toBeNull()
    expect(result.counts).toEqual({ processed: 30, recorded: 1, duplicate: 29, rejected: 0, errored: 0 })
  })

  it('an empty batch reports the stored streak', async () => {
    await sync.syncBatch('alice', [{ completionLocalDate: '2026-02-16' }])
    const result = await sync.syncBatch('alice', [])
    expect(result).toEqual({
      error: null,
      finalStreak: { currentStreak: 1, longestStreak: 1, lastCompletedDate: '2026-02-16' },
      results: [],
      counts: { processed: 0, recorded: 0, duplicate: 0, rejected: 0, errored: 0 },
    })
  })
})
