/**
 * Segment 09: Public API Tests
 *
 * createRecurrenceEngine: configuration validation and the engine surface.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createRecurrenceEngine, type RecurrenceEngine, ValidationError } from '../src/public-api'
import { createMockAdapter, type MockAdapter } from '../src/adapter'
import type { Task } from '../src/task'
import { daily, weekly, monthly, endAfter, endOn } from '../src/recurrence-spec'
import { taskId } from '../src/types'
import { captureLogger, clockAt, d, makeTemplate, silentLogger } from './helpers/fixtures'

let adapter: MockAdapter
let engine: RecurrenceEngine

beforeEach(() => {
  adapter = createMockAdapter()
  engine = createRecurrenceEngine({ adapter, clock: clockAt('2024-01-10'), logger: silentLogger() })
})

// ============================================================================
// 1. CONFIGURATION
// ============================================================================

describe('Configuration', () => {
  it('rejects a safety cap below one', () => {
    expect(() => createRecurrenceEngine({ adapter, safetyCap: 0 })).toThrow(ValidationError)
    expect(() => createRecurrenceEngine({ adapter, safetyCap: 0 })).toThrow('safetyCap must be an integer >= 1, got 0')
  })

  it('rejects negative or fractional day counts', () => {
    expect(() => createRecurrenceEngine({ adapter, lookaheadDays: -1 })).toThrow(ValidationError)
    expect(() => createRecurrenceEngine({ adapter, completionLookaheadDays: 1.5 })).toThrow(ValidationError)
    expect(() => createRecurrenceEngine({ adapter, cleanupAfterDays: -30 })).toThrow(ValidationError)
  })

  it('rejects an invalid locale', () => {
    expect(() => createRecurrenceEngine({ adapter, locale: 'not a locale!!' })).toThrow('Invalid locale: not a locale!!')
  })

  it('accepts the defaults', () => {
    expect(() => createRecurrenceEngine({ adapter })).not.toThrow()
  })
})

// ============================================================================
// 2. PURE HELPERS
// ============================================================================

describe('nextDueDate', () => {
  it('uses today as the reference', () => {
    const template = makeTemplate({ recurrence: daily({ interval: 2 }) })
    expect(engine.nextDueDate(template)).toBe('2024-01-12')
  })

  it('is null for tasks that do not recur', () => {
    expect(engine.nextDueDate(makeTemplate())).toBeNull()
  })

  it('is null without a due date', () => {
    expect(engine.nextDueDate(makeTemplate({ recurrence: daily(), dueDate: undefined }))).toBeNull()
  })
})

describe('recurrenceHasEnded', () => {
  it('reads the configured clock', () => {
    expect(engine.recurrenceHasEnded(makeTemplate({ recurrence: daily({ end: endOn(d('2024-01-09')) }) }))).toBe(true)
    expect(engine.recurrenceHasEnded(makeTemplate({ recurrence: daily({ end: endOn(d('2024-01-10')) }) }))).toBe(false)
  })
})

describe('recurrenceDescription', () => {
  it('uses the configured locale', () => {
    expect(engine.recurrenceDescription(monthly({ end: endAfter(12) }))).toBe('Monthly, ending after 12 occurrences')
    const german = createRecurrenceEngine({ adapter, locale: 'de-DE', logger: silentLogger() })
    expect(german.recurrenceDescription(weekly({ weekdays: [2] }))).toBe('Weekly on Montag')
  })
})

// ============================================================================
// 3. GENERATION
// ============================================================================

describe('generateRecurringInstances', () => {
  it('writes to the configured adapter without touching the template', async () => {
    const template = makeTemplate({ recurrence: weekly() })
    await adapter.insertTask(template)

    const result = await engine.generateRecurringInstances(template, d('2024-01-22'))

    expect(result.currentCount).toBe(3)
    expect(await adapter.getInstancesByParent(template.id)).toHaveLength(3)
    expect((await adapter.getTask(template.id))?.recurrence.currentCount).toBe(0)
  })

  it('writes to an explicit sink', async () => {
    const sink: Task[] = []
    const template = makeTemplate({ recurrence: weekly() })
    await engine.generateRecurringInstances(template, d('2024-01-15'), {
      insertTask: async (task) => { sink.push(task) },
    })
    expect(sink.map((t) => t.dueDate)).toEqual(['2024-01-08', '2024-01-15'])
    expect(sink.every((t) => t.createdDate === '2024-01-10T12:00:00')).toBe(true)
  })

  it('honors the configured cap and cursor mode', async () => {
    const capped = createRecurrenceEngine({ adapter, safetyCap: 2, cursorMode: 'restart', logger: silentLogger() })
    const template = makeTemplate({ recurrence: daily(), generatedThrough: d('2024-01-20') })
    const sink: Task[] = []
    const result = await capped.generateRecurringInstances(template, d('2024-12-31'), {
      insertTask: async (task) => { sink.push(task) },
    })
    expect(result.stopReason).toBe('safetyCap')
    expect(sink.map((t) => t.dueDate)).toEqual(['2024-01-02', '2024-01-03'])
  })
})

// ============================================================================
// 4. SERVICE OPERATIONS
// ============================================================================

describe('Service operations', () => {
  it('generates upcoming instances with the default look-ahead', async () => {
    await adapter.insertTask(makeTemplate({ dueDate: d('2024-01-10'), recurrence: weekly() }))
    const summary = await engine.generateUpcoming()
    // 2024-01-17 through 2024-04-03; 2024-04-10 is past today + 90
    expect(summary.generated).toBe(12)
  })

  it('logs through the configured logger', async () => {
    const logger = captureLogger()
    const logged = createRecurrenceEngine({ adapter, clock: clockAt('2024-01-10'), logger })
    await logged.cleanupCompletedInstances()
    expect(logger.lines).toEqual([
      { level: 'info', message: 'Cleaned up completed instances', data: { cutoff: '2023-12-11', count: 0 } },
    ])
  })

  it('exposes template lookups', async () => {
    await adapter.insertTask(makeTemplate({ dueDate: d('2024-01-10'), recurrence: daily() }))
    await engine.generateInstances(taskId('tpl-1'), d('2024-01-12'))
    expect((await engine.getNextDueInstance(taskId('tpl-1')))?.dueDate).toBe('2024-01-11')
  })
})

// ============================================================================
// 5. LIFECYCLE
// ============================================================================

describe('close', () => {
  it('closes the adapter when it can be closed', async () => {
    const close = vi.fn(async () => {})
    const closable = createRecurrenceEngine({ adapter: { ...adapter, close }, logger: silentLogger() })
    await closable.close()
    expect(close).toHaveBeenCalledOnce()
  })

  it('is a no-op for adapters without close', async () => {
    await expect(engine.close()).resolves.toBeUndefined()
  })
})
