/**
 * Recurrence Spec
 *
 * Immutable description of how a template task repeats, with constructors
 * that validate their input.
 */

import type { LocalDate } from './time-date'

// ============================================================================
// Errors
// ============================================================================

export { InvalidPatternError, ValidationError } from './errors'
import { InvalidPatternError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export const RECURRENCE_PATTERNS = [
  'never', 'daily', 'weekdays', 'weekly', 'biweekly', 'monthly', 'yearly', 'custom',
] as const

export type RecurrencePattern = (typeof RECURRENCE_PATTERNS)[number]

/** 1 = Sunday … 7 = Saturday */
export const WeekdayCode = {
  SUNDAY: 1,
  MONDAY: 2,
  TUESDAY: 3,
  WEDNESDAY: 4,
  THURSDAY: 5,
  FRIDAY: 6,
  SATURDAY: 7,
} as const

export type WeekdayCode = (typeof WeekdayCode)[keyof typeof WeekdayCode]

export type EndCondition =
  | { type: 'never' }
  | { type: 'afterCount'; count: number }
  | { type: 'onDate'; date: LocalDate }

export type RecurrenceSpec = {
  readonly pattern: RecurrencePattern
  readonly interval: number
  readonly weekdays: readonly WeekdayCode[]
  readonly end: EndCondition
  readonly currentCount: number
}

export type RecurrenceSpecInput = {
  pattern: RecurrencePattern
  interval?: number
  weekdays?: readonly number[]
  end?: EndCondition
  currentCount?: number
}

type PatternOptions = Omit<RecurrenceSpecInput, 'pattern'>

// ============================================================================
// Guards
// ============================================================================

export function isRecurrencePattern(value: string): value is RecurrencePattern {
  return (RECURRENCE_PATTERNS as readonly string[]).includes(value)
}

export function isWeekdayCode(value: number): value is WeekdayCode {
  return Number.isInteger(value) && value >= 1 && value <= 7
}

/** Sorted, de-duplicated weekday codes. Throws on codes outside 1..7. */
export function normalizeWeekdays(codes: readonly number[]): WeekdayCode[] {
  const result: WeekdayCode[] = []
  for (const code of codes) {
    if (!isWeekdayCode(code)) {
      throw new InvalidPatternError(`Weekday codes must be integers 1-7, got ${code}`)
    }
    if (!result.includes(code)) result.push(code)
  }
  return result.sort((a, b) => a - b)
}

// ============================================================================
// Construction
// ============================================================================

export const NEVER_ENDS: EndCondition = Object.freeze({ type: 'never' })

export const NO_RECURRENCE: RecurrenceSpec = Object.freeze({
  pattern: 'never',
  interval: 1,
  weekdays: Object.freeze([]),
  end: NEVER_ENDS,
  currentCount: 0,
})

function validateEnd(end: EndCondition): EndCondition {
  switch (end.type) {
    case 'never':
      return NEVER_ENDS
    case 'afterCount':
      if (!Number.isInteger(end.count) || end.count < 1) {
        throw new ValidationError(`End count must be a positive integer, got ${end.count}`)
      }
      return Object.freeze({ type: 'afterCount', count: end.count })
    case 'onDate':
      return Object.freeze({ type: 'onDate', date: end.date })
  }
}

export function createRecurrenceSpec(input: RecurrenceSpecInput): RecurrenceSpec {
  if (!isRecurrencePattern(input.pattern)) {
    throw new InvalidPatternError(`Unknown recurrence pattern '${input.pattern}'`)
  }
  const interval = input.interval ?? 1
  if (!Number.isInteger(interval) || interval < 1) {
    throw new ValidationError(`Interval must be a positive integer, got ${interval}`)
  }
  const currentCount = input.currentCount ?? 0
  if (!Number.isInteger(currentCount) || currentCount < 0) {
    throw new ValidationError(`Current count must be a non-negative integer, got ${currentCount}`)
  }

  return Object.freeze({
    pattern: input.pattern,
    interval,
    weekdays: Object.freeze(normalizeWeekdays(input.weekdays ?? [])),
    end: validateEnd(input.end ?? NEVER_ENDS),
    currentCount,
  })
}

export function withCurrentCount(spec: RecurrenceSpec, currentCount: number): RecurrenceSpec {
  return createRecurrenceSpec({ ...spec, currentCount })
}

// ============================================================================
// Pattern Constructors
// ============================================================================

export function daily(options: PatternOptions = {}): RecurrenceSpec {
  return createRecurrenceSpec({ ...options, pattern: 'daily' })
}

export function weekdaysOnly(options: Omit<PatternOptions, 'weekdays'> = {}): RecurrenceSpec {
  return createRecurrenceSpec({ ...options, pattern: 'weekdays' })
}

export function weekly(options: PatternOptions = {}): RecurrenceSpec {
  return createRecurrenceSpec({ ...options, pattern: 'weekly' })
}

export function biweekly(options: Omit<PatternOptions, 'weekdays'> = {}): RecurrenceSpec {
  return createRecurrenceSpec({ ...options, pattern: 'biweekly' })
}

export function monthly(options: Omit<PatternOptions, 'weekdays'> = {}): RecurrenceSpec {
  return createRecurrenceSpec({ ...options, pattern: 'monthly' })
}

export function yearly(options: Omit<PatternOptions, 'weekdays'> = {}): RecurrenceSpec {
  return createRecurrenceSpec({ ...options, pattern: 'yearly' })
}

export function custom(options: PatternOptions = {}): RecurrenceSpec {
  return createRecurrenceSpec({ ...options, pattern: 'custom' })
}

export function endAfter(count: number): EndCondition {
  return validateEnd({ type: 'afterCount', count })
}

export function endOn(date: LocalDate): EndCondition {
  return { type: 'onDate', date }
}
