/**
 * Generators for recurrence domain values.
 *
 * Dates are drawn as day offsets from 2000-01-01 so every value is a real
 * calendar date.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { type LocalDate, addDays, makeDate } from '../../../src/time-date'
import {
  type EndCondition,
  type RecurrencePattern,
  type RecurrenceSpec,
  RECURRENCE_PATTERNS,
  createRecurrenceSpec,
} from '../../../src/recurrence-spec'

// ============================================================================
// Type-Safe Generator Aliases
// ============================================================================

export type GenLocalDate = Arbitrary<LocalDate>
export type GenRecurrenceSpec = Arbitrary<RecurrenceSpec>

const EPOCH = makeDate(2000, 1, 1)

// ============================================================================
// Dates
// ============================================================================

/** Dates between 2000-01-01 and roughly 2054. */
export function localDateGen(maxOffset = 20_000): GenLocalDate {
  return fc.integer({ min: 0, max: maxOffset }).map((n) => addDays(EPOCH, n))
}

// ============================================================================
// Specs
// ============================================================================

export const recurringPatternGen: Arbitrary<RecurrencePattern> = fc.constantFrom(
  ...RECURRENCE_PATTERNS.filter((p) => p !== 'never'),
)

export const weekdaySetGen: Arbitrary<number[]> = fc.uniqueArray(fc.integer({ min: 1, max: 7 }), { maxLength: 7 })

export function endConditionGen(anchor: LocalDate): Arbitrary<EndCondition> {
  return fc.oneof(
    fc.constant<EndCondition>({ type: 'never' }),
    fc.integer({ min: 1, max: 20 }).map((count): EndCondition => ({ type: 'afterCount', count })),
    fc.integer({ min: 0, max: 400 }).map((n): EndCondition => ({ type: 'onDate', date: addDays(anchor, n) })),
  )
}

/** A recurring spec with an open end. */
export function recurrenceSpecGen(): GenRecurrenceSpec {
  return fc
    .record({
      pattern: recurringPatternGen,
      interval: fc.integer({ min: 1, max: 6 }),
      weekdays: weekdaySetGen,
    })
    .map((input) => createRecurrenceSpec(input))
}

/** A due date and a recurring spec whose end condition is relative to it. */
export function templateSpecGen(): Arbitrary<{ dueDate: LocalDate; spec: RecurrenceSpec }> {
  return localDateGen().chain((dueDate) =>
    fc
      .record({
        pattern: recurringPatternGen,
        interval: fc.integer({ min: 1, max: 6 }),
        weekdays: weekdaySetGen,
        end: endConditionGen(dueDate),
        currentCount: fc.integer({ min: 0, max: 5 }),
      })
      .map((input) => ({ dueDate, spec: createRecurrenceSpec(input) })),
  )
}
