/**
 * Next Date Calculation
 *
 * Maps a recurrence spec and a reference date to the next occurrence.
 * Pure; no clock access.
 */

import {
  type LocalDate,
  addDays,
  addWeeks,
  addMonths,
  addYears,
  isWeekend,
  weekdayCodeOf,
} from './time-date'
import type { RecurrenceSpec, WeekdayCode } from './recurrence-spec'

export function nextOccurrence(spec: RecurrenceSpec, reference: LocalDate | null | undefined): LocalDate | null {
  if (reference == null) return null

  switch (spec.pattern) {
    case 'never':
      return null
    case 'daily':
      return addDays(reference, spec.interval)
    case 'weekdays':
      return nextBusinessDay(reference)
    case 'weekly':
      if (spec.weekdays.length > 0) return nextSelectedWeekday(reference, spec.weekdays)
      return addWeeks(reference, spec.interval)
    case 'biweekly':
      return addWeeks(reference, 2 * spec.interval)
    case 'monthly':
      return addMonths(reference, spec.interval)
    case 'yearly':
      return addYears(reference, spec.interval)
    case 'custom':
      if (spec.weekdays.length > 0) return nextSelectedWeekday(reference, spec.weekdays)
      return addDays(reference, spec.interval)
  }
}

/** First Monday-Friday date strictly after `reference`. */
export function nextBusinessDay(reference: LocalDate): LocalDate {
  let d = addDays(reference, 1)
  while (isWeekend(d)) {
    d = addDays(d, 1)
  }
  return d
}

/**
 * Next date whose weekday code is in `weekdays`, strictly after `reference`.
 * Codes compare numerically (Sunday = 1), so anything not later in the same
 * Sunday-first week wraps to the smallest selected code of the next week.
 */
export function nextSelectedWeekday(reference: LocalDate, weekdays: readonly WeekdayCode[]): LocalDate | null {
  const sorted = [...weekdays].sort((a, b) => a - b)
  const current = weekdayCodeOf(reference)

  const later = sorted.find((code) => code > current)
  if (later !== undefined) return addDays(reference, later - current)

  const first = sorted[0]
  if (first === undefined) return null
  return addDays(reference, 7 - current + first)
}
