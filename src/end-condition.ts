/**
 * End Condition Evaluation
 *
 * Decides whether a template's recurrence has terminated, and whether a
 * single candidate occurrence falls past the end condition.
 */

import type { LocalDate } from './time-date'
import type { RecurrenceSpec } from './recurrence-spec'
import { type Task, isRecurring } from './task'

export type EndStop = 'endCount' | 'endDate'

/**
 * `today` is the wall-clock date, so an on-date end can flip to ended
 * between two calls without any instance being produced.
 */
export function hasRecurrenceEnded(spec: RecurrenceSpec, today: LocalDate): boolean {
  switch (spec.end.type) {
    case 'never':
      return false
    case 'afterCount':
      return spec.currentCount >= spec.end.count
    case 'onDate':
      return today > spec.end.date
  }
}

export function recurrenceHasEnded(task: Task, today: LocalDate): boolean {
  if (!isRecurring(task)) return false
  return hasRecurrenceEnded(task.recurrence, today)
}

/**
 * Checks a candidate occurrence against the end condition. `produced` is the
 * number of instances already created in the current generation call; it is
 * added to the persisted count so repeated calls cannot overshoot.
 */
export function endConditionStop(spec: RecurrenceSpec, candidate: LocalDate, produced: number): EndStop | null {
  switch (spec.end.type) {
    case 'never':
      return null
    case 'afterCount':
      return spec.currentCount + produced >= spec.end.count ? 'endCount' : null
    case 'onDate':
      return candidate > spec.end.date ? 'endDate' : null
  }
}
