/**
 * Recurrence Description
 *
 * Renders a spec as a short human-readable sentence, with weekday names
 * and the end date localized through Intl.
 */

import { type LocalDate, yearOf, monthOf, dayOf } from './time-date'
import type { RecurrenceSpec, WeekdayCode } from './recurrence-spec'

export type DescribeOptions = {
  locale?: string
}

// 2024-01-07 is a Sunday, so code N maps to 2024-01-(6 + N)
function weekdayName(code: WeekdayCode, locale: string, style: 'long' | 'short'): string {
  const fmt = new Intl.DateTimeFormat(locale, { weekday: style, timeZone: 'UTC' })
  return fmt.format(new Date(Date.UTC(2024, 0, 6 + code)))
}

function formatEndDate(date: LocalDate, locale: string): string {
  const fmt = new Intl.DateTimeFormat(locale, { dateStyle: 'medium', timeZone: 'UTC' })
  return fmt.format(new Date(Date.UTC(yearOf(date), monthOf(date) - 1, dayOf(date))))
}

function every(interval: number, singular: string, unit: string): string {
  return interval === 1 ? singular : `Every ${interval} ${unit}`
}

function basePhrase(spec: RecurrenceSpec, locale: string): string {
  switch (spec.pattern) {
    case 'never':
      return 'Does not repeat'
    case 'daily':
      return every(spec.interval, 'Daily', 'days')
    case 'weekdays':
      return 'Every weekday (Monday through Friday)'
    case 'weekly': {
      const phrase = every(spec.interval, 'Weekly', 'weeks')
      if (spec.weekdays.length === 0) return phrase
      const names = [...spec.weekdays].sort((a, b) => a - b).map((c) => weekdayName(c, locale, 'long'))
      return `${phrase} on ${names.join(', ')}`
    }
    case 'biweekly':
      return `Every ${2 * spec.interval} weeks`
    case 'monthly':
      return every(spec.interval, 'Monthly', 'months')
    case 'yearly':
      return every(spec.interval, 'Yearly', 'years')
    case 'custom': {
      if (spec.weekdays.length === 0) return `Every ${spec.interval} days`
      const names = [...spec.weekdays].sort((a, b) => a - b).map((c) => weekdayName(c, locale, 'short'))
      return `Custom pattern on ${names.join(', ')}`
    }
  }
}

export function describeRecurrence(spec: RecurrenceSpec, options: DescribeOptions = {}): string {
  const locale = options.locale ?? 'en-US'
  const base = basePhrase(spec, locale)
  if (spec.pattern === 'never') return base

  switch (spec.end.type) {
    case 'never':
      return base
    case 'afterCount': {
      const noun = spec.end.count === 1 ? 'occurrence' : 'occurrences'
      return `${base}, ending after ${spec.end.count} ${noun}`
    }
    case 'onDate':
      return `${base}, ending on ${formatEndDate(spec.end.date, locale)}`
  }
}
