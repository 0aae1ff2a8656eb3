/**
 * Segment 07: Recurrence Description Tests
 */

import { describe, it, expect } from 'vitest'
import { describeRecurrence } from '../src/description'
import {
  daily, weekdaysOnly, weekly, biweekly, monthly, yearly, custom,
  endAfter, endOn, NO_RECURRENCE, WeekdayCode,
} from '../src/recurrence-spec'
import { d } from './helpers/fixtures'

const { MONDAY, WEDNESDAY, FRIDAY } = WeekdayCode

describe('Pattern phrases', () => {
  it('describes tasks that do not repeat', () => {
    expect(describeRecurrence(NO_RECURRENCE)).toBe('Does not repeat')
  })

  it('describes daily patterns', () => {
    expect(describeRecurrence(daily())).toBe('Daily')
    expect(describeRecurrence(daily({ interval: 3 }))).toBe('Every 3 days')
  })

  it('describes weekdays', () => {
    expect(describeRecurrence(weekdaysOnly())).toBe('Every weekday (Monday through Friday)')
  })

  it('describes weekly patterns with long weekday names', () => {
    expect(describeRecurrence(weekly())).toBe('Weekly')
    expect(describeRecurrence(weekly({ weekdays: [WEDNESDAY, MONDAY] }))).toBe('Weekly on Monday, Wednesday')
    expect(describeRecurrence(weekly({ interval: 2, weekdays: [FRIDAY] }))).toBe('Every 2 weeks on Friday')
  })

  it('describes biweekly patterns in weeks', () => {
    expect(describeRecurrence(biweekly())).toBe('Every 2 weeks')
    expect(describeRecurrence(biweekly({ interval: 2 }))).toBe('Every 4 weeks')
  })

  it('describes monthly and yearly patterns', () => {
    expect(describeRecurrence(monthly())).toBe('Monthly')
    expect(describeRecurrence(monthly({ interval: 6 }))).toBe('Every 6 months')
    expect(describeRecurrence(yearly())).toBe('Yearly')
    expect(describeRecurrence(yearly({ interval: 3 }))).toBe('Every 3 years')
  })

  it('describes custom patterns with short weekday names', () => {
    expect(describeRecurrence(custom({ weekdays: [MONDAY, WEDNESDAY, FRIDAY] }))).toBe(
      'Custom pattern on Mon, Wed, Fri',
    )
  })

  it('describes custom patterns without weekdays in days', () => {
    expect(describeRecurrence(custom())).toBe('Every 1 days')
    expect(describeRecurrence(custom({ interval: 4 }))).toBe('Every 4 days')
  })
})

describe('End suffixes', () => {
  it('appends the occurrence count', () => {
    expect(describeRecurrence(daily({ end: endAfter(5) }))).toBe('Daily, ending after 5 occurrences')
    expect(describeRecurrence(daily({ end: endAfter(1) }))).toBe('Daily, ending after 1 occurrence')
  })

  it('appends the end date', () => {
    expect(describeRecurrence(monthly({ end: endOn(d('2024-01-31')) }))).toBe('Monthly, ending on Jan 31, 2024')
  })
})

describe('Locale', () => {
  it('localizes weekday names', () => {
    expect(describeRecurrence(weekly({ weekdays: [MONDAY] }), { locale: 'de-DE' })).toBe('Weekly on Montag')
  })
})
