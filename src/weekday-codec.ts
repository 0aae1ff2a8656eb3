/**
 * Weekday Codec
 *
 * Round-trips the weekday set of a recurrence spec through its stored form,
 * a JSON array of integer codes. An empty string stands for "no weekdays".
 */

import { z } from 'zod'
import { type Result, Ok, Err } from './result'
import { type WeekdayCode, isWeekdayCode, normalizeWeekdays } from './recurrence-spec'

export { WeekdayDecodeError } from './errors'
import { WeekdayDecodeError } from './errors'

const weekdayCodeSchema = z
  .number()
  .int()
  .refine(isWeekdayCode, { message: 'weekday code must be between 1 and 7' })

const weekdayListSchema = z.array(weekdayCodeSchema)

export function encodeWeekdays(codes: readonly WeekdayCode[]): string {
  if (codes.length === 0) return ''
  return JSON.stringify(normalizeWeekdays(codes))
}

export function decodeWeekdays(raw: string): Result<WeekdayCode[], WeekdayDecodeError> {
  if (raw.trim() === '') return Ok([])

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    return Err(new WeekdayDecodeError(`Weekday data is not valid JSON: ${reason}`, raw))
  }

  const result = weekdayListSchema.safeParse(parsed)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : ''
    return Err(new WeekdayDecodeError(`Weekday data is malformed${where}: ${issue?.message ?? 'invalid'}`, raw))
  }

  return Ok(normalizeWeekdays(result.data))
}
