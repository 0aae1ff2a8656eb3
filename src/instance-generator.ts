/**
 * Instance Generation
 *
 * Walks a template's occurrences from a cursor up to a horizon and builds
 * one instance per occurrence. Generation is bounded by a safety cap and
 * stops at the first end condition it meets.
 *
 * Planning is pure: it never mutates the template. The updated counter and
 * cursor come back in the result for the caller to persist together with
 * the instances.
 */

import { randomUUID } from 'node:crypto'
import { type LocalDate, toLocalDate, toLocalDateTime } from './time-date'
import { type TaskId, taskId } from './types'
import type { TaskAdapter } from './adapter'
import { type Task, createInstance, isRecurring } from './task'
import { nextOccurrence } from './next-date'
import { type EndStop, endConditionStop, hasRecurrenceEnded } from './end-condition'

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_SAFETY_CAP = 100

/**
 * `resume` continues from the template's last produced occurrence;
 * `restart` always walks from the template's due date, so repeated calls
 * over the same horizon produce the same occurrences again.
 */
export type CursorMode = 'resume' | 'restart'

export type StopReason =
  | 'notRecurring'
  | 'noDueDate'
  | 'ended'
  | 'horizon'
  | 'safetyCap'
  | 'noNextDate'
  | EndStop

export type PlanOptions = {
  horizon: LocalDate
  /** Generation time: stamps `createdDate` and is the "today" for end-by-date checks. */
  now: Date
  safetyCap?: number
  cursorMode?: CursorMode
  newId?: () => TaskId
}

export type GenerationResult = {
  instances: Task[]
  /** Template counter after this call (persisted count + produced). */
  currentCount: number
  /** Last occurrence produced, or the template's previous cursor if none were. */
  generatedThrough: LocalDate | null
  stopReason: StopReason
}

/** The only storage capability generation needs. */
export type InstanceSink = Pick<TaskAdapter, 'insertTask'>

// ============================================================================
// Helpers
// ============================================================================

function defaultId(): TaskId {
  return taskId(randomUUID())
}

export function generationCursor(template: Task, mode: CursorMode): LocalDate | undefined {
  if (mode === 'resume') return template.generatedThrough ?? template.dueDate
  return template.dueDate
}

function emptyResult(template: Task, stopReason: StopReason): GenerationResult {
  return {
    instances: [],
    currentCount: template.recurrence.currentCount,
    generatedThrough: template.generatedThrough ?? null,
    stopReason,
  }
}

// ============================================================================
// Planning
// ============================================================================

export function planInstances(template: Task, options: PlanOptions): GenerationResult {
  const cap = options.safetyCap ?? DEFAULT_SAFETY_CAP
  const newId = options.newId ?? defaultId
  const spec = template.recurrence

  if (!isRecurring(template)) return emptyResult(template, 'notRecurring')
  if (template.dueDate === undefined) return emptyResult(template, 'noDueDate')
  // `now` is fixed for the call, so this cannot change inside the loop
  if (hasRecurrenceEnded(spec, toLocalDate(options.now))) return emptyResult(template, 'ended')

  let cursor = generationCursor(template, options.cursorMode ?? 'resume') ?? template.dueDate
  const createdDate = toLocalDateTime(options.now)
  const instances: Task[] = []
  let stopReason: StopReason = 'horizon'

  while (cursor <= options.horizon) {
    if (instances.length >= cap) {
      stopReason = 'safetyCap'
      break
    }

    const next = nextOccurrence(spec, cursor)
    if (next === null) {
      stopReason = 'noNextDate'
      break
    }
    if (next > options.horizon) {
      stopReason = 'horizon'
      break
    }

    const endStop = endConditionStop(spec, next, instances.length)
    if (endStop !== null) {
      stopReason = endStop
      break
    }

    instances.push(createInstance(template, next, newId(), createdDate))
    cursor = next
  }

  const last = instances[instances.length - 1]
  return {
    instances,
    currentCount: spec.currentCount + instances.length,
    generatedThrough: last?.recurringInstanceDate ?? template.generatedThrough ?? null,
    stopReason,
  }
}

/**
 * Plans instances and inserts each into `sink`, in occurrence order.
 * Does not update the template; persist `currentCount` and
 * `generatedThrough` from the result.
 */
export async function generateInstances(
  template: Task,
  sink: InstanceSink,
  options: PlanOptions,
): Promise<GenerationResult> {
  const result = planInstances(template, options)
  for (const instance of result.instances) {
    await sink.insertTask(instance)
  }
  return result
}
