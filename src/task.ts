/**
 * Task Model
 *
 * A task is either a template (carries a recurrence spec and generates
 * instances) or a plain task. Generated instances are plain tasks that point
 * back at their template.
 */

import type { LocalDate, LocalDateTime } from './time-date'
import type { TaskId } from './types'
import { type RecurrenceSpec, NO_RECURRENCE } from './recurrence-spec'

// ============================================================================
// Types
// ============================================================================

export type EmailLink = {
  messageId: string
  subject?: string
  sender?: string
  url?: string
}

export type Task = {
  id: TaskId
  title: string
  description: string
  isCompleted: boolean
  createdDate: LocalDateTime
  dueDate?: LocalDate
  sectionId?: string
  email?: EmailLink
  amount?: number
  recurrence: RecurrenceSpec
  isRecurringInstance: boolean
  parentRecurringTaskId?: TaskId
  recurringInstanceDate?: LocalDate
  /** Last occurrence produced for this template; the resume point for generation. */
  generatedThrough?: LocalDate
}

export type TaskChanges = Partial<Omit<Task, 'id'>>

export type TaskInput = {
  id: TaskId
  title: string
  createdDate: LocalDateTime
  description?: string
  isCompleted?: boolean
  dueDate?: LocalDate
  sectionId?: string
  email?: EmailLink
  amount?: number
  recurrence?: RecurrenceSpec
}

// ============================================================================
// Construction
// ============================================================================

export function createTask(input: TaskInput): Task {
  return {
    id: input.id,
    title: input.title,
    description: input.description ?? '',
    isCompleted: input.isCompleted ?? false,
    createdDate: input.createdDate,
    ...(input.dueDate !== undefined ? { dueDate: input.dueDate } : {}),
    ...(input.sectionId !== undefined ? { sectionId: input.sectionId } : {}),
    ...(input.email !== undefined ? { email: { ...input.email } } : {}),
    ...(input.amount !== undefined ? { amount: input.amount } : {}),
    recurrence: input.recurrence ?? NO_RECURRENCE,
    isRecurringInstance: false,
  }
}

/**
 * Builds the instance a template produces for one occurrence date. Payload
 * fields are copied verbatim; recurrence is cleared so instances stay leaves.
 */
export function createInstance(
  template: Task,
  occurrence: LocalDate,
  id: TaskId,
  createdDate: LocalDateTime,
): Task {
  return {
    id,
    title: template.title,
    description: template.description,
    isCompleted: false,
    createdDate,
    dueDate: occurrence,
    ...(template.sectionId !== undefined ? { sectionId: template.sectionId } : {}),
    ...(template.email !== undefined ? { email: { ...template.email } } : {}),
    ...(template.amount !== undefined ? { amount: template.amount } : {}),
    recurrence: NO_RECURRENCE,
    isRecurringInstance: true,
    parentRecurringTaskId: template.id,
    recurringInstanceDate: occurrence,
  }
}

// ============================================================================
// Predicates
// ============================================================================

export function isRecurring(task: Task): boolean {
  return task.recurrence.pattern !== 'never' && !task.isRecurringInstance
}
