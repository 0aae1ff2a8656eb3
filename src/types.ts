/**
 * Shared Types
 *
 * Re-exports branded date types and defines the domain ID types used
 * across modules.
 */

export type { LocalDate, LocalTime, LocalDateTime } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __taskId: unique symbol

export type TaskId = string & { readonly [__taskId]: true }

export function taskId(id: string): TaskId {
  return id as TaskId
}
