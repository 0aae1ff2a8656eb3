/**
 * Adapter
 *
 * Task persistence interface + in-memory mock implementation.
 * All methods are async so that both synchronous (better-sqlite3) and
 * asynchronous stores fit behind it.
 */

import type { Task, TaskChanges } from './task'
import type { TaskId } from './types'
import type { LocalDate } from './time-date'
import { isRecurring } from './task'

// ============================================================================
// Errors
// ============================================================================

export { DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError } from './errors'
import { DuplicateKeyError, NotFoundError, ForeignKeyError } from './errors'

export type { Task, TaskChanges } from './task'

// ============================================================================
// Adapter Interface
// ============================================================================

export interface TaskAdapter {
  /** Runs `fn` atomically. Nested calls join the outermost transaction. */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  insertTask(task: Task): Promise<void>
  getTask(id: TaskId): Promise<Task | null>
  getAllTasks(): Promise<Task[]>
  /** Tasks with a recurrence pattern that are not themselves instances. */
  getTemplates(): Promise<Task[]>
  /** Ids of the tasks `getTemplates` returns, read without decoding the rows. */
  getTemplateIds(): Promise<TaskId[]>
  /** Instances of a template, ordered by due date. */
  getInstancesByParent(parentId: TaskId): Promise<Task[]>
  /** Completed instances due strictly before `dueBefore`. */
  getCompletedInstanceIds(dueBefore: LocalDate): Promise<TaskId[]>
  updateTask(id: TaskId, changes: TaskChanges): Promise<void>
  /** Fails with ForeignKeyError while instances still point at the task. */
  deleteTask(id: TaskId): Promise<void>

  // Lifecycle (optional; persistent adapters implement it)
  close?(): Promise<void>
}

export type MockAdapter = TaskAdapter & {
  /** Number of stored tasks; test helper. */
  size(): number
}

// ============================================================================
// Mock Adapter
// ============================================================================

function byDueDate(a: Task, b: Task): number {
  const da = a.dueDate ?? ''
  const db = b.dueDate ?? ''
  if (da !== db) return da < db ? -1 : 1
  return a.createdDate < b.createdDate ? -1 : a.createdDate > b.createdDate ? 1 : 0
}

export function createMockAdapter(): MockAdapter {
  // ---- State ----
  const state = {
    tasks: new Map<string, Task>(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function assertParentExists(task: Pick<Task, 'id' | 'parentRecurringTaskId'>) {
    const parentId = task.parentRecurringTaskId
    if (parentId !== undefined && !state.tasks.has(parentId)) {
      throw new ForeignKeyError(`Task '${task.id}' references missing parent '${parentId}'`)
    }
  }

  // ---- Adapter implementation ----
  const adapter: MockAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          restoreState(snapshot)
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Tasks
    // ================================================================
    async insertTask(task: Task) {
      if (state.tasks.has(task.id)) {
        throw new DuplicateKeyError(`Task '${task.id}' already exists`)
      }
      assertParentExists(task)
      state.tasks.set(task.id, clone(task))
    },

    async getTask(id: TaskId) {
      const t = state.tasks.get(id)
      return t ? clone(t) : null
    },

    async getAllTasks() {
      return [...state.tasks.values()].map(clone)
    },

    async getTemplates() {
      return [...state.tasks.values()].filter(isRecurring).map(clone)
    },

    async getTemplateIds() {
      return [...state.tasks.values()].filter(isRecurring).map((t) => t.id)
    },

    async getInstancesByParent(parentId: TaskId) {
      return [...state.tasks.values()]
        .filter((t) => t.parentRecurringTaskId === parentId)
        .sort(byDueDate)
        .map(clone)
    },

    async getCompletedInstanceIds(dueBefore: LocalDate) {
      return [...state.tasks.values()]
        .filter((t) => t.isRecurringInstance && t.isCompleted && t.dueDate !== undefined && t.dueDate < dueBefore)
        .sort(byDueDate)
        .map((t) => t.id)
    },

    async updateTask(id: TaskId, changes: TaskChanges) {
      const existing = state.tasks.get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      const updated: Task = { ...existing, ...clone(changes), id }
      assertParentExists(updated)
      state.tasks.set(id, updated)
    },

    async deleteTask(id: TaskId) {
      // RESTRICT: instances still pointing at this task
      for (const t of state.tasks.values()) {
        if (t.parentRecurringTaskId === id) {
          throw new ForeignKeyError(`Cannot delete task '${id}': has recurring instances`)
        }
      }
      state.tasks.delete(id)
    },

    size() {
      return state.tasks.size
    },
  }

  return adapter
}
