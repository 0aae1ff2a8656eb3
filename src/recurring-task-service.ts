/**
 * Recurring Task Service
 *
 * Storage-backed operations on templates and their instances: generation
 * with persisted counter and cursor, completion top-up, pattern changes,
 * deletion and cleanup.
 *
 * Every operation on a template runs under that template's lock. Writes go
 * through one adapter transaction at a time, since adapter transactions
 * are connection-wide.
 */

import { Mutex } from 'async-mutex'
import type { TaskAdapter } from './adapter'
import type { TaskId } from './types'
import { type LocalDate, addDays, toLocalDate } from './time-date'
import { type Task, isRecurring } from './task'
import { type RecurrenceSpecInput, createRecurrenceSpec, withCurrentCount } from './recurrence-spec'
import { recurrenceHasEnded } from './end-condition'
import { type CursorMode, type GenerationResult, planInstances } from './instance-generator'
import type { Logger } from './logger'
import { createKeyedLock } from './internal/template-lock'
import { NotFoundError, NotRecurringError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type RecurringTaskServiceDeps = {
  adapter: TaskAdapter
  clock: () => Date
  logger: Logger
  safetyCap: number
  cursorMode: CursorMode
  lookaheadDays: number
  completionLookaheadDays: number
  cleanupAfterDays: number
  newId?: () => TaskId
}

export type GenerationFailure = {
  templateId: TaskId
  error: Error
}

export type UpcomingSummary = {
  /** Templates generation was attempted for. */
  processed: number
  /** Instances created across all templates. */
  generated: number
  failures: GenerationFailure[]
}

export type CompletionResult = {
  instance: Task
  /** Instances created for the parent template by the top-up. */
  generated: Task[]
}

export type MaintenanceSummary = {
  upcoming: UpcomingSummary
  cleaned: number
}

export interface RecurringTaskService {
  generateInstances(templateId: TaskId, horizon: LocalDate): Promise<GenerationResult>
  generateNextInstance(templateId: TaskId): Promise<Task | null>
  findTasksNeedingInstances(): Promise<Task[]>
  generateUpcoming(daysAhead?: number): Promise<UpcomingSummary>
  completeInstance(instanceId: TaskId): Promise<CompletionResult>
  deleteRecurringTask(templateId: TaskId): Promise<number>
  updateRecurrence(templateId: TaskId, input: RecurrenceSpecInput): Promise<Task>
  getInstances(templateId: TaskId): Promise<Task[]>
  getNextDueInstance(templateId: TaskId): Promise<Task | null>
  cleanupCompletedInstances(olderThanDays?: number): Promise<number>
  maintain(): Promise<MaintenanceSummary>
}

// ============================================================================
// Helpers
// ============================================================================

function requireDays(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${value}`)
  }
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

// ============================================================================
// Factory
// ============================================================================

export function createRecurringTaskService(deps: RecurringTaskServiceDeps): RecurringTaskService {
  const { adapter, clock } = deps
  const log = deps.logger
  const locks = createKeyedLock()
  const writeLock = new Mutex()

  function today(): LocalDate {
    return toLocalDate(clock())
  }

  function inTransaction<T>(fn: () => Promise<T>): Promise<T> {
    return writeLock.runExclusive(() => adapter.transaction(fn))
  }

  async function loadTemplate(templateId: TaskId): Promise<Task> {
    const template = await adapter.getTask(templateId)
    if (!template) throw new NotFoundError(`Task '${templateId}' not found`)
    if (template.isRecurringInstance) {
      throw new NotRecurringError(`Task '${templateId}' is a recurring instance, not a template`)
    }
    return template
  }

  function plan(template: Task, horizon: LocalDate): GenerationResult {
    return planInstances(template, {
      horizon,
      now: clock(),
      safetyCap: deps.safetyCap,
      cursorMode: deps.cursorMode,
      ...(deps.newId ? { newId: deps.newId } : {}),
    })
  }

  /** Inserts planned instances and advances the template. Call inside a transaction. */
  async function writeGeneration(template: Task, result: GenerationResult): Promise<void> {
    if (result.instances.length === 0) return
    for (const instance of result.instances) {
      await adapter.insertTask(instance)
    }
    await adapter.updateTask(template.id, {
      recurrence: withCurrentCount(template.recurrence, result.currentCount),
      ...(result.generatedThrough !== null ? { generatedThrough: result.generatedThrough } : {}),
    })
  }

  async function generateLocked(templateId: TaskId, horizon: LocalDate): Promise<GenerationResult> {
    const template = await loadTemplate(templateId)
    const result = plan(template, horizon)
    await inTransaction(() => writeGeneration(template, result))
    log.debug('Generated instances', {
      templateId,
      horizon,
      count: result.instances.length,
      stopReason: result.stopReason,
    })
    return result
  }

  const service: RecurringTaskService = {
    // ================================================================
    // Generation
    // ================================================================
    async generateInstances(templateId, horizon) {
      return locks.runExclusive(templateId, () => generateLocked(templateId, horizon))
    },

    async generateNextInstance(templateId) {
      const horizon = addDays(today(), 1)
      const result = await service.generateInstances(templateId, horizon)
      return result.instances[0] ?? null
    },

    async findTasksNeedingInstances() {
      const now = today()
      const templates = await adapter.getTemplates()
      return templates.filter((t) => !recurrenceHasEnded(t, now))
    },

    async generateUpcoming(daysAhead = deps.lookaheadDays) {
      requireDays(daysAhead, 'daysAhead')
      const now = today()
      const horizon = addDays(now, daysAhead)
      const ids = await adapter.getTemplateIds()
      const summary: UpcomingSummary = { processed: 0, generated: 0, failures: [] }

      function fail(templateId: TaskId, e: unknown): void {
        const error = toError(e)
        log.error('Instance generation failed', { templateId, error })
        summary.failures.push({ templateId, error })
      }

      // Templates are loaded one by one so a row that fails to decode is
      // reported against its own id.
      for (const id of ids) {
        let template: Task | null
        try {
          template = await adapter.getTask(id)
        } catch (e) {
          summary.processed++
          fail(id, e)
          continue
        }
        if (!template || recurrenceHasEnded(template, now)) continue

        summary.processed++
        try {
          const result = await service.generateInstances(id, horizon)
          summary.generated += result.instances.length
        } catch (e) {
          fail(id, e)
        }
      }

      log.info('Generated upcoming instances', {
        horizon,
        processed: summary.processed,
        generated: summary.generated,
        failed: summary.failures.length,
      })
      return summary
    },

    // ================================================================
    // Completion
    // ================================================================
    async completeInstance(instanceId) {
      const found = await adapter.getTask(instanceId)
      if (!found) throw new NotFoundError(`Task '${instanceId}' not found`)
      const parentId = found.parentRecurringTaskId
      if (!found.isRecurringInstance || parentId === undefined) {
        throw new NotRecurringError(`Task '${instanceId}' is not a recurring instance`)
      }

      return locks.runExclusive(parentId, async () => {
        const parent = await loadTemplate(parentId)
        const result = isRecurring(parent)
          ? plan(parent, addDays(today(), deps.completionLookaheadDays))
          : null

        await inTransaction(async () => {
          await adapter.updateTask(instanceId, { isCompleted: true })
          if (result) await writeGeneration(parent, result)
        })

        const instance = await adapter.getTask(instanceId)
        if (!instance) throw new NotFoundError(`Task '${instanceId}' not found`)
        return { instance, generated: result?.instances ?? [] }
      })
    },

    // ================================================================
    // Template Changes
    // ================================================================
    async deleteRecurringTask(templateId) {
      return locks.runExclusive(templateId, async () => {
        await loadTemplate(templateId)
        const instances = await adapter.getInstancesByParent(templateId)
        await inTransaction(async () => {
          for (const instance of instances) {
            await adapter.deleteTask(instance.id)
          }
          await adapter.deleteTask(templateId)
        })
        log.info('Deleted recurring task', { templateId, instances: instances.length })
        return instances.length
      })
    },

    async updateRecurrence(templateId, input) {
      return locks.runExclusive(templateId, async () => {
        const template = await loadTemplate(templateId)
        const now = today()
        const instances = await adapter.getInstancesByParent(templateId)
        const stale = instances.filter((i) => !i.isCompleted && i.dueDate !== undefined && i.dueDate > now)
        const kept = instances.filter((i) => !stale.includes(i))

        // Latest occurrence still stored, or the old cursor capped at today
        // when the instances before it were cleaned up.
        const previous = template.generatedThrough
        let cursor: LocalDate | undefined = previous !== undefined && previous > now ? now : previous
        for (const instance of kept) {
          const date = instance.recurringInstanceDate
          if (date !== undefined && (cursor === undefined || date > cursor)) cursor = date
        }

        const recurrence = createRecurrenceSpec({
          ...input,
          currentCount: Math.max(0, template.recurrence.currentCount - stale.length),
        })
        const rewound: Task = { ...template, recurrence, generatedThrough: cursor }
        const result = isRecurring(rewound) ? plan(rewound, addDays(now, deps.lookaheadDays)) : null

        await inTransaction(async () => {
          for (const instance of stale) {
            await adapter.deleteTask(instance.id)
          }
          await adapter.updateTask(templateId, { recurrence, generatedThrough: cursor })
          if (result) await writeGeneration(rewound, result)
        })

        log.info('Updated recurrence', {
          templateId,
          pattern: recurrence.pattern,
          removed: stale.length,
          generated: result?.instances.length ?? 0,
        })
        return loadTemplate(templateId)
      })
    },

    // ================================================================
    // Queries
    // ================================================================
    async getInstances(templateId) {
      return adapter.getInstancesByParent(templateId)
    },

    async getNextDueInstance(templateId) {
      const now = today()
      const instances = await adapter.getInstancesByParent(templateId)
      return instances.find((i) => !i.isCompleted && i.dueDate !== undefined && i.dueDate >= now) ?? null
    },

    // ================================================================
    // Maintenance
    // ================================================================
    async cleanupCompletedInstances(olderThanDays = deps.cleanupAfterDays) {
      requireDays(olderThanDays, 'olderThanDays')
      const cutoff = addDays(today(), -olderThanDays)
      const old = await adapter.getCompletedInstanceIds(cutoff)
      await inTransaction(async () => {
        for (const id of old) {
          await adapter.deleteTask(id)
        }
      })
      log.info('Cleaned up completed instances', { cutoff, count: old.length })
      return old.length
    },

    async maintain() {
      log.info('Starting recurring task maintenance')
      const upcoming = await service.generateUpcoming()
      const cleaned = await service.cleanupCompletedInstances()
      log.info('Recurring task maintenance finished', {
        processed: upcoming.processed,
        generated: upcoming.generated,
        failed: upcoming.failures.length,
        cleaned,
      })
      return { upcoming, cleaned }
    },
  }

  return service
}
