/**
 * Public API
 *
 * Assembles the recurrence engine from an adapter and configuration:
 * the pure date and description helpers bound to the configured clock and
 * locale, plus the storage-backed recurring task service.
 */

import type { TaskAdapter } from './adapter'
import type { Task } from './task'
import { type LocalDate, toLocalDate } from './time-date'
import type { RecurrenceSpec } from './recurrence-spec'
import { nextOccurrence } from './next-date'
import { recurrenceHasEnded } from './end-condition'
import { describeRecurrence } from './description'
import {
  type CursorMode, type GenerationResult, type InstanceSink,
  DEFAULT_SAFETY_CAP, generateInstances,
} from './instance-generator'
import { type RecurringTaskService, createRecurringTaskService } from './recurring-task-service'
import { type Logger, createLogger } from './logger'
import { isRecurring } from './task'

export { ValidationError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type RecurrenceEngineConfig = {
  adapter: TaskAdapter
  /** Wall clock; defaults to `new Date()`. */
  clock?: () => Date
  safetyCap?: number
  cursorMode?: CursorMode
  /** Horizon for `generateUpcoming` and pattern changes. */
  lookaheadDays?: number
  /** Horizon for the top-up after an instance is completed. */
  completionLookaheadDays?: number
  cleanupAfterDays?: number
  locale?: string
  logger?: Logger
}

export type RecurrenceEngine = RecurringTaskService & {
  nextDueDate(template: Task): LocalDate | null
  recurrenceHasEnded(template: Task): boolean
  /**
   * Generates instances into `storage` (the configured adapter by default)
   * without touching the template. The caller persists `currentCount` and
   * `generatedThrough` from the result.
   */
  generateRecurringInstances(template: Task, horizon: LocalDate, storage?: InstanceSink): Promise<GenerationResult>
  recurrenceDescription(spec: RecurrenceSpec): string
  close(): Promise<void>
}

export const DEFAULT_LOOKAHEAD_DAYS = 90
export const DEFAULT_COMPLETION_LOOKAHEAD_DAYS = 30
export const DEFAULT_CLEANUP_AFTER_DAYS = 30

// ============================================================================
// Validation
// ============================================================================

function isValidLocale(locale: string): boolean {
  try {
    new Intl.DateTimeFormat(locale)
    return true
  } catch {
    return false
  }
}

function requireInteger(value: number, name: string, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${name} must be an integer >= ${min}, got ${value}`)
  }
  return value
}

// ============================================================================
// Factory
// ============================================================================

export function createRecurrenceEngine(config: RecurrenceEngineConfig): RecurrenceEngine {
  if (!config.adapter || typeof config.adapter !== 'object') {
    throw new ValidationError('Adapter is required')
  }
  if (config.clock !== undefined && typeof config.clock !== 'function') {
    throw new ValidationError('Clock must be a function returning a Date')
  }
  const cursorMode = config.cursorMode ?? 'resume'
  if (cursorMode !== 'resume' && cursorMode !== 'restart') {
    throw new ValidationError(`Invalid cursor mode: ${String(cursorMode)}`)
  }
  const locale = config.locale ?? 'en-US'
  if (!isValidLocale(locale)) {
    throw new ValidationError(`Invalid locale: ${locale}`)
  }

  const adapter = config.adapter
  const clock = config.clock ?? (() => new Date())
  const safetyCap = requireInteger(config.safetyCap ?? DEFAULT_SAFETY_CAP, 'safetyCap', 1)
  const lookaheadDays = requireInteger(config.lookaheadDays ?? DEFAULT_LOOKAHEAD_DAYS, 'lookaheadDays', 0)
  const completionLookaheadDays = requireInteger(
    config.completionLookaheadDays ?? DEFAULT_COMPLETION_LOOKAHEAD_DAYS, 'completionLookaheadDays', 0,
  )
  const cleanupAfterDays = requireInteger(config.cleanupAfterDays ?? DEFAULT_CLEANUP_AFTER_DAYS, 'cleanupAfterDays', 0)
  const logger = config.logger ?? createLogger('recurrence')

  const service = createRecurringTaskService({
    adapter,
    clock,
    logger: logger.child('service'),
    safetyCap,
    cursorMode,
    lookaheadDays,
    completionLookaheadDays,
    cleanupAfterDays,
  })

  return {
    ...service,

    nextDueDate(template) {
      if (!isRecurring(template) || template.dueDate === undefined) return null
      return nextOccurrence(template.recurrence, toLocalDate(clock()))
    },

    recurrenceHasEnded(template) {
      return recurrenceHasEnded(template, toLocalDate(clock()))
    },

    async generateRecurringInstances(template, horizon, storage = adapter) {
      return generateInstances(template, storage, { horizon, now: clock(), safetyCap, cursorMode })
    },

    recurrenceDescription(spec) {
      return describeRecurrence(spec, { locale })
    },

    async close() {
      await adapter.close?.()
    },
  }
}
