/**
 * Shared test fixtures: dates, templates, id sequences, clocks and loggers.
 */
import type { LocalDate, LocalDateTime } from '../../src/time-date'
import { parseDate, parseDateTime } from '../../src/time-date'
import { type TaskId, taskId } from '../../src/types'
import { type Task, type TaskInput, createTask } from '../../src/task'
import { type Logger, createLogger } from '../../src/logger'

/** Parses a YYYY-MM-DD literal, failing the test on bad input. */
export function d(s: string): LocalDate {
  const result = parseDate(s)
  if (!result.ok) throw result.error
  return result.value
}

export function dt(s: string): LocalDateTime {
  const result = parseDateTime(s)
  if (!result.ok) throw result.error
  return result.value
}

export const CREATED = dt('2024-01-01T09:00:00')

/** A task with a due date of 2024-01-01 unless overridden. */
export function makeTemplate(overrides: Partial<TaskInput> & { generatedThrough?: LocalDate } = {}): Task {
  const { generatedThrough, ...input } = overrides
  const task = createTask({
    id: taskId('tpl-1'),
    title: 'Pay rent',
    createdDate: CREATED,
    dueDate: d('2024-01-01'),
    ...input,
  })
  return generatedThrough !== undefined ? { ...task, generatedThrough } : task
}

/** Ids `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = 'inst'): () => TaskId {
  let n = 0
  return () => taskId(`${prefix}-${++n}`)
}

/** Clock fixed at noon local time on the given day. */
export function clockAt(date: string): () => Date {
  const local = d(date)
  const [y, m, day] = local.split('-').map(Number)
  return () => new Date(y ?? 2024, (m ?? 1) - 1, day ?? 1, 12, 0, 0)
}

export function noonOn(date: string): Date {
  return clockAt(date)()
}

export function silentLogger(): Logger {
  return createLogger('test', { level: 'silent' })
}

export type CapturedLine = {
  level: 'debug' | 'info' | 'warn' | 'error'
  message: string
  data?: Record<string, unknown>
}

/** Logger that records calls instead of printing them. */
export function captureLogger(lines: CapturedLine[] = [], namespace = 'test'): Logger & { lines: CapturedLine[] } {
  const record = (level: CapturedLine['level']) => (message: string, data?: Record<string, unknown>) => {
    lines.push(data ? { level, message, data } : { level, message })
  }
  return {
    namespace,
    lines,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (ns) => captureLogger(lines, `${namespace}:${ns}`),
  }
}
