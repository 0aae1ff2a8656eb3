/**
 * task-recurrence
 *
 * Public API exports
 */

// Error system: base class, codes and every error class
export {
  RecurrenceError, RecurrenceErrorCode,
  DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError,
  ValidationError, NotRecurringError,
  ParseError, InvalidPatternError, WeekdayDecodeError,
} from './errors'
export type { RecurrenceErrorCode as RecurrenceErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime, toLocalDate, toLocalDateTime,
  yearOf, monthOf, dayOf,
  addDays, addWeeks, addMonths, addYears,
  weekdayCodeOf, isWeekend,
} from './time-date'

// Branded ID types
export type { TaskId } from './types'
export { taskId } from './types'

// Recurrence rules
export type {
  RecurrencePattern, EndCondition, RecurrenceSpec, RecurrenceSpecInput,
} from './recurrence-spec'
export {
  RECURRENCE_PATTERNS, WeekdayCode, NEVER_ENDS, NO_RECURRENCE,
  isRecurrencePattern, isWeekdayCode, normalizeWeekdays,
  createRecurrenceSpec, withCurrentCount,
  daily, weekdaysOnly, weekly, biweekly, monthly, yearly, custom,
  endAfter, endOn,
} from './recurrence-spec'
export { encodeWeekdays, decodeWeekdays } from './weekday-codec'

// Tasks
export type { Task, TaskChanges, TaskInput, EmailLink } from './task'
export { createTask, createInstance, isRecurring } from './task'

// Pure engine pieces
export { nextOccurrence, nextBusinessDay, nextSelectedWeekday } from './next-date'
export type { EndStop } from './end-condition'
export { hasRecurrenceEnded, recurrenceHasEnded, endConditionStop } from './end-condition'
export type {
  CursorMode, StopReason, PlanOptions, GenerationResult, InstanceSink,
} from './instance-generator'
export { DEFAULT_SAFETY_CAP, planInstances, generateInstances } from './instance-generator'
export type { DescribeOptions } from './description'
export { describeRecurrence } from './description'

// Adapter (persistence interface + in-memory mock)
export type { TaskAdapter, MockAdapter } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter, SqliteAdapterOptions, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter, SCHEMA_VERSION } from './sqlite-adapter'

// Service
export type {
  RecurringTaskService, RecurringTaskServiceDeps, GenerationFailure,
  UpcomingSummary, CompletionResult, MaintenanceSummary,
} from './recurring-task-service'
export { createRecurringTaskService } from './recurring-task-service'

// Logging
export type { Logger, LogLevel, LoggerOptions } from './logger'
export { createLogger, defaultLogLevel, isLogLevel } from './logger'

// Engine
export type { RecurrenceEngine, RecurrenceEngineConfig } from './public-api'
export {
  createRecurrenceEngine,
  DEFAULT_LOOKAHEAD_DAYS, DEFAULT_COMPLETION_LOOKAHEAD_DAYS, DEFAULT_CLEANUP_AFTER_DAYS,
} from './public-api'
