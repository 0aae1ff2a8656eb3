/**
 * SQLite Adapter
 *
 * Production implementation of the task adapter using better-sqlite3.
 * One `task` table holds templates, instances and plain tasks; instances
 * reference their template through a RESTRICT foreign key.
 */
import Database from 'better-sqlite3'
import type { TaskAdapter } from './adapter'
import type { Task, TaskChanges, EmailLink } from './task'
import { type TaskId, taskId } from './types'
import { type LocalDate, type LocalDateTime, parseDate, parseDateTime } from './time-date'
import { type EndCondition, type RecurrenceSpec, createRecurrenceSpec, isRecurrencePattern } from './recurrence-spec'
import { encodeWeekdays, decodeWeekdays } from './weekday-codec'
import { type Logger, createLogger } from './logger'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError, RecurrenceError } from './errors'

export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific methods
// ============================================================================

export type SqliteExtras = {
  execute(sql: string): Promise<void>
  rawQuery(sql: string): Promise<unknown[]>
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = TaskAdapter & SqliteExtras & { close(): Promise<void> }

export type SqliteAdapterOptions = {
  logger?: Logger
}

export const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS task (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    is_completed INTEGER NOT NULL DEFAULT 0 CHECK (is_completed IN (0, 1)),
    created_date TEXT NOT NULL,
    due_date TEXT,
    section_id TEXT,
    email_message_id TEXT,
    email_subject TEXT,
    email_sender TEXT,
    email_url TEXT,
    amount REAL,
    recurrence_pattern TEXT NOT NULL DEFAULT 'never',
    recurrence_interval INTEGER NOT NULL DEFAULT 1 CHECK (recurrence_interval >= 1),
    recurrence_weekdays TEXT NOT NULL DEFAULT '',
    recurrence_end_type TEXT NOT NULL DEFAULT 'never'
      CHECK (recurrence_end_type IN ('never', 'after_count', 'on_date')),
    recurrence_end_count INTEGER CHECK (recurrence_end_count IS NULL OR recurrence_end_count >= 1),
    recurrence_end_date TEXT,
    recurrence_current_count INTEGER NOT NULL DEFAULT 0 CHECK (recurrence_current_count >= 0),
    is_recurring_instance INTEGER NOT NULL DEFAULT 0 CHECK (is_recurring_instance IN (0, 1)),
    parent_recurring_task_id TEXT REFERENCES task(id) ON DELETE RESTRICT,
    recurring_instance_date TEXT,
    generated_through TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_task_parent ON task(parent_recurring_task_id);
  CREATE INDEX IF NOT EXISTS idx_task_due ON task(due_date);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type TaskRow = {
  id: string
  title: string
  description: string
  is_completed: number
  created_date: string
  due_date: string | null
  section_id: string | null
  email_message_id: string | null
  email_subject: string | null
  email_sender: string | null
  email_url: string | null
  amount: number | null
  recurrence_pattern: string
  recurrence_interval: number
  recurrence_weekdays: string
  recurrence_end_type: string
  recurrence_end_count: number | null
  recurrence_end_date: string | null
  recurrence_current_count: number
  is_recurring_instance: number
  parent_recurring_task_id: string | null
  recurring_instance_date: string | null
  generated_through: string | null
}

/** Every column after `id`, in TASK_COLUMNS order. */
type TaskFields = [
  string, string, number, string, string | null, string | null,
  string | null, string | null, string | null, string | null, number | null,
  string, number, string, string, number | null, string | null, number,
  number, string | null, string | null, string | null,
]

type SchemaVersionRow = { v: number | null }

const TASK_COLUMNS = [
  'id', 'title', 'description', 'is_completed', 'created_date', 'due_date', 'section_id',
  'email_message_id', 'email_subject', 'email_sender', 'email_url', 'amount',
  'recurrence_pattern', 'recurrence_interval', 'recurrence_weekdays', 'recurrence_end_type',
  'recurrence_end_count', 'recurrence_end_date', 'recurrence_current_count',
  'is_recurring_instance', 'parent_recurring_task_id', 'recurring_instance_date', 'generated_through',
] as const

const INSERT_SQL =
  `INSERT INTO task (${TASK_COLUMNS.join(', ')}) VALUES (${TASK_COLUMNS.map(() => '?').join(', ')})`

const UPDATE_SQL =
  `UPDATE task SET ${TASK_COLUMNS.slice(1).map((c) => `${c} = ?`).join(', ')} WHERE id = ?`

// ============================================================================
// Row Mapping
// ============================================================================

function toFields(task: Task): TaskFields {
  const spec = task.recurrence
  return [
    task.title,
    task.description,
    task.isCompleted ? 1 : 0,
    task.createdDate,
    task.dueDate ?? null,
    task.sectionId ?? null,
    task.email?.messageId ?? null,
    task.email?.subject ?? null,
    task.email?.sender ?? null,
    task.email?.url ?? null,
    task.amount ?? null,
    spec.pattern,
    spec.interval,
    encodeWeekdays(spec.weekdays),
    spec.end.type === 'afterCount' ? 'after_count' : spec.end.type === 'onDate' ? 'on_date' : 'never',
    spec.end.type === 'afterCount' ? spec.end.count : null,
    spec.end.type === 'onDate' ? spec.end.date : null,
    spec.currentCount,
    task.isRecurringInstance ? 1 : 0,
    task.parentRecurringTaskId ?? null,
    task.recurringInstanceDate ?? null,
    task.generatedThrough ?? null,
  ]
}

function dateColumn(row: TaskRow, column: string, value: string): LocalDate {
  const parsed = parseDate(value)
  if (!parsed.ok) throw new InvalidDataError(`Task '${row.id}' has invalid ${column}: '${value}'`)
  return parsed.value
}

function dateTimeColumn(row: TaskRow, value: string): LocalDateTime {
  const parsed = parseDateTime(value)
  if (!parsed.ok) throw new InvalidDataError(`Task '${row.id}' has invalid created_date: '${value}'`)
  return parsed.value
}

function toEmail(row: TaskRow): EmailLink | undefined {
  if (row.email_message_id == null) return undefined
  return {
    messageId: row.email_message_id,
    ...(row.email_subject != null ? { subject: row.email_subject } : {}),
    ...(row.email_sender != null ? { sender: row.email_sender } : {}),
    ...(row.email_url != null ? { url: row.email_url } : {}),
  }
}

function toEnd(row: TaskRow): EndCondition {
  switch (row.recurrence_end_type) {
    case 'never':
      return { type: 'never' }
    case 'after_count':
      if (row.recurrence_end_count == null) {
        throw new InvalidDataError(`Task '${row.id}' ends after a count but has none`)
      }
      return { type: 'afterCount', count: row.recurrence_end_count }
    case 'on_date':
      if (row.recurrence_end_date == null) {
        throw new InvalidDataError(`Task '${row.id}' ends on a date but has none`)
      }
      return { type: 'onDate', date: dateColumn(row, 'recurrence_end_date', row.recurrence_end_date) }
    default:
      throw new InvalidDataError(`Task '${row.id}' has unknown end type '${row.recurrence_end_type}'`)
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string, options: SqliteAdapterOptions = {}): Promise<SqliteAdapter> {
  const log = options.logger ?? createLogger('recurrence:sqlite')
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const versionStmt = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version')
  if (versionStmt.get()?.v == null) {
    db.prepare<[number, string]>('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const insertStmt = db.prepare<[string, ...TaskFields]>(INSERT_SQL)
  const updateStmt = db.prepare<[...TaskFields, string]>(UPDATE_SQL)
  const getStmt = db.prepare<[string], TaskRow>('SELECT * FROM task WHERE id = ?')
  const allStmt = db.prepare<[], TaskRow>('SELECT * FROM task ORDER BY created_date, id')
  const templatesStmt = db.prepare<[], TaskRow>(
    "SELECT * FROM task WHERE recurrence_pattern <> 'never' AND is_recurring_instance = 0 ORDER BY created_date, id",
  )
  const templateIdsStmt = db.prepare<[], { id: string }>(
    "SELECT id FROM task WHERE recurrence_pattern <> 'never' AND is_recurring_instance = 0 ORDER BY created_date, id",
  )
  const completedIdsStmt = db.prepare<[string], { id: string }>(
    'SELECT id FROM task WHERE is_recurring_instance = 1 AND is_completed = 1 AND due_date < ? ORDER BY due_date, id',
  )
  const byParentStmt = db.prepare<[string], TaskRow>(
    'SELECT * FROM task WHERE parent_recurring_task_id = ? ORDER BY due_date, created_date, id',
  )
  const deleteStmt = db.prepare<[string]>('DELETE FROM task WHERE id = ?')

  let _inTx = false

  function toSpec(row: TaskRow): RecurrenceSpec {
    if (!isRecurrencePattern(row.recurrence_pattern)) {
      throw new InvalidDataError(`Task '${row.id}' has unknown recurrence pattern '${row.recurrence_pattern}'`)
    }
    const weekdays = decodeWeekdays(row.recurrence_weekdays)
    if (!weekdays.ok) {
      log.error('Failed to decode weekday set', { taskId: row.id, raw: weekdays.error.raw, error: weekdays.error })
      throw weekdays.error
    }
    try {
      return createRecurrenceSpec({
        pattern: row.recurrence_pattern,
        interval: row.recurrence_interval,
        weekdays: weekdays.value,
        end: toEnd(row),
        currentCount: row.recurrence_current_count,
      })
    } catch (e) {
      if (e instanceof InvalidDataError) throw e
      if (e instanceof RecurrenceError) throw new InvalidDataError(`Task '${row.id}': ${e.message}`)
      throw e
    }
  }

  function toTask(row: TaskRow): Task {
    const email = toEmail(row)
    return {
      id: taskId(row.id),
      title: row.title,
      description: row.description,
      isCompleted: row.is_completed === 1,
      createdDate: dateTimeColumn(row, row.created_date),
      ...(row.due_date != null ? { dueDate: dateColumn(row, 'due_date', row.due_date) } : {}),
      ...(row.section_id != null ? { sectionId: row.section_id } : {}),
      ...(email !== undefined ? { email } : {}),
      ...(row.amount != null ? { amount: row.amount } : {}),
      recurrence: toSpec(row),
      isRecurringInstance: row.is_recurring_instance === 1,
      ...(row.parent_recurring_task_id != null ? { parentRecurringTaskId: taskId(row.parent_recurring_task_id) } : {}),
      ...(row.recurring_instance_date != null
        ? { recurringInstanceDate: dateColumn(row, 'recurring_instance_date', row.recurring_instance_date) }
        : {}),
      ...(row.generated_through != null
        ? { generatedThrough: dateColumn(row, 'generated_through', row.generated_through) }
        : {}),
    }
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Tasks
    // ================================================================
    async insertTask(task: Task) {
      safe(() => insertStmt.run(task.id, ...toFields(task)))
    },

    async getTask(id: TaskId) {
      const row = getStmt.get(id)
      return row ? toTask(row) : null
    },

    async getAllTasks() {
      return allStmt.all().map(toTask)
    },

    async getTemplates() {
      return templatesStmt.all().map(toTask)
    },

    async getTemplateIds() {
      return templateIdsStmt.all().map((r) => taskId(r.id))
    },

    async getInstancesByParent(parentId: TaskId) {
      return byParentStmt.all(parentId).map(toTask)
    },

    async getCompletedInstanceIds(dueBefore: LocalDate) {
      return completedIdsStmt.all(dueBefore).map((r) => taskId(r.id))
    },

    async updateTask(id: TaskId, changes: TaskChanges) {
      const existing = getStmt.get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      const merged: Task = { ...toTask(existing), ...changes, id }
      safe(() => updateStmt.run(...toFields(merged), id))
    },

    async deleteTask(id: TaskId) {
      safe(() => deleteStmt.run(id))
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async execute(sql: string) {
      safe(() => db.exec(sql))
    },

    async rawQuery(sql: string) {
      return db.prepare(sql).all()
    },

    async listTables() {
      const rows = db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      return versionStmt.get()?.v ?? 0
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
