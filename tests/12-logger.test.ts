/**
 * Segment 12: Logger Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger, defaultLogLevel, isLogLevel } from '../src/logger'

afterEach(() => {
  vi.restoreAllMocks()
  vi.unstubAllEnvs()
})

const LINE = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /

describe('createLogger', () => {
  it('formats level, namespace and data', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    createLogger('recurrence', { level: 'info' }).info('Generated', { count: 3 })

    expect(info).toHaveBeenCalledOnce()
    const line = String(info.mock.calls[0]?.[0])
    expect(line).toMatch(LINE)
    expect(line.replace(LINE, '')).toBe('[INFO] [recurrence] Generated {"count":3}')
  })

  it('drops messages below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const log = createLogger('recurrence', { level: 'warn' })
    log.debug('hidden')
    log.warn('shown')
    expect(debug).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledOnce()
  })

  it('prints nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    createLogger('recurrence', { level: 'silent' }).error('hidden')
    expect(error).not.toHaveBeenCalled()
  })

  it('serializes errors by name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    createLogger('recurrence', { level: 'error' }).error('Failed', { error: new TypeError('boom') })
    const line = String(error.mock.calls[0]?.[0])
    expect(line.replace(LINE, '')).toBe('[ERROR] [recurrence] Failed {"error":{"name":"TypeError","message":"boom"}}')
  })

  it('nests child namespaces and keeps the level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const child = createLogger('recurrence', { level: 'info' }).child('service')
    expect(child.namespace).toBe('recurrence:service')
    child.info('hello')
    expect(String(info.mock.calls[0]?.[0]).replace(LINE, '')).toBe('[INFO] [recurrence:service] hello')
  })
})

describe('Log level configuration', () => {
  it('defaults to warn', () => {
    vi.stubEnv('RECURRENCE_LOG_LEVEL', '')
    expect(defaultLogLevel()).toBe('warn')
  })

  it('reads RECURRENCE_LOG_LEVEL case-insensitively', () => {
    vi.stubEnv('RECURRENCE_LOG_LEVEL', 'DEBUG')
    expect(defaultLogLevel()).toBe('debug')
  })

  it('ignores unknown levels', () => {
    vi.stubEnv('RECURRENCE_LOG_LEVEL', 'verbose')
    expect(defaultLogLevel()).toBe('warn')
  })

  it('recognizes only own level names', () => {
    expect(isLogLevel('error')).toBe(true)
    expect(isLogLevel('toString')).toBe(false)
  })
})
