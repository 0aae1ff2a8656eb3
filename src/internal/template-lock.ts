/**
 * Keyed Locks
 *
 * One async-mutex per key, created on first use and dropped once nobody
 * holds or waits for it.
 */

import { Mutex } from 'async-mutex'

export type KeyedLock = {
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>
  /** Keys currently held or awaited. */
  activeKeys(): string[]
}

export function createKeyedLock(): KeyedLock {
  const entries = new Map<string, { mutex: Mutex; users: number }>()

  return {
    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
      let entry = entries.get(key)
      if (!entry) {
        entry = { mutex: new Mutex(), users: 0 }
        entries.set(key, entry)
      }
      entry.users++
      const held = entry
      try {
        return await held.mutex.runExclusive(fn)
      } finally {
        held.users--
        if (held.users === 0) entries.delete(key)
      }
    },

    activeKeys() {
      return [...entries.keys()]
    },
  }
}
