import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import lockfile from 'proper-lockfile'
import { createSnapshotStore } from './memory.js'
import { emptySnapshot, type Store, type StoreSnapshot } from './types.js'

const TABLE_KEYS = ['models', 'agents', 'conversations', 'messages', 'batchJobs', 'evaluationJobs'] as const

function isSnapshot(value: unknown): value is StoreSnapshot {
  if (!value || typeof value !== 'object') return false
  if (!('version' in value) || value.version !== 1) return false
  return TABLE_KEYS.every((key) => {
    const table: unknown = Reflect.get(value, key)
    return (
      !!table &&
      typeof table === 'object' &&
      'nextId' in table &&
      typeof table.nextId === 'number' &&
      'rows' in table &&
      Array.isArray(table.rows)
    )
  })
}

export interface JsonFileStoreOptions {
  /** A lock older than this is taken to belong to a dead process */
  staleMs?: number
  /** Attempts to take a lock another process holds before giving up */
  lockRetries?: number
}

let tmpCounter = 0

/**
 * Store persisted as a single JSON document. Every unit of work holds an
 * exclusive lock on the file from load to commit, so separate processes
 * pointed at the same path (a CLI cancelling a batch another CLI is running)
 * see each other's commits and never overwrite them.
 */
export function createJsonFileStore(path: string, options: JsonFileStoreOptions = {}): Store {
  // Units of work from this process queue here before contending for the file lock
  let tail: Promise<unknown> = Promise.resolve()

  async function underLock<R>(unit: () => R): Promise<R> {
    mkdirSync(dirname(path), { recursive: true })
    const release = await lockfile.lock(path, {
      realpath: false,
      stale: options.staleMs ?? 10_000,
      retries: { retries: options.lockRetries ?? 200, minTimeout: 5, maxTimeout: 50 },
    })
    try {
      return unit()
    } finally {
      await release()
    }
  }

  return createSnapshotStore({
    load() {
      if (!existsSync(path)) return emptySnapshot()

      const data: unknown = JSON.parse(readFileSync(path, 'utf-8'))
      if (!isSnapshot(data)) {
        throw new Error(`Store file ${path} is not a bench-duo store`)
      }
      return data
    },

    commit(draft) {
      const tmp = `${path}.${process.pid}.${++tmpCounter}.tmp`
      writeFileSync(tmp, JSON.stringify(draft, null, 2))
      renameSync(tmp, path)
    },

    exclusive<R>(unit: () => R): Promise<R> {
      const result = tail.then(() => underLock(unit))
      // The caller gets the failure through `result`; the queue moves on
      tail = result.catch(() => undefined)
      return result
    },
  })
}
