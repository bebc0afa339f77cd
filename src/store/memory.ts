import type { WithId } from '../domain/types.js'
import { NotFoundError } from '../errors.js'
import { emptySnapshot, type Session, type Store, type StoreSnapshot, type TableData, type TableSession } from './types.js'

interface MemoryTable<F> extends TableSession<F> {
  /** Remove every row matching `predicate`, running cascades. */
  deleteWhere(predicate: (row: WithId<F>) => boolean): number
}

function memoryTable<F>(
  entity: string,
  data: TableData<F>,
  touch: () => void,
  onDelete: (id: number) => void = () => {},
): MemoryTable<F> {
  const table: MemoryTable<F> = {
    get(id) {
      const row = data.rows.find((r) => r.id === id)
      return row ? structuredClone(row) : undefined
    },

    require(id) {
      const row = table.get(id)
      if (!row) throw new NotFoundError(entity, id)
      return row
    },

    list(filter) {
      const rows = filter ? data.rows.filter(filter) : data.rows
      return rows.map((r) => structuredClone(r))
    },

    insert(values) {
      const row = { ...structuredClone(values), id: data.nextId++ }
      data.rows.push(row)
      touch()
      return structuredClone(row)
    },

    update(id, patch) {
      const index = data.rows.findIndex((r) => r.id === id)
      const current = data.rows[index]
      if (!current) throw new NotFoundError(entity, id)

      const next = { ...current, ...structuredClone(patch), id }
      data.rows[index] = next
      touch()
      return structuredClone(next)
    },

    delete(id) {
      const index = data.rows.findIndex((r) => r.id === id)
      if (index === -1) return false
      onDelete(id)
      data.rows.splice(index, 1)
      touch()
      return true
    },

    deleteWhere(predicate) {
      const ids = data.rows.filter(predicate).map((r) => r.id)
      for (const id of ids) table.delete(id)
      return ids.length
    },
  }
  return table
}

/** A session writing into `draft`; `changed()` tells whether any write went through. */
export function openSession(draft: StoreSnapshot): { session: Session; changed: () => boolean } {
  let dirty = false
  const touch = () => {
    dirty = true
  }

  const agents = memoryTable('Agent', draft.agents, touch)
  const messages = memoryTable('Message', draft.messages, touch)

  const session: Session = {
    // Hard delete: a model takes its agents with it
    models: memoryTable('Model', draft.models, touch, (id) => {
      agents.deleteWhere((a) => a.modelId === id)
    }),
    agents,
    conversations: memoryTable('Conversation', draft.conversations, touch, (id) => {
      messages.deleteWhere((m) => m.conversationId === id)
    }),
    messages,
    batchJobs: memoryTable('BatchJob', draft.batchJobs, touch),
    evaluationJobs: memoryTable('EvaluationJob', draft.evaluationJobs, touch),
  }
  return { session, changed: () => dirty }
}

/** Where a snapshot store keeps its committed state. */
export interface SnapshotBackend {
  /** A private copy of the committed state; the unit of work mutates it freely */
  load(): StoreSnapshot
  commit(draft: StoreSnapshot): void
  /** Run `unit` with no other unit of work against the same state in between. */
  exclusive<R>(unit: () => R): Promise<R>
}

/**
 * Store over whole snapshots: each unit of work loads the committed state,
 * works on it and commits it back when it returns normally and wrote something.
 */
export function createSnapshotStore(backend: SnapshotBackend): Store {
  return {
    transaction<R>(work: (session: Session) => R): Promise<R> {
      return backend.exclusive(() => {
        const draft = backend.load()
        const { session, changed } = openSession(draft)
        const result = work(session)
        if (result instanceof Promise) {
          throw new Error('Unit of work must be synchronous; await remote calls outside the transaction')
        }
        if (changed()) backend.commit(draft)
        return result
      })
    },
  }
}

/** Process-local store. */
export function createMemoryStore(initial?: StoreSnapshot): Store {
  let snapshot = initial ? structuredClone(initial) : emptySnapshot()

  return createSnapshotStore({
    load() {
      return structuredClone(snapshot)
    },
    commit(draft) {
      snapshot = draft
    },
    async exclusive<R>(unit: () => R): Promise<R> {
      return unit()
    },
  })
}
