import type {
  AgentFields,
  BatchJobFields,
  ConversationFields,
  EvaluationJobFields,
  MessageFields,
  ModelFields,
  WithId,
} from '../domain/types.js'

export interface TableSession<F> {
  get(id: number): WithId<F> | undefined
  /** Like `get`, but throws NotFoundError when the row is missing. */
  require(id: number): WithId<F>
  /** Rows in insertion order, optionally filtered. */
  list(filter?: (row: WithId<F>) => boolean): WithId<F>[]
  /** Inserts and flushes: the returned row carries its assigned id. */
  insert(values: F): WithId<F>
  update(id: number, patch: Partial<F>): WithId<F>
  delete(id: number): boolean
}

/** One unit of work. Rows handed out are copies; write through `update`. */
export interface Session {
  models: TableSession<ModelFields>
  agents: TableSession<AgentFields>
  conversations: TableSession<ConversationFields>
  messages: TableSession<MessageFields>
  batchJobs: TableSession<BatchJobFields>
  evaluationJobs: TableSession<EvaluationJobFields>
}

export interface Store {
  /**
   * Run `work` as one atomic unit. It commits when `work` returns and rolls
   * back when it throws. `work` must be synchronous: remote calls happen
   * between units of work, never inside one.
   */
  transaction<R>(work: (session: Session) => R): Promise<R>
}

export interface TableData<F> {
  nextId: number
  rows: WithId<F>[]
}

export interface StoreSnapshot {
  version: 1
  models: TableData<ModelFields>
  agents: TableData<AgentFields>
  conversations: TableData<ConversationFields>
  messages: TableData<MessageFields>
  batchJobs: TableData<BatchJobFields>
  evaluationJobs: TableData<EvaluationJobFields>
}

export function emptySnapshot(): StoreSnapshot {
  const table = <F>(): TableData<F> => ({ nextId: 1, rows: [] })
  return {
    version: 1,
    models: table(),
    agents: table(),
    conversations: table(),
    messages: table(),
    batchJobs: table(),
    evaluationJobs: table(),
  }
}
