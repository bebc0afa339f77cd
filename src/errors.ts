export type ErrorKind = 'configuration' | 'not-found' | 'connector' | 'turn-failure'

export class BenchDuoError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.kind = kind
  }
}

/** Rejected before any work is enqueued; never retried. */
export class ConfigurationError extends BenchDuoError {
  constructor(message: string) {
    super('configuration', message)
  }
}

export class NotFoundError extends BenchDuoError {
  constructor(entity: string, id: number) {
    super('not-found', `${entity} ${id} not found`)
  }
}

/** A probe, list, chat or warm call against an inference backend failed. */
export class ConnectorError extends BenchDuoError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connector', message, options)
  }
}

export class TurnFailure extends BenchDuoError {
  readonly conversationId: number
  readonly turn: number
  readonly sender: 'agent1' | 'agent2'

  constructor(conversationId: number, turn: number, sender: 'agent1' | 'agent2', cause: unknown) {
    super(
      'turn-failure',
      `Conversation ${conversationId} turn ${turn} (${sender}) failed: ${errorMessage(cause)}`,
      { cause },
    )
    this.conversationId = conversationId
    this.turn = turn
    this.sender = sender
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
