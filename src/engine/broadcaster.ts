import { EventEmitter } from 'node:events'
import type { ConversationStatus } from '../domain/types.js'

/** Who asked for a conversation: a push-channel session and its namespace. */
export interface Viewer {
  session: string
  namespace: string
}

export interface TurnEvent {
  type: 'turn'
  conversationId: number
  sender: 'agent1' | 'agent2'
  text: string
  done: boolean
}

export interface EndEvent {
  type: 'end'
  conversationId: number
  status: ConversationStatus
  stats: { totalMessages: number }
  /** Present when the run aborted on a failed turn */
  error?: string
}

export type DuelEvent = TurnEvent | EndEvent

export interface Broadcaster {
  publish(viewer: Viewer, event: DuelEvent): void
}

function channel(viewer: Viewer): string {
  return `${viewer.namespace}:${viewer.session}`
}

export interface EventBroadcaster extends Broadcaster {
  /** Returns the unsubscribe function. */
  subscribe(viewer: Viewer, listener: (event: DuelEvent) => void): () => void
  listenerCount(viewer: Viewer): number
}

/**
 * In-process broadcaster. A transport (websocket server, SSE handler, CLI
 * printer) subscribes per viewer; events for viewers nobody listens to are
 * dropped.
 */
export function createBroadcaster(): EventBroadcaster {
  const emitter = new EventEmitter()

  return {
    publish(viewer, event) {
      emitter.emit(channel(viewer), event)
    },

    subscribe(viewer, listener) {
      const name = channel(viewer)
      emitter.on(name, listener)
      return () => {
        emitter.off(name, listener)
      }
    },

    listenerCount(viewer) {
      return emitter.listenerCount(channel(viewer))
    },
  }
}
