import type { ConversationRecord } from '../domain/types.js'
import { TurnFailure } from '../errors.js'
import type { Logger } from '../logger.js'
import type { Viewer } from './broadcaster.js'
import type { DuelInput, TurnEngine } from './conversation.js'
import { createSerialQueue } from './queue.js'

export interface DuelTask {
  conversationId: number
  viewer?: Viewer
}

export interface DuelQueueOptions {
  engine: TurnEngine
  logger: Logger
  /**
   * Run conversations before `submit` returns instead of on the worker. A
   * failed turn then rejects `submit`.
   */
  inline?: boolean
}

/**
 * Interactive conversations: one worker, one conversation at a time, each
 * streamed to the viewer that asked for it.
 */
export interface DuelQueue {
  /** Create the conversation now, run it on the worker. */
  submit(input: DuelInput, viewer?: Viewer): Promise<ConversationRecord>
  start(): void
  stop(): Promise<void>
  onIdle(): Promise<void>
}

export function createDuelQueue(options: DuelQueueOptions): DuelQueue {
  const { engine, logger } = options

  async function runTask(task: DuelTask): Promise<void> {
    try {
      await engine.runConversation(task.conversationId, { viewer: task.viewer })
    } catch (err) {
      // Already logged and pushed to the viewer as an `end` event
      if (err instanceof TurnFailure) return
      throw err
    }
  }

  const queue = createSerialQueue('duel', runTask, logger)

  return {
    async submit(input, viewer) {
      const conversation = await engine.startConversation(input)

      if (options.inline) {
        await engine.runConversation(conversation.id, { viewer })
      } else {
        queue.push({ conversationId: conversation.id, viewer })
      }
      return conversation
    },

    start: () => queue.start(),
    stop: () => queue.stop(),
    onIdle: () => queue.onIdle(),
  }
}
