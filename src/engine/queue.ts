import { errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'

export type QueueHandler<T> = (item: T) => Promise<void>

/**
 * FIFO drained by exactly one worker loop, so at most one item is in flight.
 * Items pushed while stopped wait until `start()`.
 */
export interface SerialQueue<T> {
  readonly name: string
  readonly size: number
  readonly busy: boolean
  start(): void
  /** Stop taking new items off the queue and wait for the in-flight one. */
  stop(): Promise<void>
  push(item: T): void
  /** Resolves once the queue is empty and nothing is in flight. */
  onIdle(): Promise<void>
}

export function createSerialQueue<T>(name: string, handler: QueueHandler<T>, logger: Logger): SerialQueue<T> {
  const items: T[] = []
  let running = false
  let accepting = false
  let worker: Promise<void> = Promise.resolve()

  async function drain(): Promise<void> {
    try {
      while (accepting) {
        const item = items.shift()
        if (item === undefined) break
        try {
          await handler(item)
        } catch (err) {
          logger.error(`${name} worker: ${errorMessage(err)}`)
        }
      }
    } finally {
      running = false
    }
  }

  function pump(): void {
    if (running || !accepting || items.length === 0) return
    running = true
    worker = drain()
  }

  return {
    name,

    get size() {
      return items.length
    },

    get busy() {
      return running
    },

    start() {
      accepting = true
      pump()
    },

    async stop() {
      accepting = false
      await worker
    },

    push(item) {
      items.push(item)
      pump()
    },

    async onIdle() {
      while (running || (accepting && items.length > 0)) {
        await worker
      }
    },
  }
}
