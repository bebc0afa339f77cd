import { createBatchScheduler, type BatchScheduler } from './batch/scheduler.js'
import type { BenchDuoConfig } from './config.js'
import { createConnectorFactory, type ConnectorFactory } from './connectors/index.js'
import { createTurnEngine, type TurnEngine } from './engine/conversation.js'
import { createBroadcaster, type EventBroadcaster } from './engine/broadcaster.js'
import { createDuelQueue, type DuelQueue } from './engine/duel-queue.js'
import { createEvaluationService, type EvaluationService } from './evaluation/service.js'
import { consoleLogger, type Logger } from './logger.js'
import { createRegistry, type Registry } from './registry.js'
import { createStatusLog, type StatusLog } from './status/log.js'
import { createStatusService, type StatusService } from './status/service.js'
import { createJsonFileStore } from './store/json-file.js'
import type { Store } from './store/types.js'

export interface RuntimeOverrides {
  store?: Store
  connectors?: ConnectorFactory
  logger?: Logger
}

export interface Runtime {
  config: BenchDuoConfig
  store: Store
  logger: Logger
  statusLog: StatusLog
  connectors: ConnectorFactory
  broadcaster: EventBroadcaster
  status: StatusService
  engine: TurnEngine
  duels: DuelQueue
  batches: BatchScheduler
  evaluations: EvaluationService
  registry: Registry
  /**
   * Start both workers and, unless told otherwise, pick up batch jobs left
   * unfinished by a previous process.
   */
  start(options?: { resumeBatches?: boolean }): Promise<void>
  /** Stop both workers, waiting for whatever is in flight. */
  stop(): Promise<void>
}

/**
 * Build every process-wide service once. Callers own the lifecycle:
 * `start()` before submitting queued work, `stop()` before exiting.
 */
export function createRuntime(config: BenchDuoConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? consoleLogger(config.logLevel)
  const store = overrides.store ?? createJsonFileStore(config.storePath)
  const connectors = overrides.connectors ?? createConnectorFactory({ timeoutMs: config.requestTimeoutMs })
  const statusLog = createStatusLog(config.statusLogSize)
  const broadcaster = createBroadcaster()

  const status = createStatusService({ store, connectors, statusLog, logger, warmTimeoutMs: config.warmTimeoutMs })
  const engine = createTurnEngine({
    store,
    connectors,
    broadcaster,
    logger,
    status: config.warmBeforeDuel ? status : undefined,
    requestTimeoutMs: config.requestTimeoutMs,
  })
  const duels = createDuelQueue({ engine, logger })
  const batches = createBatchScheduler({ store, engine, logger, inline: config.inlineBatch })
  const evaluations = createEvaluationService({ store, connectors, logger, requestTimeoutMs: config.requestTimeoutMs })
  const registry = createRegistry({ store, logger, status })

  return {
    config,
    store,
    logger,
    statusLog,
    connectors,
    broadcaster,
    status,
    engine,
    duels,
    batches,
    evaluations,
    registry,

    async start(options) {
      duels.start()
      batches.start()
      if (options?.resumeBatches === false) return
      const resumed = await batches.resumeIncomplete()
      if (resumed.length > 0) logger.info(`resuming batch job(s) ${resumed.join(', ')}`)
    },

    async stop() {
      await Promise.all([duels.stop(), batches.stop()])
      statusLog.clear()
    },
  }
}
