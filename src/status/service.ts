import type { ConnectorFactory } from '../connectors/index.js'
import type { ModelRecord, Reachability, WarmStatus } from '../domain/types.js'
import { errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import type { Store } from '../store/types.js'
import { now } from '../utils/time.js'
import { modelLogKey, type StatusLog } from './log.js'
import {
  agentTooltip,
  computeAgentStatus,
  computeModelStatus,
  engineTooltip,
  modelTooltip,
  type AgentReadiness,
  type EngineState,
  type LoadState,
  type ModelStatus,
} from './readiness.js'

export interface EngineReport extends EngineState {
  lastChecked: string | null
  message: string
  host: string
}

export interface ModelStatusPayload {
  engine: EngineReport & { tooltip: string }
  model: ModelStatus & {
    lastLoadAttempt: string | null
    lastLoadMessage: string | null
    tooltip: string
  }
  logs: { recent: string[] }
}

export interface AgentStatusPayload extends ModelStatusPayload {
  modelId: number
  agent: {
    enabled: boolean
    status: AgentReadiness
    diagnostics: { lastAgentInit: string; lastAgentMessage: string }
    tooltip: string
  }
}

export interface StatusOptions {
  /** Probe the engine instead of trusting the last persisted check */
  forceCheck?: boolean
}

export interface StatusServiceDeps {
  store: Store
  connectors: ConnectorFactory
  statusLog: StatusLog
  logger: Logger
  warmTimeoutMs?: number
}

const RECENT_LOG_LINES = 5

function hostOf(model: ModelRecord): string {
  return `${model.host}:${model.port}`
}

function reachabilityFor(reachable: boolean, loadState: LoadState | null): Reachability {
  if (!reachable) return 'red'
  return loadState === 'warm' ? 'green' : 'yellow'
}

/**
 * I/O around the readiness classification: probes engines, persists what it
 * learns on the model row, and assembles the status payloads callers display.
 */
export interface StatusService {
  /** Engine state as last persisted; no I/O. */
  engineStateOf(model: ModelRecord): EngineReport
  /** Probe the model's engine and persist the outcome. */
  checkEngine(modelId: number): Promise<EngineReport>
  /** Models the backend reports, or [] when it cannot be asked. */
  fetchLoadedModels(model: ModelRecord): Promise<string[]>
  buildModelStatusPayload(modelId: number, options?: StatusOptions): Promise<ModelStatusPayload>
  buildAgentStatusPayload(agentId: number, options?: StatusOptions): Promise<AgentStatusPayload>
  /**
   * Probe, list and classify one model, persisting reachability and warm
   * state. Used when listing models so the stored traffic lights are fresh.
   */
  refreshModel(modelId: number): Promise<ModelRecord>
  refreshAll(): Promise<ModelRecord[]>
  /**
   * Ask the backend to load the model's weights. Never throws for backend
   * failures: the outcome is the returned warm status, also persisted.
   */
  warmModel(modelId: number): Promise<WarmStatus>
  recordModelLoad(modelId: number, ok: boolean, message: string): Promise<void>
}

export function createStatusService(deps: StatusServiceDeps): StatusService {
  const { store, connectors, statusLog, logger } = deps

  function engineStateOf(model: ModelRecord): EngineReport {
    const reachable = model.status !== 'red'
    return {
      reachable,
      lastChecked: model.lastEngineCheckAt,
      message: model.lastEngineMessage ?? (reachable ? 'ok' : 'status unknown'),
      host: hostOf(model),
    }
  }

  async function checkEngine(modelId: number): Promise<EngineReport> {
    const model = await store.transaction((s) => s.models.require(modelId))
    const host = hostOf(model)
    const checkedAt = new Date()

    let reachable: boolean
    let message: string
    try {
      await connectors(model).probe()
      reachable = true
      message = 'ok'
      statusLog.append(modelLogKey(model.id), `engine check ok at ${host}`, checkedAt)
    } catch (err) {
      reachable = false
      message = errorMessage(err) || 'connection failed'
      statusLog.append(modelLogKey(model.id), `engine check failed at ${host}: ${message}`, checkedAt)
    }

    const lastChecked = checkedAt.toISOString()
    await store.transaction((s) =>
      s.models.update(model.id, {
        lastEngineCheckAt: lastChecked,
        lastEngineMessage: message,
        status: reachabilityFor(reachable, model.warmStatus === 'warm' ? 'warm' : 'cold'),
        updatedAt: lastChecked,
      }),
    )

    return { reachable, lastChecked, message, host }
  }

  async function fetchLoadedModels(model: ModelRecord): Promise<string[]> {
    try {
      return await connectors(model).listModels()
    } catch (err) {
      logger.debug(`listing models on ${hostOf(model)} failed: ${errorMessage(err)}`)
      return []
    }
  }

  async function buildModelStatusPayload(modelId: number, options?: StatusOptions): Promise<ModelStatusPayload> {
    const engine = options?.forceCheck
      ? await checkEngine(modelId)
      : engineStateOf(await store.transaction((s) => s.models.require(modelId)))

    // Re-read: a forced check has just updated the row
    const model = await store.transaction((s) => s.models.require(modelId))
    const loadedModels = engine.reachable ? await fetchLoadedModels(model) : []
    const modelStatus = computeModelStatus(model, engine, loadedModels)

    return {
      engine: { ...engine, tooltip: engineTooltip(engine.reachable, engine.host, engine.lastChecked) },
      model: {
        ...modelStatus,
        lastLoadAttempt: model.lastLoadAttemptAt,
        lastLoadMessage: model.lastLoadMessage,
        tooltip: modelTooltip(modelStatus.loadState, model.lastLoadAttemptAt),
      },
      logs: { recent: statusLog.recent(modelLogKey(model.id), RECENT_LOG_LINES) },
    }
  }

  async function refreshModel(modelId: number): Promise<ModelRecord> {
    const model = await store.transaction((s) => s.models.require(modelId))
    const connector = connectors(model)
    const checkedAt = now()

    let reachable = false
    let message: string
    let loadedModels: string[] = []
    try {
      await connector.probe()
      loadedModels = await connector.listModels()
      reachable = true
      message = 'ok'
    } catch (err) {
      message = errorMessage(err) || 'connection failed'
      statusLog.append(modelLogKey(model.id), `engine check failed at ${hostOf(model)}: ${message}`)
    }

    const { loadState } = computeModelStatus(model, { reachable }, loadedModels)
    const warmStatus: WarmStatus = loadState === 'not_present' ? 'error' : loadState

    return store.transaction((s) =>
      s.models.update(model.id, {
        status: reachabilityFor(reachable, loadState),
        // A warm-up in flight owns the warm state until it finishes
        warmStatus: model.warmStatus === 'loading' ? 'loading' : warmStatus,
        lastEngineCheckAt: checkedAt,
        lastEngineMessage: message,
        updatedAt: checkedAt,
      }),
    )
  }

  async function recordModelLoad(modelId: number, ok: boolean, message: string): Promise<void> {
    const at = new Date()
    await store.transaction((s) =>
      s.models.update(modelId, { lastLoadAttemptAt: at.toISOString(), lastLoadMessage: message }),
    )
    statusLog.append(modelLogKey(modelId), `model reload ${ok ? 'ok' : 'failed'}: ${message}`, at)
  }

  return {
    engineStateOf,
    checkEngine,
    fetchLoadedModels,
    buildModelStatusPayload,
    refreshModel,
    recordModelLoad,

    async buildAgentStatusPayload(agentId, options) {
      const agent = await store.transaction((s) => s.agents.require(agentId))
      const payload = await buildModelStatusPayload(agent.modelId, options)
      const status = computeAgentStatus(agent, payload.model, payload.engine)

      return {
        ...payload,
        modelId: agent.modelId,
        agent: {
          enabled: agent.status !== 'disabled',
          status,
          diagnostics: {
            lastAgentInit: agent.updatedAt,
            lastAgentMessage: `agent status=${status}`,
          },
          tooltip: agentTooltip(status),
        },
      }
    },

    async refreshAll() {
      const models = await store.transaction((s) => s.models.list())
      const refreshed: ModelRecord[] = []
      for (const model of models) {
        refreshed.push(await refreshModel(model.id))
      }
      return refreshed
    },

    async warmModel(modelId) {
      const model = await store.transaction((s) =>
        s.models.update(modelId, { warmStatus: 'loading', updatedAt: now() }),
      )

      const target = model.selectedModel ?? model.modelName
      let status: WarmStatus
      let message: string
      try {
        await connectors(model).warm(target, deps.warmTimeoutMs)
        status = 'warm'
        message = 'loaded ok'
        logger.info(`warmed ${target} on ${hostOf(model)}`)
      } catch (err) {
        status = 'error'
        message = `failed to load: ${errorMessage(err)}`
        logger.warn(`warm-up of ${target} on ${hostOf(model)} failed: ${errorMessage(err)}`)
      }

      const at = now()
      await store.transaction((s) =>
        s.models.update(model.id, {
          warmStatus: status,
          lastWarmedAt: status === 'warm' ? at : model.lastWarmedAt,
          updatedAt: at,
        }),
      )
      await recordModelLoad(model.id, status === 'warm', message)
      return status
    },
  }
}
