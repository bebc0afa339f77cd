import type { AgentRecord, ModelRecord } from '../domain/types.js'
import { toHuman } from '../utils/time.js'

export interface EngineState {
  reachable: boolean
}

export type LoadState = 'not_present' | 'cold' | 'warm'

export interface ModelStatus {
  existsOnDisk: boolean
  loadedInEngine: boolean
  loadState: LoadState
}

export type AgentReadiness = 'ready' | 'partially_ready' | 'not_ready' | 'disabled'

/**
 * Classify a model's load state. Pure: the verdict depends only on the
 * arguments, and the first matching rule wins.
 */
export function computeModelStatus(
  model: Pick<ModelRecord, 'warmStatus' | 'modelName'>,
  engineState: EngineState,
  loadedModels: readonly string[] = [],
): ModelStatus {
  if (model.warmStatus === 'error') {
    return { existsOnDisk: false, loadedInEngine: false, loadState: 'not_present' }
  }

  if (engineState.reachable && loadedModels.includes(model.modelName)) {
    return { existsOnDisk: true, loadedInEngine: true, loadState: 'warm' }
  }

  if (model.warmStatus === 'warm') {
    return {
      existsOnDisk: true,
      loadedInEngine: engineState.reachable,
      loadState: engineState.reachable ? 'warm' : 'cold',
    }
  }

  return { existsOnDisk: true, loadedInEngine: false, loadState: 'cold' }
}

export function computeAgentStatus(
  agent: Pick<AgentRecord, 'status'>,
  modelStatus: Pick<ModelStatus, 'loadState'>,
  engineState: EngineState,
): AgentReadiness {
  if (agent.status === 'disabled') return 'disabled'
  if (modelStatus.loadState === 'warm' && engineState.reachable) return 'ready'
  if ((modelStatus.loadState === 'warm' || modelStatus.loadState === 'cold') && !engineState.reachable) {
    return 'partially_ready'
  }
  return 'not_ready'
}

// ── Tooltips ─────────────────────────────────────────────────────────

export function engineTooltip(reachable: boolean, host: string, lastChecked: string | null): string {
  if (reachable) {
    return `Inference engine reachable. Last checked ${toHuman(lastChecked)}.`
  }
  return `Inference engine unreachable at ${host}. Last checked ${toHuman(lastChecked)}. Check the server and retry.`
}

export function modelTooltip(loadState: LoadState, lastLoadAttempt: string | null): string {
  switch (loadState) {
    case 'not_present':
      return 'Model files not found on host. Add model files or update the model name.'
    case 'cold':
      return 'Model present on disk but not loaded in engine. Warm it to load.'
    case 'warm':
      return `Model loaded in inference engine. Last loaded ${toHuman(lastLoadAttempt)}.`
  }
}

const AGENT_TOOLTIPS: Record<AgentReadiness, string> = {
  ready: 'Agent ready to accept queries: engine reachable and model loaded.',
  partially_ready: 'Agent is configured but its runtime is unavailable (engine unreachable).',
  not_ready: 'Agent cannot run (model missing or configuration error).',
  disabled: 'Agent is disabled.',
}

export function agentTooltip(status: AgentReadiness): string {
  return AGENT_TOOLTIPS[status]
}

/** Traffic-light colour for list views */
export function readinessColor(status: AgentReadiness): 'green' | 'yellow' | 'red' | 'gray' {
  switch (status) {
    case 'ready':
      return 'green'
    case 'partially_ready':
      return 'yellow'
    case 'not_ready':
      return 'red'
    case 'disabled':
      return 'gray'
  }
}
