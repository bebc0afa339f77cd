import { z } from 'zod'
import { BACKEND_KINDS, type AgentRecord, type ModelRecord } from './domain/types.js'
import { ConfigurationError } from './errors.js'
import type { Logger } from './logger.js'
import type { StatusService } from './status/service.js'
import type { Session, Store } from './store/types.js'
import { now } from './utils/time.js'

// ── Input schemas ───────────────────────────────────────────────────

const name = z.string().trim().min(1).max(255)

export const modelInputSchema = z.object({
  name,
  host: z
    .string()
    .trim()
    .min(1)
    .max(255)
    .regex(/^[A-Za-z0-9._:\-[\]]+$/, 'host contains invalid characters'),
  port: z.coerce.number().int().min(1).max(65535),
  backend: z.enum(BACKEND_KINDS),
  modelName: z.string().trim().min(1).max(255),
  selectedModel: z.string().trim().min(1).max(255).nullable().default(null),
})

export const agentInputSchema = z.object({
  name,
  modelId: z.coerce.number().int().positive(),
  systemPrompt: z.string().max(20_000),
  maxTokens: z.coerce.number().int().positive(),
  temperature: z.coerce.number().min(0).max(2),
})

export type ModelInput = z.input<typeof modelInputSchema>
export type AgentInput = z.input<typeof agentInputSchema>

function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ')
    throw new ConfigurationError(issues)
  }
  return parsed.data
}

// ── Rules ───────────────────────────────────────────────────────────

/** The first green model; its backend is the active engine family. */
export function activeModel(session: Session): ModelRecord | undefined {
  return session.models.list((m) => m.status === 'green')[0]
}

function assertSameFamily(session: Session, model: ModelRecord): void {
  const active = activeModel(session)
  if (active && active.backend !== model.backend) {
    throw new ConfigurationError(
      `Engine mismatch: ${model.name} runs on ${model.backend} but the active engine is ${active.backend} (${active.name})`,
    )
  }
}

function assertUniqueName(rows: { id: number; name: string }[], candidate: string, entity: string, selfId?: number): void {
  if (rows.some((r) => r.name === candidate && r.id !== selfId)) {
    throw new ConfigurationError(`${entity} name must be unique`)
  }
}

export interface RegistryDeps {
  store: Store
  logger: Logger
  /** Refreshes reachability after a model is registered or changed */
  status?: StatusService
}

/** Registration and upkeep of models and agents. */
export interface Registry {
  /** With `refresh`, every model is probed first so its traffic light is current. */
  listModels(options?: { refresh?: boolean }): Promise<ModelRecord[]>
  getModel(modelId: number): Promise<ModelRecord>
  registerModel(input: ModelInput): Promise<ModelRecord>
  updateModel(modelId: number, patch: Partial<ModelInput>): Promise<ModelRecord>
  /** Hard delete; the model's agents go with it. */
  deleteModel(modelId: number): Promise<void>
  listAgents(): Promise<AgentRecord[]>
  getAgent(agentId: number): Promise<AgentRecord>
  registerAgent(input: AgentInput): Promise<AgentRecord>
  updateAgent(agentId: number, patch: Partial<AgentInput>): Promise<AgentRecord>
  setAgentEnabled(agentId: number, enabled: boolean): Promise<AgentRecord>
  deleteAgent(agentId: number): Promise<void>
}

export function createRegistry(deps: RegistryDeps): Registry {
  const { store, logger, status } = deps

  async function refresh(model: ModelRecord): Promise<ModelRecord> {
    return status ? status.refreshModel(model.id) : model
  }

  return {
    // ── Models ──────────────────────────────────────────────────────────

    async listModels(options) {
      if (options?.refresh && status) return status.refreshAll()
      return store.transaction((s) => s.models.list())
    },

    async getModel(modelId) {
      return store.transaction((s) => s.models.require(modelId))
    },

    async registerModel(input) {
      const data = parseInput(modelInputSchema, input)
      const model = await store.transaction((s) => {
        assertUniqueName(s.models.list(), data.name, 'Model')
        const at = now()
        return s.models.insert({
          ...data,
          status: 'red',
          warmStatus: 'cold',
          lastWarmedAt: null,
          lastLoadAttemptAt: null,
          lastLoadMessage: null,
          lastEngineCheckAt: null,
          lastEngineMessage: null,
          createdAt: at,
          updatedAt: at,
        })
      })
      logger.info(`registered model ${model.name} (${model.backend} at ${model.host}:${model.port})`)
      return refresh(model)
    },

    async updateModel(modelId, patch) {
      const data = parseInput(modelInputSchema.partial(), patch)
      const model = await store.transaction((s) => {
        s.models.require(modelId)
        if (data.name !== undefined) assertUniqueName(s.models.list(), data.name, 'Model', modelId)
        return s.models.update(modelId, { ...data, updatedAt: now() })
      })
      return refresh(model)
    },

    async deleteModel(modelId) {
      const model = await store.transaction((s) => {
        const model = s.models.require(modelId)
        s.models.delete(modelId)
        return model
      })
      logger.info(`deleted model ${model.name}`)
    },

    // ── Agents ──────────────────────────────────────────────────────────

    async listAgents() {
      return store.transaction((s) => s.agents.list())
    },

    async getAgent(agentId) {
      return store.transaction((s) => s.agents.require(agentId))
    },

    async registerAgent(input) {
      const data = parseInput(agentInputSchema, input)
      const agent = await store.transaction((s) => {
        const model = s.models.get(data.modelId)
        if (!model) throw new ConfigurationError('modelId does not exist')
        assertSameFamily(s, model)
        assertUniqueName(s.agents.list(), data.name, 'Agent')
        const at = now()
        return s.agents.insert({ ...data, status: 'ready', createdAt: at, updatedAt: at })
      })
      logger.info(`registered agent ${agent.name} on model ${agent.modelId}`)
      return agent
    },

    async updateAgent(agentId, patch) {
      const data = parseInput(agentInputSchema.partial(), patch)
      return store.transaction((s) => {
        s.agents.require(agentId)
        if (data.modelId !== undefined) {
          const model = s.models.get(data.modelId)
          if (!model) throw new ConfigurationError('modelId does not exist')
          assertSameFamily(s, model)
        }
        if (data.name !== undefined) assertUniqueName(s.agents.list(), data.name, 'Agent', agentId)
        return s.agents.update(agentId, { ...data, updatedAt: now() })
      })
    },

    async setAgentEnabled(agentId, enabled) {
      return store.transaction((s) => {
        s.agents.require(agentId)
        return s.agents.update(agentId, { status: enabled ? 'ready' : 'disabled', updatedAt: now() })
      })
    },

    async deleteAgent(agentId) {
      await store.transaction((s) => {
        s.agents.require(agentId)
        s.agents.delete(agentId)
      })
    },
  }
}
