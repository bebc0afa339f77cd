import type { ConnectorFactory } from '../connectors/index.js'
import type { ChatMessage, ChatSettings, Connector } from '../connectors/types.js'
import type { AgentFields, AgentRecord, BackendKind, ModelFields, ModelRecord } from '../domain/types.js'
import type { Store } from '../store/types.js'

const AT = '2026-01-01T00:00:00.000Z'

export async function seedModel(store: Store, overrides: Partial<ModelFields> = {}): Promise<ModelRecord> {
  return store.transaction((s) =>
    s.models.insert({
      name: `model-${s.models.list().length + 1}`,
      host: 'localhost',
      port: 11434,
      backend: 'ollama',
      modelName: 'test-model',
      selectedModel: null,
      status: 'green',
      warmStatus: 'warm',
      lastWarmedAt: null,
      lastLoadAttemptAt: null,
      lastLoadMessage: null,
      lastEngineCheckAt: null,
      lastEngineMessage: null,
      createdAt: AT,
      updatedAt: AT,
      ...overrides,
    }),
  )
}

export async function seedAgent(store: Store, modelId: number, overrides: Partial<AgentFields> = {}): Promise<AgentRecord> {
  return store.transaction((s) =>
    s.agents.insert({
      name: `agent-${s.agents.list().length + 1}`,
      modelId,
      systemPrompt: 'You are a test agent.',
      maxTokens: 64,
      temperature: 0.5,
      status: 'ready',
      createdAt: AT,
      updatedAt: AT,
      ...overrides,
    }),
  )
}

/** Two agents on one warm model, ready to duel. */
export async function seedPairing(store: Store): Promise<{ model: ModelRecord; agent1: AgentRecord; agent2: AgentRecord }> {
  const model = await seedModel(store)
  const agent1 = await seedAgent(store, model.id, { name: 'alice' })
  const agent2 = await seedAgent(store, model.id, { name: 'bob' })
  return { model, agent1, agent2 }
}

export type ChatHandler = (messages: ChatMessage[], settings: ChatSettings) => string | Promise<string>

/** In-process connector: `chat` answers through `handler`, everything else succeeds. */
export function stubConnector(handler: ChatHandler, backend: BackendKind = 'ollama'): Connector {
  return {
    backend,
    baseURL: 'http://stub',
    async probe() {
      return { ok: true, endpoint: '/stub' }
    },
    async listModels() {
      return ['test-model']
    },
    async chat(messages, settings) {
      return { text: await handler(messages, settings), latencyMs: 1 }
    },
    async warm() {},
  }
}

/** Answers with "reply:" followed by the last message it was sent. */
export const echo: ChatHandler = (messages) => `reply:${messages[messages.length - 1]?.content ?? ''}`

export function factoryFor(connector: Connector): ConnectorFactory {
  return () => connector
}
