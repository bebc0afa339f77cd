import { describe, it, expect } from 'vitest'
import { ConfigurationError } from './errors.js'
import { silentLogger } from './logger.js'
import { createRegistry } from './registry.js'
import { createStatusLog } from './status/log.js'
import { createStatusService } from './status/service.js'
import { createMemoryStore } from './store/memory.js'
import { echo, factoryFor, seedAgent, seedModel, stubConnector } from './testing/fixtures.js'

function setup(withStatus = false) {
  const store = createMemoryStore()
  const status = withStatus
    ? createStatusService({ store, connectors: factoryFor(stubConnector(echo)), statusLog: createStatusLog(), logger: silentLogger })
    : undefined
  return { store, registry: createRegistry({ store, logger: silentLogger, status }) }
}

const local = { name: 'local', host: 'localhost', port: 11434, backend: 'ollama', modelName: 'llama3' } as const

describe('Registry models', () => {
  it('registers a model as unchecked and cold', async () => {
    const { registry } = setup()

    const model = await registry.registerModel(local)

    expect(model).toMatchObject({
      id: 1,
      name: 'local',
      host: 'localhost',
      port: 11434,
      backend: 'ollama',
      modelName: 'llama3',
      selectedModel: null,
      status: 'red',
      warmStatus: 'cold',
    })
  })

  it('refreshes reachability after registering when it can', async () => {
    const { registry } = setup(true)

    const model = await registry.registerModel({ ...local, modelName: 'test-model' })

    expect(model.status).toBe('green')
    expect(model.warmStatus).toBe('warm')
  })

  it('validates input', async () => {
    const { registry } = setup()

    await expect(registry.registerModel({ ...local, host: 'bad host!' })).rejects.toThrow(
      'host: host contains invalid characters',
    )
    await expect(registry.registerModel({ ...local, port: 70000 })).rejects.toThrow(ConfigurationError)
    await expect(registry.registerModel({ ...local, name: '  ' })).rejects.toThrow(/^name: /)
  })

  it('keeps model names unique', async () => {
    const { registry } = setup()
    await registry.registerModel(local)
    const other = await registry.registerModel({ ...local, name: 'other' })

    await expect(registry.registerModel(local)).rejects.toThrow('Model name must be unique')
    await expect(registry.updateModel(other.id, { name: 'local' })).rejects.toThrow('Model name must be unique')
    expect((await registry.updateModel(other.id, { name: 'other', port: 8080 })).port).toBe(8080)
  })

  it('deletes a model together with its agents', async () => {
    const { store, registry } = setup()
    const model = await seedModel(store)
    await seedAgent(store, model.id)
    await seedAgent(store, model.id)

    await registry.deleteModel(model.id)

    expect(await registry.listModels()).toEqual([])
    expect(await registry.listAgents()).toEqual([])
  })
})

describe('Registry agents', () => {
  const agent = { name: 'alice', systemPrompt: 'Be brief.', maxTokens: 128, temperature: 0.7 }

  it('registers an agent as ready', async () => {
    const { store, registry } = setup()
    const model = await seedModel(store)

    const created = await registry.registerAgent({ ...agent, modelId: model.id })

    expect(created).toMatchObject({ ...agent, modelId: model.id, status: 'ready' })
  })

  it('rejects an unknown model', async () => {
    const { registry } = setup()

    await expect(registry.registerAgent({ ...agent, modelId: 42 })).rejects.toThrow('modelId does not exist')
  })

  it('rejects a model from a different engine family than the active one', async () => {
    const { store, registry } = setup()
    await seedModel(store, { name: 'ollama-box', backend: 'ollama', status: 'green' })
    const other = await seedModel(store, { name: 'mlx-box', backend: 'mlx', status: 'yellow' })

    await expect(registry.registerAgent({ ...agent, modelId: other.id })).rejects.toThrow(
      'Engine mismatch: mlx-box runs on mlx but the active engine is ollama (ollama-box)',
    )
  })

  it('validates ranges', async () => {
    const { store, registry } = setup()
    const model = await seedModel(store)

    await expect(registry.registerAgent({ ...agent, modelId: model.id, temperature: 3 })).rejects.toThrow(/^temperature: /)
    await expect(registry.registerAgent({ ...agent, modelId: model.id, maxTokens: 0 })).rejects.toThrow(/^maxTokens: /)
  })

  it('enables, disables, updates and deletes', async () => {
    const { store, registry } = setup()
    const model = await seedModel(store)
    const created = await registry.registerAgent({ ...agent, modelId: model.id })

    expect((await registry.setAgentEnabled(created.id, false)).status).toBe('disabled')
    expect((await registry.setAgentEnabled(created.id, true)).status).toBe('ready')
    expect((await registry.updateAgent(created.id, { temperature: 0 })).temperature).toBe(0)

    await registry.deleteAgent(created.id)
    await expect(registry.getAgent(created.id)).rejects.toThrow('Agent 1 not found')
  })
})
