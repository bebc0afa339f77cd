import { describe, it, expect } from 'vitest'
import { NotFoundError } from '../errors.js'
import { seedAgent, seedModel } from '../testing/fixtures.js'
import { createMemoryStore } from './memory.js'

describe('MemoryStore', () => {
  it('assigns increasing ids and lists in insertion order', async () => {
    const store = createMemoryStore()
    const a = await seedModel(store)
    const b = await seedModel(store)

    expect([a.id, b.id]).toEqual([1, 2])
    expect((await store.transaction((s) => s.models.list())).map((m) => m.name)).toEqual(['model-1', 'model-2'])
  })

  it('rolls back everything when the unit of work throws', async () => {
    const store = createMemoryStore()
    const model = await seedModel(store)

    await expect(
      store.transaction((s) => {
        s.models.update(model.id, { name: 'renamed' })
        s.agents.insert({
          name: 'a',
          modelId: model.id,
          systemPrompt: '',
          maxTokens: 1,
          temperature: 0,
          status: 'ready',
          createdAt: model.createdAt,
          updatedAt: model.createdAt,
        })
        throw new Error('abort')
      }),
    ).rejects.toThrow('abort')

    const after = await store.transaction((s) => ({ name: s.models.require(model.id).name, agents: s.agents.list().length }))
    expect(after).toEqual({ name: 'model-1', agents: 0 })
  })

  it('hands out copies, not live rows', async () => {
    const store = createMemoryStore()
    const model = await seedModel(store)

    model.name = 'mutated'

    expect((await store.transaction((s) => s.models.require(model.id))).name).toBe('model-1')
  })

  it('refuses asynchronous units of work', async () => {
    const store = createMemoryStore()

    await expect(store.transaction(async () => 1)).rejects.toThrow(
      'Unit of work must be synchronous; await remote calls outside the transaction',
    )
  })

  it('throws NotFoundError from require and update', async () => {
    const store = createMemoryStore()

    await expect(store.transaction((s) => s.agents.require(3))).rejects.toThrow(new NotFoundError('Agent', 3))
    await expect(store.transaction((s) => s.models.update(3, { name: 'x' }))).rejects.toThrow('Model 3 not found')
    expect(await store.transaction((s) => s.models.delete(3))).toBe(false)
  })

  it('cascades model deletes to their agents', async () => {
    const store = createMemoryStore()
    const keep = await seedModel(store)
    const drop = await seedModel(store)
    await seedAgent(store, keep.id)
    await seedAgent(store, drop.id)

    await store.transaction((s) => s.models.delete(drop.id))

    expect((await store.transaction((s) => s.agents.list())).map((a) => a.modelId)).toEqual([keep.id])
  })
})
