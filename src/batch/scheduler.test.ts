import { describe, it, expect, vi } from 'vitest'
import { createBroadcaster } from '../engine/broadcaster.js'
import { createTurnEngine } from '../engine/conversation.js'
import { ConfigurationError } from '../errors.js'
import { silentLogger } from '../logger.js'
import { createMemoryStore } from '../store/memory.js'
import { echo, factoryFor, seedAgent, seedModel, seedPairing, stubConnector, type ChatHandler } from '../testing/fixtures.js'
import type { BatchJobFields } from '../domain/types.js'
import type { Store } from '../store/types.js'
import { createBatchScheduler, emptySummary } from './scheduler.js'

function setup(handler: ChatHandler = echo, inline = true) {
  const store = createMemoryStore()
  const chat = vi.fn(handler)
  const engine = createTurnEngine({
    store,
    connectors: factoryFor(stubConnector(chat)),
    broadcaster: createBroadcaster(),
    logger: silentLogger,
  })
  const scheduler = createBatchScheduler({ store, engine, logger: silentLogger, inline })
  return { store, chat, engine, scheduler }
}

describe('BatchScheduler', () => {
  it('runs every run in order and folds the summary', async () => {
    const { store, chat, scheduler } = setup()
    const { agent1, agent2 } = await seedPairing(store)

    const job = await scheduler.create({
      agent1Id: agent1.id,
      agent2Id: agent2.id,
      prompt: 'hi',
      ttl: 2,
      numRuns: 3,
      seed: 10,
    })

    expect(job.status).toBe('completed')
    expect(job.completedRuns).toBe(3)
    expect(job.summary.conversationIds).toEqual([1, 2, 3])
    expect(job.summary.totalMessages).toBe(9)
    expect(job.summary.totalTokens).toBe(9)
    expect(job.summary.error).toBeNull()
    expect(job.startTime).not.toBeNull()
    expect(job.endTime).not.toBeNull()
    expect(chat.mock.calls.map(([, settings]) => settings.seed)).toEqual([10, 10, 11, 11, 12, 12])
  })

  it('leaves runs unseeded when the job has no seed', async () => {
    const { store, chat, scheduler } = setup()
    const { agent1, agent2 } = await seedPairing(store)

    await scheduler.create({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'hi', ttl: 1, numRuns: 2, seed: null })

    expect(chat.mock.calls.map(([, settings]) => settings.seed)).toEqual([null, null])
  })

  it('stops at the next run boundary once cancellation is requested', async () => {
    const pending: { jobId?: number } = {}
    const { store, chat, scheduler } = setup(async (messages, settings) => {
      // Second call is the last turn of the first run
      if (chat.mock.calls.length === 2 && pending.jobId !== undefined) await scheduler.cancel(pending.jobId)
      return echo(messages, settings)
    }, false)
    const { agent1, agent2 } = await seedPairing(store)

    const queued = await scheduler.create({
      agent1Id: agent1.id,
      agent2Id: agent2.id,
      prompt: 'hi',
      ttl: 2,
      numRuns: 10,
      seed: 1,
    })
    pending.jobId = queued.id
    await scheduler.processJob(queued.id)

    const job = await scheduler.get(queued.id)
    expect(job.status).toBe('cancelled')
    expect(job.completedRuns).toBe(1)
    expect(job.cancelRequested).toBe(true)
    expect(job.summary.conversationIds).toEqual([1])
    expect(job.endTime).not.toBeNull()
    expect(chat).toHaveBeenCalledTimes(2)
  })

  it('cancels a queued job immediately and never runs it', async () => {
    const { store, chat, scheduler } = setup(echo, false)
    const { agent1, agent2 } = await seedPairing(store)

    const queued = await scheduler.create({
      agent1Id: agent1.id,
      agent2Id: agent2.id,
      prompt: 'hi',
      ttl: 2,
      numRuns: 3,
      seed: null,
    })
    expect(queued.status).toBe('queued')

    const cancelled = await scheduler.cancel(queued.id)
    expect(cancelled.status).toBe('cancelled')
    expect(cancelled.endTime).not.toBeNull()

    scheduler.start()
    await scheduler.onIdle()
    await scheduler.stop()

    const job = await scheduler.get(queued.id)
    expect(job.status).toBe('cancelled')
    expect(job.completedRuns).toBe(0)
    expect(chat).not.toHaveBeenCalled()
  })

  it('leaves terminal jobs alone when cancelled', async () => {
    const { store, scheduler } = setup()
    const { agent1, agent2 } = await seedPairing(store)
    const done = await scheduler.create({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'hi', ttl: 1, numRuns: 1, seed: null })

    const after = await scheduler.cancel(done.id)

    expect(after.status).toBe('completed')
    expect(after.cancelRequested).toBe(false)
  })

  it('fails the job on a run error and keeps earlier runs', async () => {
    const { store, chat, scheduler } = setup((messages, settings) => {
      if (chat.mock.calls.length === 3) throw new Error('backend down')
      return echo(messages, settings)
    })
    const { agent1, agent2 } = await seedPairing(store)

    const job = await scheduler.create({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'hi', ttl: 2, numRuns: 3, seed: null })

    expect(job.status).toBe('failed')
    expect(job.completedRuns).toBe(1)
    expect(job.summary.conversationIds).toEqual([1])
    expect(job.summary.error).toBe('Conversation 2 turn 0 (agent1) failed: backend down')
    expect(job.endTime).not.toBeNull()
    expect(chat).toHaveBeenCalledTimes(3)
  })

  it('resumes an interrupted job from its committed run count', async () => {
    const { store, chat, scheduler } = setup()
    const { agent1, agent2 } = await seedPairing(store)
    const startTime = '2026-01-01T00:00:00.000Z'
    const interrupted = await store.transaction((s) =>
      s.batchJobs.insert({
        agent1Id: agent1.id,
        agent2Id: agent2.id,
        prompt: 'hi',
        ttl: 2,
        numRuns: 3,
        completedRuns: 2,
        seed: 5,
        cancelRequested: false,
        workerId: null,
        heartbeatAt: null,
        summary: { ...emptySummary(), totalMessages: 6, totalTokens: 6, conversationIds: [41, 42] },
        status: 'running',
        startTime,
        endTime: null,
        createdAt: startTime,
        updatedAt: startTime,
      }),
    )

    expect(await scheduler.resumeIncomplete()).toEqual([interrupted.id])

    const job = await scheduler.get(interrupted.id)
    expect(job.status).toBe('completed')
    expect(job.completedRuns).toBe(3)
    expect(job.startTime).toBe(startTime)
    expect(job.summary.totalMessages).toBe(9)
    expect(job.summary.conversationIds).toEqual([41, 42, 1])
    expect(chat).toHaveBeenCalledTimes(2)
    expect(chat.mock.calls[0]![1].seed).toBe(7)
  })

  it('processes queued jobs on the worker', async () => {
    const { store, scheduler } = setup(echo, false)
    const { agent1, agent2 } = await seedPairing(store)
    scheduler.start()

    const first = await scheduler.create({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'a', ttl: 1, numRuns: 2, seed: null })
    const second = await scheduler.create({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'b', ttl: 1, numRuns: 1, seed: null })
    await scheduler.onIdle()
    await scheduler.stop()

    expect((await scheduler.get(first.id)).status).toBe('completed')
    expect((await scheduler.get(second.id)).status).toBe('completed')
    expect((await scheduler.list()).map((j) => j.id)).toEqual([second.id, first.id])
  })

  it('validates input before creating a job', async () => {
    const { store, scheduler } = setup()
    const { agent1, agent2 } = await seedPairing(store)
    const other = await seedModel(store, { backend: 'tensorrt' })
    const stranger = await seedAgent(store, other.id)

    await expect(
      scheduler.create({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'x', ttl: 2, numRuns: 0, seed: null }),
    ).rejects.toThrow(ConfigurationError)
    await expect(
      scheduler.create({ agent1Id: agent1.id, agent2Id: stranger.id, prompt: 'x', ttl: 2, numRuns: 1, seed: null }),
    ).rejects.toThrow(/Engine mismatch/)
    expect(await scheduler.list()).toEqual([])
  })

  it('inserts without running, so the caller can cancel an inline job while it runs', async () => {
    const pending: { jobId?: number } = {}
    const { store, chat, scheduler } = setup(async (messages, settings) => {
      if (chat.mock.calls.length === 1 && pending.jobId !== undefined) await scheduler.cancel(pending.jobId)
      return echo(messages, settings)
    })
    const { agent1, agent2 } = await seedPairing(store)

    const job = await scheduler.insert({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'hi', ttl: 1, numRuns: 5, seed: null })
    expect(job.status).toBe('queued')
    expect(chat).not.toHaveBeenCalled()

    pending.jobId = job.id
    await scheduler.submit(job.id)

    const after = await scheduler.get(job.id)
    expect(after.status).toBe('cancelled')
    expect(after.completedRuns).toBe(1)
  })
})

describe('BatchScheduler claims', () => {
  async function runningJob(store: Store, overrides: Partial<BatchJobFields>) {
    const { agent1, agent2 } = await seedPairing(store)
    const at = '2026-01-01T00:00:00.000Z'
    return store.transaction((s) =>
      s.batchJobs.insert({
        agent1Id: agent1.id,
        agent2Id: agent2.id,
        prompt: 'hi',
        ttl: 1,
        numRuns: 2,
        completedRuns: 0,
        seed: null,
        cancelRequested: false,
        workerId: 'other-worker',
        heartbeatAt: new Date().toISOString(),
        summary: emptySummary(),
        status: 'running',
        startTime: at,
        endTime: null,
        createdAt: at,
        updatedAt: at,
        ...overrides,
      }),
    )
  }

  it('skips a job another live worker holds', async () => {
    const { store, chat, scheduler } = setup()
    const job = await runningJob(store, {})

    await scheduler.processJob(job.id)

    const after = await scheduler.get(job.id)
    expect(after.status).toBe('running')
    expect(after.workerId).toBe('other-worker')
    expect(chat).not.toHaveBeenCalled()
  })

  it('takes over a job whose claim went stale', async () => {
    const { store, chat, scheduler } = setup()
    const job = await runningJob(store, { heartbeatAt: '2000-01-01T00:00:00.000Z' })

    await scheduler.processJob(job.id)

    const after = await scheduler.get(job.id)
    expect(after.status).toBe('completed')
    expect(after.workerId).toBe(scheduler.workerId)
    expect(chat).toHaveBeenCalledTimes(2)
  })

  it('lets only one of two schedulers on a shared store run a job', async () => {
    const { store, chat, engine, scheduler } = setup(echo, false)
    const rival = createBatchScheduler({ store, engine, logger: silentLogger, workerId: 'rival' })
    const { agent1, agent2 } = await seedPairing(store)
    const job = await scheduler.insert({ agent1Id: agent1.id, agent2Id: agent2.id, prompt: 'hi', ttl: 2, numRuns: 3, seed: null })

    await Promise.all([scheduler.processJob(job.id), rival.processJob(job.id)])

    const after = await scheduler.get(job.id)
    expect(after.status).toBe('completed')
    expect(after.completedRuns).toBe(3)
    expect(after.summary.conversationIds).toEqual([1, 2, 3])
    expect(chat).toHaveBeenCalledTimes(6)
  })
})
