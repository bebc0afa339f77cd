import { describe, it, expect } from 'vitest'
import { emptySummary } from '../batch/scheduler.js'
import { createMemoryStore } from '../store/memory.js'
import type { Session } from '../store/types.js'
import { purgeOlderThan } from './purge.js'

const NOW = new Date('2026-06-30T12:00:00.000Z')

function conversation(s: Session, createdAt: string): number {
  const c = s.conversations.insert({
    title: createdAt,
    agent1Id: 1,
    agent2Id: 2,
    ttl: 1,
    randomSeed: null,
    status: 'finished',
    finishedAt: createdAt,
    createdAt,
    updatedAt: createdAt,
  })
  s.messages.insert({ conversationId: c.id, senderRole: 'user', agentId: null, content: 'hi', tokens: 1, raw: null, createdAt })
  return c.id
}

function batch(s: Session, createdAt: string): void {
  s.batchJobs.insert({
    agent1Id: 1,
    agent2Id: 2,
    prompt: 'hi',
    ttl: 1,
    numRuns: 1,
    completedRuns: 1,
    seed: null,
    cancelRequested: false,
    workerId: null,
    heartbeatAt: null,
    summary: emptySummary(),
    status: 'completed',
    startTime: createdAt,
    endTime: createdAt,
    createdAt,
    updatedAt: createdAt,
  })
}

describe('purgeOlderThan', () => {
  it('deletes old batches and conversations with their messages', async () => {
    const store = createMemoryStore()
    const kept = await store.transaction((s) => {
      conversation(s, '2026-06-01T00:00:00.000Z')
      batch(s, '2026-06-01T00:00:00.000Z')
      s.evaluationJobs.insert({
        conversationId: 1,
        batchId: null,
        mainModelId: 1,
        judgeModelIds: [2],
        results: null,
        report: null,
        status: 'completed',
        createdAt: '2026-06-01T00:00:00.000Z',
        updatedAt: '2026-06-01T00:00:00.000Z',
      })
      batch(s, '2026-06-29T00:00:00.000Z')
      return conversation(s, '2026-06-29T00:00:00.000Z')
    })

    const result = await purgeOlderThan(store, 7, NOW)

    expect(result).toEqual({ batchJobs: 1, conversations: 1, cutoff: '2026-06-23T12:00:00.000Z' })
    const left = await store.transaction((s) => ({
      conversations: s.conversations.list().map((c) => c.id),
      messages: s.messages.list().map((m) => m.conversationId),
      batchJobs: s.batchJobs.list().length,
      evaluations: s.evaluationJobs.list().length,
    }))
    expect(left).toEqual({ conversations: [kept], messages: [kept], batchJobs: 1, evaluations: 1 })
  })

  it('rejects a negative or fractional day count', async () => {
    const store = createMemoryStore()

    await expect(purgeOlderThan(store, -1, NOW)).rejects.toThrow('days must be an integer of at least 0')
    await expect(purgeOlderThan(store, 1.5, NOW)).rejects.toThrow('days must be an integer of at least 0')
  })
})
