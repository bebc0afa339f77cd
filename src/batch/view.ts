import type { BatchJobRecord, BatchJobStatus } from '../domain/types.js'

export interface BatchJobView {
  id: number
  status: BatchJobStatus
  completed: number
  total: number
  agent1Id: number
  agent2Id: number
  prompt: string
  promptSnippet: string
  ttl: number
  seed: number | null
  cancelRequested: boolean
  /** Seconds per completed run; null before the first run */
  avgTime: number | null
  tokensPerSec: number | null
  timeElapsed: number
  conversationIds: number[]
  error: string | null
  createdAt: string
  startTime: string | null
  endTime: string | null
}

const SNIPPET_LENGTH = 80

export function batchJobView(job: BatchJobRecord): BatchJobView {
  const elapsed = job.summary.totalElapsedSeconds
  const completed = job.completedRuns

  return {
    id: job.id,
    status: job.status,
    completed,
    total: Math.max(1, job.numRuns),
    agent1Id: job.agent1Id,
    agent2Id: job.agent2Id,
    prompt: job.prompt,
    promptSnippet: job.prompt.slice(0, SNIPPET_LENGTH),
    ttl: job.ttl,
    seed: job.seed,
    cancelRequested: job.cancelRequested,
    avgTime: completed > 0 ? elapsed / completed : null,
    tokensPerSec: elapsed > 0 ? job.summary.totalTokens / elapsed : null,
    timeElapsed: elapsed,
    conversationIds: [...job.summary.conversationIds],
    error: job.summary.error,
    createdAt: job.createdAt,
    startTime: job.startTime,
    endTime: job.endTime,
  }
}
