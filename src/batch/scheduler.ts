import { randomUUID } from 'node:crypto'
import {
  TERMINAL_BATCH_STATUSES,
  type BatchJobRecord,
  type BatchJobStatus,
  type BatchSummary,
} from '../domain/types.js'
import { ConfigurationError, errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import type { ConversationOutcome, TurnEngine } from '../engine/conversation.js'
import { resolvePairing } from '../engine/conversation.js'
import { createSerialQueue } from '../engine/queue.js'
import type { Store } from '../store/types.js'
import { now } from '../utils/time.js'

export interface BatchJobInput {
  agent1Id: number
  agent2Id: number
  prompt: string
  ttl: number
  numRuns: number
  /** Run r is seeded with seed + r; null leaves runs unseeded */
  seed: number | null
}

export function isTerminal(status: BatchJobStatus): boolean {
  return TERMINAL_BATCH_STATUSES.has(status)
}

export function emptySummary(): BatchSummary {
  return { totalMessages: 0, totalTokens: 0, totalElapsedSeconds: 0, conversationIds: [], error: null }
}

function foldRun(summary: BatchSummary, outcome: ConversationOutcome): BatchSummary {
  return {
    ...summary,
    totalMessages: summary.totalMessages + outcome.messageCount,
    totalTokens: summary.totalTokens + outcome.totalTokens,
    totalElapsedSeconds: summary.totalElapsedSeconds + outcome.elapsedSeconds,
    conversationIds: [...summary.conversationIds, outcome.conversationId],
  }
}

export interface BatchSchedulerDeps {
  store: Store
  engine: TurnEngine
  logger: Logger
  /** Process jobs before `submit` returns instead of on the worker */
  inline?: boolean
  /** Names this scheduler in job claims; a fresh id when omitted */
  workerId?: string
  /** How often the claim on a running job is renewed */
  heartbeatMs?: number
  /** A claim not renewed for this long belongs to a dead worker and may be taken over */
  claimTtlMs?: number
}

export const HEARTBEAT_MS = 5_000
export const CLAIM_TTL_MS = 30_000

/**
 * Runs N conversations per job, one job at a time. `completedRuns` on the job
 * row is the only record of progress: processing always resumes there.
 * Cancellation is checked between runs, never inside one. A job is processed
 * only by the scheduler holding its claim, so two processes sharing a store
 * never run the same job.
 */
export interface BatchScheduler {
  readonly workerId: string
  /** Validate, insert a queued job and submit it. */
  create(input: BatchJobInput): Promise<BatchJobRecord>
  /** Validate and insert a queued job without submitting it. */
  insert(input: BatchJobInput): Promise<BatchJobRecord>
  submit(batchJobId: number): Promise<void>
  /**
   * Request cancellation. A queued job is cancelled on the spot; a running one
   * stops at its next run boundary. Terminal jobs are left as they are.
   */
  cancel(batchJobId: number): Promise<BatchJobRecord>
  /** Re-submit every job that has not reached a terminal status, oldest first. */
  resumeIncomplete(): Promise<number[]>
  get(batchJobId: number): Promise<BatchJobRecord>
  /** Newest first */
  list(): Promise<BatchJobRecord[]>
  processJob(batchJobId: number): Promise<void>
  start(): void
  stop(): Promise<void>
  onIdle(): Promise<void>
}

export function createBatchScheduler(deps: BatchSchedulerDeps): BatchScheduler {
  const { store, engine, logger } = deps
  const workerId = deps.workerId ?? randomUUID()
  const heartbeatMs = deps.heartbeatMs ?? HEARTBEAT_MS
  const claimTtlMs = deps.claimTtlMs ?? CLAIM_TTL_MS

  const queue = createSerialQueue<number>('batch', (id) => processJob(id), logger)

  function heldElsewhere(job: BatchJobRecord, at: number): boolean {
    if (job.status !== 'running' || job.workerId === null || job.workerId === workerId) return false
    const beat = job.heartbeatAt === null ? Number.NaN : Date.parse(job.heartbeatAt)
    return Number.isFinite(beat) && at - beat < claimTtlMs
  }

  /** Take the job for this scheduler; undefined when it is finished or someone else holds it. */
  async function claim(batchJobId: number): Promise<BatchJobRecord | undefined> {
    return store.transaction((s) => {
      const job = s.batchJobs.get(batchJobId)
      if (!job || isTerminal(job.status)) return undefined
      if (heldElsewhere(job, Date.now())) {
        logger.info(`batch ${batchJobId}: held by worker ${job.workerId}; skipping`)
        return undefined
      }
      const at = now()
      return s.batchJobs.update(batchJobId, {
        status: 'running',
        workerId,
        heartbeatAt: at,
        startTime: job.startTime ?? at,
        updatedAt: at,
      })
    })
  }

  /** Renew the claim; undefined once the job is finished or the claim was lost. */
  async function checkpoint(batchJobId: number): Promise<BatchJobRecord | undefined> {
    return store.transaction((s) => {
      const job = s.batchJobs.get(batchJobId)
      if (!job || isTerminal(job.status) || job.workerId !== workerId) return undefined
      return s.batchJobs.update(batchJobId, { heartbeatAt: now() })
    })
  }

  async function processJob(batchJobId: number): Promise<void> {
    const job = await claim(batchJobId)
    if (!job) return

    logger.info(`batch ${batchJobId}: starting at run ${job.completedRuns + 1}/${job.numRuns}`)

    const heartbeat = setInterval(() => {
      checkpoint(batchJobId).catch((err: unknown) =>
        logger.warn(`batch ${batchJobId}: heartbeat failed: ${errorMessage(err)}`),
      )
    }, heartbeatMs)
    heartbeat.unref()

    try {
      await runToBoundary(batchJobId)
    } finally {
      clearInterval(heartbeat)
    }
  }

  async function runToBoundary(batchJobId: number): Promise<void> {
    while (true) {
      // Fresh read each run: cancellation may have been written elsewhere
      const fresh = await checkpoint(batchJobId)
      if (!fresh) return

      if (fresh.cancelRequested) {
        await store.transaction((s) => {
          const at = now()
          s.batchJobs.update(batchJobId, { status: 'cancelled', endTime: at, updatedAt: at })
        })
        logger.info(`batch ${batchJobId}: cancelled after ${fresh.completedRuns}/${fresh.numRuns} runs`)
        return
      }

      if (fresh.completedRuns >= fresh.numRuns) {
        await store.transaction((s) => {
          const at = now()
          s.batchJobs.update(batchJobId, { status: 'completed', endTime: at, updatedAt: at })
        })
        return
      }

      const run = fresh.completedRuns
      const seed = fresh.seed === null ? null : fresh.seed + run

      let outcome: ConversationOutcome
      try {
        outcome = await engine.duel({
          agent1Id: fresh.agent1Id,
          agent2Id: fresh.agent2Id,
          prompt: fresh.prompt,
          ttl: fresh.ttl,
          seed,
          title: `Batch ${batchJobId} run ${run + 1}`,
        })
      } catch (err) {
        const message = errorMessage(err)
        await store.transaction((s) => {
          const current = s.batchJobs.require(batchJobId)
          const at = now()
          s.batchJobs.update(batchJobId, {
            status: 'failed',
            summary: { ...current.summary, error: message },
            endTime: at,
            updatedAt: at,
          })
        })
        logger.error(`batch ${batchJobId}: run ${run + 1} failed: ${message}`)
        return
      }

      const updated = await store.transaction((s) => {
        const current = s.batchJobs.require(batchJobId)
        if (current.workerId !== workerId) return undefined
        const completedRuns = Math.min(current.numRuns, Math.max(current.completedRuns, run + 1))
        const at = now()
        const done = completedRuns >= current.numRuns
        return s.batchJobs.update(batchJobId, {
          completedRuns,
          summary: foldRun(current.summary, outcome),
          heartbeatAt: at,
          ...(done ? { status: 'completed' as const, endTime: at } : {}),
          updatedAt: at,
        })
      })

      if (!updated) {
        logger.warn(`batch ${batchJobId}: claim lost during run ${run + 1}; its conversation ${outcome.conversationId} is not counted`)
        return
      }
      logger.info(`batch ${batchJobId}: run ${updated.completedRuns}/${updated.numRuns} done`)
      if (updated.status === 'completed') return
    }
  }

  async function insert(input: BatchJobInput): Promise<BatchJobRecord> {
    if (!Number.isInteger(input.ttl) || input.ttl < 1) {
      throw new ConfigurationError('ttl must be an integer of at least 1')
    }
    if (!Number.isInteger(input.numRuns) || input.numRuns < 1) {
      throw new ConfigurationError('numRuns must be an integer of at least 1')
    }
    if (input.seed !== null && !Number.isInteger(input.seed)) {
      throw new ConfigurationError('seed must be an integer')
    }

    return store.transaction((s) => {
      resolvePairing(s, input.agent1Id, input.agent2Id)
      const at = now()
      return s.batchJobs.insert({
        agent1Id: input.agent1Id,
        agent2Id: input.agent2Id,
        prompt: input.prompt,
        ttl: input.ttl,
        numRuns: input.numRuns,
        completedRuns: 0,
        seed: input.seed,
        cancelRequested: false,
        workerId: null,
        heartbeatAt: null,
        summary: emptySummary(),
        status: 'queued',
        startTime: null,
        endTime: null,
        createdAt: at,
        updatedAt: at,
      })
    })
  }

  async function submit(batchJobId: number): Promise<void> {
    if (deps.inline) {
      await processJob(batchJobId)
    } else {
      queue.push(batchJobId)
    }
  }

  async function get(batchJobId: number): Promise<BatchJobRecord> {
    return store.transaction((s) => s.batchJobs.require(batchJobId))
  }

  return {
    workerId,
    insert,
    submit,
    get,
    processJob,

    async create(input) {
      const job = await insert(input)
      await submit(job.id)
      return get(job.id)
    },

    async cancel(batchJobId) {
      return store.transaction((s) => {
        const job = s.batchJobs.require(batchJobId)
        if (isTerminal(job.status)) return job

        const at = now()
        if (job.status === 'queued') {
          return s.batchJobs.update(batchJobId, { cancelRequested: true, status: 'cancelled', endTime: at, updatedAt: at })
        }
        return s.batchJobs.update(batchJobId, { cancelRequested: true, updatedAt: at })
      })
    },

    async resumeIncomplete() {
      const ids = await store.transaction((s) => s.batchJobs.list((j) => !isTerminal(j.status)).map((j) => j.id))
      for (const id of ids) await submit(id)
      return ids
    },

    async list() {
      const jobs = await store.transaction((s) => s.batchJobs.list())
      return jobs.reverse()
    },

    start: () => queue.start(),
    stop: () => queue.stop(),
    onIdle: () => queue.onIdle(),
  }
}
