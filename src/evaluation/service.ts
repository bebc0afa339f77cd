import type { ConnectorFactory } from '../connectors/index.js'
import type {
  EvaluationJobRecord,
  EvaluationReport,
  FlaggedLine,
  JudgeResult,
  MessageRecord,
  ModelRecord,
} from '../domain/types.js'
import { ConfigurationError, errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import type { Store } from '../store/types.js'
import { now } from '../utils/time.js'
import { runAggregator, runJudge } from './judge.js'
import { conversationToText } from './transcript.js'

export interface EvaluationInput {
  conversationId: number
  mainModelId: number
  judgeModelIds: number[]
  batchId?: number
}

export interface EvaluationServiceDeps {
  store: Store
  connectors: ConnectorFactory
  logger: Logger
  requestTimeoutMs?: number
}

/** Map flagged instances onto stored messages, skipping indices outside the transcript. */
export function flaggedLinesFor(report: EvaluationReport, messages: MessageRecord[]): FlaggedLine[] {
  const lines: FlaggedLine[] = []
  for (const item of report.flaggedInstances) {
    const index = item.messageIndex
    if (index === null || index < 0) continue
    const message = messages[index]
    if (!message) continue
    lines.push({
      messageId: message.id,
      messageIndex: index,
      reason: item.category,
      excerpt: item.excerpt,
      severity: item.severity,
    })
  }
  return lines
}

/**
 * Critique a stored conversation with a panel of judge models and have a
 * main model (or the code aggregator) turn their output into one report.
 */
export interface EvaluationService {
  /**
   * Judge one conversation. Only invalid input throws; a failure once the
   * job exists is recorded on it and the failed job is returned.
   */
  evaluate(input: EvaluationInput): Promise<EvaluationJobRecord>
  /** Evaluate every conversation a batch job produced, in run order. */
  evaluateBatch(batchId: number, mainModelId: number, judgeModelIds: number[]): Promise<EvaluationJobRecord[]>
  get(evaluationId: number): Promise<EvaluationJobRecord>
  /** Newest first */
  list(): Promise<EvaluationJobRecord[]>
}

export function createEvaluationService(deps: EvaluationServiceDeps): EvaluationService {
  const { store, logger } = deps

  async function evaluate(input: EvaluationInput): Promise<EvaluationJobRecord> {
    if (input.judgeModelIds.length === 0) {
      throw new ConfigurationError('judgeModelIds must include at least one model id')
    }
    if (new Set(input.judgeModelIds).size !== input.judgeModelIds.length) {
      throw new ConfigurationError('judgeModelIds must be distinct')
    }

    const { job, mainModel, judges, messages } = await store.transaction((s) => {
      const conversation = s.conversations.require(input.conversationId)
      if (input.batchId !== undefined) s.batchJobs.require(input.batchId)
      const mainModel = s.models.require(input.mainModelId)
      const judges: ModelRecord[] = input.judgeModelIds.map((id) => s.models.require(id))
      const messages = s.messages.list((m) => m.conversationId === conversation.id)

      const at = now()
      const job = s.evaluationJobs.insert({
        conversationId: conversation.id,
        batchId: input.batchId ?? null,
        mainModelId: mainModel.id,
        judgeModelIds: [...input.judgeModelIds],
        results: null,
        report: null,
        status: 'pending',
        createdAt: at,
        updatedAt: at,
      })
      return { job, mainModel, judges, messages }
    })

    await store.transaction((s) => s.evaluationJobs.update(job.id, { status: 'running', updatedAt: now() }))
    logger.info(`evaluation ${job.id}: conversation ${input.conversationId} with ${judges.length} judge(s)`)

    try {
      const transcript = conversationToText(messages)
      const judgeResults: JudgeResult[] = []
      for (const judge of judges) {
        judgeResults.push(await runJudge(deps, judge, transcript))
      }

      const report = await runAggregator(deps, mainModel, transcript, judgeResults)
      const finalReport: EvaluationReport = {
        ...report,
        scores: {
          overall: report.overallScore,
          completion: report.completionScore,
          realistic: report.realisticScore,
          highestSeverity: report.highestSeverity,
        },
        flaggedLines: flaggedLinesFor(report, messages),
      }

      const completed = await store.transaction((s) =>
        s.evaluationJobs.update(job.id, {
          results: { judges: judgeResults },
          report: finalReport,
          status: 'completed',
          updatedAt: now(),
        }),
      )
      logger.info(`evaluation ${job.id}: overall ${finalReport.overallScore} (${finalReport.source})`)
      return completed
    } catch (err) {
      const message = errorMessage(err)
      logger.error(`evaluation ${job.id} failed: ${message}`)
      return store.transaction((s) =>
        s.evaluationJobs.update(job.id, { status: 'failed', results: { error: message }, updatedAt: now() }),
      )
    }
  }

  return {
    evaluate,

    async evaluateBatch(batchId, mainModelId, judgeModelIds) {
      const batch = await store.transaction((s) => s.batchJobs.require(batchId))
      const jobs: EvaluationJobRecord[] = []
      for (const conversationId of batch.summary.conversationIds) {
        jobs.push(await evaluate({ conversationId, mainModelId, judgeModelIds, batchId }))
      }
      return jobs
    },

    async get(evaluationId) {
      return store.transaction((s) => s.evaluationJobs.require(evaluationId))
    },

    async list() {
      const jobs = await store.transaction((s) => s.evaluationJobs.list())
      return jobs.reverse()
    },
  }
}
