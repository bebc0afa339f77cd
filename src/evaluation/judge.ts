import { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import type { ConnectorFactory } from '../connectors/index.js'
import type { EvaluationReport, JudgeResult, ModelRecord } from '../domain/types.js'
import { errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import { codeAggregate, round } from './aggregate.js'
import { extractJsonBlock, normalizeIssues, normalizeJudgeOutput } from './parse.js'

export const JUDGE_PROMPT = `You are an expert evaluator. Analyze the conversation and return strict JSON with this exact shape: {"issues":[{"message_index":0,"category":"hallucination|forbidden|other","excerpt":"text","severity":1}],"completion_score":0,"realistic_score":0,"notes":"short summary"}. Severity range is 1-5. completion_score and realistic_score are 0-100 integers. Only include an issue if a concrete problem exists and always map message_index to the conversation list index.

Conversation:
{conversation}`

export const AGGREGATOR_PROMPT = `You are the main evaluation aggregator. Given the conversation and judge outputs, return strict JSON with shape: {"summary":"...","overall_score":0.0,"total_issues":0,"highest_severity":0,"completion_score":0,"realistic_score":0,"flagged_instances":[{"message_index":0,"category":"...","excerpt":"...","severity":1}]}.

Conversation:
{conversation}

Judge Outputs:
{judges}`

/** What judges are asked for; passed to backends as a structured-output hint. */
export const judgeOutputSchema = z.object({
  issues: z.array(
    z.object({
      message_index: z.number().int(),
      category: z.string(),
      excerpt: z.string(),
      severity: z.number().int().min(1).max(5),
    }),
  ),
  completion_score: z.number().int().min(0).max(100),
  realistic_score: z.number().int().min(0).max(100),
  notes: z.string(),
})

const JUDGE_FORMAT = zodToJsonSchema(judgeOutputSchema) as Record<string, unknown>

const aggregatorSchema = z.object({
  summary: z.string().catch(''),
  overall_score: z.number().finite(),
  total_issues: z.number().int().nonnegative().optional().catch(undefined),
  highest_severity: z.number().int().nonnegative().optional().catch(undefined),
  completion_score: z.number().finite().optional().catch(undefined),
  realistic_score: z.number().finite().optional().catch(undefined),
  flagged_instances: z.array(z.unknown()).catch([]),
})

export interface JudgeDeps {
  connectors: ConnectorFactory
  logger: Logger
  requestTimeoutMs?: number
}

/**
 * Ask one judge model to critique the transcript. Never throws: a failing
 * call or unreadable reply yields a result with no issues and no scores.
 */
export async function runJudge(deps: JudgeDeps, model: ModelRecord, transcript: string): Promise<JudgeResult> {
  const base = { judgeModelId: model.id, judgeModelName: model.name }
  const prompt = JUDGE_PROMPT.replace('{conversation}', () => transcript)

  let text: string
  try {
    const result = await deps.connectors(model).chat([{ role: 'user', content: prompt }], {
      model: model.modelName,
      temperature: 0,
      maxTokens: 800,
      timeoutMs: deps.requestTimeoutMs,
      format: JUDGE_FORMAT,
    })
    text = result.text
  } catch (err) {
    deps.logger.warn(`judge ${model.name} call failed: ${errorMessage(err)}`)
    return { ...base, issues: [], completionScore: null, realisticScore: null, notes: '', error: `judge call failed: ${errorMessage(err)}` }
  }

  try {
    return { ...base, ...normalizeJudgeOutput(extractJsonBlock(text)) }
  } catch (err) {
    deps.logger.warn(`judge ${model.name} returned unreadable output: ${errorMessage(err)}`)
    return { ...base, issues: [], completionScore: null, realisticScore: null, notes: '', error: `parse error: ${errorMessage(err)}` }
  }
}

/**
 * Read an aggregator reply. Null unless it is an object carrying a numeric
 * `overall_score`; fields it leaves out are taken from the code aggregate.
 */
export function parseAggregatorOutput(text: string, results: JudgeResult[]): EvaluationReport | null {
  let parsed: unknown
  try {
    parsed = extractJsonBlock(text)
  } catch {
    return null
  }

  const data = aggregatorSchema.safeParse(parsed)
  if (!data.success) return null

  const fallback = codeAggregate(results)
  const flaggedInstances = normalizeIssues(data.data.flagged_instances)
  return {
    summary: data.data.summary || fallback.summary,
    overallScore: round(Math.max(0, Math.min(1, data.data.overall_score)), 3),
    totalIssues: data.data.total_issues ?? flaggedInstances.length,
    highestSeverity: data.data.highest_severity ?? Math.max(0, ...flaggedInstances.map((f) => f.severity)),
    completionScore: data.data.completion_score ?? fallback.completionScore,
    realisticScore: data.data.realistic_score ?? fallback.realisticScore,
    flaggedInstances,
    source: 'aggregator',
  }
}

function judgeOutputsJson(results: JudgeResult[]): string {
  return JSON.stringify(
    results.map((r) => ({
      judge_model_id: r.judgeModelId,
      judge_model_name: r.judgeModelName,
      issues: r.issues.map((i) => ({
        message_index: i.messageIndex,
        category: i.category,
        excerpt: i.excerpt,
        severity: i.severity,
      })),
      completion_score: r.completionScore,
      realistic_score: r.realisticScore,
      notes: r.notes,
      ...(r.error ? { error: r.error } : {}),
    })),
  )
}

/**
 * Have the main model synthesize the judge results. Falls back to
 * `codeAggregate` when the call fails or the reply is unusable.
 */
export async function runAggregator(
  deps: JudgeDeps,
  mainModel: ModelRecord,
  transcript: string,
  results: JudgeResult[],
): Promise<EvaluationReport> {
  const judges = judgeOutputsJson(results)
  const prompt = AGGREGATOR_PROMPT.replace(/\{(conversation|judges)\}/g, (_, key: string) =>
    key === 'judges' ? judges : transcript,
  )

  try {
    const result = await deps.connectors(mainModel).chat([{ role: 'user', content: prompt }], {
      model: mainModel.modelName,
      temperature: 0,
      maxTokens: 1000,
      timeoutMs: deps.requestTimeoutMs,
    })
    const report = parseAggregatorOutput(result.text, results)
    if (report) return report
    deps.logger.warn(`aggregator ${mainModel.name} output unusable; using code aggregate`)
  } catch (err) {
    deps.logger.warn(`aggregator ${mainModel.name} call failed: ${errorMessage(err)}; using code aggregate`)
  }
  return codeAggregate(results)
}
