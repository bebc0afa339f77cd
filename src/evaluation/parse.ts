import { z } from 'zod'
import type { FlaggedInstance, JudgeIssue } from '../domain/types.js'

// ── JSON extraction ─────────────────────────────────────────────────

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

function span(text: string, open: string, close: string): string | undefined {
  const start = text.indexOf(open)
  const end = text.lastIndexOf(close)
  return start !== -1 && end > start ? text.slice(start, end + 1) : undefined
}

/**
 * Read JSON out of model output: the whole text, then the widest `{...}` span,
 * then the widest `[...]` span. Throws when none of them parse.
 */
export function extractJsonBlock(rawText: string): unknown {
  const text = rawText.trim()

  const direct = tryParse(text)
  if (direct.ok) return direct.value

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const candidate = span(text, open, close)
    if (candidate === undefined) continue
    const parsed = tryParse(candidate)
    if (parsed.ok) return parsed.value
  }

  throw new Error('Model output is not valid JSON')
}

// ── Normalization ───────────────────────────────────────────────────

/** Integers, numeric strings and floats (truncated); anything else is null. */
export function toInt(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isFinite(n) ? Math.trunc(n) : null
  }
  return null
}

const issueSchema = z.object({
  message_index: z.unknown(),
  category: z.string().catch('other'),
  excerpt: z.string().catch(''),
  severity: z.unknown(),
  judge_model_id: z.unknown(),
})

const score = z.number().finite().nullable().catch(null)

const judgeObjectSchema = z.object({
  issues: z.array(z.unknown()).catch([]),
  completion_score: score,
  realistic_score: score,
  notes: z.string().catch(''),
})

export interface NormalizedJudgeOutput {
  issues: JudgeIssue[]
  completionScore: number | null
  realisticScore: number | null
  notes: string
}

/** Flagged items from a judge or the aggregator; entries that are not objects are dropped. */
export function normalizeIssues(items: unknown[]): FlaggedInstance[] {
  const issues: FlaggedInstance[] = []
  for (const item of items) {
    const parsed = issueSchema.safeParse(item)
    if (!parsed.success) continue
    const { message_index, category, excerpt, severity, judge_model_id } = parsed.data
    issues.push({
      messageIndex: toInt(message_index),
      category,
      excerpt,
      severity: toInt(severity) ?? 0,
      judgeModelId: toInt(judge_model_id),
    })
  }
  return issues
}

/**
 * Shape a parsed judge reply. A bare array is the issue list; an object
 * contributes whatever fields it has right. Anything else throws.
 */
export function normalizeJudgeOutput(parsed: unknown): NormalizedJudgeOutput {
  if (Array.isArray(parsed)) {
    return {
      issues: normalizeIssues(parsed).map(stripJudge),
      completionScore: null,
      realisticScore: null,
      notes: '',
    }
  }

  if (typeof parsed === 'object' && parsed !== null) {
    const data = judgeObjectSchema.parse(parsed)
    return {
      issues: normalizeIssues(data.issues).map(stripJudge),
      completionScore: data.completion_score,
      realisticScore: data.realistic_score,
      notes: data.notes,
    }
  }

  throw new Error('Judge output JSON must be an object or array')
}

function stripJudge({ messageIndex, category, excerpt, severity }: FlaggedInstance): JudgeIssue {
  return { messageIndex, category, excerpt, severity }
}
