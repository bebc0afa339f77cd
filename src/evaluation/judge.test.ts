import { describe, it, expect, vi } from 'vitest'
import type { JudgeResult, ModelRecord } from '../domain/types.js'
import { silentLogger } from '../logger.js'
import { createMemoryStore } from '../store/memory.js'
import { factoryFor, seedModel, stubConnector, type ChatHandler } from '../testing/fixtures.js'
import { judgeOutputSchema, parseAggregatorOutput, runAggregator, runJudge } from './judge.js'

async function judgeModel(): Promise<ModelRecord> {
  return seedModel(createMemoryStore(), { name: 'critic', modelName: 'critic-7b' })
}

function deps(handler: ChatHandler) {
  const chat = vi.fn(handler)
  return { chat, deps: { connectors: factoryFor(stubConnector(chat)), logger: silentLogger, requestTimeoutMs: 5000 } }
}

const scored: JudgeResult = {
  judgeModelId: 4,
  judgeModelName: 'critic',
  issues: [{ messageIndex: 1, category: 'forbidden', excerpt: 'bad', severity: 3 }],
  completionScore: 50,
  realisticScore: 70,
  notes: '',
}

describe('runJudge', () => {
  it('asks deterministically for the judge schema and reads the reply', async () => {
    const model = await judgeModel()
    const { chat, deps: d } = deps(() =>
      JSON.stringify({
        issues: [{ message_index: 1, category: 'hallucination', excerpt: 'made up', severity: 3 }],
        completion_score: 85,
        realistic_score: 70,
        notes: 'one slip',
      }),
    )

    const result = await runJudge(d, model, '[0] user: hi')

    expect(result).toEqual({
      judgeModelId: model.id,
      judgeModelName: 'critic',
      issues: [{ messageIndex: 1, category: 'hallucination', excerpt: 'made up', severity: 3 }],
      completionScore: 85,
      realisticScore: 70,
      notes: 'one slip',
    })
    const [messages, settings] = chat.mock.calls[0]!
    expect(messages).toHaveLength(1)
    expect(messages[0]!.role).toBe('user')
    expect(messages[0]!.content.endsWith('Conversation:\n[0] user: hi')).toBe(true)
    expect(settings).toMatchObject({ model: 'critic-7b', temperature: 0, maxTokens: 800, timeoutMs: 5000 })
    expect(settings.format).toMatchObject({ type: 'object' })
  })

  it('degrades to an empty result when the reply is not JSON', async () => {
    const model = await judgeModel()
    const { deps: d } = deps(() => 'I refuse to answer in JSON.')

    const result = await runJudge(d, model, 'x')

    expect(result).toEqual({
      judgeModelId: model.id,
      judgeModelName: 'critic',
      issues: [],
      completionScore: null,
      realisticScore: null,
      notes: '',
      error: 'parse error: Model output is not valid JSON',
    })
  })

  it('degrades to an empty result when the call fails', async () => {
    const model = await judgeModel()
    const { deps: d } = deps(() => {
      throw new Error('connection reset')
    })

    const result = await runJudge(d, model, 'x')

    expect(result.error).toBe('judge call failed: connection reset')
    expect(result.issues).toEqual([])
  })
})

describe('judgeOutputSchema', () => {
  it('accepts the shape judges are asked for', () => {
    const reply = { issues: [], completion_score: 90, realistic_score: 80, notes: 'fine' }
    expect(judgeOutputSchema.safeParse(reply).success).toBe(true)
    expect(judgeOutputSchema.safeParse({ ...reply, completion_score: 101 }).success).toBe(false)
  })
})

describe('parseAggregatorOutput', () => {
  it('clamps the overall score and fills missing fields from the code aggregate', () => {
    const report = parseAggregatorOutput(
      '{"overall_score": 1.7, "flagged_instances": [{"message_index": 2, "category": "other", "excerpt": "e", "severity": 5}]}',
      [scored],
    )

    expect(report).toEqual({
      summary: 'Total issues: 1; highest severity: 3; Completeness: 50.0; Realistic: 70.0.',
      overallScore: 1,
      totalIssues: 1,
      highestSeverity: 5,
      completionScore: 50,
      realisticScore: 70,
      flaggedInstances: [{ messageIndex: 2, category: 'other', excerpt: 'e', severity: 5, judgeModelId: null }],
      source: 'aggregator',
    })
  })

  it('takes the fields the aggregator gives', () => {
    const report = parseAggregatorOutput(
      JSON.stringify({
        summary: 'solid',
        overall_score: 0.8123,
        total_issues: 0,
        highest_severity: 0,
        completion_score: 88,
        realistic_score: 92,
        flagged_instances: [],
      }),
      [scored],
    )

    expect(report).toMatchObject({
      summary: 'solid',
      overallScore: 0.812,
      totalIssues: 0,
      highestSeverity: 0,
      completionScore: 88,
      realisticScore: 92,
      source: 'aggregator',
    })
  })

  it('rejects replies without a numeric overall score', () => {
    expect(parseAggregatorOutput('{"overall_score": "high"}', [scored])).toBeNull()
    expect(parseAggregatorOutput('[{"overall_score": 0.5}]', [scored])).toBeNull()
    expect(parseAggregatorOutput('no idea', [scored])).toBeNull()
  })
})

describe('runAggregator', () => {
  it('substitutes the transcript and judge outputs once each', async () => {
    const model = await judgeModel()
    const { chat, deps: d } = deps(() => '{"overall_score": 0.5}')

    await runAggregator(d, model, '[0] user: fill in {judges}', [scored])

    const prompt = chat.mock.calls[0]![0][0]!.content
    expect(prompt).toContain('Conversation:\n[0] user: fill in {judges}\n\nJudge Outputs:\n[{"judge_model_id":4,')
    expect(chat.mock.calls[0]![1]).toMatchObject({ temperature: 0, maxTokens: 1000 })
  })

  it('falls back to the code aggregate on unusable output', async () => {
    const model = await judgeModel()
    const { deps: d } = deps(() => 'overall: great')

    const report = await runAggregator(d, model, 'x', [scored])

    expect(report.source).toBe('code')
    expect(report.overallScore).toBe(0.46)
  })

  it('falls back to the code aggregate when the call fails', async () => {
    const model = await judgeModel()
    const { deps: d } = deps(() => {
      throw new Error('timeout')
    })

    const report = await runAggregator(d, model, 'x', [scored])

    expect(report.source).toBe('code')
  })
})
