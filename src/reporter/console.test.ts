import { describe, it, expect } from 'vitest'
import { batchJobView } from '../batch/view.js'
import type { BatchJobRecord, EvaluationJobRecord, ModelRecord } from '../domain/types.js'
import { renderBatchJob, renderEvaluation, renderModels, renderTurn, stripAnsi } from './console.js'
import { jsonReporter } from './json.js'

const AT = '2026-02-03T04:05:06.000Z'

function lines(output: string): string[] {
  return stripAnsi(output).split('\n')
}

const model: ModelRecord = {
  id: 1,
  name: 'local',
  host: 'localhost',
  port: 11434,
  backend: 'ollama',
  modelName: 'llama3',
  selectedModel: null,
  status: 'green',
  warmStatus: 'warm',
  lastWarmedAt: null,
  lastLoadAttemptAt: null,
  lastLoadMessage: null,
  lastEngineCheckAt: null,
  lastEngineMessage: null,
  createdAt: AT,
  updatedAt: AT,
}

const batch: BatchJobRecord = {
  id: 3,
  agent1Id: 1,
  agent2Id: 2,
  prompt: 'say hi',
  ttl: 4,
  numRuns: 2,
  completedRuns: 2,
  seed: 10,
  cancelRequested: false,
  workerId: null,
  heartbeatAt: null,
  summary: { totalMessages: 10, totalTokens: 10, totalElapsedSeconds: 4, conversationIds: [5, 6], error: null },
  status: 'completed',
  startTime: AT,
  endTime: AT,
  createdAt: AT,
  updatedAt: AT,
}

describe('renderModels', () => {
  it('draws one table row per model', () => {
    expect(lines(renderModels([model]))).toContain(
      '  │  1 │ local │ ollama  │ localhost:11434 │ llama3 │ ● green │ warm │',
    )
  })

  it('says so when there are none', () => {
    expect(renderModels([])).toBe('\n  No models registered.\n')
  })
})

describe('renderTurn', () => {
  it('prints the sender and text of a turn', () => {
    expect(stripAnsi(renderTurn({ type: 'turn', conversationId: 1, sender: 'agent2', text: 'hello', done: false }))).toBe(
      '  agent2 hello',
    )
  })

  it('prints how a conversation ended', () => {
    expect(stripAnsi(renderTurn({ type: 'end', conversationId: 1, status: 'finished', stats: { totalMessages: 4 } }))).toBe(
      '  ✔ conversation 1 finished (4 messages)',
    )
    expect(
      stripAnsi(
        renderTurn({ type: 'end', conversationId: 1, status: 'running', stats: { totalMessages: 1 }, error: 'boom' }),
      ),
    ).toBe('  ✖ conversation 1 stopped after 1 message(s): boom')
  })
})

describe('renderBatchJob', () => {
  it('shows progress, timing and conversations', () => {
    const out = lines(renderBatchJob(batchJobView(batch)))

    expect(out[1]).toBe('  ⬡  Batch 3  completed')
    expect(out).toContain(`  ${'▓'.repeat(20)} 2/2 runs`)
    expect(out).toContain('  Agents:    1 vs 2, ttl 4, seed 10')
    expect(out).toContain('  Elapsed:   4.0s  avg 2.0s/run, 2.5 tok/s')
    expect(out).toContain('  Started:   2026-02-03 04:05   Ended: 2026-02-03 04:05')
    expect(out).toContain('  Conversations: 5, 6')
  })

  it('shows the error of a failed job', () => {
    const failed = { ...batch, status: 'failed' as const, summary: { ...batch.summary, error: 'backend down' } }

    expect(lines(renderBatchJob(batchJobView(failed)))).toContain('  ✖ backend down')
  })
})

describe('renderEvaluation', () => {
  const base: EvaluationJobRecord = {
    id: 7,
    conversationId: 5,
    batchId: null,
    mainModelId: 1,
    judgeModelIds: [2],
    results: null,
    report: null,
    status: 'pending',
    createdAt: AT,
    updatedAt: AT,
  }

  it('shows the failure of a failed job', () => {
    const out = lines(renderEvaluation({ ...base, status: 'failed', results: { error: 'disk full' } }))

    expect(out[1]).toBe('  ⬡  Evaluation 7  conversation #5, failed')
    expect(out).toContain('  ✖ disk full')
  })

  it('shows scores, judges and flagged lines', () => {
    const out = lines(
      renderEvaluation({
        ...base,
        status: 'completed',
        results: {
          judges: [
            {
              judgeModelId: 2,
              judgeModelName: 'critic',
              issues: [{ messageIndex: 1, category: 'hallucination', excerpt: 'cheese', severity: 4 }],
              completionScore: 70,
              realisticScore: null,
              notes: 'one slip',
            },
          ],
        },
        report: {
          summary: 'Total issues: 1',
          overallScore: 0.63,
          totalIssues: 1,
          highestSeverity: 4,
          completionScore: 70,
          realisticScore: 90,
          flaggedInstances: [],
          source: 'code',
          flaggedLines: [{ messageId: 12, messageIndex: 1, reason: 'hallucination', excerpt: 'cheese', severity: 4 }],
        },
      }),
    )

    expect(out).toContain(`  Overall     ${'▓'.repeat(6)}${'░'.repeat(4)} 63%  (code)`)
    expect(out).toContain('  Issues      1, highest severity 4')
    expect(out).toContain('    critic: 1 issue(s), completion 70, realistic —  one slip')
    expect(out).toContain('    [1] sev 4 hallucination: cheese')
  })
})

describe('jsonReporter', () => {
  it('wraps data in a timestamped envelope', () => {
    const parsed = JSON.parse(jsonReporter('models', [{ id: 1 }]))

    expect(parsed.kind).toBe('models')
    expect(parsed.data).toEqual([{ id: 1 }])
    expect(typeof parsed.timestamp).toBe('string')
  })
})
