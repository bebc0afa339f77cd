import type { BatchJobView } from '../batch/view.js'
import type { AgentRecord, EvaluationJobRecord, ModelRecord, Reachability } from '../domain/types.js'
import type { DuelEvent } from '../engine/broadcaster.js'
import type { ConversationView } from '../engine/history.js'
import { readinessColor, type AgentReadiness } from '../status/readiness.js'
import type { ModelStatusPayload } from '../status/service.js'
import { formatRate, formatScore, formatSeconds, truncate } from '../utils/format.js'
import { toHuman } from '../utils/time.js'

// ── ANSI color palette ──────────────────────────────────────────────────────

const reset = '\x1b[0m'
const boldCode = '\x1b[1m'
const dimCode = '\x1b[2m'
const green = '\x1b[32m'
const red = '\x1b[31m'
const yellow = '\x1b[33m'
const cyan = '\x1b[36m'
const magenta = '\x1b[35m'
const brightWhite = '\x1b[97m'

function bold(s: string) { return `${boldCode}${s}${reset}` }
function dim(s: string) { return `${dimCode}${s}${reset}` }

const LIGHT: Record<Reachability | 'gray', string> = { green, yellow, red, gray: dimCode }

function light(color: Reachability | 'gray', text: string = '●'): string {
  return `${LIGHT[color]}${text}${reset}`
}

// ── String utilities ────────────────────────────────────────────────────────

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '')
}

/** Display width accounting for wide symbols */
function displayWidth(s: string): number {
  let width = 0
  for (const ch of stripAnsi(s)) {
    const code = ch.codePointAt(0) ?? 0
    if (code >= 0x1F000) width += 2
    else width += 1
  }
  return width
}

function padCell(str: string, targetWidth: number, align: 'left' | 'right'): string {
  const padding = Math.max(0, targetWidth - displayWidth(str))
  if (align === 'right') return ' '.repeat(padding) + str
  return str + ' '.repeat(padding)
}

// ── Sparkline bar ───────────────────────────────────────────────────────────

function sparkBar(ratio: number, width: number = 10): string {
  const clamped = Math.max(0, Math.min(1, ratio))
  const fillLen = Math.round(clamped * width)
  const color = clamped >= 0.8 ? green : clamped >= 0.5 ? yellow : red
  return `${color}${'▓'.repeat(fillLen)}${reset}${dim('░'.repeat(width - fillLen))}`
}

// ── Box-drawing ─────────────────────────────────────────────────────────────

interface TableCol {
  label: string
  width: number
  align: 'left' | 'right'
}

type LinePosition = 'top' | 'header' | 'bottom'

function drawTableLine(widths: number[], position: LinePosition): string {
  const segments = widths.map(w => '─'.repeat(w + 2))
  if (position === 'top') return dim(`┌${segments.join('┬')}┐`)
  if (position === 'bottom') return dim(`└${segments.join('┴')}┘`)
  return dim(`├${segments.join('┼')}┤`)
}

function drawTableRow(cells: string[], cols: TableCol[]): string {
  const parts = cols.map((col, i) => ' ' + padCell(cells[i] ?? '', col.width, col.align) + ' ')
  return dim('│') + parts.join(dim('│')) + dim('│')
}

/** Column widths grow to fit the widest cell, up to each column's cap. */
function renderTable(cols: TableCol[], rows: string[][]): string[] {
  const sized = cols.map((col, i) => ({
    ...col,
    width: Math.min(col.width, Math.max(displayWidth(col.label), ...rows.map(r => displayWidth(r[i] ?? '')))),
  }))
  const widths = sized.map(c => c.width)
  const fit = rows.map(r => r.map((cell, i) => {
    const width = widths[i] ?? 0
    return displayWidth(cell) > width ? truncate(stripAnsi(cell), width) : cell
  }))

  return [
    `  ${drawTableLine(widths, 'top')}`,
    `  ${drawTableRow(sized.map(c => bold(c.label)), sized)}`,
    `  ${drawTableLine(widths, 'header')}`,
    ...fit.map(r => `  ${drawTableRow(r, sized)}`),
    `  ${drawTableLine(widths, 'bottom')}`,
  ]
}

function heading(title: string): string[] {
  return ['', `  ${brightWhite}${boldCode}⬡  ${title}${reset}`, `  ${dim('━'.repeat(72))}`, '']
}

// ── Models & agents ─────────────────────────────────────────────────────────

export function renderModels(models: ModelRecord[]): string {
  if (models.length === 0) return '\n  No models registered.\n'

  const cols: TableCol[] = [
    { label: 'ID', width: 4, align: 'right' },
    { label: 'Name', width: 24, align: 'left' },
    { label: 'Backend', width: 9, align: 'left' },
    { label: 'Address', width: 22, align: 'left' },
    { label: 'Model', width: 28, align: 'left' },
    { label: 'Engine', width: 8, align: 'left' },
    { label: 'Warm', width: 8, align: 'left' },
  ]
  const rows = models.map(m => [
    String(m.id),
    m.name,
    m.backend,
    `${m.host}:${m.port}`,
    m.selectedModel ?? m.modelName,
    `${light(m.status)} ${m.status}`,
    m.warmStatus === 'warm' ? `${green}warm${reset}` : m.warmStatus === 'error' ? `${red}error${reset}` : m.warmStatus,
  ])
  return [...heading('Models'), ...renderTable(cols, rows), ''].join('\n')
}

export function renderAgents(agents: AgentRecord[], readiness: Map<number, AgentReadiness> = new Map()): string {
  if (agents.length === 0) return '\n  No agents registered.\n'

  const cols: TableCol[] = [
    { label: 'ID', width: 4, align: 'right' },
    { label: 'Name', width: 24, align: 'left' },
    { label: 'Model', width: 6, align: 'right' },
    { label: 'Max tok', width: 7, align: 'right' },
    { label: 'Temp', width: 5, align: 'right' },
    { label: 'Status', width: 22, align: 'left' },
    { label: 'System prompt', width: 40, align: 'left' },
  ]
  const rows = agents.map(a => {
    const state = readiness.get(a.id)
    return [
      String(a.id),
      a.name,
      String(a.modelId),
      String(a.maxTokens),
      a.temperature.toFixed(1),
      state ? `${light(readinessColor(state))} ${state}` : a.status,
      truncate(a.systemPrompt, 40),
    ]
  })
  return [...heading('Agents'), ...renderTable(cols, rows), ''].join('\n')
}

export function renderStatus(payload: ModelStatusPayload): string {
  const { engine, model, logs } = payload
  const lines = [
    `  ${light(engine.reachable ? 'green' : 'red')} ${bold('Engine')} ${engine.host}  ${dim(engine.tooltip)}`,
    `  ${light(model.loadState === 'warm' ? 'green' : model.loadState === 'not_present' ? 'red' : 'yellow')} ${bold('Model')}  ${model.loadState}  ${dim(model.tooltip)}`,
  ]
  if (logs.recent.length > 0) {
    lines.push('', `  ${bold('Recent')}`)
    for (const line of logs.recent) lines.push(`    ${dim(line)}`)
  }
  return lines.join('\n')
}

// ── Conversations ───────────────────────────────────────────────────────────

const SENDER_COLOR = { user: cyan, agent1: green, agent2: magenta } as const

export function renderTurn(event: DuelEvent): string {
  if (event.type === 'turn') {
    return `  ${SENDER_COLOR[event.sender]}${bold(event.sender)}${reset} ${event.text}`
  }
  if (event.error) {
    return `  ${red}✖${reset} conversation ${event.conversationId} stopped after ${event.stats.totalMessages} message(s): ${event.error}`
  }
  return `  ${green}✔${reset} conversation ${event.conversationId} ${event.status} ${dim(`(${event.stats.totalMessages} messages)`)}`
}

export function renderTranscript(view: ConversationView): string {
  const { conversation, messages, stats } = view
  const lines = heading(`${conversation.title}  ${dim(`#${conversation.id} ${conversation.status}`)}`)
  messages.forEach((m, i) => {
    lines.push(`  ${dim(`[${i}]`)} ${SENDER_COLOR[m.senderRole]}${bold(m.senderRole)}${reset} ${m.content}`)
  })
  lines.push('', `  ${dim(`${stats.totalMessages} messages, ~${stats.totalTokens} tokens, ttl ${conversation.ttl}, seed ${conversation.randomSeed ?? 'none'}`)}`, '')
  return lines.join('\n')
}

// ── Batch jobs ──────────────────────────────────────────────────────────────

const BATCH_STATUS_COLOR = {
  queued: dimCode,
  running: cyan,
  completed: green,
  cancelled: yellow,
  failed: red,
} as const

export function renderBatchJob(job: BatchJobView): string {
  const lines = heading(`Batch ${job.id}  ${BATCH_STATUS_COLOR[job.status]}${job.status}${reset}`)
  lines.push(
    `  ${sparkBar(job.completed / job.total, 20)} ${job.completed}/${job.total} runs`,
    `  Prompt:    ${job.promptSnippet}`,
    `  Agents:    ${job.agent1Id} vs ${job.agent2Id}, ttl ${job.ttl}, seed ${job.seed ?? 'none'}`,
    `  Elapsed:   ${formatSeconds(job.timeElapsed)}  ${dim(`avg ${formatSeconds(job.avgTime)}/run, ${formatRate(job.tokensPerSec)}`)}`,
    `  Started:   ${toHuman(job.startTime)}   Ended: ${toHuman(job.endTime)}`,
  )
  if (job.conversationIds.length > 0) lines.push(`  Conversations: ${job.conversationIds.join(', ')}`)
  if (job.cancelRequested && job.status === 'running') lines.push(`  ${yellow}cancellation requested${reset}`)
  if (job.error) lines.push(`  ${red}✖${reset} ${job.error}`)
  lines.push('')
  return lines.join('\n')
}

export function renderBatchJobs(jobs: BatchJobView[]): string {
  if (jobs.length === 0) return '\n  No batch jobs.\n'

  const cols: TableCol[] = [
    { label: 'ID', width: 4, align: 'right' },
    { label: 'Status', width: 9, align: 'left' },
    { label: 'Runs', width: 9, align: 'right' },
    { label: 'Avg', width: 8, align: 'right' },
    { label: 'Rate', width: 12, align: 'right' },
    { label: 'Prompt', width: 40, align: 'left' },
  ]
  const rows = jobs.map(j => [
    String(j.id),
    `${BATCH_STATUS_COLOR[j.status]}${j.status}${reset}`,
    `${j.completed}/${j.total}`,
    formatSeconds(j.avgTime),
    formatRate(j.tokensPerSec),
    j.promptSnippet,
  ])
  return [...heading('Batch jobs'), ...renderTable(cols, rows), ''].join('\n')
}

// ── Evaluations ─────────────────────────────────────────────────────────────

export function renderEvaluation(job: EvaluationJobRecord): string {
  const lines = heading(`Evaluation ${job.id}  ${dim(`conversation #${job.conversationId}, ${job.status}`)}`)

  if (job.results && 'error' in job.results) {
    lines.push(`  ${red}✖${reset} ${job.results.error}`, '')
    return lines.join('\n')
  }

  const report = job.report
  if (!report) {
    lines.push(`  ${dim('No report yet.')}`, '')
    return lines.join('\n')
  }

  lines.push(
    `  Overall     ${sparkBar(report.overallScore)} ${bold(formatScore(report.overallScore))}  ${dim(`(${report.source})`)}`,
    `  Completion  ${report.completionScore.toFixed(1)}`,
    `  Realistic   ${report.realisticScore.toFixed(1)}`,
    `  Issues      ${report.totalIssues}, highest severity ${report.highestSeverity}`,
    '',
    `  ${report.summary}`,
  )

  if (job.results && 'judges' in job.results) {
    lines.push('', `  ${bold('Judges')}`)
    for (const judge of job.results.judges) {
      const scores = `completion ${judge.completionScore ?? '—'}, realistic ${judge.realisticScore ?? '—'}`
      const note = judge.error ? `${red}${judge.error}${reset}` : dim(truncate(judge.notes, 60))
      lines.push(`    ${judge.judgeModelName}: ${judge.issues.length} issue(s), ${scores}  ${note}`)
    }
  }

  const flagged = report.flaggedLines ?? []
  if (flagged.length > 0) {
    lines.push('', `  ${bold('Flagged')}`)
    for (const f of flagged) {
      const sev = f.severity >= 4 ? red : f.severity >= 2 ? yellow : dimCode
      lines.push(`    ${dim(`[${f.messageIndex}]`)} ${sev}sev ${f.severity}${reset} ${f.reason}: ${truncate(f.excerpt, 60)}`)
    }
  }
  lines.push('')
  return lines.join('\n')
}
