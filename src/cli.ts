import 'dotenv/config'
import { Command, InvalidArgumentError } from 'commander'
import { readFileSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { batchJobView } from './batch/view.js'
import { loadConfig } from './config.js'
import { detectBackend } from './connectors/detect.js'
import { BACKEND_KINDS, type BackendKind } from './domain/types.js'
import type { Viewer } from './engine/broadcaster.js'
import { getConversationView, listConversations } from './engine/history.js'
import { BenchDuoError, ConnectorError, errorMessage } from './errors.js'
import { purgeOlderThan } from './maintenance/purge.js'
import {
  renderAgents,
  renderBatchJob,
  renderBatchJobs,
  renderEvaluation,
  renderModels,
  renderStatus,
  renderTranscript,
  renderTurn,
} from './reporter/console.js'
import { jsonReporter } from './reporter/json.js'
import { createRuntime, type Runtime } from './runtime.js'
import type { AgentReadiness } from './status/readiness.js'
import { toHuman } from './utils/time.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

// ── Helpers ──────────────────────────────────────────────────────────

function parseInteger(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.')
  return n
}

function parseNumber(value: string): number {
  const n = Number(value)
  if (value.trim() === '' || Number.isNaN(n)) throw new InvalidArgumentError('Not a number.')
  return n
}

function parseIdList(value: string): number[] {
  return value.split(',').map((part) => parseInteger(part.trim()))
}

function parseBackend(value: string): BackendKind {
  const match = BACKEND_KINDS.find((b) => b === value)
  if (!match) throw new InvalidArgumentError(`Expected one of ${BACKEND_KINDS.join(', ')}.`)
  return match
}

interface OutputOptions {
  json?: boolean
}

function output(opts: OutputOptions, kind: string, data: unknown, render: () => string): void {
  console.log(opts.json ? jsonReporter(kind, data) : render())
}

/**
 * Build a runtime, run the action against it and always stop it. Known
 * failures print one line and set a non-zero exit code.
 */
async function withRuntime(
  action: (runtime: Runtime) => Promise<void>,
  options?: { resumeBatches?: boolean },
): Promise<void> {
  let runtime: Runtime | undefined
  try {
    runtime = createRuntime(loadConfig())
    await runtime.start({ resumeBatches: options?.resumeBatches ?? false })
    await action(runtime)
  } catch (err) {
    if (err instanceof BenchDuoError) {
      console.error(`Error: ${err.message}`)
    } else {
      console.error(`Unexpected error: ${errorMessage(err)}`)
    }
    process.exitCode = 1
  } finally {
    await runtime?.stop()
  }
}

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'))
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version
    return '0.0.0'
  } catch {
    return '0.0.0'
  }
}

const program = new Command()

program
  .name('bench-duo')
  .description('Run scripted duels between two local LLM agents, in bulk, and judge the transcripts.')
  .version(getVersion())

// ── Models ───────────────────────────────────────────────────────────

const models = program.command('models').description('Register and inspect inference backends')

models
  .command('list')
  .description('List registered models')
  .option('--refresh', 'Probe every engine before listing')
  .option('--json', 'Print JSON')
  .action((opts: { refresh?: boolean } & OutputOptions) =>
    withRuntime(async ({ registry }) => {
      const rows = await registry.listModels({ refresh: opts.refresh })
      output(opts, 'models', rows, () => renderModels(rows))
    }),
  )

models
  .command('add')
  .description('Register a model; the backend is detected when not given')
  .requiredOption('--name <name>', 'Unique model name')
  .requiredOption('--model <id>', 'Identifier the backend knows the model by')
  .option('--host <host>', 'Engine host', 'localhost')
  .option('--port <port>', 'Engine port', parseInteger, 11434)
  .option('--backend <kind>', `One of ${BACKEND_KINDS.join(', ')}`, parseBackend)
  .option('--selected <id>', 'Model to load when warming, if different')
  .option('--json', 'Print JSON')
  .action((opts: {
    name: string
    model: string
    host: string
    port: number
    backend?: BackendKind
    selected?: string
  } & OutputOptions) =>
    withRuntime(async ({ registry }) => {
      let backend = opts.backend
      if (!backend) {
        const detected = await detectBackend(opts.host, opts.port)
        if (!detected) throw new ConnectorError(`Unable to detect a backend at ${opts.host}:${opts.port}`)
        backend = detected.backend
      }
      const model = await registry.registerModel({
        name: opts.name,
        host: opts.host,
        port: opts.port,
        backend,
        modelName: opts.model,
        selectedModel: opts.selected ?? null,
      })
      output(opts, 'model', model, () => renderModels([model]))
    }),
  )

models
  .command('detect <host> <port>')
  .description('Find out which backend answers at an address')
  .option('--json', 'Print JSON')
  .action((host: string, port: string, opts: OutputOptions) =>
    withRuntime(async () => {
      const result = await detectBackend(host, parseInteger(port))
      if (!result) throw new ConnectorError(`Unable to detect a backend at ${host}:${port}`)
      output(opts, 'detection', result, () =>
        [
          `  Backend: ${result.backend}${result.version ? ` (${result.version})` : ''}`,
          `  Models:  ${result.models.length > 0 ? result.models.join(', ') : 'none listed'}`,
        ].join('\n'),
      )
    }),
  )

models
  .command('status <id>')
  .description('Show engine and load state for a model')
  .option('--check', 'Probe the engine instead of using the last recorded check')
  .option('--json', 'Print JSON')
  .action((id: string, opts: { check?: boolean } & OutputOptions) =>
    withRuntime(async ({ status }) => {
      const payload = await status.buildModelStatusPayload(parseInteger(id), { forceCheck: opts.check })
      output(opts, 'model-status', payload, () => renderStatus(payload))
    }),
  )

models
  .command('warm <id>')
  .description('Ask the engine to load the model')
  .action((id: string) =>
    withRuntime(async ({ status }) => {
      const result = await status.warmModel(parseInteger(id))
      console.log(`Model ${id}: ${result}`)
      if (result !== 'warm') process.exitCode = 1
    }),
  )

models
  .command('rm <id>')
  .description('Delete a model and its agents')
  .action((id: string) =>
    withRuntime(async ({ registry }) => {
      await registry.deleteModel(parseInteger(id))
      console.log(`Deleted model ${id}`)
    }),
  )

// ── Agents ───────────────────────────────────────────────────────────

const agents = program.command('agents').description('Manage agents (a model plus a role)')

agents
  .command('list')
  .description('List agents')
  .option('--status', 'Compute readiness for each agent (contacts the engines)')
  .option('--json', 'Print JSON')
  .action((opts: { status?: boolean } & OutputOptions) =>
    withRuntime(async ({ registry, status }) => {
      const rows = await registry.listAgents()
      const readiness = new Map<number, AgentReadiness>()
      if (opts.status) {
        for (const agent of rows) {
          const payload = await status.buildAgentStatusPayload(agent.id)
          readiness.set(agent.id, payload.agent.status)
        }
      }
      const data = rows.map((a) => ({ ...a, readiness: readiness.get(a.id) ?? null }))
      output(opts, 'agents', data, () => renderAgents(rows, readiness))
    }),
  )

agents
  .command('add')
  .description('Register an agent on a model')
  .requiredOption('--name <name>', 'Unique agent name')
  .requiredOption('--model-id <id>', 'Model the agent runs on', parseInteger)
  .requiredOption('--system <prompt>', 'System prompt')
  .option('--max-tokens <n>', 'Reply length cap', parseInteger, 256)
  .option('--temperature <t>', 'Sampling temperature (0-2)', parseNumber, 0.7)
  .option('--json', 'Print JSON')
  .action((opts: { name: string; modelId: number; system: string; maxTokens: number; temperature: number } & OutputOptions) =>
    withRuntime(async ({ registry }) => {
      const agent = await registry.registerAgent({
        name: opts.name,
        modelId: opts.modelId,
        systemPrompt: opts.system,
        maxTokens: opts.maxTokens,
        temperature: opts.temperature,
      })
      output(opts, 'agent', agent, () => renderAgents([agent]))
    }),
  )

for (const [name, enabled] of [['enable', true], ['disable', false]] as const) {
  agents
    .command(`${name} <id>`)
    .description(`${enabled ? 'Enable' : 'Disable'} an agent`)
    .action((id: string) =>
      withRuntime(async ({ registry }) => {
        const agent = await registry.setAgentEnabled(parseInteger(id), enabled)
        console.log(`Agent ${agent.name}: ${agent.status}`)
      }),
    )
}

agents
  .command('status <id>')
  .description('Show readiness for an agent')
  .option('--check', 'Probe the engine instead of using the last recorded check')
  .option('--json', 'Print JSON')
  .action((id: string, opts: { check?: boolean } & OutputOptions) =>
    withRuntime(async ({ status }) => {
      const payload = await status.buildAgentStatusPayload(parseInteger(id), { forceCheck: opts.check })
      output(opts, 'agent-status', payload, () =>
        `  Agent: ${payload.agent.status}  ${payload.agent.tooltip}\n${renderStatus(payload)}`,
      )
    }),
  )

agents
  .command('rm <id>')
  .description('Delete an agent')
  .action((id: string) =>
    withRuntime(async ({ registry }) => {
      await registry.deleteAgent(parseInteger(id))
      console.log(`Deleted agent ${id}`)
    }),
  )

// ── Duel ─────────────────────────────────────────────────────────────

program
  .command('duel')
  .description('Run one conversation between two agents, streaming each turn')
  .requiredOption('--agent1 <id>', 'Agent taking the first turn', parseInteger)
  .requiredOption('--agent2 <id>', 'Agent taking the second turn', parseInteger)
  .requiredOption('--prompt <text>', 'Seed message')
  .option('--ttl <n>', 'Number of agent turns', parseInteger, 6)
  .option('--seed <n>', 'Sampling seed passed to both agents', parseInteger)
  .option('--title <title>', 'Conversation title')
  .action((opts: { agent1: number; agent2: number; prompt: string; ttl: number; seed?: number; title?: string }) =>
    withRuntime(async ({ duels, broadcaster }) => {
      const viewer: Viewer = { namespace: 'cli', session: String(process.pid) }
      const unsubscribe = broadcaster.subscribe(viewer, (event) => {
        console.log(renderTurn(event))
        if (event.type === 'end' && event.error) process.exitCode = 1
      })
      try {
        const conversation = await duels.submit(
          {
            agent1Id: opts.agent1,
            agent2Id: opts.agent2,
            prompt: opts.prompt,
            ttl: opts.ttl,
            seed: opts.seed ?? null,
            title: opts.title,
          },
          viewer,
        )
        console.log(`  Conversation ${conversation.id}: ${conversation.title}`)
        await duels.onIdle()
      } finally {
        unsubscribe()
      }
    }),
  )

// ── Batch ────────────────────────────────────────────────────────────

const batch = program.command('batch').description('Run many conversations with the same setup')

batch
  .command('run')
  .description('Create a batch job and run it to the end (Ctrl-C cancels after the current run)')
  .requiredOption('--agent1 <id>', 'Agent taking the first turn', parseInteger)
  .requiredOption('--agent2 <id>', 'Agent taking the second turn', parseInteger)
  .requiredOption('--prompt <text>', 'Seed message for every run')
  .option('--ttl <n>', 'Number of agent turns per run', parseInteger, 6)
  .option('--runs <n>', 'Number of runs', parseInteger, 10)
  .option('--seed <n>', 'Base seed; run r uses seed + r', parseInteger)
  .option('--json', 'Print JSON')
  .action((opts: { agent1: number; agent2: number; prompt: string; ttl: number; runs: number; seed?: number } & OutputOptions) =>
    withRuntime(async ({ batches, logger }) => {
      let jobId: number | undefined
      const onSigint = () => {
        if (jobId === undefined) return
        logger.warn(`cancelling batch ${jobId} after the current run`)
        batches.cancel(jobId).catch((err: unknown) => logger.error(`cancel failed: ${errorMessage(err)}`))
      }
      process.on('SIGINT', onSigint)
      try {
        const job = await batches.insert({
          agent1Id: opts.agent1,
          agent2Id: opts.agent2,
          prompt: opts.prompt,
          ttl: opts.ttl,
          numRuns: opts.runs,
          seed: opts.seed ?? null,
        })
        // Known before any run starts, inline or queued
        jobId = job.id
        await batches.submit(job.id)
        await batches.onIdle()
        const view = batchJobView(await batches.get(job.id))
        output(opts, 'batch-job', view, () => renderBatchJob(view))
        if (view.status === 'failed') process.exitCode = 1
      } finally {
        process.off('SIGINT', onSigint)
      }
    }),
  )

batch
  .command('list')
  .description('List batch jobs, newest first')
  .option('--json', 'Print JSON')
  .action((opts: OutputOptions) =>
    withRuntime(async ({ batches }) => {
      const views = (await batches.list()).map(batchJobView)
      output(opts, 'batch-jobs', views, () => renderBatchJobs(views))
    }),
  )

batch
  .command('show <id>')
  .description('Show one batch job')
  .option('--json', 'Print JSON')
  .action((id: string, opts: OutputOptions) =>
    withRuntime(async ({ batches }) => {
      const view = batchJobView(await batches.get(parseInteger(id)))
      output(opts, 'batch-job', view, () => renderBatchJob(view))
    }),
  )

batch
  .command('cancel <id>')
  .description('Request cancellation; a running job stops after its current run')
  .action((id: string) =>
    withRuntime(async ({ batches }) => {
      const job = await batches.cancel(parseInteger(id))
      console.log(`Batch ${job.id}: ${job.status}${job.status === 'running' ? ' (cancellation requested)' : ''}`)
    }),
  )

batch
  .command('resume')
  .description('Finish batch jobs left incomplete by an earlier process')
  .action(() =>
    withRuntime(
      async ({ batches }) => {
        await batches.onIdle()
        const views = (await batches.list()).map(batchJobView)
        console.log(renderBatchJobs(views))
      },
      { resumeBatches: true },
    ),
  )

// ── Evaluate ─────────────────────────────────────────────────────────

const evaluate = program.command('evaluate').description('Judge finished conversations')

evaluate
  .command('run <conversationId>')
  .description('Critique one conversation with a panel of judge models')
  .requiredOption('--main <id>', 'Model that aggregates the judges', parseInteger)
  .requiredOption('--judges <ids>', 'Comma-separated judge model ids', parseIdList)
  .option('--json', 'Print JSON')
  .action((conversationId: string, opts: { main: number; judges: number[] } & OutputOptions) =>
    withRuntime(async ({ evaluations }) => {
      const job = await evaluations.evaluate({
        conversationId: parseInteger(conversationId),
        mainModelId: opts.main,
        judgeModelIds: opts.judges,
      })
      output(opts, 'evaluation', job, () => renderEvaluation(job))
      if (job.status === 'failed') process.exitCode = 1
    }),
  )

evaluate
  .command('batch <batchId>')
  .description('Critique every conversation a batch job produced')
  .requiredOption('--main <id>', 'Model that aggregates the judges', parseInteger)
  .requiredOption('--judges <ids>', 'Comma-separated judge model ids', parseIdList)
  .option('--json', 'Print JSON')
  .action((batchId: string, opts: { main: number; judges: number[] } & OutputOptions) =>
    withRuntime(async ({ evaluations }) => {
      const jobs = await evaluations.evaluateBatch(parseInteger(batchId), opts.main, opts.judges)
      output(opts, 'evaluations', jobs, () => jobs.map(renderEvaluation).join('\n'))
    }),
  )

evaluate
  .command('show <id>')
  .description('Show a stored evaluation')
  .option('--json', 'Print JSON')
  .action((id: string, opts: OutputOptions) =>
    withRuntime(async ({ evaluations }) => {
      const job = await evaluations.get(parseInteger(id))
      output(opts, 'evaluation', job, () => renderEvaluation(job))
    }),
  )

// ── Conversations ────────────────────────────────────────────────────

const conversations = program.command('conversations').description('Browse stored conversations')

conversations
  .command('list')
  .description('List conversations, newest first')
  .option('--json', 'Print JSON')
  .action((opts: OutputOptions) =>
    withRuntime(async ({ store }) => {
      const rows = await listConversations(store)
      output(opts, 'conversations', rows, () =>
        rows.length === 0
          ? '  No conversations.'
          : rows
              .map((c) => `  #${c.id}  ${c.status.padEnd(8)}  ${toHuman(c.createdAt)}  ${c.title}`)
              .join('\n'),
      )
    }),
  )

conversations
  .command('show <id>')
  .description('Print a transcript')
  .option('--json', 'Print JSON')
  .action((id: string, opts: OutputOptions) =>
    withRuntime(async ({ store }) => {
      const view = await getConversationView(store, parseInteger(id))
      output(opts, 'conversation', view, () => renderTranscript(view))
    }),
  )

// ── Maintenance ──────────────────────────────────────────────────────

program
  .command('purge')
  .description('Delete batch jobs and conversations older than N days')
  .option('--days <n>', 'Age cutoff in days', parseInteger, 30)
  .action((opts: { days: number }) =>
    withRuntime(async ({ store }) => {
      const result = await purgeOlderThan(store, opts.days)
      console.log(
        `Purged ${result.batchJobs} batch job(s) and ${result.conversations} conversation(s) older than ${opts.days} day(s).`,
      )
    }),
  )

await program.parseAsync()
