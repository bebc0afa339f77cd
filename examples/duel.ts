// Two agents on one local Ollama server, then a single-judge evaluation.
//
//   ollama pull llama3.2
//   npx tsx examples/duel.ts

import { createRuntime, getConversationView, loadConfig } from '../src/index.js'
import { renderTranscript } from '../src/reporter/console.js'

const runtime = createRuntime({ ...loadConfig(), storePath: '.bench-duo/example.json' })
await runtime.start({ resumeBatches: false })

try {
  const model = await runtime.registry.registerModel({
    name: `llama-${Date.now()}`,
    host: 'localhost',
    port: 11434,
    backend: 'ollama',
    modelName: 'llama3.2',
  })

  const customer = await runtime.registry.registerAgent({
    name: `customer-${model.id}`,
    modelId: model.id,
    systemPrompt: 'You are a customer whose order arrived damaged. Keep replies short.',
    maxTokens: 128,
    temperature: 0.7,
  })
  const support = await runtime.registry.registerAgent({
    name: `support-${model.id}`,
    modelId: model.id,
    systemPrompt: 'You are a polite support agent. Resolve the issue in as few turns as possible.',
    maxTokens: 128,
    temperature: 0.3,
  })

  const outcome = await runtime.engine.duel({
    agent1Id: customer.id,
    agent2Id: support.id,
    prompt: 'Hello, I need help with my order.',
    ttl: 4,
    seed: 7,
  })
  console.log(renderTranscript(await getConversationView(runtime.store, outcome.conversationId)))

  const evaluation = await runtime.evaluations.evaluate({
    conversationId: outcome.conversationId,
    mainModelId: model.id,
    judgeModelIds: [model.id],
  })
  console.log(`Overall score: ${evaluation.report?.overallScore ?? 'n/a'}`)
} finally {
  await runtime.stop()
}
