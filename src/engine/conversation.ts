import type { ConnectorFactory } from '../connectors/index.js'
import type { ChatMessage } from '../connectors/types.js'
import type { AgentRecord, ConversationRecord, MessageRecord, ModelRecord } from '../domain/types.js'
import { ConfigurationError, TurnFailure, errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import type { StatusService } from '../status/service.js'
import type { Session, Store } from '../store/types.js'
import { now } from '../utils/time.js'
import type { Broadcaster, Viewer } from './broadcaster.js'
import { countTokens } from './tokens.js'

export interface DuelInput {
  agent1Id: number
  agent2Id: number
  prompt: string
  ttl: number
  seed: number | null
  title?: string
}

export interface ConversationOutcome {
  conversationId: number
  /** Seed message included */
  messageCount: number
  totalTokens: number
  elapsedSeconds: number
}

export interface RunOptions {
  /** Receives `turn` and `end` events; batch runs have no viewer */
  viewer?: Viewer
}

export interface TurnEngineDeps {
  store: Store
  connectors: ConnectorFactory
  broadcaster: Broadcaster
  logger: Logger
  /** Warms cold models before the first turn when set */
  status?: StatusService
  requestTimeoutMs?: number
}

interface Participant {
  agent: AgentRecord
  model: ModelRecord
}

/**
 * Resolve both agents of a pairing and enforce the single-engine rule.
 * Throws ConfigurationError before anything is written.
 */
export function resolvePairing(session: Session, agent1Id: number, agent2Id: number): [Participant, Participant] {
  const resolve = (agentId: number): Participant => {
    const agent = session.agents.get(agentId)
    if (!agent) throw new ConfigurationError(`Agent ${agentId} does not exist`)
    const model = session.models.get(agent.modelId)
    if (!model) throw new ConfigurationError(`Agent ${agent.name} has no model`)
    return { agent, model }
  }

  const first = resolve(agent1Id)
  const second = resolve(agent2Id)
  if (first.model.backend !== second.model.backend) {
    throw new ConfigurationError(
      `Engine mismatch: ${first.agent.name} runs on ${first.model.backend}, ${second.agent.name} on ${second.model.backend}`,
    )
  }
  return [first, second]
}

/**
 * Drives one conversation: two agents take strictly alternating turns, each
 * answering the other's last message, until the turn budget is spent.
 */
export interface TurnEngine {
  /** Create a pending conversation and its seed message in one unit of work. */
  startConversation(input: DuelInput): Promise<ConversationRecord>
  /**
   * Take the remaining turns of a conversation, resuming after the last
   * committed one. Rejects while another call is driving the same conversation.
   */
  runConversation(conversationId: number, options?: RunOptions): Promise<ConversationOutcome>
  /** Start and run in one call. */
  duel(input: DuelInput, options?: RunOptions): Promise<ConversationOutcome>
}

export function createTurnEngine(deps: TurnEngineDeps): TurnEngine {
  const { store, connectors, broadcaster, logger } = deps
  const inFlight = new Set<number>()

  /** Warm every cold model of the pairing; failures are logged, the turn call decides. */
  async function preflight(participants: [Participant, Participant]): Promise<void> {
    const { status } = deps
    if (!status) return

    const models = new Map<number, ModelRecord>()
    for (const { model } of participants) models.set(model.id, model)

    for (const model of models.values()) {
      if (model.warmStatus === 'warm') continue
      try {
        const result = await status.warmModel(model.id)
        if (result !== 'warm') logger.warn(`model ${model.name} did not warm (${result}); continuing`)
      } catch (err) {
        logger.warn(`warm-up of ${model.name} failed: ${errorMessage(err)}; continuing`)
      }
    }
  }

  async function startConversation(input: DuelInput): Promise<ConversationRecord> {
    if (!Number.isInteger(input.ttl) || input.ttl < 1) {
      throw new ConfigurationError('ttl must be an integer of at least 1')
    }

    return store.transaction((s) => {
      const [first, second] = resolvePairing(s, input.agent1Id, input.agent2Id)
      const at = now()
      const conversation = s.conversations.insert({
        title: input.title ?? `${first.agent.name} vs ${second.agent.name}`,
        agent1Id: first.agent.id,
        agent2Id: second.agent.id,
        ttl: input.ttl,
        randomSeed: input.seed,
        status: 'pending',
        finishedAt: null,
        createdAt: at,
        updatedAt: at,
      })
      s.messages.insert({
        conversationId: conversation.id,
        senderRole: 'user',
        agentId: null,
        content: input.prompt,
        tokens: countTokens(input.prompt),
        raw: null,
        createdAt: at,
      })
      return conversation
    })
  }

  async function takeTurns(conversationId: number, viewer: Viewer | undefined): Promise<ConversationOutcome> {
    const { conversation, participants, history, seed } = await store.transaction((s) => {
      const conversation = s.conversations.require(conversationId)
      if (conversation.status === 'finished') {
        throw new ConfigurationError(`Conversation ${conversationId} is already finished`)
      }
      const participants = resolvePairing(s, conversation.agent1Id, conversation.agent2Id)
      const history = s.messages.list((m) => m.conversationId === conversationId)
      const seed = history.find((m) => m.senderRole === 'user')
      if (!seed) {
        throw new ConfigurationError(`Conversation ${conversationId} has no seed message`)
      }
      s.conversations.update(conversationId, { status: 'running', updatedAt: now() })
      return { conversation, participants, history, seed }
    })

    await preflight(participants)

    // Resume after the last committed turn, if any
    const agentTurns = history.filter((m) => m.senderRole !== 'user')
    const last: MessageRecord = agentTurns[agentTurns.length - 1] ?? seed
    let currentText = last.content
    let totalTokens = history.reduce((sum, m) => sum + m.tokens, 0)
    const started = Date.now()

    for (let turn = agentTurns.length; turn < conversation.ttl; turn++) {
      const sender = turn % 2 === 0 ? 'agent1' : 'agent2'
      const { agent, model } = sender === 'agent1' ? participants[0] : participants[1]

      const messages: ChatMessage[] = [
        { role: 'system', content: agent.systemPrompt },
        { role: 'user', content: currentText },
      ]

      let text: string
      let raw: unknown
      try {
        const result = await connectors(model).chat(messages, {
          model: model.modelName,
          maxTokens: agent.maxTokens,
          temperature: agent.temperature,
          seed: conversation.randomSeed,
          timeoutMs: deps.requestTimeoutMs,
        })
        text = result.text
        raw = result.raw ?? null
      } catch (err) {
        const failure = new TurnFailure(conversationId, turn, sender, err)
        logger.error(failure.message)
        if (viewer) {
          const totalMessages = await store.transaction(
            (s) => s.messages.list((m) => m.conversationId === conversationId).length,
          )
          broadcaster.publish(viewer, {
            type: 'end',
            conversationId,
            status: 'running',
            stats: { totalMessages },
            error: failure.message,
          })
        }
        throw failure
      }

      const tokens = countTokens(text)
      totalTokens += tokens
      await store.transaction((s) =>
        s.messages.insert({
          conversationId,
          senderRole: sender,
          agentId: agent.id,
          content: text,
          tokens,
          raw,
          createdAt: now(),
        }),
      )

      if (viewer) {
        broadcaster.publish(viewer, {
          type: 'turn',
          conversationId,
          sender,
          text,
          done: turn === conversation.ttl - 1,
        })
      }
      logger.debug(`conversation ${conversationId} turn ${turn} (${sender}): ${tokens} tokens`)
      currentText = text
    }

    const totalMessages = await store.transaction((s) => {
      const at = now()
      s.conversations.update(conversationId, { status: 'finished', finishedAt: at, updatedAt: at })
      return s.messages.list((m) => m.conversationId === conversationId).length
    })

    if (viewer) {
      broadcaster.publish(viewer, {
        type: 'end',
        conversationId,
        status: 'finished',
        stats: { totalMessages },
      })
    }

    return {
      conversationId,
      messageCount: totalMessages,
      totalTokens,
      elapsedSeconds: (Date.now() - started) / 1000,
    }
  }

  async function runConversation(conversationId: number, options?: RunOptions): Promise<ConversationOutcome> {
    // Claimed before the first await, so a second call in the same tick sees it
    if (inFlight.has(conversationId)) {
      throw new ConfigurationError(`Conversation ${conversationId} is already running`)
    }
    inFlight.add(conversationId)
    try {
      return await takeTurns(conversationId, options?.viewer)
    } finally {
      inFlight.delete(conversationId)
    }
  }

  return {
    startConversation,
    runConversation,

    async duel(input, options) {
      const conversation = await startConversation(input)
      return runConversation(conversation.id, options)
    },
  }
}
