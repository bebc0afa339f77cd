import type { ConversationRecord, MessageRecord } from '../domain/types.js'
import type { Store } from '../store/types.js'

export interface ConversationStats {
  totalMessages: number
  totalTokens: number
}

export interface ConversationView {
  conversation: ConversationRecord
  messages: MessageRecord[]
  stats: ConversationStats
}

export function conversationStats(messages: Pick<MessageRecord, 'tokens'>[]): ConversationStats {
  return {
    totalMessages: messages.length,
    totalTokens: messages.reduce((sum, m) => sum + m.tokens, 0),
  }
}

/** A conversation with its transcript, seed message first. */
export async function getConversationView(store: Store, conversationId: number): Promise<ConversationView> {
  return store.transaction((s) => {
    const conversation = s.conversations.require(conversationId)
    const messages = s.messages.list((m) => m.conversationId === conversationId)
    return { conversation, messages, stats: conversationStats(messages) }
  })
}

/** Newest first */
export async function listConversations(store: Store): Promise<ConversationRecord[]> {
  const rows = await store.transaction((s) => s.conversations.list())
  return rows.reverse()
}
