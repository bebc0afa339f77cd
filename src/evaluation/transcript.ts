import type { MessageFields } from '../domain/types.js'

/** One line per message, tagged with its position: `[i] role: content`. */
export function conversationToText(messages: Pick<MessageFields, 'senderRole' | 'content'>[]): string {
  return messages.map((m, i) => `[${i}] ${m.senderRole}: ${m.content}`).join('\n')
}
