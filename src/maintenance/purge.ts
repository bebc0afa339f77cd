import { ConfigurationError } from '../errors.js'
import type { Store } from '../store/types.js'

export interface PurgeResult {
  batchJobs: number
  conversations: number
  cutoff: string
}

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Delete batch jobs and conversations (with their messages) created before
 * `days` days ago. Evaluation jobs are kept.
 */
export async function purgeOlderThan(store: Store, days: number, at: Date = new Date()): Promise<PurgeResult> {
  if (!Number.isInteger(days) || days < 0) {
    throw new ConfigurationError('days must be an integer of at least 0')
  }

  const cutoff = new Date(at.getTime() - days * DAY_MS).toISOString()
  return store.transaction((s) => {
    const old = <T extends { id: number; createdAt: string }>(rows: T[]) =>
      rows.filter((r) => r.createdAt < cutoff).map((r) => r.id)

    const batchIds = old(s.batchJobs.list())
    const conversationIds = old(s.conversations.list())
    for (const id of batchIds) s.batchJobs.delete(id)
    for (const id of conversationIds) s.conversations.delete(id)

    return { batchJobs: batchIds.length, conversations: conversationIds.length, cutoff }
  })
}
