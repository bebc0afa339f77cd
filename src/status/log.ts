/**
 * Bounded per-key history of status events ("engine check ok at host:port").
 * One instance is owned by the runtime and shared by everything that reports
 * on model health.
 */
export interface StatusLog {
  append(key: string, message: string, at?: Date): void
  recent(key: string, limit?: number): string[]
  clear(): void
}

export function createStatusLog(capacity: number = 50): StatusLog {
  const entries = new Map<string, string[]>()

  return {
    append(key, message, at = new Date()) {
      const lines = entries.get(key) ?? []
      lines.push(`${at.toISOString()} ${message}`)
      if (lines.length > capacity) lines.splice(0, lines.length - capacity)
      entries.set(key, lines)
    },

    recent(key, limit = 5) {
      const lines = entries.get(key) ?? []
      return lines.slice(-limit)
    },

    clear() {
      entries.clear()
    },
  }
}

export function modelLogKey(modelId: number): string {
  return `model:${modelId}`
}
