export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

export function consoleLogger(level: LogLevel = 'info'): Logger {
  const rank = LEVEL_RANK[level]
  const stamp = () => new Date().toISOString()

  return {
    debug(message) {
      if (rank >= LEVEL_RANK.debug) console.log(`${stamp()} DEBUG ${message}`)
    },
    info(message) {
      if (rank >= LEVEL_RANK.info) console.log(`${stamp()} INFO  ${message}`)
    },
    warn(message) {
      if (rank >= LEVEL_RANK.warn) console.warn(`${stamp()} WARN  ${message}`)
    },
    error(message) {
      if (rank >= LEVEL_RANK.error) console.error(`${stamp()} ERROR ${message}`)
    },
  }
}

export const silentLogger: Logger = consoleLogger('silent')
