/**
 * Observer that writes events as diagnostic lines to stderr.
 * Stdout stays reserved for command results.
 *
 * @module
 */
import type { LogLevel } from '@stk-connect/client'
import { formatSessionEvent, type SessionObserver, sessionEventLevel } from './events.js'

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

export interface StderrObserverOptions {
  /** Lowest level written (default `warn`) */
  readonly level?: LogLevel
  /** Sink for formatted lines; defaults to `process.stderr` */
  readonly write?: (text: string) => void
}

/**
 * Create an observer that writes `[stk-connect] <level>: <message>` lines.
 */
export function createStderrObserver(options: StderrObserverOptions = {}): SessionObserver {
  const threshold = LEVEL_RANK[options.level ?? 'warn']
  const write = options.write ?? ((text: string) => void process.stderr.write(text))

  return {
    observe(event) {
      const level = sessionEventLevel(event)
      if (LEVEL_RANK[level] < threshold) return
      write(`[stk-connect] ${level}: ${formatSessionEvent(event)}\n`)
    }
  }
}
