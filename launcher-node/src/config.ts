/**
 * Session settings read from the environment.
 *
 * Extracted from the CLI entrypoint so it can be tested
 * without triggering main() side-effects.
 *
 * @module
 */
import type { ConnectMode, LogLevel } from '@stk-connect/client'

export interface SessionEnv {
  readonly host?: string
  readonly port?: number
  readonly mode?: ConnectMode
  readonly logLevel?: LogLevel
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Parse `STK_CONNECT_HOST`, `STK_CONNECT_PORT`, `STK_CONNECT_ASYNC` and `STK_CONNECT_LOG`.
 * Unset or empty variables are skipped. Calls `onWarning` and skips the
 * variable when it is present but malformed.
 */
export function parseSessionEnv(
  env: NodeJS.ProcessEnv,
  onWarning: (msg: string) => void
): SessionEnv {
  const result: { host?: string; port?: number; mode?: ConnectMode; logLevel?: LogLevel } = {}

  const host = env.STK_CONNECT_HOST
  if (host !== undefined && host !== '') {
    result.host = host
  }

  const port = env.STK_CONNECT_PORT
  if (port !== undefined && port !== '') {
    const value = Number.parseInt(port, 10)
    if (/^\d+$/.test(port) && value >= 1 && value <= 65535) {
      result.port = value
    } else {
      onWarning(`STK_CONNECT_PORT must be an integer between 1 and 65535, got "${port}"; ignoring`)
    }
  }

  const asyncFlag = env.STK_CONNECT_ASYNC
  if (asyncFlag !== undefined && asyncFlag !== '') {
    if (asyncFlag === '1' || asyncFlag === 'true') {
      result.mode = 'async'
    } else if (asyncFlag === '0' || asyncFlag === 'false') {
      result.mode = 'sync'
    } else {
      onWarning(`STK_CONNECT_ASYNC must be 1, 0, true or false, got "${asyncFlag}"; ignoring`)
    }
  }

  const level = env.STK_CONNECT_LOG
  if (level !== undefined && level !== '') {
    if (isLogLevel(level)) {
      result.logLevel = level
    } else {
      onWarning(`STK_CONNECT_LOG must be one of ${LOG_LEVELS.join(', ')}, got "${level}"; ignoring`)
    }
  }

  return result
}
