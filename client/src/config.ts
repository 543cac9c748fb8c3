/**
 * Client configuration: recognised options, defaults and validation.
 *
 * @module
 */
import { ConfigError } from './errors.js'
import type { ConnectObserver } from './observer.js'

/**
 * Remote address of the Connect socket.
 */
export interface Endpoint {
  readonly host: string
  readonly port: number
}

/**
 * Response-framing discipline. Closed set; selects the client variant.
 */
export type ConnectMode = 'sync' | 'async'

/**
 * Options accepted by the client factory. Every field is optional.
 */
export interface ClientOptions {
  /** Remote host (default `localhost`) */
  readonly host?: string
  /** Remote port (default 5001) */
  readonly port?: number
  /** Response framing (default `sync`) */
  readonly mode?: ConnectMode
  /** Whether commands are acknowledged (default true) */
  readonly ack?: boolean
  /** Socket connect attempt budget (default 5) */
  readonly connectAttempts?: number
  /** Fixed delay between connect attempts in ms (default 3000) */
  readonly retryDelayMs?: number
  /** Send attempt budget on NACK (default 1) */
  readonly sendAttempts?: number
  /** Idle timeout for free-form reads in ms (default 1000) */
  readonly timeoutMs?: number
  /** Receives protocol events; defaults to a no-op */
  readonly observer?: ConnectObserver
}

/**
 * Fully defaulted client configuration.
 */
export interface ClientConfig {
  readonly endpoint: Endpoint
  readonly mode: ConnectMode
  readonly ack: boolean
  readonly connectAttempts: number
  readonly retryDelayMs: number
  readonly sendAttempts: number
  readonly timeoutMs: number
}

export const DEFAULT_HOST = 'localhost'
export const DEFAULT_PORT = 5001
export const DEFAULT_CONNECT_ATTEMPTS = 5
export const DEFAULT_RETRY_DELAY_MS = 3_000
export const DEFAULT_SEND_ATTEMPTS = 1
export const DEFAULT_TIMEOUT_MS = 1_000

function positiveInteger(field: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(field, 'must be a positive integer')
  }
  return value
}

function nonNegative(field: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(field, 'must be a non-negative number')
  }
  return value
}

/**
 * Check a port number, returning it unchanged.
 *
 * @throws ConfigError if the port is not an integer in 1..65535
 */
export function validatePort(port: number, field = 'port'): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(field, 'must be an integer between 1 and 65535')
  }
  return port
}

/**
 * Apply defaults and validate client options.
 *
 * @throws ConfigError naming the first invalid field
 */
export function resolveClientConfig(options: ClientOptions = {}): ClientConfig {
  const host = options.host ?? DEFAULT_HOST
  if (host === '') {
    throw new ConfigError('host', 'must be a non-empty string')
  }

  const mode = options.mode ?? 'sync'
  if (mode !== 'sync' && mode !== 'async') {
    throw new ConfigError('mode', `must be "sync" or "async", got "${String(mode)}"`)
  }

  return {
    endpoint: { host, port: validatePort(options.port ?? DEFAULT_PORT) },
    mode,
    ack: options.ack ?? true,
    connectAttempts: positiveInteger('connectAttempts', options.connectAttempts, DEFAULT_CONNECT_ATTEMPTS),
    retryDelayMs: nonNegative('retryDelayMs', options.retryDelayMs, DEFAULT_RETRY_DELAY_MS),
    sendAttempts: positiveInteger('sendAttempts', options.sendAttempts, DEFAULT_SEND_ATTEMPTS),
    timeoutMs: nonNegative('timeoutMs', options.timeoutMs, DEFAULT_TIMEOUT_MS)
  }
}
