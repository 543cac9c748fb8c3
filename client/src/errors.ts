/**
 * Error taxonomy for the Connect client.
 *
 * Local recovery is limited to connect retry, NACK resend and (in the
 * launcher) bind port shift. Every error here propagates to the caller.
 *
 * @module
 */

import type { Endpoint } from './config.js'

/**
 * Thrown when the socket-level connect exhausted its attempt budget, or
 * failed with an error other than "connection refused".
 */
export class ConnectError extends Error {
  constructor(
    public readonly endpoint: Endpoint,
    public readonly attempts: number,
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super(
      `Failed to connect to ${endpoint.host}:${endpoint.port} after ${attempts} attempt(s)${reason}`
    )
    this.name = 'ConnectError'
    this.cause = cause
  }
}

/**
 * Thrown when the remote rejected a command on every attempt of the send budget.
 */
export class NackError extends Error {
  constructor(
    public readonly command: string,
    public readonly attempts: number,
    /** Status code that followed the last NACK, when the framing carries one */
    public readonly code?: string
  ) {
    super(`NACK received for command "${command}" (${attempts} attempt(s))`)
    this.name = 'NackError'
  }
}

/**
 * Which wire structure failed to parse.
 */
export type FrameKind = 'simple_ack' | 'sync_header' | 'async_header' | 'message_group'

/**
 * Thrown when wire data does not have the expected header shape.
 * The protocol defines no resynchronization, so this is fatal for the connection.
 */
export class MalformedHeaderError extends Error {
  constructor(
    public readonly frame: FrameKind,
    public readonly reason: string,
    /** The offending bytes, decoded as latin1 for display */
    public readonly raw?: string
  ) {
    super(`Malformed ${frame}: ${reason}${raw === undefined ? '' : ` (got ${JSON.stringify(raw)})`}`)
    this.name = 'MalformedHeaderError'
  }
}

/**
 * Thrown when a command cannot be framed as a single line.
 */
export class CommandFramingError extends Error {
  constructor(public readonly command: string) {
    super(`Command must be a single line: ${JSON.stringify(command)}`)
    this.name = 'CommandFramingError'
  }
}

/**
 * Connection lifecycle states.
 */
export type ConnectionState = 'unconnected' | 'connected' | 'closed'

/**
 * Thrown when an operation is not valid in the current connection state.
 */
export class ConnectionStateError extends Error {
  constructor(
    public readonly state: ConnectionState,
    operation: string
  ) {
    super(`Cannot ${operation}: connection is ${state}`)
    this.name = 'ConnectionStateError'
  }
}

/**
 * Thrown when the socket closes or errors while a read is waiting for bytes.
 */
export class ConnectionClosedError extends Error {
  constructor(
    public readonly expected: number,
    public readonly received: number,
    cause?: unknown
  ) {
    super(`Connection closed after ${received} of ${expected} expected byte(s)`)
    this.name = 'ConnectionClosedError'
    this.cause = cause
  }
}

/**
 * Thrown when client options fail validation.
 */
export class ConfigError extends Error {
  constructor(
    public readonly field: string,
    reason: string
  ) {
    super(`Invalid option "${field}": ${reason}`)
    this.name = 'ConfigError'
  }
}
