/**
 * Observer contract for protocol diagnostics.
 *
 * The client never logs on its own. It reports what happens on the wire as
 * typed events to an injected observer; the caller decides where they go.
 *
 * @module
 */
import type { Endpoint } from './config.js'

/**
 * Diagnostic severity of an event.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Every event the client reports. Discriminated on `type`.
 */
export type ConnectEvent =
  | {
      readonly type: 'connect_attempt'
      readonly endpoint: Endpoint
      readonly attempt: number
      readonly maxAttempts: number
    }
  | {
      readonly type: 'connect_refused'
      readonly endpoint: Endpoint
      readonly attempt: number
      readonly message: string
    }
  | { readonly type: 'connected'; readonly endpoint: Endpoint; readonly attempts: number }
  | { readonly type: 'command_sent'; readonly command: string; readonly attempt: number }
  | { readonly type: 'ack'; readonly command: string }
  | {
      readonly type: 'nack'
      readonly command: string
      readonly attempt: number
      readonly code?: string
    }
  | { readonly type: 'message'; readonly name: string; readonly length: number }
  | { readonly type: 'idle_read'; readonly bytes: number; readonly timeoutMs: number }
  | { readonly type: 'desync'; readonly message: string }
  | { readonly type: 'closed'; readonly endpoint: Endpoint }

export type ConnectEventType = ConnectEvent['type']

/**
 * Receives protocol events. Implementations must not throw.
 */
export interface ConnectObserver {
  observe(event: ConnectEvent): void
}

/**
 * Observer that discards everything. Default when none is supplied.
 */
export const noopObserver: ConnectObserver = {
  observe() {}
}

/**
 * Severity of each event type.
 */
export function eventLevel(event: ConnectEvent): LogLevel {
  switch (event.type) {
    case 'connected':
    case 'closed':
      return 'info'
    case 'connect_refused':
    case 'nack':
      return 'warn'
    case 'desync':
      return 'error'
    default:
      return 'debug'
  }
}

/**
 * Render an event as a single human-readable line (no trailing newline).
 */
export function formatEvent(event: ConnectEvent): string {
  switch (event.type) {
    case 'connect_attempt':
      return `connecting to ${event.endpoint.host}:${event.endpoint.port} (attempt ${event.attempt} of ${event.maxAttempts})`
    case 'connect_refused':
      return `connection refused by ${event.endpoint.host}:${event.endpoint.port} (attempt ${event.attempt}): ${event.message}`
    case 'connected':
      return `connected to ${event.endpoint.host}:${event.endpoint.port} after ${event.attempts} attempt(s)`
    case 'command_sent':
      return `send("${event.command}") attempt ${event.attempt}`
    case 'ack':
      return `ACK for "${event.command}"`
    case 'nack':
      return `NACK for "${event.command}" on attempt ${event.attempt}${event.code === undefined ? '' : ` (code ${event.code})`}`
    case 'message':
      return `message ${event.name} (${event.length} bytes)`
    case 'idle_read':
      return `idle read returned ${event.bytes} bytes (timeout ${event.timeoutMs}ms)`
    case 'desync':
      return `protocol desync: ${event.message}`
    case 'closed':
      return `closed connection to ${event.endpoint.host}:${event.endpoint.port}`
  }
}
