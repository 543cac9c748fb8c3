/**
 * Launcher events and the observer that receives both launcher and client events.
 *
 * @module
 */
import { type ConnectEvent, eventLevel, formatEvent, type LogLevel } from '@stk-connect/client'

/**
 * Where a forwarded diagnostic line came from: the launch monitor, or the
 * lines still pending when the remote rejected a command.
 */
export type DiagnosticSource = 'launch' | 'nack'

/**
 * Every event the launcher reports. Discriminated on `type`.
 */
export type LaunchEvent =
  | {
      readonly type: 'launch_attempt'
      readonly command: string
      readonly port: number
      readonly attempt: number
      readonly maxAttempts: number
    }
  | { readonly type: 'diagnostic'; readonly line: string; readonly source: DiagnosticSource }
  | { readonly type: 'launch_ready'; readonly port: number }
  | { readonly type: 'port_shift'; readonly from: number; readonly to: number }
  | { readonly type: 'launch_failed'; readonly attempt: number; readonly message: string }

export type SessionEvent = ConnectEvent | LaunchEvent

/**
 * Receives launcher and client events. Usable wherever a client observer is expected.
 */
export interface SessionObserver {
  observe(event: SessionEvent): void
}

export const noopSessionObserver: SessionObserver = {
  observe() {}
}

function isLaunchEvent(event: SessionEvent): event is LaunchEvent {
  switch (event.type) {
    case 'launch_attempt':
    case 'diagnostic':
    case 'launch_ready':
    case 'port_shift':
    case 'launch_failed':
      return true
    default:
      return false
  }
}

function launchEventLevel(event: LaunchEvent): LogLevel {
  switch (event.type) {
    case 'launch_attempt':
    case 'launch_ready':
      return 'info'
    case 'diagnostic':
      return event.source === 'nack' ? 'warn' : 'debug'
    case 'port_shift':
    case 'launch_failed':
      return 'warn'
  }
}

function formatLaunchEvent(event: LaunchEvent): string {
  switch (event.type) {
    case 'launch_attempt':
      return `launching ${event.command} (attempt ${event.attempt} of ${event.maxAttempts})`
    case 'diagnostic':
      return `console: ${event.line}`
    case 'launch_ready':
      return `console accepting connections on port ${event.port}`
    case 'port_shift':
      return `port ${event.from} unavailable, retrying on port ${event.to}`
    case 'launch_failed':
      return `launch attempt ${event.attempt} failed: ${event.message}`
  }
}

/**
 * Severity of any session event.
 */
export function sessionEventLevel(event: SessionEvent): LogLevel {
  return isLaunchEvent(event) ? launchEventLevel(event) : eventLevel(event)
}

/**
 * Render any session event as one line (no trailing newline).
 */
export function formatSessionEvent(event: SessionEvent): string {
  return isLaunchEvent(event) ? formatLaunchEvent(event) : formatEvent(event)
}
