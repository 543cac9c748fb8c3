import { classifyDiagnosticLine } from './diagnostics.js'

/** State tracked between launch-monitor poll ticks. */
export type LaunchPollState = {
  startedAt: number | null
}

/** What the caller should do after evaluating a poll tick. */
export type LaunchPollAction =
  | { type: 'continue'; nextState: LaunchPollState }
  | { type: 'ready' }
  | { type: 'license-error'; line: string }
  | { type: 'bind-error'; line: string }
  | { type: 'timeout'; elapsedMs: number }

/**
 * Pure evaluation of a single launch-monitor poll tick.
 *
 * Caller supplies the next diagnostic line (undefined when none is waiting)
 * and the current state; function returns the action and updated state.
 */
export function evaluateLaunchPoll(
  line: string | undefined,
  state: LaunchPollState,
  config: { readyTimeoutMs: number },
  now: number = Date.now()
): LaunchPollAction {
  if (line !== undefined) {
    switch (classifyDiagnosticLine(line)) {
      case 'ready':
        return { type: 'ready' }
      case 'license-error':
        return { type: 'license-error', line }
      case 'bind-error':
        return { type: 'bind-error', line }
      case 'other':
        break
    }
  }

  const startedAt = state.startedAt ?? now
  const elapsedMs = now - startedAt
  if (elapsedMs >= config.readyTimeoutMs) {
    return { type: 'timeout', elapsedMs }
  }

  return { type: 'continue', nextState: { startedAt } }
}
