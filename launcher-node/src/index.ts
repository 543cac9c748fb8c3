/**
 * stk-connect launcher
 *
 * Starts the simulation console, waits for its Connect socket, and drives it
 * through the client as one session.
 *
 * @packageDocumentation
 */

// Session
export { Session, type SessionDeps, type SessionOptions } from './session.js'

// Supervisor
export {
  DEFAULT_LAUNCH_RETRY_DELAY_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT_DELTA,
  DEFAULT_READY_TIMEOUT_MS,
  DEFAULT_RUN_ATTEMPTS,
  type LaunchResult,
  type LaunchRetryOptions,
  type LaunchSpec,
  launchWithRetry,
  ProcessSupervisor,
  type SupervisorOptions
} from './supervisor.js'
export { evaluateLaunchPoll, type LaunchPollAction, type LaunchPollState } from './launch-poll.js'
export {
  BIND_ERROR_MARKER,
  classifyDiagnosticLine,
  type DiagnosticKind,
  LICENSE_MARKER,
  LineQueue,
  READY_MARKER
} from './diagnostics.js'

// Launch configuration
export { buildLaunchSpec, DESKTOP_PORT, type LaunchConfig } from './launch-spec.js'
export { type DirectoryOptions, resolveConfigDir, resolveInstallDir } from './install-dir.js'
export { parseSessionEnv, type SessionEnv } from './config.js'

// Errors
export { BindError, InstallDirNotFoundError, LaunchError, LicenseError } from './errors.js'

// Observability
export {
  type DiagnosticSource,
  formatSessionEvent,
  type LaunchEvent,
  noopSessionObserver,
  type SessionEvent,
  type SessionObserver,
  sessionEventLevel
} from './events.js'
export { createStderrObserver, type StderrObserverOptions } from './stderr-observer.js'
