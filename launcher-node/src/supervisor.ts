/**
 * ProcessSupervisor: runs the simulation console as a child process and
 * watches its diagnostic stream until the Connect socket is ready.
 *
 * Lifecycle:
 * 1. {@link ProcessSupervisor.start} spawns the child; a stream listener
 *    fills the diagnostic {@link LineQueue} from its stderr
 * 2. `waitForReady()` polls the queue until a marker decides the launch
 * 3. `stop()` / `kill()` end the child
 *
 * The supervisor only decides when a client may connect. It does not
 * otherwise manage the process.
 *
 * @module
 */
import { type ChildProcess, spawn } from 'node:child_process'
import { once } from 'node:events'
import { setTimeout as sleep } from 'node:timers/promises'
import { LineQueue } from './diagnostics.js'
import { BindError, LaunchError, LicenseError } from './errors.js'
import { noopSessionObserver, type SessionObserver } from './events.js'
import { evaluateLaunchPoll, type LaunchPollState } from './launch-poll.js'

/**
 * How to run the console.
 */
export interface LaunchSpec {
  readonly command: string
  readonly args: readonly string[]
  readonly env: NodeJS.ProcessEnv
  /** Port the console is asked to listen on */
  readonly port: number
  /** Whether the console prints readiness markers on stderr */
  readonly monitorReadiness: boolean
}

export interface SupervisorOptions {
  /** Delay between polls of an empty diagnostic queue (default 3000) */
  readonly pollIntervalMs?: number
  /** Give up when the console is not ready after this long (default 120000) */
  readonly readyTimeoutMs?: number
  readonly observer?: SessionObserver
}

export const DEFAULT_POLL_INTERVAL_MS = 3_000
export const DEFAULT_READY_TIMEOUT_MS = 120_000
export const DEFAULT_PORT_DELTA = 1_000
export const DEFAULT_RUN_ATTEMPTS = 1
export const DEFAULT_LAUNCH_RETRY_DELAY_MS = 3_000

type ExitStatus = { code: number | null; signal: NodeJS.Signals | null }

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class ProcessSupervisor {
  private exitStatus: ExitStatus | null = null
  private spawnError: Error | null = null

  private constructor(
    readonly spec: LaunchSpec,
    private readonly child: ChildProcess,
    /** Lines read from the console's stderr, not yet consumed */
    readonly diagnostics: LineQueue,
    private readonly options: SupervisorOptions
  ) {
    child.once('exit', (code, signal) => {
      this.exitStatus = { code, signal }
    })
    child.once('error', (err) => {
      this.spawnError = err
    })
  }

  /**
   * Spawn the console. Returns at once; use {@link waitForReady} to wait for its socket.
   */
  static start(spec: LaunchSpec, options: SupervisorOptions = {}): ProcessSupervisor {
    const child = spawn(spec.command, [...spec.args], {
      env: spec.env,
      stdio: ['ignore', 'ignore', spec.monitorReadiness ? 'pipe' : 'ignore']
    })

    let diagnostics: LineQueue
    if (child.stderr === null) {
      diagnostics = new LineQueue()
      diagnostics.end()
    } else {
      diagnostics = LineQueue.fromStream(child.stderr)
    }

    return new ProcessSupervisor(spec, child, diagnostics, options)
  }

  /** The command line, for messages. */
  get commandLine(): string {
    return [this.spec.command, ...this.spec.args].join(' ')
  }

  get pid(): number | undefined {
    return this.child.pid
  }

  /** True until the child has exited or failed to start. */
  get running(): boolean {
    return this.exitStatus === null && this.spawnError === null
  }

  /**
   * Poll the diagnostic stream until the console reports its socket is ready.
   *
   * Resolves at once when `spec.monitorReadiness` is off. On any failure
   * the child is killed before the error propagates.
   *
   * @throws LicenseError if no license is available
   * @throws BindError if the port could not be bound
   * @throws LaunchError if the child exits, fails to start, or times out
   */
  async waitForReady(): Promise<void> {
    if (!this.spec.monitorReadiness) return

    const observer = this.options.observer ?? noopSessionObserver
    const pollIntervalMs = this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    const config = { readyTimeoutMs: this.options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS }
    let state: LaunchPollState = { startedAt: null }

    for (;;) {
      if (this.spawnError !== null) {
        throw new LaunchError(
          `Failed to start ${this.commandLine}: ${this.spawnError.message}`,
          this.commandLine,
          1,
          this.spawnError
        )
      }

      const line = this.diagnostics.poll()
      if (line !== undefined) {
        observer.observe({ type: 'diagnostic', line, source: 'launch' })
      } else if (this.diagnostics.ended && this.exitStatus !== null) {
        const { code, signal } = this.exitStatus
        throw new LaunchError(
          `${this.commandLine} exited before accepting connections (code ${code}, signal ${signal})`,
          this.commandLine,
          1
        )
      }

      const action = evaluateLaunchPoll(line, state, config)
      switch (action.type) {
        case 'continue':
          state = action.nextState
          if (line === undefined) {
            await sleep(pollIntervalMs)
          }
          continue
        case 'ready':
          observer.observe({ type: 'launch_ready', port: this.spec.port })
          return
        case 'license-error':
          this.kill()
          throw new LicenseError(action.line)
        case 'bind-error':
          this.kill()
          throw new BindError(this.spec.port, action.line)
        case 'timeout':
          this.kill()
          throw new LaunchError(
            `${this.commandLine} not ready after ${action.elapsedMs}ms`,
            this.commandLine,
            1
          )
      }
    }
  }

  /**
   * Remove and return every diagnostic line not yet consumed.
   */
  drainDiagnostics(): string[] {
    return this.diagnostics.drain()
  }

  /**
   * Signal the child to terminate. Does not wait.
   */
  kill(): void {
    if (this.running) {
      this.child.kill()
    }
  }

  /**
   * Terminate the child and wait for it to exit.
   */
  async stop(): Promise<void> {
    if (!this.running) return
    const exited = once(this.child, 'exit')
    this.child.kill()
    await exited
  }
}

export interface LaunchRetryOptions extends SupervisorOptions {
  /** Port of the first attempt */
  readonly port: number
  /** Build the launch spec for a port */
  readonly buildSpec: (port: number) => LaunchSpec
  /** Launch attempt budget (default 1) */
  readonly runAttempts?: number
  /** Added to the port after a bind failure (default 1000) */
  readonly portDelta?: number
  /** Delay between launch attempts (default 3000) */
  readonly retryDelayMs?: number
}

export interface LaunchResult {
  readonly supervisor: ProcessSupervisor
  /** Port the console is listening on */
  readonly port: number
  readonly attempts: number
}

/**
 * Launch the console, retrying within the attempt budget.
 *
 * A bind failure shifts the port by `portDelta` before the next attempt.
 * A license failure is fatal at once.
 *
 * @throws LicenseError when no license is available
 * @throws LaunchError when the budget is spent; the last failure is its cause
 */
export async function launchWithRetry(options: LaunchRetryOptions): Promise<LaunchResult> {
  const observer = options.observer ?? noopSessionObserver
  const runAttempts = options.runAttempts ?? DEFAULT_RUN_ATTEMPTS
  const portDelta = options.portDelta ?? DEFAULT_PORT_DELTA
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_LAUNCH_RETRY_DELAY_MS
  let port = options.port

  for (let attempt = 1; ; attempt++) {
    const spec = options.buildSpec(port)
    const supervisor = ProcessSupervisor.start(spec, options)
    observer.observe({
      type: 'launch_attempt',
      command: supervisor.commandLine,
      port: spec.port,
      attempt,
      maxAttempts: runAttempts
    })

    try {
      await supervisor.waitForReady()
      return { supervisor, port: spec.port, attempts: attempt }
    } catch (err) {
      await supervisor.stop()
      if (err instanceof LicenseError) {
        throw err
      }
      if (!(err instanceof BindError) && !(err instanceof LaunchError)) {
        throw err
      }

      observer.observe({ type: 'launch_failed', attempt, message: errorMessage(err) })
      if (attempt >= runAttempts) {
        throw new LaunchError(
          `Failed to launch the console after ${attempt} attempt(s)`,
          supervisor.commandLine,
          attempt,
          err
        )
      }
      if (err instanceof BindError) {
        observer.observe({ type: 'port_shift', from: port, to: port + portDelta })
        port += portDelta
      }
    }

    await sleep(retryDelayMs)
  }
}
